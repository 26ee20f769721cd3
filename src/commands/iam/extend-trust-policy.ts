import chalk from 'chalk';
import { flags } from '@oclif/command';
import { Listr } from 'listr2';

import BaseCommand from '../../base-command';
import { TaskReporter } from '../../interfaces/task-reporter.interface';
import { isAccountId } from '../../iam/caller-identity';
import {
  PolicyDocument,
  serializePolicyDocument,
} from '../../iam/policy-document';
import { TrustPolicyExtender, roleArn } from '../../iam/trust-policy.extender';
import { promptForAccountId, promptForValue } from '../../prompts';

type TrustPolicyContext = {
  document?: PolicyDocument;
};

export default class ExtendTrustPolicy extends BaseCommand {
  static description = [
    'Lets the ECS task role of another account assume a role in this account.',
    'Any earlier statement for the same task role is replaced, so running it twice leaves one statement.',
  ].join('\n');

  static examples = [
    `$ db-access-setup iam:extend-trust-policy`,
    `$ db-access-setup iam:extend-trust-policy ${chalk.yellow(
      '--role-name rds-cross-account-role --account-id 123456789012',
    )}`,
  ];

  static flags = {
    ...BaseCommand.baseFlags,
    'role-name': flags.string({
      description: 'Role in this account whose trust policy is extended.',
    }),
    'account-id': flags.string({
      description: 'Account that runs the ECS tasks.',
    }),
    'task-role-name': flags.string({
      default: 'ECSTaskRole',
      description: 'Name of the ECS task role in that account.',
    }),
  };

  async run(): Promise<void> {
    const { flags } = this.parse(ExtendTrustPolicy);

    if (flags['account-id'] && !isAccountId(flags['account-id'])) {
      this.error(`${flags['account-id']} is not a 12-digit AWS account id`, {
        exit: 1,
      });
    }

    await this.setUp(flags);

    const roleName =
      flags['role-name'] || (await promptForValue('Role to extend'));
    const accountId =
      flags['account-id'] ||
      (await promptForAccountId('Account id of the ECS tasks'));
    const principalArn = roleArn(accountId, flags['task-role-name']);

    const extender = new TrustPolicyExtender();
    const options = this.stepOptions(flags);
    const ctx: TrustPolicyContext = {};

    const listr = new Listr<TrustPolicyContext, 'default' | 'silent'>(
      [
        {
          title: `${chalk.dim('trust:')} ${principalArn} on ${roleName}`,
          task: async (taskCtx: TrustPolicyContext, task: TaskReporter) => {
            taskCtx.document = await extender.extend(
              task,
              roleName,
              principalArn,
              options,
            );
          },
        },
      ],
      this.listrOptions(flags, true),
    );

    await listr.run(ctx);
    this.reportResults(listr.tasks, flags, 'steps');

    if (ctx.document) {
      this.log(
        `\n${chalk.bold(
          options.dryRun ? 'Planned trust policy' : 'Current trust policy',
        )} of ${roleName}:\n${serializePolicyDocument(ctx.document)}`,
      );
    }
  }
}
