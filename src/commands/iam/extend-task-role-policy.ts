import chalk from 'chalk';
import { flags } from '@oclif/command';
import { Listr } from 'listr2';

import BaseCommand from '../../base-command';
import { TaskReporter } from '../../interfaces/task-reporter.interface';
import { isAccountId } from '../../iam/caller-identity';
import { serializePolicyDocument } from '../../iam/policy-document';
import {
  TaskRolePolicyExtender,
  TaskRolePolicyOutcome,
} from '../../iam/task-role-policy.extender';
import { roleArn } from '../../iam/trust-policy.extender';
import { promptForAccountId, promptForValue } from '../../prompts';

type TaskRolePolicyContext = {
  outcome?: TaskRolePolicyOutcome;
};

export default class ExtendTaskRolePolicy extends BaseCommand {
  static description = [
    'Allows the ECS task role to assume one more database account role by adding it',
    'to the resources of the managed policy that grants sts:AssumeRole.',
  ].join('\n');

  static examples = [
    `$ db-access-setup iam:extend-task-role-policy`,
    `$ db-access-setup iam:extend-task-role-policy ${chalk.yellow(
      '--account-id 123456789012 --target-role rds-cross-account-role',
    )}`,
  ];

  static flags = {
    ...BaseCommand.baseFlags,
    'account-id': flags.string({
      description: 'Account that owns the role to assume.',
    }),
    'target-role': flags.string({
      description: 'Role to assume in that account.',
    }),
    'role-name': flags.string({
      default: 'ECSTaskRole',
      description: 'ECS task role in this account.',
    }),
    'policy-name': flags.string({
      default: 'ECSRDSAssumeRolePolicy',
      description: 'Managed policy on the task role that grants sts:AssumeRole.',
    }),
  };

  async run(): Promise<void> {
    const { flags } = this.parse(ExtendTaskRolePolicy);

    if (flags['account-id'] && !isAccountId(flags['account-id'])) {
      this.error(`${flags['account-id']} is not a 12-digit AWS account id`, {
        exit: 1,
      });
    }

    await this.setUp(flags, { 'Task role': flags['role-name'] });

    const accountId =
      flags['account-id'] ||
      (await promptForAccountId('Account id of the role to assume'));
    const targetRole =
      flags['target-role'] || (await promptForValue('Role to assume'));
    const resourceArn = roleArn(accountId, targetRole);

    const extender = new TaskRolePolicyExtender();
    const options = this.stepOptions(flags);
    const ctx: TaskRolePolicyContext = {};

    const listr = new Listr<TaskRolePolicyContext, 'default' | 'silent'>(
      [
        {
          title: `${chalk.dim('allow:')} ${resourceArn} in ${flags['policy-name']}`,
          task: async (taskCtx: TaskRolePolicyContext, task: TaskReporter) => {
            taskCtx.outcome = await extender.extend(
              task,
              {
                roleName: flags['role-name'],
                policyName: flags['policy-name'],
                resourceArn,
              },
              options,
            );
          },
        },
      ],
      this.listrOptions(flags, true),
    );

    await listr.run(ctx);
    this.reportResults(listr.tasks, flags, 'steps');

    if (ctx.outcome) {
      this.log(
        `\n${chalk.bold(flags['policy-name'])} (${
          ctx.outcome.policyArn
        }):\n${serializePolicyDocument(ctx.outcome.document)}`,
      );
    }
  }
}
