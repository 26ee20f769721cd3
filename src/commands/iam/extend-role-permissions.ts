import chalk from 'chalk';
import { flags } from '@oclif/command';
import { Listr } from 'listr2';

import BaseCommand from '../../base-command';
import { TaskReporter } from '../../interfaces/task-reporter.interface';
import { getCallerAccountId, isAccountId } from '../../iam/caller-identity';
import {
  RdsAccessPolicyArns,
  RolePermissionsExtender,
} from '../../iam/role-permissions.extender';
import { promptForValue } from '../../prompts';

type RolePermissionsContext = {
  arns?: RdsAccessPolicyArns;
};

export default class ExtendRolePermissions extends BaseCommand {
  static description = [
    'Creates the RDS IAM authentication policies (connect and auth token generation)',
    'and attaches both to every given role.',
    `\nWithout arguments the account is taken from the current credentials and the role name is asked for.`,
  ].join('\n');

  static examples = [
    `$ db-access-setup iam:extend-role-permissions`,
    `$ db-access-setup iam:extend-role-permissions 123456789012 app-role reporting-role`,
    `$ db-access-setup iam:extend-role-permissions 123456789012 app-role ${chalk.yellow(
      '--policy-prefix Staging',
    )}`,
  ];

  static flags = {
    ...BaseCommand.baseFlags,
    'policy-prefix': flags.string({
      default: '',
      description: 'Prepended to the names of the created policies.',
    }),
    'default-role': flags.string({
      default: 'rds-cross-account-role',
      description: 'Role name suggested when asking for one.',
    }),
  };

  static args = [
    { name: 'accountId', description: 'AWS account id of the roles.' },
    { name: 'roleName', description: 'One or more roles to attach the policies to.' },
  ];

  static strict = false;

  async run(): Promise<void> {
    const { flags, argv } = this.parse(ExtendRolePermissions);

    if (argv.length === 1) {
      this.error(
        `expected an account id followed by at least one role name\nUsage: ${this.config.bin} ${
          this.id || ''
        } [ACCOUNT_ID ROLE_NAME...]`,
        { exit: 1 },
      );
    }

    const [argAccountId, ...argRoleNames] = argv;

    if (argAccountId && !isAccountId(argAccountId)) {
      this.error(`${argAccountId} is not a 12-digit AWS account id`, { exit: 1 });
    }

    await this.setUp(flags, { 'Policy prefix': flags['policy-prefix'] || '-' });

    const accountId = argAccountId || (await getCallerAccountId());
    const roleNames =
      argRoleNames.length > 0
        ? argRoleNames
        : [await promptForValue('Role name', flags['default-role'])];

    const extender = new RolePermissionsExtender();
    const options = this.stepOptions(flags);

    const listr = new Listr<RolePermissionsContext, 'default' | 'silent'>(
      [
        {
          title: `${chalk.dim('create:')} RDS access policies in ${accountId}`,
          task: async (ctx: RolePermissionsContext, task: TaskReporter) => {
            ctx.arns = await extender.createPolicies(
              task,
              accountId,
              flags['policy-prefix'],
              options,
            );
          },
        },
        ...roleNames.map(roleName => ({
          title: `${chalk.dim('attach:')} ${roleName}`,
          task: async (ctx: RolePermissionsContext, task: TaskReporter) => {
            if (!ctx.arns) {
              throw new Error('RDS access policies were not created');
            }

            await extender.attachPolicies(task, roleName, ctx.arns, options);
          },
        })),
        ...roleNames.map(roleName => ({
          title: `${chalk.dim('verify:')} ${roleName}`,
          task: async (_ctx: RolePermissionsContext, task: TaskReporter) => {
            const policies = await extender.listAttachedPolicies(roleName);

            task.output = `attached: ${
              policies.map(policy => policy.PolicyName).join(', ') || 'none'
            }`;
          },
        })),
      ],
      this.listrOptions(flags, true),
    );

    await listr.run({});
    this.reportResults(listr.tasks, flags, 'steps');
  }
}
