import chalk from 'chalk';
import figures from 'figures';
import { flags } from '@oclif/command';
import { Listr } from 'listr2';

import BaseCommand from '../../base-command';
import { TaskReporter } from '../../interfaces/task-reporter.interface';
import { isAccountId } from '../../iam/caller-identity';
import { serializePolicyDocument } from '../../iam/policy-document';
import { PollOutcome } from '../../poll';
import {
  DEFAULT_PERMISSION_SET_NAME,
  DEFAULT_SESSION_DURATION,
  PermissionSetProvisioner,
  ProvisioningState,
  ecsSsmAccessPolicy,
} from '../../sso/permission-set.provisioner';

type ProvisionContext = {
  permissionSetArn?: string;
  requestId?: string;
  outcome?: PollOutcome<ProvisioningState>;
};

export default class ProvisionPermissionSet extends BaseCommand {
  static description = [
    'Creates an IAM Identity Center permission set that allows SSM sessions into ECS tasks,',
    'provisions it to an account and waits until provisioning finishes.',
  ].join('\n');

  static examples = [
    `$ db-access-setup sso:provision-permission-set arn:aws:sso:::instance/ssoins-0123456789abcdef 123456789012`,
    `$ db-access-setup sso:provision-permission-set arn:aws:sso:::instance/ssoins-0123456789abcdef 123456789012 ${chalk.yellow(
      '--name SupportAccess --session-duration PT4H',
    )}`,
  ];

  static flags = {
    ...BaseCommand.baseFlags,
    name: flags.string({
      default: DEFAULT_PERMISSION_SET_NAME,
      description: 'Name of the permission set.',
    }),
    description: flags.string({
      default: 'Custom permission set for ECS and SSM access',
      description: 'Description of the permission set.',
    }),
    'session-duration': flags.string({
      default: DEFAULT_SESSION_DURATION,
      description: 'ISO-8601 session length.',
    }),
    'poll-interval': flags.integer({
      default: 5,
      description: 'Seconds to wait between provisioning status checks.',
    }),
    'max-attempts': flags.integer({
      default: 120,
      description: 'Status checks before giving up, 0 waits indefinitely.',
    }),
  };

  static args = [
    { name: 'instanceArn', description: 'ARN of the IAM Identity Center instance.' },
    { name: 'accountId', description: 'Account to provision the permission set to.' },
  ];

  static strict = false;

  async run(): Promise<void> {
    const { flags, argv } = this.parse(ProvisionPermissionSet);
    const [instanceArn, accountId] = this.requireArgs(argv, [
      'instance_arn',
      'account_id',
    ]);

    if (!isAccountId(accountId)) {
      this.error(`${accountId} is not a 12-digit AWS account id`, { exit: 1 });
    }

    await this.setUp(flags, {
      'Permission set': flags.name,
      Account: accountId,
    });

    const policy = ecsSsmAccessPolicy();

    if (flags['dry-run']) {
      this.log(
        `${chalk.yellow(figures.warning)} would create ${chalk.bold(
          flags.name,
        )} (${flags['session-duration']}) with inline policy:\n${serializePolicyDocument(
          policy,
        )}\nand provision it to ${accountId}.`,
      );
      return;
    }

    const provisioner = new PermissionSetProvisioner();
    const { signal } = this.stepOptions(flags);
    const ctx: ProvisionContext = {};

    const listr = new Listr<ProvisionContext, 'default' | 'silent'>(
      [
        {
          title: `${chalk.dim('create:')} ${flags.name}`,
          task: async (taskCtx: ProvisionContext, task: TaskReporter) => {
            taskCtx.permissionSetArn = await provisioner.create(task, {
              instanceArn,
              name: flags.name,
              description: flags.description,
              sessionDuration: flags['session-duration'],
            });
          },
        },
        {
          title: `${chalk.dim('policy:')} inline ECS and SSM access`,
          task: async (taskCtx: ProvisionContext, task: TaskReporter) => {
            await provisioner.putInlinePolicy(
              task,
              instanceArn,
              this.requirePermissionSetArn(taskCtx),
              policy,
            );
          },
        },
        {
          title: `${chalk.dim('provision:')} ${accountId}`,
          task: async (taskCtx: ProvisionContext, task: TaskReporter) => {
            taskCtx.requestId = await provisioner.provision(
              task,
              instanceArn,
              this.requirePermissionSetArn(taskCtx),
              accountId,
            );
          },
        },
        {
          title: `${chalk.dim('wait:')} provisioning status`,
          task: async (taskCtx: ProvisionContext, task: TaskReporter) => {
            if (!taskCtx.requestId) {
              throw new Error('Permission set was not provisioned');
            }

            taskCtx.outcome = await provisioner.waitForProvisioning(
              task,
              instanceArn,
              taskCtx.requestId,
              {
                intervalMs: flags['poll-interval'] * 1000,
                maxAttempts:
                  flags['max-attempts'] > 0 ? flags['max-attempts'] : undefined,
                signal,
              },
            );
            task.output = `${taskCtx.outcome.value?.status || 'no status'} after ${
              taskCtx.outcome.attempts
            } check(s)`;
          },
        },
      ],
      this.listrOptions(flags, true),
    );

    await listr.run(ctx);
    this.renderSummary(listr.tasks);

    const { outcome } = ctx;
    const permissionSetArn = this.requirePermissionSetArn(ctx);

    if (!outcome || !ctx.requestId) {
      this.error('provisioning did not report a status', { exit: 1 });
    }

    if (outcome.state === 'failed') {
      const detail = await provisioner.getProvisioningStatus(
        instanceArn,
        ctx.requestId,
      );

      this.log(
        `${chalk.red(figures.cross)} provisioning failed: ${
          detail.failureReason || detail.status
        }`,
      );
      this.error(`provisioning of ${permissionSetArn} failed`, { exit: 1 });
    }

    if (outcome.state === 'timed-out') {
      this.error(
        `provisioning of ${permissionSetArn} did not finish after ${outcome.attempts} checks`,
        { exit: 1 },
      );
    }

    const permissionSet = await provisioner.describe(
      instanceArn,
      permissionSetArn,
    );

    this.log(
      `\n ${chalk.green(figures.tick)} provisioned ${chalk.bold(
        permissionSet.Name || flags.name,
      )} to ${accountId}`,
    );
    this.log(`  ARN: ${permissionSet.PermissionSetArn || permissionSetArn}`);
    this.log(`  Session duration: ${permissionSet.SessionDuration || '-'}`);
    if (permissionSet.Description) {
      this.log(`  Description: ${permissionSet.Description}`);
    }
  }

  private requirePermissionSetArn(ctx: ProvisionContext): string {
    if (!ctx.permissionSetArn) {
      throw new Error('Permission set was not created');
    }

    return ctx.permissionSetArn;
  }
}
