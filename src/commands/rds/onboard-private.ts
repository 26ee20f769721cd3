import chalk from 'chalk';
import { flags } from '@oclif/command';
import { Listr } from 'listr2';

import BaseCommand, { CommandContext } from '../../base-command';
import { parsePrivateRdsConfigs } from '../../config/onboarding-config';
import { TaskReporter } from '../../interfaces/task-reporter.interface';
import { RdsSecurityGroupOnboarder } from '../../network/rds-security-group.onboarder';

export default class OnboardPrivateRds extends BaseCommand {
  static description =
    'Opens MySQL and PostgreSQL ports on private RDS security groups for the CIDR of an already peered VPC.';

  static examples = [
    `$ db-access-setup rds:onboard-private private-rds.json`,
    `$ db-access-setup rds:onboard-private private-rds.json ${chalk.yellow('--dry-run')}`,
  ];

  static flags = {
    ...BaseCommand.baseFlags,
    'audit-file': flags.string({
      char: 'a',
      default: 'private-rds-onboard-details.txt',
      description: 'Where to append a record of every updated config entry.',
    }),
  };

  static args = [
    { name: 'config', description: 'JSON file with a "private_rds_configs" list.' },
  ];

  static strict = false;

  async run(): Promise<void> {
    const { flags, argv } = this.parse(OnboardPrivateRds);
    const [configUri] = this.requireArgs(argv, ['config']);

    await this.setUp(flags, {
      'Config file': configUri,
      'Audit file': flags['audit-file'],
    });

    const configs = parsePrivateRdsConfigs(
      await this.readConfigFile(configUri),
      configUri,
    );

    if (configs.length === 0) {
      this.log(chalk.yellow(`no private RDS configs found in ${configUri}`));
      return;
    }

    const onboarder = new RdsSecurityGroupOnboarder(
      this.createAuditLog(flags['audit-file']),
    );
    const options = this.stepOptions(flags);

    const listr = new Listr<CommandContext, 'default' | 'silent'>(
      configs.map(config => ({
        title: `${chalk.dim('onboard:')} ${
          config.requesterCidr || chalk.italic('<no cidr>')
        }`,
        task: async (_ctx: CommandContext, task: TaskReporter) => {
          await onboarder.onboardPrivate(task, config, options);
        },
      })),
      this.listrOptions(flags),
    );

    await listr.run({});
    this.reportResults(listr.tasks, flags, 'configs');
  }
}
