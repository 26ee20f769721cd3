import chalk from 'chalk';
import { flags } from '@oclif/command';
import { Listr } from 'listr2';

import BaseCommand, { CommandContext } from '../../base-command';
import { parsePublicRdsConfigs } from '../../config/onboarding-config';
import { TaskReporter } from '../../interfaces/task-reporter.interface';
import { RdsSecurityGroupOnboarder } from '../../network/rds-security-group.onboarder';

export default class OnboardPublicRds extends BaseCommand {
  static description =
    'Opens MySQL and PostgreSQL ports on public RDS security groups for the CIDR and NAT gateway address of an already peered VPC.';

  static examples = [
    `$ db-access-setup rds:onboard-public public-rds.json`,
    `$ db-access-setup rds:onboard-public public-rds.json ${chalk.yellow('--dry-run')}`,
  ];

  static flags = {
    ...BaseCommand.baseFlags,
    'audit-file': flags.string({
      char: 'a',
      default: 'public-rds-onboard-details.txt',
      description: 'Where to append a record of every updated config entry.',
    }),
  };

  static args = [
    { name: 'config', description: 'JSON file with a "public_rds_configs" list.' },
  ];

  static strict = false;

  async run(): Promise<void> {
    const { flags, argv } = this.parse(OnboardPublicRds);
    const [configUri] = this.requireArgs(argv, ['config']);

    await this.setUp(flags, {
      'Config file': configUri,
      'Audit file': flags['audit-file'],
    });

    const configs = parsePublicRdsConfigs(
      await this.readConfigFile(configUri),
      configUri,
    );

    if (configs.length === 0) {
      this.log(chalk.yellow(`no public RDS configs found in ${configUri}`));
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
          await onboarder.onboardPublic(task, config, options);
        },
      })),
      this.listrOptions(flags),
    );

    await listr.run({});
    this.reportResults(listr.tasks, flags, 'configs');
  }
}
