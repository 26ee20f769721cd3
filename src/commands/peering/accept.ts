import chalk from 'chalk';
import { flags } from '@oclif/command';
import { Listr } from 'listr2';

import BaseCommand, { CommandContext } from '../../base-command';
import { parsePeeringRequests } from '../../config/onboarding-config';
import { TaskReporter } from '../../interfaces/task-reporter.interface';
import { PeeringConnectionAcceptor } from '../../network/peering-connection.acceptor';

export default class AcceptPeering extends BaseCommand {
  static description = [
    'Accepts VPC peering requests listed in a config file, waits for each connection to become active,',
    'routes the requester CIDR through it and opens MySQL and PostgreSQL ports on the RDS security groups.',
    `\nThe config file holds a ${chalk.bold('vpc_peerings')} list and can be a local path or an s3:// URI.`,
  ].join('\n');

  static examples = [
    `$ db-access-setup peering:accept peerings.json`,
    `$ db-access-setup peering:accept peerings.json ${chalk.yellow('--dry-run')}`,
    `$ db-access-setup peering:accept s3://my-bucket/peerings.json ${chalk.yellow(
      '--audit-file s3://my-bucket/accepter-details.txt',
    )}`,
  ];

  static flags = {
    ...BaseCommand.baseFlags,
    'audit-file': flags.string({
      char: 'a',
      default: 'accepter-details.txt',
      description: 'Where to append a record of every accepted peering.',
    }),
    'poll-interval': flags.integer({
      default: 30,
      description: 'Seconds to wait between peering status checks.',
    }),
    'max-attempts': flags.integer({
      default: 20,
      description: 'Status checks before giving up on a peering connection.',
    }),
  };

  static args = [{ name: 'config', description: 'JSON file with a "vpc_peerings" list.' }];

  static strict = false;

  async run(): Promise<void> {
    const { flags, argv } = this.parse(AcceptPeering);
    const [configUri] = this.requireArgs(argv, ['config']);

    await this.setUp(flags, {
      'Config file': configUri,
      'Audit file': flags['audit-file'],
    });

    const requests = parsePeeringRequests(
      await this.readConfigFile(configUri),
      configUri,
    );

    if (requests.length === 0) {
      this.log(chalk.yellow(`no peering requests found in ${configUri}`));
      return;
    }

    const acceptor = new PeeringConnectionAcceptor(
      this.createAuditLog(flags['audit-file']),
      {
        intervalMs: flags['poll-interval'] * 1000,
        maxAttempts: flags['max-attempts'],
      },
    );
    const options = this.stepOptions(flags);

    const listr = new Listr<CommandContext, 'default' | 'silent'>(
      requests.map(request => ({
        title: `${chalk.dim('accept:')} ${
          request.requesterPeeringId || chalk.italic('<no peering id>')
        }`,
        task: async (_ctx: CommandContext, task: TaskReporter) => {
          await acceptor.process(task, request, options);
        },
      })),
      this.listrOptions(flags),
    );

    await listr.run({});
    this.reportResults(listr.tasks, flags, 'peerings');
  }
}
