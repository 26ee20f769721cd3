import chalk from 'chalk';
import { flags } from '@oclif/command';
import { Listr } from 'listr2';

import BaseCommand, { CommandContext } from '../../base-command';
import { parsePeeringCreations } from '../../config/onboarding-config';
import { TaskReporter } from '../../interfaces/task-reporter.interface';
import { PeeringConnectionRequester } from '../../network/peering-connection.requester';

export default class RequestPeering extends BaseCommand {
  static description = [
    'Requests VPC peering connections towards database accounts and, once they are accepted,',
    'routes the accepter CIDR and opens database ports on the ECS security group.',
  ].join('\n');

  static examples = [
    `$ db-access-setup peering:request peerings.json`,
    `$ db-access-setup peering:request peerings.json ${chalk.yellow('-m --poll-interval 5')}`,
  ];

  static flags = {
    ...BaseCommand.baseFlags,
    'audit-file': flags.string({
      char: 'a',
      default: 'peering-details.txt',
      description: 'Where to append a record of every created peering.',
    }),
    'poll-interval': flags.integer({
      default: 10,
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
    const { flags, argv } = this.parse(RequestPeering);
    const [configUri] = this.requireArgs(argv, ['config']);

    await this.setUp(flags, {
      'Config file': configUri,
      'Audit file': flags['audit-file'],
    });

    const creations = parsePeeringCreations(
      await this.readConfigFile(configUri),
      configUri,
    );

    if (creations.length === 0) {
      this.log(chalk.yellow(`no peerings found in ${configUri}`));
      return;
    }

    const requester = new PeeringConnectionRequester(
      this.createAuditLog(flags['audit-file']),
      {
        intervalMs: flags['poll-interval'] * 1000,
        maxAttempts: flags['max-attempts'],
      },
    );
    const options = this.stepOptions(flags);

    const listr = new Listr<CommandContext, 'default' | 'silent'>(
      creations.map(creation => ({
        title: `${chalk.dim('request:')} ${
          creation.peeringName || creation.accepterVpcId || chalk.italic('<unnamed>')
        }`,
        task: async (_ctx: CommandContext, task: TaskReporter) => {
          await requester.process(task, creation, options);
        },
      })),
      this.listrOptions(flags),
    );

    await listr.run({});
    this.reportResults(listr.tasks, flags, 'peerings');
  }
}
