import chalk from 'chalk';
import figures from 'figures';
import { Command, flags } from '@oclif/command';

import { AuditLog } from './audit/audit-log';
import { describeError } from './aws-errors';
import {
  AwsSession,
  configureAWS,
  describeCredentialSource,
} from './configure-aws';
import { StepOptionsInterface } from './interfaces/step-options.interface';
import { StorageResolver } from './storage/storage.resolver';

export type CommonFlags = {
  region: string;
  profile: string;
  'dry-run': boolean;
  'only-summary': boolean;
};

export type CommandContext = Record<string, unknown>;

/** The part of a listr2 task the summary reads. */
export interface SummaryTask {
  title?: string;
  output?: string;
  message: { error?: string; skip?: string };
  subtasks?: SummaryTask[];
  isSkipped(): boolean;
  hasFailed(): boolean;
}

export default abstract class BaseCommand extends Command {
  static baseFlags = {
    help: flags.help({ char: 'h' }),
    region: flags.string({ char: 'r', default: 'eu-central-1' }),
    profile: flags.string({ char: 'p', default: 'default' }),
    'dry-run': flags.boolean({
      char: 'd',
      default: false,
      description: 'Only list actions and do not actually execute them.',
    }),
    'only-summary': flags.boolean({
      char: 'm',
      default: false,
      description:
        'Do not render live progress. Only print final summary in a clean format.',
    }),
  };

  private storageResolver?: StorageResolver;

  private readonly abortController = new AbortController();

  // The first Ctrl+C lets the running step stop at its next check and skips
  // the entries that have not started. A second one exits right away.
  private readonly onInterrupt = (): void => {
    if (this.abortController.signal.aborted) {
      process.exit(130);
    }

    this.consoleWriteLine(
      chalk.yellow(`\n${figures.warning} interrupted, stopping...`),
    );
    this.abortController.abort();
  };

  /**
   * Resolves credentials, prints the banner and starts listening for Ctrl+C.
   * Storage is only resolved afterwards so S3 clients see the credentials.
   */
  protected async setUp(
    commonFlags: CommonFlags,
    details: Record<string, string> = {},
  ): Promise<AwsSession> {
    const session = await configureAWS(
      commonFlags.profile,
      commonFlags.region,
    );

    this.printBanner(session, commonFlags, details);
    process.on('SIGINT', this.onInterrupt);

    return session;
  }

  protected printBanner(
    session: AwsSession,
    commonFlags: CommonFlags,
    details: Record<string, string>,
  ): void {
    const awsRegion = session.config.region || commonFlags.region;
    const extra = Object.entries(details)
      .map(([label, value]) => `  ${label}: ${chalk.green(value)}\n`)
      .join('');

    this.log(`
DB Access Setup
---------------
  Action: ${chalk.green(this.id || this.constructor.name)}
  AWS region: ${chalk.green(awsRegion)}
  AWS credentials: ${chalk.green(
    describeCredentialSource(session.credentialSource),
  )}
${extra}  Dry run: ${commonFlags['dry-run'] ? chalk.green('yes') : chalk.yellow('no')}
`);

    if (commonFlags['only-summary']) {
      this.consoleWriteLine(
        `${chalk.green(
          figures.pointer,
        )} running in the background, summary will be printed at the end...`,
      );
      this.consoleWriteLine();
    }
  }

  protected stepOptions(commonFlags: CommonFlags): StepOptionsInterface {
    return {
      dryRun: commonFlags['dry-run'],
      signal: this.abortController.signal,
    };
  }

  protected listrOptions(commonFlags: CommonFlags, exitOnError = false) {
    return {
      renderer: commonFlags['only-summary']
        ? ('silent' as const)
        : ('default' as const),
      concurrent: false,
      exitOnError,
      // Ctrl+C is handled by onInterrupt
      registerSignalListeners: false,
    };
  }

  protected readConfigFile(uri: string): Promise<string> {
    return this.getStorageResolver().read(uri);
  }

  protected createAuditLog(uri: string): AuditLog {
    return this.getStorageResolver().openAuditLog(uri);
  }

  /**
   * Positional arguments are checked here rather than by the parser so a
   * wrong count gets the usage line and exit code 1.
   */
  protected requireArgs(argv: string[], names: string[]): string[] {
    if (argv.length !== names.length) {
      this.error(
        `expected ${names.length} argument(s), got ${
          argv.length
        }\nUsage: ${this.config.bin} ${this.id || ''} ${names
          .map(name => name.toUpperCase())
          .join(' ')}`,
        { exit: 1 },
      );
    }

    return argv;
  }

  /**
   * Prints the summary and fails the command when any entry failed. The
   * remaining entries have already run by then.
   */
  protected reportResults(
    tasks: SummaryTask[],
    commonFlags: CommonFlags,
    noun: string,
  ): void {
    this.renderSummary(tasks);

    const errors = this.collectErrors(tasks);

    if (errors.length > 0) {
      if (errors.length < tasks.length) {
        this.log(
          `\n${chalk.yellow(figures.tick)} partially finished, with ${chalk.red(
            `${errors.length} failed ${noun} out of ${tasks.length}`,
          )}.`,
        );
        throw new Error('PartialFailure');
      }

      this.log(`\n${chalk.yellow(figures.cross)} All ${tasks.length} ${noun} failed.`);
      throw new Error('Failure');
    }

    if (commonFlags['dry-run']) {
      this.log(`\n${chalk.yellow(` ${figures.warning} skipped changes due to dry-run.`)}`);
    } else {
      this.log(`\n ${chalk.green(figures.tick)} done.`);
    }
  }

  protected collectErrors(tasks: SummaryTask[]): string[] {
    const errors: string[] = [];

    for (const task of tasks) {
      const nested =
        task.subtasks && task.subtasks.length > 0
          ? this.collectErrors(task.subtasks)
          : [];

      if (task.hasFailed()) {
        nested.unshift(task.message.error || task.title || 'unknown error');
      }

      if (nested.length > 0) {
        errors.push(nested.join(' '));
      }
    }

    return errors;
  }

  protected renderSummary(tasks: SummaryTask[], level = 0): void {
    for (const task of tasks) {
      this.consoleWriteLine(
        `${' '.repeat(level)}${
          task.isSkipped() || task.hasFailed()
            ? chalk.yellow(level === 0 ? figures.circleDouble : figures.arrowDown)
            : chalk.green(level === 0 ? figures.circleDouble : figures.tick)
        } ${task.title || ''}`,
      );

      if (task.output) {
        this.consoleWriteLine(`${' '.repeat(level)}${chalk.dim(task.output)}`);
      }

      if (task.message.error) {
        this.consoleWriteLine(
          `${' '.repeat(level)} ${chalk.red(
            `${figures.cross} ${task.message.error}`,
          )}`,
        );
      }

      if (task.message.skip) {
        this.consoleWriteLine(
          `${' '.repeat(level)} ${chalk.dim(
            `${figures.arrowDown} ${task.message.skip}`,
          )}`,
        );
      }

      if (task.subtasks) {
        this.renderSummary(task.subtasks, level + 1);
      }

      if (level === 0) {
        this.consoleWriteLine();
      }
    }
  }

  protected consoleWriteLine(message?: string): void {
    process.stdout.write(`${message || ''}\n`);
  }

  protected async catch(error: Error): Promise<void> {
    // Usage errors and exits raised through this.error() carry their own
    // rendering.
    if (!('oclif' in error)) {
      this.consoleWriteLine(
        chalk.red(
          `${figures.cross} ${this.id || this.constructor.name} failed: ${describeError(
            error,
          )}`,
        ),
      );
    }

    throw error;
  }

  protected async finally(error: Error | undefined): Promise<void> {
    process.removeListener('SIGINT', this.onInterrupt);
    await super.finally(error);
  }

  private getStorageResolver(): StorageResolver {
    if (!this.storageResolver) {
      this.storageResolver = StorageResolver.initialize();
    }

    return this.storageResolver;
  }
}
