import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { performance } from 'node:perf_hooks';
import { describeError } from '../errors.js';
import type { NotificationRecord, NotificationStatus } from '../history/types.js';
import type { Logger } from '../logger.js';
import type { NotificationDispatcher } from '../notifications/dispatcher.js';
import { formatDuration, runDirectoryKeys } from '../utils.js';
import { extractMainError } from './errorSummary.js';
import type { CommandLauncher, LaunchResult } from './launcher.js';
import { failedMessage, jobInfoFromEnv, startedMessage, succeededMessage } from './messages.js';

export type RunPhase = 'pending' | 'running' | 'completed';

export interface RunLogFiles {
  directory: string;
  stdout: string;
  stderr: string;
}

export interface RunOutcome {
  status: Extract<NotificationStatus, 'success' | 'failed'>;
  exitCode: number | null;
  elapsedSeconds: number;
  elapsed: string;
  errorSummary: string | null;
  logFiles: RunLogFiles | null;
  /** Text of the terminal notification, whether or not it was delivered. */
  message: string;
  startNotification: NotificationRecord | null;
  finishNotification: NotificationRecord | null;
}

export interface CommandRunnerDeps {
  dispatcher: Pick<NotificationDispatcher, 'send'>;
  launcher: CommandLauncher;
  logger: Logger;
  deviceName: string;
  /** Directory that receives `<date>/<time>/std{out,err}.log`; null disables log files. */
  logRoot: string | null;
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
  clock?: () => number;
}

export class CommandRunner {
  private currentPhase: RunPhase = 'pending';

  constructor(private readonly deps: CommandRunnerDeps) {}

  get phase(): RunPhase {
    return this.currentPhase;
  }

  async run(command: readonly string[]): Promise<RunOutcome> {
    if (this.currentPhase !== 'pending') {
      throw new Error(`CommandRunner already ${this.currentPhase}`);
    }
    this.currentPhase = 'running';

    const commandLine = command.join(' ');
    const job = jobInfoFromEnv(this.deps.env ?? process.env);
    const clock = this.deps.clock ?? (() => performance.now());

    const startNotification = await this.notify(command, startedMessage(commandLine, this.deps.deviceName, job), 'started');

    const startedAt = clock();
    const launched = await this.deps.launcher(command);
    const elapsedSeconds = (clock() - startedAt) / 1000;
    const elapsed = formatDuration(elapsedSeconds);

    const stdout = launched.stdout.trim();
    const stderr = combineStderr(launched);
    const logFiles = await this.writeLogs(commandLine, stdout, stderr);

    const succeeded = launched.launchError === null && launched.exitCode === 0;
    const errorSummary = succeeded ? null : extractMainError(stderr);
    const message = succeeded
      ? succeededMessage(commandLine, this.deps.deviceName, elapsed, job)
      : failedMessage({
          command: commandLine,
          device: this.deps.deviceName,
          elapsed,
          errorSummary: errorSummary ?? '',
          stderrLogPath: logFiles?.stderr ?? null,
          job,
        });

    this.deps.logger.info(
      `Command finished: ${succeeded ? 'success' : 'failed'} (exit=${launched.exitCode ?? 'null'}${
        launched.signal === null ? '' : `, signal=${launched.signal}`
      }, elapsed=${elapsed})`,
    );

    const status = succeeded ? 'success' : 'failed';
    const finishNotification = await this.notify(command, message, status);
    this.currentPhase = 'completed';

    return {
      status,
      exitCode: launched.exitCode,
      elapsedSeconds,
      elapsed,
      errorSummary,
      logFiles,
      message,
      startNotification,
      finishNotification,
    };
  }

  private async notify(command: readonly string[], text: string, status: NotificationStatus): Promise<NotificationRecord | null> {
    try {
      return await this.deps.dispatcher.send({ text, command, status });
    } catch (error) {
      this.deps.logger.error(`Failed to deliver "${status}" notification; continuing`, describeError(error));
      return null;
    }
  }

  private async writeLogs(commandLine: string, stdout: string, stderr: string): Promise<RunLogFiles | null> {
    if (!this.deps.logRoot) {
      return null;
    }

    const { day, clock } = runDirectoryKeys((this.deps.now ?? (() => new Date()))());
    const directory = join(this.deps.logRoot, day, clock);
    const files: RunLogFiles = {
      directory,
      stdout: join(directory, 'stdout.log'),
      stderr: join(directory, 'stderr.log'),
    };

    try {
      await mkdir(directory, { recursive: true });
      await writeFile(files.stdout, `$ ${commandLine}\n\nSTDOUT:\n${stdout}\n`, 'utf8');
      await writeFile(files.stderr, `$ ${commandLine}\n\nSTDERR:\n${stderr}\n`, 'utf8');
    } catch (error) {
      this.deps.logger.error(`Failed to write run logs under ${directory}`, describeError(error));
      return null;
    }

    this.deps.logger.info(`Run logs written to ${directory}`);
    return files;
  }
}

function combineStderr(launched: LaunchResult): string {
  const stderr = launched.stderr.trim();
  if (!launched.launchError) {
    return stderr;
  }
  const launchLine = `LaunchError: ${launched.launchError.message}`;
  return stderr.length > 0 ? `${stderr}\n${launchLine}` : launchLine;
}
