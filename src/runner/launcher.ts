import { spawn } from 'node:child_process';

export interface LaunchResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  /** Set when the process could not be started at all (e.g. ENOENT). */
  launchError: Error | null;
}

export type CommandLauncher = (command: readonly string[]) => Promise<LaunchResult>;

/** Runs the command without a shell and collects both streams in full. */
export const spawnLauncher: CommandLauncher = (command) => {
  const [file, ...args] = command;
  if (!file) {
    return Promise.resolve({
      exitCode: null,
      signal: null,
      stdout: '',
      stderr: '',
      launchError: new Error('empty command'),
    });
  }

  return new Promise((resolve) => {
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;

    const child = spawn(file, args, {
      stdio: ['inherit', 'pipe', 'pipe'],
      env: process.env,
    });

    const finish = (result: Omit<LaunchResult, 'stdout' | 'stderr'>): void => {
      if (settled) {
        return;
      }
      settled = true;
      resolve({
        ...result,
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
      });
    };

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.on('error', (error) => {
      finish({ exitCode: null, signal: null, launchError: error });
    });

    child.on('close', (code, signal) => {
      finish({ exitCode: code, signal, launchError: null });
    });
  });
};
