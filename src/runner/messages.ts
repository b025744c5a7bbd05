import { escapeHtml } from '../utils.js';

const RULE = '='.repeat(30);

export interface JobInfo {
  id: string;
  name: string;
}

/** Scheduler metadata, present only when a SLURM job id and a real job name are set. */
export function jobInfoFromEnv(env: NodeJS.ProcessEnv): JobInfo | null {
  const id = env.SLURM_JOB_ID?.trim();
  const name = env.SLURM_JOB_NAME?.trim() || 'unknown';
  if (!id || name === 'unknown') {
    return null;
  }
  return { id, name };
}

function jobBlock(job: JobInfo | null): string {
  if (!job) {
    return '';
  }
  return `\n${RULE}\nJob ID: <code>${escapeHtml(job.id)}</code>\nJob Name: <code>${escapeHtml(job.name)}</code>`;
}

export function startedMessage(command: string, device: string, job: JobInfo | null): string {
  return `🚀 Command <code>${escapeHtml(command)}</code> started on ${escapeHtml(device)}! 🚀${jobBlock(job)}`;
}

export function succeededMessage(command: string, device: string, elapsed: string, job: JobInfo | null): string {
  return (
    `✅ Command <code>${escapeHtml(command)}</code> succeeded on <code>${escapeHtml(device)}</code>!\n` +
    `${RULE}\nRuntime ${elapsed} ✅` +
    jobBlock(job)
  );
}

export function failedMessage(args: {
  command: string;
  device: string;
  elapsed: string;
  errorSummary: string;
  stderrLogPath: string | null;
  job: JobInfo | null;
}): string {
  let text =
    `❌ Command <code>${escapeHtml(args.command)}</code> failed on <code>${escapeHtml(args.device)}</code> after ${args.elapsed} ❌\n\n` +
    `<b>Error:</b> <code>${escapeHtml(args.errorSummary)}</code>\n\n`;
  if (args.stderrLogPath) {
    text += `Full log in: <code>${escapeHtml(args.stderrLogPath)}</code>`;
  }
  return text + jobBlock(args.job);
}
