import { describeError } from './errors.js';
import type { Logger } from './logger.js';
import { sleep as defaultSleep, type Sleep } from './utils.js';

export function progressBar(current: number, total: number, length = 50): string {
  const ratio = total > 0 ? Math.min(1, Math.max(0, current / total)) : 1;
  const done = Math.floor(length * ratio);
  return '█'.repeat(done) + '-'.repeat(length - done);
}

export function livenessFrame(current: number, total: number): string {
  return `🤖 Bot still alive for: [${progressBar(current, total)}] ${current}/${total} [seconds]`;
}

export interface LivenessTickerOptions {
  seconds: number;
  write: (chunk: string) => void;
  logger: Logger;
  sleep?: Sleep;
  tickMs?: number;
  signal?: AbortSignal;
}

/**
 * Redraws the liveness line once per tick for `seconds` ticks. Stops early on
 * abort or when the writer throws. Returns the number of frames drawn.
 */
export async function runLivenessTicker(options: LivenessTickerOptions): Promise<number> {
  const sleep = options.sleep ?? defaultSleep;
  const tickMs = options.tickMs ?? 1_000;
  let frames = 0;

  for (let i = 0; i <= options.seconds; i += 1) {
    if (options.signal?.aborted) {
      break;
    }
    try {
      options.write(`\r${livenessFrame(i, options.seconds)}`);
    } catch (error) {
      options.logger.warn('Liveness ticker stopped: terminal write failed', describeError(error));
      break;
    }
    frames += 1;
    if (i < options.seconds) {
      await sleep(tickMs, options.signal);
    }
  }

  if (frames > 0) {
    try {
      options.write('\n');
    } catch (error) {
      options.logger.warn('Liveness ticker could not finish its line', describeError(error));
    }
  }
  return frames;
}
