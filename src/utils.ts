import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export function ensureDirForFile(filePath: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
}

/** Resolves after `ms`, or early (without rejecting) once `signal` aborts. */
export const sleep: Sleep = (ms, signal) => {
  if (signal?.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};

/**
 * Cuts `value` to `keepChars` code points plus `...` when it is longer than
 * `maxChars` code points. Surrogate pairs are never split.
 */
export function elideCodePoints(value: string, maxChars: number, keepChars = maxChars): string {
  const chars = Array.from(value);
  return chars.length > maxChars ? `${chars.slice(0, keepChars).join('')}...` : value;
}

export function escapeHtml(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/** `DdHH:MM:SS.ss`, e.g. 65.25 s → `0d00:01:05.25`. */
export function formatDuration(totalSeconds: number): string {
  const safe = Math.max(0, totalSeconds);
  const centis = Math.round(safe * 100);
  const days = Math.floor(centis / 8_640_000);
  const hours = Math.floor((centis % 8_640_000) / 360_000);
  const minutes = Math.floor((centis % 360_000) / 6_000);
  const seconds = (centis % 6_000) / 100;
  const secondsText = seconds.toFixed(2).padStart(5, '0');
  return `${days}d${pad2(hours)}:${pad2(minutes)}:${secondsText}`;
}

/** Local date and time-of-day keys for a run directory: `YYYY-MM-DD`, `HH-MM-SS`. */
export function runDirectoryKeys(date: Date): { day: string; clock: string } {
  return {
    day: `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`,
    clock: `${pad2(date.getHours())}-${pad2(date.getMinutes())}-${pad2(date.getSeconds())}`,
  };
}
