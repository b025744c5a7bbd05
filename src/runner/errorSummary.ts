export const NO_STDERR_SUMMARY = 'Unknown error (no stderr output)';
export const UNKNOWN_ERROR_SUMMARY = 'Unknown error';
export const DEFAULT_SUMMARY_MAX_LENGTH = 200;

const CHAINED_MARKERS = ['During handling of the above exception', 'The above exception was the direct cause'];

// Optional distributed-rank prefix such as "[rank0]: ", then `SomethingError: message`.
const EXCEPTION_LINE = /^(?:\[rank\d+\]:\s*)?([A-Z][a-zA-Z0-9]*(?:Error|Exception|Interrupt)):\s*(.+)$/;

/**
 * One-line summary of a failed command's stderr. With chained tracebacks the
 * first exception (the original cause) wins; otherwise the last one does.
 */
export function extractMainError(stderr: string, maxLength = DEFAULT_SUMMARY_MAX_LENGTH): string {
  const trimmed = stderr.trim();
  if (trimmed.length === 0) {
    return NO_STDERR_SUMMARY;
  }

  const lines = trimmed.split(/\r?\n/);
  const chained = lines.some((line) => CHAINED_MARKERS.some((marker) => line.includes(marker)));

  const matches: string[] = [];
  for (const line of lines) {
    const match = EXCEPTION_LINE.exec(line.trim());
    if (match) {
      matches.push(`${match[1]}: ${match[2]}`);
    }
  }

  const summary = (chained ? matches[0] : matches[matches.length - 1]) ?? UNKNOWN_ERROR_SUMMARY;

  return summary.length > maxLength ? `${summary.slice(0, maxLength)}...` : summary;
}
