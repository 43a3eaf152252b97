/**
 * Format a duration as H:MM:SS, with a leading day count past 24 hours
 * (e.g. "0:01:05", "2 days, 3:00:00")
 */
export function formatDuration(totalSeconds: number): string {
  const seconds = Number.isFinite(totalSeconds) && totalSeconds > 0 ? Math.floor(totalSeconds) : 0;

  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;

  const clock = `${hours}:${pad(minutes)}:${pad(secs)}`;
  if (days === 0) {
    return clock;
  }
  return `${days} ${days === 1 ? 'day' : 'days'}, ${clock}`;
}

/**
 * Format bytes as megabytes with two decimals, as shown in download log lines
 */
export function formatMegabytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

/**
 * Integer percentage clamped to [0, 100]. A zero denominator reads as 100.
 */
export function toPercent(done: number, total: number): number {
  if (total <= 0) {
    return 100;
  }
  return Math.max(0, Math.min(100, Math.floor((done / total) * 100)));
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}
