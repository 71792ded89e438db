const KIB = 1024;
const MIB = KIB * KIB;
const GIB = KIB * KIB * KIB;

export interface DurationParts {
  days: number;
  hours: number;
  minutes: number;
  seconds: number;
}

/**
 * Format a byte count with a binary unit. Pass `perSecond` to get a rate.
 *
 * Values are right-aligned so consecutive status lines keep the same width.
 */
export function formatBytes(size: number, perSecond = false): string {
  const suffix = perSecond ? '/s' : '';

  if (size >= GIB) {
    return `${(size / GIB).toFixed(1).padStart(5)} GiB${suffix}`;
  }
  if (size >= MIB) {
    return `${(size / MIB).toFixed(1).padStart(5)} MiB${suffix}`;
  }
  if (size >= KIB) {
    return `${(size / KIB).toFixed(1).padStart(5)} KiB${suffix}`;
  }
  return `${size.toFixed(0).padStart(3)} B${suffix}`;
}

/**
 * Split whole seconds into days, hours, minutes and seconds.
 */
export function splitDuration(totalSeconds: number): DurationParts {
  const secs = Math.max(0, Math.floor(totalSeconds));
  const mins = Math.floor(secs / 60);
  const hours = Math.floor(mins / 60);

  return {
    days: Math.floor(hours / 24),
    hours: hours % 24,
    minutes: mins % 60,
    seconds: secs % 60,
  };
}

/**
 * Format a duration, leaving out leading zero components.
 */
export function formatDuration(totalSeconds: number): string {
  const { days, hours, minutes, seconds } = splitDuration(totalSeconds);
  const two = (n: number): string => String(n).padStart(2);

  if (days > 0) {
    return `${String(days).padStart(3)}d ${two(hours)}h ${two(minutes)}m ${two(seconds)}s`;
  }
  if (hours > 0) {
    return `${two(hours)}h ${two(minutes)}m ${two(seconds)}s`;
  }
  if (minutes > 0) {
    return `${two(minutes)}m ${two(seconds)}s`;
  }
  return `${two(seconds)}s`;
}
