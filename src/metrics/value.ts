/**
 * Human-readable numbers and durations for table cells.
 */

const SUFFIXES = ['', 'K', 'M', 'G', 'T'];

/**
 * Abbreviate a number with a K/M/G/T suffix, rounded to the nearest integer.
 * A value that rounds up to 1000 of one unit is shown as 1 of the next
 * (999 500 000 000 → "1T").
 */
export function formatValue(value: number): string {
  const sign = value < 0 ? '-' : '';
  let scaled = Math.abs(value);
  let step = 0;

  while (step < SUFFIXES.length - 1 && scaled >= 1000) {
    scaled /= 1000;
    step++;
  }

  let rounded = Math.round(scaled);
  if (rounded >= 1000 && step < SUFFIXES.length - 1) {
    rounded = Math.round(rounded / 1000);
    step++;
  }

  return `${sign}${rounded}${SUFFIXES[step]}`;
}

export function formatOptionalValue(value: number | undefined): string | undefined {
  return value === undefined ? undefined : formatValue(value);
}

/** "current / total" pair; a missing side shows as "-" */
export function formatPair(left: number | undefined, right: number | undefined): string | undefined {
  if (left === undefined && right === undefined) return undefined;
  return `${formatOptionalValue(left) ?? '-'} / ${formatOptionalValue(right) ?? '-'}`;
}

/** Seconds as "H:MM:SS", with a "N day(s), " prefix past 24 hours */
export function formatDuration(seconds: number | undefined): string | undefined {
  if (seconds === undefined) return undefined;

  const sign = seconds < 0 ? '-' : '';
  let rest = Math.round(Math.abs(seconds));
  const days = Math.floor(rest / 86_400);
  rest -= days * 86_400;
  const hours = Math.floor(rest / 3600);
  rest -= hours * 3600;
  const minutes = Math.floor(rest / 60);
  const secs = rest - minutes * 60;

  const clock = `${hours}:${String(minutes).padStart(2, '0')}:${String(secs).padStart(2, '0')}`;
  if (days === 0) return `${sign}${clock}`;
  return `${sign}${days} ${days === 1 ? 'day' : 'days'}, ${clock}`;
}
