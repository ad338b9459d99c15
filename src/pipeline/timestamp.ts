// Float noise such as 0.29 * 100 = 28.999999999999996 must not cost a centisecond.
const CENTI_EPSILON = 1e-7;

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * `MM:SS.cc`, or `HH:MM:SS.cc` from one hour on. Centiseconds are truncated.
 */
export function formatTimestamp(seconds: number): string {
  const whole = Math.floor(seconds);
  const hours = Math.floor(whole / 3600);
  const minutes = Math.floor((whole % 3600) / 60);
  const secs = whole % 60;
  const centis = Math.min(99, Math.floor((seconds - whole) * 100 + CENTI_EPSILON));

  const clock = `${pad2(minutes)}:${pad2(secs)}.${pad2(centis)}`;
  return hours > 0 ? `${pad2(hours)}:${clock}` : clock;
}

/** `start - end` label used by the search output. */
export function formatRange(start: number, end: number): string {
  return `${formatTimestamp(start)} - ${formatTimestamp(end)}`;
}
