import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';

dayjs.extend(utc);

export function toIso(d: Date | null | undefined): string | null {
  if (!d) return null;
  return dayjs.utc(d).toISOString();
}

export function addSeconds(base: Date, seconds: number): Date {
  return dayjs(base).add(seconds, 'second').toDate();
}

/** Start of the retention window: anything updated before this is purgeable. */
export function retentionCutoff(now: Date, days: number): Date {
  return dayjs(now).subtract(days, 'day').toDate();
}

export function hoursAgo(now: Date, hours: number): Date {
  return dayjs(now).subtract(hours, 'hour').toDate();
}

export function elapsedMs(from: Date, to: Date): number {
  return dayjs(to).diff(dayjs(from), 'millisecond');
}

/**
 * Delay before the next webhook attempt once `attemptCount` attempts have
 * failed: base * 2^attemptCount, capped at `maxSeconds`.
 */
export function backoffSeconds(attemptCount: number, baseSeconds: number, maxSeconds: number): number {
  const exp = Math.min(attemptCount, 30);
  return Math.min(maxSeconds, baseSeconds * 2 ** exp);
}
