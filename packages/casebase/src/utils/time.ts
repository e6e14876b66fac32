/**
 * Time Utilities
 */

/**
 * Source of the current time. Injected so maintenance can be tested
 * against a fixed instant.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const MS_PER_DAY = 1000 * 60 * 60 * 24;

/**
 * Fractional days from `from` to `to` (never negative)
 */
export function daysBetween(from: string | Date, to: string | Date): number {
  const a = typeof from === 'string' ? new Date(from) : from;
  const b = typeof to === 'string' ? new Date(to) : to;
  return Math.max(0, (b.getTime() - a.getTime()) / MS_PER_DAY);
}

/**
 * Subtract days from a date
 */
export function subtractDays(date: Date, days: number): string {
  return new Date(date.getTime() - days * MS_PER_DAY).toISOString();
}

/**
 * Later of two ISO timestamps
 */
export function latest(a: string, b: string): string {
  return new Date(a).getTime() >= new Date(b).getTime() ? a : b;
}
