/**
 * Time utilities for consistent date handling
 */

import { format, fromUnixTime, getUnixTime, isBefore, subDays } from 'date-fns';

export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function getRunId(date: Date, hash: string): string {
  return `${formatDate(date)}__${hash.substring(0, 8)}`;
}

/**
 * An entry is expired once its age is strictly greater than its TTL.
 */
export function isCacheExpired(
  cachedAt: Date,
  ttlSeconds: number,
  now: Date = new Date()
): boolean {
  const expiresAt = new Date(cachedAt.getTime() + ttlSeconds * 1000);
  return isBefore(expiresAt, now);
}

export function historyRange(
  days: number,
  now: Date = new Date()
): { from: number; to: number } {
  return {
    from: getUnixTime(subDays(now, days)),
    to: getUnixTime(now),
  };
}

export function unixToDate(seconds: number): string {
  return formatDate(fromUnixTime(seconds));
}
