/**
 * Time utilities for consistent date handling
 */

import { format, isBefore } from 'date-fns';

export function formatTimestamp(epochMs: number): string {
  return format(new Date(epochMs), 'yyyy-MM-dd HH:mm');
}

export function isCacheExpired(
  cachedAt: Date,
  ttlSeconds: number,
  now: Date = new Date()
): boolean {
  const expiresAt = new Date(cachedAt.getTime() + ttlSeconds * 1000);
  return !isBefore(now, expiresAt);
}

export function hoursToSeconds(hours: number): number {
  return hours * 60 * 60;
}
