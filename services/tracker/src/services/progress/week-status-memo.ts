/**
 * Memoized week status
 * Recomputing on every calendar render is wasteful; identical inputs within a
 * minute of each other reuse the previous result.
 */

import logger from '../../logger';
import { computeWeekStatuses } from './week-status';
import type { WeekStatusInput, WeekStatuses } from './week-status';

export const WEEK_STATUS_CACHE_SIZE = 10;
export const NOW_TOLERANCE_MS = 60 * 1000;

interface CacheEntry {
  now: number;
  statuses: WeekStatuses;
}

// Insertion order doubles as recency: a hit is deleted and re-inserted at the end
const cache = new Map<string, CacheEntry>();

/**
 * Structural key over everything except `now`
 */
function cacheKey(input: WeekStatusInput): string {
  return JSON.stringify([
    input.weekStart.getTime(),
    input.medicationSchedules,
    input.fluidSchedule,
    Object.entries(input.summaries).sort(([a], [b]) => a.localeCompare(b)),
    input.trackingStartDate ? input.trackingStartDate.getTime() : null,
  ]);
}

export function computeWeekStatusesMemoized(input: WeekStatusInput): WeekStatuses {
  const key = cacheKey(input);
  const now = input.now.getTime();
  const hit = cache.get(key);

  cache.delete(key);
  if (hit && Math.abs(now - hit.now) < NOW_TOLERANCE_MS) {
    cache.set(key, hit);
    return hit.statuses;
  }

  const statuses = computeWeekStatuses(input);
  cache.set(key, { now, statuses });

  if (cache.size > WEEK_STATUS_CACHE_SIZE) {
    const oldest = cache.keys().next();
    if (!oldest.done) {
      cache.delete(oldest.value);
      logger.debug({ size: cache.size }, 'Evicted week status cache entry');
    }
  }

  return statuses;
}

export function clearWeekStatusCache(): void {
  cache.clear();
}

export function weekStatusCacheSize(): number {
  return cache.size;
}
