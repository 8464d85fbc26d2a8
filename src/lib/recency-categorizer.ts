import { AgeCategory } from '../types/enriched-model.js';
import { RECENT_DAYS, OLD_DAYS } from '../types/viewer-config.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface RecencyThresholds {
  recentDays: number; // age below this is 'recent'
  oldDays: number;    // age at or above this is 'old'
}

export const DEFAULT_RECENCY_THRESHOLDS: RecencyThresholds = {
  recentDays: RECENT_DAYS,
  oldDays: OLD_DAYS,
};

/**
 * Whole days elapsed between modifiedAt and now (floor).
 * Negative when modifiedAt is in the future.
 */
export function ageInDays(modifiedAt: Date, now: Date): number {
  return Math.floor((now.getTime() - modifiedAt.getTime()) / DAY_MS);
}

/**
 * Map an age to its bucket: [0, recentDays) recent, [recentDays, oldDays) moderate, [oldDays, ∞) old
 */
export function categorizeAgeDays(
  days: number,
  thresholds: RecencyThresholds = DEFAULT_RECENCY_THRESHOLDS
): AgeCategory {
  if (days < thresholds.recentDays) return 'recent';
  if (days < thresholds.oldDays) return 'moderate';
  return 'old';
}

export function categorizeAge(
  modifiedAt: Date,
  now: Date,
  thresholds: RecencyThresholds = DEFAULT_RECENCY_THRESHOLDS
): AgeCategory {
  return categorizeAgeDays(ageInDays(modifiedAt, now), thresholds);
}
