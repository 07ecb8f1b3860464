import type { ColumnQuality, QualityRating } from '@schemalens/core';

/** Average null percentage below this (and uniqueness above EXCELLENT_MIN_UNIQUENESS) rates Excellent */
export const EXCELLENT_MAX_NULL_PERCENT = 5;
export const EXCELLENT_MIN_UNIQUENESS = 0.9;
/** Average null percentage above this, or uniqueness below ATTENTION_MIN_UNIQUENESS, needs attention */
export const ATTENTION_MAX_NULL_PERCENT = 30;
export const ATTENTION_MIN_UNIQUENESS = 0.3;

export function averageOf(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Coarse table rating from the column averages. A table without columns
 * has nothing to vouch for it and needs attention.
 */
export function rateTableQuality(columns: readonly ColumnQuality[]): QualityRating {
  if (columns.length === 0) {
    return 'NeedsAttention';
  }

  const avgNull = averageOf(columns.map((c) => c.nullPercentage));
  const avgUniqueness = averageOf(columns.map((c) => c.uniquenessRatio));

  if (avgNull < EXCELLENT_MAX_NULL_PERCENT && avgUniqueness > EXCELLENT_MIN_UNIQUENESS) {
    return 'Excellent';
  }
  if (avgNull > ATTENTION_MAX_NULL_PERCENT || avgUniqueness < ATTENTION_MIN_UNIQUENESS) {
    return 'NeedsAttention';
  }
  return 'Good';
}
