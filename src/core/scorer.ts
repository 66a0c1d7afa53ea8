/**
 * Compatibility Scorer
 *
 * Aggregates change lists into a compatibility score in [0, 1] and tracks
 * that score across a sequence of schema versions.
 */

import {
  CompatibilityRating,
  DiffOptions,
  EvolutionSummary,
  SchemaChange,
  SchemaModel,
  VersionMetrics,
} from './types';
import { InsufficientSnapshotsError } from './errors';
import { diffSchemaModels } from './differ';

export const RATING_MESSAGES: Record<CompatibilityRating, string> = {
  excellent: 'Excellent compatibility - minimal client impact expected',
  good: 'Good compatibility - some client updates may be needed',
  moderate: 'Moderate compatibility - significant client updates required',
  poor: 'Poor compatibility - major breaking changes detected',
};

/**
 * `1` for no changes, otherwise the share of changes that are not breaking.
 */
export function calculateCompatibilityScore(changes: readonly SchemaChange[]): number {
  if (changes.length === 0) return 1;
  const breaking = changes.filter((c) => c.isBreaking).length;
  return 1 - breaking / changes.length;
}

export function getRecommendation(score: number): CompatibilityRating {
  if (score >= 0.9) return 'excellent';
  if (score >= 0.7) return 'good';
  if (score >= 0.5) return 'moderate';
  return 'poor';
}

/**
 * Advice for the schema owner, based on which kinds of change are present.
 */
export function migrationSuggestions(changes: readonly SchemaChange[]): string[] {
  const suggestions: string[] = [];

  if (changes.some((c) => c.kind === 'field_removed')) {
    suggestions.push(
      'Consider using field deprecation before removal to give clients time to adapt'
    );
  }
  if (changes.some((c) => c.kind === 'type_removed')) {
    suggestions.push('Ensure all client applications are updated before removing types');
  }
  if (changes.some((c) => c.kind === 'enum_value_removed')) {
    suggestions.push('Deprecate enum values and wait for clients to stop sending them before removal');
  }
  if (changes.some((c) => c.kind === 'field_type_changed' && c.isBreaking)) {
    suggestions.push(
      'For breaking type changes, consider adding new fields alongside old ones temporarily'
    );
  }

  return suggestions;
}

// ─── Evolution Tracking ─────────────────────────────────────────────────────

export function versionMetrics(changes: readonly SchemaChange[], index: number): VersionMetrics {
  const breakingCount = changes.filter((c) => c.isBreaking).length;
  return {
    index,
    breakingCount,
    nonBreakingCount: changes.length - breakingCount,
    totalCount: changes.length,
    score: calculateCompatibilityScore(changes),
  };
}

/**
 * Diff each adjacent pair of snapshots in order. The metrics for the
 * transition from `snapshots[i - 1]` to `snapshots[i]` carry `index: i`.
 */
export function trackEvolution(
  snapshots: readonly SchemaModel[],
  options: DiffOptions = {}
): VersionMetrics[] {
  if (snapshots.length < 2) {
    throw new InsufficientSnapshotsError(snapshots.length);
  }

  const metrics: VersionMetrics[] = [];
  for (let i = 1; i < snapshots.length; i++) {
    const changes = diffSchemaModels(snapshots[i - 1], snapshots[i], options);
    metrics.push(versionMetrics(changes, i));
  }
  return metrics;
}

/**
 * Averages and the score trend from the first transition to the last.
 */
export function summarizeEvolution(metrics: readonly VersionMetrics[]): EvolutionSummary {
  if (metrics.length === 0) {
    return {
      transitions: 0,
      averageBreakingChanges: 0,
      averageScore: 1,
      trend: 'stable',
      trendDelta: 0,
    };
  }

  const total = (pick: (m: VersionMetrics) => number) =>
    metrics.reduce((sum, m) => sum + pick(m), 0);
  const trendDelta = metrics[metrics.length - 1].score - metrics[0].score;

  return {
    transitions: metrics.length,
    averageBreakingChanges: total((m) => m.breakingCount) / metrics.length,
    averageScore: total((m) => m.score) / metrics.length,
    trend: trendDelta > 0 ? 'improving' : trendDelta < 0 ? 'declining' : 'stable',
    trendDelta,
  };
}
