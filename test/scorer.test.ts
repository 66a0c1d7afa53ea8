/**
 * Tests for the Compatibility Scorer
 */

import {
  calculateCompatibilityScore,
  getRecommendation,
  migrationSuggestions,
  summarizeEvolution,
  trackEvolution,
  versionMetrics,
} from '../src/core/scorer';
import { InsufficientSnapshotsError } from '../src/core/errors';
import { ChangeKind, SchemaChange } from '../src/core/types';
import { enumType, field, model, objectType } from './helpers/introspection';

function change(kind: ChangeKind, isBreaking: boolean): SchemaChange {
  return {
    kind,
    severity: isBreaking ? 'critical' : 'minor',
    isBreaking,
    typeName: 'User',
    description: kind,
  };
}

const BREAKING = change('field_removed', true);
const SAFE = change('field_added', false);

describe('Compatibility Scorer', () => {
  describe('calculateCompatibilityScore', () => {
    test('is 1 when nothing changed', () => {
      expect(calculateCompatibilityScore([])).toBe(1);
    });

    test('is the share of non-breaking changes', () => {
      expect(calculateCompatibilityScore([BREAKING, SAFE, SAFE, SAFE])).toBe(0.75);
      expect(calculateCompatibilityScore([BREAKING, BREAKING])).toBe(0);
      expect(calculateCompatibilityScore([SAFE])).toBe(1);
    });

    test('fewer breaking changes in an equal-sized list score strictly higher', () => {
      for (let total = 1; total <= 6; total++) {
        for (let breaking = 1; breaking <= total; breaking++) {
          const worse = [
            ...Array<SchemaChange>(breaking).fill(BREAKING),
            ...Array<SchemaChange>(total - breaking).fill(SAFE),
          ];
          const better = [
            ...Array<SchemaChange>(breaking - 1).fill(BREAKING),
            ...Array<SchemaChange>(total - breaking + 1).fill(SAFE),
          ];
          expect(calculateCompatibilityScore(better)).toBeGreaterThan(
            calculateCompatibilityScore(worse)
          );
        }
      }
    });
  });

  test('getRecommendation uses inclusive lower bounds', () => {
    expect(getRecommendation(1)).toBe('excellent');
    expect(getRecommendation(0.9)).toBe('excellent');
    expect(getRecommendation(0.89)).toBe('good');
    expect(getRecommendation(0.7)).toBe('good');
    expect(getRecommendation(0.5)).toBe('moderate');
    expect(getRecommendation(0.49)).toBe('poor');
    expect(getRecommendation(0)).toBe('poor');
  });

  describe('migrationSuggestions', () => {
    test('suggests deprecation for removed fields and enum values', () => {
      expect(
        migrationSuggestions([BREAKING, change('enum_value_removed', true), SAFE])
      ).toEqual([
        'Consider using field deprecation before removal to give clients time to adapt',
        'Deprecate enum values and wait for clients to stop sending them before removal',
      ]);
    });

    test('only mentions type changes that break clients', () => {
      expect(migrationSuggestions([change('field_type_changed', false)])).toEqual([]);
      expect(migrationSuggestions([change('field_type_changed', true)])).toEqual([
        'For breaking type changes, consider adding new fields alongside old ones temporarily',
      ]);
    });

    test('is empty for purely additive changes', () => {
      expect(migrationSuggestions([SAFE, change('type_added', false)])).toEqual([]);
    });
  });

  // ─── Evolution Tracking ───────────────────────────────────────────────

  describe('trackEvolution', () => {
    const v1 = model(objectType('User', [field('id', 'ID!'), field('name', 'String')]));
    const v2 = model(
      objectType('User', [field('id', 'ID!'), field('name', 'String'), field('email', 'String')])
    );
    const v3 = model(
      objectType('User', [field('id', 'ID!'), field('email', 'String')]),
      enumType('Role', ['ADMIN'])
    );

    test('produces one metric per adjacent pair, indexed by the newer snapshot', () => {
      expect(trackEvolution([v1, v2, v3])).toEqual([
        { index: 1, breakingCount: 0, nonBreakingCount: 1, totalCount: 1, score: 1 },
        { index: 2, breakingCount: 1, nonBreakingCount: 1, totalCount: 2, score: 0.5 },
      ]);
    });

    test('needs at least two snapshots', () => {
      expect(() => trackEvolution([v1])).toThrow(InsufficientSnapshotsError);
      expect(() => trackEvolution([])).toThrow(
        'At least 2 schema snapshots are required for evolution tracking (got 0)'
      );
    });

    test('summarizes averages and trend', () => {
      expect(summarizeEvolution(trackEvolution([v1, v2, v3]))).toEqual({
        transitions: 2,
        averageBreakingChanges: 0.5,
        averageScore: 0.75,
        trend: 'declining',
        trendDelta: -0.5,
      });
    });

    test('an improving sequence', () => {
      const summary = summarizeEvolution([
        versionMetrics([BREAKING, SAFE], 1),
        versionMetrics([SAFE], 2),
      ]);
      expect(summary.trend).toBe('improving');
      expect(summary.trendDelta).toBe(0.5);
    });

    test('an empty metric list is stable', () => {
      expect(summarizeEvolution([])).toEqual({
        transitions: 0,
        averageBreakingChanges: 0,
        averageScore: 1,
        trend: 'stable',
        trendDelta: 0,
      });
    });
  });
});
