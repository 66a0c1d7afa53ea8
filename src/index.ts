/**
 * graphql-schema-evolution
 *
 * Know which GraphQL schema changes will break your clients before you ship them.
 *
 * @example
 * ```typescript
 * import { SchemaEvolution } from 'graphql-schema-evolution';
 *
 * const evolution = new SchemaEvolution({ store: './schemas' });
 *
 * // First run: stores the introspection result as v1
 * // Subsequent runs: compares against the stored snapshot
 * const report = await evolution.check('storefront-api', introspectionResult);
 *
 * if (report.hasBreakingChanges) {
 *   console.log(evolution.format(report, 'console'));
 * }
 * ```
 */

// ─── Main API ───────────────────────────────────────────────────────────────
export { SchemaEvolution, SchemaEvolutionOptions, SdlOptions } from './evolution';

// ─── Core Types ─────────────────────────────────────────────────────────────
export {
  TypeRef,
  NamedTypeRef,
  ListTypeRef,
  NonNullTypeRef,
  IntrospectionSchema,
  IntrospectionType,
  IntrospectionTypeRef,
  TypeKind,
  TypeDefinition,
  FieldDefinition,
  ArgumentDefinition,
  EnumValueDefinition,
  SchemaModel,
  SchemaChange,
  ChangeKind,
  ChangeSeverity,
  TypeChangePolicy,
  DiffOptions,
  CompatibilityRating,
  VersionMetrics,
  EvolutionSummary,
  EvolutionTrack,
  EvolutionReport,
  ReportFormat,
  SchemaSnapshot,
  SchemaStore,
} from './core/types';

// ─── Core Engines (for advanced usage) ──────────────────────────────────────
export {
  named,
  listOf,
  nonNull,
  resolveTypeRef,
  toIntrospectionTypeRef,
  parseTypeRef,
  renderTypeRef,
  baseName,
  isScalarLike,
  isBuiltInScalar,
} from './core/type-ref';
export { buildSchemaModel, buildFromIntrospection, getType } from './core/builder';
export { renderSchema, renderType, renderField, RenderOptions } from './core/sdl';
export { reachableTypes } from './core/traversal';
export { diffSchemaModels, isTypeChangeBreaking, filterBySeverity } from './core/differ';
export {
  calculateCompatibilityScore,
  getRecommendation,
  migrationSuggestions,
  trackEvolution,
  summarizeEvolution,
} from './core/scorer';
export { formatReport, formatEvolution } from './core/reporter';
export { parseIntrospection } from './formats';

// ─── Errors ─────────────────────────────────────────────────────────────────
export * from './core/errors';

// ─── Storage, Config & Logging ──────────────────────────────────────────────
export { FileStore } from './store/file-store';
export { loadConfig, Config } from './config';
export { createLogger, Logger, LogLevel } from './logger';
