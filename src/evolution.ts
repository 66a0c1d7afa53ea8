/**
 * SchemaEvolution — Main API
 *
 * The primary entry point for graphql-schema-evolution. Provides a simple
 * API for:
 * - Snapshotting introspection results per schema key
 * - Checking a new introspection result against the stored snapshot
 * - Comparing documents or stored versions
 * - Tracking compatibility across every stored version
 * - Rendering SDL
 */

import {
  ChangeSeverity,
  EvolutionReport,
  EvolutionTrack,
  IntrospectionSchema,
  ReportFormat,
  SchemaChange,
  SchemaModel,
  SchemaSnapshot,
  SchemaStore,
  TypeChangePolicy,
} from './core/types';
import { buildFromIntrospection } from './core/builder';
import { diffSchemaModels, filterBySeverity } from './core/differ';
import {
  calculateCompatibilityScore,
  getRecommendation,
  migrationSuggestions,
  summarizeEvolution,
  trackEvolution,
} from './core/scorer';
import { RenderOptions, renderSchema, renderType } from './core/sdl';
import { reachableTypes } from './core/traversal';
import { formatEvolution, formatReport } from './core/reporter';
import { DEFAULT_CUSTOM_SCALARS } from './core/type-ref';
import {
  InsufficientSnapshotsError,
  SnapshotNotFoundError,
  TypeNotFoundError,
} from './core/errors';
import { parseIntrospection } from './formats/introspection';
import { FileStore } from './store/file-store';
import { Logger, logger as defaultLogger } from './logger';

// ─── Options ────────────────────────────────────────────────────────────────

export interface SchemaEvolutionOptions {
  /** Path to store directory or a custom SchemaStore instance */
  store: string | SchemaStore;

  /** Whether to save a first snapshot when `check` finds none (default: true) */
  autoSnapshot?: boolean;

  /** Whether to store a new version when `check` detects changes (default: false) */
  autoUpdate?: boolean;

  /** Minimum severity to include in reports (default: 'minor') */
  minSeverity?: ChangeSeverity;

  /** How field type changes are classified (default: 'base-name') */
  typeChangePolicy?: TypeChangePolicy;

  /** Scalars treated as leaves when walking the type graph */
  customScalars?: readonly string[];

  /** Custom metadata to include with snapshots */
  metadata?: Record<string, unknown>;

  logger?: Logger;
}

export interface SdlOptions extends RenderOptions {
  /** Render only this type */
  typeName?: string;

  /** With `typeName`, also render every type it reaches */
  deep?: boolean;
}

interface ReadDocument {
  schema: IntrospectionSchema;
  model: SchemaModel;
}

// ─── SchemaEvolution Class ──────────────────────────────────────────────────

export class SchemaEvolution {
  private store: SchemaStore;
  private autoSnapshot: boolean;
  private autoUpdate: boolean;
  private minSeverity: ChangeSeverity;
  private typeChangePolicy: TypeChangePolicy;
  private customScalars: readonly string[];
  private metadata: Record<string, unknown>;
  private logger: Logger;

  constructor(options: SchemaEvolutionOptions) {
    this.logger = options.logger ?? defaultLogger;

    if (typeof options.store === 'string') {
      this.store = new FileStore(options.store, this.logger);
    } else {
      this.store = options.store;
    }

    this.autoSnapshot = options.autoSnapshot ?? true;
    this.autoUpdate = options.autoUpdate ?? false;
    this.minSeverity = options.minSeverity ?? 'minor';
    this.typeChangePolicy = options.typeChangePolicy ?? 'base-name';
    this.customScalars = options.customScalars ?? DEFAULT_CUSTOM_SCALARS;
    this.metadata = options.metadata ?? {};
  }

  /**
   * Check an introspection result against the stored snapshot for a key.
   *
   * - If no snapshot exists: saves one (if enabled) and returns a clean report.
   * - If a snapshot exists: compares and returns a change report.
   *
   * @param key      Unique identifier for this schema (e.g., 'storefront-api')
   * @param document Introspection result (parsed object or JSON text)
   */
  async check(key: string, document: unknown): Promise<EvolutionReport> {
    const current = this.read(document);
    const existing = await this.store.load(key);

    if (!existing) {
      if (this.autoSnapshot) {
        await this.save(key, current.schema, 1);
      }
      return this.createReport(key, 1, 1, []);
    }

    const previous = buildFromIntrospection(existing.schema);
    const changes = this.diffModels(previous, current.model);
    const nextVersion = changes.length > 0 ? existing.version + 1 : existing.version;
    const report = this.createReport(key, existing.version, nextVersion, changes);

    if (this.autoUpdate && changes.length > 0) {
      await this.save(key, current.schema, nextVersion);
    }

    this.logger.debug('Checked schema', {
      key,
      changes: changes.length,
      breaking: report.summary.breaking,
    });
    return report;
  }

  /**
   * Store an introspection result as a new version. When no version is
   * forced and the schema is unchanged from the latest one, the latest
   * snapshot is returned and nothing is written.
   */
  async snapshot(key: string, document: unknown, version?: number): Promise<SchemaSnapshot> {
    const current = this.read(document);
    const existing = await this.store.load(key);

    if (existing && version === undefined) {
      const changes = this.diffModels(buildFromIntrospection(existing.schema), current.model);
      if (changes.length === 0) {
        this.logger.debug('Schema unchanged, keeping latest snapshot', {
          key,
          version: existing.version,
        });
        return existing;
      }
    }

    const finalVersion = version ?? (existing ? existing.version + 1 : 1);
    return this.save(key, current.schema, finalVersion);
  }

  /**
   * Compare two stored versions of a schema.
   */
  async diff(key: string, versionA: number, versionB: number): Promise<EvolutionReport> {
    const a = await this.store.loadVersion(key, versionA);
    const b = await this.store.loadVersion(key, versionB);

    if (!a) throw new SnapshotNotFoundError(key, versionA);
    if (!b) throw new SnapshotNotFoundError(key, versionB);

    const changes = this.diffModels(
      buildFromIntrospection(a.schema),
      buildFromIntrospection(b.schema)
    );
    return this.createReport(key, versionA, versionB, changes);
  }

  /**
   * Compare two introspection results directly (without store).
   */
  compare(before: unknown, after: unknown): EvolutionReport {
    const changes = this.diffModels(this.read(before).model, this.read(after).model);
    return this.createReport('(direct comparison)', 1, 2, changes);
  }

  /**
   * Compatibility metrics across every stored version of a key.
   */
  async track(key: string): Promise<EvolutionTrack> {
    const snapshots = await this.store.listVersions(key);
    if (snapshots.length < 2) {
      throw new InsufficientSnapshotsError(snapshots.length);
    }

    return this.createTrack(
      key,
      snapshots.map((s) => s.version),
      snapshots.map((s) => buildFromIntrospection(s.schema))
    );
  }

  /**
   * Compatibility metrics across a sequence of introspection results,
   * numbered from v1 in the given order.
   */
  trackDocuments(documents: readonly unknown[], key = '(documents)'): EvolutionTrack {
    const models = documents.map((d) => this.read(d).model);
    return this.createTrack(
      key,
      models.map((_, i) => i + 1),
      models
    );
  }

  /**
   * Render SDL for a whole introspection result or for one type.
   */
  renderSdl(document: unknown, options: SdlOptions = {}): string {
    const { model } = this.read(document);
    const { typeName, deep, ...renderOptions } = options;

    if (typeName === undefined) {
      return renderSchema(model, renderOptions);
    }

    if (!model.types.has(typeName)) {
      throw new TypeNotFoundError(typeName);
    }
    const names = deep ? reachableTypes(model, typeName, this.customScalars) : [typeName];
    const sections: string[] = [];
    for (const name of names) {
      const def = model.types.get(name);
      if (def) sections.push(renderType(def, renderOptions));
    }
    return sections.join('\n\n') + '\n';
  }

  /**
   * Format a change report.
   */
  format(report: EvolutionReport, format: ReportFormat = 'console'): string {
    return formatReport(report, format);
  }

  /**
   * Format an evolution track.
   */
  formatTrack(track: EvolutionTrack, format: ReportFormat = 'console'): string {
    return formatEvolution(track, format);
  }

  /**
   * Get the schema store instance.
   */
  getStore(): SchemaStore {
    return this.store;
  }

  /**
   * List all stored schema keys.
   */
  async listKeys(): Promise<string[]> {
    return this.store.listKeys();
  }

  /**
   * List all versions for a key.
   */
  async listVersions(key: string): Promise<SchemaSnapshot[]> {
    return this.store.listVersions(key);
  }

  // ─── Private Helpers ────────────────────────────────────────────────────

  private read(document: unknown): ReadDocument {
    const schema = parseIntrospection(document);
    return { schema, model: buildFromIntrospection(schema) };
  }

  private diffModels(before: SchemaModel, after: SchemaModel): SchemaChange[] {
    return diffSchemaModels(before, after, { typeChangePolicy: this.typeChangePolicy });
  }

  private async save(
    key: string,
    schema: IntrospectionSchema,
    version: number
  ): Promise<SchemaSnapshot> {
    const snapshot: SchemaSnapshot = {
      key,
      schema,
      timestamp: new Date().toISOString(),
      version,
      metadata: this.metadata,
    };

    await this.store.save(snapshot);
    this.logger.debug('Snapshot saved', { key, version });
    return snapshot;
  }

  private createTrack(key: string, versions: number[], models: SchemaModel[]): EvolutionTrack {
    const metrics = trackEvolution(models, { typeChangePolicy: this.typeChangePolicy });
    return { key, versions, metrics, summary: summarizeEvolution(metrics) };
  }

  private createReport(
    key: string,
    previousVersion: number,
    currentVersion: number,
    allChanges: SchemaChange[]
  ): EvolutionReport {
    const changes = filterBySeverity(allChanges, this.minSeverity);
    const score = calculateCompatibilityScore(allChanges);
    const count = (severity: ChangeSeverity) =>
      changes.filter((c) => c.severity === severity).length;
    const breaking = changes.filter((c) => c.isBreaking).length;

    return {
      key,
      timestamp: new Date().toISOString(),
      previousVersion,
      currentVersion,
      changes,
      summary: {
        breaking,
        nonBreaking: changes.length - breaking,
        critical: count('critical'),
        major: count('major'),
        minor: count('minor'),
        total: changes.length,
      },
      compatibilityScore: score,
      rating: getRecommendation(score),
      hasBreakingChanges: allChanges.some((c) => c.isBreaking),
      suggestions: migrationSuggestions(allChanges),
    };
  }
}
