/**
 * Canonical type definitions for graphql-schema-evolution.
 * These types represent the normalized schema model and the artifacts
 * derived from comparing two models.
 */

// ─── Type References ────────────────────────────────────────────────────────

export interface NamedTypeRef {
  kind: 'Named';
  name: string;
}

export interface ListTypeRef {
  kind: 'List';
  ofType: TypeRef;
}

/** A non-null wrapper never directly wraps another non-null wrapper. */
export interface NonNullTypeRef {
  kind: 'NonNull';
  ofType: NamedTypeRef | ListTypeRef;
}

export type TypeRef = NamedTypeRef | ListTypeRef | NonNullTypeRef;

// ─── Raw Introspection Shapes ───────────────────────────────────────────────

export interface IntrospectionTypeRef {
  kind: string;
  name?: string | null;
  ofType?: IntrospectionTypeRef | null;
}

export interface IntrospectionInputValue {
  name: string;
  description?: string | null;
  type: IntrospectionTypeRef;
  defaultValue?: string | null;
}

export interface IntrospectionField {
  name: string;
  description?: string | null;
  args?: IntrospectionInputValue[] | null;
  type: IntrospectionTypeRef;
  isDeprecated?: boolean | null;
  deprecationReason?: string | null;
}

export interface IntrospectionEnumValue {
  name: string;
  description?: string | null;
  isDeprecated?: boolean | null;
  deprecationReason?: string | null;
}

export interface IntrospectionType {
  kind: string;
  name: string;
  description?: string | null;
  fields?: IntrospectionField[] | null;
  inputFields?: IntrospectionInputValue[] | null;
  interfaces?: Array<{ name: string }> | null;
  enumValues?: IntrospectionEnumValue[] | null;
  possibleTypes?: Array<{ name: string }> | null;
}

/** The `__schema` object of an introspection result. */
export interface IntrospectionSchema {
  queryType?: { name?: string | null } | null;
  mutationType?: { name?: string | null } | null;
  subscriptionType?: { name?: string | null } | null;
  types: IntrospectionType[];
}

// ─── Schema Model ───────────────────────────────────────────────────────────

export const TYPE_KINDS = [
  'OBJECT',
  'INPUT_OBJECT',
  'INTERFACE',
  'ENUM',
  'UNION',
  'SCALAR',
] as const;

export type TypeKind = (typeof TYPE_KINDS)[number];

export interface ArgumentDefinition {
  name: string;
  description?: string;
  type: TypeRef;
  /** Literal text exactly as the document gave it */
  defaultValue?: string;
}

export interface FieldDefinition {
  name: string;
  description?: string;
  type: TypeRef;
  args: readonly ArgumentDefinition[];
  isDeprecated: boolean;
  deprecationReason?: string;
}

export interface EnumValueDefinition {
  name: string;
  description?: string;
  isDeprecated: boolean;
  deprecationReason?: string;
}

interface TypeDefinitionBase {
  name: string;
  description?: string;
}

export interface ObjectTypeDefinition extends TypeDefinitionBase {
  kind: 'OBJECT';
  fields: readonly FieldDefinition[];
  interfaces: readonly string[];
}

export interface InterfaceTypeDefinition extends TypeDefinitionBase {
  kind: 'INTERFACE';
  fields: readonly FieldDefinition[];
}

export interface InputObjectTypeDefinition extends TypeDefinitionBase {
  kind: 'INPUT_OBJECT';
  inputFields: readonly ArgumentDefinition[];
}

export interface EnumTypeDefinition extends TypeDefinitionBase {
  kind: 'ENUM';
  enumValues: readonly EnumValueDefinition[];
}

export interface UnionTypeDefinition extends TypeDefinitionBase {
  kind: 'UNION';
  possibleTypes: readonly string[];
}

export interface ScalarTypeDefinition extends TypeDefinitionBase {
  kind: 'SCALAR';
}

export type TypeDefinition =
  | ObjectTypeDefinition
  | InterfaceTypeDefinition
  | InputObjectTypeDefinition
  | EnumTypeDefinition
  | UnionTypeDefinition
  | ScalarTypeDefinition;

export interface SchemaModel {
  /** Type definitions keyed by name, in document order */
  types: ReadonlyMap<string, TypeDefinition>;
  queryTypeName: string;
  mutationTypeName: string | null;
  subscriptionTypeName: string | null;
}

// ─── Schema Changes ─────────────────────────────────────────────────────────

export type ChangeSeverity = 'minor' | 'major' | 'critical';

export type ChangeKind =
  | 'type_added'
  | 'type_removed'
  | 'field_added'
  | 'field_removed'
  | 'field_type_changed'
  | 'enum_value_added'
  | 'enum_value_removed';

export interface SchemaChange {
  kind: ChangeKind;
  severity: ChangeSeverity;
  isBreaking: boolean;

  /** Type the change belongs to */
  typeName: string;

  /** Field, input field or enum value name, for member-level changes */
  memberName?: string;

  /** Human-readable description of the change */
  description: string;

  /** What existing clients will notice */
  impact?: string;

  /** What the schema owner should do about it */
  recommendation?: string;

  /** Rendered type before/after, for field_type_changed */
  before?: string;
  after?: string;
}

/**
 * How field type changes are classified.
 *
 * - `base-name`: only the innermost type names are compared against the
 *   scalar compatibility table; wrapper changes are ignored.
 * - `structural`: nullability and list depth are compared as well.
 */
export type TypeChangePolicy = 'base-name' | 'structural';

export interface DiffOptions {
  typeChangePolicy?: TypeChangePolicy;
}

// ─── Scoring ────────────────────────────────────────────────────────────────

export type CompatibilityRating = 'excellent' | 'good' | 'moderate' | 'poor';

export interface VersionMetrics {
  /** Position of the newer snapshot in the sequence */
  index: number;
  breakingCount: number;
  nonBreakingCount: number;
  totalCount: number;
  score: number;
}

export type EvolutionTrend = 'improving' | 'declining' | 'stable';

export interface EvolutionSummary {
  transitions: number;
  averageBreakingChanges: number;
  averageScore: number;
  trend: EvolutionTrend;
  /** Last score minus first score */
  trendDelta: number;
}

export interface EvolutionTrack {
  key: string;

  /** Version number of each snapshot, in sequence order */
  versions: number[];

  metrics: VersionMetrics[];
  summary: EvolutionSummary;
}

// ─── Reports ────────────────────────────────────────────────────────────────

export interface EvolutionReport {
  /** The schema key (endpoint name or label) */
  key: string;

  /** Timestamp of the comparison */
  timestamp: string;

  previousVersion: number;
  currentVersion: number;

  /** Changes at or above the requested severity */
  changes: SchemaChange[];

  summary: {
    breaking: number;
    nonBreaking: number;
    critical: number;
    major: number;
    minor: number;
    total: number;
  };

  /** Score over every detected change, in [0, 1] */
  compatibilityScore: number;
  rating: CompatibilityRating;
  hasBreakingChanges: boolean;
  suggestions: string[];
}

export type ReportFormat = 'console' | 'json' | 'markdown';

// ─── Snapshots & Store ──────────────────────────────────────────────────────

export interface SchemaSnapshot {
  /** Unique key for this schema (e.g., 'github-api' or an endpoint URL) */
  key: string;

  /** Validated `__schema` object */
  schema: IntrospectionSchema;

  /** ISO timestamp when this snapshot was created */
  timestamp: string;

  /** Version number (incremented on each stored change) */
  version: number;

  metadata?: Record<string, unknown>;
}

export interface SchemaStore {
  /** Save a schema snapshot */
  save(snapshot: SchemaSnapshot): Promise<void>;

  /** Load the snapshot with the highest version for a key */
  load(key: string): Promise<SchemaSnapshot | null>;

  /** Load a specific version */
  loadVersion(key: string, version: number): Promise<SchemaSnapshot | null>;

  /** List all versions for a key, oldest first */
  listVersions(key: string): Promise<SchemaSnapshot[]>;

  /** List all known keys */
  listKeys(): Promise<string[]>;

  /** Delete a key and all its versions */
  delete(key: string): Promise<void>;
}
