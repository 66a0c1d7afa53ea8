/**
 * Error types raised while building models, tracking evolution and
 * reading snapshots or configuration.
 *
 * Every error carries a stable `code`, the document location it refers to
 * (when there is one) and a suggested next step for the caller.
 */

export type SchemaErrorCode =
  | 'MALFORMED_TYPE_REF'
  | 'MISSING_QUERY_ROOT'
  | 'UNKNOWN_TYPE_KIND'
  | 'INVALID_DOCUMENT'
  | 'INVALID_ROOT_TYPE'
  | 'DUPLICATE_DEFINITION'
  | 'INSUFFICIENT_SNAPSHOTS'
  | 'SNAPSHOT_NOT_FOUND'
  | 'TYPE_NOT_FOUND'
  | 'CORRUPT_SNAPSHOT'
  | 'INVALID_CONFIG'
  | 'INVALID_KEY';

export class SchemaEvolutionError extends Error {
  public readonly code: SchemaErrorCode;
  public readonly location?: string;
  public readonly suggestedAction?: string;

  constructor(options: {
    code: SchemaErrorCode;
    message: string;
    location?: string;
    suggestedAction?: string;
    cause?: unknown;
  }) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SchemaEvolutionError';
    this.code = options.code;
    this.location = options.location;
    this.suggestedAction = options.suggestedAction;
  }
}

export class MalformedTypeRefError extends SchemaEvolutionError {
  constructor(location: string, detail: string) {
    super({
      code: 'MALFORMED_TYPE_REF',
      message: `Malformed type reference at "${location}": ${detail}`,
      location,
      suggestedAction:
        'Re-run introspection with enough nested ofType levels and check the document was not truncated.',
    });
    this.name = 'MalformedTypeRefError';
  }
}

export class MissingQueryRootError extends SchemaEvolutionError {
  constructor() {
    super({
      code: 'MISSING_QUERY_ROOT',
      message: 'Introspection document has no query root type name (__schema.queryType.name)',
      location: '__schema.queryType',
      suggestedAction: 'Include queryType { name } in the introspection query.',
    });
    this.name = 'MissingQueryRootError';
  }
}

export class UnknownTypeKindError extends SchemaEvolutionError {
  constructor(typeName: string, kind: string) {
    super({
      code: 'UNKNOWN_TYPE_KIND',
      message: `Type "${typeName}" has unknown kind "${kind}"`,
      location: typeName,
    });
    this.name = 'UnknownTypeKindError';
  }
}

export class InvalidRootTypeError extends SchemaEvolutionError {
  constructor(operation: string, typeName: string, detail: string) {
    super({
      code: 'INVALID_ROOT_TYPE',
      message: `The ${operation} root type "${typeName}" ${detail}`,
      location: typeName,
    });
    this.name = 'InvalidRootTypeError';
  }
}

export class DuplicateDefinitionError extends SchemaEvolutionError {
  constructor(location: string) {
    super({
      code: 'DUPLICATE_DEFINITION',
      message: `Duplicate definition of "${location}"`,
      location,
    });
    this.name = 'DuplicateDefinitionError';
  }
}

export class InvalidDocumentError extends SchemaEvolutionError {
  public readonly issues: string[];

  constructor(issues: string[], cause?: unknown) {
    super({
      code: 'INVALID_DOCUMENT',
      message: `Invalid introspection document: ${issues.join('; ')}`,
      suggestedAction: 'Provide the JSON result of a standard introspection query.',
      cause,
    });
    this.name = 'InvalidDocumentError';
    this.issues = issues;
  }
}

export class InsufficientSnapshotsError extends SchemaEvolutionError {
  constructor(count: number) {
    super({
      code: 'INSUFFICIENT_SNAPSHOTS',
      message: `At least 2 schema snapshots are required for evolution tracking (got ${count})`,
      suggestedAction: 'Store another snapshot before tracking evolution.',
    });
    this.name = 'InsufficientSnapshotsError';
  }
}

export class SnapshotNotFoundError extends SchemaEvolutionError {
  constructor(key: string, version?: number) {
    super({
      code: 'SNAPSHOT_NOT_FOUND',
      message:
        version === undefined
          ? `No snapshot found for key "${key}"`
          : `Version ${version} not found for key "${key}"`,
      location: key,
      suggestedAction: 'Run `schema-evolution history -k <key>` to see the stored versions.',
    });
    this.name = 'SnapshotNotFoundError';
  }
}

export class TypeNotFoundError extends SchemaEvolutionError {
  constructor(typeName: string) {
    super({
      code: 'TYPE_NOT_FOUND',
      message: `Type "${typeName}" is not defined in the schema`,
      location: typeName,
    });
    this.name = 'TypeNotFoundError';
  }
}

export class InvalidKeyError extends SchemaEvolutionError {
  constructor(key: string) {
    super({
      code: 'INVALID_KEY',
      message: `Schema key "${key}" does not map to a directory inside the store`,
      location: key,
      suggestedAction: 'Use a key made of letters, digits, dashes or dots.',
    });
    this.name = 'InvalidKeyError';
  }
}

export class CorruptSnapshotError extends SchemaEvolutionError {
  constructor(filePath: string, cause: unknown) {
    super({
      code: 'CORRUPT_SNAPSHOT',
      message: `Snapshot file "${filePath}" could not be read: ${describeError(cause)}`,
      location: filePath,
      suggestedAction: 'Delete or restore the file from version control.',
      cause,
    });
    this.name = 'CorruptSnapshotError';
  }
}

export class ConfigError extends SchemaEvolutionError {
  constructor(source: string, issues: string[]) {
    super({
      code: 'INVALID_CONFIG',
      message: `Invalid configuration in ${source}: ${issues.join('; ')}`,
      location: source,
    });
    this.name = 'ConfigError';
  }
}

/**
 * One-line message for any thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Compile-time exhaustiveness check for switches over closed unions.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${JSON.stringify(value)}`);
}
