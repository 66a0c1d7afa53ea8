/**
 * Schema Model Builder
 *
 * Turns an introspection document into a SchemaModel. The document is read
 * once, in order; nothing is re-sorted, so rendering and diffing the same
 * input always produce the same output.
 */

import {
  ArgumentDefinition,
  EnumValueDefinition,
  FieldDefinition,
  IntrospectionEnumValue,
  IntrospectionField,
  IntrospectionInputValue,
  IntrospectionSchema,
  IntrospectionType,
  SchemaModel,
  TYPE_KINDS,
  TypeDefinition,
  TypeKind,
} from './types';
import {
  assertNever,
  DuplicateDefinitionError,
  InvalidRootTypeError,
  MissingQueryRootError,
  UnknownTypeKindError,
} from './errors';
import { resolveTypeRef } from './type-ref';
import { parseIntrospection } from '../formats/introspection';

/** Names with this prefix belong to the introspection system itself */
const RESERVED_PREFIX = '__';

// ─── Helpers ────────────────────────────────────────────────────────────────

function isTypeKind(kind: string): kind is TypeKind {
  return TYPE_KINDS.some((k) => k === kind);
}

function optional(value: string | null | undefined): string | undefined {
  return value ?? undefined;
}

function assertUnique(names: Iterable<string>, owner: string): void {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      throw new DuplicateDefinitionError(`${owner}.${name}`);
    }
    seen.add(name);
  }
}

// ─── Member Extraction ──────────────────────────────────────────────────────

function buildInputValue(raw: IntrospectionInputValue, owner: string): ArgumentDefinition {
  return {
    name: raw.name,
    description: optional(raw.description),
    type: resolveTypeRef(raw.type, `${owner}.${raw.name}`),
    defaultValue: optional(raw.defaultValue),
  };
}

function buildField(raw: IntrospectionField, typeName: string): FieldDefinition {
  const location = `${typeName}.${raw.name}`;
  const args = (raw.args ?? []).map((arg) => buildInputValue(arg, location));
  assertUnique(
    args.map((a) => a.name),
    location
  );

  return {
    name: raw.name,
    description: optional(raw.description),
    type: resolveTypeRef(raw.type, location),
    args,
    isDeprecated: raw.isDeprecated ?? false,
    deprecationReason: optional(raw.deprecationReason),
  };
}

function buildEnumValue(raw: IntrospectionEnumValue): EnumValueDefinition {
  return {
    name: raw.name,
    description: optional(raw.description),
    isDeprecated: raw.isDeprecated ?? false,
    deprecationReason: optional(raw.deprecationReason),
  };
}

function buildFields(raw: IntrospectionType): FieldDefinition[] {
  const fields = (raw.fields ?? []).map((f) => buildField(f, raw.name));
  assertUnique(
    fields.map((f) => f.name),
    raw.name
  );
  return fields;
}

// ─── Type Extraction ────────────────────────────────────────────────────────

/**
 * Build a single TypeDefinition from its introspection entry.
 */
export function buildTypeDefinition(raw: IntrospectionType): TypeDefinition {
  if (!isTypeKind(raw.kind)) {
    throw new UnknownTypeKindError(raw.name, raw.kind);
  }

  const base = { name: raw.name, description: optional(raw.description) };
  const kind: TypeKind = raw.kind;

  switch (kind) {
    case 'OBJECT':
      return {
        ...base,
        kind,
        fields: buildFields(raw),
        interfaces: (raw.interfaces ?? []).map((i) => i.name),
      };
    case 'INTERFACE':
      return { ...base, kind, fields: buildFields(raw) };
    case 'INPUT_OBJECT': {
      const inputFields = (raw.inputFields ?? []).map((f) => buildInputValue(f, raw.name));
      assertUnique(
        inputFields.map((f) => f.name),
        raw.name
      );
      return { ...base, kind, inputFields };
    }
    case 'ENUM': {
      const enumValues = (raw.enumValues ?? []).map(buildEnumValue);
      assertUnique(
        enumValues.map((v) => v.name),
        raw.name
      );
      return { ...base, kind, enumValues };
    }
    case 'UNION':
      return { ...base, kind, possibleTypes: (raw.possibleTypes ?? []).map((t) => t.name) };
    case 'SCALAR':
      return { ...base, kind };
    default:
      return assertNever(kind);
  }
}

// ─── Build ──────────────────────────────────────────────────────────────────

function checkRoot(
  types: ReadonlyMap<string, TypeDefinition>,
  operation: string,
  name: string | null
): void {
  if (name === null) return;
  const def = types.get(name);
  if (!def) {
    throw new InvalidRootTypeError(operation, name, 'is not defined in the schema');
  }
  if (def.kind !== 'OBJECT') {
    throw new InvalidRootTypeError(operation, name, `must be an OBJECT type (found ${def.kind})`);
  }
}

/**
 * Build a model from an already validated `__schema` object.
 */
export function buildFromIntrospection(schema: IntrospectionSchema): SchemaModel {
  const queryTypeName = schema.queryType?.name;
  if (!queryTypeName) {
    throw new MissingQueryRootError();
  }

  const types = new Map<string, TypeDefinition>();
  for (const raw of schema.types) {
    if (raw.name.startsWith(RESERVED_PREFIX)) continue;
    if (types.has(raw.name)) {
      throw new DuplicateDefinitionError(raw.name);
    }
    types.set(raw.name, buildTypeDefinition(raw));
  }

  const model: SchemaModel = {
    types,
    queryTypeName,
    mutationTypeName: schema.mutationType?.name ?? null,
    subscriptionTypeName: schema.subscriptionType?.name ?? null,
  };

  checkRoot(types, 'query', model.queryTypeName);
  checkRoot(types, 'mutation', model.mutationTypeName);
  checkRoot(types, 'subscription', model.subscriptionTypeName);

  return model;
}

/**
 * Build a SchemaModel from a raw introspection document (parsed value or
 * JSON text). Any problem fails the whole build.
 */
export function buildSchemaModel(document: unknown): SchemaModel {
  return buildFromIntrospection(parseIntrospection(document));
}

/**
 * Look up a type definition by name.
 */
export function getType(model: SchemaModel, name: string): TypeDefinition | undefined {
  return model.types.get(name);
}
