/**
 * SDL Renderer
 *
 * Renders model definitions as schema definition language text.
 *
 * Whitespace convention: a body opens with ` {`, holds one member per line
 * indented by two spaces and closes with `}` on its own line. Rendered types
 * carry no trailing newline; `renderSchema` joins them with a blank line.
 * Definitions and members are emitted in model order.
 */

import {
  ArgumentDefinition,
  EnumValueDefinition,
  FieldDefinition,
  SchemaModel,
  TypeDefinition,
} from './types';
import { assertNever } from './errors';
import { isBuiltInScalar, renderTypeRef } from './type-ref';

export interface RenderOptions {
  /** Emit descriptions as string literals above definitions and members */
  descriptions?: boolean;

  /** Emit `@deprecated` on deprecated fields and enum values */
  deprecations?: boolean;
}

const INDENT = '  ';
const DEFAULT_DEPRECATION_REASON = 'No longer supported';

// ─── Helpers ────────────────────────────────────────────────────────────────

function renderDescription(
  description: string | undefined,
  indent: string,
  options: RenderOptions
): string {
  if (!options.descriptions || !description) return '';

  // JSON string escapes are a subset of GraphQL's
  if (!description.includes('\n')) {
    return `${indent}${JSON.stringify(description)}\n`;
  }

  const body = description
    .replace(/"""/g, '\\"""')
    .split('\n')
    .map((line) => (line.length > 0 ? indent + line : line))
    .join('\n');
  return `${indent}"""\n${body}\n${indent}"""\n`;
}

function renderDeprecation(
  member: { isDeprecated: boolean; deprecationReason?: string },
  options: RenderOptions
): string {
  if (!options.deprecations || !member.isDeprecated) return '';
  const reason = member.deprecationReason;
  if (reason === undefined || reason === DEFAULT_DEPRECATION_REASON) {
    return ' @deprecated';
  }
  return ` @deprecated(reason: ${JSON.stringify(reason)})`;
}

function renderBlock(header: string, members: string[]): string {
  if (members.length === 0) return `${header} {\n}`;
  return `${header} {\n${members.join('\n')}\n}`;
}

// ─── Members ────────────────────────────────────────────────────────────────

/**
 * `name: Type`, followed by ` = default` when the value has a default.
 * Defaults are emitted as the literal text the document carried.
 */
export function renderInputValue(value: ArgumentDefinition): string {
  const head = `${value.name}: ${renderTypeRef(value.type)}`;
  return value.defaultValue === undefined ? head : `${head} = ${value.defaultValue}`;
}

/**
 * `name(arg1: T1 = d1, arg2: T2): ReturnType`
 */
export function renderField(field: FieldDefinition, options: RenderOptions = {}): string {
  const args =
    field.args.length > 0 ? `(${field.args.map(renderInputValue).join(', ')})` : '';
  return `${field.name}${args}: ${renderTypeRef(field.type)}${renderDeprecation(field, options)}`;
}

function renderFieldMember(field: FieldDefinition, options: RenderOptions): string {
  return renderDescription(field.description, INDENT, options) + INDENT + renderField(field, options);
}

function renderInputMember(value: ArgumentDefinition, options: RenderOptions): string {
  return renderDescription(value.description, INDENT, options) + INDENT + renderInputValue(value);
}

function renderEnumMember(value: EnumValueDefinition, options: RenderOptions): string {
  return (
    renderDescription(value.description, INDENT, options) +
    INDENT +
    value.name +
    renderDeprecation(value, options)
  );
}

// ─── Types ──────────────────────────────────────────────────────────────────

function renderDefinition(def: TypeDefinition, options: RenderOptions): string {
  switch (def.kind) {
    case 'OBJECT': {
      const header =
        def.interfaces.length > 0
          ? `type ${def.name} implements ${def.interfaces.join(' & ')}`
          : `type ${def.name}`;
      return renderBlock(
        header,
        def.fields.map((f) => renderFieldMember(f, options))
      );
    }
    case 'INTERFACE':
      return renderBlock(
        `interface ${def.name}`,
        def.fields.map((f) => renderFieldMember(f, options))
      );
    case 'INPUT_OBJECT':
      return renderBlock(
        `input ${def.name}`,
        def.inputFields.map((f) => renderInputMember(f, options))
      );
    case 'ENUM':
      return renderBlock(
        `enum ${def.name}`,
        def.enumValues.map((v) => renderEnumMember(v, options))
      );
    case 'UNION':
      return def.possibleTypes.length > 0
        ? `union ${def.name} = ${def.possibleTypes.join(' | ')}`
        : `union ${def.name}`;
    case 'SCALAR':
      return `scalar ${def.name}`;
    default:
      return assertNever(def);
  }
}

/**
 * Render one type definition.
 */
export function renderType(def: TypeDefinition, options: RenderOptions = {}): string {
  return renderDescription(def.description, '', options) + renderDefinition(def, options);
}

/**
 * Render a whole model: an explicit `schema { … }` block when a root type
 * does not use its conventional name, then every type except the built-in
 * scalars.
 */
export function renderSchema(model: SchemaModel, options: RenderOptions = {}): string {
  const sections: string[] = [];

  const roots: Array<[string, string | null, string]> = [
    ['query', model.queryTypeName, 'Query'],
    ['mutation', model.mutationTypeName, 'Mutation'],
    ['subscription', model.subscriptionTypeName, 'Subscription'],
  ];
  const present = roots.filter((r): r is [string, string, string] => r[1] !== null);
  if (present.some(([, name, conventional]) => name !== conventional)) {
    sections.push(
      renderBlock(
        'schema',
        present.map(([operation, name]) => `${INDENT}${operation}: ${name}`)
      )
    );
  }

  for (const def of model.types.values()) {
    if (def.kind === 'SCALAR' && isBuiltInScalar(def.name)) continue;
    sections.push(renderType(def, options));
  }

  return sections.join('\n\n') + '\n';
}
