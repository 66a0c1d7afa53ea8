/**
 * TypeRef Resolver
 *
 * Converts introspection `{ kind, name, ofType }` chains into TypeRefs and
 * back, and renders them as canonical wrapper text (`[String!]!`).
 * Wrapper chains have no depth limit, so the walks below are iterative.
 */

import {
  IntrospectionTypeRef,
  ListTypeRef,
  NamedTypeRef,
  NonNullTypeRef,
  TypeRef,
} from './types';
import { MalformedTypeRefError } from './errors';

// ─── Scalars ────────────────────────────────────────────────────────────────

export const BUILT_IN_SCALARS: readonly string[] = ['String', 'Int', 'Float', 'Boolean', 'ID'];

export const DEFAULT_CUSTOM_SCALARS: readonly string[] = [
  'DateTime',
  'Date',
  'Time',
  'JSON',
  'Upload',
  'Long',
  'Decimal',
];

export function isBuiltInScalar(name: string): boolean {
  return BUILT_IN_SCALARS.includes(name);
}

/**
 * Whether a named type should be treated as a leaf value rather than a type
 * whose own fields are worth visiting.
 */
export function isScalarLike(
  name: string,
  customScalars: readonly string[] = DEFAULT_CUSTOM_SCALARS
): boolean {
  return isBuiltInScalar(name) || customScalars.includes(name);
}

// ─── Constructors ───────────────────────────────────────────────────────────

export function named(name: string): NamedTypeRef {
  return { kind: 'Named', name };
}

export function listOf(inner: TypeRef): ListTypeRef {
  return { kind: 'List', ofType: inner };
}

export function nonNull(inner: NamedTypeRef | ListTypeRef): NonNullTypeRef {
  return { kind: 'NonNull', ofType: inner };
}

// ─── Resolve ────────────────────────────────────────────────────────────────

type Wrapper = 'LIST' | 'NON_NULL';

/**
 * Resolve a raw introspection type reference.
 *
 * @param raw      The `type` object of a field or argument
 * @param location Where the reference sits (e.g. `User.posts`), used in errors
 */
export function resolveTypeRef(raw: IntrospectionTypeRef, location: string): TypeRef {
  const wrappers: Wrapper[] = [];
  let node: IntrospectionTypeRef = raw;

  for (;;) {
    const kind = node.kind;
    if (kind !== 'LIST' && kind !== 'NON_NULL') break;
    if (!node.ofType) {
      throw new MalformedTypeRefError(location, `${kind} wrapper has no ofType`);
    }
    wrappers.push(kind);
    node = node.ofType;
  }

  if (!node.name) {
    throw new MalformedTypeRefError(location, `named type of kind "${node.kind}" has no name`);
  }

  // Rebuild from the inside out
  let ref: TypeRef = named(node.name);
  for (let i = wrappers.length - 1; i >= 0; i--) {
    if (wrappers[i] === 'LIST') {
      ref = listOf(ref);
    } else {
      if (ref.kind === 'NonNull') {
        throw new MalformedTypeRefError(location, 'NON_NULL directly wraps another NON_NULL');
      }
      ref = nonNull(ref);
    }
  }

  return ref;
}

/**
 * Inverse of `resolveTypeRef`. Named leaves are emitted with `kind: 'NAMED'`
 * unless a kind lookup is given.
 */
export function toIntrospectionTypeRef(
  ref: TypeRef,
  kindOf: (name: string) => string = () => 'NAMED'
): IntrospectionTypeRef {
  const wrappers: Wrapper[] = [];
  let current: TypeRef = ref;
  while (current.kind !== 'Named') {
    wrappers.push(current.kind === 'List' ? 'LIST' : 'NON_NULL');
    current = current.ofType;
  }

  let node: IntrospectionTypeRef = { kind: kindOf(current.name), name: current.name, ofType: null };
  for (let i = wrappers.length - 1; i >= 0; i--) {
    node = { kind: wrappers[i], name: null, ofType: node };
  }
  return node;
}

// ─── Inspect ────────────────────────────────────────────────────────────────

/** Strip every wrapper and return the innermost type name. */
export function baseName(ref: TypeRef): string {
  let current: TypeRef = ref;
  while (current.kind !== 'Named') {
    current = current.ofType;
  }
  return current.name;
}

// ─── Render & Parse ─────────────────────────────────────────────────────────

/**
 * Canonical text: `Named` → name, `List(x)` → `[x]`, `NonNull(x)` → `x!`.
 */
export function renderTypeRef(ref: TypeRef): string {
  let prefix = '';
  const suffixes: string[] = [];
  let current: TypeRef = ref;

  while (current.kind !== 'Named') {
    if (current.kind === 'List') {
      prefix += '[';
      suffixes.push(']');
    } else {
      suffixes.push('!');
    }
    current = current.ofType;
  }

  return prefix + current.name + suffixes.reverse().join('');
}

const NAME_PATTERN = /^[_A-Za-z][_0-9A-Za-z]*$/;

/**
 * Parse canonical wrapper text such as `[[Int!]]!` back into a TypeRef.
 */
export function parseTypeRef(text: string): TypeRef {
  const source = text.trim();
  let start = 0;
  let end = source.length;
  const wrappers: Wrapper[] = [];

  // Peel wrappers from the outside in: a trailing '!' or a matching [ ... ] pair
  while (start < end) {
    if (source[end - 1] === '!') {
      wrappers.push('NON_NULL');
      end--;
    } else if (source[start] === '[' && source[end - 1] === ']') {
      wrappers.push('LIST');
      start++;
      end--;
    } else {
      break;
    }
  }

  const name = source.slice(start, end);
  if (!NAME_PATTERN.test(name)) {
    throw new MalformedTypeRefError(text, `"${name}" is not a valid type name`);
  }

  let ref: TypeRef = named(name);
  for (let i = wrappers.length - 1; i >= 0; i--) {
    if (wrappers[i] === 'LIST') {
      ref = listOf(ref);
    } else {
      if (ref.kind === 'NonNull') {
        throw new MalformedTypeRefError(text, 'non-null marker applied twice');
      }
      ref = nonNull(ref);
    }
  }
  return ref;
}
