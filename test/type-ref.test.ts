/**
 * Tests for the TypeRef Resolver
 */

import {
  baseName,
  isScalarLike,
  listOf,
  named,
  nonNull,
  parseTypeRef,
  renderTypeRef,
  resolveTypeRef,
  toIntrospectionTypeRef,
} from '../src/core/type-ref';
import { MalformedTypeRefError } from '../src/core/errors';
import { IntrospectionTypeRef } from '../src/core/types';
import { ref } from './helpers/introspection';

const CANONICAL = ['String', 'String!', '[String]', '[String!]!', '[[Int!]]!'];

describe('TypeRef Resolver', () => {
  // ─── Resolve ──────────────────────────────────────────────────────────

  describe('resolveTypeRef', () => {
    test('resolves a bare named type', () => {
      expect(resolveTypeRef(ref('String'), 'Query.hello')).toEqual(named('String'));
    });

    test('resolves nested wrappers from the outside in', () => {
      expect(resolveTypeRef(ref('[Post!]!'), 'User.posts')).toEqual(
        nonNull(listOf(nonNull(named('Post'))))
      );
    });

    test('has no depth limit on wrapper chains', () => {
      let raw: IntrospectionTypeRef = { kind: 'SCALAR', name: 'Int', ofType: null };
      for (let i = 0; i < 5000; i++) {
        raw = { kind: 'LIST', name: null, ofType: raw };
      }

      const resolved = resolveTypeRef(raw, 'Matrix.cells');
      expect(baseName(resolved)).toBe('Int');
      expect(renderTypeRef(resolved)).toBe('['.repeat(5000) + 'Int' + ']'.repeat(5000));
    });

    test('rejects a wrapper without ofType', () => {
      const raw: IntrospectionTypeRef = { kind: 'LIST', name: null, ofType: null };
      expect(() => resolveTypeRef(raw, 'User.posts')).toThrow(
        'Malformed type reference at "User.posts": LIST wrapper has no ofType'
      );
    });

    test('rejects a named type without a name', () => {
      const raw: IntrospectionTypeRef = { kind: 'OBJECT', name: null, ofType: null };
      expect(() => resolveTypeRef(raw, 'User.friend')).toThrow(
        'named type of kind "OBJECT" has no name'
      );
    });

    test('rejects non-null directly wrapping non-null', () => {
      const raw: IntrospectionTypeRef = {
        kind: 'NON_NULL',
        name: null,
        ofType: { kind: 'NON_NULL', name: null, ofType: { kind: 'SCALAR', name: 'ID' } },
      };

      let caught: unknown;
      try {
        resolveTypeRef(raw, 'User.id');
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(MalformedTypeRefError);
      expect(caught).toMatchObject({ code: 'MALFORMED_TYPE_REF', location: 'User.id' });
    });
  });

  // ─── Render & Parse ───────────────────────────────────────────────────

  describe('renderTypeRef', () => {
    test.each(CANONICAL)('renders %s back to its introspection text', (text) => {
      expect(renderTypeRef(resolveTypeRef(ref(text), 'T.f'))).toBe(text);
    });

    test('renders constructed refs', () => {
      expect(renderTypeRef(nonNull(listOf(listOf(nonNull(named('Int'))))))).toBe('[[Int!]]!');
    });
  });

  describe('parseTypeRef', () => {
    test.each(CANONICAL)('parses %s into the same ref as the document form', (text) => {
      expect(parseTypeRef(text)).toEqual(resolveTypeRef(ref(text), 'T.f'));
    });

    test('survives a trip through the introspection shape', () => {
      for (const text of CANONICAL) {
        const parsed = parseTypeRef(text);
        expect(resolveTypeRef(toIntrospectionTypeRef(parsed), text)).toEqual(parsed);
      }
    });

    test('rejects a doubled non-null marker', () => {
      expect(() => parseTypeRef('String!!')).toThrow('non-null marker applied twice');
    });

    test('rejects unbalanced brackets', () => {
      expect(() => parseTypeRef('[String')).toThrow('"[String" is not a valid type name');
    });
  });

  // ─── Introspection Shape ──────────────────────────────────────────────

  describe('toIntrospectionTypeRef', () => {
    test('emits wrappers with null names', () => {
      expect(toIntrospectionTypeRef(nonNull(listOf(named('Post'))))).toEqual({
        kind: 'NON_NULL',
        name: null,
        ofType: {
          kind: 'LIST',
          name: null,
          ofType: { kind: 'NAMED', name: 'Post', ofType: null },
        },
      });
    });

    test('uses the kind lookup for named leaves', () => {
      const kindOf = (name: string) => (name === 'Int' ? 'SCALAR' : 'OBJECT');
      expect(toIntrospectionTypeRef(named('Int'), kindOf)).toEqual({
        kind: 'SCALAR',
        name: 'Int',
        ofType: null,
      });
    });
  });

  // ─── Inspect ──────────────────────────────────────────────────────────

  describe('isScalarLike', () => {
    test('accepts built-in scalars', () => {
      expect(isScalarLike('ID')).toBe(true);
      expect(isScalarLike('Boolean')).toBe(true);
    });

    test('accepts configured custom scalars', () => {
      expect(isScalarLike('DateTime')).toBe(true);
      expect(isScalarLike('DateTime', [])).toBe(false);
      expect(isScalarLike('Money', ['Money'])).toBe(true);
    });

    test('rejects object types', () => {
      expect(isScalarLike('User')).toBe(false);
    });
  });

  test('baseName looks through every wrapper', () => {
    const r = parseTypeRef('[[Post!]]!');
    expect(baseName(r)).toBe('Post');
  });
});
