/**
 * Tests for the introspection document parser
 */

import { parseIntrospection } from '../src/formats/introspection';
import { parseJson } from '../src/formats/json';
import { InvalidDocumentError } from '../src/core/errors';
import { field, introspection, objectType, response } from './helpers/introspection';

const USER = objectType('User', [field('id', 'ID!')]);

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('Introspection Parser', () => {
  describe('accepted shapes', () => {
    test('a full GraphQL response', () => {
      const schema = parseIntrospection(response([USER]));
      expect(schema.queryType?.name).toBe('Query');
      expect(schema.types.map((t) => t.name)).toEqual(['Query', 'User']);
    });

    test('a bare __schema envelope', () => {
      const schema = parseIntrospection({ __schema: introspection([USER]) });
      expect(schema.types).toHaveLength(2);
    });

    test('JSON text with a BOM and trailing commas', () => {
      const text =
        '\uFEFF{"__schema": {"queryType": {"name": "Query"}, "types": [' +
        '{"kind": "SCALAR", "name": "String"},' +
        ']}}';
      const schema = parseIntrospection(text);
      expect(schema.types).toEqual([{ kind: 'SCALAR', name: 'String' }]);
    });
  });

  describe('rejected shapes', () => {
    test('a response that only carries errors', () => {
      const error = captureError(() =>
        parseIntrospection({ data: null, errors: [{ message: 'Not authorized' }] })
      );

      expect(error).toBeInstanceOf(InvalidDocumentError);
      expect(error).toMatchObject({
        message: 'Invalid introspection document: introspection query returned an error: Not authorized',
      });
    });

    test('a schema without a type list', () => {
      const error = captureError(() =>
        parseIntrospection({ __schema: { queryType: { name: 'Query' } } })
      );

      expect(error).toBeInstanceOf(InvalidDocumentError);
      expect(error).toMatchObject({ issues: ['__schema.types: Required'] });
    });

    test('a type reference with a nested node missing its kind', () => {
      const document = {
        __schema: {
          queryType: { name: 'Query' },
          types: [
            {
              kind: 'OBJECT',
              name: 'Query',
              fields: [{ name: 'ids', args: [], type: { kind: 'LIST', ofType: { name: 'ID' } } }],
            },
          ],
        },
      };

      const error = captureError(() => parseIntrospection(document));

      expect(error).toBeInstanceOf(InvalidDocumentError);
      expect(error).toMatchObject({
        issues: ['__schema.types.0.fields.0.type: Expected a type reference ({ kind, name, ofType })'],
      });
    });

    test('text that is not JSON', () => {
      const error = captureError(() => parseIntrospection('type Query { ping: String }'));

      expect(error).toBeInstanceOf(InvalidDocumentError);
      expect(error).toMatchObject({ code: 'INVALID_DOCUMENT' });
      expect(String(error)).toMatch(/not valid JSON/);
    });
  });

});

describe('JSON reader', () => {
  test('parses plain JSON', () => {
    expect(parseJson('{"a": [1, 2]}')).toEqual({ a: [1, 2] });
  });

  test('tolerates trailing commas', () => {
    expect(parseJson('{"a": [1, 2,],}')).toEqual({ a: [1, 2] });
  });
});
