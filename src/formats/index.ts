/**
 * Input Parsers — Barrel export
 */

export { parseJson } from './json';
export { introspectionSchemaSchema, parseIntrospection } from './introspection';
