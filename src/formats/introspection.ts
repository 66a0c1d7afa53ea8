/**
 * Introspection Document Parser
 *
 * Validates the shape of an introspection result before the model builder
 * reads it. Accepts the full GraphQL response (`{ data: { __schema } }`),
 * the bare `{ __schema }` object, or either one as JSON text.
 */

import { z } from 'zod';
import {
  IntrospectionEnumValue,
  IntrospectionField,
  IntrospectionInputValue,
  IntrospectionSchema,
  IntrospectionType,
  IntrospectionTypeRef,
} from '../core/types';
import { InvalidDocumentError } from '../core/errors';
import { parseJson } from './json';

// ─── Type References ────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Shape check of a `{ kind, name, ofType }` chain. Wrapper chains have no
 * depth limit, so the chain is walked in a loop rather than by a recursive
 * schema.
 */
function isIntrospectionTypeRef(value: unknown): value is IntrospectionTypeRef {
  if (!isRecord(value)) return false;

  let node: unknown = value;
  while (node !== null && node !== undefined) {
    if (!isRecord(node) || typeof node.kind !== 'string') return false;
    if (node.name !== null && node.name !== undefined && typeof node.name !== 'string') {
      return false;
    }
    node = node.ofType;
  }
  return true;
}

// ─── Schemas ────────────────────────────────────────────────────────────────

const typeRefSchema = z.custom<IntrospectionTypeRef>(isIntrospectionTypeRef, {
  message: 'Expected a type reference ({ kind, name, ofType })',
});

const inputValueSchema: z.ZodType<IntrospectionInputValue> = z.object({
  name: z.string(),
  description: z.string().nullish(),
  type: typeRefSchema,
  defaultValue: z.string().nullish(),
});

const fieldSchema: z.ZodType<IntrospectionField> = z.object({
  name: z.string(),
  description: z.string().nullish(),
  args: z.array(inputValueSchema).nullish(),
  type: typeRefSchema,
  isDeprecated: z.boolean().nullish(),
  deprecationReason: z.string().nullish(),
});

const enumValueSchema: z.ZodType<IntrospectionEnumValue> = z.object({
  name: z.string(),
  description: z.string().nullish(),
  isDeprecated: z.boolean().nullish(),
  deprecationReason: z.string().nullish(),
});

const namedRefSchema = z.object({ name: z.string() });

const typeSchema: z.ZodType<IntrospectionType> = z.object({
  kind: z.string(),
  name: z.string(),
  description: z.string().nullish(),
  fields: z.array(fieldSchema).nullish(),
  inputFields: z.array(inputValueSchema).nullish(),
  interfaces: z.array(namedRefSchema).nullish(),
  enumValues: z.array(enumValueSchema).nullish(),
  possibleTypes: z.array(namedRefSchema).nullish(),
});

const rootRefSchema = z.object({ name: z.string().nullish() }).nullish();

export const introspectionSchemaSchema: z.ZodType<IntrospectionSchema> = z.object({
  queryType: rootRefSchema,
  mutationType: rootRefSchema,
  subscriptionType: rootRefSchema,
  types: z.array(typeSchema),
});

const envelopeSchema = z.object({ __schema: introspectionSchemaSchema });

const responseErrorsSchema = z.array(z.object({ message: z.string() }));

// ─── Helpers ────────────────────────────────────────────────────────────────

const MAX_REPORTED_ISSUES = 5;

function formatIssues(error: z.ZodError): string[] {
  const issues = error.issues
    .slice(0, MAX_REPORTED_ISSUES)
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
  if (error.issues.length > MAX_REPORTED_ISSUES) {
    issues.push(`…and ${error.issues.length - MAX_REPORTED_ISSUES} more`);
  }
  return issues;
}

// ─── Parse ──────────────────────────────────────────────────────────────────

/**
 * Validate an introspection result and return its `__schema` object.
 */
export function parseIntrospection(input: unknown): IntrospectionSchema {
  const parsed = typeof input === 'string' ? parseJson(input) : input;

  let envelope: unknown = parsed;
  if (isRecord(parsed) && 'data' in parsed) {
    envelope = parsed.data;

    // A GraphQL response with errors and no data
    if (!isRecord(envelope)) {
      const errors = responseErrorsSchema.safeParse(parsed.errors);
      if (errors.success && errors.data.length > 0) {
        throw new InvalidDocumentError(
          errors.data.map((e) => `introspection query returned an error: ${e.message}`)
        );
      }
    }
  }

  const result = envelopeSchema.safeParse(envelope);
  if (!result.success) {
    throw new InvalidDocumentError(formatIssues(result.error), result.error);
  }
  return result.data.__schema;
}

