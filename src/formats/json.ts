/**
 * JSON document reader
 *
 * Introspection results are usually saved straight from an HTTP client or a
 * browser devtools panel, so a BOM or a trailing comma is tolerated.
 */

import { InvalidDocumentError, describeError } from '../core/errors';

/**
 * Parse JSON text into a JavaScript value.
 */
export function parseJson(input: string): unknown {
  let cleaned = input.trim();
  if (cleaned.charCodeAt(0) === 0xfeff) {
    cleaned = cleaned.substring(1);
  }

  try {
    return JSON.parse(cleaned);
  } catch (error) {
    const lenient = cleaned.replace(/,\s*([\]}])/g, '$1');
    if (lenient === cleaned) {
      throw new InvalidDocumentError([`not valid JSON (${describeError(error)})`], error);
    }
    try {
      return JSON.parse(lenient);
    } catch {
      throw new InvalidDocumentError([`not valid JSON (${describeError(error)})`], error);
    }
  }
}

