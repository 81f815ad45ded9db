/**
 * @fileoverview Safe JSON Parsing
 *
 * @packageDocumentation
 */

import { Err, Ok, type Result } from '../core/result.js';

/**
 * Safely parse JSON, returning a Result with ok/value/error
 */
export function safeJsonParse(text: string): Result<unknown, Error> {
  try {
    const value: unknown = JSON.parse(text);
    return Ok(value);
  } catch (e) {
    return Err(e instanceof Error ? e : new Error(String(e)));
  }
}
