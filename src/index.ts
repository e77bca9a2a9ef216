/**
 * BON - Basic Object Notation
 * Main API entry point
 */

import { Parser } from './parser';
import { Serializer } from './serializer';
import {
  BonError,
  type BonValue,
  type ParseResult,
  type ParserOptions,
  type SerializerOptions,
} from './types';

/**
 * Parse BON text to a value tree
 */
export function parse(source: string, options?: ParserOptions): BonValue {
  const parser = new Parser(source, options);
  return parser.parse();
}

/**
 * Parse BON text, returning the error instead of throwing it
 */
export function tryParse(source: string, options?: ParserOptions): ParseResult {
  try {
    return { ok: true, value: parse(source, options) };
  } catch (error) {
    if (error instanceof BonError) {
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * Check BON syntax without keeping the result
 */
export function validate(
  source: string,
  options?: ParserOptions
): { valid: boolean; error?: BonError } {
  const result = tryParse(source, options);
  return result.ok ? { valid: true } : { valid: false, error: result.error };
}

/**
 * Serialize a value tree to BON text
 */
export function serialize(value: BonValue, options?: SerializerOptions): string {
  const serializer = new Serializer(options);
  return serializer.serialize(value);
}

/**
 * Re-emit BON text in canonical form
 */
export function format(
  source: string,
  parserOptions?: ParserOptions,
  serializerOptions?: SerializerOptions
): string {
  return serialize(parse(source, parserOptions), serializerOptions);
}

// Re-export types and classes
export * from './types';
export * from './value';
export { classifyNumber } from './number';
export type { NumberClassification } from './number';
export { Lexer } from './lexer';
export { Parser, describeToken, describeTokenType } from './parser';
export { Serializer } from './serializer';
