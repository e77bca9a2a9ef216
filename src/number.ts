/**
 * Integer/Float classification of raw number literals.
 * The lexer decides where a number token ends; this decides what it means.
 */

import { ErrorKind, type BonInteger, type BonFloat } from './types';
import { createFloat, createInteger, INT64_MAX, INT64_MIN } from './value';

const NUMBER_PATTERN = /^-?\d+(\.\d+)?([eE][+-]?\d+)?[fF]?$/;

export type NumberClassification =
  | { ok: true; value: BonInteger | BonFloat }
  | {
      ok: false;
      kind: ErrorKind.INVALID_NUMBER_LITERAL | ErrorKind.INTEGER_OVERFLOW;
      message: string;
    };

function invalid(message: string): NumberClassification {
  return { ok: false, kind: ErrorKind.INVALID_NUMBER_LITERAL, message };
}

function describeMalformed(literal: string): string {
  if ((literal.match(/\./g) ?? []).length > 1) {
    return `Number literal '${literal}' has more than one decimal point`;
  }
  if (/\.(?!\d)/.test(literal)) {
    return `Number literal '${literal}' needs digits after the decimal point`;
  }
  if (/^-?\d+[A-Za-z_]/.test(literal) && !/^-?\d+(\.\d+)?[eE]/.test(literal)) {
    return `'${literal}' starts with a digit but is not a number`;
  }
  if (/[eE](?![+-]?\d)/.test(literal)) {
    return `Number literal '${literal}' has an exponent without digits`;
  }
  return `Malformed number literal '${literal}'`;
}

/**
 * Classify a number literal:
 * a decimal point or an exponent makes a Float, then a trailing `f`/`F`
 * suffix does, and anything else is a signed 64-bit Integer.
 */
export function classifyNumber(literal: string): NumberClassification {
  if (!NUMBER_PATTERN.test(literal)) {
    return invalid(describeMalformed(literal));
  }

  const suffixed = literal.endsWith('f') || literal.endsWith('F');
  const body = suffixed ? literal.slice(0, -1) : literal;

  if (body.includes('.')) {
    if (suffixed) {
      return invalid(`Number literal '${literal}' combines a decimal point with an 'f' suffix`);
    }
    return { ok: true, value: createFloat(Number(body)) };
  }

  if (body.includes('e') || body.includes('E') || suffixed) {
    return { ok: true, value: createFloat(Number(body)) };
  }

  const value = BigInt(body);
  if (value < INT64_MIN || value > INT64_MAX) {
    return {
      ok: false,
      kind: ErrorKind.INTEGER_OVERFLOW,
      message: `Integer literal '${literal}' does not fit in a signed 64-bit integer`,
    };
  }
  return { ok: true, value: createInteger(value) };
}
