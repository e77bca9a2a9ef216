/**
 * Core BON type definitions
 */

/**
 * Value variants
 */
export enum ValueKind {
  STRING = 'STRING',
  INTEGER = 'INTEGER',
  FLOAT = 'FLOAT',
  LIST = 'LIST',
  OBJECT = 'OBJECT',
}

export interface BonString {
  readonly kind: ValueKind.STRING;
  readonly value: string;
}

/** Signed 64-bit integer */
export interface BonInteger {
  readonly kind: ValueKind.INTEGER;
  readonly value: bigint;
}

export interface BonFloat {
  readonly kind: ValueKind.FLOAT;
  readonly value: number;
}

export interface BonList {
  readonly kind: ValueKind.LIST;
  readonly items: readonly BonValue[];
}

export interface BonObject {
  readonly kind: ValueKind.OBJECT;
  readonly nodes: readonly BonNode[];
}

/**
 * A single `key: value;` pair. Keys may repeat within an object.
 */
export interface BonNode {
  readonly key: string;
  readonly value: BonValue;
}

export type BonValue = BonString | BonInteger | BonFloat | BonList | BonObject;

/**
 * Token types for lexical analysis
 */
export enum TokenType {
  // Literals
  STRING = 'STRING',
  NUMBER = 'NUMBER',

  // Identifiers
  IDENTIFIER = 'IDENTIFIER',

  // Delimiters
  OPEN_BRACE = 'OPEN_BRACE', // {
  CLOSE_BRACE = 'CLOSE_BRACE', // }
  OPEN_BRACKET = 'OPEN_BRACKET', // [
  CLOSE_BRACKET = 'CLOSE_BRACKET', // ]
  COLON = 'COLON', // :
  SEMICOLON = 'SEMICOLON', // ;
  COMMA = 'COMMA', // ,

  EOF = 'EOF',
}

/**
 * Position in source text
 */
export interface Position {
  /** 1-based */
  line: number;
  /** 1-based, in UTF-16 code units */
  column: number;
  /** 0-based UTF-8 byte offset */
  offset: number;
}

/**
 * Token with position information for error reporting
 */
export interface Token extends Position {
  type: TokenType;
  value: string;
  raw?: string; // Original text including quotes/escapes
}

/**
 * Parser options
 */
export interface ParserOptions {
  /** Maximum container nesting */
  maxDepth?: number;
  /** Keep repeated keys in an object (all nodes are preserved in order) */
  allowDuplicateKeys?: boolean;
}

/**
 * Serializer options
 */
export interface SerializerOptions {
  /** One node per line with indentation */
  pretty?: boolean;
  /** Spaces per level, or a whitespace-only indent string such as '\t' */
  indent?: number | string;
  /** Sort object nodes by key (stable) */
  sortKeys?: boolean;
}

export enum ErrorKind {
  UNTERMINATED_STRING = 'UnterminatedString',
  INVALID_NUMBER_LITERAL = 'InvalidNumberLiteral',
  INTEGER_OVERFLOW = 'IntegerOverflow',
  UNEXPECTED_TOKEN = 'UnexpectedToken',
  UNEXPECTED_END_OF_INPUT = 'UnexpectedEndOfInput',
  INVALID_KEY = 'InvalidKey',
  UNEXPECTED_CHARACTER = 'UnexpectedCharacter',
  MAX_DEPTH_EXCEEDED = 'MaxDepthExceeded',
  DUPLICATE_KEY = 'DuplicateKey',
}

export interface BonErrorDetails {
  /** Token types the grammar accepted at this position */
  expected?: readonly TokenType[];
  /** Token actually found */
  found?: Token;
  source?: string;
}

/**
 * Parse error with context
 */
export class BonError extends Error {
  public readonly line: number;
  public readonly column: number;
  public readonly offset: number;
  public readonly expected: readonly TokenType[];
  public readonly found?: Token;
  public readonly source?: string;

  constructor(
    public readonly kind: ErrorKind,
    message: string,
    position: Position,
    details: BonErrorDetails = {}
  ) {
    super(message);
    this.name = 'BonError';
    this.line = position.line;
    this.column = position.column;
    this.offset = position.offset;
    this.expected = details.expected ?? [];
    this.found = details.found;
    this.source = details.source;
    Object.setPrototypeOf(this, BonError.prototype);
  }

  public toString(): string {
    const location = `at line ${this.line}, column ${this.column}`;
    const head = `${this.name} [${this.kind}]: ${this.message} ${location}`;
    if (this.source !== undefined) {
      const lines = this.source.split('\n');
      const errorLine = (lines[this.line - 1] ?? '').replace(/\r$/, '');
      const pointer = ' '.repeat(this.column - 1) + '^';
      return `${head}\n${errorLine}\n${pointer}`;
    }
    return head;
  }
}

/**
 * Outcome of a non-throwing parse
 */
export type ParseResult =
  | { ok: true; value: BonValue }
  | { ok: false; error: BonError };
