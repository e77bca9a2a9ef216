/**
 * BON Lexer - whitespace-insensitive tokenization
 */

import { TokenType, ErrorKind, BonError, type Token, type Position } from './types';

const PUNCTUATION: Partial<Record<string, TokenType>> = {
  '{': TokenType.OPEN_BRACE,
  '}': TokenType.CLOSE_BRACE,
  '[': TokenType.OPEN_BRACKET,
  ']': TokenType.CLOSE_BRACKET,
  ':': TokenType.COLON,
  ';': TokenType.SEMICOLON,
  ',': TokenType.COMMA,
};

export class Lexer implements Iterable<Token> {
  private source: string;
  private position: number = 0;
  private line: number = 1;
  private column: number = 1;
  private byteOffset: number = 0;
  private tokenStart: number = 0;
  private startPosition: Position = { line: 1, column: 1, offset: 0 };

  constructor(source: string) {
    this.source = source;
  }

  public getSource(): string {
    return this.source;
  }

  /**
   * Tokenize entire source into token array, ending with EOF
   */
  public tokenize(): Token[] {
    return Array.from(this);
  }

  /**
   * Lazily yield tokens from the start of the source. Every call scans
   * independently of this lexer's own `nextToken` state.
   */
  public *[Symbol.iterator](): Generator<Token, void, undefined> {
    const scanner = new Lexer(this.source);
    let token: Token;
    do {
      token = scanner.nextToken();
      yield token;
    } while (token.type !== TokenType.EOF);
  }

  /**
   * Get next token from source. Returns EOF repeatedly once the input is exhausted.
   */
  public nextToken(): Token {
    this.skipWhitespace();
    this.markStart();

    if (this.isAtEnd()) {
      return this.createToken(TokenType.EOF, '');
    }

    const char = this.peek();

    const punctuation = PUNCTUATION[char];
    if (punctuation !== undefined) {
      this.advance();
      return this.createToken(punctuation, char);
    }

    if (char === '"' || char === "'") {
      return this.scanQuotedString(char);
    }

    // Numbers (including negative)
    if (this.isDigit(char) || char === '-') {
      return this.scanNumber();
    }

    if (this.isIdentifierStart(char)) {
      return this.scanIdentifier();
    }

    const whole = String.fromCodePoint(this.source.codePointAt(this.position) ?? 0);
    throw this.error(
      ErrorKind.UNEXPECTED_CHARACTER,
      `Unexpected character: ${JSON.stringify(whole)}`,
      this.startPosition
    );
  }

  private scanQuotedString(quote: string): Token {
    this.advance(); // skip opening quote
    let value = '';

    while (!this.isAtEnd() && this.peek() !== quote) {
      if (this.peek() === '\\') {
        this.advance();
        if (this.isAtEnd()) break;
        value += this.handleEscape(this.advance());
      } else {
        value += this.advance();
      }
    }

    if (this.isAtEnd()) {
      throw this.error(ErrorKind.UNTERMINATED_STRING, 'Unterminated string', this.startPosition);
    }

    this.advance(); // skip closing quote

    const token = this.createToken(TokenType.STRING, value);
    token.raw = this.source.slice(this.tokenStart, this.position);
    return token;
  }

  private handleEscape(char: string): string {
    switch (char) {
      case 'n': return '\n';
      case 't': return '\t';
      case 'r': return '\r';
      default: return char;
    }
  }

  /**
   * Scan the whole numeric word. Classification into Integer or Float, and
   * rejection of malformed literals, happen in the parser.
   */
  private scanNumber(): Token {
    if (this.peek() === '-') {
      this.advance();
      if (!this.isDigit(this.peek())) {
        throw this.error(
          ErrorKind.INVALID_NUMBER_LITERAL,
          "Expected a digit after '-'",
          this.startPosition
        );
      }
    }

    while (this.isNumberChar(this.peek())) {
      const char = this.advance();
      // Exponent sign
      if ((char === 'e' || char === 'E') && (this.peek() === '+' || this.peek() === '-')) {
        this.advance();
      }
    }

    return this.createToken(TokenType.NUMBER, this.source.slice(this.tokenStart, this.position));
  }

  private scanIdentifier(): Token {
    while (this.isIdentifierPart(this.peek())) {
      this.advance();
    }
    return this.createToken(TokenType.IDENTIFIER, this.source.slice(this.tokenStart, this.position));
  }

  private skipWhitespace(): void {
    while (!this.isAtEnd()) {
      const char = this.peek();
      if (char === ' ' || char === '\t' || char === '\n' || char === '\r') {
        this.advance();
      } else {
        break;
      }
    }
  }

  private isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
  }

  private isIdentifierStart(char: string): boolean {
    return (char >= 'a' && char <= 'z') ||
           (char >= 'A' && char <= 'Z') ||
           char === '_';
  }

  private isIdentifierPart(char: string): boolean {
    return this.isIdentifierStart(char) || this.isDigit(char);
  }

  private isNumberChar(char: string): boolean {
    return this.isIdentifierPart(char) || char === '.';
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.source[this.position];
  }

  private advance(): string {
    const char = this.source[this.position];
    this.position++;
    const next = step({ line: this.line, column: this.column, offset: this.byteOffset }, char);
    this.line = next.line;
    this.column = next.column;
    this.byteOffset = next.offset;
    return char;
  }

  private isAtEnd(): boolean {
    return this.position >= this.source.length;
  }

  private markStart(): void {
    this.tokenStart = this.position;
    this.startPosition = { line: this.line, column: this.column, offset: this.byteOffset };
  }

  private createToken(type: TokenType, value: string): Token {
    return { type, value, ...this.startPosition };
  }

  private error(kind: ErrorKind, message: string, position: Position): BonError {
    return new BonError(kind, message, position, { source: this.source });
  }
}

/**
 * Position just past `text` when it starts at `start`.
 */
export function positionAfter(start: Position, text: string): Position {
  let position = start;
  for (let i = 0; i < text.length; i++) {
    position = step(position, text[i]);
  }
  return position;
}

function step(position: Position, char: string): Position {
  const offset = position.offset + utf8Width(char.charCodeAt(0));
  if (char === '\n') {
    return { line: position.line + 1, column: 1, offset };
  }
  return { line: position.line, column: position.column + 1, offset };
}

/**
 * UTF-8 bytes for one UTF-16 code unit; each half of a surrogate pair counts 2.
 */
function utf8Width(code: number): number {
  if (code < 0x80) return 1;
  if (code < 0x800) return 2;
  if (code >= 0xd800 && code <= 0xdfff) return 2;
  return 3;
}
