/**
 * BON Parser - recursive descent with one token of lookahead
 *
 *   Document := Value EOF
 *   Value    := String | Number | List | Object
 *   Object   := '{' Node* '}'
 *   Node     := Identifier ':' Value ';'
 *   List     := '[' (Value (',' Value)*)? ']'
 */

import {
  TokenType,
  ErrorKind,
  BonError,
  type Token,
  type BonValue,
  type BonList,
  type BonObject,
  type BonNode,
  type ParserOptions,
} from './types';
import { Lexer, positionAfter } from './lexer';
import { classifyNumber } from './number';
import { createList, createNode, createObject, createString } from './value';

const VALUE_START: readonly TokenType[] = [
  TokenType.STRING,
  TokenType.NUMBER,
  TokenType.OPEN_BRACE,
  TokenType.OPEN_BRACKET,
];

const TOKEN_NAMES: Record<TokenType, string> = {
  [TokenType.STRING]: 'string',
  [TokenType.NUMBER]: 'number',
  [TokenType.IDENTIFIER]: 'identifier',
  [TokenType.OPEN_BRACE]: "'{'",
  [TokenType.CLOSE_BRACE]: "'}'",
  [TokenType.OPEN_BRACKET]: "'['",
  [TokenType.CLOSE_BRACKET]: "']'",
  [TokenType.COLON]: "':'",
  [TokenType.SEMICOLON]: "';'",
  [TokenType.COMMA]: "','",
  [TokenType.EOF]: 'end of input',
};

export function describeTokenType(type: TokenType): string {
  return TOKEN_NAMES[type];
}

export function describeToken(token: Token): string {
  switch (token.type) {
    case TokenType.STRING:
      return `string ${token.raw ?? JSON.stringify(token.value)}`;
    case TokenType.NUMBER:
      return `number ${token.value}`;
    case TokenType.IDENTIFIER:
      return `identifier '${token.value}'`;
    default:
      return TOKEN_NAMES[token.type];
  }
}

export class Parser {
  private tokens: Iterator<Token>;
  private current: Token;
  private depth: number = 0;
  private options: Required<ParserOptions>;
  private source?: string;

  /**
   * @param input - source text, or an already produced token sequence
   */
  constructor(input: string | Iterable<Token>, options: ParserOptions = {}) {
    if (typeof input === 'string') {
      this.source = input;
      this.tokens = new Lexer(input)[Symbol.iterator]();
    } else {
      if (input instanceof Lexer) {
        this.source = input.getSource();
      }
      this.tokens = input[Symbol.iterator]();
    }
    this.options = {
      maxDepth: options.maxDepth ?? 1000,
      allowDuplicateKeys: options.allowDuplicateKeys ?? true,
    };
    this.current = { type: TokenType.EOF, value: '', line: 1, column: 1, offset: 0 };
  }

  /**
   * Parse a whole document into a single value
   */
  public parse(): BonValue {
    try {
      this.current = this.pull(this.current);
      const value = this.parseValue();

      if (!this.check(TokenType.EOF)) {
        throw this.unexpected(this.current, [TokenType.EOF]);
      }

      return value;
    } catch (error) {
      // Call stack ran out before maxDepth did
      if (error instanceof RangeError) {
        throw this.error(
          ErrorKind.MAX_DEPTH_EXCEEDED,
          `Nesting too deep to parse at depth ${this.depth}`,
          this.current
        );
      }
      throw error;
    }
  }

  private parseValue(): BonValue {
    const token = this.current;

    switch (token.type) {
      case TokenType.STRING:
        this.advance();
        return createString(token.value);

      case TokenType.NUMBER:
        this.advance();
        return this.classify(token);

      case TokenType.OPEN_BRACE:
        return this.parseObject();

      case TokenType.OPEN_BRACKET:
        return this.parseList();

      default:
        throw this.unexpected(token, VALUE_START);
    }
  }

  private classify(token: Token): BonValue {
    const result = classifyNumber(token.value);
    if (!result.ok) {
      throw this.error(result.kind, result.message, token);
    }
    return result.value;
  }

  private parseObject(): BonObject {
    this.enter(this.advance()); // consume {

    const nodes: BonNode[] = [];
    const seenKeys = new Set<string>();

    while (!this.match(TokenType.CLOSE_BRACE)) {
      const keyToken = this.current;
      const node = this.parseNode();

      if (!this.options.allowDuplicateKeys && seenKeys.has(node.key)) {
        throw this.error(ErrorKind.DUPLICATE_KEY, `Duplicate key: ${node.key}`, keyToken);
      }
      seenKeys.add(node.key);
      nodes.push(node);
    }

    this.depth--;
    return createObject(nodes);
  }

  private parseNode(): BonNode {
    const keyToken = this.current;

    if (keyToken.type === TokenType.NUMBER) {
      throw this.error(
        ErrorKind.INVALID_KEY,
        `Invalid key '${keyToken.value}': keys must not start with a digit`,
        keyToken,
        [TokenType.IDENTIFIER, TokenType.CLOSE_BRACE]
      );
    }
    if (keyToken.type !== TokenType.IDENTIFIER) {
      throw this.unexpected(keyToken, [TokenType.IDENTIFIER, TokenType.CLOSE_BRACE]);
    }
    this.advance();

    this.consume(TokenType.COLON);
    const value = this.parseValue();
    this.consume(TokenType.SEMICOLON);

    return createNode(keyToken.value, value);
  }

  private parseList(): BonList {
    this.enter(this.advance()); // consume [

    const items: BonValue[] = [];

    if (!this.match(TokenType.CLOSE_BRACKET)) {
      do {
        items.push(this.parseValue());
      } while (this.match(TokenType.COMMA));

      this.consume(TokenType.CLOSE_BRACKET, [TokenType.COMMA, TokenType.CLOSE_BRACKET]);
    }

    this.depth--;
    return createList(items);
  }

  private enter(open: Token): void {
    this.depth++;
    if (this.depth > this.options.maxDepth) {
      throw this.error(
        ErrorKind.MAX_DEPTH_EXCEEDED,
        `Maximum nesting depth exceeded: ${this.options.maxDepth}`,
        open
      );
    }
  }

  private consume(type: TokenType, expected: readonly TokenType[] = [type]): Token {
    if (!this.check(type)) {
      throw this.unexpected(this.current, expected);
    }
    return this.advance();
  }

  private match(type: TokenType): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  private check(type: TokenType): boolean {
    return this.current.type === type;
  }

  private advance(): Token {
    const token = this.current;
    if (token.type !== TokenType.EOF) {
      this.current = this.pull(token);
    }
    return token;
  }

  /**
   * Next token from the sequence; a sequence that stops without EOF gets one
   * placed right after its last token.
   */
  private pull(previous: Token): Token {
    const next = this.tokens.next();
    if (next.done) {
      const end = positionAfter(previous, previous.raw ?? previous.value);
      return { type: TokenType.EOF, value: '', ...end };
    }
    return next.value;
  }

  private unexpected(token: Token, expected: readonly TokenType[]): BonError {
    const wanted = expected.map(describeTokenType).join(' or ');

    if (token.type === TokenType.EOF) {
      return this.error(
        ErrorKind.UNEXPECTED_END_OF_INPUT,
        `Unexpected end of input, expected ${wanted}`,
        token,
        expected
      );
    }

    return this.error(
      ErrorKind.UNEXPECTED_TOKEN,
      `Unexpected ${describeToken(token)}, expected ${wanted}`,
      token,
      expected
    );
  }

  private error(
    kind: ErrorKind,
    message: string,
    token: Token,
    expected: readonly TokenType[] = []
  ): BonError {
    return new BonError(kind, message, token, {
      expected,
      found: token,
      source: this.source,
    });
  }
}
