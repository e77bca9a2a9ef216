import { describe, it, expect } from 'vitest';
import { Lexer } from './lexer';
import { Parser } from './parser';
import { ErrorKind, TokenType, ValueKind } from './types';
import {
  createFloat,
  createInteger,
  createList,
  createNode,
  createObject,
  createString,
  deepEquals,
} from './value';
import { captureError, summary } from './test-helpers';

function parse(source: string) {
  return new Parser(source).parse();
}

describe('Parser', () => {
  it('should parse numbers by literal form', () => {
    expect(parse('10')).toEqual(createInteger(10));
    expect(parse('10.0')).toEqual(createFloat(10));
    expect(parse('5f')).toEqual(createFloat(5));
    expect(parse('6.67e-11')).toEqual(createFloat(6.67e-11));
    expect(parse('-3')).toEqual(createInteger(-3));
  });

  it('should parse strings at top level', () => {
    expect(parse(`'single'`)).toEqual(createString('single'));
    expect(parse('"double"')).toEqual(createString('double'));
  });

  it('should parse empty containers', () => {
    expect(parse('{}')).toEqual(createObject([]));
    expect(parse('[]')).toEqual(createList([]));
  });

  it('should parse nested objects', () => {
    const result = parse('{object: {sub_value: "hello, world";};}');

    expect(result).toEqual(
      createObject([
        createNode('object', createObject([createNode('sub_value', createString('hello, world'))])),
      ])
    );
  });

  it('should parse mixed documents', () => {
    const source = `{
      value: "data";
      list: [1, 2e-5, 3.5, 4f, "5", {key: "value";} ];
      nested_object: { hello: "world"; };
    }`;

    expect(parse(source)).toEqual(
      createObject([
        createNode('value', createString('data')),
        createNode(
          'list',
          createList([
            createInteger(1),
            createFloat(2e-5),
            createFloat(3.5),
            createFloat(4),
            createString('5'),
            createObject([createNode('key', createString('value'))]),
          ])
        ),
        createNode('nested_object', createObject([createNode('hello', createString('world'))])),
      ])
    );
  });

  it('should ignore whitespace', () => {
    expect(deepEquals(parse('{ key:1 ; }'), parse('{key:1;}'))).toBe(true);
  });

  it('should preserve duplicate keys in order', () => {
    const result = parse('{a: 1; b: 2; a: 3;}');

    expect(result.kind).toBe(ValueKind.OBJECT);
    expect(result).toEqual(
      createObject([
        createNode('a', createInteger(1)),
        createNode('b', createInteger(2)),
        createNode('a', createInteger(3)),
      ])
    );
  });

  it('should reject duplicate keys when asked to', () => {
    const error = captureError(() =>
      new Parser('{a: 1; a: 2;}', { allowDuplicateKeys: false }).parse()
    );

    expect(summary(error)).toEqual({
      kind: ErrorKind.DUPLICATE_KEY,
      message: 'Duplicate key: a',
      line: 1,
      column: 8,
      offset: 7,
    });
  });

  it('should accept a token array', () => {
    const tokens = new Lexer('[1, "two"]').tokenize();

    expect(new Parser(tokens).parse()).toEqual(
      createList([createInteger(1), createString('two')])
    );
  });

  it('should end a token sequence that has no EOF', () => {
    const tokens = new Lexer('[1').tokenize().filter(t => t.type !== TokenType.EOF);
    const error = captureError(() => new Parser(tokens).parse());

    expect(summary(error)).toEqual({
      kind: ErrorKind.UNEXPECTED_END_OF_INPUT,
      message: "Unexpected end of input, expected ',' or ']'",
      line: 1,
      column: 3,
      offset: 2,
    });
    expect(error.source).toBeUndefined();
  });

  it('should place the end of a token sequence after a multi-line string', () => {
    const tokens = new Lexer('["a\nbc"').tokenize().filter(t => t.type !== TokenType.EOF);
    const error = captureError(() => new Parser(tokens).parse());

    expect(summary(error)).toEqual({
      kind: ErrorKind.UNEXPECTED_END_OF_INPUT,
      message: "Unexpected end of input, expected ',' or ']'",
      line: 2,
      column: 4,
      offset: 7,
    });
  });

  it('should allow a thousand levels of nesting by default', () => {
    const depth = 1000;
    expect(() => parse('['.repeat(depth) + ']'.repeat(depth))).not.toThrow();

    const error = captureError(() => parse('['.repeat(depth + 1) + ']'.repeat(depth + 1)));
    expect(error.kind).toBe(ErrorKind.MAX_DEPTH_EXCEEDED);
    expect(error.message).toBe('Maximum nesting depth exceeded: 1000');
    expect(error.column).toBe(1001);
  });

  it('should report exhausted call stacks as too deep', () => {
    const depth = 100000;
    const error = captureError(() =>
      new Parser('['.repeat(depth) + ']'.repeat(depth), { maxDepth: Infinity }).parse()
    );

    expect(error.kind).toBe(ErrorKind.MAX_DEPTH_EXCEEDED);
  });

  it('should limit nesting depth', () => {
    expect(new Parser('[[1]]', { maxDepth: 2 }).parse()).toEqual(
      createList([createList([createInteger(1)])])
    );

    const error = captureError(() => new Parser('[[{a: 1;}]]', { maxDepth: 2 }).parse());
    expect(summary(error)).toEqual({
      kind: ErrorKind.MAX_DEPTH_EXCEEDED,
      message: 'Maximum nesting depth exceeded: 2',
      line: 1,
      column: 3,
      offset: 2,
    });
  });

  describe('errors', () => {
    it('should report a missing semicolon', () => {
      const error = captureError(() => parse('{key: 1}'));

      expect(summary(error)).toEqual({
        kind: ErrorKind.UNEXPECTED_TOKEN,
        message: "Unexpected '}', expected ';'",
        line: 1,
        column: 8,
        offset: 7,
      });
      expect(error.expected).toEqual([TokenType.SEMICOLON]);
      expect(error.found?.type).toBe(TokenType.CLOSE_BRACE);
    });

    it('should report a trailing comma in a list', () => {
      const error = captureError(() => parse('[1,2,]'));

      expect(error.kind).toBe(ErrorKind.UNEXPECTED_TOKEN);
      expect(error.message).toBe("Unexpected ']', expected string or number or '{' or '['");
      expect(error.column).toBe(6);
      expect(error.expected).toEqual([
        TokenType.STRING,
        TokenType.NUMBER,
        TokenType.OPEN_BRACE,
        TokenType.OPEN_BRACKET,
      ]);
    });

    it('should report an unterminated string', () => {
      const error = captureError(() => parse('"abc'));

      expect(summary(error)).toEqual({
        kind: ErrorKind.UNTERMINATED_STRING,
        message: 'Unterminated string',
        line: 1,
        column: 1,
        offset: 0,
      });
    });

    it('should report a digit-led key as invalid', () => {
      const error = captureError(() => parse('{1key: "x";}'));

      expect(summary(error)).toEqual({
        kind: ErrorKind.INVALID_KEY,
        message: "Invalid key '1key': keys must not start with a digit",
        line: 1,
        column: 2,
        offset: 1,
      });
    });

    it('should report input that ends inside an object', () => {
      const error = captureError(() => parse('{key: 1;'));

      expect(summary(error)).toEqual({
        kind: ErrorKind.UNEXPECTED_END_OF_INPUT,
        message: "Unexpected end of input, expected identifier or '}'",
        line: 1,
        column: 9,
        offset: 8,
      });
    });

    it('should report input that ends before a colon', () => {
      const error = captureError(() => parse('{key'));

      expect(summary(error)).toEqual({
        kind: ErrorKind.UNEXPECTED_END_OF_INPUT,
        message: "Unexpected end of input, expected ':'",
        line: 1,
        column: 5,
        offset: 4,
      });
    });

    it('should report input that ends before a semicolon', () => {
      const error = captureError(() => parse('{key: 1'));

      expect(summary(error)).toEqual({
        kind: ErrorKind.UNEXPECTED_END_OF_INPUT,
        message: "Unexpected end of input, expected ';'",
        line: 1,
        column: 8,
        offset: 7,
      });
    });

    it('should report empty input', () => {
      const error = captureError(() => parse('   '));

      expect(error.kind).toBe(ErrorKind.UNEXPECTED_END_OF_INPUT);
      expect(error.message).toBe("Unexpected end of input, expected string or number or '{' or '['");
    });

    it('should report a missing colon', () => {
      const error = captureError(() => parse('{key 1;}'));

      expect(error.kind).toBe(ErrorKind.UNEXPECTED_TOKEN);
      expect(error.message).toBe("Unexpected number 1, expected ':'");
    });

    it('should report missing list separators', () => {
      const error = captureError(() => parse('[1 2]'));

      expect(error.message).toBe("Unexpected number 2, expected ',' or ']'");
      expect(error.column).toBe(4);
    });

    it('should report quoted keys', () => {
      const error = captureError(() => parse('{"a": 1;}'));

      expect(error.kind).toBe(ErrorKind.UNEXPECTED_TOKEN);
      expect(error.message).toBe(`Unexpected string "a", expected identifier or '}'`);
    });

    it('should report a bare node at top level', () => {
      const error = captureError(() => parse('key: 1;'));

      expect(error.message).toBe(
        "Unexpected identifier 'key', expected string or number or '{' or '['"
      );
    });

    it('should report content after the document', () => {
      const error = captureError(() => parse('{} {}'));

      expect(error.kind).toBe(ErrorKind.UNEXPECTED_TOKEN);
      expect(error.message).toBe("Unexpected '{', expected end of input");
      expect(error.column).toBe(4);
    });

    it('should report a semicolon after the top-level object', () => {
      const error = captureError(() => parse('{a: 1;};'));

      expect(error.kind).toBe(ErrorKind.UNEXPECTED_TOKEN);
      expect(error.message).toBe("Unexpected ';', expected end of input");
      expect(error.column).toBe(8);
    });

    it('should report malformed numbers at their position', () => {
      const error = captureError(() => parse('{\n  ratio: 1.5f;\n}'));

      expect(summary(error)).toEqual({
        kind: ErrorKind.INVALID_NUMBER_LITERAL,
        message: "Number literal '1.5f' combines a decimal point with an 'f' suffix",
        line: 2,
        column: 10,
        offset: 11,
      });
    });

    it('should report integer overflow', () => {
      const error = captureError(() => parse('[9223372036854775808]'));

      expect(error.kind).toBe(ErrorKind.INTEGER_OVERFLOW);
      expect(error.column).toBe(2);
    });

    it('should attach the source for a code frame', () => {
      const error = captureError(() => parse('{key: 1}'));

      expect(error.toString()).toBe(
        "BonError [UnexpectedToken]: Unexpected '}', expected ';' at line 1, column 8\n" +
          '{key: 1}\n' +
          '       ^'
      );
    });
  });
});
