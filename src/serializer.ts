/**
 * BON Serializer - Converts value trees to canonical BON text
 * Features:
 * - Pretty (one node per line) or compact output
 * - Floats always carry a decimal point or exponent
 * - Deterministic: equal trees give equal text
 */

import { ValueKind, type BonValue, type BonNode, type SerializerOptions } from './types';

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export class Serializer {
  private options: Required<SerializerOptions>;
  private indentStr: string;

  constructor(options: SerializerOptions = {}) {
    this.options = {
      pretty: options.pretty ?? true,
      indent: options.indent ?? 2,
      sortKeys: options.sortKeys ?? false,
    };
    this.indentStr = this.resolveIndent(this.options.indent);
  }

  /**
   * Serialize a value tree to BON text
   */
  public serialize(value: BonValue): string {
    return this.serializeValue(value, 0);
  }

  private serializeValue(value: BonValue, level: number): string {
    switch (value.kind) {
      case ValueKind.STRING:
        return this.quoteString(value.value);
      case ValueKind.INTEGER:
        return value.value.toString();
      case ValueKind.FLOAT:
        return this.serializeFloat(value.value);
      case ValueKind.LIST:
        return this.serializeList(value.items, level);
      case ValueKind.OBJECT:
        return this.serializeObject(value.nodes, level);
    }
  }

  private quoteString(str: string): string {
    let result = '"';
    for (const char of str) {
      switch (char) {
        case '"':
          result += '\\"';
          break;
        case '\\':
          result += '\\\\';
          break;
        case '\n':
          result += '\\n';
          break;
        case '\t':
          result += '\\t';
          break;
        case '\r':
          result += '\\r';
          break;
        default:
          result += char;
      }
    }
    result += '"';
    return result;
  }

  private serializeFloat(num: number): string {
    if (Number.isNaN(num)) {
      throw new RangeError('Cannot serialize NaN');
    }
    // No infinity literal; an exponent this large overflows back to it
    if (num === Infinity) return '1e999';
    if (num === -Infinity) return '-1e999';
    if (Object.is(num, -0)) return '-0.0';

    const text = String(num);
    return /[.eE]/.test(text) ? text : `${text}.0`;
  }

  private serializeList(items: readonly BonValue[], level: number): string {
    const separator = this.options.pretty ? ', ' : ',';
    return '[' + items.map(item => this.serializeValue(item, level)).join(separator) + ']';
  }

  private serializeObject(nodes: readonly BonNode[], level: number): string {
    if (nodes.length === 0) {
      return '{}';
    }

    const ordered = this.options.sortKeys
      ? [...nodes].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
      : nodes;

    if (!this.options.pretty) {
      return '{' + ordered.map(node => `${this.serializeKey(node.key)}:${this.serializeValue(node.value, level + 1)};`).join('') + '}';
    }

    const inner = this.indentStr.repeat(level + 1);
    const lines = ordered.map(
      node => `${inner}${this.serializeKey(node.key)}: ${this.serializeValue(node.value, level + 1)};`
    );
    return '{\n' + lines.join('\n') + '\n' + this.indentStr.repeat(level) + '}';
  }

  private serializeKey(key: string): string {
    if (!IDENTIFIER_PATTERN.test(key)) {
      throw new TypeError(`Cannot serialize key ${JSON.stringify(key)}: not an identifier`);
    }
    return key;
  }

  private resolveIndent(indent: number | string): string {
    if (typeof indent === 'number') {
      if (!Number.isInteger(indent) || indent < 0) {
        throw new RangeError(`Indent must be a non-negative integer, got ${indent}`);
      }
      return ' '.repeat(indent);
    }
    if (!/^[ \t]*$/.test(indent)) {
      throw new RangeError(`Indent must contain only spaces and tabs, got ${JSON.stringify(indent)}`);
    }
    return indent;
  }
}
