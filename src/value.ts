/**
 * Value constructors, guards and structural comparison.
 * Trees built here are frozen; containers copy the arrays they are given.
 */

import {
  ValueKind,
  type BonValue,
  type BonString,
  type BonInteger,
  type BonFloat,
  type BonList,
  type BonObject,
  type BonNode,
} from './types';

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

export function createString(value: string): BonString {
  return Object.freeze({ kind: ValueKind.STRING, value });
}

export function createInteger(value: bigint | number): BonInteger {
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    throw new RangeError(`Not a safe integer: ${value}`);
  }
  const big = BigInt(value);
  if (big < INT64_MIN || big > INT64_MAX) {
    throw new RangeError(`Integer out of 64-bit range: ${big}`);
  }
  return Object.freeze({ kind: ValueKind.INTEGER, value: big });
}

export function createFloat(value: number): BonFloat {
  if (Number.isNaN(value)) {
    throw new RangeError('NaN cannot be represented as a BON float');
  }
  return Object.freeze({ kind: ValueKind.FLOAT, value });
}

export function createList(items: readonly BonValue[]): BonList {
  return Object.freeze({ kind: ValueKind.LIST, items: Object.freeze([...items]) });
}

export function createNode(key: string, value: BonValue): BonNode {
  return Object.freeze({ key, value });
}

export function createObject(nodes: readonly BonNode[]): BonObject {
  return Object.freeze({ kind: ValueKind.OBJECT, nodes: Object.freeze([...nodes]) });
}

export function isString(value: BonValue): value is BonString {
  return value.kind === ValueKind.STRING;
}

export function isInteger(value: BonValue): value is BonInteger {
  return value.kind === ValueKind.INTEGER;
}

export function isFloat(value: BonValue): value is BonFloat {
  return value.kind === ValueKind.FLOAT;
}

export function isList(value: BonValue): value is BonList {
  return value.kind === ValueKind.LIST;
}

export function isObject(value: BonValue): value is BonObject {
  return value.kind === ValueKind.OBJECT;
}

/**
 * Structural equality. Order matters for lists and objects; floats compare
 * with `Object.is`, so 0.0 and -0.0 differ.
 */
export function deepEquals(a: BonValue, b: BonValue): boolean {
  switch (a.kind) {
    case ValueKind.STRING:
      return b.kind === ValueKind.STRING && a.value === b.value;
    case ValueKind.INTEGER:
      return b.kind === ValueKind.INTEGER && a.value === b.value;
    case ValueKind.FLOAT:
      return b.kind === ValueKind.FLOAT && Object.is(a.value, b.value);
    case ValueKind.LIST:
      return (
        b.kind === ValueKind.LIST &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => deepEquals(item, b.items[i]))
      );
    case ValueKind.OBJECT:
      return (
        b.kind === ValueKind.OBJECT &&
        a.nodes.length === b.nodes.length &&
        a.nodes.every(
          (node, i) => node.key === b.nodes[i].key && deepEquals(node.value, b.nodes[i].value)
        )
      );
  }
}

/**
 * Value of the first node with `key`.
 */
export function getValue(object: BonObject, key: string): BonValue | undefined {
  return object.nodes.find(node => node.key === key)?.value;
}

/**
 * Values of every node with `key`, in document order.
 */
export function getAll(object: BonObject, key: string): BonValue[] {
  return object.nodes.filter(node => node.key === key).map(node => node.value);
}

export function hasKey(object: BonObject, key: string): boolean {
  return object.nodes.some(node => node.key === key);
}

export function keysOf(object: BonObject): string[] {
  return object.nodes.map(node => node.key);
}
