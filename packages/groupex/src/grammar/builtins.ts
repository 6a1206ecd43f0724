/**
 * Named functions a grammar file can bind to its values and operators.
 *
 * @module grammar/builtins
 */

import type { BinaryFn, UnaryFn } from '../expression/operator.js';
import type { EvalFn } from '../expression/nodes.js';

function toNumber(val: unknown): number {
  if (typeof val === 'number') return val;
  if (typeof val === 'string') {
    const n = Number(val);
    if (val.trim() === '' || isNaN(n)) {
      throw new Error(`Cannot convert string '${val}' to number`);
    }
    return n;
  }
  if (typeof val === 'boolean') return val ? 1 : 0;
  throw new Error(`Cannot convert ${typeof val} to number`);
}

export const VALUE_EVALUATORS = {
  text: (text) => text,
  lower: (text) => text.toLowerCase(),
  number: (text) => {
    const n = Number(text);
    if (!Number.isFinite(n)) {
      throw new Error(`'${text}' is not a number`);
    }
    return n;
  },
  boolean: (text) => {
    const normalized = text.toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
    throw new Error(`'${text}' is not a boolean`);
  },
} satisfies Record<string, EvalFn>;

export const BINARY_FUNCTIONS = {
  and: (l, r) => Boolean(l) && Boolean(r),
  or: (l, r) => Boolean(l) || Boolean(r),
  add: (l, r) => toNumber(l) + toNumber(r),
  subtract: (l, r) => toNumber(l) - toNumber(r),
  multiply: (l, r) => toNumber(l) * toNumber(r),
  divide: (l, r) => {
    const divisor = toNumber(r);
    if (divisor === 0) {
      throw new Error('Division by zero');
    }
    return toNumber(l) / divisor;
  },
  modulo: (l, r) => {
    const divisor = toNumber(r);
    if (divisor === 0) {
      throw new Error('Division by zero');
    }
    return toNumber(l) % divisor;
  },
  power: (l, r) => toNumber(l) ** toNumber(r),
  eq: (l, r) => l === r,
  neq: (l, r) => l !== r,
  lt: (l, r) => toNumber(l) < toNumber(r),
  gt: (l, r) => toNumber(l) > toNumber(r),
  lte: (l, r) => toNumber(l) <= toNumber(r),
  gte: (l, r) => toNumber(l) >= toNumber(r),
  concat: (l, r) => String(l) + String(r),
} satisfies Record<string, BinaryFn>;

export const UNARY_FUNCTIONS = {
  not: (v) => !v,
  negate: (v) => -toNumber(v),
  abs: (v) => Math.abs(toNumber(v)),
} satisfies Record<string, UnaryFn>;

export type ValueEvaluatorName = keyof typeof VALUE_EVALUATORS;
export type BinaryFunctionName = keyof typeof BINARY_FUNCTIONS;
export type UnaryFunctionName = keyof typeof UNARY_FUNCTIONS;

function hasKey<T extends object>(table: T, key: string): key is Extract<keyof T, string> {
  return Object.prototype.hasOwnProperty.call(table, key);
}

export function isValueEvaluatorName(name: string): name is ValueEvaluatorName {
  return hasKey(VALUE_EVALUATORS, name);
}

export function isBinaryFunctionName(name: string): name is BinaryFunctionName {
  return hasKey(BINARY_FUNCTIONS, name);
}

export function isUnaryFunctionName(name: string): name is UnaryFunctionName {
  return hasKey(UNARY_FUNCTIONS, name);
}
