/**
 * Grammar file schema and validation.
 *
 * @module grammar/schema
 */

import type { Arity } from '../expression/operator.js';
import {
  isBinaryFunctionName,
  isUnaryFunctionName,
  isValueEvaluatorName,
  type ValueEvaluatorName,
} from './builtins.js';

export interface OperatorConfig {
  symbol: string;
  arity: Arity;
  /** Name of a built-in function of the same arity. */
  fn: string;
}

export interface GroupingConfig {
  start: string;
  end: string;
}

export interface GrammarConfig {
  version: 1;
  name: string;
  values: ValueEvaluatorName;
  operators: OperatorConfig[];
  groupings: GroupingConfig[];
}

export type GrammarValidation =
  | { valid: true; config: GrammarConfig }
  | { valid: false; errors: string[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

function validateOperator(entry: unknown, at: string, errors: string[]): OperatorConfig | null {
  if (!isRecord(entry)) {
    errors.push(`${at} must be an object`);
    return null;
  }

  const { symbol, arity, fn } = entry;
  let valid = true;

  if (!isNonEmptyString(symbol)) {
    errors.push(`${at}.symbol must be a non-empty string`);
    valid = false;
  }
  if (arity !== 'unary' && arity !== 'binary') {
    errors.push(`${at}.arity must be 'unary' or 'binary'`);
    return null;
  }
  if (typeof fn !== 'string') {
    errors.push(`${at}.fn must be a string`);
    return null;
  }

  const known = arity === 'unary' ? isUnaryFunctionName(fn) : isBinaryFunctionName(fn);
  if (!known) {
    errors.push(`${at}.fn '${fn}' is not a built-in ${arity} function`);
    valid = false;
  }

  return valid && isNonEmptyString(symbol) ? { symbol, arity, fn } : null;
}

function validateGrouping(entry: unknown, at: string, errors: string[]): GroupingConfig | null {
  if (!isRecord(entry)) {
    errors.push(`${at} must be an object`);
    return null;
  }

  const { start, end } = entry;
  if (!isNonEmptyString(start) || !isNonEmptyString(end)) {
    errors.push(`${at} needs non-empty 'start' and 'end' strings`);
    return null;
  }
  return { start, end };
}

/**
 * Validate a parsed grammar document, collecting every issue found.
 */
export function validateGrammarConfig(config: unknown): GrammarValidation {
  if (!isRecord(config)) {
    return { valid: false, errors: ['Grammar must be an object'] };
  }

  const { version, name, values: valuesName, operators: operatorEntries, groupings: groupingEntries } = config;
  const errors: string[] = [];

  if (version !== 1) {
    errors.push('version must be 1');
  }

  if (!isNonEmptyString(name)) {
    errors.push('name must be a non-empty string');
  }

  let values: ValueEvaluatorName = 'text';
  if (valuesName !== undefined) {
    if (typeof valuesName === 'string' && isValueEvaluatorName(valuesName)) {
      values = valuesName;
    } else {
      errors.push('values must be one of: text, lower, number, boolean');
    }
  }

  const operators: OperatorConfig[] = [];
  if (!Array.isArray(operatorEntries)) {
    errors.push('operators must be an array');
  } else {
    operatorEntries.forEach((entry: unknown, i) => {
      const op = validateOperator(entry, `operators[${i}]`, errors);
      if (op) operators.push(op);
    });
  }

  const groupings: GroupingConfig[] = [];
  if (groupingEntries !== undefined) {
    if (!Array.isArray(groupingEntries)) {
      errors.push('groupings must be an array');
    } else {
      groupingEntries.forEach((entry: unknown, i) => {
        const grouping = validateGrouping(entry, `groupings[${i}]`, errors);
        if (grouping) groupings.push(grouping);
      });
    }
  }

  if (errors.length > 0 || !isNonEmptyString(name)) {
    return { valid: false, errors };
  }

  return {
    valid: true,
    config: { version: 1, name, values, operators, groupings },
  };
}
