/**
 * Node kinds of a parsed expression tree.
 *
 * The set is closed: reduction dispatches over `kind` and the compiler
 * checks the switch is exhaustive.
 *
 * @module expression/nodes
 */

import type { Operator } from './operator.js';
import type { Group } from './group.js';

/** Turns the raw text of a value into whatever the operators work on. */
export type EvalFn = (text: string) => unknown;

export const identity: EvalFn = (text) => text;

export interface ValueNode {
  kind: 'value';
  /** Trimmed source text. */
  text: string;
  evalFn: EvalFn;
  /** Offset of the first character of `text` in the input. */
  start: number;
  /** Offset just past the last character of `text`. */
  end: number;
}

export interface OperatorNode {
  kind: 'operator';
  operator: Operator;
  offset: number;
}

export interface ResultNode {
  kind: 'result';
  value: unknown;
  /** Offset of the first source character this result accounts for. */
  offset: number;
  /** Offset just past the last source character this result accounts for. */
  end: number;
  /**
   * Characters of values, operator representations and grouping delimiters
   * folded into this result. Whitespace between tokens is not counted.
   */
  consumedLength: number;
}

export type Node = ValueNode | OperatorNode | Group | ResultNode;

export function describeNode(node: Node): string {
  switch (node.kind) {
    case 'value':
      return `Value(${node.text})`;
    case 'operator':
      return `Op(${node.operator})`;
    case 'result':
      return `Result(${String(node.value)})`;
    case 'group':
      return node.toString();
  }
}

