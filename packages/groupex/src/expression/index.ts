/**
 * Grouped value/operator expressions.
 *
 * Parse a string into a tree of values, operators and groups, then reduce
 * it to a single result. The language is defined entirely by the
 * operators and groupings handed to the parser.
 *
 * @module expression
 *
 * @example
 * ```typescript
 * import { Grouping, OperatorBinary, OperatorUnary, Parser } from 'groupex';
 *
 * const parser = new Parser({
 *   operators: [
 *     new OperatorBinary('&&', (a, b) => Boolean(a) && Boolean(b)),
 *     new OperatorBinary('||', (a, b) => Boolean(a) || Boolean(b)),
 *     new OperatorUnary('!', (a) => !a),
 *   ],
 *   groupings: [new Grouping('(', ')')],
 * });
 *
 * const root = parser.parse('marley && (bob || stephen)');
 * const title = 'bob marley - jammin';
 * root.evaluate((word) => title.includes(word.toLowerCase())).value;
 * // true
 * ```
 */

export { Grouping } from './grouping.js';
export { OperatorUnary, OperatorBinary } from './operator.js';
export type { Operator, Arity, UnaryFn, BinaryFn } from './operator.js';

export { Group } from './group.js';
export { identity, describeNode } from './nodes.js';
export type { EvalFn, Node, ValueNode, OperatorNode, ResultNode } from './nodes.js';

export { Parser } from './parser.js';
export type { ParserOptions } from './parser.js';

export { consume, reduceGroup, reduceRoot } from './reducer.js';
export type { Fault, Reduction } from './reducer.js';

export {
  ParserError,
  ParserErrorCode,
  MissingOperatorError,
  InvalidOperandError,
  EmptyGroupError,
  EvaluationError,
  UnclosedGroupError,
  formatSyntaxError,
} from './errors.js';
