/**
 * Reduction engine: collapses a group tree into a single result.
 *
 * Every node kind "consumes" itself at `items[index]`, replacing itself
 * (and any operands it absorbs) with a result node in place. Steps report
 * problems as faults instead of throwing; `reduceRoot` converts the first
 * fault into the matching error class.
 *
 * @module expression/reducer
 */

import type { Group } from './group.js';
import type { EvalFn, Node, OperatorNode, ResultNode, ValueNode } from './nodes.js';
import type { OperatorBinary, OperatorUnary } from './operator.js';
import {
  EmptyGroupError,
  EvaluationError,
  InvalidOperandError,
  MissingOperatorError,
  ParserErrorCode,
  type ParserError,
} from './errors.js';

type FaultCode = Exclude<ParserErrorCode, 'UNCLOSED_GROUP'>;

export interface Fault {
  code: FaultCode;
  message: string;
  pos?: number;
  cause?: unknown;
}

export type Reduction<T> = { ok: true; value: T } | { ok: false; fault: Fault };

const ok = <T>(value: T): Reduction<T> => ({ ok: true, value });

const fail = <T>(code: FaultCode, message: string, pos?: number, cause?: unknown): Reduction<T> => ({
  ok: false,
  fault: { code, message, pos, cause },
});

/**
 * Reduce a group whose tree may be consumed, returning its single result.
 *
 * @throws {ParserError}
 */
export function reduceRoot(group: Group, func?: EvalFn): ResultNode {
  const reduced = reduceGroup(group, func);
  if (!reduced.ok) {
    throw toError(reduced.fault);
  }
  return reduced.value;
}

export function toError(fault: Fault): ParserError {
  switch (fault.code) {
    case ParserErrorCode.MISSING_OPERATOR:
      return new MissingOperatorError(fault.message, fault.pos);
    case ParserErrorCode.INVALID_OPERAND:
      return new InvalidOperandError(fault.message, fault.pos);
    case ParserErrorCode.EMPTY_GROUP:
      return new EmptyGroupError(fault.message, fault.pos);
    case ParserErrorCode.EVALUATION_FAILED:
      return new EvaluationError(fault.message, fault.pos, fault.cause);
  }
}

/**
 * Consume `items[index]` in place.
 *
 * On success the value is the index where the produced result now sits.
 * That is `index` itself, except for a binary operator, whose result
 * takes its left operand's slot.
 */
export function consume(items: Node[], index: number, func?: EvalFn): Reduction<number> {
  const node = items[index];
  switch (node.kind) {
    case 'result':
      return ok(index);
    case 'value':
      return consumeValue(items, index, node, func);
    case 'operator':
      return node.operator.arity === 'unary'
        ? consumeUnary(items, index, node, node.operator, func)
        : consumeBinary(items, index, node, node.operator, func);
    case 'group': {
      const reduced = reduceGroup(node, func);
      if (!reduced.ok) return reduced;
      items[index] = reduced.value;
      return ok(index);
    }
  }
}

function consumeValue(
  items: Node[],
  index: number,
  node: ValueNode,
  func: EvalFn | undefined,
): Reduction<number> {
  const evalFn = func ?? node.evalFn;
  let value: unknown;
  try {
    value = evalFn(node.text);
  } catch (error) {
    return fail(
      ParserErrorCode.EVALUATION_FAILED,
      `Evaluating value '${node.text}' failed: ${errorMessage(error)}`,
      node.start,
      error,
    );
  }
  items[index] = {
    kind: 'result',
    value,
    offset: node.start,
    end: node.end,
    consumedLength: node.text.length,
  };
  return ok(index);
}

function consumeUnary(
  items: Node[],
  index: number,
  node: OperatorNode,
  operator: OperatorUnary,
  func: EvalFn | undefined,
): Reduction<number> {
  if (index + 1 >= items.length) {
    return fail(ParserErrorCode.INVALID_OPERAND, 'Right operand is missing', node.offset);
  }

  const right = reduceOperand(items, index + 1, func);
  if (!right.ok) return right;

  let value: unknown;
  try {
    value = operator.func(right.value.value);
  } catch (error) {
    return fail(
      ParserErrorCode.EVALUATION_FAILED,
      `Operator '${operator}' failed: ${errorMessage(error)}`,
      node.offset,
      error,
    );
  }

  items.splice(index, 2, {
    kind: 'result',
    value,
    offset: node.offset,
    end: right.value.end,
    consumedLength: operator.length + right.value.consumedLength,
  });
  return ok(index);
}

function consumeBinary(
  items: Node[],
  index: number,
  node: OperatorNode,
  operator: OperatorBinary,
  func: EvalFn | undefined,
): Reduction<number> {
  if (index === 0 || index + 1 >= items.length) {
    return fail(ParserErrorCode.INVALID_OPERAND, 'Left or right operand is missing', node.offset);
  }

  const left = items[index - 1];
  if (left.kind !== 'result') {
    return fail(ParserErrorCode.INVALID_OPERAND, 'Left operand is not reduced', node.offset);
  }

  const right = reduceOperand(items, index + 1, func);
  if (!right.ok) return right;

  let value: unknown;
  try {
    value = operator.func(left.value, right.value.value);
  } catch (error) {
    return fail(
      ParserErrorCode.EVALUATION_FAILED,
      `Operator '${operator}' failed: ${errorMessage(error)}`,
      node.offset,
      error,
    );
  }

  items.splice(index - 1, 3, {
    kind: 'result',
    value,
    offset: left.offset,
    end: right.value.end,
    consumedLength: left.consumedLength + operator.length + right.value.consumedLength,
  });
  return ok(index - 1);
}

/** Consume the operand at `index` and hand back the result left there. */
function reduceOperand(items: Node[], index: number, func: EvalFn | undefined): Reduction<ResultNode> {
  const consumed = consume(items, index, func);
  if (!consumed.ok) return consumed;
  const operand = items[consumed.value];
  if (operand.kind !== 'result') {
    return fail(ParserErrorCode.INVALID_OPERAND, 'Operand did not reduce to a result');
  }
  return ok(operand);
}

/**
 * Reduce every child of `group` left to right into one result.
 *
 * Each consumed child must end up at position 0: anything else means an
 * operand sat next to the already reduced prefix with no operator between.
 */
export function reduceGroup(group: Group, func?: EvalFn): Reduction<ResultNode> {
  const children = group.children;
  let index = 0;

  while (index < children.length) {
    const consumed = consume(children, index, func);
    if (!consumed.ok) {
      return positioned(consumed.fault, cursorOffset(group));
    }

    if (consumed.value !== 0) {
      const reduced = children[0];
      const pos = reduced.kind === 'result' ? reduced.end : cursorOffset(group);
      return fail(ParserErrorCode.MISSING_OPERATOR, 'An operator is missing', pos);
    }
    index = consumed.value + 1;
  }

  if (children.length === 0) {
    return fail(
      ParserErrorCode.EMPTY_GROUP,
      group.grouping ? 'Group is empty' : 'Expression is empty',
      group.start,
    );
  }
  const only = children[0];
  if (only.kind !== 'result') {
    return fail(ParserErrorCode.INVALID_OPERAND, 'Group did not reduce to a result', group.start);
  }

  if (group.grouping === undefined) {
    return ok(only);
  }
  const framed: ResultNode = {
    kind: 'result',
    value: only.value,
    offset: group.start,
    end: group.end,
    consumedLength: only.consumedLength + group.grouping.length,
  };
  return ok(framed);
}

/**
 * Offset of the first child not yet reduced: just past the reduced prefix
 * if there is one, else just inside the group's start delimiter.
 */
function cursorOffset(group: Group): number {
  if (group.children.length > 0) {
    const first = group.children[0];
    if (first.kind === 'result') return first.end;
  }
  return group.start + (group.grouping?.start.length ?? 0);
}

/**
 * Give a fault that reached a group without a position the group's cursor
 * offset. The consume steps record where each fault was detected; only the
 * guard in `reduceOperand` has no position, and parsed trees never reach it.
 */
function positioned<T>(fault: Fault, pos: number): Reduction<T> {
  return { ok: false, fault: fault.pos === undefined ? { ...fault, pos } : fault };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
