/**
 * Group nodes: ordered children framed by a grouping (none for the root).
 *
 * @module expression/group
 */

import type { Grouping } from './grouping.js';
import type { EvalFn, Node, ResultNode } from './nodes.js';
import { describeNode } from './nodes.js';
import { reduceRoot } from './reducer.js';

export class Group {
  readonly kind = 'group';
  readonly children: Node[] = [];
  /** Offset just past the end delimiter, or the input length for the root. */
  end: number;

  constructor(
    /** Enclosing group. Not owned; only used to walk upward. */
    public readonly parent: Group | undefined,
    public readonly grouping: Grouping | undefined,
    /** Offset of the start delimiter, or 0 for the root. */
    public readonly start: number,
  ) {
    this.end = start;
  }

  /** Number of nodes in this subtree, this group included. */
  get size(): number {
    let total = 1;
    for (const child of this.children) {
      total += child.kind === 'group' ? child.size : 1;
    }
    return total;
  }

  /**
   * Independent copy of this subtree. Groupings, operators and value
   * functions are immutable configuration and are shared.
   */
  clone(parent: Group | undefined = this.parent): Group {
    const copy = new Group(parent, this.grouping, this.start);
    copy.end = this.end;
    for (const child of this.children) {
      copy.children.push(child.kind === 'group' ? child.clone(copy) : { ...child });
    }
    return copy;
  }

  /**
   * Reduce a clone of this group to a single result, leaving this tree
   * untouched so it can be evaluated again.
   *
   * Exceptions thrown by value or operator functions do not escape as
   * thrown: they arrive wrapped in an `EvaluationError` positioned at
   * the failing node, with the original exception as its `cause`. Callers
   * that catch their own error types should check `error.cause`.
   *
   * @param func - Replaces every value's own evaluation function for this run
   * @throws {ParserError} The first syntax or evaluation problem found
   */
  evaluate(func?: EvalFn): ResultNode {
    return reduceRoot(this.clone(), func);
  }

  toString(): string {
    return `Group(${this.children.map(describeNode).join(',')})`;
  }
}
