/**
 * Left-to-right parser for grouped values and operators.
 *
 * At each position the first match wins, in this order:
 *   1. the start delimiter of any configured grouping (descend)
 *   2. the end delimiter of the current group's grouping (ascend)
 *   3. any configured operator, in configured order
 *   4. otherwise the character joins the pending value text
 *
 * There is no precedence: operators reduce left to right and groupings
 * are the only way to change that. When one operator's representation is
 * a prefix of another's, list the longer one first.
 *
 * @module expression/parser
 */

import type { Logger } from '../utils/logger.js';
import { createLogger } from '../utils/logger.js';
import { Group } from './group.js';
import type { Grouping } from './grouping.js';
import type { EvalFn } from './nodes.js';
import { identity } from './nodes.js';
import type { Operator } from './operator.js';
import { UnclosedGroupError } from './errors.js';

export interface ParserOptions {
  /** Ordered: the first listed operator matching at a position wins. */
  operators: readonly Operator[];
  groupings: readonly Grouping[];
  logger?: Logger;
}

interface PendingValue {
  text: string;
  start: number;
}

export class Parser {
  readonly operators: readonly Operator[];
  readonly groupings: readonly Grouping[];
  private readonly logger: Logger;

  constructor(options: ParserOptions) {
    this.operators = options.operators;
    this.groupings = options.groupings;
    this.logger = options.logger ?? createLogger('silent');
  }

  /**
   * Parse `input` into a group tree.
   *
   * @param defaultEval - Stored on every value; used when `evaluate` is
   *   called without its own function
   * @throws {UnclosedGroupError} If the input ends inside a grouping
   */
  parse(input: string, defaultEval: EvalFn = identity): Group {
    const root = new Group(undefined, undefined, 0);
    let current = root;
    let pending: PendingValue = { text: '', start: 0 };
    let index = 0;

    const flush = (): void => {
      const trimmed = pending.text.trim();
      if (trimmed.length > 0) {
        const start = pending.start + (pending.text.length - pending.text.trimStart().length);
        current.children.push({
          kind: 'value',
          text: trimmed,
          evalFn: defaultEval,
          start,
          end: start + trimmed.length,
        });
      }
      pending = { text: '', start: index };
    };

    scan: while (index < input.length) {
      for (const grouping of this.groupings) {
        if (input.startsWith(grouping.start, index)) {
          flush();
          const group = new Group(current, grouping, index);
          current.children.push(group);
          current = group;
          index += grouping.start.length;
          pending.start = index;
          continue scan;
        }
      }

      if (current.grouping && current.parent && input.startsWith(current.grouping.end, index)) {
        flush();
        index += current.grouping.end.length;
        current.end = index;
        current = current.parent;
        pending.start = index;
        continue;
      }

      for (const operator of this.operators) {
        if (input.startsWith(operator.representation, index)) {
          flush();
          current.children.push({ kind: 'operator', operator, offset: index });
          index += operator.representation.length;
          pending.start = index;
          continue scan;
        }
      }

      pending.text += input[index];
      index++;
    }

    flush();

    if (current.grouping) {
      throw new UnclosedGroupError(
        `Grouping '${current.grouping.start}' is never closed by '${current.grouping.end}'`,
        current.start,
      );
    }

    root.end = input.length;
    this.logger.debug('Parsed expression', { length: input.length, nodes: root.size });
    return root;
  }
}
