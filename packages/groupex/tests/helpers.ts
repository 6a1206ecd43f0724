import { Grouping, OperatorBinary, OperatorUnary, Parser, Group } from '../src/expression/index.js';

export const and = new OperatorBinary('&&', (a, b) => Boolean(a) && Boolean(b));
export const or = new OperatorBinary('||', (a, b) => Boolean(a) || Boolean(b));
export const not = new OperatorUnary('!', (a) => !a);
export const parens = new Grouping('(', ')');

export function booleanParser(): Parser {
  return new Parser({ operators: [and, or, not], groupings: [parens] });
}

export function arithmeticParser(): Parser {
  return new Parser({
    operators: [
      new OperatorBinary('+', (a, b) => Number(a) + Number(b)),
      new OperatorBinary('-', (a, b) => Number(a) - Number(b)),
      new OperatorBinary('*', (a, b) => Number(a) * Number(b)),
      new OperatorUnary('~', (a) => -Number(a)),
    ],
    groupings: [parens],
  });
}

export function groupAt(group: Group, index: number): Group {
  const node = group.children[index];
  if (!(node instanceof Group)) {
    throw new Error(`Expected a group at index ${index}`);
  }
  return node;
}

export function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error('Expected an error to be thrown');
}
