/**
 * Operator bindings: a literal representation string mapped to the
 * function that reduces its operand(s).
 *
 * Operands are whatever the caller's value evaluator produced; nothing
 * here checks their types.
 *
 * @module expression/operator
 */

export type UnaryFn = (operand: unknown) => unknown;
export type BinaryFn = (left: unknown, right: unknown) => unknown;

export type Arity = 'unary' | 'binary';

abstract class OperatorBase {
  abstract readonly arity: Arity;

  constructor(public readonly representation: string) {
    if (representation.length === 0) {
      throw new TypeError('Operator representation must be a non-empty string');
    }
  }

  get length(): number {
    return this.representation.length;
  }

  toString(): string {
    return this.representation;
  }
}

/** Consumes the operand to its right. */
export class OperatorUnary extends OperatorBase {
  readonly arity = 'unary';

  constructor(
    representation: string,
    public readonly func: UnaryFn,
  ) {
    super(representation);
  }
}

/** Consumes the operands to its left and right. */
export class OperatorBinary extends OperatorBase {
  readonly arity = 'binary';

  constructor(
    representation: string,
    public readonly func: BinaryFn,
  ) {
    super(representation);
  }
}

export type Operator = OperatorUnary | OperatorBinary;
