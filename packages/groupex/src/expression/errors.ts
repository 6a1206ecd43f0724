/**
 * Error taxonomy for parsing and reduction.
 *
 * Codes are stable across versions and safe to match against. Every
 * error optionally carries `pos`, the character offset into the parsed
 * input where the problem was detected.
 *
 * @module expression/errors
 */

export const ParserErrorCode = {
  MISSING_OPERATOR: 'MISSING_OPERATOR',
  INVALID_OPERAND: 'INVALID_OPERAND',
  EMPTY_GROUP: 'EMPTY_GROUP',
  EVALUATION_FAILED: 'EVALUATION_FAILED',
  UNCLOSED_GROUP: 'UNCLOSED_GROUP',
} as const;

export type ParserErrorCode = (typeof ParserErrorCode)[keyof typeof ParserErrorCode];

export class ParserError extends Error {
  constructor(
    public readonly code: ParserErrorCode,
    public readonly detail: string,
    public readonly pos?: number,
    options?: { cause?: unknown },
  ) {
    super(pos === undefined ? detail : `${detail} at position ${pos}`, options);
    this.name = 'ParserError';
  }
}

/** Two operand-bearing nodes are adjacent with no operator between them. */
export class MissingOperatorError extends ParserError {
  constructor(detail: string, pos?: number) {
    super(ParserErrorCode.MISSING_OPERATOR, detail, pos);
    this.name = 'MissingOperatorError';
  }
}

/** An operator lacks an operand, or its left operand was never reduced. */
export class InvalidOperandError extends ParserError {
  constructor(detail: string, pos?: number) {
    super(ParserErrorCode.INVALID_OPERAND, detail, pos);
    this.name = 'InvalidOperandError';
  }
}

/** A group, or the whole input, contains nothing to reduce. */
export class EmptyGroupError extends ParserError {
  constructor(detail: string, pos?: number) {
    super(ParserErrorCode.EMPTY_GROUP, detail, pos);
    this.name = 'EmptyGroupError';
  }
}

/** A caller-supplied value or operator function threw. */
export class EvaluationError extends ParserError {
  constructor(detail: string, pos?: number, cause?: unknown) {
    super(ParserErrorCode.EVALUATION_FAILED, detail, pos, { cause });
    this.name = 'EvaluationError';
  }
}

/** The input ended while a grouping was still open. */
export class UnclosedGroupError extends ParserError {
  constructor(detail: string, pos?: number) {
    super(ParserErrorCode.UNCLOSED_GROUP, detail, pos);
    this.name = 'UnclosedGroupError';
  }
}

/**
 * Render an error as the input line with a caret under the offending
 * offset. Errors without a position render as their message alone.
 */
export function formatSyntaxError(input: string, error: ParserError): string {
  const header = `${error.name}: ${error.message}`;
  if (error.pos === undefined) {
    return header;
  }
  const caretAt = Math.min(error.pos, input.length);
  return [header, `  ${input}`, `  ${' '.repeat(caretAt)}^`].join('\n');
}
