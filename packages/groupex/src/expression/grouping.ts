/**
 * Delimiter pairs that frame an explicit sub-expression.
 *
 * @module expression/grouping
 */

export class Grouping {
  constructor(
    public readonly start: string,
    public readonly end: string,
  ) {
    if (start.length === 0 || end.length === 0) {
      throw new TypeError('Grouping delimiters must be non-empty strings');
    }
  }

  /** Combined length of both delimiters. */
  get length(): number {
    return this.start.length + this.end.length;
  }
}
