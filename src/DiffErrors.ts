// file: src/DiffErrors.ts

/**
 * Raised when the input text does not match the unified-diff grammar.
 * The whole parse is abandoned; there is no partial result.
 */
export class DiffSyntaxError extends Error {
  /** 0-based character offset of the failure. */
  readonly offset: number;
  /** 1-based line number of the failure. */
  readonly line: number;
  /** 1-based column of the failure. */
  readonly column: number;
  /** What the grammar expected at this position. */
  readonly expected: string;

  constructor(input: string, offset: number, expected: string) {
    const lineStart = input.lastIndexOf('\n', offset - 1) + 1;
    const line = input.slice(0, lineStart).split('\n').length;
    const column = offset - lineStart + 1;
    super(`Invalid diff at line ${line}, column ${column}: expected ${expected}`);
    this.name = 'DiffSyntaxError';
    this.offset = offset;
    this.line = line;
    this.column = column;
    this.expected = expected;
  }
}

/**
 * Raised when the parser and grammar disagree about a structure the grammar guarantees.
 * Signals a defect in this package, not a malformed input.
 */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolation';
  }
}

/**
 * Asserts an internal invariant.
 * @throws InvariantViolation when `condition` is falsy.
 */
export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new InvariantViolation(message);
  }
}
