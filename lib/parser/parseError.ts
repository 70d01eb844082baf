/**
 * Parse error definitions.
 *
 * @module
 */

/** A 1-based line and column, plus the 0-based offset into the source. */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

/**
 * Computes the location of `offset` within `source`.
 */
export function locate(source: string, offset: number): SourceLocation {
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < offset && i < source.length; i++) {
    if (source[i] === "\n") {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: offset - lineStart + 1, offset };
}

/**
 * Raised on the first malformed token sequence. The message is prefixed with
 * `line:column:`.
 */
export class ParseError extends Error {
  readonly line: number;
  readonly column: number;
  readonly offset: number;

  constructor(
    public readonly reason: string,
    location: SourceLocation,
  ) {
    super(`${location.line}:${location.column}: ${reason}`);
    this.name = "ParseError";
    this.line = location.line;
    this.column = location.column;
    this.offset = location.offset;
  }
}
