/**
 * Source Locations - Byte ranges into source files
 *
 * Locations are produced upstream (by the lexer and parser) and used by the
 * inference pass for two things: naming (two locations name the same thing
 * iff their text is equal) and diagnostics.
 */

/**
 * Line and column of an offset, both 1-based
 */
export interface LineCol {
  readonly line: number;
  readonly column: number;
}

/**
 * A source file: a path and its contents.
 * Interned names live in sources with an empty path.
 */
export class Source {
  private lineStarts: number[] | undefined;

  constructor(
    readonly path: string,
    readonly contents: string
  ) {}

  /**
   * Convert a byte offset into a line and column
   */
  linecol(offset: number): LineCol {
    const starts = this.getLineStarts();
    let lo = 0;
    let hi = starts.length - 1;

    // Last line start that is <= offset
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if ((starts[mid] ?? 0) <= offset) {
        lo = mid;
      } else {
        hi = mid - 1;
      }
    }

    return { line: lo + 1, column: offset - (starts[lo] ?? 0) + 1 };
  }

  private getLineStarts(): number[] {
    if (!this.lineStarts) {
      const starts = [0];
      for (let i = 0; i < this.contents.length; i++) {
        if (this.contents[i] === '\n') {
          starts.push(i + 1);
        }
      }
      this.lineStarts = starts;
    }
    return this.lineStarts;
  }
}

/**
 * A byte range [start, end) in a source
 */
export class Location {
  constructor(
    readonly source: Source,
    readonly start: number,
    readonly end: number
  ) {}

  /**
   * The text covered by this location
   */
  view(): string {
    return this.source.contents.slice(this.start, this.end);
  }

  /**
   * Names compare by text, not by position
   */
  equals(other: Location): boolean {
    return this === other || this.view() === other.view();
  }

  /** True for locations that point into a real file */
  isFile(): boolean {
    return this.source.path !== '';
  }

  toString(): string {
    if (!this.isFile()) {
      return this.view();
    }
    const { line, column } = this.source.linecol(this.start);
    return `${this.source.path}:${line}:${column}`;
  }
}
