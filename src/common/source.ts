// Source information for position lookups and error reporting.

/**
 * Line and column of an offset, both 1-based.
 */
export interface SourceLocation {
  line: number;
  column: number;
}

/**
 * Source text of a SQL file together with its line table.
 */
export class SourceInfo {
  /** Offsets at which each line after the first starts */
  private readonly lineOffsets: number[];

  constructor(
    readonly source: string,
    readonly description = "<input>"
  ) {
    const offsets: number[] = [];
    for (let i = 0; i < source.length; i++) {
      if (source[i] === "\n") {
        offsets.push(i + 1);
      }
    }
    this.lineOffsets = offsets;
  }

  /**
   * Number of lines in the source.
   */
  get lineCount(): number {
    return this.lineOffsets.length + 1;
  }

  /**
   * Compute offset from line and column (both 1-based). Returns -1 when out of range.
   */
  getOffset(line: number, column: number): number {
    if (line === 1) {
      return column - 1;
    }
    if (line < 1 || line > this.lineOffsets.length + 1) {
      return -1;
    }
    const lineOffset = this.lineOffsets[line - 2];
    if (lineOffset === undefined) {
      return -1;
    }
    return lineOffset + column - 1;
  }

  /**
   * Get location (line, column) from offset.
   */
  getLocation(offset: number): SourceLocation {
    // Number of line starts at or before the offset.
    let low = 0;
    let high = this.lineOffsets.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      const lineOffset = this.lineOffsets[mid];
      if (lineOffset !== undefined && lineOffset <= offset) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    const lineStart = low === 0 ? 0 : (this.lineOffsets[low - 1] ?? 0);
    return { line: low + 1, column: offset - lineStart + 1 };
  }
}
