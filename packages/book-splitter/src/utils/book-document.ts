/**
 * BookDocument
 *
 * Plain-text book split into 1-indexed lines exactly once. Every pipeline
 * stage reads lines through the same instance, so line numbers agree across
 * scanning, reconciliation and materialization.
 */
export class BookDocument {
  readonly text: string;
  private readonly lines: readonly string[];

  constructor(text: string) {
    this.text = text;
    this.lines = Object.freeze(text.split(/\r?\n/));
  }

  /**
   * Number of lines (an empty text has one empty line)
   */
  get lineCount(): number {
    return this.lines.length;
  }

  /**
   * First `length` characters of the text
   */
  prefix(length: number): string {
    return this.text.slice(0, length);
  }

  /**
   * Get one line by 1-indexed line number
   *
   * @throws {RangeError} When lineNo is outside 1..lineCount
   */
  getLine(lineNo: number): string {
    this.assertLineNo(lineNo);
    return this.lines[lineNo - 1];
  }

  /**
   * Lines [startLineNo, endLineNo) joined with newlines
   *
   * endLineNo may be lineCount + 1 to include the last line.
   */
  sliceLines(startLineNo: number, endLineNo: number): string {
    if (
      !Number.isInteger(startLineNo) ||
      !Number.isInteger(endLineNo) ||
      startLineNo < 1 ||
      endLineNo > this.lines.length + 1 ||
      startLineNo > endLineNo
    ) {
      throw new RangeError(
        `Invalid line range [${startLineNo}, ${endLineNo}) for ${this.lines.length} lines`,
      );
    }
    return this.lines.slice(startLineNo - 1, endLineNo - 1).join('\n');
  }

  /**
   * Iterate lines with their 1-indexed line numbers
   */
  *entries(): IterableIterator<[lineNo: number, line: string]> {
    for (let index = 0; index < this.lines.length; index++) {
      yield [index + 1, this.lines[index]];
    }
  }

  private assertLineNo(lineNo: number): void {
    if (!Number.isInteger(lineNo) || lineNo < 1 || lineNo > this.lines.length) {
      throw new RangeError(
        `Line ${lineNo} is outside 1..${this.lines.length}`,
      );
    }
  }
}
