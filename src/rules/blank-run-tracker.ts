/**
 * Counts consecutive blank lines within one file's line stream.
 * Create a new tracker (or call `reset`) for every file.
 */
export class BlankRunTracker {
  private run = 0;

  /** Maximum number of blank lines allowed before a code line. */
  static readonly MAX_BLANK_LINES = 2;

  get count(): number {
    return this.run;
  }

  /**
   * Feed the next line. Returns true when `line` is a code line preceded by
   * more than MAX_BLANK_LINES blank lines.
   */
  observe(line: string): boolean {
    if (stripNewline(line) === '') {
      this.run += 1;
      return false;
    }
    const exceeded = this.run > BlankRunTracker.MAX_BLANK_LINES;
    this.run = 0;
    return exceeded;
  }

  reset(): void {
    this.run = 0;
  }
}

export function stripNewline(line: string): string {
  return line.replace(/\n+$/, '');
}
