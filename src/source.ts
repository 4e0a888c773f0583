import { SourceLocation } from './errors';

export class SourceLine {
  readonly text: string;
  // 0-based, matching editor line numbers
  readonly row: number;
  readonly source?: string | undefined;

  constructor(text: string, row: number, source?: string) {
    this.text = text;
    this.row = row;
    this.source = source;
  }

  get lineNumber(): number {
    return this.row + 1;
  }

  isBlank(): boolean {
    return /^\s*$/.test(this.text);
  }

  location(column?: number): SourceLocation {
    return {
      source: this.source,
      row: this.lineNumber,
      column: column === undefined ? undefined : column + 1,
      lineText: this.text,
    };
  }
}

/**
 * Split document text into lines. Blank lines are kept so that row numbers
 * line up with the editor; a trailing carriage return is dropped.
 */
export function splitLines(content: string, source?: string): SourceLine[] {
  if (!content) {
    return [];
  }
  return content.split('\n').map((text, row) => new SourceLine(text.replace(/\r$/, ''), row, source));
}
