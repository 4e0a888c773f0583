/**
 * MarcDocument - A parsed view of one document's text
 */

import { detectFormat } from './format';
import { lexerFor, MarcLexer } from './lexer';
import { FALLBACK_RECORD_TYPE, recordTypeFromLeader } from './record-type';
import { SourceLine, splitLines } from './source';
import { MarcField, MarcFormat, RecordType } from './types';

export interface MarcDocumentOptions {
  format?: MarcFormat | undefined;
  source?: string | undefined;
}

export class MarcDocument {
  public readonly format: MarcFormat;
  public readonly lexer: MarcLexer;
  public readonly lines: readonly SourceLine[];

  constructor(text: string, options: MarcDocumentOptions = {}) {
    this.format = options.format ?? detectFormat(text);
    this.lexer = lexerFor(this.format);
    this.lines = splitLines(text, options.source);
  }

  public get lineCount(): number {
    return this.lines.length;
  }

  public lineAt(row: number): SourceLine | undefined {
    return this.lines[row];
  }

  public fieldAt(row: number): MarcField | null {
    const line = this.lineAt(row);
    if (!line || line.isBlank()) {
      return null;
    }
    return this.lexer.parseLine(line.text, line.lineNumber);
  }

  /**
   * Record type of the record containing `row`, from the nearest leader at or
   * above it.
   */
  public recordTypeAt(row: number): RecordType {
    for (let current = Math.min(row, this.lines.length - 1); current >= 0; current--) {
      const field = this.fieldAt(current);
      if (field?.kind === 'leader') {
        return recordTypeFromLeader(field.content);
      }
    }
    return FALLBACK_RECORD_TYPE;
  }
}
