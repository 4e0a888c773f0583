/**
 * MARC Parser - Group the fields of a document into records
 */

import * as fs from 'fs';
import { createMarcError } from './errors';
import { MarcDocument } from './document';
import { SourceLine } from './source';
import { LeaderField, MarcField, MarcParserOptions, MarcRecord } from './types';

function raiseParseError(message: string, line: SourceLine): never {
  const column = line.text.length - line.text.trimStart().length;
  throw createMarcError(message, line.location(column));
}

class RecordBuilder {
  private readonly records: MarcRecord[] = [];
  private leader: LeaderField | null = null;
  private fields: MarcField[] = [];

  add(field: MarcField): void {
    if (field.kind === 'leader') {
      // A leader closes whatever record is open
      if (this.leader || this.fields.length > 0) {
        this.flush();
      }
      this.leader = field;
      return;
    }
    this.fields.push(field);
  }

  finish(): MarcRecord[] {
    if (this.leader || this.fields.length > 0) {
      this.flush();
    }
    return this.records;
  }

  private flush(): void {
    this.records.push({ leader: this.leader, fields: this.fields });
    this.leader = null;
    this.fields = [];
  }
}

/**
 * Parse a whole document. Blank lines and lines that are not MARC at all are
 * skipped. A MARC line that does not parse is skipped too, unless `strict` is
 * set, in which case the first one throws.
 */
export function parseDocument(text: string, options: MarcParserOptions = {}): MarcRecord[] {
  const document = new MarcDocument(text, { format: options.format, source: options.source });
  const builder = new RecordBuilder();

  for (let row = 0; row < document.lineCount; row++) {
    const line = document.lineAt(row);
    if (!line || line.isBlank()) {
      continue;
    }
    const field = document.fieldAt(row);
    if (field) {
      builder.add(field);
    } else if (options.strict && document.lexer.isMarcLine(line.text)) {
      raiseParseError('Invalid MARC line format', line);
    }
  }

  return builder.finish();
}

// ============================================================================
// Public API
// ============================================================================

export class MarcParser {
  private readonly options: MarcParserOptions;

  constructor(options: MarcParserOptions = {}) {
    this.options = options;
  }

  public static parse(content: string, options?: MarcParserOptions): MarcRecord[] {
    const parser = new MarcParser(options);
    return parser.parseContent(content);
  }

  public static parseFile(filePath: string, options?: MarcParserOptions): MarcRecord[] {
    const parser = new MarcParser(options);
    return parser.parseFile(filePath);
  }

  public parseContent(content: string): MarcRecord[] {
    return parseDocument(content, this.options);
  }

  public parseFile(filePath: string): MarcRecord[] {
    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
      throw createMarcError(`Can only load path if is a regular file: ${filePath}`, { source: filePath });
    }
    const content = fs.readFileSync(filePath, 'utf-8');
    return parseDocument(content, { ...this.options, source: this.options.source ?? filePath });
  }
}

export function load(filePath: string, options?: MarcParserOptions): MarcRecord[] {
  return MarcParser.parseFile(filePath, options);
}

export function loads(content: string, options?: MarcParserOptions): MarcRecord[] {
  return MarcParser.parse(content, options);
}
