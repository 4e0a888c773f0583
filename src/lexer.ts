/**
 * MARC Lexers - Turn single lines of MRK or line mode text into fields
 */

import { DataField, MarcField, MarcFormat, MarcSubfield } from './types';

export interface MarcLexer {
  readonly format: MarcFormat;
  // Last character offset that still belongs to the tag region
  readonly tagEnd: number;
  parseLine(text: string, lineNumber?: number): MarcField | null;
  isMarcLine(text: string): boolean;
  contentStart(line: string, field: MarcField): number;
  indicatorOffsets(line: string): [number, number] | null;
}

const SUBFIELD_REGEX = /\$([a-z0-9])([^$]*)/g;

/**
 * Scan an isolated subfield payload. Both syntaxes share this once they have
 * cut the payload out of the line; offsets are relative to `payload`.
 */
export function parseSubfields(payload: string): MarcSubfield[] {
  const subfields: MarcSubfield[] = [];
  for (const match of payload.matchAll(SUBFIELD_REGEX)) {
    const startOffset = match.index ?? 0;
    subfields.push({
      code: match[1] ?? '',
      content: (match[2] ?? '').trimEnd(),
      startOffset,
      endOffset: startOffset + match[0].length,
    });
  }
  return subfields;
}

function skipSpaces(line: string, offset: number): number {
  let position = offset;
  while (position < line.length && line[position] === ' ') {
    position += 1;
  }
  return position;
}

function dataField(
  tag: string,
  indicator1: string,
  indicator2: string,
  payload: string,
  line: string,
  lineNumber: number
): DataField {
  return {
    kind: 'data',
    tag,
    indicator1,
    indicator2,
    subfields: parseSubfields(payload),
    payloadOffset: line.length - payload.length,
    lineNumber,
    startOffset: 0,
    endOffset: line.length,
  };
}

// ============================================================================
// MRK: =245  10$aTitle$bsubtitle
// ============================================================================

export class MrkLexer implements MarcLexer {
  private static readonly LEADER_REGEX = /^=LDR\s+(.+)$/;
  private static readonly CONTROL_FIELD_REGEX = /^=(\d{3})\s+(.+)$/;
  private static readonly DATA_FIELD_REGEX = /^=(\d{3})\s+([^$])([^$])(.*)$/;
  private static readonly INDICATOR_REGEX = /^=\d{3}\s+[^$][^$](?=\$)/;

  readonly format = 'mrk' as const;
  readonly tagEnd = 4;

  parseLine(line: string, lineNumber = 0): MarcField | null {
    if (!line.startsWith('=')) {
      return null;
    }

    const leaderMatch = line.match(MrkLexer.LEADER_REGEX);
    if (leaderMatch) {
      return {
        kind: 'leader',
        tag: 'LDR',
        content: leaderMatch[1] ?? '',
        lineNumber,
        startOffset: 0,
        endOffset: line.length,
      };
    }

    const controlMatch = line.match(MrkLexer.CONTROL_FIELD_REGEX);
    const controlTag = controlMatch?.[1];
    if (controlMatch && controlTag !== undefined && controlTag < '010') {
      return {
        kind: 'control',
        tag: controlTag,
        content: controlMatch[2] ?? '',
        lineNumber,
        startOffset: 0,
        endOffset: line.length,
      };
    }

    const dataMatch = line.match(MrkLexer.DATA_FIELD_REGEX);
    if (dataMatch) {
      return dataField(
        dataMatch[1] ?? '',
        normalizeMrkIndicator(dataMatch[2] ?? ' '),
        normalizeMrkIndicator(dataMatch[3] ?? ' '),
        dataMatch[4] ?? '',
        line,
        lineNumber
      );
    }

    return null;
  }

  isMarcLine(line: string): boolean {
    return line.trim().startsWith('=');
  }

  contentStart(line: string, field: MarcField): number {
    const prefix = `=${field.tag}`;
    const tagStart = line.indexOf(prefix);
    if (tagStart === -1) {
      return -1;
    }
    return skipSpaces(line, tagStart + prefix.length);
  }

  indicatorOffsets(line: string): [number, number] | null {
    const match = line.match(MrkLexer.INDICATOR_REGEX);
    if (!match) {
      return null;
    }
    // The lookahead is zero-width, so the indicators are the last two matched characters
    const end = (match.index ?? 0) + match[0].length;
    return [end - 2, end - 1];
  }
}

// MRK writes a blank indicator as a backslash
function normalizeMrkIndicator(value: string): string {
  return value === '\\' || /^\s$/.test(value) ? ' ' : value;
}

// ============================================================================
// Line mode: 245 10 $a Title $b subtitle
// ============================================================================

export class LineModeLexer implements MarcLexer {
  private static readonly LEADER_REGEX = /^\d{5}.{19}$/;
  private static readonly CONTROL_FIELD_REGEX = /^(00[1-9])\s(.+)$/;
  private static readonly DATA_FIELD_REGEX = /^(\d{3})\s(.)(.)(\s.*)$/;
  private static readonly INDICATOR_REGEX = /^\d{3}\s..\s/;

  readonly format = 'line' as const;
  readonly tagEnd = 2;

  parseLine(line: string, lineNumber = 0): MarcField | null {
    const stripped = line.trim();
    if (!stripped) {
      return null;
    }

    if (LineModeLexer.LEADER_REGEX.test(stripped)) {
      return {
        kind: 'leader',
        tag: 'LDR',
        content: stripped,
        lineNumber,
        startOffset: 0,
        endOffset: line.length,
      };
    }

    const controlMatch = line.match(LineModeLexer.CONTROL_FIELD_REGEX);
    if (controlMatch) {
      return {
        kind: 'control',
        tag: controlMatch[1] ?? '',
        content: controlMatch[2] ?? '',
        lineNumber,
        startOffset: 0,
        endOffset: line.length,
      };
    }

    const dataMatch = line.match(LineModeLexer.DATA_FIELD_REGEX);
    if (dataMatch) {
      return dataField(
        dataMatch[1] ?? '',
        normalizeBlank(dataMatch[2] ?? ' '),
        normalizeBlank(dataMatch[3] ?? ' '),
        dataMatch[4] ?? '',
        line,
        lineNumber
      );
    }

    return null;
  }

  isMarcLine(line: string): boolean {
    return /^\d/.test(line.trim());
  }

  contentStart(line: string, field: MarcField): number {
    if (field.kind === 'leader') {
      // A line mode leader has no tag in front of it
      return line.length - line.trimStart().length;
    }
    const tagStart = line.indexOf(field.tag);
    if (tagStart === -1) {
      return -1;
    }
    return skipSpaces(line, tagStart + field.tag.length);
  }

  indicatorOffsets(line: string): [number, number] | null {
    if (!LineModeLexer.INDICATOR_REGEX.test(line)) {
      return null;
    }
    return [4, 5];
  }
}

function normalizeBlank(value: string): string {
  return /^\s$/.test(value) ? ' ' : value;
}

const LEXERS: Record<MarcFormat, MarcLexer> = {
  mrk: new MrkLexer(),
  line: new LineModeLexer(),
};

export function lexerFor(format: MarcFormat): MarcLexer {
  return LEXERS[format];
}
