/**
 * Position Resolver - Map a character offset within a line to the part of the
 * field under it
 *
 * Zones are tried in a fixed order: fixed-field positions, indicators,
 * subfields, then the tag. The first one that claims the offset wins.
 */

import { lexerFor, MarcLexer } from './lexer';
import { ReferenceDataProvider } from './reference';
import {
  ControlField,
  DataField,
  FixedFieldPosition,
  LeaderField,
  MarcField,
  MarcFormat,
  MarcSubfield,
  OPEN_ENDED,
  RecordType,
} from './types';

// Line-local character offsets; `end` is exclusive
export interface DisplayRange {
  start: number;
  end: number;
}

export interface FixedPositionZone {
  kind: 'fixed-position';
  tag: string;
  // Offset within the trimmed field content
  offset: number;
  position: FixedFieldPosition | null;
  value: string;
}

export interface IndicatorZone {
  kind: 'indicator';
  number: 1 | 2;
  value: string;
}

export interface SubfieldZone {
  kind: 'subfield';
  index: number;
  subfield: MarcSubfield;
}

export interface TagZone {
  kind: 'tag';
  tag: string;
}

export type ResolvedZone = FixedPositionZone | IndicatorZone | SubfieldZone | TagZone;

export interface Resolution {
  zone: ResolvedZone;
  range: DisplayRange;
}

export interface ResolveContext {
  format: MarcFormat;
  provider: ReferenceDataProvider;
  recordType?: RecordType | undefined;
}

export function resolvePosition(
  line: string,
  field: MarcField,
  offset: number,
  context: ResolveContext
): Resolution | null {
  const lexer = lexerFor(context.format);

  if (field.kind !== 'data') {
    const fixed = resolveFixedPosition(line, field, offset, lexer, context);
    if (fixed) {
      return fixed;
    }
  } else {
    const indicator = resolveIndicator(line, field, offset, lexer);
    if (indicator) {
      return indicator;
    }
    const subfield = resolveSubfield(line, field, offset);
    if (subfield) {
      return subfield;
    }
  }

  if (offset >= 0 && offset <= lexer.tagEnd) {
    return {
      zone: { kind: 'tag', tag: field.tag },
      range: { start: 0, end: line.length },
    };
  }

  return null;
}

// ============================================================================
// Fixed fields
// ============================================================================

function resolveFixedPosition(
  line: string,
  field: LeaderField | ControlField,
  offset: number,
  lexer: MarcLexer,
  context: ResolveContext
): Resolution | null {
  const { provider, recordType } = context;
  if (!provider.isFixedField(field.tag, recordType)) {
    return null;
  }

  // A line mode leader has no tag in front of it, so every offset is content
  const bareLeader = lexer.format === 'line' && field.kind === 'leader';
  if (!bareLeader && offset <= lexer.tagEnd) {
    return null;
  }

  const contentStart = lexer.contentStart(line, field);
  if (contentStart === -1 || offset < contentStart) {
    return null;
  }

  const content = line.slice(contentStart).trim();
  const fieldOffset = offset - contentStart;
  const position = provider.getPositionInfo(field.tag, fieldOffset, recordType);

  if (!position) {
    return {
      zone: {
        kind: 'fixed-position',
        tag: field.tag,
        offset: fieldOffset,
        position: null,
        value: content.charAt(fieldOffset),
      },
      range: { start: offset, end: offset + 1 },
    };
  }

  const openEnded = position.end === OPEN_ENDED;
  const rangeEnd = openEnded ? contentStart + content.length : contentStart + position.end + 1;

  return {
    zone: {
      kind: 'fixed-position',
      tag: field.tag,
      offset: fieldOffset,
      position,
      value: positionValue(content, position),
    },
    range: {
      start: Math.min(contentStart + position.start, line.length),
      end: Math.min(rangeEnd, line.length),
    },
  };
}

/**
 * The characters a position covers within trimmed field content; empty when
 * the content is too short to reach the position.
 */
export function positionValue(content: string, position: FixedFieldPosition): string {
  if (position.start >= content.length) {
    return '';
  }
  return position.end === OPEN_ENDED
    ? content.slice(position.start)
    : content.slice(position.start, position.end + 1);
}

// ============================================================================
// Data fields
// ============================================================================

function resolveIndicator(line: string, field: DataField, offset: number, lexer: MarcLexer): Resolution | null {
  const slots = lexer.indicatorOffsets(line);
  if (!slots) {
    return null;
  }
  const [first, second] = slots;

  if (offset === first) {
    return {
      zone: { kind: 'indicator', number: 1, value: field.indicator1 },
      range: { start: first, end: first + 1 },
    };
  }
  if (offset === second) {
    return {
      zone: { kind: 'indicator', number: 2, value: field.indicator2 },
      range: { start: second, end: second + 1 },
    };
  }
  return null;
}

/**
 * Walk subfields in order, finding each `$code` marker from where the previous
 * subfield ended. Codes may repeat, so searching from the start of the line
 * would always land on the first occurrence.
 */
function resolveSubfield(line: string, field: DataField, offset: number): Resolution | null {
  let cursor = 0;

  for (const [index, subfield] of field.subfields.entries()) {
    const markerStart = line.indexOf(`$${subfield.code}`, cursor);
    if (markerStart === -1) {
      continue;
    }
    const contentEnd = markerStart + 2 + subfield.content.length;
    cursor = contentEnd;

    if (offset >= markerStart && offset <= contentEnd) {
      return {
        zone: { kind: 'subfield', index, subfield },
        range: { start: markerStart, end: contentEnd },
      };
    }
  }

  return null;
}
