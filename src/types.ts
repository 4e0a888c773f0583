/**
 * Type definitions for the MARC parser and resolver
 */

// Surface syntaxes a document can be written in
export type MarcFormat = 'mrk' | 'line';

export type FieldKind = 'leader' | 'control' | 'data';

// Keys of the record-type level of the fixed-field tables
export type RecordType = 'BIB' | 'HOLD' | 'AUTH' | 'CLASS' | 'COMM';

export interface MarcSubfield {
  code: string;
  content: string;
  // Offsets are relative to the subfield payload, not the full line
  startOffset: number;
  endOffset: number;
}

interface FieldBase {
  tag: string;
  lineNumber: number;
  startOffset: number;
  endOffset: number;
}

export interface LeaderField extends FieldBase {
  kind: 'leader';
  content: string;
}

export interface ControlField extends FieldBase {
  kind: 'control';
  content: string;
}

export interface DataField extends FieldBase {
  kind: 'data';
  indicator1: string;
  indicator2: string;
  subfields: MarcSubfield[];
  // Where the subfield payload starts within the line
  payloadOffset: number;
}

export type MarcField = LeaderField | ControlField | DataField;

export interface MarcRecord {
  leader: LeaderField | null;
  fields: MarcField[];
}

// Parser configuration options
export interface MarcParserOptions {
  format?: MarcFormat;
  strict?: boolean;
  source?: string;
}

// Reference data shapes
export interface SubfieldDefinition {
  code: string;
  name: string;
  description: string;
  repeatable: boolean;
}

// indicator number ("1" | "2") -> indicator value -> description
export type IndicatorTable = Record<string, Record<string, string>>;

export interface TagDefinition {
  tag: string;
  name: string;
  description: string;
  repeatable: boolean;
  indicators: IndicatorTable;
  subfields: Record<string, SubfieldDefinition>;
}

export interface FixedFieldPosition {
  id: string;
  start: number;
  // Inclusive; -1 means the position runs to the end of the content
  end: number;
  name: string;
  description: string;
  values?: Record<string, string> | undefined;
}

export const OPEN_ENDED = -1;
