import { DEFAULT_DATA_DIR } from '../src/config';
import { silentLogger } from '../src/logger';
import { StaticReferenceData } from '../src/reference';

// The data shipped under data/
export const shippedData = StaticReferenceData.load(DEFAULT_DATA_DIR, silentLogger);

// A small, fixed data set for asserting exact hover and completion output
export const sampleData = StaticReferenceData.fromData({
  bibliographic: {
    tags: {
      LDR: { tag: 'LDR', name: 'Leader', description: 'Record header.' },
      '001': { tag: '001', name: 'Control Number', description: 'Record control number.' },
      '245': {
        tag: '245',
        name: 'Title Statement',
        description: 'Title and statement of responsibility.',
        repeatable: false,
        indicators: {
          '1': { '0': 'No added entry', '1': 'Added entry' },
          '2': { '0': 'No nonfiling characters' },
        },
        subfields: {
          a: { code: 'a', name: 'Title', description: 'Title proper.', repeatable: false },
          c: {
            code: 'c',
            name: 'Statement of responsibility',
            description: 'Statement of responsibility',
            repeatable: false,
          },
          n: { code: 'n', name: 'Number of part', description: 'Number of part/section.', repeatable: true },
        },
      },
      '500': {
        tag: '500',
        name: 'General Note',
        description: 'General information.',
        repeatable: true,
        subfields: {
          a: { code: 'a', name: 'General note', description: 'Text of the note.' },
        },
      },
    },
  },
  holdings: {
    tags: {
      '852': {
        tag: '852',
        name: 'Location',
        description: 'Holding location.',
        repeatable: true,
        indicators: { '1': { ' ': 'No information provided' } },
        subfields: {
          b: { code: 'b', name: 'Sublocation', description: 'Collection.', repeatable: true },
        },
      },
    },
  },
  fixedFields: {
    fields: {
      BIB: {
        '001': {
          control_number: { start: 0, end: -1, name: 'Control Number', description: 'Record control number.' },
        },
        '008': {
          date_entered: { start: 0, end: 5, name: 'Date entered on file', description: 'yymmdd' },
          type_of_date: {
            start: 6,
            end: 6,
            name: 'Type of date',
            description: 'Type of dates given.',
            values: { s: 'Single known date', m: 'Multiple dates' },
          },
          date1: { start: 7, end: 10, name: 'Date 1', description: 'First date.' },
        },
      },
      HOLD: {
        '008': {
          receipt_status: {
            start: 6,
            end: 6,
            name: 'Receipt status',
            description: 'Receipt status of the item.',
            values: { '4': 'Currently received' },
          },
        },
      },
    },
  },
});

export interface CapturedLog {
  lines: Record<string, unknown>[];
  sink: (line: string) => void;
}

export function captureLog(): CapturedLog {
  const lines: Record<string, unknown>[] = [];
  return {
    lines,
    sink: (line: string) => {
      const parsed: unknown = JSON.parse(line);
      if (typeof parsed === 'object' && parsed !== null) {
        lines.push({ ...parsed });
      }
    },
  };
}
