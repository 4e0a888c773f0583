import { RecordType } from './types';

export const FALLBACK_RECORD_TYPE: RecordType = 'BIB';

// Leader byte 06 (type of record)
export const LEADER_TYPE_OFFSET = 6;

export interface RecordTypeEntry {
  codes: string;
  recordType: RecordType;
}

/**
 * Searched in order; when a code is listed under more than one record type the
 * earlier entry wins.
 */
export const LEADER_RECORD_TYPES: readonly RecordTypeEntry[] = [
  { codes: 'acdefgijkmoprt', recordType: 'BIB' },
  { codes: 'uvxy', recordType: 'HOLD' },
  { codes: 'z', recordType: 'AUTH' },
  { codes: 'w', recordType: 'CLASS' },
  { codes: 'q', recordType: 'COMM' },
];

export function recordTypeFromLeader(
  leaderContent: string | null | undefined,
  table: readonly RecordTypeEntry[] = LEADER_RECORD_TYPES
): RecordType {
  const code = leaderContent?.charAt(LEADER_TYPE_OFFSET);
  if (!code) {
    return FALLBACK_RECORD_TYPE;
  }
  const entry = table.find(candidate => candidate.codes.includes(code));
  return entry ? entry.recordType : FALLBACK_RECORD_TYPE;
}
