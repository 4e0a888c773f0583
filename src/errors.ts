export interface SourceLocation {
  source?: string | undefined;
  // 1-based
  row?: number | undefined;
  column?: number | undefined;
  lineText?: string | undefined;
}

/**
 * Error raised for malformed MARC input. The message is prefixed with
 * `source:row:column` where known and followed by the offending line.
 */
export class MarcError extends Error {
  readonly location: SourceLocation;

  constructor(message: string, location: SourceLocation = {}) {
    super(withLocation(message, location));
    this.name = 'MarcError';
    this.location = location;
  }

  get source(): string | undefined {
    return this.location.source;
  }

  get row(): number | undefined {
    return this.location.row;
  }

  get column(): number | undefined {
    return this.location.column;
  }

  get lineText(): string | undefined {
    return this.location.lineText;
  }
}

/**
 * Raised while reading reference data files. The provider catches it at load
 * time and continues with whatever data it could read.
 */
export class ReferenceDataError extends MarcError {
  constructor(message: string, file: string) {
    super(message, { source: file });
    this.name = 'ReferenceDataError';
  }
}

function locationPrefix({ source, row, column }: SourceLocation): string {
  let position = '';
  if (row !== undefined) {
    position = column === undefined ? `${row}` : `${row}:${column}`;
  }
  return [source, position].filter(Boolean).join(':');
}

function withLocation(message: string, location: SourceLocation): string {
  const prefix = locationPrefix(location);
  const heading = prefix ? `${prefix} - ${message}` : message;
  const excerpt = location.lineText?.replace(/\r?\n$/, '');
  return excerpt ? `${heading}\n    ${excerpt}` : heading;
}

export function createMarcError(message: string, location?: SourceLocation): MarcError {
  return new MarcError(message, location);
}
