/**
 * Structural checks for MARC documents. Only the shape of each line is
 * checked; whether a tag or subfield is defined is left to hover and
 * completion.
 */
import { Diagnostic, DiagnosticSeverity, Range } from 'vscode-languageserver/node';

import { MarcDocument } from './document';
import { DataField, MarcFormat } from './types';

export const DIAGNOSTIC_SOURCE = 'marc';

export interface ValidateOptions {
  format?: MarcFormat | undefined;
  maxProblems?: number | undefined;
}

const INDICATOR_REGEX = /^[A-Za-z0-9 ]$/;
const SUBFIELD_CODE_REGEX = /^[a-z0-9]$/;

export function validateDocument(text: string, options: ValidateOptions = {}): Diagnostic[] {
  const document = new MarcDocument(text, { format: options.format });
  const limit = options.maxProblems ?? Number.POSITIVE_INFINITY;
  const diagnostics: Diagnostic[] = [];

  for (const line of document.lines) {
    if (diagnostics.length >= limit) break;
    if (!document.lexer.isMarcLine(line.text)) continue;

    const range = Range.create(line.row, 0, line.row, line.text.length);
    const field = document.lexer.parseLine(line.text, line.lineNumber);

    if (!field) {
      diagnostics.push({
        severity: DiagnosticSeverity.Error,
        range,
        message: 'Invalid MARC line format',
        source: DIAGNOSTIC_SOURCE,
      });
      continue;
    }

    if (field.kind !== 'data') continue;

    for (const message of fieldProblems(line.text, field)) {
      diagnostics.push({
        severity: DiagnosticSeverity.Warning,
        range,
        message,
        source: DIAGNOSTIC_SOURCE,
      });
    }
  }

  return diagnostics.slice(0, limit);
}

/**
 * Messages for a parsed data field. Subfield markers are read from the raw
 * payload, since the subfield scanner only ever yields valid codes.
 */
export function fieldProblems(line: string, field: DataField): string[] {
  const problems: string[] = [];

  if (!INDICATOR_REGEX.test(field.indicator1)) {
    problems.push(`Invalid first indicator '${field.indicator1}' for field ${field.tag}`);
  }
  if (!INDICATOR_REGEX.test(field.indicator2)) {
    problems.push(`Invalid second indicator '${field.indicator2}' for field ${field.tag}`);
  }

  const payload = line.slice(field.payloadOffset);
  for (let i = payload.indexOf('$'); i !== -1; i = payload.indexOf('$', i + 1)) {
    const code = payload.charAt(i + 1);
    if (!SUBFIELD_CODE_REGEX.test(code)) {
      problems.push(`Invalid subfield code '${code}' in field ${field.tag}`);
    }
  }

  return problems;
}
