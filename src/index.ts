/**
 * MARC language tooling
 * Parsing, position resolution, hover, completion and validation for MRK and
 * line mode MARC records
 */

export { MarcParser, load, loads, parseDocument } from './parser';
export { MarcDocument } from './document';
export type { MarcDocumentOptions } from './document';
export { detectFormat } from './format';
export { LineModeLexer, MrkLexer, lexerFor, parseSubfields } from './lexer';
export type { MarcLexer } from './lexer';
export { SourceLine, splitLines } from './source';
export { FALLBACK_RECORD_TYPE, LEADER_RECORD_TYPES, recordTypeFromLeader } from './record-type';
export { StaticReferenceData, guardProvider } from './reference';
export type { ReferenceDataInput, ReferenceDataProvider, ReferenceDataSummary } from './reference';
export { resolvePosition, positionValue } from './resolver';
export type { DisplayRange, Resolution, ResolvedZone, ResolveContext } from './resolver';
export { validateDocument } from './validator';
export { getTagUrl, renderHover, resolveHover } from './hover';
export type { HoverInfo, RenderOptions } from './hover';
export {
  partialTag,
  provideCompletions,
  subfieldCompletionItems,
  suggestSubfieldCompletions,
  suggestTagCompletions,
  tagCompletionItems,
  tagForLine,
} from './completion';
export type { SubfieldSuggestion, TagSuggestion } from './completion';
export { MarcLanguageService } from './service';
export { createServer } from './server';
export { loadConfig, parseSettings, DEFAULT_SETTINGS } from './config';
export type { MarcConfig, MarcSettings } from './config';
export { createLogger, silentLogger } from './logger';
export type { Logger, LogLevel } from './logger';
export { MarcError, ReferenceDataError, createMarcError } from './errors';
export type { SourceLocation } from './errors';
export * from './types';

export { load as default } from './parser';
