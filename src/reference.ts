/**
 * Reference Data - Tag, subfield and fixed-field definitions
 *
 * Definitions are read from the JSON files under `data/` once at start-up and
 * are read-only afterwards. Fixed-field layouts are looked up by record type
 * first and tag second, since the same tag (008 in particular) has a different
 * byte layout in bibliographic, holdings and authority records.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ReferenceDataError } from './errors';
import { Logger } from './logger';
import { FALLBACK_RECORD_TYPE } from './record-type';
import { FixedFieldPosition, OPEN_ENDED, RecordType, SubfieldDefinition, TagDefinition } from './types';

export interface ReferenceDataProvider {
  getTagDefinition(tag: string): TagDefinition | undefined;
  getSubfieldDefinition(tag: string, code: string): SubfieldDefinition | undefined;
  isFixedField(tag: string, recordType?: RecordType): boolean;
  getPositionInfo(tag: string, offset: number, recordType?: RecordType): FixedFieldPosition | undefined;
  getAllTags(): string[];
  getSubfieldsForTag(tag: string): string[];
}

// ============================================================================
// File schemas
// ============================================================================

const subfieldSchema = z.object({
  code: z.string().regex(/^[a-z0-9]$/),
  name: z.string(),
  description: z.string().default(''),
  repeatable: z.boolean().default(false),
});

const tagSchema = z.object({
  tag: z.string(),
  name: z.string(),
  description: z.string().default(''),
  repeatable: z.boolean().default(false),
  indicators: z.record(z.string(), z.record(z.string(), z.string())).default({}),
  subfields: z.record(z.string(), subfieldSchema).default({}),
});

export const tagFileSchema = z.object({
  metadata: z.record(z.string(), z.unknown()).optional(),
  tags: z.record(z.string(), tagSchema),
});

const positionSchema = z
  .object({
    start: z.number().int().min(0),
    end: z.number().int().min(OPEN_ENDED),
    name: z.string(),
    description: z.string().default(''),
    values: z.record(z.string(), z.string()).optional(),
  })
  .refine(position => position.end === OPEN_ENDED || position.end >= position.start, {
    message: 'end must not precede start',
  });

export const fixedFieldFileSchema = z.object({
  metadata: z.record(z.string(), z.unknown()).optional(),
  // record type -> tag -> position id -> position
  fields: z.record(z.string(), z.record(z.string(), z.record(z.string(), positionSchema))),
});

export type TagFile = z.input<typeof tagFileSchema>;
export type FixedFieldFile = z.input<typeof fixedFieldFileSchema>;

export interface ReferenceDataInput {
  bibliographic?: TagFile;
  holdings?: TagFile;
  fixedFields?: FixedFieldFile;
}

export const REFERENCE_FILES = {
  bibliographic: 'marc_bibliographic.json',
  holdings: 'marc_holdings.json',
  fixedFields: 'marc_fixed_fields.json',
} as const;

export interface ReferenceDataSummary {
  bibliographicTags: number;
  holdingsTags: number;
  fixedFieldRecordTypes: string[];
}

type PositionTable = Map<string, FixedFieldPosition[]>;

// ============================================================================
// Static provider
// ============================================================================

export class StaticReferenceData implements ReferenceDataProvider {
  private readonly bibliographic: Map<string, TagDefinition>;
  private readonly holdings: Map<string, TagDefinition>;
  private readonly fixedFields: Map<string, PositionTable>;

  private constructor(
    bibliographic: Map<string, TagDefinition>,
    holdings: Map<string, TagDefinition>,
    fixedFields: Map<string, PositionTable>
  ) {
    this.bibliographic = bibliographic;
    this.holdings = holdings;
    this.fixedFields = fixedFields;
  }

  static empty(): StaticReferenceData {
    return new StaticReferenceData(new Map(), new Map(), new Map());
  }

  /**
   * Build a provider from in-memory data. Input is validated with the same
   * schemas as the files, so invalid data throws a ZodError here.
   */
  static fromData(input: ReferenceDataInput): StaticReferenceData {
    return new StaticReferenceData(
      input.bibliographic ? tagMap(tagFileSchema.parse(input.bibliographic)) : new Map(),
      input.holdings ? tagMap(tagFileSchema.parse(input.holdings)) : new Map(),
      input.fixedFields ? positionTables(fixedFieldFileSchema.parse(input.fixedFields)) : new Map()
    );
  }

  /**
   * Read the three data files from `dataDir`. A file that is missing or does
   * not validate is logged and treated as empty.
   */
  static load(dataDir: string, logger: Logger): StaticReferenceData {
    const log = logger.child({ component: 'reference-data' });

    const bibliographic = readDataFile(dataDir, REFERENCE_FILES.bibliographic, tagFileSchema, log);
    const holdings = readDataFile(dataDir, REFERENCE_FILES.holdings, tagFileSchema, log);
    const fixedFields = readDataFile(dataDir, REFERENCE_FILES.fixedFields, fixedFieldFileSchema, log);

    const data = new StaticReferenceData(
      bibliographic ? tagMap(bibliographic) : new Map(),
      holdings ? tagMap(holdings) : new Map(),
      fixedFields ? positionTables(fixedFields) : new Map()
    );
    log.info({ dataDir, ...data.describeData() }, 'Reference data loaded');
    return data;
  }

  describeData(): ReferenceDataSummary {
    return {
      bibliographicTags: this.bibliographic.size,
      holdingsTags: this.holdings.size,
      fixedFieldRecordTypes: [...this.fixedFields.keys()].sort(),
    };
  }

  getTagDefinition(tag: string): TagDefinition | undefined {
    return this.bibliographic.get(tag) ?? this.holdings.get(tag);
  }

  getSubfieldDefinition(tag: string, code: string): SubfieldDefinition | undefined {
    return this.getTagDefinition(tag)?.subfields[code];
  }

  isFixedField(tag: string, recordType?: RecordType): boolean {
    return this.positionsFor(tag, recordType) !== undefined;
  }

  getPositionInfo(tag: string, offset: number, recordType?: RecordType): FixedFieldPosition | undefined {
    const positions = this.positionsFor(tag, recordType);
    if (!positions) {
      return undefined;
    }
    return positions.find(position =>
      position.end === OPEN_ENDED
        ? offset >= position.start
        : offset >= position.start && offset <= position.end
    );
  }

  getAllTags(): string[] {
    const tags = new Set([...this.bibliographic.keys(), ...this.holdings.keys()]);
    return [...tags].sort();
  }

  getSubfieldsForTag(tag: string): string[] {
    const definition = this.getTagDefinition(tag);
    return definition ? Object.keys(definition.subfields) : [];
  }

  // Record types without a table of their own use the bibliographic layouts
  private positionsFor(tag: string, recordType?: RecordType): FixedFieldPosition[] | undefined {
    const table =
      this.fixedFields.get(recordType ?? FALLBACK_RECORD_TYPE) ?? this.fixedFields.get(FALLBACK_RECORD_TYPE);
    return table?.get(tag);
  }
}

function readDataFile<S extends z.ZodTypeAny>(
  dataDir: string,
  fileName: string,
  schema: S,
  logger: Logger
): z.output<S> | undefined {
  const file = path.join(dataDir, fileName);
  try {
    return parseDataFile(file, schema);
  } catch (error) {
    if (error instanceof ReferenceDataError) {
      logger.warn({ file, error }, 'Reference data file unavailable');
      return undefined;
    }
    throw error;
  }
}

function parseDataFile<S extends z.ZodTypeAny>(file: string, schema: S): z.output<S> {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ReferenceDataError(`Cannot read reference data: ${reason}`, file);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ReferenceDataError(`Invalid JSON: ${reason}`, file);
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ReferenceDataError(`Invalid reference data${where}: ${issue?.message ?? 'unknown issue'}`, file);
  }
  return result.data;
}

function tagMap(file: z.output<typeof tagFileSchema>): Map<string, TagDefinition> {
  const tags = new Map<string, TagDefinition>();
  for (const [key, definition] of Object.entries(file.tags)) {
    tags.set(key, { ...definition, tag: key });
  }
  return tags;
}

function positionTables(file: z.output<typeof fixedFieldFileSchema>): Map<string, PositionTable> {
  const tables = new Map<string, PositionTable>();
  for (const [recordType, fields] of Object.entries(file.fields)) {
    const table: PositionTable = new Map();
    for (const [tag, positions] of Object.entries(fields)) {
      table.set(
        tag,
        Object.entries(positions).map(([id, position]) => ({
          id,
          start: position.start,
          end: position.end,
          name: position.name,
          description: position.description,
          // An empty table means "no coded values"
          values: position.values && Object.keys(position.values).length > 0 ? position.values : undefined,
        }))
      );
    }
    tables.set(recordType, table);
  }
  return tables;
}

// ============================================================================
// Failure isolation
// ============================================================================

/**
 * Wrap a provider so that a lookup which throws is logged and answered with the
 * absent value instead of failing the request.
 */
export function guardProvider(provider: ReferenceDataProvider, logger: Logger): ReferenceDataProvider {
  const log = logger.child({ component: 'reference-data' });

  function guarded<T>(method: string, fallback: T, call: () => T): T {
    try {
      return call();
    } catch (error) {
      log.error({ method, error }, 'Reference data lookup failed');
      return fallback;
    }
  }

  return {
    getTagDefinition: tag => guarded('getTagDefinition', undefined, () => provider.getTagDefinition(tag)),
    getSubfieldDefinition: (tag, code) =>
      guarded('getSubfieldDefinition', undefined, () => provider.getSubfieldDefinition(tag, code)),
    isFixedField: (tag, recordType) => guarded('isFixedField', false, () => provider.isFixedField(tag, recordType)),
    getPositionInfo: (tag, offset, recordType) =>
      guarded('getPositionInfo', undefined, () => provider.getPositionInfo(tag, offset, recordType)),
    getAllTags: () => guarded<string[]>('getAllTags', [], () => provider.getAllTags()),
    getSubfieldsForTag: tag => guarded<string[]>('getSubfieldsForTag', [], () => provider.getSubfieldsForTag(tag)),
  };
}
