/**
 * Hover - What sits under the cursor, and how to describe it
 *
 * `resolveHover` is pure lookup: it finds the zone and the reference data that
 * goes with it. `renderHover` turns that into Markdown for the editor.
 */

import { MarcDocument } from './document';
import { ReferenceDataProvider } from './reference';
import {
  DisplayRange,
  FixedPositionZone,
  IndicatorZone,
  resolvePosition,
  SubfieldZone,
  TagZone,
} from './resolver';
import { FixedFieldPosition, MarcField, MarcFormat, OPEN_ENDED, SubfieldDefinition, TagDefinition } from './types';

interface HoverBase {
  row: number;
  range: DisplayRange;
  // The range covers the whole line, so there is nothing worth highlighting
  fullLine: boolean;
  format: MarcFormat;
  field: MarcField;
}

export type HoverInfo =
  | (HoverBase & { kind: 'tag'; zone: TagZone; definition: TagDefinition | undefined })
  | (HoverBase & { kind: 'indicator'; zone: IndicatorZone; definition: Record<string, string> | undefined })
  | (HoverBase & { kind: 'subfield'; zone: SubfieldZone; definition: SubfieldDefinition | undefined })
  | (HoverBase & { kind: 'fixed-position'; zone: FixedPositionZone; definition: FixedFieldPosition | undefined });

export interface HoverOptions {
  format?: MarcFormat | undefined;
}

export function resolveHover(
  text: string,
  line: number,
  character: number,
  provider: ReferenceDataProvider,
  options: HoverOptions = {}
): HoverInfo | null {
  const document = new MarcDocument(text, { format: options.format });
  const sourceLine = document.lineAt(line);
  if (!sourceLine || !document.lexer.isMarcLine(sourceLine.text)) {
    return null;
  }

  const field = document.fieldAt(line);
  if (!field) {
    return null;
  }

  const resolution = resolvePosition(sourceLine.text, field, character, {
    format: document.format,
    provider,
    recordType: document.recordTypeAt(line),
  });
  if (!resolution) {
    return null;
  }

  const { zone, range } = resolution;
  const base: HoverBase = {
    row: line,
    range,
    fullLine: range.end - range.start >= sourceLine.text.length,
    format: document.format,
    field,
  };

  switch (zone.kind) {
    case 'tag':
      return { ...base, kind: 'tag', zone, definition: provider.getTagDefinition(zone.tag) };
    case 'indicator':
      return {
        ...base,
        kind: 'indicator',
        zone,
        definition: provider.getTagDefinition(field.tag)?.indicators[String(zone.number)],
      };
    case 'subfield':
      return {
        ...base,
        kind: 'subfield',
        zone,
        definition: provider.getSubfieldDefinition(field.tag, zone.subfield.code),
      };
    case 'fixed-position':
      return { ...base, kind: 'fixed-position', zone, definition: zone.position ?? undefined };
  }
}

// ============================================================================
// Rendering
// ============================================================================

export interface RenderOptions {
  documentationLinks?: boolean;
}

/**
 * Library of Congress documentation page for a numeric tag. Holdings tags
 * (852-878 and 880 up) live under the holdings format.
 */
export function getTagUrl(tag: string): string | undefined {
  if (!/^\d{3}$/.test(tag)) {
    return undefined;
  }
  const number = Number(tag);
  if ((number >= 852 && number <= 878) || number >= 880) {
    return `https://www.loc.gov/marc/holdings/hd${tag}.html`;
  }
  return `https://www.loc.gov/marc/bibliographic/bd${tag}.html`;
}

function documentationLink(tag: string, options: RenderOptions): string | undefined {
  if (options.documentationLinks === false) {
    return undefined;
  }
  const url = getTagUrl(tag);
  return url ? `[View full documentation on Library of Congress](${url})` : undefined;
}

export function renderHover(info: HoverInfo, options: RenderOptions = {}): string {
  switch (info.kind) {
    case 'tag':
      return renderTag(info.field, info.definition, options);
    case 'indicator':
      return renderIndicator(info.field.tag, info.zone, info.definition, options);
    case 'subfield':
      return renderSubfield(info.field.tag, info.zone, info.definition, options);
    case 'fixed-position':
      return renderFixedPosition(info.zone, info.definition, options);
  }
}

function renderTag(field: MarcField, definition: TagDefinition | undefined, options: RenderOptions): string {
  if (!definition) {
    return `Unknown MARC tag ${field.tag}`;
  }

  let info = `**${definition.tag} - ${definition.name}**\n\n`;
  info += `${definition.description}\n\n`;
  if (definition.repeatable) {
    info += '*Repeatable field*\n\n';
  }

  if (field.kind === 'data' && Object.keys(definition.indicators).length > 0) {
    info += '**Indicators:**\n\n';
    for (const [number, values] of Object.entries(definition.indicators)) {
      info += `Indicator ${number}:\n`;
      for (const [value, description] of Object.entries(values)) {
        info += `- \`${value}\`: ${description}\n`;
      }
      info += '\n';
    }
  }

  const codes = Object.keys(definition.subfields).sort();
  if (codes.length > 0) {
    info += '**Subfields:**\n\n';
    for (const code of codes) {
      const subfield = definition.subfields[code];
      if (!subfield) continue;
      const repeatable = subfield.repeatable ? ' (R)' : '';
      info += `- \`$${code}\`: ${subfield.name}${repeatable}\n`;
      if (subfield.description !== subfield.name) {
        info += `  ${subfield.description}\n`;
      }
    }
  }

  const link = documentationLink(field.tag, options);
  if (link) {
    info += `\n${link}`;
  }
  return info;
}

function renderIndicator(
  tag: string,
  zone: IndicatorZone,
  values: Record<string, string> | undefined,
  options: RenderOptions
): string {
  const heading = `**Indicator ${zone.number}:** \`${zone.value}\``;
  if (!values) {
    return heading;
  }
  let info = `${heading}\n\n${values[zone.value] ?? 'Unknown value'}`;
  const link = documentationLink(tag, options);
  if (link) {
    info += `\n\n${link}`;
  }
  return info;
}

function renderSubfield(
  tag: string,
  zone: SubfieldZone,
  definition: SubfieldDefinition | undefined,
  options: RenderOptions
): string {
  if (!definition) {
    return `**$${zone.subfield.code}** - Unknown subfield for tag ${tag}`;
  }

  let info = `**$${definition.code} - ${definition.name}**\n\n`;
  info += `${definition.description}\n\n`;
  if (definition.repeatable) {
    info += '*Repeatable subfield*\n\n';
  }
  info += `**Content:** ${zone.subfield.content}\n\n`;

  const link = documentationLink(tag, options);
  if (link) {
    info += link;
  }
  return info;
}

function renderFixedPosition(
  zone: FixedPositionZone,
  position: FixedFieldPosition | undefined,
  options: RenderOptions
): string {
  if (!position) {
    return `**${zone.tag} position ${zone.offset}** - Character position in fixed field`;
  }

  let span: string;
  if (position.end === OPEN_ENDED) {
    span = `${position.start}+`;
  } else if (position.start === position.end) {
    span = `${position.start}`;
  } else {
    span = `${position.start}-${position.end}`;
  }

  let info = `**${zone.tag} - ${position.name}**\n\n`;
  info += `Position: ${span}\n`;
  info += `Value: \`${zone.value}\`\n\n`;
  info += `${position.description}\n\n`;

  if (position.values) {
    const current = position.values[zone.value];
    info +=
      current === undefined
        ? `**Current:** \`${zone.value}\` (not recognized)\n\n`
        : `**Current:** \`${zone.value}\` = ${current}\n\n`;

    info += '**Other values:**\n';
    for (const [value, description] of Object.entries(position.values)) {
      if (value !== zone.value) {
        info += `\`${value}\`: ${description}\n`;
      }
    }
  }

  const link = documentationLink(zone.tag, options);
  if (link) {
    info += `\n${link}`;
  }
  return info;
}
