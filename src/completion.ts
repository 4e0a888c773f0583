/**
 * Completion - Tag and subfield suggestions for the text before the cursor
 */
import { CompletionItem, CompletionItemKind, InsertTextFormat, MarkupKind } from 'vscode-languageserver/node';

import { detectFormat } from './format';
import { ReferenceDataProvider } from './reference';
import { splitLines } from './source';
import { MarcFormat, SubfieldDefinition, TagDefinition } from './types';

export interface TagSuggestion {
  tag: string;
  definition: TagDefinition;
}

export interface SubfieldSuggestion {
  tag: string;
  code: string;
  definition: SubfieldDefinition;
}

const MRK_TAG_PREFIX_REGEX = /=(\d{0,2})$/;
const LINE_TAG_PREFIX_REGEX = /^(\d{0,2})$/;
const SUBFIELD_PREFIX_REGEX = /\$([a-z0-9]*)$/;

/**
 * The digits typed so far when the cursor is where a tag belongs, otherwise
 * null.
 */
export function partialTag(linePrefix: string, format: MarcFormat): string | null {
  const match = linePrefix.match(format === 'mrk' ? MRK_TAG_PREFIX_REGEX : LINE_TAG_PREFIX_REGEX);
  return match ? match[1] ?? '' : null;
}

export function suggestTagCompletions(
  linePrefix: string,
  provider: ReferenceDataProvider,
  format: MarcFormat = 'mrk'
): TagSuggestion[] {
  const partial = partialTag(linePrefix, format);
  if (partial === null) {
    return [];
  }

  const suggestions: TagSuggestion[] = [];
  for (const tag of [...provider.getAllTags()].sort()) {
    // LDR and other non-numeric keys are never typed as tags
    if (!/^\d+$/.test(tag) || !tag.startsWith(partial)) continue;
    const definition = provider.getTagDefinition(tag);
    if (definition) {
      suggestions.push({ tag, definition });
    }
  }
  return suggestions;
}

export function suggestSubfieldCompletions(
  tag: string,
  linePrefix: string,
  provider: ReferenceDataProvider
): SubfieldSuggestion[] {
  const partial = linePrefix.match(SUBFIELD_PREFIX_REGEX)?.[1] ?? '';

  const suggestions: SubfieldSuggestion[] = [];
  for (const code of [...provider.getSubfieldsForTag(tag)].sort()) {
    if (!code.startsWith(partial)) continue;
    const definition = provider.getSubfieldDefinition(tag, code);
    if (definition) {
      suggestions.push({ tag, code, definition });
    }
  }
  return suggestions;
}

export function tagForLine(line: string, format: MarcFormat): string | undefined {
  const match = format === 'mrk' ? line.match(/=(\d{3})/) : line.match(/^(\d{3})\s/);
  return match?.[1];
}

// ============================================================================
// LSP items
// ============================================================================

export function tagCompletionItems(suggestions: TagSuggestion[], format: MarcFormat): CompletionItem[] {
  return suggestions.map(({ tag, definition }) => {
    const item: CompletionItem = {
      label: format === 'mrk' ? `=${tag}` : tag,
      kind: CompletionItemKind.Class,
      detail: definition.name,
      documentation: {
        kind: MarkupKind.Markdown,
        value: `**${definition.name}**\n\n${definition.description}`,
      },
      insertText: tag,
      filterText: tag,
    };

    // Data fields get placeholders for both indicators and a first subfield
    if (format === 'mrk' && tag >= '010' && Object.keys(definition.indicators).length > 0) {
      item.insertText = `${tag}  \${1: }\${2: }\${3:\\$a}`;
      item.insertTextFormat = InsertTextFormat.Snippet;
    }
    return item;
  });
}

export function subfieldCompletionItems(suggestions: SubfieldSuggestion[]): CompletionItem[] {
  return suggestions.map(({ code, definition }) => ({
    label: `$${code}`,
    kind: CompletionItemKind.Property,
    detail: definition.repeatable ? `${definition.name} (Repeatable)` : definition.name,
    documentation: {
      kind: MarkupKind.Markdown,
      value: `**$${code} - ${definition.name}**\n\n${definition.description}`,
    },
    insertText: code,
    filterText: code,
  }));
}

/**
 * Completion items for a cursor position in a document. Tag context takes
 * precedence over subfield context.
 */
export function provideCompletions(
  text: string,
  line: number,
  character: number,
  provider: ReferenceDataProvider,
  format: MarcFormat = detectFormat(text)
): CompletionItem[] {
  const sourceLine = splitLines(text)[line];
  if (!sourceLine) {
    return [];
  }
  const linePrefix = sourceLine.text.slice(0, character);

  if (partialTag(linePrefix, format) !== null) {
    return tagCompletionItems(suggestTagCompletions(linePrefix, provider, format), format);
  }

  if (linePrefix.includes('$')) {
    const tag = tagForLine(sourceLine.text, format);
    return tag ? subfieldCompletionItems(suggestSubfieldCompletions(tag, linePrefix, provider)) : [];
  }

  return [];
}
