/**
 * MarcLanguageService - Request handling behind the language server
 *
 * Knows nothing about the transport: documents come from a lookup function
 * and results are plain LSP values, so the handlers can be driven directly.
 */
import { CompletionItem, CompletionParams, Diagnostic, Hover, HoverParams, MarkupKind } from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';

import { provideCompletions } from './completion';
import { DEFAULT_SETTINGS, MarcSettings } from './config';
import { renderHover, resolveHover } from './hover';
import { Logger } from './logger';
import { ReferenceDataProvider } from './reference';
import { validateDocument } from './validator';

export type DocumentLookup = (uri: string) => TextDocument | undefined;

export interface MarcLanguageServiceOptions {
  provider: ReferenceDataProvider;
  logger: Logger;
  documents: DocumentLookup;
}

export class MarcLanguageService {
  private readonly provider: ReferenceDataProvider;
  private readonly logger: Logger;
  private readonly documents: DocumentLookup;

  constructor(options: MarcLanguageServiceOptions) {
    this.provider = options.provider;
    this.logger = options.logger.child({ component: 'service' });
    this.documents = options.documents;
  }

  public hover(params: HoverParams, settings: MarcSettings = DEFAULT_SETTINGS): Hover | null {
    const document = this.documents(params.textDocument.uri);
    if (!document) {
      this.logger.debug({ uri: params.textDocument.uri }, 'Hover for unknown document');
      return null;
    }

    const info = resolveHover(document.getText(), params.position.line, params.position.character, this.provider);
    if (!info) {
      return null;
    }

    const hover: Hover = {
      contents: {
        kind: MarkupKind.Markdown,
        value: renderHover(info, { documentationLinks: settings.documentationLinks }),
      },
    };
    // Editors would underline the whole line otherwise
    if (!info.fullLine) {
      hover.range = {
        start: { line: info.row, character: info.range.start },
        end: { line: info.row, character: info.range.end },
      };
    }
    return hover;
  }

  public completion(params: CompletionParams): CompletionItem[] {
    const document = this.documents(params.textDocument.uri);
    if (!document) {
      this.logger.debug({ uri: params.textDocument.uri }, 'Completion for unknown document');
      return [];
    }
    return provideCompletions(document.getText(), params.position.line, params.position.character, this.provider);
  }

  public diagnostics(document: TextDocument, settings: MarcSettings = DEFAULT_SETTINGS): Diagnostic[] {
    const diagnostics = validateDocument(document.getText(), { maxProblems: settings.maxNumberOfProblems });
    this.logger.debug({ uri: document.uri, count: diagnostics.length }, 'Validated document');
    return diagnostics;
  }
}
