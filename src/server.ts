/**
 * Language server wiring: document sync, settings and the request handlers of
 * MarcLanguageService bound to one connection.
 */
import {
  Connection,
  DidChangeConfigurationNotification,
  InitializeParams,
  InitializeResult,
  TextDocuments,
  TextDocumentSyncKind,
} from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';

import { DEFAULT_SETTINGS, MarcSettings, parseSettings } from './config';
import { Logger } from './logger';
import { guardProvider, ReferenceDataProvider } from './reference';
import { MarcLanguageService } from './service';

export const SETTINGS_SECTION = 'marc';

export interface MarcServerOptions {
  provider: ReferenceDataProvider;
  logger: Logger;
}

export interface MarcServer {
  documents: TextDocuments<TextDocument>;
  service: MarcLanguageService;
}

export function createServer(connection: Connection, options: MarcServerOptions): MarcServer {
  const logger = options.logger.child({ component: 'server' });
  const documents: TextDocuments<TextDocument> = new TextDocuments(TextDocument);
  const service = new MarcLanguageService({
    provider: guardProvider(options.provider, options.logger),
    logger: options.logger,
    documents: uri => documents.get(uri),
  });

  let hasConfigurationCapability = false;
  let globalSettings: MarcSettings = DEFAULT_SETTINGS;
  const documentSettings = new Map<string, Promise<MarcSettings>>();

  function getDocumentSettings(uri: string): Promise<MarcSettings> {
    if (!hasConfigurationCapability) {
      return Promise.resolve(globalSettings);
    }
    let result = documentSettings.get(uri);
    if (!result) {
      result = connection.workspace.getConfiguration({ scopeUri: uri, section: SETTINGS_SECTION }).then(parseSettings);
      documentSettings.set(uri, result);
    }
    return result;
  }

  async function publishDiagnostics(document: TextDocument): Promise<void> {
    const settings = await getDocumentSettings(document.uri);
    const diagnostics = service.diagnostics(document, settings);
    await connection.sendDiagnostics({ uri: document.uri, diagnostics });
  }

  function revalidate(document: TextDocument): void {
    publishDiagnostics(document).catch(error => {
      logger.error({ uri: document.uri, error }, 'Failed to publish diagnostics');
    });
  }

  connection.onInitialize((params: InitializeParams): InitializeResult => {
    hasConfigurationCapability = Boolean(params.capabilities.workspace?.configuration);
    logger.info({ clientName: params.clientInfo?.name }, 'Initializing');

    return {
      capabilities: {
        textDocumentSync: TextDocumentSyncKind.Incremental,
        hoverProvider: true,
        completionProvider: {
          resolveProvider: false,
          triggerCharacters: ['=', '$'],
        },
      },
    };
  });

  connection.onInitialized(() => {
    if (hasConfigurationCapability) {
      connection.client.register(DidChangeConfigurationNotification.type, undefined).catch(error => {
        logger.warn({ error }, 'Could not register for configuration changes');
      });
    }
  });

  connection.onDidChangeConfiguration(change => {
    if (hasConfigurationCapability) {
      documentSettings.clear();
    } else {
      const settings: unknown = change.settings;
      globalSettings =
        typeof settings === 'object' && settings !== null && SETTINGS_SECTION in settings
          ? parseSettings(settings[SETTINGS_SECTION])
          : DEFAULT_SETTINGS;
    }
    documents.all().forEach(revalidate);
  });

  documents.onDidOpen(event => {
    logger.debug({ uri: event.document.uri }, 'Document opened');
  });

  // Also fires when a document is opened
  documents.onDidChangeContent(change => {
    revalidate(change.document);
  });

  documents.onDidClose(event => {
    documentSettings.delete(event.document.uri);
    connection.sendDiagnostics({ uri: event.document.uri, diagnostics: [] }).catch(error => {
      logger.error({ uri: event.document.uri, error }, 'Failed to clear diagnostics');
    });
  });

  connection.onHover(async params => service.hover(params, await getDocumentSettings(params.textDocument.uri)));

  connection.onCompletion(params => service.completion(params));

  documents.listen(connection);

  return { documents, service };
}
