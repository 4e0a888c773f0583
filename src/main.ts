#!/usr/bin/env node
/**
 * Start the MARC language server over stdio.
 */
import { createConnection, ProposedFeatures } from 'vscode-languageserver/node';

import { loadConfig } from './config';
import { createLogger } from './logger';
import { StaticReferenceData } from './reference';
import { createServer } from './server';

const config = loadConfig();
const logger = createLogger({ service: 'marc-language-server' }, { level: config.logLevel });
const provider = StaticReferenceData.load(config.dataDir, logger);

const connection = createConnection(ProposedFeatures.all);
createServer(connection, { provider, logger });
connection.listen();
