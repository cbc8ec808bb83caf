/**
 * API server entry point. The knowledge base is fully loaded and validated
 * before the port is opened; a malformed knowledge base aborts startup.
 */

import { config } from 'dotenv';
import { createApp } from './app.js';
import { loadRuntimeConfig } from '../config/env.js';
import { KnowledgeBaseHolder } from '../knowledge/knowledgeBase.js';
import { loadKnowledgeBase, reloadKnowledgeBase } from '../knowledge/loader.js';
import { loadSynonymTable } from '../knowledge/synonyms.js';
import { createLogger } from '../utils/log.js';

// Load .env file
config();

const logger = createLogger('api-server');

async function start(): Promise<void> {
  const runtime = loadRuntimeConfig();

  const holder = new KnowledgeBaseHolder(await loadKnowledgeBase(runtime.kb_path));
  const synonyms = runtime.synonyms_path ? await loadSynonymTable(runtime.synonyms_path) : null;

  const app = createApp({
    holder,
    synonyms,
    reload: () => reloadKnowledgeBase(holder, runtime.kb_path),
  });

  app
    .listen(runtime.port, () => {
      logger.info(
        { port: runtime.port, kb_path: runtime.kb_path, version: holder.current().version },
        'API server listening'
      );
    })
    .on('error', (error) => {
      logger.fatal({ error }, 'Server startup error');
      process.exit(1);
    });
}

start().catch((error: unknown) => {
  logger.fatal({ error }, 'Knowledge base could not be loaded; refusing to serve requests');
  process.exit(1);
});
