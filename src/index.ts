#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { credentialsPath, loadConfig, peopleDir, redirectUri, syncTokenPath } from './config.js';
import { createServer } from './server.js';
import { CredentialsFile, SyncTokenFile, authStatus } from './auth/credentials.js';
import { GoogleSession } from './auth/session.js';
import { GoogleProvider, googlePeopleApi } from './providers/google.js';
import { ContactStore } from './store/index.js';
import { SyncEngine } from './sync/index.js';
import { logger } from './utils/index.js';

async function main() {
  const config = await loadConfig();
  const credentials = new CredentialsFile(credentialsPath(config));

  let provider: GoogleProvider | undefined;
  if (authStatus(await credentials.read()) === 'authenticated') {
    const session = new GoogleSession(credentials, redirectUri(config));
    provider = new GoogleProvider(googlePeopleApi(session), new SyncTokenFile(syncTokenPath(config)));
  } else {
    logger.warn('Not authorized with Google: running local-only');
  }

  const store = new ContactStore(peopleDir(config), provider);
  await store.init();

  const server = createServer({ store, sync: provider ? new SyncEngine(store, provider) : undefined });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('addressbook-mcp server running on stdio');
}

main().catch((err) => {
  logger.error('Fatal error:', err);
  process.exit(1);
});
