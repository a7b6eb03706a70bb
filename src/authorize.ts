#!/usr/bin/env node
import { credentialsPath, loadConfig, redirectUri } from './config.js';
import { CredentialsFile } from './auth/credentials.js';
import { AuthorizationFlow } from './auth/flow.js';
import { GoogleSession } from './auth/session.js';
import { NotAuthenticatedError, logger } from './utils/index.js';

/**
 * One-time Google authorization. Seeds the credentials file from
 * GOOGLE_CLIENT_ID / GOOGLE_CLIENT_SECRET when it does not exist yet.
 */
async function main() {
  const config = await loadConfig();
  const credentials = new CredentialsFile(credentialsPath(config));

  if (!(await credentials.read())) {
    const clientId = process.env.GOOGLE_CLIENT_ID;
    const clientSecret = process.env.GOOGLE_CLIENT_SECRET;
    if (!clientId || !clientSecret) {
      throw new NotAuthenticatedError(
        `No credentials at ${credentials.path}: set GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET`,
      );
    }
    await credentials.save({ client_id: clientId, client_secret: clientSecret });
  }

  const session = new GoogleSession(credentials, redirectUri(config));
  const flow = new AuthorizationFlow({
    client: await session.authorizationClient(),
    credentials,
    port: config.redirectPort,
    host: 'localhost',
  });

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const { authUrl, result } = await flow.start(controller.signal);
  console.log(`Open this URL in your browser to authorize:\n\n  ${authUrl}\n`);

  const creds = await result;
  logger.info(`Credentials saved to ${credentials.path}${creds.email ? ` for ${creds.email}` : ''}`);
}

main().catch((err) => {
  logger.error('Authorization failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
