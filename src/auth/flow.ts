import * as http from 'node:http';
import type { AuthState, Credentials } from '../types/index.js';
import {
  AuthorizationCancelledError,
  AuthorizationError,
  StateMismatchError,
  logger,
} from '../utils/index.js';
import type { CredentialsFile } from './credentials.js';
import { generatePkce, generateState } from './pkce.js';
import type { AuthorizationClient } from './session.js';

export interface AuthorizationFlowOptions {
  client: AuthorizationClient;
  credentials: CredentialsFile;
  /** Fixed redirect port registered with the provider. 0 picks a free port. */
  port: number;
  host?: string;
  callbackPath?: string;
  /** How long the listener stays up after answering the callback. */
  shutdownDelayMs?: number;
}

export interface PendingAuthorization {
  authUrl: string;
  port: number;
  /** Settles exactly once, after the callback listener has closed. */
  result: Promise<Credentials>;
}

const SUCCESS_PAGE = `<!doctype html>
<html><head><title>Authorized</title></head>
<body><h1>Authorization complete</h1><p>You can close this window.</p></body></html>
`;

/**
 * Authorization-code flow with PKCE and a one-shot local callback listener.
 */
export class AuthorizationFlow {
  private client: AuthorizationClient;
  private credentials: CredentialsFile;
  private port: number;
  private host: string;
  private callbackPath: string;
  private shutdownDelayMs: number;
  private current: AuthState = 'unauthenticated';

  constructor(options: AuthorizationFlowOptions) {
    this.client = options.client;
    this.credentials = options.credentials;
    this.port = options.port;
    this.host = options.host ?? '127.0.0.1';
    this.callbackPath = options.callbackPath ?? '/callback';
    this.shutdownDelayMs = options.shutdownDelayMs ?? 100;
  }

  get status(): AuthState {
    return this.current;
  }

  async start(signal?: AbortSignal): Promise<PendingAuthorization> {
    if (this.current === 'pending') throw new AuthorizationError('Authorization already in progress');
    if (signal?.aborted) throw new AuthorizationCancelledError();

    const pkce = generatePkce();
    const state = generateState();
    const authUrl = this.client.authorizationUrl({ state, codeChallenge: pkce.challenge });

    let resolveResult: (creds: Credentials) => void = () => {};
    let rejectResult: (err: Error) => void = () => {};
    const result = new Promise<Credentials>((resolve, reject) => {
      resolveResult = resolve;
      rejectResult = reject;
    });

    let concluded = false;
    const conclude = (outcome: Credentials | Error, delayMs: number): void => {
      if (concluded) return;
      concluded = true;
      signal?.removeEventListener('abort', onAbort);
      setTimeout(() => {
        server.close(() => {
          if (outcome instanceof Error) {
            this.current = 'unauthenticated';
            rejectResult(outcome);
          } else {
            this.current = 'authenticated';
            resolveResult(outcome);
          }
        });
        server.closeAllConnections();
      }, delayMs);
    };
    const onAbort = (): void => {
      logger.info('Authorization cancelled');
      conclude(new AuthorizationCancelledError(), 0);
    };

    const handle = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
      const url = new URL(req.url ?? '/', `http://${this.host}`);
      if (url.pathname !== this.callbackPath) {
        res.writeHead(404, { 'Content-Type': 'text/plain' }).end('Not found');
        return;
      }
      if (concluded) {
        res.writeHead(410, { 'Content-Type': 'text/plain' }).end('Authorization already handled');
        return;
      }

      const fail = (status: number, err: Error): void => {
        logger.error(`Authorization failed: ${err.message}`);
        res.writeHead(status, { 'Content-Type': 'text/plain' }).end(err.message);
        conclude(err, this.shutdownDelayMs);
      };

      const providerError = url.searchParams.get('error');
      if (providerError) {
        const description = url.searchParams.get('error_description');
        fail(400, new AuthorizationError(`Provider returned error: ${providerError}${description ? ` - ${description}` : ''}`));
        return;
      }
      const code = url.searchParams.get('code');
      if (!code) {
        fail(400, new AuthorizationError('Callback is missing the authorization code'));
        return;
      }
      if (url.searchParams.get('state') !== state) {
        fail(400, new StateMismatchError());
        return;
      }

      let creds: Credentials;
      try {
        const tokens = await this.client.exchangeCode(code, pkce.verifier);
        creds = await this.credentials.merge(tokens);
      } catch (err) {
        fail(500, err instanceof Error ? err : new AuthorizationError(String(err)));
        return;
      }

      logger.info(`Authorized${creds.email ? ` as ${creds.email}` : ''}`);
      res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' }).end(SUCCESS_PAGE);
      conclude(creds, this.shutdownDelayMs);
    };

    const server = http.createServer((req, res) => {
      handle(req, res).catch((err: unknown) => {
        logger.error('Callback handler failed:', err);
        if (!res.headersSent) res.writeHead(500).end();
        conclude(err instanceof Error ? err : new AuthorizationError(String(err)), 0);
      });
    });

    try {
      await new Promise<void>((resolve, reject) => {
        server.once('error', reject);
        server.listen(this.port, this.host, () => {
          server.off('error', reject);
          resolve();
        });
      });
    } catch (err) {
      throw new AuthorizationError(`Cannot listen on ${this.host}:${this.port}`, err);
    }
    server.on('error', (err: Error) => conclude(new AuthorizationError('Callback listener failed', err), 0));

    const address = server.address();
    const port = typeof address === 'object' && address !== null ? address.port : this.port;

    this.current = 'pending';
    // The signal may have fired while the listener was binding
    if (signal?.aborted) onAbort();
    else signal?.addEventListener('abort', onAbort, { once: true });
    logger.info(`Waiting for authorization callback on http://${this.host}:${port}${this.callbackPath}`);

    return { authUrl, port, result };
  }
}
