import { google, Auth } from 'googleapis';
import type { Credentials, TokenSet } from '../types/index.js';
import { NotAuthenticatedError, logger, toProviderError } from '../utils/index.js';
import type { CredentialsFile } from './credentials.js';

export const GOOGLE_SCOPES = [
  'https://www.googleapis.com/auth/contacts',
  'https://www.googleapis.com/auth/userinfo.email',
];

/** The provider side of the authorization-code flow. */
export interface AuthorizationClient {
  authorizationUrl(params: { state: string; codeChallenge: string }): string;
  exchangeCode(code: string, codeVerifier: string): Promise<TokenSet>;
}

export type OAuth2ClientFactory = (clientId: string, clientSecret: string, redirectUri: string) => Auth.OAuth2Client;

const defaultClientFactory: OAuth2ClientFactory = (clientId, clientSecret, redirectUri) =>
  new google.auth.OAuth2(clientId, clientSecret, redirectUri);

/**
 * Google OAuth2 client bound to the stored credentials.
 */
export class GoogleSession {
  private credentials: CredentialsFile;
  private redirectUri: string;
  private createClient: OAuth2ClientFactory;

  constructor(credentials: CredentialsFile, redirectUri: string, createClient: OAuth2ClientFactory = defaultClientFactory) {
    this.credentials = credentials;
    this.redirectUri = redirectUri;
    this.createClient = createClient;
  }

  async authorizationClient(): Promise<AuthorizationClient> {
    const client = this.oauthClient(await this.credentials.load());
    return {
      authorizationUrl: ({ state, codeChallenge }) => client.generateAuthUrl({
        access_type: 'offline',
        prompt: 'consent',
        scope: GOOGLE_SCOPES,
        state,
        code_challenge: codeChallenge,
        code_challenge_method: Auth.CodeChallengeMethod.S256,
      }),
      exchangeCode: async (code, codeVerifier) => {
        try {
          const { tokens } = await client.getToken({ code, codeVerifier });
          const accessToken = tokens.access_token ?? undefined;
          const email = accessToken ? await this.lookupEmail(client, accessToken) : undefined;
          return { refreshToken: tokens.refresh_token ?? undefined, accessToken, email };
        } catch (err) {
          throw toProviderError('google', 'code exchange failed', err);
        }
      },
    };
  }

  /**
   * Exchange the stored refresh token for a current access token, persist the
   * refreshed pair, and return a client ready for one provider call.
   */
  async authorize(): Promise<Auth.OAuth2Client> {
    const creds = await this.credentials.load();
    if (!creds.refresh_token) throw new NotAuthenticatedError();

    const client = this.oauthClient(creds);
    // An expiry in the past makes getAccessToken() go through the refresh token
    client.setCredentials({ refresh_token: creds.refresh_token, access_token: creds.access_token, expiry_date: 1 });
    try {
      await client.getAccessToken();
    } catch (err) {
      throw toProviderError('google', 'token refresh failed', err);
    }

    await this.credentials.merge({
      refreshToken: client.credentials.refresh_token ?? undefined,
      accessToken: client.credentials.access_token ?? undefined,
    });
    logger.debug('Google: access token refreshed');
    return client;
  }

  /** The email is informational; a failed lookup keeps the issued tokens. */
  private async lookupEmail(client: Auth.OAuth2Client, accessToken: string): Promise<string | undefined> {
    try {
      return (await client.getTokenInfo(accessToken)).email;
    } catch (err) {
      logger.warn('Google: could not look up account email:', err instanceof Error ? err.message : err);
      return undefined;
    }
  }

  private oauthClient(creds: Credentials): Auth.OAuth2Client {
    return this.createClient(creds.client_id, creds.client_secret, this.redirectUri);
  }
}
