export interface Credentials {
  client_id: string;
  client_secret: string;
  refresh_token?: string;
  access_token?: string;
  email?: string;
}

export type AuthState = 'unauthenticated' | 'pending' | 'authenticated';

export interface TokenSet {
  refreshToken?: string;
  accessToken?: string;
  email?: string;
}
