import { Result } from './common';
import type { GrantType } from '../../config/index';

export type { GrantType };

/**
 * Zoom app credentials
 */
export interface ZoomCredentials {
  clientId: string;
  clientSecret: string;
  grantType: GrantType;
  redirectUri: string;  // authorization_code only
  accountId: string;    // account_credentials only
}

/**
 * Token pair returned from OAuth flow
 * Server-to-server (account_credentials) tokens carry no refresh token
 */
export interface TokenPair {
  accessToken: string;
  refreshToken?: string;
  expiresAt: Date;
  scope?: string;
}

/**
 * Token data for storage
 */
export interface TokenData {
  accessToken: string;
  refreshToken?: string;
  expiresAt: number; // Unix timestamp (ms)
  grantType: GrantType;
}

/**
 * Token lifecycle state
 */
export type TokenState = 'UNAUTHENTICATED' | 'VALID' | 'EXPIRED';

/**
 * Authentication error types
 */
export type AuthError =
  | { type: 'INVALID_CODE'; message: string }
  | { type: 'INVALID_CREDENTIALS'; message: string }
  | { type: 'TOKEN_EXPIRED'; message: string }
  | { type: 'REFRESH_FAILED'; message: string }
  | { type: 'NETWORK_ERROR'; message: string };

/**
 * OAuth service interface
 */
export interface IOAuthService {
  getAuthorizationUrl(state: string): string;
  parseAuthorizationCode(input: string): string | null;
  getToken(code?: string): Promise<Result<TokenPair, AuthError>>;
  exchangeCodeForToken(code: string): Promise<Result<TokenPair, AuthError>>;
  requestAccountToken(): Promise<Result<TokenPair, AuthError>>;
  refreshToken(): Promise<Result<TokenPair, AuthError>>;
  getAccessToken(): Promise<Result<string, AuthError>>;
  getTokenState(): TokenState;
  isAuthenticated(): boolean;
  loadToken(): Promise<void>;
  logout(): Promise<void>;
}
