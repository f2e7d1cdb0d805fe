import axios, { AxiosInstance } from 'axios';
import {
  Result,
  TokenPair,
  TokenData,
  TokenState,
  AuthError,
  GrantType,
  ZoomCredentials,
  IOAuthService,
  ok,
  err,
} from '../types/index';
import { config } from '../../config/index';
import { MemoryTokenStore, ITokenStore } from '../../infrastructure/storage/TokenStore';
import { logger } from '../../infrastructure/logging/Logger';

/**
 * Scopes needed to list and download the user's cloud recordings
 */
const REQUIRED_SCOPES = [
  'cloud_recording:read:list_user_recordings',
  'cloud_recording:read:recording',
] as const;

/**
 * Authorization codes as Zoom hands them out in the redirect query
 */
const CODE_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * OAuth token response from Zoom
 */
interface ZoomTokenResponse {
  access_token: string;
  refresh_token?: string;
  token_type: string;
  expires_in: number;
  scope?: string;
}

/**
 * What a failed token request tells us
 */
interface TokenRequestFailure {
  status?: number;
  reason: string;
}

export interface OAuthServiceOptions {
  credentials?: ZoomCredentials;
  tokenStore?: ITokenStore;
  http?: AxiosInstance;
}

function defaultCredentials(): ZoomCredentials {
  return {
    clientId: config.zoom.clientId,
    clientSecret: config.zoom.clientSecret,
    grantType: config.zoom.grantType,
    redirectUri: config.zoom.redirectUri,
    accountId: config.zoom.accountId,
  };
}

/**
 * Zoom answers token errors with { reason, error }
 */
function describeFailure(error: unknown): TokenRequestFailure {
  if (axios.isAxiosError(error)) {
    const data: unknown = error.response?.data;
    let reason: string | undefined;
    if (typeof data === 'object' && data !== null) {
      const value: unknown = Reflect.get(data, 'reason') ?? Reflect.get(data, 'error');
      reason = typeof value === 'string' ? value : undefined;
    }
    return { status: error.response?.status, reason: reason || error.message };
  }
  return { reason: error instanceof Error ? error.message : 'Unknown error' };
}

/**
 * OAuth service: obtains, refreshes and hands out Zoom access tokens.
 *
 * Token lifecycle: UNAUTHENTICATED -> VALID -> EXPIRED -> (refresh) -> VALID.
 */
export class OAuthService implements IOAuthService {
  private readonly credentials: ZoomCredentials;
  private readonly tokenStore: ITokenStore;
  private readonly http: AxiosInstance;
  private readonly endpoints: { authorize: string; token: string };
  private cachedToken: TokenData | null = null;

  constructor(options: OAuthServiceOptions = {}) {
    this.credentials = options.credentials || defaultCredentials();
    this.tokenStore = options.tokenStore || new MemoryTokenStore();
    this.http = options.http || axios;
    this.endpoints = {
      authorize: `${config.zoom.oauthBaseUrl}/authorize`,
      token: `${config.zoom.oauthBaseUrl}/token`,
    };
  }

  get grantType(): GrantType {
    return this.credentials.grantType;
  }

  /**
   * Generate authorization URL for OAuth flow
   */
  getAuthorizationUrl(state: string): string {
    const params = new URLSearchParams({
      response_type: 'code',
      client_id: this.credentials.clientId,
      redirect_uri: this.credentials.redirectUri,
      state,
      scope: REQUIRED_SCOPES.join(' '),
    });

    const url = `${this.endpoints.authorize}?${params.toString()}`;

    logger.debug('Generated authorization URL', {
      clientId: this.credentials.clientId,
      redirectUri: this.credentials.redirectUri,
      scopes: REQUIRED_SCOPES,
    });

    return url;
  }

  /**
   * Accepts the bare code or the whole URL the browser was redirected to
   */
  parseAuthorizationCode(input: string): string | null {
    const trimmed = input.trim();

    if (trimmed.startsWith('http://') || trimmed.startsWith('https://')) {
      try {
        const code = new URL(trimmed).searchParams.get('code');
        return code && CODE_PATTERN.test(code) ? code : null;
      } catch {
        return null;
      }
    }

    return CODE_PATTERN.test(trimmed) ? trimmed : null;
  }

  /**
   * Obtain a token with the configured grant.
   * The authorization_code grant needs the code from the redirect.
   */
  async getToken(code?: string): Promise<Result<TokenPair, AuthError>> {
    if (this.credentials.grantType === 'account_credentials') {
      return this.requestAccountToken();
    }

    if (!code) {
      return err({
        type: 'INVALID_CODE',
        message: 'Authorization code is required for the authorization_code grant',
      });
    }

    return this.exchangeCodeForToken(code);
  }

  /**
   * Exchange authorization code for tokens
   */
  async exchangeCodeForToken(code: string): Promise<Result<TokenPair, AuthError>> {
    logger.info('Exchanging authorization code for token');

    const missing = this.missingCredentials(['clientId', 'clientSecret']);
    if (missing) {
      return err(missing);
    }

    const result = await this.requestToken({
      grant_type: 'authorization_code',
      code,
      redirect_uri: this.credentials.redirectUri,
    });

    if (!result.success) {
      const failure = result.error;
      logger.error('Token exchange failed', undefined, { status: failure.status, reason: failure.reason });

      if (failure.status === undefined) {
        return err({ type: 'NETWORK_ERROR', message: `Failed to exchange code: ${failure.reason}` });
      }
      return err({
        type: failure.status === 401 ? 'INVALID_CREDENTIALS' : 'INVALID_CODE',
        message: `Failed to exchange code: ${failure.reason}`,
      });
    }

    return this.storeToken(result.data, 'authorization_code');
  }

  /**
   * Server-to-server OAuth: request a token for the account directly
   */
  async requestAccountToken(): Promise<Result<TokenPair, AuthError>> {
    logger.info('Requesting account token');

    const missing = this.missingCredentials(['clientId', 'clientSecret', 'accountId']);
    if (missing) {
      return err(missing);
    }

    const result = await this.requestToken({
      grant_type: 'account_credentials',
      account_id: this.credentials.accountId,
    });

    if (!result.success) {
      const failure = result.error;
      logger.error('Account token request failed', undefined, { status: failure.status, reason: failure.reason });

      return err({
        type: failure.status === undefined ? 'NETWORK_ERROR' : 'INVALID_CREDENTIALS',
        message: `Failed to acquire token: ${failure.reason}`,
      });
    }

    return this.storeToken(result.data, 'account_credentials');
  }

  /**
   * Refresh access token using refresh token.
   * Account tokens have none and are requested again instead.
   */
  async refreshToken(): Promise<Result<TokenPair, AuthError>> {
    logger.info('Refreshing access token');

    if (!this.cachedToken) {
      this.cachedToken = await this.tokenStore.load();
    }

    if (!this.cachedToken) {
      return err({
        type: 'REFRESH_FAILED',
        message: 'No token available to refresh',
      });
    }

    if (!this.cachedToken.refreshToken) {
      if (this.cachedToken.grantType === 'account_credentials') {
        return this.requestAccountToken();
      }
      return err({
        type: 'REFRESH_FAILED',
        message: 'No refresh token available',
      });
    }

    const { refreshToken, grantType } = this.cachedToken;
    const result = await this.requestToken({
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
    });

    if (!result.success) {
      const failure = result.error;
      logger.error('Token refresh failed', undefined, { status: failure.status, reason: failure.reason });

      return err({
        type: failure.status === undefined ? 'NETWORK_ERROR' : 'REFRESH_FAILED',
        message: `Failed to refresh token: ${failure.reason}`,
      });
    }

    // Keep the current refresh token when the response does not rotate it
    return this.storeToken(result.data, grantType, refreshToken);
  }

  /**
   * Get valid access token (refresh if needed)
   */
  async getAccessToken(): Promise<Result<string, AuthError>> {
    if (!this.cachedToken) {
      this.cachedToken = await this.tokenStore.load();
    }

    const token = this.cachedToken;

    if (!token) {
      return err({
        type: 'TOKEN_EXPIRED',
        message: 'No token available. Please authenticate first.',
      });
    }

    if (this.tokenStore.isExpired(token)) {
      logger.info('Token expired or about to expire, refreshing');

      const refreshResult = await this.refreshToken();
      if (!refreshResult.success) {
        return err(refreshResult.error);
      }
      return ok(refreshResult.data.accessToken);
    }

    return ok(token.accessToken);
  }

  /**
   * Current lifecycle state of the held token
   */
  getTokenState(): TokenState {
    if (!this.cachedToken) {
      return 'UNAUTHENTICATED';
    }
    return this.tokenStore.isExpired(this.cachedToken) ? 'EXPIRED' : 'VALID';
  }

  /**
   * Check if user is authenticated
   */
  isAuthenticated(): boolean {
    return this.getTokenState() === 'VALID';
  }

  /**
   * Expiry of the held token, if any
   */
  getExpiresAt(): Date | null {
    return this.cachedToken ? new Date(this.cachedToken.expiresAt) : null;
  }

  /**
   * Logout (clear tokens)
   */
  async logout(): Promise<void> {
    this.cachedToken = null;
    await this.tokenStore.clear();

    logger.info('Logged out successfully');
  }

  /**
   * Load token from store (for initialization)
   */
  async loadToken(): Promise<void> {
    this.cachedToken = await this.tokenStore.load();

    if (this.cachedToken) {
      logger.debug('Token loaded from store', {
        expiresAt: new Date(this.cachedToken.expiresAt).toISOString(),
        state: this.getTokenState(),
      });
    }
  }

  /**
   * POST to the token endpoint with HTTP Basic client authentication
   */
  private async requestToken(
    params: Record<string, string>
  ): Promise<Result<ZoomTokenResponse, TokenRequestFailure>> {
    const basic = Buffer.from(
      `${this.credentials.clientId}:${this.credentials.clientSecret}`
    ).toString('base64');

    try {
      const response = await this.http.post<ZoomTokenResponse>(
        this.endpoints.token,
        new URLSearchParams(params).toString(),
        {
          headers: {
            'Content-Type': 'application/x-www-form-urlencoded',
            Authorization: `Basic ${basic}`,
          },
        }
      );
      return ok(response.data);
    } catch (error) {
      return err(describeFailure(error));
    }
  }

  private async storeToken(
    response: ZoomTokenResponse,
    grantType: GrantType,
    previousRefreshToken?: string
  ): Promise<Result<TokenPair, AuthError>> {
    const tokenPair: TokenPair = {
      accessToken: response.access_token,
      refreshToken: response.refresh_token ?? previousRefreshToken,
      expiresAt: new Date(Date.now() + response.expires_in * 1000),
      scope: response.scope,
    };

    const tokenData: TokenData = {
      accessToken: tokenPair.accessToken,
      refreshToken: tokenPair.refreshToken,
      expiresAt: tokenPair.expiresAt.getTime(),
      grantType,
    };

    await this.tokenStore.save(tokenData);
    this.cachedToken = tokenData;

    logger.info('Token acquired', {
      grantType,
      expiresAt: tokenPair.expiresAt.toISOString(),
      scopes: response.scope,
    });

    return ok(tokenPair);
  }

  private missingCredentials(
    keys: Array<'clientId' | 'clientSecret' | 'accountId'>
  ): AuthError | null {
    const missing = keys.filter(key => !this.credentials[key]);
    if (missing.length === 0) {
      return null;
    }
    return {
      type: 'INVALID_CREDENTIALS',
      message: `Missing Zoom credentials: ${missing.join(', ')}`,
    };
  }
}

/**
 * Default OAuth service instance
 */
export const oauthService = new OAuthService();

export default oauthService;
