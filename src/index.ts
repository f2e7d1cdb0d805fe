/**
 * Zoom cloud recordings helper
 *
 * Library entry point. The CLI lives in presentation/cli:
 *
 * npm run cli -- auth                    # Obtain a token
 * npm run cli -- recordings              # List recordings of the last month
 * npm run cli -- download <fileId|url>   # Download a recording file
 */

import { OAuthService } from './application/services/OAuthService';
import { RecordingService } from './application/services/RecordingService';
import { ZoomCredentials } from './application/types/index';
import { HttpClient, HttpClientConfig } from './infrastructure/http/HttpClient';
import { FileStorage } from './infrastructure/storage/FileStorage';
import { ITokenStore } from './infrastructure/storage/TokenStore';

export * from './application/types/index';
export { OAuthService, OAuthServiceOptions, oauthService } from './application/services/OAuthService';
export { RecordingService, recordingService } from './application/services/RecordingService';
export { HttpClient, HttpClientConfig, IHttpClient, axiosErrorToApiError } from './infrastructure/http/HttpClient';
export { FileStorage, IFileStorage, SavedFile } from './infrastructure/storage/FileStorage';
export { ITokenStore, MemoryTokenStore, FileTokenStore } from './infrastructure/storage/TokenStore';
export { OAuthCallbackServer, OAuthCallbackResult } from './infrastructure/server/OAuthCallbackServer';
export { Logger, ILogger, logger } from './infrastructure/logging/Logger';
export { config } from './config/index';

export interface RecordingClientOptions {
  credentials?: ZoomCredentials;
  tokenStore?: ITokenStore;
  outputDir?: string;
  http?: Partial<HttpClientConfig>;
}

export interface RecordingClient {
  auth: OAuthService;
  recordings: RecordingService;
}

/**
 * Wire the token manager and the recordings client together
 */
export function createRecordingClient(options: RecordingClientOptions = {}): RecordingClient {
  const auth = new OAuthService({
    credentials: options.credentials,
    tokenStore: options.tokenStore,
  });

  const recordings = new RecordingService(
    new HttpClient(options.http),
    new FileStorage(options.outputDir),
    auth
  );

  return { auth, recordings };
}
