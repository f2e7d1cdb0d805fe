import dotenv from 'dotenv';

dotenv.config();

export type LogLevelSetting = 'debug' | 'info' | 'warn' | 'error';

export type GrantType = 'authorization_code' | 'account_credentials';

export interface Config {
  zoom: {
    clientId: string;
    clientSecret: string;
    accountId: string;
    grantType: GrantType;
    redirectUri: string;
    apiBaseUrl: string;
    oauthBaseUrl: string;
    tokenRefreshThresholdSeconds: number;
  };
  http: {
    timeoutMs: number;
    downloadTimeoutMs: number;
  };
  logging: {
    level: LogLevelSetting;
  };
  storage: {
    recordingsOutputDir: string;
    tokenFile: string;
  };
}

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Environment variable ${key} is required but not set`);
  }
  return value;
}

function getEnvVarAsNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number`);
  }
  return parsed;
}

function getEnvVarAsEnum<T extends string>(key: string, allowed: readonly T[], defaultValue: T): T {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const match = allowed.find(candidate => candidate === value);
  if (!match) {
    throw new Error(`Environment variable ${key} must be one of: ${allowed.join(', ')}`);
  }
  return match;
}

const accountId = getEnvVar('ZOOM_ACCOUNT_ID', '');

export const config: Config = {
  zoom: {
    clientId: getEnvVar('ZOOM_CLIENT_ID', ''),
    clientSecret: getEnvVar('ZOOM_CLIENT_SECRET', ''),
    accountId,
    // Server-to-server apps only carry an account id, user apps a redirect URI
    grantType: getEnvVarAsEnum<GrantType>(
      'ZOOM_GRANT_TYPE',
      ['authorization_code', 'account_credentials'],
      accountId ? 'account_credentials' : 'authorization_code'
    ),
    redirectUri: getEnvVar('ZOOM_REDIRECT_URI', 'http://localhost:3000/oauth/callback'),
    apiBaseUrl: getEnvVar('ZOOM_API_BASE_URL', 'https://api.zoom.us/v2'),
    oauthBaseUrl: getEnvVar('ZOOM_OAUTH_BASE_URL', 'https://zoom.us/oauth'),
    tokenRefreshThresholdSeconds: getEnvVarAsNumber('ZOOM_TOKEN_REFRESH_THRESHOLD_SECONDS', 300),
  },
  http: {
    timeoutMs: getEnvVarAsNumber('ZOOM_HTTP_TIMEOUT_MS', 30000),
    downloadTimeoutMs: getEnvVarAsNumber('ZOOM_DOWNLOAD_TIMEOUT_MS', 300000),
  },
  logging: {
    level: getEnvVarAsEnum<LogLevelSetting>('LOG_LEVEL', ['debug', 'info', 'warn', 'error'], 'info'),
  },
  storage: {
    recordingsOutputDir: getEnvVar('RECORDINGS_OUTPUT_DIR', './recordings'),
    tokenFile: getEnvVar('ZOOM_TOKEN_FILE', '.tokens.json'),
  },
};

export default config;
