import * as fs from 'fs/promises';
import * as path from 'path';
import { TokenData } from '../../application/types/index';
import { config } from '../../config/index';
import { logger } from '../logging/Logger';

/**
 * Token store interface
 */
export interface ITokenStore {
  save(data: TokenData): Promise<void>;
  load(): Promise<TokenData | null>;
  clear(): Promise<void>;
  isExpired(data: TokenData): boolean;
  getTimeUntilExpiry(data: TokenData): number;
}

/**
 * Refresh threshold in milliseconds (tokens this close to expiry count as expired)
 */
const REFRESH_THRESHOLD_MS = config.zoom.tokenRefreshThresholdSeconds * 1000;

function isFileMissing(error: unknown): boolean {
  return error instanceof Error && Reflect.get(error, 'code') === 'ENOENT';
}

/**
 * Check that parsed JSON has the shape of stored token data
 */
export function isTokenData(value: unknown): value is TokenData {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  const accessToken: unknown = Reflect.get(value, 'accessToken');
  const refreshToken: unknown = Reflect.get(value, 'refreshToken');
  const expiresAt: unknown = Reflect.get(value, 'expiresAt');
  const grantType: unknown = Reflect.get(value, 'grantType');

  return (
    typeof accessToken === 'string' &&
    (refreshToken === undefined || typeof refreshToken === 'string') &&
    typeof expiresAt === 'number' &&
    (grantType === 'authorization_code' || grantType === 'account_credentials')
  );
}

/**
 * Expiry checks shared by all stores
 */
abstract class BaseTokenStore implements ITokenStore {
  constructor(protected readonly refreshThresholdMs: number = REFRESH_THRESHOLD_MS) {}

  abstract save(data: TokenData): Promise<void>;
  abstract load(): Promise<TokenData | null>;
  abstract clear(): Promise<void>;

  /**
   * Check if token is expired or about to expire
   */
  isExpired(data: TokenData): boolean {
    return data.expiresAt - Date.now() <= this.refreshThresholdMs;
  }

  /**
   * Get time until token expiry in milliseconds
   */
  getTimeUntilExpiry(data: TokenData): number {
    return Math.max(0, data.expiresAt - Date.now());
  }
}

/**
 * Keeps the token for the lifetime of the process only
 */
export class MemoryTokenStore extends BaseTokenStore {
  private data: TokenData | null = null;

  async save(data: TokenData): Promise<void> {
    this.data = { ...data };
  }

  async load(): Promise<TokenData | null> {
    return this.data ? { ...this.data } : null;
  }

  async clear(): Promise<void> {
    this.data = null;
  }
}

/**
 * File-based token store, used by the CLI where every command is a new process
 */
export class FileTokenStore extends BaseTokenStore {
  private readonly filePath: string;

  constructor(filePath?: string, refreshThresholdMs?: number) {
    super(refreshThresholdMs);
    this.filePath = filePath || path.resolve(process.cwd(), config.storage.tokenFile);
  }

  /**
   * Save token data to file
   */
  async save(data: TokenData): Promise<void> {
    try {
      const content = JSON.stringify(data, null, 2);
      await fs.writeFile(this.filePath, content, { encoding: 'utf-8', mode: 0o600 });
      logger.debug('Token saved successfully', { filePath: this.filePath });
    } catch (error) {
      logger.error('Failed to save token', error instanceof Error ? error : undefined);
      throw error;
    }
  }

  /**
   * Load token data from file
   */
  async load(): Promise<TokenData | null> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isFileMissing(error)) {
        logger.debug('Token file not found', { filePath: this.filePath });
        return null;
      }
      logger.error('Failed to load token', error instanceof Error ? error : undefined);
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch {
      logger.warn('Token file is not valid JSON, ignoring it', { filePath: this.filePath });
      return null;
    }

    if (!isTokenData(data)) {
      logger.warn('Token file has unexpected content, ignoring it', { filePath: this.filePath });
      return null;
    }

    logger.debug('Token loaded successfully', { filePath: this.filePath });
    return data;
  }

  /**
   * Clear (delete) token file
   */
  async clear(): Promise<void> {
    try {
      await fs.unlink(this.filePath);
      logger.debug('Token cleared successfully', { filePath: this.filePath });
    } catch (error) {
      if (isFileMissing(error)) {
        logger.debug('Token file does not exist, nothing to clear');
        return;
      }
      logger.error('Failed to clear token', error instanceof Error ? error : undefined);
      throw error;
    }
  }
}
