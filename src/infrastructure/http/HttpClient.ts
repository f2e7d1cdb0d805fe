import axios, { AxiosInstance, AxiosRequestConfig, AxiosError } from 'axios';
import { Readable } from 'stream';
import { Result, ApiError, DownloadStream, ok, err } from '../../application/types/index';
import { config } from '../../config/index';
import { logger } from '../logging/Logger';

/**
 * HTTP client configuration
 */
export interface HttpClientConfig {
  baseURL: string;
  timeout: number;
  downloadTimeout: number;
}

/**
 * HTTP client interface
 */
export interface IHttpClient {
  get<T>(url: string, config?: AxiosRequestConfig): Promise<Result<T, ApiError>>;
  download(url: string): Promise<Result<DownloadStream, ApiError>>;
  setAuthToken(token: string): void;
  clearAuthToken(): void;
}

/**
 * Default HTTP client configuration
 * Failed requests are not retried; callers see the first error
 */
const DEFAULT_CONFIG: HttpClientConfig = {
  baseURL: config.zoom.apiBaseUrl,
  timeout: config.http.timeoutMs,
  downloadTimeout: config.http.downloadTimeoutMs,
};

function readString(data: unknown, key: string): string | undefined {
  if (typeof data === 'object' && data !== null && key in data) {
    const value: unknown = Reflect.get(data, key);
    return typeof value === 'string' ? value : undefined;
  }
  return undefined;
}

function readStringArray(data: unknown, key: string): string[] | undefined {
  if (typeof data === 'object' && data !== null && key in data) {
    const value: unknown = Reflect.get(data, key);
    if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
      return value;
    }
  }
  return undefined;
}

function parseRetryAfter(header: unknown, fallback: number): number {
  const parsed = typeof header === 'string' ? parseInt(header, 10) : NaN;
  return isNaN(parsed) ? fallback : parsed;
}

/**
 * Convert axios error to API error
 * Zoom error bodies look like { code: 124, message: 'Invalid access token.' }
 */
export function axiosErrorToApiError(error: AxiosError): ApiError {
  if (error.response) {
    const status = error.response.status;
    const data: unknown = error.response.data;
    const message = readString(data, 'message') || readString(data, 'reason') || error.message;

    switch (status) {
      case 400:
        return { type: 'VALIDATION_ERROR', message };
      case 401:
        return { type: 'AUTH_ERROR', message };
      case 403:
        return {
          type: 'PERMISSION_ERROR',
          message,
          requiredScopes: readStringArray(data, 'required_scopes'),
        };
      case 404:
        return {
          type: 'NOT_FOUND',
          message,
          resourceType: 'unknown',
          resourceId: error.config?.url || 'unknown',
        };
      case 429:
        return {
          type: 'RATE_LIMITED',
          message: 'Rate limit exceeded',
          retryAfter: parseRetryAfter(error.response.headers['retry-after'], 60),
        };
      default:
        return {
          type: 'SERVER_ERROR',
          message,
          statusCode: status,
        };
    }
  }

  return {
    type: 'NETWORK_ERROR',
    message: error.message || 'Network error occurred',
    cause: error,
  };
}

/**
 * Convert anything thrown by a request into an API error
 */
export function toApiError(error: unknown): ApiError {
  if (axios.isAxiosError(error)) {
    return axiosErrorToApiError(error);
  }

  return {
    type: 'NETWORK_ERROR',
    message: error instanceof Error ? error.message : 'Unknown error occurred',
    cause: error instanceof Error ? error : undefined,
  };
}

/**
 * HTTP client for the Zoom REST API
 */
export class HttpClient implements IHttpClient {
  private readonly client: AxiosInstance;
  private readonly config: HttpClientConfig;
  private authToken: string | null = null;

  constructor(httpConfig?: Partial<HttpClientConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...httpConfig };

    this.client = axios.create({
      baseURL: this.config.baseURL,
      timeout: this.config.timeout,
    });

    this.setupInterceptors();
  }

  /**
   * Setup request/response interceptors
   */
  private setupInterceptors(): void {
    this.client.interceptors.request.use(
      (requestConfig) => {
        if (this.authToken) {
          requestConfig.headers.Authorization = `Bearer ${this.authToken}`;
        }

        logger.debug('HTTP Request', {
          method: requestConfig.method?.toUpperCase(),
          url: requestConfig.url,
          baseURL: requestConfig.baseURL,
        });

        return requestConfig;
      },
      (error: unknown) => {
        logger.error('Request error', error instanceof Error ? error : undefined);
        return Promise.reject(error);
      }
    );

    this.client.interceptors.response.use(
      (response) => {
        logger.debug('HTTP Response', {
          status: response.status,
          url: response.config.url,
        });
        return response;
      },
      (error: unknown) => {
        if (axios.isAxiosError(error)) {
          logger.error('Response error', error, {
            status: error.response?.status,
            url: error.config?.url,
          });
        }
        return Promise.reject(error);
      }
    );
  }

  /**
   * Set authentication token
   */
  setAuthToken(token: string): void {
    this.authToken = token;
    logger.debug('Auth token set');
  }

  /**
   * Clear authentication token
   */
  clearAuthToken(): void {
    this.authToken = null;
    logger.debug('Auth token cleared');
  }

  /**
   * GET request
   */
  async get<T>(url: string, requestConfig?: AxiosRequestConfig): Promise<Result<T, ApiError>> {
    try {
      const response = await this.client.get<T>(url, requestConfig);
      return ok(response.data);
    } catch (error) {
      return err(toApiError(error));
    }
  }

  /**
   * Stream a file. Absolute URLs (Zoom download URLs) bypass baseURL.
   */
  async download(url: string): Promise<Result<DownloadStream, ApiError>> {
    try {
      const response = await this.client.get<Readable>(url, {
        responseType: 'stream',
        timeout: this.config.downloadTimeout,
      });

      const contentType: unknown = response.headers['content-type'];
      const contentLength: unknown = response.headers['content-length'];
      const length = typeof contentLength === 'string' ? parseInt(contentLength, 10) : NaN;

      return ok({
        data: response.data,
        mimeType: typeof contentType === 'string' ? contentType : 'application/octet-stream',
        contentLength: isNaN(length) ? undefined : length,
      });
    } catch (error) {
      // Error bodies are unread streams here as well
      if (axios.isAxiosError(error)) {
        const body: unknown = error.response?.data;
        if (body instanceof Readable) {
          body.destroy();
        }
      }
      return err(toApiError(error));
    }
  }
}

/**
 * Default HTTP client instance
 */
export const httpClient = new HttpClient();

export default httpClient;
