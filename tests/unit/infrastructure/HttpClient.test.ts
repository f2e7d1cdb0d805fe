import axios, { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { Readable } from 'stream';
import {
  HttpClient,
  axiosErrorToApiError,
  toApiError,
} from '../../../src/infrastructure/http/HttpClient';
import { httpError, networkError } from '../../helpers/axiosErrors';

// Mock config
jest.mock('../../../src/config/index', () => jest.requireActual('../../helpers/testConfig'));

// Mock logger
jest.mock('../../../src/infrastructure/logging/Logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

describe('axiosErrorToApiError', () => {
  it('should map 400 to a validation error', () => {
    expect(axiosErrorToApiError(httpError(400, { code: 300, message: 'Invalid date range.' }))).toEqual({
      type: 'VALIDATION_ERROR',
      message: 'Invalid date range.',
    });
  });

  it('should map 401 to an auth error', () => {
    expect(axiosErrorToApiError(httpError(401, { code: 124, message: 'Invalid access token.' }))).toEqual({
      type: 'AUTH_ERROR',
      message: 'Invalid access token.',
    });
  });

  it('should map 403 to a permission error with the missing scopes', () => {
    const error = httpError(403, {
      message: 'Invalid access token, does not contain scopes.',
      required_scopes: ['cloud_recording:read:list_user_recordings'],
    });

    expect(axiosErrorToApiError(error)).toEqual({
      type: 'PERMISSION_ERROR',
      message: 'Invalid access token, does not contain scopes.',
      requiredScopes: ['cloud_recording:read:list_user_recordings'],
    });
  });

  it('should map 404 to not found using the request URL', () => {
    const error = httpError(404, { code: 3301, message: 'This recording does not exist.' }, {}, '/meetings/123/recordings');

    expect(axiosErrorToApiError(error)).toEqual({
      type: 'NOT_FOUND',
      message: 'This recording does not exist.',
      resourceType: 'unknown',
      resourceId: '/meetings/123/recordings',
    });
  });

  it('should map 429 to rate limited with the Retry-After header', () => {
    expect(axiosErrorToApiError(httpError(429, {}, { 'retry-after': '12' }))).toEqual({
      type: 'RATE_LIMITED',
      message: 'Rate limit exceeded',
      retryAfter: 12,
    });
  });

  it('should default Retry-After to 60 seconds', () => {
    expect(axiosErrorToApiError(httpError(429))).toEqual({
      type: 'RATE_LIMITED',
      message: 'Rate limit exceeded',
      retryAfter: 60,
    });
  });

  it('should map other statuses to a server error', () => {
    expect(axiosErrorToApiError(httpError(502))).toEqual({
      type: 'SERVER_ERROR',
      message: 'Request failed with status code 502',
      statusCode: 502,
    });
  });

  it('should map a missing response to a network error', () => {
    const error = networkError();

    expect(axiosErrorToApiError(error)).toEqual({
      type: 'NETWORK_ERROR',
      message: 'Network Error',
      cause: error,
    });
  });
});

describe('toApiError', () => {
  it('should map plain errors to network errors', () => {
    const error = new Error('socket hang up');

    expect(toApiError(error)).toEqual({ type: 'NETWORK_ERROR', message: 'socket hang up', cause: error });
  });

  it('should map thrown non-errors to network errors', () => {
    expect(toApiError('boom')).toEqual({
      type: 'NETWORK_ERROR',
      message: 'Unknown error occurred',
      cause: undefined,
    });
  });
});

describe('HttpClient', () => {
  const createInstance = axios.create.bind(axios);
  let adapter: jest.Mock<Promise<AxiosResponse>, [InternalAxiosRequestConfig]>;

  function respond(data: unknown, headers: Record<string, string> = {}) {
    return (requestConfig: InternalAxiosRequestConfig): Promise<AxiosResponse> =>
      Promise.resolve({ data, status: 200, statusText: 'OK', headers, config: requestConfig });
  }

  function reject(error: AxiosError) {
    return (): Promise<AxiosResponse> => Promise.reject(error);
  }

  beforeEach(() => {
    adapter = jest.fn<Promise<AxiosResponse>, [InternalAxiosRequestConfig]>();
    jest.spyOn(axios, 'create').mockImplementation((instanceConfig) => createInstance({ ...instanceConfig, adapter }));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('get', () => {
    it('should send the bearer token and return the body', async () => {
      adapter.mockImplementationOnce(respond({ total_records: 0, meetings: [] }));
      const client = new HttpClient();
      client.setAuthToken('test-token');

      const result = await client.get('/users/me/recordings');

      expect(result).toEqual({ success: true, data: { total_records: 0, meetings: [] } });
      const requestConfig = adapter.mock.calls[0][0];
      expect(requestConfig.url).toBe('/users/me/recordings');
      expect(requestConfig.baseURL).toBe('https://api.zoom.us/v2');
      expect(requestConfig.headers.get('Authorization')).toBe('Bearer test-token');
    });

    it('should not send a token after it is cleared', async () => {
      adapter.mockImplementationOnce(respond({}));
      const client = new HttpClient();
      client.setAuthToken('test-token');
      client.clearAuthToken();

      await client.get('/users/me/recordings');

      expect(adapter.mock.calls[0][0].headers.has('Authorization')).toBe(false);
    });

    it('should return the first server error without retrying', async () => {
      adapter.mockImplementation(reject(httpError(503, { message: 'Service unavailable' })));
      const client = new HttpClient();

      const result = await client.get('/users/me/recordings');

      expect(result).toEqual({
        success: false,
        error: { type: 'SERVER_ERROR', message: 'Service unavailable', statusCode: 503 },
      });
      expect(adapter).toHaveBeenCalledTimes(1);
    });

    it('should return rate limiting without retrying', async () => {
      adapter.mockImplementation(reject(httpError(429, {}, { 'retry-after': '1' })));
      const client = new HttpClient();

      const result = await client.get('/users/me/recordings');

      expect(result).toEqual({
        success: false,
        error: { type: 'RATE_LIMITED', message: 'Rate limit exceeded', retryAfter: 1 },
      });
      expect(adapter).toHaveBeenCalledTimes(1);
    });

    it('should map auth failures', async () => {
      adapter.mockImplementationOnce(reject(httpError(401, { message: 'Invalid access token.' })));
      const client = new HttpClient();

      const result = await client.get('/users/me/recordings');

      expect(result).toEqual({ success: false, error: { type: 'AUTH_ERROR', message: 'Invalid access token.' } });
    });
  });

  describe('download', () => {
    it('should return the body stream with its content type and length', async () => {
      const body = Readable.from([Buffer.from('abc')]);
      adapter.mockImplementationOnce(respond(body, { 'content-type': 'video/mp4', 'content-length': '3' }));
      const client = new HttpClient();

      const result = await client.download('https://zoom.us/rec/download/test-file');

      expect(result).toEqual({
        success: true,
        data: { data: body, mimeType: 'video/mp4', contentLength: 3 },
      });
      const requestConfig = adapter.mock.calls[0][0];
      expect(requestConfig.responseType).toBe('stream');
      expect(requestConfig.timeout).toBe(300000);
    });

    it('should fall back to a generic content type', async () => {
      adapter.mockImplementationOnce(respond(Readable.from([Buffer.from('abc')])));
      const client = new HttpClient();

      const result = await client.download('https://zoom.us/rec/download/test-file');

      expect(result.success && result.data.mimeType).toBe('application/octet-stream');
      expect(result.success && result.data.contentLength).toBeUndefined();
    });

    it('should map failed downloads to API errors', async () => {
      adapter.mockImplementationOnce(reject(httpError(404, { code: 3301, message: 'File not found.' })));
      const client = new HttpClient();

      const result = await client.download('https://zoom.us/rec/download/missing');

      expect(result).toEqual({
        success: false,
        error: { type: 'NOT_FOUND', message: 'File not found.', resourceType: 'unknown', resourceId: 'unknown' },
      });
    });

    it('should release the error body stream of a failed download', async () => {
      const errorBody = Readable.from([Buffer.from('{"code":124,"message":"Invalid access token."}')]);
      adapter.mockImplementationOnce(reject(httpError(401, errorBody)));
      const client = new HttpClient();

      const result = await client.download('https://zoom.us/rec/download/test-file');

      expect(result.success).toBe(false);
      expect(!result.success && result.error.type).toBe('AUTH_ERROR');
      expect(errorBody.destroyed).toBe(true);
    });
  });
});
