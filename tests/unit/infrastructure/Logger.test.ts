import { Logger, maskSensitiveData, maskUrlCredentials } from '../../../src/infrastructure/logging/Logger';

// Mock config
jest.mock('../../../src/config/index', () => jest.requireActual('../../helpers/testConfig'));

describe('maskUrlCredentials', () => {
  it('should redact credentials passed as query parameters', () => {
    expect(maskUrlCredentials('https://zoom.us/rec/download/abc?access_token=test-token&foo=1'))
      .toBe('https://zoom.us/rec/download/abc?access_token=[REDACTED]&foo=1');
    expect(maskUrlCredentials('http://localhost:3000/oauth/callback?code=test-code&state=xyz'))
      .toBe('http://localhost:3000/oauth/callback?code=[REDACTED]&state=xyz');
  });

  it('should leave other text alone', () => {
    expect(maskUrlCredentials('/users/me/recordings?from=2024-03-01&to=2024-03-31'))
      .toBe('/users/me/recordings?from=2024-03-01&to=2024-03-31');
  });
});

describe('maskSensitiveData', () => {
  it('should mask token values keeping their first and last characters', () => {
    expect(maskSensitiveData({ accessToken: 'abcdefghijklmnop' })).toEqual({ accessToken: 'abcd********mnop' });
  });

  it('should fully mask short values', () => {
    expect(maskSensitiveData({ code: 'abc', clientSecret: 'short' })).toEqual({ code: '***', clientSecret: '*****' });
  });

  it('should redact non-string sensitive values', () => {
    expect(maskSensitiveData({ token: 12345 })).toEqual({ token: '[REDACTED]' });
  });

  it('should keep status codes readable', () => {
    expect(maskSensitiveData({ statusCode: 401, status: 401 })).toEqual({ statusCode: 401, status: 401 });
  });

  it('should mask nested objects and URLs in plain values', () => {
    expect(maskSensitiveData({
      request: { refresh_token: 'test-refresh-token', attempt: 2 },
      url: 'https://zoom.us/rec/download/abc?access_token=test-token',
    })).toEqual({
      request: { refresh_token: 'test**********oken', attempt: 2 },
      url: 'https://zoom.us/rec/download/abc?access_token=[REDACTED]',
    });
  });
});

describe('Logger', () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function lastEntry(spy: jest.SpyInstance) {
    return JSON.parse(spy.mock.calls[spy.mock.calls.length - 1][0]);
  }

  it('should write JSON entries with masked context', () => {
    new Logger('debug').info('Token stored', { accessToken: 'abcdefghijklmnop', expiresIn: 3600 });

    const entry = lastEntry(logSpy);
    expect(entry.level).toBe('info');
    expect(entry.message).toBe('Token stored');
    expect(entry.context).toEqual({ accessToken: 'abcd********mnop', expiresIn: 3600 });
    expect(typeof entry.timestamp).toBe('string');
  });

  it('should skip entries below the configured level', () => {
    const warnLogger = new Logger('warn');

    warnLogger.debug('debug message');
    warnLogger.info('info message');
    warnLogger.warn('warn message');

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(lastEntry(warnSpy).message).toBe('warn message');
  });

  it('should use the configured level by default', () => {
    const defaultLogger = new Logger();

    defaultLogger.warn('warn message');
    defaultLogger.error('error message');

    expect(warnSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('should mask credentials in error messages', () => {
    new Logger('error').error(
      'Download failed',
      new Error('GET https://zoom.us/rec/download/abc?access_token=test-token failed')
    );

    const entry = lastEntry(errorSpy);
    expect(entry.error.name).toBe('Error');
    expect(entry.error.message).toBe('GET https://zoom.us/rec/download/abc?access_token=[REDACTED] failed');
  });
});
