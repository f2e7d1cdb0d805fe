import { AxiosError, AxiosHeaders, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

/**
 * Error as axios rejects it when the server answered with a non-2xx status
 */
export function httpError(
  status: number,
  data?: unknown,
  headers: Record<string, string> = {},
  url?: string
): AxiosError {
  const config: InternalAxiosRequestConfig = { headers: new AxiosHeaders(), url };
  const response: AxiosResponse = {
    data,
    status,
    statusText: String(status),
    headers,
    config,
  };

  return new AxiosError(
    `Request failed with status code ${status}`,
    status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
    config,
    {},
    response
  );
}

/**
 * Error as axios rejects it when no response arrived
 */
export function networkError(): AxiosError {
  return new AxiosError('Network Error', AxiosError.ERR_NETWORK, { headers: new AxiosHeaders() }, {});
}
