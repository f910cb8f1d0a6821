/**
 * axios-backed transport for the HTTP client adapter
 */

import axios, { type AxiosInstance } from 'axios';
import { ScanInterruptedError, TransportError } from '../errors.js';
import type { HttpTransport } from './http-client.js';

/** axios error codes that mean the request ran out of time */
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/** axios error codes that retrying cannot fix */
const PERMANENT_CODES = new Set(['ERR_BAD_RESPONSE', 'ERR_BAD_OPTION', 'ERR_BAD_OPTION_VALUE', 'ERR_INVALID_URL']);

/**
 * Flatten axios response headers into lower-cased strings
 */
export function normalizeHeaders(headers: object): Record<string, string> {
  const normalized: Record<string, string> = {};

  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || value === null) continue;
    normalized[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
  }

  return normalized;
}

/**
 * Create a transport. Every HTTP status resolves; status handling
 * belongs to the HttpClient.
 */
export function createAxiosTransport(instance: AxiosInstance = axios.create()): HttpTransport {
  return async (request) => {
    try {
      const response = await instance.request<string>({
        method: 'GET',
        url: request.url,
        params: request.params,
        headers: request.headers,
        timeout: request.timeoutMs,
        maxContentLength: request.maxContentLength ?? -1,
        responseType: 'text',
        validateStatus: () => true,
        signal: request.signal,
      });

      const body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data ?? '');

      return {
        status: response.status,
        body,
        headers: normalizeHeaders(response.headers),
      };
    } catch (error) {
      if (request.signal?.aborted || axios.isCancel(error)) {
        throw new ScanInterruptedError();
      }

      if (axios.isAxiosError(error)) {
        const code = error.code ?? '';
        if (TIMEOUT_CODES.has(code)) {
          throw new TransportError(
            `Request timed out after ${request.timeoutMs}ms: ${request.url}`,
            request.url,
            true,
            error
          );
        }
        throw new TransportError(
          `Request failed (${code || 'network error'}): ${error.message}`,
          request.url,
          !PERMANENT_CODES.has(code),
          error
        );
      }

      throw error;
    }
  };
}
