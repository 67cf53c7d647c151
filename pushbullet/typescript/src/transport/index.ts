/**
 * HTTP transport layer for the PushBullet client.
 */

import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import FormData from 'form-data';
import { AuthProvider } from '../auth';
import { PushbulletConfig } from '../config';
import { PushbulletError, fromApiError, parseApiError } from '../errors';
import { Logger, NoopLogger } from '../observability/logging';

/**
 * HTTP request options.
 */
export interface HttpRequest {
  /** HTTP method. */
  method: 'GET' | 'POST';
  /** URL path relative to the base URL, or an absolute URL. */
  path: string;
  /** Request body (JSON value or FormData). */
  body?: unknown;
  /** Additional headers. */
  headers?: Record<string, string>;
  /** Request timeout override. */
  timeout?: number;
  /** Whether the response body must be JSON. Defaults to true. */
  expectJson?: boolean;
}

/**
 * HTTP response.
 *
 * `data` is the parsed JSON body, or the raw text when the request did not
 * expect JSON.
 */
export interface HttpResponse {
  /** HTTP status code. */
  status: number;
  /** Response headers, lower-cased. */
  headers: Record<string, string>;
  /** Response body. */
  data: unknown;
}

/**
 * HTTP transport interface.
 */
export interface HttpTransport {
  /**
   * Sends a request and returns the classified response.
   *
   * Rejects with a PushbulletError for transport failures, error bodies and
   * unsuccessful statuses.
   */
  request(req: HttpRequest): Promise<HttpResponse>;
}

/**
 * Options for the axios transport.
 */
export interface AxiosTransportOptions {
  /** Logger for request and response traces. */
  logger?: Logger;
  /** Replaces the axios network adapter. */
  adapter?: AxiosAdapter;
}

type ParsedBody = { ok: true; value: unknown } | { ok: false; error: Error };

/**
 * Default HTTP transport using axios.
 */
export class AxiosTransport implements HttpTransport {
  private readonly client: AxiosInstance;
  private readonly auth: AuthProvider;
  private readonly config: PushbulletConfig;
  private readonly logger: Logger;

  constructor(config: PushbulletConfig, auth: AuthProvider, options: AxiosTransportOptions = {}) {
    this.config = config;
    this.auth = auth;
    this.logger = options.logger ?? new NoopLogger();
    this.client = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeout,
      headers: {
        'Content-Type': 'application/json',
        ...config.customHeaders,
      },
      // Bodies are decoded here so that undecodable ones keep their raw text.
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
      adapter: options.adapter,
    });
  }

  async request(req: HttpRequest): Promise<HttpResponse> {
    const headers: Record<string, string> = {
      ...this.auth.getAuthHeaders(),
      ...req.headers,
    };
    if (req.body instanceof FormData) {
      Object.assign(headers, req.body.getHeaders());
    }

    const target = stripQuery(req.path);
    this.logger.debug('Sending request', { method: req.method, path: target });

    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.request<unknown>({
        method: req.method,
        url: req.path,
        headers,
        data: req.body,
        timeout: req.timeout ?? this.config.timeout,
      });
    } catch (error) {
      throw this.mapTransportError(error, req.timeout ?? this.config.timeout);
    }

    const status = response.status;
    const text = bodyText(response.data);
    this.logger.debug('Received response', { method: req.method, path: target, status });

    const parsed = parseJson(text);
    if (parsed.ok) {
      const apiError = parseApiError(parsed.value);
      if (apiError) {
        throw fromApiError(status, apiError);
      }
    }

    if (status < 200 || status >= 300) {
      if (status === 401) {
        throw PushbulletError.authentication('Server returned HTTP 401', status);
      }
      throw PushbulletError.status(status, text);
    }

    const result = {
      status,
      headers: normalizeHeaders(response.headers),
    };

    if (req.expectJson === false) {
      return { ...result, data: text };
    }

    if (!parsed.ok) {
      throw PushbulletError.invalidResponse(
        `Invalid response JSON from ${target}: ${parsed.error.message}`,
        text,
        parsed.error
      );
    }

    return { ...result, data: parsed.value };
  }

  private mapTransportError(error: unknown, timeout: number): PushbulletError {
    if (error instanceof PushbulletError) {
      return error;
    }
    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return PushbulletError.timeout(`Request timed out after ${timeout}ms`, error);
      }
      return PushbulletError.network(`Network error: ${error.message}`, error);
    }
    if (error instanceof Error) {
      return PushbulletError.network(error.message, error);
    }
    return PushbulletError.network('Unknown network error');
  }
}

function parseJson(text: string): ParsedBody {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
  }
}

function bodyText(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf-8');
  }
  if (data === undefined || data === null) {
    return '';
  }
  return JSON.stringify(data);
}

function stripQuery(path: string): string {
  const index = path.indexOf('?');
  return index === -1 ? path : path.slice(0, index);
}

function normalizeHeaders(headers: object): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      result[key.toLowerCase()] = value;
    } else if (Array.isArray(value)) {
      result[key.toLowerCase()] = value.join(', ');
    }
  }
  return result;
}

/**
 * Creates an HTTP transport.
 */
export function createTransport(
  config: PushbulletConfig,
  auth: AuthProvider,
  options?: AxiosTransportOptions
): HttpTransport {
  return new AxiosTransport(config, auth, options);
}
