/**
 * CheckMKClient - thin fetch wrapper around the CheckMK REST API
 */

import { API } from './constants.js';
import { ApiErrorBodySchema, type ApiErrorBody } from './validation.js';
import type {
  ApiResponse,
  CheckMKApi,
  ConnectionConfig,
  RequestOptions,
} from './types.js';

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Raised for failed requests. `statusCode` is unset when no response arrived.
 */
export class CheckMKError extends Error {
  readonly statusCode?: number;
  readonly responseData: ApiErrorBody;

  constructor(
    message: string,
    statusCode?: number,
    responseData: ApiErrorBody = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CheckMKError';
    this.statusCode = statusCode;
    this.responseData = responseData;
  }
}

export class CheckMKClient implements CheckMKApi {
  private readonly config: ConnectionConfig;
  private readonly baseUrl: string;

  constructor(config: ConnectionConfig) {
    this.config = config;
    this.baseUrl = `${config.serverUrl}/${config.site}/${API.BASE_PATH}/`;
  }

  public get(path: string, options?: RequestOptions): Promise<ApiResponse> {
    return this.request('GET', path, undefined, options);
  }

  public post(path: string, body: unknown, options?: RequestOptions): Promise<ApiResponse> {
    return this.request('POST', path, body, options);
  }

  public put(path: string, body: unknown, options?: RequestOptions): Promise<ApiResponse> {
    return this.request('PUT', path, body, options);
  }

  public delete(path: string, options?: RequestOptions): Promise<ApiResponse> {
    return this.request('DELETE', path, undefined, options);
  }

  /**
   * Build the absolute URL for an API path
   */
  public url(path: string, params: RequestOptions['params'] = {}): URL {
    const url = new URL(path.replace(/^\/+/, ''), this.baseUrl);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url;
  }

  private async request(
    method: HttpMethod,
    path: string,
    body: unknown,
    options: RequestOptions = {}
  ): Promise<ApiResponse> {
    const url = this.url(path, options.params);
    const headers: Record<string, string> = {
      Accept: 'application/json',
      Authorization: `Bearer ${this.config.username} ${this.config.password}`,
      ...options.headers,
    };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    if (this.config.debug) {
      console.error(`🔎 ${method} ${url.pathname}${url.search}`);
    }

    // The timeout covers the body as well as the headers
    let response: Response;
    let data: unknown;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
      data = await readBody(response);
    } catch (error) {
      const reason =
        error instanceof Error && error.name === 'TimeoutError'
          ? `timed out after ${this.config.timeoutMs / 1000}s`
          : error instanceof Error
            ? error.message
            : String(error);
      throw new CheckMKError(`${method} ${url.pathname} failed: ${reason}`, undefined, {}, { cause: error });
    }

    if (this.config.debug) {
      console.error(`🔎 ${method} ${url.pathname} -> ${response.status}`);
    }

    if (!response.ok) {
      const parsed = ApiErrorBodySchema.safeParse(data);
      const errorBody: ApiErrorBody = parsed.success
        ? parsed.data
        : { detail: typeof data === 'string' && data ? data : undefined };
      throw new CheckMKError(
        errorBody.title ?? `${method} ${url.pathname} returned ${response.status}`,
        response.status,
        errorBody
      );
    }

    return {
      status: response.status,
      data,
      etag: response.headers.get('etag') ?? undefined,
    };
  }
}

async function readBody(response: Response): Promise<unknown> {
  if (response.status === 204) {
    return null;
  }
  const text = await response.text();
  if (!text) {
    return null;
  }
  const contentType = response.headers.get('content-type') ?? '';
  if (contentType.includes('json')) {
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      return text;
    }
  }
  return text;
}
