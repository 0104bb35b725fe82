// HTTP client for the Fabric and Azure Resource Manager REST APIs

import type { Audience } from '../auth/audiences.js';
import { log, maskToken } from '../utils/logger.js';
import { ApiError } from './errors.js';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

/** What the client needs from the session: implemented by SessionManager. */
export interface TokenProvider {
  getBearerToken(audience?: Audience): Promise<string>;
  forceRefresh(audience?: Audience): Promise<string | null>;
}

export interface RequestOptions {
  json?: unknown;
  form?: FormData;
  query?: Record<string, string>;
}

export interface ApiResponse {
  status: number;
  headers: Headers;
  /** Parsed JSON body; undefined for empty (202/204) responses. */
  data: unknown;
}

export interface ApiClientOptions {
  baseUrls: Record<Audience, string>;
  fetch?: FetchLike;
}

export class ApiClient {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly tokens: TokenProvider,
    private readonly options: ApiClientOptions
  ) {
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  get(audience: Audience, path: string, options: RequestOptions = {}): Promise<ApiResponse> {
    return this.request('GET', audience, path, options);
  }

  post(audience: Audience, path: string, options: RequestOptions = {}): Promise<ApiResponse> {
    return this.request('POST', audience, path, options);
  }

  /**
   * Send one request. A 401 earns exactly one forced token refresh and retry;
   * every other failure is raised as-is.
   */
  async request(method: HttpMethod, audience: Audience, path: string, options: RequestOptions = {}): Promise<ApiResponse> {
    const url = this.buildUrl(audience, path, options.query);

    let token = await this.tokens.getBearerToken(audience);
    let response = await this.send(method, url, token, options);

    if (response.status === 401) {
      const refreshed = await this.tokens.forceRefresh(audience);
      if (refreshed !== null) {
        await response.text();
        log.debug(`${method} ${url} returned 401, retrying once with a refreshed token`);
        token = refreshed;
        response = await this.send(method, url, token, options);
      }
    }

    const text = await response.text();
    if (!response.ok) {
      throw ApiError.fromResponse(method, url, response.status, text);
    }

    return {
      status: response.status,
      headers: response.headers,
      data: parseBody(text, response.headers.get('content-type')),
    };
  }

  buildUrl(audience: Audience, path: string, query?: Record<string, string>): string {
    const base = this.options.baseUrls[audience].replace(/\/+$/, '');
    const suffix = path.startsWith('/') ? path : `/${path}`;
    const search = query && Object.keys(query).length > 0 ? `?${new URLSearchParams(query).toString()}` : '';
    return base + suffix + search;
  }

  private async send(method: HttpMethod, url: string, token: string, options: RequestOptions): Promise<Response> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
    };

    let body: string | FormData | undefined;
    if (options.form) {
      // fetch sets the multipart boundary itself
      body = options.form;
    } else if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
    }

    log.debug(`${method} ${url} (Authorization: Bearer ${maskToken(token)})`);

    let response: Response;
    try {
      response = await this.fetchImpl(url, { method, headers, body });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ApiError('NetworkFailure', `${method} ${url} failed: ${message}`, undefined, undefined, { cause: error });
    }

    log.debug(`${method} ${url} -> ${response.status}`);
    return response;
  }
}

function parseBody(text: string, contentType: string | null): unknown {
  if (text === '') {
    return undefined;
  }
  if (contentType?.includes('json')) {
    return JSON.parse(text);
  }
  return text;
}
