import { APIRequestContext, APIResponse } from '@playwright/test';
import { ApiConfig } from '../config';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS';

/**
 * Per-request options
 */
export type RequestOptions = {
  /** Serialized with JSON.stringify and sent as application/json */
  json?: unknown;
  /** Raw body sent exactly as given; ignored when `json` is set */
  body?: string;
  headers?: Record<string, string>;
};

/**
 * Raised when a request fails before any HTTP response is received
 * (connection refused, timeout, DNS failure). Never retried.
 */
export class TransportError extends Error {
  constructor(
    readonly method: HttpMethod,
    readonly url: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${method} ${url} failed before a response was received: ${reason}`, { cause });
    this.name = 'TransportError';
  }
}

/**
 * A fully read HTTP response
 */
export class ApiResponse {
  constructor(
    readonly method: HttpMethod,
    readonly url: string,
    readonly status: number,
    readonly headers: Record<string, string>,
    readonly text: string
  ) {}

  get ok(): boolean {
    return this.status >= 200 && this.status < 300;
  }

  get contentType(): string {
    return this.headers['content-type'] ?? '';
  }

  isJson(): boolean {
    return this.contentType.includes('application/json');
  }

  /**
   * Parse the body as JSON
   * @throws Error if the body is empty or not valid JSON
   */
  json(): unknown {
    if (this.text === '') {
      throw new Error(`${this.method} ${this.url} returned an empty body (status ${this.status})`);
    }
    try {
      return JSON.parse(this.text);
    } catch (error) {
      throw new Error(
        `${this.method} ${this.url} returned a body that is not valid JSON (status ${this.status}): ${this.text.slice(0, 200)}`,
        { cause: error }
      );
    }
  }

  toString(): string {
    return `${this.method} ${this.url} -> ${this.status}`;
  }
}

/**
 * HTTP client bound to the configured base URL.
 * Wraps a single APIRequestContext so connections are reused across calls.
 */
export class ApiClient {
  constructor(
    private context: APIRequestContext,
    readonly config: ApiConfig
  ) {}

  private log(message: string): void {
    if (this.config.debug) {
      console.log(`[ApiClient] ${message}`);
    }
  }

  /**
   * Build the absolute URL for a request path.
   * Paths are appended to the base URL so a base path prefix is kept.
   */
  resolveUrl(path: string): string {
    if (/^https?:\/\//.test(path)) {
      return path;
    }
    return `${this.config.baseURL}${path.startsWith('/') ? '' : '/'}${path}`;
  }

  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<ApiResponse> {
    const url = this.resolveUrl(path);
    const headers: Record<string, string> = { ...options.headers };
    let data: string | undefined;

    if (options.json !== undefined) {
      data = JSON.stringify(options.json);
      const hasContentType = Object.keys(headers).some((name) => name.toLowerCase() === 'content-type');
      if (!hasContentType) {
        headers['Content-Type'] = 'application/json';
      }
    } else if (options.body !== undefined) {
      data = options.body;
    }

    const startTime = Date.now();
    let response: APIResponse;
    let text: string;
    try {
      response = await this.context.fetch(url, {
        method,
        headers,
        data,
        timeout: this.config.timeout,
        failOnStatusCode: false,
      });
      text = await response.text();
    } catch (error) {
      this.log(`${method} ${path} failed: ${error instanceof Error ? error.message : String(error)}`);
      throw new TransportError(method, url, error);
    }

    const result = new ApiResponse(method, url, response.status(), response.headers(), text);
    this.log(`${method} ${path} -> ${result.status} (${Date.now() - startTime}ms)`);
    return result;
  }

  get(path: string, options?: RequestOptions): Promise<ApiResponse> {
    return this.request('GET', path, options);
  }

  post(path: string, options?: RequestOptions): Promise<ApiResponse> {
    return this.request('POST', path, options);
  }

  put(path: string, options?: RequestOptions): Promise<ApiResponse> {
    return this.request('PUT', path, options);
  }

  patch(path: string, options?: RequestOptions): Promise<ApiResponse> {
    return this.request('PATCH', path, options);
  }

  delete(path: string, options?: RequestOptions): Promise<ApiResponse> {
    return this.request('DELETE', path, options);
  }
}
