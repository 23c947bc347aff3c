export const DEFAULT_BASE_URL = 'http://127.0.0.1:8081';
export const DEFAULT_TIMEOUT = 30000;

/**
 * Settings for a test session against the API under test.
 * Resolved once per worker and frozen afterwards.
 */
export type ApiConfig = Readonly<{
  /** Base URL every request path is appended to, without a trailing slash */
  baseURL: string;
  /** Per-request timeout in milliseconds */
  timeout: number;
  /** Log every request with its status and duration */
  debug: boolean;
  /** Fail the test when a cleanup task fails instead of only warning */
  strictCleanup: boolean;
}>;

function resolveBaseUrl(raw: string | undefined): string {
  const value = raw?.trim();
  if (!value) {
    return DEFAULT_BASE_URL;
  }

  let url: URL;
  try {
    url = new URL(value);
  } catch (error) {
    throw new Error(`Invalid API_BASE_URL "${value}": not a valid URL`, { cause: error });
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error(`Invalid API_BASE_URL "${value}": expected an http or https URL`);
  }

  return value.replace(/\/+$/, '');
}

function resolveTimeout(raw: string | undefined): number {
  const timeout = parseInt(raw || '', 10);
  return Number.isInteger(timeout) && timeout > 0 ? timeout : DEFAULT_TIMEOUT;
}

/**
 * Resolves the API configuration from environment variables
 *
 * - `API_BASE_URL` - target service (default: http://127.0.0.1:8081)
 * - `API_TIMEOUT` - request timeout in ms (default: 30000)
 * - `API_DEBUG` - `true` logs each request
 * - `API_STRICT_CLEANUP` - `true` turns cleanup failures into test failures
 *
 * @throws Error if `API_BASE_URL` is set but is not an http(s) URL
 */
export function resolveApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  return Object.freeze({
    baseURL: resolveBaseUrl(env.API_BASE_URL),
    timeout: resolveTimeout(env.API_TIMEOUT),
    debug: env.API_DEBUG === 'true',
    strictCleanup: env.API_STRICT_CLEANUP === 'true',
  });
}
