import { itemsFixture } from './fixtures';

export { resolveApiConfig, DEFAULT_BASE_URL, DEFAULT_TIMEOUT, type ApiConfig } from './config';
export {
  ApiClient,
  ApiResponse,
  TransportError,
  type HttpMethod,
  type RequestOptions,
} from './client/apiClient';
export { ItemsApi, readItem, readItemList, type ItemId } from './client/itemsApi';
export * from './fixtures';
export * from './utils';

/**
 * Test function with every fixture of the suite
 */
export const test = itemsFixture;
export { expect } from '@playwright/test';
