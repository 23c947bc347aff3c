import { test as base } from '@playwright/test';
import { ApiConfig, resolveApiConfig } from '../config';
import { ApiClient } from '../client/apiClient';
import { ItemsApi } from '../client/itemsApi';

export type ApiWorkerFixtures = {
  apiConfig: ApiConfig;
  api: ApiClient;
  items: ItemsApi;
};

/**
 * API fixture providing a client bound to the configured base URL
 * Worker-scoped: one request context per worker, reused by every test in it,
 * disposed when the worker shuts down
 */
export const apiFixture = base.extend<{}, ApiWorkerFixtures>({
  apiConfig: [
    // eslint-disable-next-line no-empty-pattern
    async ({}, use) => {
      await use(resolveApiConfig());
    },
    { scope: 'worker' },
  ],

  api: [
    async ({ playwright, apiConfig }, use) => {
      const context = await playwright.request.newContext({
        extraHTTPHeaders: {
          'Accept': 'application/json',
        },
        timeout: apiConfig.timeout,
      });
      await use(new ApiClient(context, apiConfig));
      await context.dispose();
    },
    { scope: 'worker' },
  ],

  items: [
    async ({ api }, use) => {
      await use(new ItemsApi(api));
    },
    { scope: 'worker' },
  ],
});
