import { cleanupFixture } from './cleanup';
import { ApiResponse } from '../client/apiClient';
import { ItemId, ItemsApi, readItem } from '../client/itemsApi';
import { ItemFactory } from '../utils/dataFactory';
import { Item, ItemPayload } from '../utils/itemSchemas';
import { ResourceScope } from '../utils/resourceScope';

export type CreateTestItem = (payload?: ItemPayload) => Promise<Item>;
export type SubmitItem = (payload: ItemPayload | Record<string, unknown>) => Promise<ApiResponse>;

export type ItemsFixtures = {
  validItemPayload: ItemPayload;
  minimalValidPayload: ItemPayload;
  sampleItems: ItemPayload[];
  createTestItem: CreateTestItem;
  submitItem: SubmitItem;
};

function deferDeletion(items: ItemsApi, scope: ResourceScope, id: ItemId): void {
  scope.defer(`DELETE /items/${id}`, async () => {
    const deletion = await items.remove(id);
    if (deletion.status !== 204 && deletion.status !== 404) {
      throw new Error(`${deletion}: ${deletion.text}`);
    }
  });
}

function createdItemId(response: ApiResponse): ItemId {
  const body = response.json();
  if (typeof body === 'object' && body !== null && 'id' in body) {
    const { id } = body;
    if ((typeof id === 'number' && Number.isInteger(id)) || (typeof id === 'string' && id !== '')) {
      return id;
    }
  }
  throw new Error(`${response} created an item without a usable id, it cannot be deleted:\n${response.text}`);
}

/**
 * POST a payload that the API may accept or reject.
 * When it answers 201, the new item's deletion is registered on `scope`
 * from the raw body, before the body is checked against the item schema.
 */
export async function submitScopedItem(
  items: ItemsApi,
  scope: ResourceScope,
  payload: ItemPayload | Record<string, unknown>
): Promise<ApiResponse> {
  const response = await items.create(payload);
  if (response.status === 201) {
    deferDeletion(items, scope, createdItemId(response));
  }
  return response;
}

/**
 * Create an item and register its deletion on `scope`.
 * The deletion accepts 404, so a test may delete the item itself.
 * @throws Error if the API does not answer 201 with an item
 */
export async function createScopedItem(
  items: ItemsApi,
  scope: ResourceScope,
  payload: ItemPayload
): Promise<Item> {
  const response = await submitScopedItem(items, scope, payload);
  if (response.status !== 201) {
    throw new Error(`Could not create test item: ${response}\n${response.text}`);
  }
  return readItem(response);
}

/**
 * Item fixtures: fresh payloads per test and a factory whose items are
 * deleted when the test ends
 *
 * @example
 * ```typescript
 * test('reads back an item', async ({ items, createTestItem }) => {
 *   const item = await createTestItem();
 *   expectStatus(await items.get(item.id), 200);
 * });
 * ```
 */
export const itemsFixture = cleanupFixture.extend<ItemsFixtures>({
  // eslint-disable-next-line no-empty-pattern
  validItemPayload: async ({}, use) => {
    await use(ItemFactory.valid());
  },

  // eslint-disable-next-line no-empty-pattern
  minimalValidPayload: async ({}, use) => {
    await use(ItemFactory.minimal());
  },

  // eslint-disable-next-line no-empty-pattern
  sampleItems: async ({}, use) => {
    await use(ItemFactory.samples());
  },

  createTestItem: async ({ items, cleanup, validItemPayload }, use) => {
    await use((payload?: ItemPayload) => createScopedItem(items, cleanup.scope, payload ?? validItemPayload));
  },

  submitItem: async ({ items, cleanup }, use) => {
    await use((payload) => submitScopedItem(items, cleanup.scope, payload));
  },
});
