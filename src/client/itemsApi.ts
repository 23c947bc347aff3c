import { ApiClient, ApiResponse } from './apiClient';
import { assertJsonSchema } from '../utils/jsonSchema';
import { Item, ItemPayload, itemListSchema, itemSchema } from '../utils/itemSchemas';

export type ItemId = number | string;

/**
 * Endpoints of the items service.
 * Ids accept strings so malformed ids can be sent unchanged.
 */
export class ItemsApi {
  constructor(readonly client: ApiClient) {}

  root(): Promise<ApiResponse> {
    return this.client.get('/');
  }

  health(): Promise<ApiResponse> {
    return this.client.get('/health');
  }

  docs(): Promise<ApiResponse> {
    return this.client.get('/docs');
  }

  openapi(): Promise<ApiResponse> {
    return this.client.get('/openapi.json');
  }

  list(): Promise<ApiResponse> {
    return this.client.get('/items');
  }

  get(id: ItemId): Promise<ApiResponse> {
    return this.client.get(`/items/${id}`);
  }

  create(payload: ItemPayload | Record<string, unknown>): Promise<ApiResponse> {
    return this.client.post('/items', { json: payload });
  }

  update(id: ItemId, payload: ItemPayload | Record<string, unknown>): Promise<ApiResponse> {
    return this.client.put(`/items/${id}`, { json: payload });
  }

  remove(id: ItemId): Promise<ApiResponse> {
    return this.client.delete(`/items/${id}`);
  }
}

/**
 * Parse a response body as a single item
 * @throws Error naming the request and every schema violation
 */
export function readItem(response: ApiResponse): Item {
  const body = response.json();
  assertJsonSchema<Item>(body, itemSchema, `${response} did not return an item`);
  return body;
}

/**
 * Parse a response body as a list of items
 */
export function readItemList(response: ApiResponse): Item[] {
  const body = response.json();
  assertJsonSchema<Item[]>(body, itemListSchema, `${response} did not return an item list`);
  return body;
}
