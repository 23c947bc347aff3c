import {
  test,
  expect,
  expectStatus,
  expectItemToMatch,
  expectNotFound,
  readItem,
  createScopedItem,
  settleCleanup,
  withResourceScope,
  ApiClient,
  ItemFactory,
  ItemsApi,
  ResourceScope,
  TransportError,
} from '../src';
import Fastify from 'fastify';
import type { TestInfo } from '@playwright/test';
import { startItemsApiStub } from './support/itemsApiStub';

test.describe('Payload factory', { tag: ['@harness'] }, () => {

  const payloads = [
    { label: 'valid', payload: ItemFactory.valid() },
    { label: 'minimal', payload: ItemFactory.minimal() },
    ...ItemFactory.samples().map((payload) => ({ label: payload.name, payload })),
  ];

  for (const { label, payload } of payloads) {
    test(`"${label}" payload reads back unchanged`, async ({ items, createTestItem }) => {
      const created = await createTestItem(payload);

      expectItemToMatch(readItem(await items.get(created.id)), payload);
    });
  }
});

test.describe('Scoped cleanup', { tag: ['@harness'] }, () => {

  test('releasing a scope deletes its items', async ({ items }) => {
    const scope = new ResourceScope();
    const item = await createScopedItem(items, scope, ItemFactory.with({ name: 'Scoped Item' }));
    expectStatus(await items.get(item.id), 200);

    const failures = await scope.release();

    expect(failures).toEqual([]);
    expectNotFound(await items.get(item.id));
  });

  test('items are deleted even when the body throws', async ({ items }) => {
    let createdId = 0;

    await expect(
      withResourceScope(async (scope) => {
        const item = await createScopedItem(items, scope, ItemFactory.with({ name: 'Doomed Item' }));
        createdId = item.id;
        throw new Error('body failed');
      })
    ).rejects.toThrow('body failed');

    expect(createdId).toBeGreaterThan(0);
    expectNotFound(await items.get(createdId));
  });

  test('an item the test deleted itself does not fail cleanup', async ({ items }) => {
    const scope = new ResourceScope();
    const item = await createScopedItem(items, scope, ItemFactory.valid());
    expectStatus(await items.remove(item.id), 204);

    expect(await scope.release()).toEqual([]);
  });

  test('createTestItem registers one deletion per item', async ({ cleanup, createTestItem }) => {
    const before = cleanup.scope.size;

    await createTestItem();
    await createTestItem();

    expect(cleanup.scope.size).toBe(before + 2);
  });

  test('rejected submissions register nothing', async ({ cleanup, submitItem }) => {
    const before = cleanup.scope.size;

    expectStatus(await submitItem(ItemFactory.invalid({ price: -1 })), 422);

    expect(cleanup.scope.size).toBe(before);
  });

  test('custom cleanup tasks are accepted', async ({ cleanup }) => {
    cleanup.addTask(() => undefined, 'no-op');

    expect(cleanup.scope.size).toBe(1);
  });

  test('an item whose body fails the schema is still deleted', async ({ request, apiConfig }) => {
    const deleted: string[] = [];
    const app = Fastify({ logger: false });
    app.post('/items', async (_request, reply) => reply.code(201).send({ id: 41, name: 'Half an item' }));
    app.delete<{ Params: { id: string } }>('/items/:id', async (request, reply) => {
      deleted.push(request.params.id);
      return reply.code(204).send();
    });
    const url = await app.listen({ port: 0, host: '127.0.0.1' });

    try {
      const items = new ItemsApi(new ApiClient(request, { ...apiConfig, baseURL: url }));
      const scope = new ResourceScope();

      await expect(createScopedItem(items, scope, ItemFactory.valid())).rejects.toThrow('did not return an item');
      expect(scope.size).toBe(1);
      expect(await scope.release()).toEqual([]);
      expect(deleted).toEqual(['41']);
    } finally {
      await app.close();
    }
  });

  test('a created item without an id is reported', async ({ request, apiConfig }) => {
    const app = Fastify({ logger: false });
    app.post('/items', async (_request, reply) => reply.code(201).send({ name: 'Nameless' }));
    const url = await app.listen({ port: 0, host: '127.0.0.1' });

    try {
      const items = new ItemsApi(new ApiClient(request, { ...apiConfig, baseURL: url }));

      await expect(createScopedItem(items, new ResourceScope(), ItemFactory.valid()))
        .rejects.toThrow(`POST ${url}/items -> 201 created an item without a usable id`);
    } finally {
      await app.close();
    }
  });
});

test.describe('Fixture teardown', { tag: ['@harness'] }, () => {
  test.describe.configure({ mode: 'serial' });

  let createdId = 0;

  test('createTestItem creates an item', async ({ createTestItem }) => {
    createdId = (await createTestItem()).id;

    expect(createdId).toBeGreaterThan(0);
  });

  test('the item is gone once its test has finished', async ({ items }) => {
    expect(createdId).toBeGreaterThan(0);
    expectNotFound(await items.get(createdId));
  });
});

test.describe('settleCleanup', { tag: ['@harness'] }, () => {

  async function settleCapturingWarnings(scope: ResourceScope, strict: boolean) {
    const annotations: TestInfo['annotations'] = [];
    const warnings: string[] = [];
    const warn = console.warn;
    console.warn = (...args: unknown[]) => {
      warnings.push(args.map(String).join(' '));
    };
    try {
      const outcome = await settleCleanup(scope, { title: 'owning test', annotations }, strict).then(
        () => undefined,
        (error: unknown) => error
      );
      return { annotations, warnings, outcome };
    } finally {
      console.warn = warn;
    }
  }

  test('annotates and warns about a failing task', async () => {
    const scope = new ResourceScope();
    scope.defer('DELETE /items/5', () => { throw new Error('503 Service Unavailable'); });

    const { annotations, warnings, outcome } = await settleCapturingWarnings(scope, false);

    expect(outcome).toBeUndefined();
    expect(annotations).toEqual([
      { type: 'cleanup-failure', description: 'DELETE /items/5: 503 Service Unavailable' },
    ]);
    expect(warnings).toEqual(['[Cleanup] "owning test": DELETE /items/5 failed: 503 Service Unavailable']);
  });

  test('strict mode fails after every task has run', async () => {
    const scope = new ResourceScope();
    const ran: string[] = [];
    scope.defer('first', () => { ran.push('first'); });
    scope.defer('broken', () => { throw new Error('refused'); });
    scope.defer('last', () => { ran.push('last'); });

    const { annotations, outcome } = await settleCapturingWarnings(scope, true);

    expect(ran).toEqual(['last', 'first']);
    expect(annotations).toHaveLength(1);
    expect(outcome).toBeInstanceOf(Error);
    expect(String(outcome)).toBe('Error: 1 cleanup task(s) failed:\n- broken: refused');
  });

  test('a clean release leaves no trace', async () => {
    const scope = new ResourceScope();
    scope.defer('fine', () => undefined);

    const { annotations, warnings, outcome } = await settleCapturingWarnings(scope, true);

    expect(outcome).toBeUndefined();
    expect(annotations).toEqual([]);
    expect(warnings).toEqual([]);
  });
});

test.describe('Full lifecycle', { tag: ['@harness', '@items'] }, () => {

  test('create, read, delete, read again', async ({ items }) => {
    const created = await items.create({ name: 'Widget', price: 9.99, quantity: 5 });
    expectStatus(created, 201);
    const item = readItem(created);

    const fetched = await items.get(item.id);
    expectStatus(fetched, 200);
    expectItemToMatch(readItem(fetched), { name: 'Widget', price: 9.99, quantity: 5 });

    expectStatus(await items.remove(item.id), 204);
    expectNotFound(await items.get(item.id));
  });

  test('a second delete is a 404, not a server error', async ({ items, createTestItem }) => {
    const item = await createTestItem();

    await items.remove(item.id);
    const again = await items.remove(item.id);

    expect(again.status).toBe(404);
  });

  test('malformed JSON is a client error', async ({ api }) => {
    const response = await api.post('/items', {
      body: '{"name": "Broken", "price": ',
      headers: { 'Content-Type': 'application/json' },
    });

    expect(response.status).toBeGreaterThanOrEqual(400);
    expect(response.status).toBeLessThan(500);
  });
});

test.describe('Transport failures', { tag: ['@harness'] }, () => {

  test('an unreachable service raises TransportError', async ({ request, apiConfig }) => {
    const stub = await startItemsApiStub([]);
    await stub.close();
    const client = new ApiClient(request, { ...apiConfig, baseURL: stub.url, timeout: 5000 });

    const failure = client.get('/health');

    await expect(failure).rejects.toBeInstanceOf(TransportError);
    await expect(failure).rejects.toThrow(`GET ${stub.url}/health failed before a response was received`);
  });
});
