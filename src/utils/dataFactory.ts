import { ItemPayload } from './itemSchemas';

/**
 * Fixed item payloads for tests.
 * Every call returns a new object, so tests may mutate what they get.
 */
export class ItemFactory {
  /**
   * A payload with every field set
   */
  static valid(): ItemPayload {
    return {
      name: 'Test Item',
      description: 'A test item for automated testing',
      price: 19.99,
      quantity: 50,
    };
  }

  /**
   * A payload with only the required fields
   */
  static minimal(): ItemPayload {
    return {
      name: 'Minimal Item',
      price: 1.0,
      quantity: 0,
    };
  }

  /**
   * Distinct payloads for bulk scenarios, always in the same order
   */
  static samples(): ItemPayload[] {
    return [
      {
        name: 'Sample Item 1',
        description: 'First sample item',
        price: 10.0,
        quantity: 100,
      },
      {
        name: 'Sample Item 2',
        description: 'Second sample item',
        price: 25.5,
        quantity: 200,
      },
      {
        name: 'Sample Item 3',
        description: 'Third sample item',
        price: 99.99,
        quantity: 50,
      },
    ];
  }

  /**
   * The minimal base used by boundary tests (`Item`, 10.00, 5) with overrides
   */
  static with(overrides: Partial<ItemPayload>): ItemPayload {
    return { name: 'Item', price: 10.0, quantity: 5, ...overrides };
  }

  /**
   * Same base as `with`, but accepts values of any type and can drop fields,
   * for payloads the API is expected to reject
   */
  static invalid(overrides: Record<string, unknown>, omit: string[] = []): Record<string, unknown> {
    const payload: Record<string, unknown> = { name: 'Item', price: 10.0, quantity: 5, ...overrides };
    for (const field of omit) {
      delete payload[field];
    }
    return payload;
  }

  /**
   * A string of exactly `length` characters
   */
  static text(length: number, char: string = 'A'): string {
    return char.repeat(length);
  }
}
