import { expect } from '@playwright/test';
import { ApiResponse } from '../client/apiClient';
import { assertJsonSchema } from './jsonSchema';
import {
  ErrorDetail,
  Item,
  ItemPayload,
  ValidationErrorBody,
  errorDetailSchema,
  validationErrorFields,
  validationErrorSchema,
} from './itemSchemas';

/**
 * Collects failing checks and reports them all at once
 */
export class FieldAssertions {
  private errors: Error[] = [];

  /**
   * Run a check, recording its failure instead of throwing
   * @param message - Prefix for the recorded error
   */
  check(assertion: () => void, message?: string): void {
    try {
      assertion();
    } catch (error) {
      const assertionError = error instanceof Error ? error : new Error(String(error));
      if (message) {
        assertionError.message = `${message}: ${assertionError.message}`;
      }
      this.errors.push(assertionError);
    }
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  getErrors(): Error[] {
    return [...this.errors];
  }

  /**
   * @throws Error listing every recorded failure
   */
  verify(title: string = 'Assertions failed'): void {
    if (this.errors.length > 0) {
      const errorMessages = this.errors.map((err, idx) => `${idx + 1}. ${err.message}`).join('\n');
      throw new Error(`${title} (${this.errors.length} errors):\n${errorMessages}`);
    }
  }
}

function describeResponse(response: ApiResponse): string {
  const body = response.text.length > 500 ? `${response.text.slice(0, 500)}...` : response.text;
  return `${response.method} ${response.url} responded ${response.status}${body ? `\n${body}` : ''}`;
}

/**
 * Assert the status code, showing the request and body on failure
 */
export function expectStatus(response: ApiResponse, expected: number | number[]): void {
  if (Array.isArray(expected)) {
    expect(expected, describeResponse(response)).toContain(response.status);
  } else {
    expect(response.status, describeResponse(response)).toBe(expected);
  }
}

/**
 * Assert that `item` carries every field of `payload` unchanged.
 * An absent or undefined description is expected back as null.
 * @throws Error naming each mismatching field
 */
export function expectItemToMatch(item: Item, payload: ItemPayload): void {
  const soft = new FieldAssertions();

  soft.check(() => expect(item.name).toBe(payload.name), 'field "name"');
  soft.check(() => expect(item.description).toBe(payload.description ?? null), 'field "description"');
  soft.check(() => expect(item.price).toBe(payload.price), 'field "price"');
  soft.check(() => expect(item.quantity).toBe(payload.quantity), 'field "quantity"');

  soft.verify(`Item ${item.id} does not match the submitted payload`);
}

/**
 * Assert a 404 with a `{ detail: string }` body
 */
export function expectNotFound(response: ApiResponse): ErrorDetail {
  expectStatus(response, 404);
  const body = response.json();
  assertJsonSchema<ErrorDetail>(body, errorDetailSchema, `${response} error body`);
  return body;
}

/**
 * Assert a 422 validation error and, when given, that `field` is one of the
 * reported fields
 */
export function expectValidationError(response: ApiResponse, field?: string): ValidationErrorBody {
  expectStatus(response, 422);
  const body = response.json();
  assertJsonSchema<ValidationErrorBody>(body, validationErrorSchema, `${response} validation error body`);
  if (field !== undefined) {
    expect(validationErrorFields(body), `fields reported by ${response}`).toContain(field);
  }
  return body;
}
