import { SchemaObject } from 'ajv';

/**
 * Body sent to create or replace an item
 */
export interface ItemPayload {
  name: string;
  description?: string | null;
  price: number;
  quantity: number;
}

/**
 * Item as returned by the API
 */
export interface Item {
  id: number;
  name: string;
  description: string | null;
  price: number;
  quantity: number;
  created_at: string;
  updated_at: string;
}

export interface ErrorDetail {
  detail: string;
}

export interface ValidationErrorEntry {
  loc: Array<string | number>;
  msg: string;
  type: string;
}

export interface ValidationErrorBody {
  detail: ValidationErrorEntry[];
}

export interface MessageBody {
  message: string;
}

export interface OpenApiDocument {
  openapi: string;
  info: { title: string; version?: string };
}

/** ISO 8601 timestamp; the UTC offset is optional */
const timestampSchema: SchemaObject = { type: 'string', format: 'iso-date-time' };

export const itemSchema: SchemaObject = {
  type: 'object',
  properties: {
    id: { type: 'integer' },
    name: { type: 'string' },
    description: { type: ['string', 'null'] },
    price: { type: 'number' },
    quantity: { type: 'integer' },
    created_at: timestampSchema,
    updated_at: timestampSchema,
  },
  required: ['id', 'name', 'description', 'price', 'quantity', 'created_at', 'updated_at'],
};

export const itemListSchema: SchemaObject = {
  type: 'array',
  items: itemSchema,
};

export const errorDetailSchema: SchemaObject = {
  type: 'object',
  properties: {
    detail: { type: 'string' },
  },
  required: ['detail'],
};

export const validationErrorSchema: SchemaObject = {
  type: 'object',
  properties: {
    detail: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        properties: {
          loc: { type: 'array', items: { type: ['string', 'integer'] } },
          msg: { type: 'string' },
          type: { type: 'string' },
        },
        required: ['loc', 'msg', 'type'],
      },
    },
  },
  required: ['detail'],
};

export const messageSchema: SchemaObject = {
  type: 'object',
  properties: {
    message: { type: 'string' },
  },
  required: ['message'],
};

export const openApiDocumentSchema: SchemaObject = {
  type: 'object',
  properties: {
    openapi: { type: 'string' },
    info: {
      type: 'object',
      properties: {
        title: { type: 'string' },
        version: { type: 'string' },
      },
      required: ['title'],
    },
  },
  required: ['openapi', 'info'],
};

/**
 * Field names reported by a validation error body, taken from the last
 * segment of each `loc` (e.g. `["body", "price"]` -> `"price"`)
 */
export function validationErrorFields(body: ValidationErrorBody): string[] {
  return body.detail
    .filter((entry) => entry.loc.length > 0)
    .map((entry) => entry.loc[entry.loc.length - 1])
    .map((segment) => String(segment));
}
