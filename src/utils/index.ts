export { validateJsonSchema, createValidator, assertJsonSchema } from './jsonSchema';
export { loadYamlFixture } from './yamlLoader';
export { ItemFactory } from './dataFactory';
export {
  FieldAssertions,
  expectStatus,
  expectItemToMatch,
  expectNotFound,
  expectValidationError,
} from './assertions';
export {
  ResourceScope,
  withResourceScope,
  type ReleaseTask,
  type ReleaseFailure,
} from './resourceScope';
export {
  itemSchema,
  itemListSchema,
  errorDetailSchema,
  validationErrorSchema,
  messageSchema,
  openApiDocumentSchema,
  validationErrorFields,
  type Item,
  type ItemPayload,
  type ErrorDetail,
  type ValidationErrorEntry,
  type ValidationErrorBody,
  type MessageBody,
  type OpenApiDocument,
} from './itemSchemas';
