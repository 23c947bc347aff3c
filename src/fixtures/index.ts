export { apiFixture, type ApiWorkerFixtures } from './api';
export { cleanupFixture, settleCleanup, type CleanupOptions, type CleanupTask } from './cleanup';
export {
  itemsFixture,
  createScopedItem,
  submitScopedItem,
  type CreateTestItem,
  type SubmitItem,
  type ItemsFixtures,
} from './items';
