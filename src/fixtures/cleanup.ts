import { TestInfo } from '@playwright/test';
import { apiFixture } from './api';
import { ReleaseTask, ResourceScope } from '../utils/resourceScope';

export type CleanupTask = ReleaseTask;

export type CleanupOptions = {
  addTask: (task: CleanupTask, label?: string) => void;
  /** The scope backing this test's cleanup, for helpers that take one */
  scope: ResourceScope;
};

/**
 * Release `scope` at the end of a test.
 * Each failure is attached as a `cleanup-failure` annotation and logged.
 * With `strict`, throws once every task has run.
 */
export async function settleCleanup(
  scope: ResourceScope,
  testInfo: Pick<TestInfo, 'title' | 'annotations'>,
  strict: boolean
): Promise<void> {
  const failures = await scope.release();
  for (const failure of failures) {
    testInfo.annotations.push({
      type: 'cleanup-failure',
      description: `${failure.label}: ${failure.error.message}`,
    });
    console.warn(`[Cleanup] "${testInfo.title}": ${failure.label} failed: ${failure.error.message}`);
  }

  if (failures.length > 0 && strict) {
    throw new Error(
      `${failures.length} cleanup task(s) failed:\n${failures.map((f) => `- ${f.label}: ${f.error.message}`).join('\n')}`
    );
  }
}

/**
 * Cleanup fixture for managing teardown tasks
 * Tasks run after the test body, LIFO, whether the test passed or failed.
 * A failing task is attached as a `cleanup-failure` annotation and logged;
 * with `API_STRICT_CLEANUP=true` it also fails the test.
 */
export const cleanupFixture = apiFixture.extend<{ cleanup: CleanupOptions }>({
  cleanup: async ({ apiConfig }, use, testInfo) => {
    const scope = new ResourceScope();

    const cleanup: CleanupOptions = {
      addTask: (task: CleanupTask, label?: string) => {
        scope.defer(label ?? `cleanup task #${scope.size + 1}`, task);
      },
      scope,
    };

    await use(cleanup);

    await settleCleanup(scope, testInfo, apiConfig.strictCleanup);
  },
});
