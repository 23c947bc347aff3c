export type ReleaseTask = () => Promise<void> | void;

export type ReleaseFailure = {
  label: string;
  error: Error;
};

type DeferredRelease = {
  label: string;
  task: ReleaseTask;
};

/**
 * Collects release actions for resources acquired during a scope and runs
 * them when the scope ends.
 *
 * Tasks run once, in reverse registration order (LIFO). A failing task does
 * not stop the remaining ones; failures are returned from `release()`.
 */
export class ResourceScope {
  private tasks: DeferredRelease[] = [];
  private released = false;

  /**
   * Register a release action
   * @throws Error if the scope was already released
   */
  defer(label: string, task: ReleaseTask): void {
    if (this.released) {
      throw new Error(`Cannot register "${label}": resource scope already released`);
    }
    this.tasks.push({ label, task });
  }

  /**
   * Number of pending release actions
   */
  get size(): number {
    return this.tasks.length;
  }

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * Run every pending release action. Later calls are no-ops.
   */
  async release(): Promise<ReleaseFailure[]> {
    if (this.released) {
      return [];
    }
    this.released = true;

    const pending = this.tasks.reverse();
    this.tasks = [];

    const failures: ReleaseFailure[] = [];
    for (const { label, task } of pending) {
      try {
        await task();
      } catch (error) {
        failures.push({
          label,
          error: error instanceof Error ? error : new Error(String(error)),
        });
      }
    }
    return failures;
  }
}

function warnReleaseFailures(failures: ReleaseFailure[]): void {
  for (const failure of failures) {
    console.warn(`[ResourceScope] ${failure.label} failed: ${failure.error.message}`);
  }
}

/**
 * Run `fn` with a fresh scope and release it afterwards, whether `fn`
 * resolves or throws. `fn`'s own error is re-thrown unchanged.
 *
 * @example
 * ```typescript
 * await withResourceScope(async (scope) => {
 *   const item = await createScopedItem(items, scope, ItemFactory.valid());
 *   // item is deleted when this callback settles
 * });
 * ```
 */
export async function withResourceScope<T>(
  fn: (scope: ResourceScope) => Promise<T>,
  onFailures: (failures: ReleaseFailure[]) => void = warnReleaseFailures
): Promise<T> {
  const scope = new ResourceScope();
  try {
    return await fn(scope);
  } finally {
    const failures = await scope.release();
    if (failures.length > 0) {
      onFailures(failures);
    }
  }
}
