// ============================================================================
// Scope Management
// ============================================================================

export interface Releasable {
  release(): void;
}

/**
 * Scope for managing reference lifecycle
 */
export interface Scope {
  /**
   * Track a resource for cleanup when the scope exits
   */
  manage<T extends Releasable>(resource: T): T;
}

/**
 * Execute an async callback with automatic reference cleanup.
 * Everything tracked via scope.manage() is released when the callback settles.
 */
export async function withScopeAsync<T>(
  callback: (scope: Scope) => Promise<T>
): Promise<T> {
  const resources: Releasable[] = [];

  const scope: Scope = {
    manage<R extends Releasable>(resource: R): R {
      resources.push(resource);
      return resource;
    },
  };

  try {
    return await callback(scope);
  } finally {
    // Release in reverse order (LIFO)
    for (const resource of resources.reverse()) {
      resource.release();
    }
  }
}
