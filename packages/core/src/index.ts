import ivm from "isolated-vm";
import { encodeError } from "./errors.ts";

// Types for isolated-vm context
export type { Isolate, Context, Reference } from "isolated-vm";

export {
  encodeError,
  decodeErrorCode,
} from "./errors.ts";
export {
  withScopeAsync,
  type Releasable,
  type Scope,
} from "./scope.ts";
export { TracedHandle, type ClosureArgument } from "./traced-handle.ts";
export {
  defineTracedAsyncFunction,
  tracedApplyCode,
  type TracedAsyncFunction,
} from "./async-bridge.ts";

// ============================================================================
// Instance State Management
// ============================================================================

let nextInstanceId = 1;

/**
 * Host-side state for objects created in the isolate, keyed by instance id.
 * The isolate only ever holds the numeric id, so the state survives any
 * collection the isolate runs.
 */
export class InstanceRegistry<TState> {
  readonly #kind: string;
  readonly #states = new Map<number, TState>();

  constructor(kind: string) {
    this.#kind = kind;
  }

  register(state: TState): number {
    const instanceId = nextInstanceId++;
    this.#states.set(instanceId, state);
    return instanceId;
  }

  get(instanceId: number): TState | undefined {
    return this.#states.get(instanceId);
  }

  require(instanceId: number): TState {
    const state = this.#states.get(instanceId);
    if (state === undefined) {
      throw new Error(`${this.#kind} instance ${instanceId} not found`);
    }
    return state;
  }

  delete(instanceId: number): boolean {
    return this.#states.delete(instanceId);
  }

  clear(): void {
    this.#states.clear();
  }

  get size(): number {
    return this.#states.size;
  }
}

/**
 * Restart instance ids at 1 (for testing). Registries keep their entries, so
 * only call this when none holds live state.
 */
export function resetInstanceIds(): void {
  nextInstanceId = 1;
}

// ============================================================================
// Host Callbacks
// ============================================================================

/**
 * Register a synchronous host callback on the isolate global. Errors keep
 * their type through {@link encodeError}.
 */
export function defineCallback<TArgs extends unknown[]>(
  context: ivm.Context,
  name: string,
  fn: (...args: TArgs) => unknown
): void {
  context.global.setSync(
    name,
    new ivm.Callback((...args: TArgs) => {
      try {
        return fn(...args);
      } catch (err) {
        throw encodeError(err);
      }
    })
  );
}

/**
 * Register an asynchronous host callback. Calling it from the isolate returns
 * a promise there; the host function runs behind an `ivm.Reference` applied
 * with `result: { promise: true }`.
 */
export function defineAsyncCallback<TArgs extends unknown[]>(
  context: ivm.Context,
  name: string,
  fn: (...args: TArgs) => Promise<unknown>
): void {
  const referenceName = `${name}_ref`;
  context.global.setSync(
    referenceName,
    new ivm.Reference(async (...args: TArgs) => {
      try {
        return await fn(...args);
      } catch (err) {
        throw encodeError(err);
      }
    })
  );
  context.evalSync(`
    globalThis[${JSON.stringify(name)}] = (...args) =>
      globalThis[${JSON.stringify(referenceName)}].apply(undefined, args, {
        arguments: { copy: true },
        result: { promise: true, copy: true },
      });
  `);
}
