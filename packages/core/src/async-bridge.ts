import ivm from "isolated-vm";
import { encodeError } from "./errors.ts";
import { withScopeAsync } from "./scope.ts";
import { TracedHandle } from "./traced-handle.ts";

export type TracedAsyncFunction = (
  ...handles: TracedHandle[]
) => Promise<unknown>;

/**
 * Expose a host async function to the isolate as a promise-returning call.
 *
 * The isolate invokes it through {@link tracedApplyCode}: the promise exists
 * in the isolate before the host task starts, every argument reaches the host
 * as a {@link TracedHandle}, and the promise settles once the task finishes.
 * Handles are released when the task settles. Rejections carry the encoded
 * error type so the isolate can rethrow it with `__decodeError`.
 */
export function defineTracedAsyncFunction(
  context: ivm.Context,
  name: string,
  fn: TracedAsyncFunction
): ivm.Reference {
  const reference = new ivm.Reference(async (...refs: unknown[]) => {
    try {
      return await withScopeAsync(async (scope) => {
        const handles = refs.map((ref) => {
          if (!(ref instanceof ivm.Reference)) {
            throw new TypeError(`${name} expects object arguments`);
          }
          return scope.manage(new TracedHandle(context, ref));
        });
        return await fn(...handles);
      });
    } catch (err) {
      throw encodeError(err);
    }
  });

  context.global.setSync(name, reference);
  return reference;
}

/**
 * Isolate-side expression that calls a function registered with
 * {@link defineTracedAsyncFunction}. Evaluates to a pending promise.
 */
export function tracedApplyCode(name: string, args: string[]): string {
  return `${name}.apply(undefined, [${args.join(", ")}], { arguments: { reference: true }, result: { promise: true, copy: true } })`;
}
