import ivm from "isolated-vm";
import { randomUUID } from "node:crypto";
import { setupConsole } from "@edgebox/console";
import {
  createRequestInstance,
  readResponseInstance,
  setupFetch,
} from "@edgebox/fetch";
import { setupEnv } from "@edgebox/env";

import type { ConsoleHandle, ConsoleOptions } from "@edgebox/console";
import type { FetchHandle } from "@edgebox/fetch";
import type { AssetDispatcher, AssetsEvent, EnvHandle } from "@edgebox/env";

export type { ConsoleEntry, ConsoleOptions } from "@edgebox/console";
export type { AssetDispatcher, AssetRequest, AssetsEvent } from "@edgebox/env";

/**
 * Options for creating a runtime.
 */
export interface RuntimeOptions {
  /** Dispatcher behind `env.ASSETS.fetch` */
  assets: AssetDispatcher;
  /** Console output from the sandbox */
  console?: ConsoleOptions;
  /** Structured events for every `env.ASSETS.fetch` call */
  onEvent?: (event: AssetsEvent) => void;
  /** Memory limit of the isolate in MB */
  memoryLimitMB?: number;
}

export interface RuntimeHandle {
  readonly id: string;
  /** Run worker code in the isolate; awaits top-level promises */
  eval(code: string): Promise<void>;
  /** Hand a request to the handler registered with `serve()` */
  dispatchRequest(request: Request): Promise<Response>;
  /** Check if serve() has been called */
  hasServeHandler(): boolean;
  dispose(): Promise<void>;
}

interface RuntimeHandles {
  console: ConsoleHandle;
  fetch: FetchHandle;
  env: EnvHandle;
}

const serveCode = `
(function() {
  globalThis.__serveOptions__ = null;

  globalThis.serve = function serve(options) {
    if (!options || typeof options.fetch !== 'function') {
      throw new TypeError('serve() requires a fetch handler');
    }
    globalThis.__serveOptions__ = options;
  };
})();
`;

/**
 * Create a sandboxed worker runtime with `Request`, `Response`, `Headers`,
 * `console`, `serve()` and the `env` object.
 *
 * @example
 * const runtime = await createRuntime({
 *   assets: createMemoryAssets({ "/a.txt": "hello" }),
 * });
 *
 * await runtime.eval(`
 *   serve({
 *     fetch(request, env) {
 *       return env.ASSETS.fetch(request);
 *     },
 *   });
 * `);
 *
 * const response = await runtime.dispatchRequest(new Request("https://example.com/a.txt"));
 * await runtime.dispose();
 */
export async function createRuntime(
  options: RuntimeOptions
): Promise<RuntimeHandle> {
  const id = randomUUID();

  // Create isolate with optional memory limit
  const isolate = new ivm.Isolate({
    memoryLimit: options.memoryLimitMB,
  });
  const context = await isolate.createContext();

  // Fetch must come first, env wraps its Request/Response classes
  const fetchHandle = await setupFetch(context);
  const handles: RuntimeHandles = {
    fetch: fetchHandle,
    console: await setupConsole(context, options.console),
    env: await setupEnv(context, {
      assets: options.assets,
      onEvent: options.onEvent,
    }),
  };
  context.evalSync(serveCode);

  let disposed = false;

  function hasServeHandler(): boolean {
    const result: unknown = context.evalSync(
      `!!globalThis.__serveOptions__?.fetch`
    );
    return result === true;
  }

  return {
    id,

    async eval(code: string): Promise<void> {
      if (disposed) {
        throw new Error("Runtime has been disposed");
      }
      await context.eval(`(async () => {\n${code}\n})()`, { promise: true });
    },

    async dispatchRequest(request: Request): Promise<Response> {
      if (disposed) {
        throw new Error("Runtime has been disposed");
      }
      if (!hasServeHandler()) {
        throw new Error("No serve() handler registered");
      }

      const requestInstanceId = createRequestInstance(context, request);
      const responseInstanceId: unknown = await context.eval(
        `
        (async function() {
          const request = Request._fromInstanceId(${requestInstanceId});
          const response = await __serveOptions__.fetch(request, globalThis[${JSON.stringify(handles.env.globalName)}]);
          if (!(response instanceof Response)) {
            throw new TypeError('serve() handler must return a Response');
          }
          return response._getInstanceId();
        })()
      `,
        { promise: true }
      );

      if (typeof responseInstanceId !== "number") {
        throw new Error("serve() handler did not produce a Response");
      }
      return readResponseInstance(context, responseInstanceId);
    },

    hasServeHandler,

    async dispose(): Promise<void> {
      if (disposed) return;
      disposed = true;
      handles.env.dispose();
      handles.console.dispose();
      handles.fetch.dispose();
      context.release();
      isolate.dispose();
    },
  };
}
