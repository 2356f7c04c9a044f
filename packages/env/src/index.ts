import type ivm from "isolated-vm";
import {
  decodeErrorCode,
  defineTracedAsyncFunction,
  tracedApplyCode,
  type TracedHandle,
} from "@edgebox/core";
import { drainBody, takeRequestBody, type BodySource } from "@edgebox/fetch";
import {
  BodyDrainError,
  DispatchError,
  RequestBuildError,
  errorMessage,
  isAssetsFetchError,
} from "./errors.ts";
import { buildAssetRequest, readRequestHead } from "./request-bridge.ts";
import { bridgeResponse } from "./response-bridge.ts";
import type { EnvHandle, EnvOptions } from "./types.ts";

export * from "./errors.ts";
export * from "./types.ts";
export {
  buildAssetRequest,
  parseRequestHead,
  readRequestHead,
  type RequestHead,
} from "./request-bridge.ts";
export { bridgeResponse } from "./response-bridge.ts";

const GLOBAL_NAME = /^[A-Za-z_$][\w$]*$/;

/**
 * Setup the host environment object in an isolated-vm context.
 *
 * Registers the non-constructible `Env` and `EnvAssets` classes and exposes
 * one `Env` instance as a global. `env.ASSETS.fetch(request)` hands the
 * request to the configured dispatcher and resolves with a script Response.
 * Requires `setupFetch` to have run on the same context.
 *
 * @example
 * const handle = await setupEnv(context, {
 *   assets: createMemoryAssets({ "/a.txt": "hello" }),
 * });
 *
 * await context.eval(`
 *   const response = await env.ASSETS.fetch(new Request("https://example.com/a.txt"));
 *   const text = await response.text();
 * `);
 */
export async function setupEnv(
  context: ivm.Context,
  options: EnvOptions
): Promise<EnvHandle> {
  const globalName = options.globalName ?? "env";
  if (!GLOBAL_NAME.test(globalName)) {
    throw new TypeError(`Invalid global name: ${globalName}`);
  }

  const controller = new AbortController();
  let inFlight = 0;

  async function fetchAsset(handle: TracedHandle): Promise<number> {
    const started = performance.now();

    // Phase 1: method, target and headers, read on the isolate thread
    const head = await readRequestHead(handle);
    let detached: BodySource;
    try {
      detached = takeRequestBody(context, head.instanceId);
    } catch (err) {
      throw new RequestBuildError(errorMessage(err), { cause: err });
    }

    // Phase 2: drain the detached body
    let body: Uint8Array;
    try {
      body = await drainBody(detached);
    } catch (err) {
      throw new BodyDrainError(
        `Failed to read request body: ${errorMessage(err)}`,
        { cause: err }
      );
    }

    const request = buildAssetRequest(head, body);
    options.onEvent?.({
      type: "request",
      method: request.method,
      url: request.url.href,
      bodyLength: body.byteLength,
    });

    let response: Response;
    try {
      response = await options.assets(request, { signal: controller.signal });
    } catch (err) {
      throw new DispatchError(errorMessage(err), { cause: err });
    }
    if (controller.signal.aborted) {
      throw new DispatchError("environment disposed");
    }

    const instanceId = await bridgeResponse(context, response, request.url);
    options.onEvent?.({
      type: "response",
      method: request.method,
      url: request.url.href,
      status: response.status,
      duration: performance.now() - started,
    });
    return instanceId;
  }

  defineTracedAsyncFunction(context, "__EnvAssets_fetch", async (handle) => {
    inFlight++;
    try {
      return await fetchAsset(handle);
    } catch (err) {
      options.onEvent?.({
        type: "error",
        phase: isAssetsFetchError(err) ? err.phase : "request",
        message: errorMessage(err),
      });
      throw err;
    } finally {
      inFlight--;
    }
  });

  context.evalSync(`
(function() {
  ${decodeErrorCode}

  // Only host code holds the key, so only host code constructs instances
  const hostKey = Symbol('host');

  function assertHost(key) {
    if (key !== hostKey) {
      throw new TypeError('Cannot construct this type');
    }
  }

  class EnvAssets {
    constructor(key) {
      assertHost(key);
      Object.freeze(this);
    }

    fetch(input, init) {
      if (input === undefined || input === null) return undefined;
      try {
        const request = input instanceof Request && init === undefined
          ? input
          : new Request(input, init);
        return ${tracedApplyCode("__EnvAssets_fetch", ["request"])}.then(
          (instanceId) => Response._fromInstanceId(instanceId),
          (err) => { throw __decodeError(err); }
        );
      } catch (err) {
        return Promise.reject(err);
      }
    }
  }

  class Env {
    #assets;

    constructor(key, assets) {
      assertHost(key);
      this.#assets = assets;
      Object.freeze(this);
    }

    get ASSETS() {
      return this.#assets;
    }
  }

  globalThis.Env = Env;
  globalThis.EnvAssets = EnvAssets;
  globalThis[${JSON.stringify(globalName)}] = new Env(hostKey, new EnvAssets(hostKey));
})();
`);

  return {
    globalName,
    inFlight() {
      return inFlight;
    },
    dispose() {
      controller.abort();
      context.global.deleteSync("__EnvAssets_fetch");
    },
  };
}
