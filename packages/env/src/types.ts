import type { AssetsFetchPhase } from "./errors.ts";

export type HeaderList = [string, string][];

/**
 * Host-side request handed to the asset dispatcher. The body is always fully
 * materialized; a request without body carries an empty sequence.
 */
export interface AssetRequest {
  method: string;
  url: URL;
  headers: HeaderList;
  body: Uint8Array;
}

export interface DispatchOptions {
  /** Aborted when the owning environment is disposed */
  signal: AbortSignal;
}

/**
 * Resolves a request to a stored static file. Failures reject; the rejection
 * message becomes the reason in "Failed to fetch static asset due to ...".
 */
export type AssetDispatcher = (
  request: AssetRequest,
  options: DispatchOptions
) => Promise<Response>;

/**
 * Structured events for every `ASSETS.fetch` call.
 */
export type AssetsEvent =
  | { type: "request"; method: string; url: string; bodyLength: number }
  | {
      type: "response";
      method: string;
      url: string;
      status: number;
      duration: number;
    }
  | { type: "error"; phase: AssetsFetchPhase; message: string };

export interface EnvOptions {
  /** Dispatcher behind `env.ASSETS.fetch` */
  assets: AssetDispatcher;
  /** Name of the global the environment object is exposed as. Defaults to "env" */
  globalName?: string;
  /** Callback invoked for each request, response and failure */
  onEvent?: (event: AssetsEvent) => void;
}

export interface EnvHandle {
  /** Global name the environment object is reachable under in the isolate */
  readonly globalName: string;
  /** Number of `ASSETS.fetch` calls whose promise has not settled yet */
  inFlight(): number;
  dispose(): void;
}
