export type AssetsFetchPhase = "request" | "body" | "dispatch" | "response";

/**
 * Method, URL or headers of the script request cannot form an HTTP request.
 * Reaches the script as a TypeError.
 */
export class RequestBuildError extends TypeError {
  readonly phase = "request";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RequestBuildError";
  }
}

/**
 * The request body could not be collected into bytes.
 */
export class BodyDrainError extends Error {
  readonly phase = "body";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BodyDrainError";
  }
}

/**
 * The asset dispatcher failed.
 */
export class DispatchError extends Error {
  readonly phase = "dispatch";
  readonly reason: string;

  constructor(reason: string, options?: ErrorOptions) {
    super(`Failed to fetch static asset due to ${reason}`, options);
    this.name = "DispatchError";
    this.reason = reason;
  }
}

/**
 * The dispatcher's response has no script-side representation.
 */
export class ResponseConversionError extends Error {
  readonly phase = "response";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ResponseConversionError";
  }
}

export type AssetsFetchError =
  | RequestBuildError
  | BodyDrainError
  | DispatchError
  | ResponseConversionError;

export function isAssetsFetchError(err: unknown): err is AssetsFetchError {
  return (
    err instanceof RequestBuildError ||
    err instanceof BodyDrainError ||
    err instanceof DispatchError ||
    err instanceof ResponseConversionError
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
