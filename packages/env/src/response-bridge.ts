import type ivm from "isolated-vm";
import { createResponseInstance } from "@edgebox/fetch";
import { ResponseConversionError, errorMessage } from "./errors.ts";
import type { HeaderList } from "./types.ts";

/**
 * Turn the dispatcher's Response into a script Response tagged with the URL
 * that produced it. Returns the instance id the isolate wraps with
 * `Response._fromInstanceId`.
 */
export async function bridgeResponse(
  context: ivm.Context,
  response: unknown,
  url: URL
): Promise<number> {
  if (!(response instanceof Response)) {
    throw new ResponseConversionError("Asset dispatcher did not return a Response");
  }
  // Response.error() and friends carry status 0
  if (response.status < 200 || response.status > 599) {
    throw new ResponseConversionError(
      `Response status ${response.status} is outside the range [200, 599]`
    );
  }

  const headers: HeaderList = [];
  for (const [name, value] of response.headers) {
    headers.push([name, value]);
  }

  let body: Uint8Array;
  try {
    body = new Uint8Array(await response.arrayBuffer());
  } catch (err) {
    throw new ResponseConversionError(
      `Failed to read asset response body: ${errorMessage(err)}`,
      { cause: err }
    );
  }

  return createResponseInstance(context, {
    status: response.status,
    statusText: response.statusText,
    headers,
    body,
    url: url.href,
  });
}
