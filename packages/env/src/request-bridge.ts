import type { TracedHandle } from "@edgebox/core";
import { RequestBuildError } from "./errors.ts";
import type { AssetRequest, HeaderList } from "./types.ts";

/**
 * Method, target and headers read from a script Request on the isolate thread.
 */
export interface RequestHead {
  instanceId: number;
  method: string;
  url: string;
  headers: HeaderList;
}

const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
// Visible ASCII, space, tab and obs-text; anything else cannot go on the wire
const HEADER_VALUE = /^[\t -~\u0080-\u00ff]*$/;
const REQUEST_TARGET = /^[^\s\u0000-\u001f\u007f]+$/;

const READ_HEAD_CODE = `
  const request = $0;
  if (!(request instanceof Request)) return null;
  return {
    instanceId: request._getInstanceId(),
    method: request.method,
    url: request.url,
    headers: Array.from(request.headers.entries()),
  };
`;

function isHeaderList(value: unknown): value is HeaderList {
  return (
    Array.isArray(value) &&
    value.every(
      (pair) =>
        Array.isArray(pair) &&
        pair.length === 2 &&
        typeof pair[0] === "string" &&
        typeof pair[1] === "string"
    )
  );
}

/**
 * Validate what the isolate handed back and check that it can form an HTTP
 * request: method and header names are tokens, header values carry no control
 * characters, the target has no whitespace.
 */
export function parseRequestHead(value: unknown): RequestHead {
  if (
    typeof value !== "object" ||
    value === null ||
    !("instanceId" in value) ||
    !("method" in value) ||
    !("url" in value) ||
    !("headers" in value)
  ) {
    throw new RequestBuildError("Expected a Request object");
  }

  const { instanceId, method, url, headers } = value;
  if (typeof instanceId !== "number") {
    throw new RequestBuildError("Request is not backed by host state");
  }
  if (typeof method !== "string" || !TOKEN.test(method)) {
    throw new RequestBuildError(`Invalid method: ${JSON.stringify(method)}`);
  }
  if (typeof url !== "string" || !REQUEST_TARGET.test(url)) {
    throw new RequestBuildError(`Invalid request target: ${JSON.stringify(url)}`);
  }
  if (!isHeaderList(headers)) {
    throw new RequestBuildError("Request headers are not enumerable");
  }
  for (const [name, headerValue] of headers) {
    if (!TOKEN.test(name)) {
      throw new RequestBuildError(`Invalid header name: ${JSON.stringify(name)}`);
    }
    if (!HEADER_VALUE.test(headerValue)) {
      throw new RequestBuildError(`Invalid header value for ${JSON.stringify(name)}`);
    }
  }

  return { instanceId, method, url, headers };
}

/**
 * First phase of the request bridge. Reads the request through its traced
 * handle on the isolate thread.
 */
export async function readRequestHead(
  handle: TracedHandle
): Promise<RequestHead> {
  return parseRequestHead(await handle.enter(READ_HEAD_CODE));
}

/**
 * Final phase of the request bridge: attach the drained body and parse the
 * target as an absolute URL.
 */
export function buildAssetRequest(
  head: RequestHead,
  body: Uint8Array
): AssetRequest {
  let url: URL;
  try {
    url = new URL(head.url);
  } catch (err) {
    throw new RequestBuildError(`Invalid URL: ${head.url}`, { cause: err });
  }

  return {
    method: head.method,
    url,
    headers: head.headers.map(([name, value]): [string, string] => [name, value]),
    body,
  };
}
