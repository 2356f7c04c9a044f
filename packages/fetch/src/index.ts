import ivm from "isolated-vm";
import {
  InstanceRegistry,
  decodeErrorCode,
  defineAsyncCallback,
  defineCallback,
} from "@edgebox/core";
import { EMPTY_BODY, bodyFromBytes, drainBody } from "./body.ts";
import type { BodySource } from "./body.ts";

export { EMPTY_BODY, bodyFromBytes, drainBody } from "./body.ts";
export type { BodySource } from "./body.ts";

export type HeaderList = [string, string][];

// ============================================================================
// State Types
// ============================================================================

export interface RequestState {
  method: string;
  url: string;
  headers: HeaderList;
  body: BodySource;
  bodyUsed: boolean;
}

export interface ResponseState {
  status: number;
  statusText: string;
  headers: HeaderList;
  body: Uint8Array | null;
  bodyUsed: boolean;
  url: string;
}

export interface ResponseParts {
  status: number;
  statusText: string;
  headers: HeaderList;
  body: Uint8Array | null;
  url: string;
}

interface FetchState {
  requests: InstanceRegistry<RequestState>;
  responses: InstanceRegistry<ResponseState>;
}

export interface FetchHandle {
  dispose(): void;
}

const fetchStates = new WeakMap<ivm.Context, FetchState>();

function getFetchState(context: ivm.Context): FetchState {
  const state = fetchStates.get(context);
  if (!state) {
    throw new Error("Fetch API has not been set up for this context");
  }
  return state;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function encodeBody(text: string | null, bytes: number[] | null): Uint8Array | null {
  if (text !== null) return encoder.encode(text);
  if (bytes !== null) return new Uint8Array(bytes);
  return null;
}

// ============================================================================
// Body Take
// ============================================================================

function takeBody(state: RequestState): BodySource {
  if (state.bodyUsed) {
    throw new TypeError("Body has already been consumed");
  }
  state.bodyUsed = true;
  const body = state.body;
  state.body = EMPTY_BODY;
  return body;
}

/**
 * Detach the body of a script Request. Succeeds once per request; later
 * attempts, including after `text()` or `arrayBuffer()` in the isolate, throw.
 */
export function takeRequestBody(
  context: ivm.Context,
  instanceId: number
): BodySource {
  return takeBody(getFetchState(context).requests.require(instanceId));
}

function takeResponseBody(state: ResponseState): Uint8Array {
  if (state.bodyUsed) {
    throw new TypeError("Body has already been consumed");
  }
  state.bodyUsed = true;
  return state.body ?? new Uint8Array(0);
}

// ============================================================================
// Host Conversions
// ============================================================================

/**
 * Register a host Request so the isolate can wrap it with
 * `Request._fromInstanceId`. The body stays a stream until drained.
 */
export function createRequestInstance(
  context: ivm.Context,
  request: Request
): number {
  return getFetchState(context).requests.register({
    method: request.method,
    url: request.url,
    headers: Array.from(request.headers.entries()),
    body: request.body ? { kind: "stream", stream: request.body } : EMPTY_BODY,
    bodyUsed: false,
  });
}

/**
 * Register a Response built on the host. The isolate wraps the returned id
 * with `Response._fromInstanceId`.
 */
export function createResponseInstance(
  context: ivm.Context,
  parts: ResponseParts
): number {
  return getFetchState(context).responses.register({
    ...parts,
    bodyUsed: false,
  });
}

/**
 * Convert a script Response back into a platform Response. The host state is
 * dropped afterwards; the script object is unusable from then on.
 */
export function readResponseInstance(
  context: ivm.Context,
  instanceId: number
): Response {
  const { responses } = getFetchState(context);
  const state = responses.require(instanceId);
  const body = takeResponseBody(state);
  responses.delete(instanceId);
  return new Response(body.byteLength > 0 ? body : null, {
    status: state.status,
    statusText: state.statusText,
    headers: state.headers,
  });
}

// ============================================================================
// Headers Implementation (Pure JS)
// ============================================================================

const headersCode = `
(function() {
  const TOKEN = /^[!#$%&'*+\\-.^_\`|~0-9A-Za-z]+$/;

  function normalizeName(name) {
    const str = String(name);
    if (!TOKEN.test(str)) {
      throw new TypeError('Invalid header name: "' + str + '"');
    }
    return str;
  }

  function normalizeValue(value) {
    return String(value).replace(/^[\\t ]+|[\\t ]+$/g, '');
  }

  class Headers {
    // [name, value] pairs in insertion order; names keep their case
    #list = [];

    constructor(init) {
      if (init === undefined || init === null) return;
      if (init instanceof Headers) {
        init.forEach((value, name) => this.append(name, value));
      } else if (typeof init[Symbol.iterator] === 'function') {
        for (const pair of init) {
          const entry = Array.from(pair);
          if (entry.length !== 2) {
            throw new TypeError('Header pairs must contain exactly two items');
          }
          this.append(entry[0], entry[1]);
        }
      } else if (typeof init === 'object') {
        for (const name of Object.keys(init)) {
          this.append(name, init[name]);
        }
      }
    }

    append(name, value) {
      this.#list.push([normalizeName(name), normalizeValue(value)]);
    }

    delete(name) {
      const key = normalizeName(name).toLowerCase();
      this.#list = this.#list.filter(([n]) => n.toLowerCase() !== key);
    }

    get(name) {
      const key = normalizeName(name).toLowerCase();
      const values = this.#list.filter(([n]) => n.toLowerCase() === key).map(([, v]) => v);
      return values.length > 0 ? values.join(', ') : null;
    }

    has(name) {
      const key = normalizeName(name).toLowerCase();
      return this.#list.some(([n]) => n.toLowerCase() === key);
    }

    set(name, value) {
      const normalized = normalizeName(name);
      const key = normalized.toLowerCase();
      const index = this.#list.findIndex(([n]) => n.toLowerCase() === key);
      if (index === -1) {
        this.#list.push([normalized, normalizeValue(value)]);
        return;
      }
      this.#list[index] = [this.#list[index][0], normalizeValue(value)];
      this.#list = this.#list.filter(([n], i) => i <= index || n.toLowerCase() !== key);
    }

    forEach(callback, thisArg) {
      for (const [name, value] of this.entries()) {
        callback.call(thisArg, value, name, this);
      }
    }

    *entries() {
      // One entry per name, in first-insertion order, values combined
      const seen = new Set();
      for (const [name] of this.#list) {
        const key = name.toLowerCase();
        if (seen.has(key)) continue;
        seen.add(key);
        yield [name, this.get(name)];
      }
    }

    *keys() {
      for (const [name] of this.entries()) yield name;
    }

    *values() {
      for (const [, value] of this.entries()) yield value;
    }

    [Symbol.iterator]() {
      return this.entries();
    }
  }

  globalThis.Headers = Headers;
})();
`;

// ============================================================================
// Shared Body Helpers (Pure JS)
// ============================================================================

const bodyHelpersCode = `
  function __prepareBody(body) {
    if (body === null || body === undefined) return { text: null, bytes: null };
    if (typeof body === 'string') return { text: body, bytes: null };
    if (body instanceof ArrayBuffer) {
      return { text: null, bytes: Array.from(new Uint8Array(body)) };
    }
    if (ArrayBuffer.isView(body)) {
      return { text: null, bytes: Array.from(new Uint8Array(body.buffer, body.byteOffset, body.byteLength)) };
    }
    return { text: String(body), bytes: null };
  }

  function __toArrayBuffer(bytes) {
    return new Uint8Array(bytes).buffer;
  }
`;

// ============================================================================
// Request Implementation (Host State + Isolate Class)
// ============================================================================

function setupRequest(context: ivm.Context, state: FetchState): void {
  const { requests } = state;

  defineCallback(
    context,
    "__Request_construct",
    (
      url: string,
      method: string,
      headers: HeaderList,
      text: string | null,
      bytes: number[] | null
    ) =>
      requests.register({
        url,
        method,
        headers,
        body: bodyFromBytes(encodeBody(text, bytes)),
        bodyUsed: false,
      })
  );

  // new Request(request): the body moves from the source to the new request
  defineCallback(
    context,
    "__Request_constructFrom",
    (sourceId: number, url: string, method: string, headers: HeaderList) => {
      const source = requests.require(sourceId);
      if (source.bodyUsed) {
        throw new TypeError("Body has already been consumed");
      }
      if (source.body.kind === "empty") {
        return requests.register({ url, method, headers, body: EMPTY_BODY, bodyUsed: false });
      }
      if (method === "GET" || method === "HEAD") {
        throw new TypeError("Request with GET/HEAD method cannot have body");
      }
      return requests.register({
        url,
        method,
        headers,
        body: takeBody(source),
        bodyUsed: false,
      });
    }
  );

  defineCallback(context, "__Request_get_method", (instanceId: number) =>
    requests.require(instanceId).method
  );
  defineCallback(context, "__Request_get_url", (instanceId: number) =>
    requests.require(instanceId).url
  );
  defineCallback(context, "__Request_get_headers", (instanceId: number) =>
    requests.require(instanceId).headers
  );
  defineCallback(context, "__Request_get_bodyUsed", (instanceId: number) =>
    requests.require(instanceId).bodyUsed
  );

  defineAsyncCallback(context, "__Request_consumeText", async (instanceId: number) => {
    const bytes = await drainBody(takeBody(requests.require(instanceId)));
    return decoder.decode(bytes);
  });

  defineAsyncCallback(context, "__Request_consumeBytes", async (instanceId: number) => {
    const bytes = await drainBody(takeBody(requests.require(instanceId)));
    return Array.from(bytes);
  });

  context.evalSync(`
(function() {
  ${decodeErrorCode}
  ${bodyHelpersCode}

  // Only these are upper-cased; other methods keep their case
  const NORMALIZED_METHODS = ['DELETE', 'GET', 'HEAD', 'OPTIONS', 'POST', 'PUT'];

  function normalizeMethod(method) {
    const str = String(method);
    const upper = str.toUpperCase();
    return NORMALIZED_METHODS.includes(upper) ? upper : str;
  }

  class Request {
    #instanceId;
    #headers;

    constructor(input, init) {
      // Internal construction from instance ID
      if (typeof input === 'number' && init === null) {
        this.#instanceId = input;
        this.#headers = new Headers(__Request_get_headers(input));
        return;
      }

      const options = init ?? {};
      let url;
      let method = 'GET';
      let headers;
      let body = null;
      let sourceId = null;

      if (input instanceof Request) {
        sourceId = input._getInstanceId();
        url = input.url;
        method = input.method;
        headers = new Headers(input.headers);
      } else if (input === undefined || input === null) {
        throw new TypeError('Request requires a URL');
      } else {
        url = String(input);
        headers = new Headers();
      }

      if (options.method !== undefined) method = normalizeMethod(options.method);
      if (options.headers !== undefined) headers = new Headers(options.headers);
      if (options.body !== undefined && options.body !== null) body = options.body;

      if (body !== null && (method === 'GET' || method === 'HEAD')) {
        throw new TypeError('Request with GET/HEAD method cannot have body');
      }

      const prepared = __prepareBody(body);
      try {
        this.#instanceId = body === null && sourceId !== null
          ? __Request_constructFrom(sourceId, url, method, Array.from(headers.entries()))
          : __Request_construct(
              url, method, Array.from(headers.entries()), prepared.text, prepared.bytes
            );
      } catch (err) {
        throw __decodeError(err);
      }
      this.#headers = headers;
    }

    _getInstanceId() {
      return this.#instanceId;
    }

    static _fromInstanceId(instanceId) {
      return new Request(instanceId, null);
    }

    get method() {
      return __Request_get_method(this.#instanceId);
    }

    get url() {
      return __Request_get_url(this.#instanceId);
    }

    get headers() {
      return this.#headers;
    }

    get bodyUsed() {
      return __Request_get_bodyUsed(this.#instanceId);
    }

    async text() {
      try {
        return await __Request_consumeText(this.#instanceId);
      } catch (err) {
        throw __decodeError(err);
      }
    }

    async arrayBuffer() {
      try {
        return __toArrayBuffer(await __Request_consumeBytes(this.#instanceId));
      } catch (err) {
        throw __decodeError(err);
      }
    }

    async json() {
      return JSON.parse(await this.text());
    }
  }

  globalThis.Request = Request;
})();
`);
}

// ============================================================================
// Response Implementation (Host State + Isolate Class)
// ============================================================================

function setupResponse(context: ivm.Context, state: FetchState): void {
  const { responses } = state;

  defineCallback(
    context,
    "__Response_construct",
    (
      status: number,
      statusText: string,
      headers: HeaderList,
      text: string | null,
      bytes: number[] | null
    ) =>
      responses.register({
        status,
        statusText,
        headers,
        body: encodeBody(text, bytes),
        bodyUsed: false,
        url: "",
      })
  );

  defineCallback(context, "__Response_get_status", (instanceId: number) =>
    responses.require(instanceId).status
  );
  defineCallback(context, "__Response_get_statusText", (instanceId: number) =>
    responses.require(instanceId).statusText
  );
  defineCallback(context, "__Response_get_headers", (instanceId: number) =>
    responses.require(instanceId).headers
  );
  defineCallback(context, "__Response_get_url", (instanceId: number) =>
    responses.require(instanceId).url
  );
  defineCallback(context, "__Response_get_bodyUsed", (instanceId: number) =>
    responses.require(instanceId).bodyUsed
  );
  defineCallback(context, "__Response_consumeText", (instanceId: number) =>
    decoder.decode(takeResponseBody(responses.require(instanceId)))
  );
  defineCallback(context, "__Response_consumeBytes", (instanceId: number) =>
    Array.from(takeResponseBody(responses.require(instanceId)))
  );

  context.evalSync(`
(function() {
  ${decodeErrorCode}
  ${bodyHelpersCode}

  class Response {
    #instanceId;
    #headers;

    constructor(body, init) {
      // Internal construction from instance ID
      if (typeof body === 'number' && init === null) {
        this.#instanceId = body;
        this.#headers = new Headers(__Response_get_headers(body));
        return;
      }

      const options = init ?? {};
      const status = options.status === undefined ? 200 : Number(options.status);
      if (!Number.isInteger(status) || status < 200 || status > 599) {
        throw new RangeError('Response status ' + options.status + ' is outside the range [200, 599]');
      }
      const headers = new Headers(options.headers);
      if (typeof body === 'string' && !headers.has('content-type')) {
        headers.set('content-type', 'text/plain;charset=UTF-8');
      }

      const prepared = __prepareBody(body);
      try {
        this.#instanceId = __Response_construct(
          status,
          options.statusText === undefined ? '' : String(options.statusText),
          Array.from(headers.entries()),
          prepared.text,
          prepared.bytes
        );
      } catch (err) {
        throw __decodeError(err);
      }
      this.#headers = headers;
    }

    _getInstanceId() {
      return this.#instanceId;
    }

    static _fromInstanceId(instanceId) {
      return new Response(instanceId, null);
    }

    get status() {
      return __Response_get_status(this.#instanceId);
    }

    get statusText() {
      return __Response_get_statusText(this.#instanceId);
    }

    get ok() {
      const status = this.status;
      return status >= 200 && status < 300;
    }

    get url() {
      return __Response_get_url(this.#instanceId);
    }

    get headers() {
      return this.#headers;
    }

    get bodyUsed() {
      return __Response_get_bodyUsed(this.#instanceId);
    }

    async text() {
      try {
        return __Response_consumeText(this.#instanceId);
      } catch (err) {
        throw __decodeError(err);
      }
    }

    async arrayBuffer() {
      try {
        return __toArrayBuffer(__Response_consumeBytes(this.#instanceId));
      } catch (err) {
        throw __decodeError(err);
      }
    }

    async json() {
      return JSON.parse(await this.text());
    }
  }

  globalThis.Response = Response;
})();
`);
}

// ============================================================================
// Main Setup Function
// ============================================================================

/**
 * Setup the script-side Request, Response and Headers classes in an
 * isolated-vm context.
 *
 * @example
 * const handle = await setupFetch(context);
 *
 * const id = createRequestInstance(context, new Request("https://example.com/a.txt"));
 * await context.eval(`Request._fromInstanceId(${id}).url`);
 */
export async function setupFetch(context: ivm.Context): Promise<FetchHandle> {
  const state: FetchState = {
    requests: new InstanceRegistry<RequestState>("Request"),
    responses: new InstanceRegistry<ResponseState>("Response"),
  };
  fetchStates.set(context, state);

  context.evalSync(headersCode);
  setupRequest(context, state);
  setupResponse(context, state);

  return {
    dispose() {
      state.requests.clear();
      state.responses.clear();
      fetchStates.delete(context);
    },
  };
}
