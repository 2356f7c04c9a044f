import { test, describe, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import ivm from "isolated-vm";
import { setupFetch, type FetchHandle } from "@edgebox/fetch";
import { bridgeResponse } from "./response-bridge.ts";

describe("bridgeResponse", () => {
  let isolate: ivm.Isolate;
  let context: ivm.Context;
  let fetchHandle: FetchHandle;
  const url = new URL("https://example.com/a.txt");

  beforeEach(async () => {
    isolate = new ivm.Isolate();
    context = await isolate.createContext();
    fetchHandle = await setupFetch(context);
  });

  afterEach(() => {
    fetchHandle.dispose();
    context.release();
    isolate.dispose();
  });

  test("registers a script Response tagged with the request URL", async () => {
    const instanceId = await bridgeResponse(
      context,
      new Response("hello", {
        status: 202,
        statusText: "Accepted",
        headers: { "content-type": "text/plain" },
      }),
      url
    );

    const result = await context.eval(
      `
      (async () => {
        const response = Response._fromInstanceId(${instanceId});
        return JSON.stringify([
          response.status,
          response.statusText,
          response.url,
          response.headers.get("content-type"),
          await response.text(),
        ]);
      })()
    `,
      { promise: true }
    );
    assert.strictEqual(
      result,
      '[202,"Accepted","https://example.com/a.txt","text/plain","hello"]'
    );
  });

  test("rejects values that are not Responses", async () => {
    await assert.rejects(bridgeResponse(context, "hello", url), {
      name: "ResponseConversionError",
      message: "Asset dispatcher did not return a Response",
    });
  });

  test("rejects network error responses", async () => {
    await assert.rejects(bridgeResponse(context, Response.error(), url), {
      name: "ResponseConversionError",
      message: "Response status 0 is outside the range [200, 599]",
    });
  });

  test("rejects bodies that fail to read", async () => {
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.error(new Error("broken pipe"));
      },
    });
    await assert.rejects(bridgeResponse(context, new Response(stream), url), {
      name: "ResponseConversionError",
      message: /^Failed to read asset response body: /,
    });
  });
});
