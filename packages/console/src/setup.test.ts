import { test, describe, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import ivm from "isolated-vm";
import { setupFetch, type FetchHandle } from "@edgebox/fetch";
import {
  setupConsole,
  simpleConsoleHandler,
  type ConsoleEntry,
  type ConsoleHandle,
} from "./index.ts";

describe("setupConsole", () => {
  let isolate: ivm.Isolate;
  let context: ivm.Context;
  let fetchHandle: FetchHandle;
  let handle: ConsoleHandle;
  let entries: ConsoleEntry[];

  beforeEach(async () => {
    isolate = new ivm.Isolate();
    context = await isolate.createContext();
    fetchHandle = await setupFetch(context);
    entries = [];
    handle = await setupConsole(context, {
      onEntry: (entry) => entries.push(entry),
    });
  });

  afterEach(() => {
    handle.dispose();
    fetchHandle.dispose();
    context.release();
    isolate.dispose();
  });

  test("each level reports a structured entry", () => {
    context.evalSync(`
      console.log("a");
      console.info("b");
      console.warn("c");
      console.error("d");
      console.debug("e");
    `);
    assert.deepStrictEqual(entries, [
      { type: "output", level: "log", stdout: "a" },
      { type: "output", level: "info", stdout: "b" },
      { type: "output", level: "warn", stdout: "c" },
      { type: "output", level: "error", stdout: "d" },
      { type: "output", level: "debug", stdout: "e" },
    ]);
  });

  test("arguments are formatted and joined with spaces", () => {
    context.evalSync(`
      console.log("count:", 3, true, null, undefined, { a: "x", b: [1, 2] });
    `);
    assert.strictEqual(
      entries[0]?.stdout,
      "count: 3 true null undefined { a: 'x', b: [ 1, 2 ] }"
    );
  });

  test("circular and deep values are abbreviated", () => {
    context.evalSync(`
      const loop = { name: "loop" };
      loop.self = loop;
      console.log(loop, { a: { b: { c: { d: 1 } } } });
    `);
    assert.strictEqual(
      entries[0]?.stdout,
      "{ name: 'loop', self: [Circular] } { a: { b: { c: [Object] } } }"
    );
  });

  test("functions, bigints and empty containers", () => {
    context.evalSync(`
      function handler() {}
      console.log(handler, 10n, [], {});
    `);
    assert.strictEqual(entries[0]?.stdout, "[Function: handler] 10n [] {}");
  });

  test("requests and responses print their summary", () => {
    context.evalSync(`
      console.log(new Request("https://example.com/a.txt"), new Response("x", { status: 201 }));
    `);
    assert.strictEqual(
      entries[0]?.stdout,
      "Request { method: 'GET', url: 'https://example.com/a.txt' } Response { status: 201, url: '' }"
    );
  });

  test("nothing is reported after dispose", () => {
    handle.dispose();
    context.evalSync(`console.log("late")`);
    assert.deepStrictEqual(entries, []);
  });
});

describe("simpleConsoleHandler", () => {
  test("routes entries to per-level callbacks", () => {
    const logs: string[] = [];
    const options = simpleConsoleHandler({ log: (line) => logs.push(line) });
    options.onEntry?.({ type: "output", level: "log", stdout: "kept" });
    options.onEntry?.({ type: "output", level: "warn", stdout: "dropped" });
    assert.deepStrictEqual(logs, ["kept"]);
  });
});
