import { test, describe, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import ivm from "isolated-vm";
import { TracedHandle } from "./traced-handle.ts";

describe("TracedHandle", () => {
  let isolate: ivm.Isolate;
  let context: ivm.Context;

  beforeEach(async () => {
    isolate = new ivm.Isolate();
    context = await isolate.createContext();
  });

  afterEach(() => {
    context.release();
    isolate.dispose();
  });

  test("enter reads the rooted object", async () => {
    const reference = context.evalSync(`({ name: "lamp", tags: ["a", "b"] })`, {
      reference: true,
    });
    const handle = new TracedHandle(context, reference);

    const result = await handle.enter(`return { name: $0.name, count: $0.tags.length };`);
    assert.deepStrictEqual(result, { name: "lamp", count: 2 });
    handle.release();
  });

  test("enter passes extra arguments", async () => {
    const reference = context.evalSync(`({ base: 10 })`, { reference: true });
    const handle = new TracedHandle(context, reference);

    const result = await handle.enter(`return $0.base + $1;`, [5]);
    assert.strictEqual(result, 15);
    handle.release();
  });

  test("object stays reachable after the isolate drops it", async () => {
    const reference = context.evalSync(
      `globalThis.held = { value: 7 }; globalThis.held`,
      { reference: true }
    );
    context.evalSync(`delete globalThis.held`);
    const handle = new TracedHandle(context, reference);

    assert.strictEqual(await handle.enter(`return $0.value;`), 7);
    handle.release();
  });

  test("release is idempotent and blocks further use", async () => {
    const reference = context.evalSync(`({})`, { reference: true });
    const handle = new TracedHandle(context, reference);

    assert.strictEqual(handle.released, false);
    handle.release();
    handle.release();
    assert.strictEqual(handle.released, true);
    await assert.rejects(handle.enter(`return 1;`), {
      message: "Cannot enter a released traced handle",
    });
  });
});
