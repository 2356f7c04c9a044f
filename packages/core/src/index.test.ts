import { test, describe, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import ivm from "isolated-vm";
import {
  InstanceRegistry,
  resetInstanceIds,
  decodeErrorCode,
  defineAsyncCallback,
  defineCallback,
  encodeError,
  withScopeAsync,
} from "./index.ts";

describe("InstanceRegistry", () => {
  beforeEach(() => {
    resetInstanceIds();
  });

  test("assigns increasing instance ids", () => {
    const registry = new InstanceRegistry<{ name: string }>("Lamp");
    assert.strictEqual(registry.register({ name: "a" }), 1);
    assert.strictEqual(registry.register({ name: "b" }), 2);
    assert.deepStrictEqual(registry.get(2), { name: "b" });
    assert.strictEqual(registry.size, 2);
  });

  test("ids are unique across registries", () => {
    const lamps = new InstanceRegistry<string>("Lamp");
    const chairs = new InstanceRegistry<string>("Chair");
    assert.strictEqual(lamps.register("lamp"), 1);
    assert.strictEqual(chairs.register("chair"), 2);
    assert.strictEqual(lamps.get(2), undefined);
  });

  test("require throws for unknown ids", () => {
    const registry = new InstanceRegistry<string>("Lamp");
    assert.throws(() => registry.require(7), {
      message: "Lamp instance 7 not found",
    });
  });

  test("delete and clear drop state", () => {
    const registry = new InstanceRegistry<string>("Lamp");
    const first = registry.register("a");
    registry.register("b");
    assert.strictEqual(registry.delete(first), true);
    assert.strictEqual(registry.delete(first), false);
    assert.strictEqual(registry.size, 1);
    registry.clear();
    assert.strictEqual(registry.size, 0);
  });
});

describe("encodeError", () => {
  test("prefixes built-in error types", () => {
    assert.strictEqual(encodeError(new TypeError("bad")).message, "[TypeError]bad");
    assert.strictEqual(encodeError(new RangeError("far")).message, "[RangeError]far");
  });

  test("subclasses encode as their built-in base", () => {
    class LookupError extends TypeError {}
    assert.strictEqual(encodeError(new LookupError("oops")).message, "[TypeError]oops");
  });

  test("plain errors and non-errors", () => {
    assert.strictEqual(encodeError(new Error("x")).message, "[Error]x");
    assert.strictEqual(encodeError("boom").message, "[Error]boom");
  });
});

describe("withScopeAsync", () => {
  test("releases resources in reverse order", async () => {
    const released: string[] = [];
    const result = await withScopeAsync(async (scope) => {
      scope.manage({ release: () => released.push("first") });
      scope.manage({ release: () => released.push("second") });
      return 42;
    });
    assert.strictEqual(result, 42);
    assert.deepStrictEqual(released, ["second", "first"]);
  });

  test("releases resources when the callback rejects", async () => {
    const released: string[] = [];
    await assert.rejects(
      withScopeAsync(async (scope) => {
        scope.manage({ release: () => released.push("only") });
        throw new Error("failed");
      }),
      { message: "failed" }
    );
    assert.deepStrictEqual(released, ["only"]);
  });
});

describe("host callbacks", () => {
  let isolate: ivm.Isolate;
  let context: ivm.Context;

  beforeEach(async () => {
    isolate = new ivm.Isolate();
    context = await isolate.createContext();
    context.evalSync(decodeErrorCode);
  });

  afterEach(() => {
    context.release();
    isolate.dispose();
  });

  test("defineCallback returns values to the isolate", () => {
    defineCallback(context, "__add", (a: number, b: number) => a + b);
    assert.strictEqual(context.evalSync(`__add(2, 3)`), 5);
  });

  test("defineCallback errors keep their type", () => {
    defineCallback(context, "__explode", () => {
      throw new RangeError("too far");
    });
    const result = context.evalSync(`
      (() => {
        try {
          __explode();
          return "no error";
        } catch (err) {
          const decoded = __decodeError(err);
          return decoded.constructor.name + ":" + decoded.message;
        }
      })()
    `);
    assert.strictEqual(result, "RangeError:too far");
  });

  test("defineAsyncCallback resolves in the isolate", async () => {
    defineAsyncCallback(context, "__double", async (value: number) => value * 2);
    const result = await context.eval(`__double(21)`, { promise: true });
    assert.strictEqual(result, 42);
  });

  test("defineAsyncCallback copies array results", async () => {
    defineAsyncCallback(context, "__bytes", async () => [1, 2, 250]);
    const result = await context.eval(
      `__bytes().then((bytes) => JSON.stringify(bytes))`,
      { promise: true }
    );
    assert.strictEqual(result, "[1,2,250]");
  });

  test("defineAsyncCallback rejections keep their type", async () => {
    defineAsyncCallback(context, "__missing", async () => {
      throw new TypeError("gone");
    });
    const result = await context.eval(
      `
      __missing().then(
        () => "resolved",
        (err) => {
          const decoded = __decodeError(err);
          return decoded.constructor.name + ":" + decoded.message;
        }
      )
    `,
      { promise: true }
    );
    assert.strictEqual(result, "TypeError:gone");
  });
});
