import ivm from "isolated-vm";

export type ClosureArgument = string | number | boolean | null | undefined;

/**
 * A host-held handle to an object that lives in the isolate.
 *
 * The underlying `ivm.Reference` keeps the object reachable for the
 * isolate's collector while host code awaits. The object itself is only
 * touched from inside {@link TracedHandle.enter}, which queues a closure onto
 * the isolate thread and roots the object there with `derefInto()`.
 */
export class TracedHandle<T = unknown> {
  readonly #context: ivm.Context;
  #reference: ivm.Reference<T> | null;

  constructor(context: ivm.Context, reference: ivm.Reference<T>) {
    this.#context = context;
    this.#reference = reference;
  }

  get released(): boolean {
    return this.#reference === null;
  }

  /**
   * Run `code` as a closure on the isolate thread. The rooted object is `$0`,
   * extra arguments follow as `$1`, `$2`, ... The return value is copied out.
   */
  async enter(code: string, args: ClosureArgument[] = []): Promise<unknown> {
    const reference = this.#reference;
    if (reference === null) {
      throw new Error("Cannot enter a released traced handle");
    }
    const result: unknown = await this.#context.evalClosure(
      code,
      [reference.derefInto(), ...args],
      { result: { copy: true } }
    );
    return result;
  }

  release(): void {
    const reference = this.#reference;
    if (reference === null) {
      return;
    }
    this.#reference = null;
    reference.release();
  }
}
