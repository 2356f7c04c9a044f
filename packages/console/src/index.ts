import ivm from "isolated-vm";

export type ConsoleLevel = "log" | "warn" | "error" | "info" | "debug";

/**
 * Console output from the sandbox, pre-formatted as stdout strings
 * (like Node.js console) inside the isolate.
 */
export type ConsoleEntry = {
  type: "output";
  level: ConsoleLevel;
  stdout: string;
};

/**
 * Console options with a single structured callback.
 */
export interface ConsoleOptions {
  /**
   * Callback invoked for each console call.
   */
  onEntry?: (entry: ConsoleEntry) => void;
}

export interface ConsoleHandle {
  dispose(): void;
}

const LEVELS: readonly ConsoleLevel[] = ["log", "warn", "error", "info", "debug"];

/**
 * Setup console API in an isolated-vm context
 *
 * Injects console.log, console.warn, console.error, console.info and
 * console.debug.
 *
 * @example
 * const handle = await setupConsole(context, {
 *   onEntry: (entry) => console.log(`[${entry.level}]`, entry.stdout),
 * });
 */
export async function setupConsole(
  context: ivm.Context,
  options?: ConsoleOptions
): Promise<ConsoleHandle> {
  const opts = options ?? {};
  let disposed = false;

  for (const level of LEVELS) {
    context.global.setSync(
      `__console_${level}`,
      new ivm.Callback((stdout: string) => {
        if (disposed) return;
        opts.onEntry?.({ type: "output", level, stdout });
      })
    );
  }

  context.evalSync(`
(function() {
  function format(value, depth, seen) {
    if (value === null) return 'null';
    if (value === undefined) return 'undefined';
    const type = typeof value;
    if (type === 'string') return depth === 0 ? value : "'" + value + "'";
    if (type === 'number' || type === 'boolean' || type === 'symbol') return String(value);
    if (type === 'bigint') return value + 'n';
    if (type === 'function') return '[Function: ' + (value.name || '(anonymous)') + ']';

    if (seen.has(value)) return '[Circular]';
    if (depth > 2) return Array.isArray(value) ? '[Array]' : '[Object]';
    seen.add(value);
    try {
      if (value instanceof Error) {
        return value.stack || value.name + ': ' + value.message;
      }
      if (typeof Response !== 'undefined' && value instanceof Response) {
        return 'Response { status: ' + value.status + ', url: ' + format(value.url, depth + 1, seen) + ' }';
      }
      if (typeof Request !== 'undefined' && value instanceof Request) {
        return 'Request { method: ' + format(value.method, depth + 1, seen) + ', url: ' + format(value.url, depth + 1, seen) + ' }';
      }
      if (Array.isArray(value)) {
        if (value.length === 0) return '[]';
        return '[ ' + value.map((item) => format(item, depth + 1, seen)).join(', ') + ' ]';
      }
      const keys = Object.keys(value);
      if (keys.length === 0) return '{}';
      return '{ ' + keys.map((key) => key + ': ' + format(value[key], depth + 1, seen)).join(', ') + ' }';
    } finally {
      seen.delete(value);
    }
  }

  function formatArgs(args) {
    return args.map((arg) => format(arg, 0, new WeakSet())).join(' ');
  }

  const console = {};
  for (const level of ${JSON.stringify(LEVELS)}) {
    const send = globalThis['__console_' + level];
    console[level] = (...args) => send(formatArgs(args));
  }
  globalThis.console = console;
})();
`);

  return {
    dispose() {
      disposed = true;
    },
  };
}

/**
 * Simple console callback interface for basic usage.
 */
export type SimpleConsoleCallbacks = Partial<
  Record<ConsoleLevel, (stdout: string) => void>
>;

/**
 * Helper to create ConsoleOptions from simple per-level callbacks.
 *
 * @example
 * const runtime = await createRuntime({
 *   assets,
 *   console: simpleConsoleHandler({
 *     log: (line) => console.log("[sandbox]", line),
 *     error: (line) => console.error("[sandbox]", line),
 *   }),
 * });
 */
export function simpleConsoleHandler(
  callbacks: SimpleConsoleCallbacks
): ConsoleOptions {
  return {
    onEntry: (entry) => {
      callbacks[entry.level]?.(entry.stdout);
    },
  };
}
