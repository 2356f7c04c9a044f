// ============================================================================
// Error Encoding
// ============================================================================

const KNOWN_ERRORS: [string, ErrorConstructor][] = [
  ["TypeError", TypeError],
  ["RangeError", RangeError],
  ["SyntaxError", SyntaxError],
  ["ReferenceError", ReferenceError],
  ["URIError", URIError],
  ["EvalError", EvalError],
];

/**
 * Encode the error type into the message so it survives the isolate boundary.
 * The isolate side rebuilds the typed error with `__decodeError`.
 */
export function encodeError(err: unknown): Error {
  if (!(err instanceof Error)) {
    return new Error(`[Error]${String(err)}`);
  }
  const known = KNOWN_ERRORS.find(([, ctor]) => err instanceof ctor);
  const errorType = known ? known[0] : "Error";
  return new Error(`[${errorType}]${err.message}`);
}

/**
 * Isolate-side counterpart of {@link encodeError}.
 */
export const decodeErrorCode = `
  function __decodeError(err) {
    if (!(err instanceof Error)) return err;
    const match = err.message.match(/^\\[(TypeError|RangeError|SyntaxError|ReferenceError|URIError|EvalError|Error)\\](.*)$/);
    if (match) {
      const ErrorType = globalThis[match[1]] || Error;
      return new ErrorType(match[2]);
    }
    return err;
  }
`;
