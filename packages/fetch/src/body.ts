/**
 * Host-side body of a script Request. Bodies built inside the isolate are
 * buffered; bodies of requests handed in by the host stay streams until
 * someone drains them.
 */
export type BodySource =
  | { kind: "empty" }
  | { kind: "bytes"; bytes: Uint8Array }
  | { kind: "stream"; stream: ReadableStream<Uint8Array> };

export const EMPTY_BODY: BodySource = { kind: "empty" };

export function bodyFromBytes(bytes: Uint8Array | null): BodySource {
  if (bytes === null || bytes.byteLength === 0) {
    return EMPTY_BODY;
  }
  return { kind: "bytes", bytes };
}

/**
 * Collect a body into one contiguous byte sequence. "No body" drains to an
 * empty sequence. Stream errors propagate unchanged.
 */
export async function drainBody(source: BodySource): Promise<Uint8Array> {
  switch (source.kind) {
    case "empty":
      return new Uint8Array(0);
    case "bytes":
      return source.bytes;
    case "stream":
      return consumeStream(source.stream);
  }
}

async function consumeStream(
  stream: ReadableStream<Uint8Array>
): Promise<Uint8Array> {
  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  let totalLength = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      chunks.push(value);
      totalLength += value.byteLength;
    }
  } finally {
    reader.releaseLock();
  }

  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return result;
}
