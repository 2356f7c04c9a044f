import { lookup as mimeLookup } from "mime-types";
import type { AssetDispatcher, AssetRequest } from "@edgebox/env";

export interface AssetFile {
  body: Uint8Array;
  contentType: string;
}

/**
 * Resolve a decoded URL pathname to a file, or null when there is none.
 * Rejections are reported to the script as dispatch failures.
 */
export type AssetLookup = (pathname: string) => Promise<AssetFile | null>;

/**
 * Get MIME type for a file based on extension
 */
export function getMimeType(filePath: string): string {
  return mimeLookup(filePath) || "application/octet-stream";
}

function textResponse(
  status: number,
  text: string,
  headers: Record<string, string> = {}
): Response {
  return new Response(text, {
    status,
    headers: { "content-type": "text/plain;charset=UTF-8", ...headers },
  });
}

function decodePathname(request: AssetRequest): string | null {
  try {
    return decodeURIComponent(request.url.pathname);
  } catch {
    return null;
  }
}

/**
 * Build a dispatcher around a lookup. Answers GET and HEAD; other methods
 * get 405, unknown paths 404.
 */
export function createAssetDispatcher(lookup: AssetLookup): AssetDispatcher {
  return async (request) => {
    if (request.method !== "GET" && request.method !== "HEAD") {
      return textResponse(405, "Method Not Allowed", { allow: "GET, HEAD" });
    }

    const pathname = decodePathname(request);
    if (pathname === null) {
      return textResponse(400, "Bad Request");
    }

    const file = await lookup(pathname);
    if (!file) {
      return textResponse(404, "Not Found");
    }

    return new Response(request.method === "HEAD" ? null : file.body, {
      status: 200,
      headers: {
        "content-type": file.contentType,
        "content-length": String(file.body.byteLength),
      },
    });
  };
}
