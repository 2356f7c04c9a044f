import type { AssetDispatcher } from "@edgebox/env";
import { createAssetDispatcher, getMimeType, type AssetFile } from "./dispatcher.ts";

export {
  createAssetDispatcher,
  getMimeType,
  type AssetFile,
  type AssetLookup,
} from "./dispatcher.ts";
export {
  createDirectoryAssets,
  type AssetsFileSystem,
  type DirectoryAssetsOptions,
} from "./node-adapter.ts";

export type AssetFiles = Record<string, string | Uint8Array>;

/**
 * Serve a fixed set of files keyed by pathname, e.g. `{ "/a.txt": "hello" }`.
 * A path ending in "/" serves its `index.html`.
 *
 * @example
 * const handle = await setupEnv(context, {
 *   assets: createMemoryAssets({ "/index.html": "<h1>Hi</h1>" }),
 * });
 */
export function createMemoryAssets(files: AssetFiles): AssetDispatcher {
  const encoder = new TextEncoder();
  const entries = new Map<string, AssetFile>();
  for (const [path, content] of Object.entries(files)) {
    const normalized = path.startsWith("/") ? path : `/${path}`;
    entries.set(normalized, {
      body: typeof content === "string" ? encoder.encode(content) : content,
      contentType: getMimeType(normalized),
    });
  }

  return createAssetDispatcher(async (pathname) => {
    const key = pathname.endsWith("/") ? `${pathname}index.html` : pathname;
    return entries.get(key) ?? null;
  });
}
