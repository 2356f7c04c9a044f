import * as nodeFs from "node:fs";
import * as nodePath from "node:path";
import type { AssetDispatcher } from "@edgebox/env";
import { createAssetDispatcher, getMimeType, type AssetFile } from "./dispatcher.ts";

/**
 * The part of the fs module the directory dispatcher reads through.
 * Satisfied by Node's `fs` and by memfs.
 */
export interface AssetsFileSystem {
  promises: {
    readFile(path: string): Promise<string | Uint8Array>;
    stat(path: string): Promise<{ isFile(): boolean; isDirectory(): boolean }>;
  };
}

export interface DirectoryAssetsOptions {
  /** Custom fs module (e.g., memfs for testing). Defaults to Node.js fs */
  fs?: AssetsFileSystem;
  /** File served for directory paths. Defaults to "index.html" */
  indexFile?: string;
}

const MISSING_CODES = new Set(["ENOENT", "ENOTDIR"]);

function isMissing(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    typeof err.code === "string" &&
    MISSING_CODES.has(err.code)
  );
}

/**
 * Create a dispatcher serving the files under `rootPath`.
 *
 * @example
 * const runtime = await createRuntime({
 *   assets: createDirectoryAssets("./public"),
 * });
 */
export function createDirectoryAssets(
  rootPath: string,
  options?: DirectoryAssetsOptions
): AssetDispatcher {
  const fs: AssetsFileSystem = options?.fs ?? nodeFs;
  const fsPromises = fs.promises;
  const indexFile = options?.indexFile ?? "index.html";

  const resolvedRoot = nodePath.resolve(rootPath);
  const rootPrefix = resolvedRoot.endsWith(nodePath.sep)
    ? resolvedRoot
    : resolvedRoot + nodePath.sep;

  /**
   * Map a URL pathname to a real path, or null if it leaves the root
   */
  function toRealPath(pathname: string): string | null {
    const realPath = nodePath.join(resolvedRoot, nodePath.normalize(pathname));
    if (realPath !== resolvedRoot && !realPath.startsWith(rootPrefix)) {
      return null;
    }
    return realPath;
  }

  async function readAsset(realPath: string): Promise<AssetFile | null> {
    try {
      let filePath = realPath;
      let stats = await fsPromises.stat(filePath);
      if (stats.isDirectory()) {
        filePath = nodePath.join(realPath, indexFile);
        stats = await fsPromises.stat(filePath);
      }
      if (!stats.isFile()) {
        return null;
      }

      const content = await fsPromises.readFile(filePath);
      return {
        body: typeof content === "string" ? new TextEncoder().encode(content) : content,
        contentType: getMimeType(filePath),
      };
    } catch (err) {
      if (isMissing(err)) {
        return null;
      }
      throw err;
    }
  }

  return createAssetDispatcher(async (pathname) => {
    const realPath = toRealPath(pathname);
    return realPath === null ? null : readAsset(realPath);
  });
}
