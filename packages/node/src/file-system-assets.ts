import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import { extname, isAbsolute, relative, resolve, sep } from "node:path";
import { createAsset, type AssetSource, type MediaTypeLike } from "@switchyard/core";
import mimeTypes from "./mime-types.json";

const typesByExtension = new Map<string, string>(Object.entries(mimeTypes));

/**
 * The media type for a file name, from its extension. Unknown extensions are
 * `application/octet-stream`.
 */
export function mimeTypeFor(name: string): string {
  const extension = extname(name).slice(1).toLowerCase();
  return typesByExtension.get(extension) ?? "application/octet-stream";
}

export interface FileSystemAssetsOptions {
  /** Overrides the extension lookup. */
  type?: (name: string) => MediaTypeLike;
}

/**
 * Serves regular files below `root`. Names that escape the root, contain NUL bytes, or point at
 * anything but a regular file resolve to null.
 *
 * @example
 * defineAssetRoute({ path: "/assets/**", source: fileSystemAssets("./public") });
 */
export function fileSystemAssets(root: string, options: FileSystemAssetsOptions = {}): AssetSource {
  const base = resolve(root);
  const typeOf = options.type ?? mimeTypeFor;

  return {
    async resolve(path) {
      if (path.includes("\0")) {
        return null;
      }

      const file = resolve(base, `.${sep}${path}`);
      const name = relative(base, file);
      if (name === "" || name === ".." || name.startsWith(`..${sep}`) || isAbsolute(name)) {
        return null;
      }

      const stats = await statFile(file);
      if (!stats?.isFile()) {
        return null;
      }

      return createAsset({
        name: name.split(sep).join("/"),
        type: typeOf(name),
        size: stats.size,
        lastModified: stats.mtime,
        open: () => createReadStream(file),
      });
    },
  };
}

async function statFile(file: string) {
  try {
    return await stat(file);
  } catch (error) {
    if (isMissingFileError(error)) {
      return undefined;
    }
    throw error;
  }
}

function isMissingFileError(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) {
    return false;
  }
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}
