import { resolveMediaType, type MediaType, type MediaTypeLike } from "../http/media-type";
import { assetSymbol } from "../internal/symbols";
import { ApiError } from "./error";
import type { RouteDefinition } from "./api";
import { defineRoute } from "./route";

/**
 * A file-like response body whose bytes are read only when the response is written.
 */
export interface Asset {
  readonly [assetSymbol]: true;
  /** Path of the asset relative to its source, e.g. "js/app.js". */
  readonly name: string;
  readonly type: MediaType;
  readonly size?: number;
  readonly lastModified?: Date;
  /** Opens the content. Called once per response. */
  open(): AsyncIterable<Uint8Array>;
}

export interface AssetOptions {
  name: string;
  type: MediaTypeLike;
  size?: number;
  lastModified?: Date;
  open(): AsyncIterable<Uint8Array>;
}

export function createAsset(options: AssetOptions): Asset {
  return Object.freeze({
    [assetSymbol]: true as const,
    name: options.name,
    type: resolveMediaType(options.type),
    size: options.size,
    lastModified: options.lastModified,
    open: options.open,
  });
}

export function isAsset(value: unknown): value is Asset {
  return typeof value === "object" && value !== null && assetSymbol in value;
}

/**
 * Looks up assets by the path remainder a wildcard route captured.
 */
export interface AssetSource {
  resolve(path: string): Promise<Asset | null> | Asset | null;
}

/**
 * An asset source backed by an in-memory map, mostly useful for tests and embedded files.
 */
export function memoryAssets(
  files: Record<string, string | Uint8Array>,
  options: { type?: (name: string) => MediaTypeLike } = {},
): AssetSource {
  const encoder = new TextEncoder();
  const typeOf = options.type ?? (() => "application/octet-stream");

  return {
    resolve(path) {
      const content = Object.hasOwn(files, path) ? files[path] : undefined;
      if (content === undefined) {
        return null;
      }

      const bytes = typeof content === "string" ? encoder.encode(content) : content;
      return createAsset({
        name: path,
        type: typeOf(path),
        size: bytes.byteLength,
        async *open() {
          yield bytes;
        },
      });
    },
  };
}

/**
 * A `GET` route serving files from an {@link AssetSource}. The path must end in a trailing
 * wildcard; the captured remainder is the asset name. Unknown names answer 404.
 *
 * @example
 * defineAssetRoute({ path: "/assets/**", source: fileSystemAssets("./public") });
 */
export function defineAssetRoute<const TPath extends string>(config: {
  path: TPath;
  source: AssetSource;
}): RouteDefinition<"GET", TPath, undefined> {
  const { path, source } = config;

  return defineRoute({
    method: "GET",
    path,
    errorCodes: ["ASSET_NOT_FOUND"],
    async handler({ remainder }, output) {
      const asset = remainder ? await source.resolve(remainder) : null;
      if (!asset) {
        throw new ApiError({ message: "Asset not found", code: "ASSET_NOT_FOUND" }, 404);
      }

      output.type(asset.type);
      if (asset.size !== undefined) {
        output.header("Content-Length", String(asset.size));
      }
      if (asset.lastModified) {
        output.header("Last-Modified", asset.lastModified.toUTCString());
      }
      return asset;
    },
  });
}
