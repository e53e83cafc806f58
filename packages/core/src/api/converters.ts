import { MediaTypes, type MediaTypeLike } from "../http/media-type";
import { isAsset } from "./asset";
import { defineConverter, type BodyConverter } from "./converter";

const TEXTUAL_TYPES = [
  "text/plain",
  "text/*",
  "application/json",
  "application/*+json",
  "application/xml",
  "application/*+xml",
  "application/javascript",
  "application/x-www-form-urlencoded",
];

const encoder = new TextEncoder();

// Written bodies are always UTF-8.
function encode(text: string): Uint8Array<ArrayBuffer> {
  return encoder.encode(text);
}

/**
 * `application/json` and `+json` types. Writes any value `JSON.stringify` accepts.
 */
export const jsonConverter: BodyConverter = defineConverter({
  name: "json",
  types: [MediaTypes.json, MediaTypes.anyJson],
  reads: ["json"],
  writes: ["json"],
  async read(_shape, source) {
    const text = await source.text();
    return text.trim() === "" ? undefined : JSON.parse(text);
  },
  write(value) {
    return encode(JSON.stringify(value) ?? "null");
  },
});

/**
 * URL-encoded forms as `URLSearchParams`.
 */
export const formConverter: BodyConverter = defineConverter({
  name: "form",
  types: [MediaTypes.form],
  reads: ["form"],
  writes: ["form"],
  async read(_shape, source) {
    return new URLSearchParams(await source.text());
  },
  write(value) {
    if (!(value instanceof URLSearchParams)) {
      throw new TypeError("The form converter writes URLSearchParams only");
    }
    return encode(value.toString());
  },
});

/**
 * Strings against any text-like media type, in both directions.
 */
export const textConverter: BodyConverter = defineConverter({
  name: "text",
  types: TEXTUAL_TYPES,
  reads: ["text"],
  writes: ["text"],
  read: (_shape, source) => source.text(),
  write(value) {
    if (typeof value !== "string") {
      throw new TypeError("The text converter writes strings only");
    }
    return encode(value);
  },
});

/**
 * Raw bytes for any media type. Byte arrays and streams are written unchanged.
 */
export const bytesConverter: BodyConverter = defineConverter({
  name: "bytes",
  types: [MediaTypes.all],
  reads: ["binary", "stream"],
  writes: ["binary", "stream"],
  async read(shape, source) {
    const bytes = await source.bytes();
    if (shape === "stream") {
      return new Blob([bytes]).stream();
    }
    return bytes;
  },
  write(value) {
    if (value instanceof Uint8Array) {
      return new Uint8Array(value);
    }
    if (value instanceof ReadableStream) {
      return value;
    }
    throw new TypeError("The bytes converter writes byte arrays and streams only");
  },
});

/**
 * Reads any body as text, whatever its media type claims.
 */
export const readTextConverter: BodyConverter = defineConverter({
  name: "read-text",
  types: [MediaTypes.all],
  reads: ["text"],
  read: (_shape, source) => source.text(),
});

/**
 * Renders values nothing else could write, for humans: plain text, or a `<pre>` block for HTML.
 * Registered in the last-resort tier, so text and byte passthrough always come first.
 */
export const htmlDebugConverter: BodyConverter = defineConverter({
  name: "html-debug",
  types: [MediaTypes.html, MediaTypes.plain],
  writes: (shape) => shape !== "stream" && shape !== "asset",
  write(value, target) {
    const text = describe(value);
    if (target.mediaType.subtype === "html") {
      return encode(`<!DOCTYPE html>\n<pre>${escapeHtml(text)}</pre>\n`);
    }
    return encode(text);
  },
});

function describe(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value instanceof Uint8Array) {
    return `<${value.byteLength} bytes>`;
  }
  if (value instanceof URLSearchParams) {
    return value.toString();
  }
  if (value instanceof Error) {
    return value.stack ?? `${value.name}: ${value.message}`;
  }
  return JSON.stringify(value, null, 2) ?? String(value);
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/**
 * Writes {@link Asset} values by streaming their content.
 *
 * The asset is opened when the body is produced. Its iterator is released when the copy
 * completes, when the response is cancelled and when reading fails mid-copy; read errors are
 * reported to the target and error the response stream.
 */
export function assetConverter(types: readonly MediaTypeLike[] = [MediaTypes.all]): BodyConverter {
  return defineConverter({
    name: "asset",
    types,
    writes: ["asset"],
    write(value, target) {
      if (!isAsset(value)) {
        throw new TypeError("The asset converter writes assets only");
      }
      return streamOf(value.open(), target.onError);
    },
  });
}

function streamOf(
  source: AsyncIterable<Uint8Array>,
  onError: ((error: unknown) => void) | undefined,
): ReadableStream<Uint8Array> {
  const iterator = source[Symbol.asyncIterator]();

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      try {
        const { value, done } = await iterator.next();
        if (done) {
          controller.close();
          return;
        }
        controller.enqueue(value);
      } catch (error) {
        onError?.(error);
        try {
          await iterator.return?.();
        } finally {
          controller.error(error);
        }
      }
    },
    async cancel(reason) {
      await iterator.return?.(reason);
    },
  });
}

/**
 * The built-in converters in fallback order. User converters are consulted before these.
 */
export const defaultConverters: readonly BodyConverter[] = Object.freeze([
  jsonConverter,
  formConverter,
  textConverter,
  assetConverter(),
  bytesConverter,
  readTextConverter,
]);

export const lastResortConverters: readonly BodyConverter[] = Object.freeze([htmlDebugConverter]);
