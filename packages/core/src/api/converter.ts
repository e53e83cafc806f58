import { MediaType, MediaTypes, resolveMediaTypes, type MediaTypeLike } from "../http/media-type";
import { bodyConverterSymbol } from "../internal/symbols";
import { isAsset, type Asset } from "./asset";

/**
 * The in-process values a body can be converted from or into, keyed by shape.
 */
export interface BodyShapes {
  text: string;
  binary: Uint8Array<ArrayBuffer>;
  stream: ReadableStream<Uint8Array>;
  json: unknown;
  form: URLSearchParams;
  asset: Asset;
}

export type BodyShape = keyof BodyShapes;

export const bodyShapes = ["text", "binary", "stream", "json", "form", "asset"] as const;

/**
 * The raw request body, as handed to a reader.
 */
export interface BodySource {
  readonly mediaType: MediaType;
  /** The charset parameter of the content type, or the dispatcher's default. */
  readonly charset: string;
  bytes(): Promise<Uint8Array<ArrayBuffer>>;
  text(): Promise<string>;
}

/**
 * Where a written value goes.
 */
export interface BodyTarget {
  /** The concrete type the response will be labelled with. */
  readonly mediaType: MediaType;
  /** Always "utf-8". */
  readonly charset: string;
  /** Called with errors raised while a streaming body is being produced. */
  onError?(error: unknown): void;
}

export interface BodyConverter {
  readonly [bodyConverterSymbol]: true;
  readonly name: string;
  readonly types: readonly MediaType[];
  canRead(shape: BodyShape): boolean;
  canWrite(shape: BodyShape, value: unknown): boolean;
  read(shape: BodyShape, source: BodySource): Promise<unknown>;
  write(value: unknown, target: BodyTarget): BodyInit | null | Promise<BodyInit | null>;
}

export interface BodyConverterOptions {
  name: string;
  types: readonly MediaTypeLike[];
  /** Shapes this converter reads. Omit for a write-only converter. */
  reads?: readonly BodyShape[];
  /** Shapes this converter writes, or a predicate over the shape and the value. */
  writes?: readonly BodyShape[] | ((shape: BodyShape, value: unknown) => boolean);
  read?(shape: BodyShape, source: BodySource): unknown;
  write?(value: unknown, target: BodyTarget): BodyInit | null | Promise<BodyInit | null>;
}

/**
 * Declares a body converter. A converter is nothing but its media types, two predicates and the
 * functions behind them.
 *
 * @example
 * const csv = defineConverter({
 *   name: "csv",
 *   types: ["text/csv"],
 *   writes: (_shape, value) => Array.isArray(value),
 *   write: (rows) => toCsv(rows),
 * });
 */
export function defineConverter(options: BodyConverterOptions): BodyConverter {
  const { name, reads = [], writes = [], read, write } = options;
  const types = Object.freeze(resolveMediaTypes(options.types));

  return Object.freeze({
    [bodyConverterSymbol]: true as const,
    name,
    types,
    canRead: (shape: BodyShape) => read !== undefined && reads.includes(shape),
    canWrite: (shape: BodyShape, value: unknown) =>
      write !== undefined &&
      (typeof writes === "function" ? writes(shape, value) : writes.includes(shape)),
    read: async (shape: BodyShape, source: BodySource) => {
      if (!read) {
        throw new Error(`Body converter '${name}' cannot read`);
      }
      return read(shape, source);
    },
    write: (value: unknown, target: BodyTarget) => {
      if (!write) {
        throw new Error(`Body converter '${name}' cannot write`);
      }
      return write(value, target);
    },
  });
}

export function isBodyConverter(value: unknown): value is BodyConverter {
  return typeof value === "object" && value !== null && bodyConverterSymbol in value;
}

/**
 * The shape of a handler's result.
 */
export function shapeOf(value: unknown): BodyShape {
  if (typeof value === "string") {
    return "text";
  }
  if (value instanceof Uint8Array) {
    return "binary";
  }
  if (value instanceof ReadableStream) {
    return "stream";
  }
  if (value instanceof URLSearchParams) {
    return "form";
  }
  if (isAsset(value)) {
    return "asset";
  }
  return "json";
}

/**
 * Whether a value read by a converter is really of the requested shape.
 */
export function conformsToShape<S extends BodyShape>(
  shape: S,
  value: unknown,
): value is BodyShapes[S] {
  switch (shape) {
    case "text":
      return typeof value === "string";
    case "binary":
      return value instanceof Uint8Array && value.buffer instanceof ArrayBuffer;
    case "stream":
      return value instanceof ReadableStream;
    case "form":
      return value instanceof URLSearchParams;
    case "asset":
      return isAsset(value);
    default:
      return true;
  }
}

export interface BodyConverterRegistryOptions {
  /** Consulted after the user converters, in order. */
  fallbacks?: readonly BodyConverter[];
  /**
   * Consulted only when no user converter or fallback can handle the shape at all, whatever their
   * media-type scores. Debug renderings go here.
   */
  lastResort?: readonly BodyConverter[];
}

/**
 * Ordered converters. User converters are consulted before the fallbacks, and the last-resort tier
 * only when neither has a candidate.
 *
 * Within a tier, selection keeps the converters whose media types match the requested type and
 * whose predicate accepts the shape, then prefers the most specific media-type match (for each
 * pair, the specificity of the less specific side), then registration order.
 */
export class BodyConverterRegistry {
  readonly #primary: readonly BodyConverter[];
  readonly #lastResort: readonly BodyConverter[];
  readonly #converters: readonly BodyConverter[];

  constructor(converters: readonly BodyConverter[] = [], options: BodyConverterRegistryOptions = {}) {
    this.#primary = Object.freeze([...converters, ...(options.fallbacks ?? [])]);
    this.#lastResort = Object.freeze([...(options.lastResort ?? [])]);
    this.#converters = Object.freeze([...this.#primary, ...this.#lastResort]);
  }

  /** Every converter in consultation order, last-resort tier included. */
  get converters(): readonly BodyConverter[] {
    return this.#converters;
  }

  selectReader(shape: BodyShape, contentType: MediaType): BodyConverter | undefined {
    return this.#selectTiered(contentType, (converter) => converter.canRead(shape));
  }

  selectWriter(shape: BodyShape, mediaType: MediaType, value?: unknown): BodyConverter | undefined {
    return this.#selectTiered(mediaType, (converter) => converter.canWrite(shape, value));
  }

  #selectTiered(
    mediaType: MediaType,
    accepts: (converter: BodyConverter) => boolean,
  ): BodyConverter | undefined {
    return (
      select(this.#primary, mediaType, accepts) ?? select(this.#lastResort, mediaType, accepts)
    );
  }
}

function select(
  converters: readonly BodyConverter[],
  mediaType: MediaType,
  accepts: (converter: BodyConverter) => boolean,
): BodyConverter | undefined {
  let best: BodyConverter | undefined;
  let bestScore = -1;

  for (const converter of converters) {
    const score = matchScore(converter, mediaType);
    if (score > bestScore && accepts(converter)) {
      best = converter;
      bestScore = score;
    }
  }

  return best;
}

function matchScore(converter: BodyConverter, mediaType: MediaType): number {
  let score = -1;
  for (const type of converter.types) {
    if (type.matches(mediaType)) {
      score = Math.max(score, Math.min(type.specificity, mediaType.specificity));
    }
  }
  return score;
}

/**
 * The `Content-Type` a written body is labelled with.
 *
 * A concrete target type is used as is. For a wildcard target, the converter's first concrete type
 * matching it is used, and failing that a default for the shape. Textual types carry `charset`,
 * replacing any charset the client asked for.
 */
export function resolveContentType(
  converter: BodyConverter,
  target: MediaType,
  shape: BodyShape,
  charset: string,
): MediaType {
  let resolved: MediaType;

  if (!target.isWildcard) {
    resolved = withoutQuality(target);
  } else {
    resolved =
      converter.types.find((type) => !type.isWildcard && type.matches(target)) ??
      defaultTypeFor(shape);
  }

  if (resolved.isTextual) {
    return resolved.withParameters({ charset });
  }

  return resolved;
}

function withoutQuality(type: MediaType): MediaType {
  if (!("q" in type.parameters)) {
    return type;
  }
  const parameters = { ...type.parameters };
  delete parameters["q"];
  return type.withoutParameters().withParameters(parameters);
}

function defaultTypeFor(shape: BodyShape): MediaType {
  switch (shape) {
    case "text":
      return MediaTypes.plain;
    case "json":
      return MediaTypes.json;
    case "form":
      return MediaTypes.form;
    default:
      return MediaTypes.octetStream;
  }
}
