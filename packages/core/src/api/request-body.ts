import type { MediaType } from "../http/media-type";
import {
  conformsToShape,
  type BodyConverterRegistry,
  type BodyShape,
  type BodyShapes,
  type BodySource,
} from "./converter";
import { BodyReadError, NoConverterError } from "./error";

/**
 * Lazy access to a request body. Nothing is read, and no converter is selected, until the handler
 * asks for a shape. Raw bytes are read at most once and shared by every conversion.
 */
export class RequestBody {
  readonly #request: Request;
  readonly #registry: BodyConverterRegistry;
  readonly #mediaType: MediaType;
  readonly #charset: string;
  readonly #conversions = new Map<BodyShape, Promise<unknown>>();
  #bytes: Promise<Uint8Array<ArrayBuffer>> | undefined;

  constructor(config: {
    request: Request;
    registry: BodyConverterRegistry;
    /** The request's content type, after consumes negotiation. */
    mediaType: MediaType;
    /** Used when the content type carries no charset. */
    defaultCharset: string;
  }) {
    this.#request = config.request;
    this.#registry = config.registry;
    this.#mediaType = config.mediaType;
    this.#charset = config.mediaType.charset ?? config.defaultCharset;
  }

  /** Whether the request carries a body at all. */
  get present(): boolean {
    return this.#request.body !== null;
  }

  get mediaType(): MediaType {
    return this.#mediaType;
  }

  /**
   * Converts the body into the given shape with the best matching reader.
   *
   * @throws {NoConverterError} when no reader handles the shape for this content type.
   * @throws {BodyReadError} when the reader rejects the bytes.
   */
  async read<S extends BodyShape>(shape: S): Promise<BodyShapes[S]> {
    let conversion = this.#conversions.get(shape);
    if (!conversion) {
      conversion = this.#convert(shape);
      this.#conversions.set(shape, conversion);
    }

    const value = await conversion;
    if (!conformsToShape(shape, value)) {
      throw new Error(`Body reader returned a value that is not '${shape}'`);
    }
    return value;
  }

  json(): Promise<unknown> {
    return this.read("json");
  }

  text(): Promise<string> {
    return this.read("text");
  }

  bytes(): Promise<Uint8Array<ArrayBuffer>> {
    return this.read("binary");
  }

  form(): Promise<URLSearchParams> {
    return this.read("form");
  }

  async #convert(shape: BodyShape): Promise<unknown> {
    const reader = this.#registry.selectReader(shape, this.#mediaType);
    if (!reader) {
      throw new NoConverterError("read", shape, this.#mediaType.essence);
    }

    const source: BodySource = {
      mediaType: this.#mediaType,
      charset: this.#charset,
      bytes: () => this.#readBytes(),
      text: async () => decode(await this.#readBytes(), this.#charset),
    };

    try {
      return await reader.read(shape, source);
    } catch (error) {
      if (error instanceof BodyReadError) {
        throw error;
      }
      throw new BodyReadError(`Request body could not be read as ${shape}`, { cause: error });
    }
  }

  #readBytes(): Promise<Uint8Array<ArrayBuffer>> {
    this.#bytes ??= this.#request.arrayBuffer().then((buffer) => new Uint8Array(buffer));
    return this.#bytes;
  }
}

function decode(bytes: Uint8Array<ArrayBuffer>, charset: string): string {
  return new TextDecoder(charset, { fatal: true }).decode(bytes);
}
