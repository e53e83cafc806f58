import type { StandardSchemaV1 } from "@standard-schema/spec";
import { resolveMediaTypes, type MediaType, type MediaTypeLike } from "../http/media-type";
import type { ExtractPathParamsOrWiden } from "./internal/path";
import { negotiateProduces } from "./negotiation";
import type { RequestBody } from "./request-body";
import { ApiError, ApiValidationError, NoConverterError } from "./error";

type InferInput<TInputSchema> = TInputSchema extends StandardSchemaV1
  ? StandardSchemaV1.InferOutput<TInputSchema>
  : never;

export type RouteInput<TInputSchema extends StandardSchemaV1 | undefined> =
  TInputSchema extends undefined
    ? undefined
    : {
        schema: TInputSchema;
        valid: () => Promise<InferInput<TInputSchema>>;
      };

export class RequestInputContext<
  TPath extends string = string,
  TInputSchema extends StandardSchemaV1 | undefined = undefined,
> {
  readonly #request: Request;
  readonly #path: TPath;
  readonly #pathParams: ExtractPathParamsOrWiden<TPath>;
  readonly #remainder: string | undefined;
  readonly #searchParams: URLSearchParams;
  readonly #body: RequestBody;
  readonly #negotiatedType: MediaType;
  readonly #inputSchema: TInputSchema | undefined;

  constructor(config: {
    request: Request;
    path: TPath;
    pathParams: ExtractPathParamsOrWiden<TPath>;
    remainder?: string;
    body: RequestBody;
    negotiatedType: MediaType;
    inputSchema?: TInputSchema;
  }) {
    this.#request = config.request;
    this.#path = config.path;
    this.#pathParams = config.pathParams;
    this.#remainder = config.remainder;
    this.#searchParams = new URL(config.request.url).searchParams;
    this.#body = config.body;
    this.#negotiatedType = config.negotiatedType;
    this.#inputSchema = config.inputSchema;
  }

  get request(): Request {
    return this.#request;
  }

  get method(): string {
    return this.#request.method;
  }

  /** The route's path pattern. */
  get path(): TPath {
    return this.#path;
  }

  get pathParams(): ExtractPathParamsOrWiden<TPath> {
    return this.#pathParams;
  }

  /** What a trailing wildcard captured, if the route has one. */
  get remainder(): string | undefined {
    return this.#remainder;
  }

  get query(): URLSearchParams {
    return this.#searchParams;
  }

  get headers(): Headers {
    return this.#request.headers;
  }

  /** The request's content type, `application/octet-stream` when it sent none. */
  get contentType(): MediaType {
    return this.#body.mediaType;
  }

  /** The response type content negotiation settled on. */
  get negotiatedType(): MediaType {
    return this.#negotiatedType;
  }

  get body(): RequestBody {
    return this.#body;
  }

  /** The charset of the request body, if the client declared one. */
  get charset(): string | undefined {
    return this.#body.mediaType.charset;
  }

  get contentLength(): number | undefined {
    const raw = this.#request.headers.get("content-length");
    if (raw === null || !/^\d+$/.test(raw.trim())) {
      return undefined;
    }
    return Number(raw);
  }

  /** Whether the request was sent with `X-Requested-With: XMLHttpRequest`. */
  get xhr(): boolean {
    return this.#request.headers.get("x-requested-with")?.toLowerCase() === "xmlhttprequest";
  }

  /**
   * The best of the given types according to the `Accept` header, or undefined when the client
   * accepts none of them. Without an `Accept` header the first type is returned.
   *
   * @example
   * if (input.accepts("json", "html")?.subtype === "html") { ... }
   */
  accepts(...types: MediaTypeLike[]): MediaType | undefined {
    if (types.length === 0) {
      return undefined;
    }

    const result = negotiateProduces(
      this.#request.headers.get("accept"),
      resolveMediaTypes(types),
    );
    return result.type === "acceptable" ? result.mediaType : undefined;
  }

  get input(): RouteInput<TInputSchema> {
    if (!this.#inputSchema) {
      // eslint-disable-next-line @typescript-eslint/no-explicit-any
      return undefined as any;
    }

    return {
      schema: this.#inputSchema,
      valid: () => this.#validateInput(),
      // eslint-disable-next-line @typescript-eslint/no-explicit-any
    } as any;
  }

  /**
   * Validates the body against the route's input schema. Form bodies are validated as a plain
   * object of their fields, anything else as JSON; a missing body is validated as `undefined`. A body
   * no JSON reader understands is answered with 415.
   */
  async #validateInput(): Promise<InferInput<TInputSchema>> {
    if (!this.#inputSchema) {
      throw new Error("No input schema defined for this route");
    }

    const result = await this.#inputSchema["~standard"].validate(await this.#readInput());

    if (result.issues) {
      throw new ApiValidationError("Validation failed", result.issues);
    }

    return result.value as InferInput<TInputSchema>;
  }

  async #readInput(): Promise<unknown> {
    if (!this.#body.present) {
      return undefined;
    }

    if (this.#body.mediaType.essence === "application/x-www-form-urlencoded") {
      return Object.fromEntries(await this.#body.form());
    }

    try {
      return await this.#body.json();
    } catch (error) {
      if (error instanceof NoConverterError) {
        throw new ApiError(
          {
            message: `Cannot validate a '${this.#body.mediaType.essence}' body`,
            code: "UNSUPPORTED_MEDIA_TYPE",
          },
          415,
        );
      }
      throw error;
    }
  }
}
