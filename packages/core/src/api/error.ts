import type { StandardSchemaV1 } from "@standard-schema/spec";
import type { StatusCode } from "../http/http-status";
import type { BodyShape } from "./converter";

/**
 * An error that maps directly onto a boundary response. Throw it from a handler to answer with a
 * specific status and error code.
 */
export class ApiError extends Error {
  readonly #status: StatusCode;
  readonly #code: string;
  readonly #headers: HeadersInit | undefined;

  constructor(
    { message, code }: { message: string; code: string },
    status: StatusCode,
    headers?: HeadersInit,
  ) {
    super(message);
    this.name = "ApiError";
    this.#status = status;
    this.#code = code;
    this.#headers = headers;
  }

  get status() {
    return this.#status;
  }

  get code() {
    return this.#code;
  }

  toResponse() {
    return Response.json(
      { error: this.message, code: this.code },
      { status: this.status, headers: this.#headers },
    );
  }
}

export class ApiValidationError extends ApiError {
  #issues: readonly StandardSchemaV1.Issue[];

  constructor(message: string, issues: readonly StandardSchemaV1.Issue[]) {
    super({ message, code: "VALIDATION_ERROR" }, 400);
    this.name = "ApiValidationError";
    this.#issues = issues;
  }

  get issues() {
    return this.#issues;
  }

  override toResponse() {
    return Response.json(
      { error: this.message, issues: this.#issues, code: this.code },
      { status: this.status },
    );
  }
}

/**
 * The request body could not be converted. This is the client's fault: the bytes do not fit the
 * declared content type.
 */
export class BodyReadError extends ApiError {
  constructor(message: string, options?: { cause?: unknown }) {
    super({ message, code: "BODY_PARSE_ERROR" }, 400);
    this.name = "BodyReadError";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * No registered converter can read or write the requested shape for a media type. This points at
 * missing wiring, not at bad input.
 */
export class NoConverterError extends Error {
  readonly direction: "read" | "write";
  readonly shape: BodyShape;
  readonly mediaType: string;

  constructor(direction: "read" | "write", shape: BodyShape, mediaType: string) {
    super(`No body converter can ${direction} '${shape}' as '${mediaType}'`);
    this.name = "NoConverterError";
    this.direction = direction;
    this.shape = shape;
    this.mediaType = mediaType;
  }
}

/**
 * A route path could not be compiled.
 */
export class MalformedPatternError extends Error {
  readonly pattern: string;

  constructor(pattern: string, reason: string, options?: { cause?: unknown }) {
    super(`Malformed path pattern '${pattern}': ${reason}`);
    this.name = "MalformedPatternError";
    this.pattern = pattern;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}
