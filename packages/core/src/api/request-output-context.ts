import type { ContentlessStatusCode, StatusCode } from "../http/http-status";
import { resolveMediaType, type MediaType, type MediaTypeLike } from "../http/media-type";

interface ResponseInit<T extends StatusCode = StatusCode> {
  headers?: HeadersInit;
  status?: T;
  statusText?: string;
}

/**
 * Utility function to merge headers from multiple sources.
 * Later headers override earlier ones.
 */
export function mergeHeaders(...headerSources: (HeadersInit | undefined)[]): Headers {
  const mergedHeaders = new Headers();

  for (const headerSource of headerSources) {
    if (!headerSource) {
      continue;
    }

    for (const [key, value] of new Headers(headerSource).entries()) {
      mergedHeaders.set(key, value);
    }
  }

  return mergedHeaders;
}

/**
 * The response side of a handler.
 *
 * A handler either returns a `Response` built here (or anywhere else), or returns a plain value and
 * lets the dispatcher convert it. In the second case the status, headers and explicit content type
 * set on this context are applied to the converted response.
 */
export class RequestOutputContext {
  readonly #headers = new Headers();
  #status: StatusCode | undefined;
  #type: MediaType | undefined;

  /** Status for a converted result. Defaults to 200, or 204 when the handler returns nothing. */
  status(status: StatusCode): this {
    this.#status = status;
    return this;
  }

  header(name: string, value: string): this {
    this.#headers.set(name, value);
    return this;
  }

  /**
   * Labels a converted result with this media type instead of the negotiated one. Writer selection
   * uses it too.
   */
  type(mediaType: MediaTypeLike): this {
    this.#type = resolveMediaType(mediaType);
    return this;
  }

  get statusCode(): StatusCode | undefined {
    return this.#status;
  }

  get headers(): Headers {
    return this.#headers;
  }

  get mediaType(): MediaType | undefined {
    return this.#type;
  }

  /**
   * Creates an error response.
   *
   * Shortcut for `throw new ApiError(...)`
   */
  error = (
    { message, code }: { message: string; code: string },
    initOrStatus?: ResponseInit | StatusCode,
    headers?: HeadersInit,
  ): Response => {
    const { status, headers: initHeaders } = normalizeInit(initOrStatus, 500);
    return Response.json(
      { error: message, code },
      { status, headers: mergeHeaders(this.#headers, initHeaders, headers) },
    );
  };

  empty = (
    initOrStatus?: ResponseInit<ContentlessStatusCode> | ContentlessStatusCode,
    headers?: HeadersInit,
  ): Response => {
    const { status, headers: initHeaders } = normalizeInit(initOrStatus, 204);
    return new Response(null, {
      status,
      headers: mergeHeaders(this.#headers, initHeaders, headers),
    });
  };

  json = (
    object: unknown,
    initOrStatus?: ResponseInit | StatusCode,
    headers?: HeadersInit,
  ): Response => {
    const { status, headers: initHeaders } = normalizeInit(initOrStatus, this.#status ?? 200);
    return Response.json(object, {
      status,
      headers: mergeHeaders(this.#headers, initHeaders, headers),
    });
  };
}

function normalizeInit(
  initOrStatus: ResponseInit | StatusCode | undefined,
  defaultStatus: StatusCode,
): { status: StatusCode; headers?: HeadersInit } {
  if (typeof initOrStatus === "undefined") {
    return { status: defaultStatus };
  }

  if (typeof initOrStatus === "number") {
    return { status: initOrStatus };
  }

  return { status: initOrStatus.status ?? defaultStatus, headers: initOrStatus.headers };
}
