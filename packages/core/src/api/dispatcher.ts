import { z } from "zod";
import type { StatusCode } from "../http/http-status";
import { isContentlessStatus } from "../http/http-status";
import { MediaType, MediaTypes } from "../http/media-type";
import { isLogger, logWithLogger, type Logger } from "../util/logger";
import type { AnyRouteDefinition, HTTPMethod } from "./api";
import {
  BodyConverterRegistry,
  isBodyConverter,
  resolveContentType,
  shapeOf,
  type BodyConverter,
} from "./converter";
import { defaultConverters, lastResortConverters } from "./converters";
import { ApiError, NoConverterError } from "./error";
import { buildPath, type ExtractPathParamsOrWiden } from "./internal/path";
import { getMountRoute, stripMountRoute } from "./internal/route";
import { RouteRegistry } from "./internal/router";
import { negotiateConsumes, negotiateProduces } from "./negotiation";
import { RequestBody } from "./request-body";
import { RequestInputContext } from "./request-input-context";
import { RequestMiddlewareInputContext, type DispatchMiddleware } from "./request-middleware";
import { mergeHeaders, RequestOutputContext } from "./request-output-context";
import { isRouteDefinition } from "./route";

const RESPONSE_CHARSET = "utf-8";

function isSupportedCharset(label: string): boolean {
  try {
    new TextDecoder(label);
    return true;
  } catch (error) {
    if (error instanceof RangeError) {
      return false;
    }
    throw error;
  }
}

export const dispatcherConfigSchema = z.object({
  /** Path prefix the routes live under, e.g. "/api". */
  mountRoute: z.string().transform(getMountRoute).default(""),
  /** Charset for decoding request bodies whose content type declares none. */
  charset: z
    .string()
    .refine(isSupportedCharset, { message: "Unsupported charset" })
    .default(RESPONSE_CHARSET),
  /** Include error messages of unexpected failures in 500 responses. */
  exposeErrors: z.boolean().default(false),
  routes: z
    .array(
      z.custom<AnyRouteDefinition>(isRouteDefinition, {
        message: "Expected a route created with defineRoute",
      }),
    )
    .default([]),
  /** Consulted before the built-in converters, in order. */
  converters: z
    .array(
      z.custom<BodyConverter>(isBodyConverter, {
        message: "Expected a converter created with defineConverter",
      }),
    )
    .default([]),
  logger: z.custom<Logger>(isLogger, { message: "Expected a logger" }).optional(),
});

export type DispatcherConfig = z.input<typeof dispatcherConfigSchema>;
type ResolvedDispatcherConfig = z.output<typeof dispatcherConfigSchema>;

export interface CallRouteOptions<TPath extends string> {
  /** Fills the path's parameters; without it the path is used as is. */
  pathParams?: ExtractPathParamsOrWiden<TPath>;
  query?: URLSearchParams | Record<string, string>;
  headers?: HeadersInit;
  /**
   * Strings, byte arrays and `URLSearchParams` are sent as they are. Anything else is sent as JSON.
   */
  body?: unknown;
}

interface DispatcherState {
  config: ResolvedDispatcherConfig;
  registry: RouteRegistry<AnyRouteDefinition>;
  converters: BodyConverterRegistry;
  logger: Logger;
}

/**
 * Turns `Request`s into `Response`s: resolves the route, negotiates media types in both
 * directions, runs the handler with lazily converted input and converts its result.
 *
 * A dispatcher never throws from {@link Dispatcher.handler}; every failure becomes a response.
 * Its registries are built once and only read afterwards, so one dispatcher serves concurrent
 * requests.
 */
export class Dispatcher {
  readonly #state: DispatcherState;
  readonly #middleware: DispatchMiddleware | undefined;

  constructor(state: DispatcherState, middleware?: DispatchMiddleware) {
    this.#state = state;
    this.#middleware = middleware;
  }

  get mountRoute(): string {
    return this.#state.config.mountRoute;
  }

  get routes(): readonly AnyRouteDefinition[] {
    return this.#state.registry.routes;
  }

  get converters(): readonly BodyConverter[] {
    return this.#state.converters.converters;
  }

  /**
   * A dispatcher that runs `middleware` after route resolution. Only one middleware is supported.
   */
  withMiddleware(middleware: DispatchMiddleware): Dispatcher {
    if (this.#middleware) {
      throw new Error("Middleware already set");
    }

    return new Dispatcher(this.#state, middleware);
  }

  // Defined as a field so it can be passed around without binding
  handler = async (request: Request): Promise<Response> => {
    try {
      return await this.#dispatch(request);
    } catch (error) {
      return this.#errorResponse(error, request, "dispatch");
    }
  };

  /**
   * Dispatches a synthetic request. Useful for tests and for server-side calls.
   *
   * @example
   * const response = await dispatcher.callRoute("GET", "/users/:id", { pathParams: { id: "1" } });
   */
  callRoute<TPath extends string>(
    method: HTTPMethod,
    path: TPath,
    options: CallRouteOptions<TPath> = {},
  ): Promise<Response> {
    const { pathParams, query, headers, body } = options;

    const concretePath = pathParams ? buildPath(path, pathParams) : path;
    const url = new URL(`${this.mountRoute}${concretePath}`, "http://localhost");
    for (const [key, value] of new URLSearchParams(query)) {
      url.searchParams.append(key, value);
    }

    const requestHeaders = new Headers(headers);
    let requestBody: BodyInit | undefined;

    if (typeof body === "string" || body instanceof URLSearchParams) {
      requestBody = body;
    } else if (body instanceof Uint8Array) {
      requestBody = new Uint8Array(body);
    } else if (body !== undefined) {
      requestBody = JSON.stringify(body);
      if (!requestHeaders.has("content-type")) {
        requestHeaders.set("content-type", "application/json");
      }
    }

    return this.handler(new Request(url, { method, headers: requestHeaders, body: requestBody }));
  }

  async #dispatch(request: Request): Promise<Response> {
    const { config, registry, converters } = this.#state;
    const url = new URL(request.url);
    const path = stripMountRoute(url.pathname, config.mountRoute);

    if (path === null) {
      return Response.json(
        {
          error: `Route '${url.pathname}' not found. Expecting mount route '${config.mountRoute}'.`,
          code: "ROUTE_NOT_FOUND",
        },
        { status: 404 },
      );
    }

    const resolution = registry.resolve(request.method, path);

    if (resolution.type === "not-found") {
      return Response.json(
        { error: `Route ${request.method} ${path} not found`, code: "ROUTE_NOT_FOUND" },
        { status: 404 },
      );
    }

    if (resolution.type === "method-not-allowed") {
      return Response.json(
        {
          error: `Method ${request.method} not allowed for ${path}`,
          code: "METHOD_NOT_ALLOWED",
        },
        { status: 405, headers: { Allow: resolution.allowed.join(", ") } },
      );
    }

    const { route, params, remainder } = resolution;
    const contentTypeHeader = request.headers.get("content-type");
    const output = new RequestOutputContext();
    const body = new RequestBody({
      request,
      registry: converters,
      mediaType: MediaType.tryParse(contentTypeHeader) ?? MediaTypes.octetStream,
      defaultCharset: config.charset,
    });

    if (this.#middleware) {
      const middlewareResult = await this.#runMiddleware(
        new RequestMiddlewareInputContext({ request, route, pathParams: params, remainder, body }),
        output,
      );
      if (middlewareResult !== undefined) {
        return middlewareResult;
      }
    }

    if (body.present) {
      const consumes = negotiateConsumes(contentTypeHeader, route.consumes);
      if (consumes.type === "unsupported") {
        return Response.json(
          {
            error: `Content type '${contentTypeHeader ?? MediaTypes.octetStream.essence}' is not supported`,
            code: "UNSUPPORTED_MEDIA_TYPE",
          },
          { status: 415 },
        );
      }
    }

    const produces = negotiateProduces(request.headers.get("accept"), route.produces);
    if (produces.type === "not-acceptable") {
      return Response.json(
        {
          error: `None of ${route.produces.map((type) => type.essence).join(", ")} is acceptable`,
          code: "NOT_ACCEPTABLE",
        },
        { status: 406 },
      );
    }

    const input = new RequestInputContext({
      request,
      path: route.path,
      pathParams: params,
      remainder,
      body,
      negotiatedType: produces.mediaType,
      inputSchema: route.inputSchema,
    });

    let result: unknown;
    try {
      result = await route.handler(input, output);
    } catch (error) {
      return this.#errorResponse(error, request, "handler");
    }

    try {
      return await this.#writeResult(result, output, produces.mediaType, request);
    } catch (error) {
      return this.#errorResponse(error, request, "write");
    }
  }

  async #runMiddleware(
    input: RequestMiddlewareInputContext,
    output: RequestOutputContext,
  ): Promise<Response | undefined> {
    const middleware = this.#middleware;
    if (!middleware) {
      return undefined;
    }

    try {
      return await middleware(input, output);
    } catch (error) {
      return this.#errorResponse(error, input.request, "middleware");
    }
  }

  async #writeResult(
    result: unknown,
    output: RequestOutputContext,
    negotiated: MediaType,
    request: Request,
  ): Promise<Response> {
    if (result instanceof Response) {
      return result;
    }

    const status: StatusCode = output.statusCode ?? (result === undefined ? 204 : 200);
    const headers = mergeHeaders(output.headers);

    if (result === undefined || isContentlessStatus(status)) {
      return new Response(null, { status, headers });
    }

    const target = output.mediaType ?? negotiated;
    const shape = shapeOf(result);
    const writer = this.#state.converters.selectWriter(shape, target, result);
    if (!writer) {
      throw new NoConverterError("write", shape, target.toString());
    }

    const contentType = resolveContentType(writer, target, shape, RESPONSE_CHARSET);
    const body = await writer.write(result, {
      mediaType: contentType,
      charset: RESPONSE_CHARSET,
      onError: (error) => {
        logWithLogger(this.#state.logger, "error", {
          event: "dispatch.body.stream_failed",
          method: request.method,
          url: request.url,
          converter: writer.name,
          error: error instanceof Error ? error.message : String(error),
        });
      },
    });

    if (!headers.has("content-type")) {
      headers.set("content-type", contentType.toString());
    }

    return new Response(body, { status, headers });
  }

  #errorResponse(
    error: unknown,
    request: Request,
    stage: "dispatch" | "middleware" | "handler" | "write",
  ): Response {
    const { logger, config } = this.#state;
    const payload = {
      event: `dispatch.${stage}.failed`,
      method: request.method,
      url: request.url,
      error: error instanceof Error ? error.message : String(error),
    };

    if (error instanceof ApiError) {
      logWithLogger(logger, error.status >= 500 ? "error" : "debug", {
        ...payload,
        code: error.code,
      });
      return error.toResponse();
    }

    logWithLogger(logger, "error", {
      ...payload,
      stack: error instanceof Error ? error.stack : undefined,
    });

    if (error instanceof NoConverterError) {
      return Response.json(
        {
          error: config.exposeErrors ? error.message : "No body converter available",
          code: "NO_CONVERTER",
        },
        { status: 500 },
      );
    }

    return Response.json(
      {
        error:
          config.exposeErrors && error instanceof Error ? error.message : "Internal server error",
        code: "INTERNAL_SERVER_ERROR",
      },
      { status: 500 },
    );
  }
}

/**
 * Validates the configuration and builds a dispatcher around fresh registries.
 *
 * @throws {z.ZodError} when the configuration is invalid.
 *
 * @example
 * const dispatcher = createDispatcher({
 *   mountRoute: "/api",
 *   routes: [getUser, createUser, defineAssetRoute({ path: "/assets/**", source })],
 * });
 * const response = await dispatcher.handler(request);
 */
export function createDispatcher(config: DispatcherConfig = {}): Dispatcher {
  const resolved = dispatcherConfigSchema.parse(config);

  return new Dispatcher({
    config: resolved,
    registry: new RouteRegistry(resolved.routes),
    converters: new BodyConverterRegistry(resolved.converters, {
      fallbacks: defaultConverters,
      lastResort: lastResortConverters,
    }),
    logger: resolved.logger ?? console,
  });
}
