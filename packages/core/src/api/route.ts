import type { StandardSchemaV1 } from "@standard-schema/spec";
import { resolveMediaTypes } from "../http/media-type";
import { routeDefinitionSymbol } from "../internal/symbols";
import type { AnyRouteDefinition, RouteConfig, RouteDefinition, RouteMethod } from "./api";
import { compilePathPattern } from "./internal/path";

// Overload for routes without inputSchema
export function defineRoute<
  const TMethod extends RouteMethod,
  const TPath extends string,
>(
  config: RouteConfig<TMethod, TPath, undefined> & { inputSchema?: undefined },
): RouteDefinition<TMethod, TPath, undefined>;

// Overload for routes with inputSchema
export function defineRoute<
  const TMethod extends RouteMethod,
  const TPath extends string,
  const TInputSchema extends StandardSchemaV1,
>(
  config: RouteConfig<TMethod, TPath, TInputSchema> & { inputSchema: TInputSchema },
): RouteDefinition<TMethod, TPath, TInputSchema>;

/**
 * Turns a route declaration into an immutable {@link RouteDefinition}.
 *
 * The path is compiled here, so a malformed pattern fails while the application is being wired
 * rather than on the first request that reaches it.
 *
 * @throws {MalformedPatternError} when the path cannot be compiled.
 * @throws {InvalidMediaTypeError} when a declared media type cannot be parsed.
 */
export function defineRoute<
  const TMethod extends RouteMethod,
  const TPath extends string,
  const TInputSchema extends StandardSchemaV1 | undefined,
>(config: RouteConfig<TMethod, TPath, TInputSchema>): RouteDefinition<TMethod, TPath, TInputSchema> {
  const { method, path, inputSchema, handler } = config;

  return Object.freeze({
    [routeDefinitionSymbol]: true as const,
    method,
    path,
    pattern: compilePathPattern(path),
    produces: Object.freeze(resolveMediaTypes(config.produces)),
    consumes: Object.freeze(resolveMediaTypes(config.consumes)),
    inputSchema,
    errorCodes: Object.freeze([...(config.errorCodes ?? [])]),
    handler,
  });
}

/**
 * Groups route definitions, keeping their order. Order is precedence: register specific patterns
 * before general ones.
 */
export function defineRoutes<const TRoutes extends readonly AnyRouteDefinition[]>(
  ...routes: TRoutes
): TRoutes {
  return routes;
}

export function isRouteDefinition(value: unknown): value is AnyRouteDefinition {
  return typeof value === "object" && value !== null && routeDefinitionSymbol in value;
}
