import type { StandardSchemaV1 } from "@standard-schema/spec";
import type { MediaType, MediaTypeLike } from "../http/media-type";
import type { PathPattern } from "./internal/path";
import type { RequestInputContext } from "./request-input-context";
import type { RequestOutputContext } from "./request-output-context";
import { routeDefinitionSymbol } from "../internal/symbols";

export type HTTPMethod = "GET" | "POST" | "PUT" | "DELETE" | "PATCH" | "HEAD" | "OPTIONS";

/**
 * A route's verb. `"*"` matches every verb, which is how filters and catch-all routes are declared.
 */
export type RouteMethod = HTTPMethod | "*";

/**
 * What a route declares when it is defined.
 */
export interface RouteConfig<
  TMethod extends RouteMethod,
  TPath extends string,
  TInputSchema extends StandardSchemaV1 | undefined,
> {
  method: TMethod;
  path: TPath;
  /** Media types the handler can produce. Empty means no negotiation. */
  produces?: readonly MediaTypeLike[];
  /** Media types the handler accepts as request body. Empty means any. */
  consumes?: readonly MediaTypeLike[];
  inputSchema?: TInputSchema;
  errorCodes?: readonly string[];
  /**
   * Either return a `Response` (written as-is), or any other value to have it converted into the
   * negotiated media type. Returning `undefined` answers with an empty body.
   */
  handler(
    inputCtx: RequestInputContext<TPath, TInputSchema>,
    outputCtx: RequestOutputContext,
  ): unknown;
}

/**
 * An immutable, registered route: the declaration plus its compiled path pattern and resolved
 * media types.
 */
export interface RouteDefinition<
  TMethod extends RouteMethod = RouteMethod,
  TPath extends string = string,
  TInputSchema extends StandardSchemaV1 | undefined = StandardSchemaV1 | undefined,
> {
  readonly [routeDefinitionSymbol]: true;
  readonly method: TMethod;
  readonly path: TPath;
  readonly pattern: PathPattern;
  readonly produces: readonly MediaType[];
  readonly consumes: readonly MediaType[];
  readonly inputSchema?: TInputSchema;
  readonly errorCodes: readonly string[];
  handler(
    inputCtx: RequestInputContext<TPath, TInputSchema>,
    outputCtx: RequestOutputContext,
  ): unknown;
}

export type AnyRouteDefinition = RouteDefinition<RouteMethod, string, StandardSchemaV1 | undefined>;

