import type { AnyRouteDefinition, RouteMethod } from "./api";
import type { RequestBody } from "./request-body";
import type { RequestOutputContext } from "./request-output-context";

/**
 * Runs after a route has been resolved and before content negotiation. Returning a `Response`
 * short-circuits the request; returning `undefined` lets it continue to the handler.
 */
export type DispatchMiddleware = (
  inputContext: RequestMiddlewareInputContext,
  outputContext: RequestOutputContext,
) => Promise<Response | undefined> | Response | undefined;

export interface RequestMiddlewareOptions {
  request: Request;
  route: AnyRouteDefinition;
  pathParams: Record<string, string>;
  remainder?: string;
  body: RequestBody;
}

export class RequestMiddlewareInputContext {
  readonly #options: RequestMiddlewareOptions;
  readonly #searchParams: URLSearchParams;

  constructor(options: RequestMiddlewareOptions) {
    this.#options = options;
    this.#searchParams = new URL(options.request.url).searchParams;
  }

  get request(): Request {
    return this.#options.request;
  }

  get route(): AnyRouteDefinition {
    return this.#options.route;
  }

  /** The matched route's path pattern. */
  get path(): string {
    return this.#options.route.path;
  }

  get method(): string {
    return this.#options.request.method;
  }

  get pathParams(): Record<string, string> {
    return this.#options.pathParams;
  }

  get remainder(): string | undefined {
    return this.#options.remainder;
  }

  get queryParams(): URLSearchParams {
    return this.#searchParams;
  }

  get headers(): Headers {
    return this.#options.request.headers;
  }

  /** Shared with the handler; reading it here does not consume it for the handler. */
  get body(): RequestBody {
    return this.#options.body;
  }

  // Defined as a field so that `this` reference stays in tact when destructuring
  ifMatchesRoute = async (
    method: RouteMethod,
    path: string,
    handler: (
      inputContext: RequestMiddlewareInputContext,
    ) => Promise<Response | undefined> | Response | undefined,
  ): Promise<Response | undefined> => {
    const route = this.#options.route;
    if (route.path !== path || route.method !== method) {
      return undefined;
    }

    return handler(this);
  };
}
