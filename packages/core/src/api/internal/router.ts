import { matchPath, type PathPattern } from "./path";

/**
 * The part of a route the registry needs. Anything else a route carries is opaque here.
 */
export interface RoutableEntry {
  readonly method: string;
  readonly pattern: PathPattern;
}

export type RouteResolution<TRoute extends RoutableEntry> =
  | {
      type: "match";
      route: TRoute;
      params: Record<string, string>;
      remainder?: string;
    }
  | { type: "not-found" }
  | {
      type: "method-not-allowed";
      /** Verbs of the routes whose pattern matched, in registration order. */
      allowed: string[];
    };

/**
 * An ordered collection of routes.
 *
 * Registration order is the only precedence rule: {@link RouteRegistry.resolve} returns the first
 * route whose pattern and verb match, even when a later route is more specific. Register
 * `/users/me` before `/users/:id` if both should be reachable.
 *
 * The registry is append-only; once the application starts serving it is only read, so one
 * instance can be shared by concurrent requests.
 *
 * @example
 * const registry = new RouteRegistry([getUser, updateUser]);
 * const resolution = registry.resolve("GET", "/users/1");
 * if (resolution.type === "match") {
 *   console.log(resolution.route.path, resolution.params);
 * }
 */
export class RouteRegistry<TRoute extends RoutableEntry> {
  readonly #routes: TRoute[] = [];
  #snapshot: readonly TRoute[] | undefined;

  constructor(routes: Iterable<TRoute> = []) {
    for (const route of routes) {
      this.add(route);
    }
  }

  /**
   * Appends a route. Routes are never re-ordered.
   */
  add(route: TRoute): this {
    this.#routes.push(route);
    this.#snapshot = undefined;
    return this;
  }

  /** Frozen copy of the routes, in registration order. */
  get routes(): readonly TRoute[] {
    this.#snapshot ??= Object.freeze([...this.#routes]);
    return this.#snapshot;
  }

  get size(): number {
    return this.#routes.length;
  }

  /**
   * Finds the route for a request.
   *
   * - `match`: the first route (by registration order) matching both path and verb
   * - `method-not-allowed`: the path matched, but only under other verbs
   * - `not-found`: no pattern matched the path
   */
  resolve(method: string, path: string): RouteResolution<TRoute> {
    const verb = method.toUpperCase();
    const allowed: string[] = [];

    for (const route of this.#routes) {
      const match = matchPath(route.pattern, path);
      if (!match) {
        continue;
      }

      const routeVerb = route.method.toUpperCase();
      if (routeVerb === "*" || routeVerb === verb) {
        return { type: "match", route, params: match.params, remainder: match.remainder };
      }

      if (!allowed.includes(routeVerb)) {
        allowed.push(routeVerb);
      }
    }

    if (allowed.length > 0) {
      return { type: "method-not-allowed", allowed };
    }

    return { type: "not-found" };
  }

  /**
   * Every route whose pattern matches the path, regardless of verb.
   */
  routesFor(path: string): TRoute[] {
    return this.#routes.filter((route) => matchPath(route.pattern, path) !== null);
  }
}
