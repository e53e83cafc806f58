import { MalformedPatternError } from "../error";

/**
 * Type helper to extract path parameters from a const string path
 *
 * Supports:
 * - Regular paths: "/path" -> never
 * - Named parameters: "/path/:name" or "/path/{name}" -> "name"
 * - Constrained parameters: "/path/{id:\\d+}" -> "id"
 * - Wildcard paths: "/path/foo/**" or "/path/foo/**?" -> "**"
 * - Named wildcard paths: "/path/foo/**:name" or "/path/foo/**?:name" -> "name"
 */

// Helper type to split a string by '/'
type SplitPath<T extends string> = T extends `${infer First}/${infer Rest}`
  ? First extends ""
    ? SplitPath<Rest>
    : [First, ...SplitPath<Rest>]
  : T extends ""
    ? []
    : [T];

// Helper type to extract parameter name from a single segment
type ExtractParam<T extends string> = T extends `:${infer Name}`
  ? Name
  : T extends `**?:${infer Name}`
    ? Name
    : T extends `**:${infer Name}`
      ? Name
      : T extends "**" | "**?"
        ? "**"
        : T extends `{${infer Inner}}`
          ? Inner extends `${infer Name}:${string}`
            ? Name
            : Inner
          : never;

// Helper type to extract all parameter names from path segments
type ExtractParamsFromSegments<T extends readonly string[]> = T extends readonly [
  infer First,
  ...infer Rest,
]
  ? First extends string
    ? Rest extends readonly string[]
      ? ExtractParam<First> | ExtractParamsFromSegments<Rest>
      : ExtractParam<First>
    : never
  : never;

// Main type to extract path parameters from a path string
export type ExtractPathParams<T extends string, ValueType = string> =
  ExtractParamsFromSegments<SplitPath<T>> extends never
    ? Record<string, never>
    : Record<ExtractParamsFromSegments<SplitPath<T>>, ValueType>;

export type ExtractPathParamsOrWiden<T extends string, ValueType = string> = string extends T
  ? Record<string, ValueType>
  : ExtractPathParams<T, ValueType>;

// Alternative version that returns the parameter names as a union type
export type ExtractPathParamNames<T extends string> = ExtractParamsFromSegments<SplitPath<T>>;

// Type to check if a path has parameters
export type HasPathParams<T extends string> = ExtractPathParamNames<T> extends never ? false : true;

// Runtime utilities

export type PathSegment =
  | { kind: "literal"; value: string }
  | { kind: "variable"; name: string; constraint?: RegExp }
  | { kind: "glob"; source: string; matcher: RegExp }
  | { kind: "wildcard"; name: string; optional: boolean };

/**
 * A compiled route path. Compile once with {@link compilePathPattern} and match many times with
 * {@link matchPath}.
 */
export interface PathPattern {
  readonly path: string;
  readonly segments: readonly PathSegment[];
  readonly paramNames: readonly string[];
}

export interface PathMatch {
  params: Record<string, string>;
  /** The part of the path consumed by a trailing wildcard, if the pattern has one. */
  remainder?: string;
}

/**
 * Compile a route path into a {@link PathPattern}.
 *
 * Segment syntax:
 * - `users`: literal, case-sensitive
 * - `:id`, `{id}`: named variable spanning one segment
 * - `{id:\d+}`: named variable that must fully match the regular expression
 * - `*.js`, `v?`: glob, `*` matches any run of characters and `?` exactly one
 * - `**`, `**:rest`: trailing wildcard, one or more remaining segments
 * - `**?`, `**?:rest`: trailing wildcard, zero or more remaining segments
 *
 * @throws {MalformedPatternError} on duplicate or empty variable names, invalid regular
 * expressions, unbalanced braces, variables that share a segment with other text, or a trailing
 * wildcard that is not the last segment.
 */
export function compilePathPattern(path: string): PathPattern {
  const rawSegments = splitPatternSegments(path);
  const segments: PathSegment[] = [];
  const names = new Set<string>();

  rawSegments.forEach((raw, index) => {
    const segment = compileSegment(path, raw);

    if (segment.kind === "wildcard" && index !== rawSegments.length - 1) {
      throw new MalformedPatternError(path, `wildcard '${raw}' must be the last segment`);
    }

    if (segment.kind === "variable" || segment.kind === "wildcard") {
      if (names.has(segment.name)) {
        throw new MalformedPatternError(path, `duplicate variable '${segment.name}'`);
      }
      names.add(segment.name);
    }

    segments.push(segment);
  });

  return Object.freeze({
    path,
    segments: Object.freeze(segments),
    paramNames: Object.freeze([...names]),
  });
}

/**
 * Match an actual path against a compiled pattern.
 *
 * Empty segments are ignored on both sides, so "/users/1/" matches "/users/:id". Captured values
 * are percent-decoded.
 *
 * @returns the captured parameters, or null when the path does not match.
 */
export function matchPath(pattern: PathPattern, actualPath: string): PathMatch | null {
  const actualSegments = splitPath(actualPath);
  const params: Record<string, string> = {};

  for (let i = 0; i < pattern.segments.length; i++) {
    const segment = pattern.segments[i];

    if (segment.kind === "wildcard") {
      const rest = actualSegments.slice(i);
      if (rest.length === 0 && !segment.optional) {
        return null;
      }

      const remainder = decodeSegment(rest.join("/"));
      params[segment.name] = remainder;
      return { params, remainder };
    }

    const actualSegment = actualSegments[i];
    if (actualSegment === undefined) {
      return null;
    }

    const value = decodeSegment(actualSegment);

    switch (segment.kind) {
      case "literal":
        if (segment.value !== value) {
          return null;
        }
        break;
      case "glob":
        if (!segment.matcher.test(value)) {
          return null;
        }
        break;
      case "variable":
        if (segment.constraint && !segment.constraint.test(value)) {
          return null;
        }
        params[segment.name] = value;
        break;
    }
  }

  if (actualSegments.length !== pattern.segments.length) {
    return null;
  }

  return { params };
}

/**
 * Extract parameter names from a path pattern at runtime.
 * Examples:
 * - "/users/:id" => ["id"]
 * - "/users/{id:\\d+}" => ["id"]
 * - "/files/**" => ["**"]
 * - "/files/**:rest" => ["rest"]
 */
export function extractPathParams<TPath extends string>(
  pathPattern: TPath,
): ExtractPathParamNames<TPath>[] {
  const names = [...compilePathPattern(pathPattern).paramNames];
  return names as ExtractPathParamNames<TPath>[];
}

/**
 * Build a concrete path by replacing placeholders in a path pattern with values.
 *
 * - Named variables are URL-encoded as a single segment and must satisfy their constraint
 * - Wildcards insert the remainder as-is (slashes preserved); an optional wildcard may be omitted
 *
 * Examples:
 * - buildPath("/users/:id", { id: "123" }) => "/users/123"
 * - buildPath("/files/**", { "**": "a/b" }) => "/files/a/b"
 * - buildPath("/files/**:rest", { rest: "a/b" }) => "/files/a/b"
 */
export function buildPath<TPath extends string>(
  pathPattern: TPath,
  params: ExtractPathParamsOrWiden<TPath>,
): string {
  const values = params as Record<string, string | undefined>;
  const built: string[] = [];

  for (const segment of compilePathPattern(pathPattern).segments) {
    switch (segment.kind) {
      case "literal":
        built.push(segment.value);
        break;
      case "glob":
        throw new Error(`Cannot build a path for glob segment '${segment.source}'`);
      case "variable": {
        const value = values[segment.name];
        if (value === undefined) {
          throw new Error(`Missing value for path parameter ${segment.name}`);
        }
        if (segment.constraint && !segment.constraint.test(value)) {
          throw new Error(`Value '${value}' does not satisfy the constraint of ${segment.name}`);
        }
        built.push(encodeURIComponent(value));
        break;
      }
      case "wildcard": {
        const value = values[segment.name];
        if (value === undefined || value === "") {
          if (!segment.optional) {
            throw new Error(`Missing value for path wildcard ${segment.name}`);
          }
          break;
        }
        built.push(value);
        break;
      }
    }
  }

  return `/${built.join("/")}`;
}

function splitPath(path: string): string[] {
  return path.split("/").filter((segment) => segment.length > 0);
}

function decodeSegment(value: string): string {
  if (!value.includes("%")) {
    return value;
  }

  try {
    return decodeURIComponent(value);
  } catch (error) {
    if (error instanceof URIError) {
      return value;
    }
    throw error;
  }
}

// Splits on "/" outside of braces.
function splitPatternSegments(path: string): string[] {
  const segments: string[] = [];
  let current = "";
  let depth = 0;

  for (let i = 0; i < path.length; i++) {
    const char = path[i];

    if (char === "\\" && depth > 0 && i + 1 < path.length) {
      current += char + path[i + 1];
      i += 1;
      continue;
    }

    if (char === "{") {
      depth += 1;
    } else if (char === "}") {
      depth -= 1;
      if (depth < 0) {
        throw new MalformedPatternError(path, "unbalanced braces");
      }
    } else if (char === "/" && depth === 0) {
      if (current.length > 0) {
        segments.push(current);
      }
      current = "";
      continue;
    }

    current += char;
  }

  if (depth !== 0) {
    throw new MalformedPatternError(path, "unbalanced braces");
  }

  if (current.length > 0) {
    segments.push(current);
  }

  return segments;
}

function compileSegment(path: string, raw: string): PathSegment {
  const wildcard = /^\*\*(\?)?(?::(.*))?$/.exec(raw);
  if (wildcard) {
    const [, optional, name] = wildcard;
    if (name === "") {
      throw new MalformedPatternError(path, `wildcard '${raw}' has an empty name`);
    }
    return { kind: "wildcard", name: name ?? "**", optional: optional === "?" };
  }

  if (raw.startsWith(":")) {
    const name = raw.slice(1);
    if (!name || /[{}:*?]/.test(name)) {
      throw new MalformedPatternError(path, `invalid variable name in '${raw}'`);
    }
    return { kind: "variable", name };
  }

  if (raw.includes("{") || raw.includes("}")) {
    return compileBraceVariable(path, raw);
  }

  if (raw.includes("*") || raw.includes("?")) {
    return { kind: "glob", source: raw, matcher: globToRegExp(raw) };
  }

  return { kind: "literal", value: raw };
}

function compileBraceVariable(path: string, raw: string): PathSegment {
  if (!raw.startsWith("{") || !raw.endsWith("}") || closingBraceIndex(raw) !== raw.length - 1) {
    throw new MalformedPatternError(path, `variable '${raw}' must span a whole segment`);
  }

  const inner = raw.slice(1, -1);
  const colon = inner.indexOf(":");
  const name = (colon >= 0 ? inner.slice(0, colon) : inner).trim();

  if (!name || /[{}*?]/.test(name)) {
    throw new MalformedPatternError(path, `invalid variable name in '${raw}'`);
  }

  if (colon < 0) {
    return { kind: "variable", name };
  }

  const source = inner.slice(colon + 1);
  if (!source) {
    throw new MalformedPatternError(path, `variable '${name}' has an empty constraint`);
  }

  try {
    return { kind: "variable", name, constraint: new RegExp(`^(?:${source})$`) };
  } catch (error) {
    throw new MalformedPatternError(path, `invalid constraint for '${name}': ${source}`, {
      cause: error,
    });
  }
}

// Index of the brace closing the one at position 0.
function closingBraceIndex(raw: string): number {
  let depth = 0;
  for (let i = 0; i < raw.length; i++) {
    const char = raw[i];
    if (char === "\\") {
      i += 1;
      continue;
    }
    if (char === "{") {
      depth += 1;
    } else if (char === "}") {
      depth -= 1;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

function globToRegExp(glob: string): RegExp {
  let source = "";
  for (const char of glob) {
    if (char === "*") {
      source += "[^/]*";
    } else if (char === "?") {
      source += "[^/]";
    } else {
      source += char.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    }
  }
  return new RegExp(`^${source}$`);
}
