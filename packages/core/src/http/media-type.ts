/**
 * A media type as it appears in `Content-Type` and `Accept` headers.
 *
 * Instances are immutable. Names are normalised to lowercase, parameter names are lowercased and
 * parameter values keep their case.
 *
 * @example
 * ```ts
 * const type = MediaType.parse("application/json; charset=utf-8");
 * console.assert(type.type === "application");
 * console.assert(type.subtype === "json");
 * console.assert(type.essence === "application/json");
 * console.assert(type.charset === "utf-8");
 * ```
 */
export class MediaType {
  readonly #type: string;
  readonly #subtype: string;
  readonly #parameters: Readonly<Record<string, string>>;

  private constructor(type: string, subtype: string, parameters: Record<string, string>) {
    this.#type = type;
    this.#subtype = subtype;
    this.#parameters = Object.freeze({ ...parameters });
  }

  /**
   * Declare a media type programmatically.
   *
   * @throws {InvalidMediaTypeError} when a wildcard primary type is combined with a concrete
   * subtype, or when either name is empty.
   */
  static of(type: string, subtype: string, parameters: Record<string, string> = {}): MediaType {
    const normalizedType = type.trim().toLowerCase();
    const normalizedSubtype = subtype.trim().toLowerCase();

    if (!normalizedType || !normalizedSubtype) {
      throw new InvalidMediaTypeError(`${type}/${subtype}`);
    }

    if (normalizedType === "*" && normalizedSubtype !== "*") {
      throw new InvalidMediaTypeError(`${type}/${subtype}`);
    }

    const normalizedParameters: Record<string, string> = {};
    for (const [key, value] of Object.entries(parameters)) {
      normalizedParameters[key.trim().toLowerCase()] = value;
    }

    return new MediaType(normalizedType, normalizedSubtype, normalizedParameters);
  }

  /**
   * Parses a single media type, e.g. the value of a `Content-Type` header.
   *
   * @throws {InvalidMediaTypeError} when the value is not a media type.
   */
  static parse(value: string): MediaType {
    const parsed = MediaType.tryParse(value);
    if (!parsed) {
      throw new InvalidMediaTypeError(value);
    }
    return parsed;
  }

  /**
   * Like {@link MediaType.parse} but returns null for invalid input.
   */
  static tryParse(value: string | null | undefined): MediaType | null {
    if (!value || typeof value !== "string") {
      return null;
    }

    const trimmed = value.trim();
    if (!trimmed) {
      return null;
    }

    const parts = splitOutsideQuotes(trimmed, ";").map((part) => part.trim());
    const essence = parts[0];

    if (!essence) {
      return null;
    }

    const typeParts = essence.split("/");
    if (typeParts.length !== 2) {
      return null;
    }

    const [type, subtype] = typeParts.map((part) => part.trim().toLowerCase());

    if (!type || !subtype || (type === "*" && subtype !== "*")) {
      return null;
    }

    const parameters: Record<string, string> = {};

    for (let i = 1; i < parts.length; i++) {
      const param = parts[i];
      const equalIndex = param.indexOf("=");

      if (equalIndex > 0) {
        const key = param.slice(0, equalIndex).trim().toLowerCase();
        let paramValue = param.slice(equalIndex + 1).trim();

        if (paramValue.length >= 2 && paramValue.startsWith('"') && paramValue.endsWith('"')) {
          paramValue = paramValue.slice(1, -1).replace(/\\(.)/g, "$1");
        }

        if (key) {
          parameters[key] = paramValue;
        }
      }
    }

    return new MediaType(type, subtype, parameters);
  }

  /**
   * Parses a comma separated list such as an `Accept` header. Invalid entries are skipped and the
   * header order is preserved.
   */
  static parseList(header: string | null | undefined): MediaType[] {
    if (!header) {
      return [];
    }

    const types: MediaType[] = [];
    for (const entry of splitOutsideQuotes(header, ",")) {
      const parsed = MediaType.tryParse(entry);
      if (parsed) {
        types.push(parsed);
      }
    }
    return types;
  }

  get type(): string {
    return this.#type;
  }

  get subtype(): string {
    return this.#subtype;
  }

  /** The type without parameters, e.g. "application/json". */
  get essence(): string {
    return `${this.#type}/${this.#subtype}`;
  }

  get parameters(): Readonly<Record<string, string>> {
    return this.#parameters;
  }

  get charset(): string | undefined {
    return this.#parameters["charset"];
  }

  /**
   * The `q` parameter in [0, 1]. Missing or unparsable values count as 1.
   */
  get quality(): number {
    const raw = this.#parameters["q"];
    if (raw === undefined) {
      return 1;
    }

    const quality = Number.parseFloat(raw);
    if (Number.isNaN(quality)) {
      return 1;
    }

    return Math.min(1, Math.max(0, quality));
  }

  /**
   * 2 for `type/subtype`, 1 for `type/*` (or a suffix wildcard such as `application/*+json`),
   * 0 for `*\/*`.
   */
  get specificity(): 0 | 1 | 2 {
    if (this.#type === "*") {
      return 0;
    }
    if (this.#subtype === "*" || this.#subtype.startsWith("*+")) {
      return 1;
    }
    return 2;
  }

  get isWildcard(): boolean {
    return this.specificity < 2;
  }

  /** The structured syntax suffix, e.g. "json" for "application/vnd.api+json". */
  get suffix(): string | undefined {
    const plus = this.#subtype.lastIndexOf("+");
    return plus >= 0 ? this.#subtype.slice(plus + 1) : undefined;
  }

  /**
   * Whether the bytes of this type are text. Used to decide on charsets.
   */
  get isTextual(): boolean {
    if (this.#type === "text") {
      return true;
    }

    if (this.#type !== "application") {
      return false;
    }

    const suffix = this.suffix;
    return (
      TEXTUAL_APPLICATION_SUBTYPES.has(this.#subtype) || suffix === "json" || suffix === "xml"
    );
  }

  /**
   * Two types match when their primary types are equal or either is `*`, and their subtypes are
   * equal or either is `*`. Parameters are ignored.
   */
  matches(other: MediaType): boolean {
    const typeMatches = this.#type === "*" || other.#type === "*" || this.#type === other.#type;
    if (!typeMatches) {
      return false;
    }

    return subtypeMatches(this.#subtype, other.#subtype);
  }

  /**
   * Exact equality of type, subtype and parameters.
   */
  equals(other: MediaType): boolean {
    if (this.essence !== other.essence) {
      return false;
    }

    const keys = Object.keys(this.#parameters);
    if (keys.length !== Object.keys(other.#parameters).length) {
      return false;
    }

    return keys.every((key) => this.#parameters[key] === other.#parameters[key]);
  }

  withParameters(parameters: Record<string, string>): MediaType {
    return MediaType.of(this.#type, this.#subtype, { ...this.#parameters, ...parameters });
  }

  withoutParameters(): MediaType {
    return new MediaType(this.#type, this.#subtype, {});
  }

  toString(): string {
    const params = Object.entries(this.#parameters).map(
      ([key, value]) => `; ${key}=${quoteIfNeeded(value)}`,
    );
    return `${this.essence}${params.join("")}`;
  }
}

export class InvalidMediaTypeError extends Error {
  constructor(value: string) {
    super(`Invalid media type: '${value}'`);
    this.name = "InvalidMediaTypeError";
  }
}

const TEXTUAL_APPLICATION_SUBTYPES = new Set([
  "json",
  "xml",
  "javascript",
  "x-www-form-urlencoded",
  "x-ndjson",
]);

function subtypeMatches(a: string, b: string): boolean {
  if (a === "*" || b === "*" || a === b) {
    return true;
  }

  if (a.startsWith("*+")) {
    return b.endsWith(a.slice(1));
  }

  if (b.startsWith("*+")) {
    return a.endsWith(b.slice(1));
  }

  return false;
}

function quoteIfNeeded(value: string): string {
  if (value !== "" && /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/.test(value)) {
    return value;
  }
  return `"${value.replace(/(["\\])/g, "\\$1")}"`;
}

function splitOutsideQuotes(value: string, separator: string): string[] {
  const parts: string[] = [];
  let current = "";
  let quoted = false;

  for (let i = 0; i < value.length; i++) {
    const char = value[i];

    if (char === "\\" && quoted && i + 1 < value.length) {
      current += char + value[i + 1];
      i += 1;
      continue;
    }

    if (char === '"') {
      quoted = !quoted;
    }

    if (char === separator && !quoted) {
      parts.push(current);
      current = "";
      continue;
    }

    current += char;
  }

  parts.push(current);
  return parts;
}

// ============================================================================
// Common types and aliases
// ============================================================================

export const MediaTypes = {
  all: MediaType.of("*", "*"),
  json: MediaType.of("application", "json"),
  anyJson: MediaType.of("application", "*+json"),
  html: MediaType.of("text", "html"),
  plain: MediaType.of("text", "plain"),
  anyText: MediaType.of("text", "*"),
  xml: MediaType.of("application", "xml"),
  css: MediaType.of("text", "css"),
  js: MediaType.of("application", "javascript"),
  octetStream: MediaType.of("application", "octet-stream"),
  form: MediaType.of("application", "x-www-form-urlencoded"),
  multipart: MediaType.of("multipart", "form-data"),
} as const;

const ALIASES: ReadonlyMap<string, MediaType> = new Map([
  ["all", MediaTypes.all],
  ["json", MediaTypes.json],
  ["html", MediaTypes.html],
  ["text", MediaTypes.plain],
  ["plain", MediaTypes.plain],
  ["xml", MediaTypes.xml],
  ["css", MediaTypes.css],
  ["js", MediaTypes.js],
  ["javascript", MediaTypes.js],
  ["octetstream", MediaTypes.octetStream],
  ["form", MediaTypes.form],
  ["multipart", MediaTypes.multipart],
]);

/**
 * Anything that can name a media type: an instance, a header value or a short alias such as
 * "json" or "html".
 */
export type MediaTypeLike = MediaType | string;

/**
 * Resolves an alias, header value or instance into a {@link MediaType}.
 *
 * @throws {InvalidMediaTypeError} for strings that are neither an alias nor a media type.
 */
export function resolveMediaType(value: MediaTypeLike): MediaType {
  if (value instanceof MediaType) {
    return value;
  }

  const alias = ALIASES.get(value.trim().toLowerCase());
  if (alias) {
    return alias;
  }

  return MediaType.parse(value);
}

export function resolveMediaTypes(values: readonly MediaTypeLike[] | undefined): MediaType[] {
  return (values ?? []).map(resolveMediaType);
}

/**
 * Orders candidates by specificity, then quality. The sort is stable so equal entries keep their
 * original order.
 */
export function sortByPreference(types: readonly MediaType[]): MediaType[] {
  return [...types].sort((a, b) => b.specificity - a.specificity || b.quality - a.quality);
}
