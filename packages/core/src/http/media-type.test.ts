import { describe, expect, it } from "vitest";
import {
  InvalidMediaTypeError,
  MediaType,
  MediaTypes,
  resolveMediaType,
  sortByPreference,
} from "./media-type";

describe("MediaType.parse", () => {
  it("should parse simple media types", () => {
    const result = MediaType.parse("application/json");
    expect(result.type).toBe("application");
    expect(result.subtype).toBe("json");
    expect(result.essence).toBe("application/json");
    expect(result.parameters).toEqual({});
  });

  it("should parse media types with parameters", () => {
    const result = MediaType.parse("application/x-ndjson; charset=utf-8");
    expect(result.essence).toBe("application/x-ndjson");
    expect(result.parameters).toEqual({ charset: "utf-8" });
    expect(result.charset).toBe("utf-8");
  });

  it("should handle quoted parameter values", () => {
    const result = MediaType.parse('text/plain; charset="utf-8"');
    expect(result.parameters).toEqual({ charset: "utf-8" });
  });

  it("should normalize names to lowercase and keep value case", () => {
    const result = MediaType.parse("Application/JSON; Charset=UTF-8");
    expect(result.essence).toBe("application/json");
    expect(result.parameters).toEqual({ charset: "UTF-8" });
  });

  it("should handle extra whitespace", () => {
    const result = MediaType.parse("  text/html  ;  charset = utf-8  ");
    expect(result.essence).toBe("text/html");
    expect(result.parameters).toEqual({ charset: "utf-8" });
  });

  it("should return null for invalid input", () => {
    expect(MediaType.tryParse("")).toBeNull();
    expect(MediaType.tryParse(null)).toBeNull();
    expect(MediaType.tryParse(undefined)).toBeNull();
    expect(MediaType.tryParse("invalid")).toBeNull();
    expect(MediaType.tryParse("/")).toBeNull();
    expect(MediaType.tryParse("text/")).toBeNull();
    expect(MediaType.tryParse("a/b/c")).toBeNull();
  });

  it("should reject a wildcard type with a concrete subtype", () => {
    expect(MediaType.tryParse("*/json")).toBeNull();
    expect(() => MediaType.of("*", "json")).toThrow(InvalidMediaTypeError);
  });

  it("should throw InvalidMediaTypeError from parse", () => {
    expect(() => MediaType.parse("invalid")).toThrow("Invalid media type: 'invalid'");
  });
});

describe("MediaType.parseList", () => {
  it("should keep header order and skip invalid entries", () => {
    const result = MediaType.parseList("text/html, application/json;q=0.9, bogus, */*;q=0.1");
    expect(result.map((type) => type.essence)).toEqual(["text/html", "application/json", "*/*"]);
    expect(result.map((type) => type.quality)).toEqual([1, 0.9, 0.1]);
  });

  it("should not split inside quoted parameter values", () => {
    const result = MediaType.parseList('text/plain; foo="a,b", text/html');
    expect(result).toHaveLength(2);
    expect(result[0].parameters).toEqual({ foo: "a,b" });
    expect(result[1].essence).toBe("text/html");
  });

  it("should return an empty list for a missing header", () => {
    expect(MediaType.parseList(undefined)).toEqual([]);
    expect(MediaType.parseList("")).toEqual([]);
  });
});

describe("quality", () => {
  it("defaults to 1", () => {
    expect(MediaType.parse("text/html").quality).toBe(1);
  });

  it("reads the q parameter", () => {
    expect(MediaType.parse("text/html;q=0.8").quality).toBe(0.8);
  });

  it("ignores unparsable values and clamps out of range values", () => {
    expect(MediaType.parse("text/html;q=abc").quality).toBe(1);
    expect(MediaType.parse("text/html;q=2").quality).toBe(1);
    expect(MediaType.parse("text/html;q=-1").quality).toBe(0);
  });
});

describe("matching", () => {
  it("ranks specificity", () => {
    expect(MediaType.parse("text/html").specificity).toBe(2);
    expect(MediaType.parse("text/*").specificity).toBe(1);
    expect(MediaType.parse("application/*+json").specificity).toBe(1);
    expect(MediaType.parse("*/*").specificity).toBe(0);
  });

  it("matches on wildcards in either position", () => {
    const html = MediaType.parse("text/html");
    expect(html.matches(MediaType.parse("text/*"))).toBe(true);
    expect(MediaType.parse("text/*").matches(html)).toBe(true);
    expect(html.matches(MediaTypes.all)).toBe(true);
    expect(html.matches(MediaTypes.json)).toBe(false);
    expect(html.matches(MediaType.parse("image/*"))).toBe(false);
  });

  it("ignores parameters", () => {
    expect(MediaType.parse("text/html;charset=utf-8").matches(MediaType.parse("text/html"))).toBe(
      true,
    );
  });

  it("matches structured syntax suffixes", () => {
    const vendor = MediaType.parse("application/vnd.api+json");
    expect(MediaTypes.anyJson.matches(vendor)).toBe(true);
    expect(vendor.matches(MediaTypes.anyJson)).toBe(true);
    expect(MediaTypes.anyJson.matches(MediaTypes.json)).toBe(false);
    expect(vendor.suffix).toBe("json");
  });
});

describe("isTextual", () => {
  it("covers text and structured text types", () => {
    expect(MediaType.parse("text/csv").isTextual).toBe(true);
    expect(MediaTypes.json.isTextual).toBe(true);
    expect(MediaType.parse("application/vnd.api+json").isTextual).toBe(true);
    expect(MediaTypes.js.isTextual).toBe(true);
    expect(MediaType.parse("image/png").isTextual).toBe(false);
    expect(MediaTypes.octetStream.isTextual).toBe(false);
  });
});

describe("formatting and equality", () => {
  it("formats parameters and quotes when needed", () => {
    expect(MediaType.of("text", "plain", { charset: "utf-8" }).toString()).toBe(
      "text/plain; charset=utf-8",
    );
    expect(MediaType.of("text", "plain", { x: "a b" }).toString()).toBe('text/plain; x="a b"');
  });

  it("compares type and parameters", () => {
    const parsed = MediaType.parse("text/plain; charset=utf-8");
    expect(parsed.equals(MediaType.of("text", "plain", { charset: "utf-8" }))).toBe(true);
    expect(parsed.equals(MediaTypes.plain)).toBe(false);
    expect(parsed.withoutParameters().equals(MediaTypes.plain)).toBe(true);
  });

  it("merges parameters without mutating the original", () => {
    const withCharset = MediaTypes.html.withParameters({ charset: "utf-8" });
    expect(withCharset.toString()).toBe("text/html; charset=utf-8");
    expect(MediaTypes.html.toString()).toBe("text/html");
  });
});

describe("resolveMediaType", () => {
  it("resolves aliases", () => {
    expect(resolveMediaType("json")).toBe(MediaTypes.json);
    expect(resolveMediaType("HTML")).toBe(MediaTypes.html);
    expect(resolveMediaType("text").essence).toBe("text/plain");
  });

  it("parses header values and passes instances through", () => {
    expect(resolveMediaType("text/csv").essence).toBe("text/csv");
    expect(resolveMediaType(MediaTypes.xml)).toBe(MediaTypes.xml);
  });

  it("throws for unknown strings", () => {
    expect(() => resolveMediaType("nope")).toThrow(InvalidMediaTypeError);
  });

  it("inherited object keys are not aliases", () => {
    expect(() => resolveMediaType("constructor")).toThrow(InvalidMediaTypeError);
    expect(() => resolveMediaType("toString")).toThrow(InvalidMediaTypeError);
    expect(() => resolveMediaType("__proto__")).toThrow(InvalidMediaTypeError);
  });
});

describe("sortByPreference", () => {
  it("orders by specificity, then quality, and is stable", () => {
    const sorted = sortByPreference(
      MediaType.parseList("*/*, text/html;q=0.5, text/*, application/json;q=0.5"),
    );
    expect(sorted.map((type) => type.toString())).toEqual([
      "text/html; q=0.5",
      "application/json; q=0.5",
      "text/*",
      "*/*",
    ]);
  });
});
