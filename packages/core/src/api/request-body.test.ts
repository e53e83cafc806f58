import { describe, expect, test, vi } from "vitest";
import { MediaType, MediaTypes } from "../http/media-type";
import { BodyConverterRegistry, defineConverter } from "./converter";
import { defaultConverters } from "./converters";
import { BodyReadError, NoConverterError } from "./error";
import { RequestBody } from "./request-body";

const registry = new BodyConverterRegistry([], { fallbacks: defaultConverters });

function bodyOf(body: BodyInit | null, contentType?: string, defaultCharset = "utf-8") {
  const headers = contentType ? { "content-type": contentType } : undefined;
  const request = new Request("http://localhost/", {
    method: body === null ? "GET" : "POST",
    headers,
    body,
  });

  return new RequestBody({
    request,
    registry,
    mediaType: MediaType.tryParse(contentType) ?? MediaTypes.octetStream,
    defaultCharset,
  });
}

describe("RequestBody", () => {
  test("reports whether a body is present", () => {
    expect(bodyOf(null).present).toBe(false);
    expect(bodyOf("x", "text/plain").present).toBe(true);
  });

  test("reads JSON", async () => {
    const body = bodyOf('{"name":"widget"}', "application/json");
    expect(await body.json()).toEqual({ name: "widget" });
  });

  test("reads the same bytes in several shapes", async () => {
    const body = bodyOf('{"name":"widget"}', "application/json");

    expect(await body.json()).toEqual({ name: "widget" });
    expect(await body.text()).toBe('{"name":"widget"}');
    expect(await body.bytes()).toEqual(new TextEncoder().encode('{"name":"widget"}'));
  });

  test("repeated reads share one conversion", async () => {
    const read = vi.fn(async () => "converted");
    const counting = new BodyConverterRegistry([
      defineConverter({ name: "counting", types: ["text/plain"], reads: ["text"], read }),
    ]);
    const body = new RequestBody({
      request: new Request("http://localhost/", { method: "POST", body: "x" }),
      registry: counting,
      mediaType: MediaTypes.plain,
      defaultCharset: "utf-8",
    });

    expect(await body.text()).toBe("converted");
    expect(await body.text()).toBe("converted");
    expect(read).toHaveBeenCalledTimes(1);
  });

  test("reads forms", async () => {
    const body = bodyOf("a=1&b=two+words", "application/x-www-form-urlencoded");
    const form = await body.form();
    expect(form.get("a")).toBe("1");
    expect(form.get("b")).toBe("two words");
  });

  test("decodes text with the declared charset, or the default", async () => {
    const latin1 = new Uint8Array([0x63, 0x61, 0x66, 0xe9]);
    expect(await bodyOf(latin1, "text/plain; charset=iso-8859-1").text()).toBe("café");
    expect(await bodyOf(latin1, "text/plain", "iso-8859-1").text()).toBe("café");
  });

  test("malformed input is a BodyReadError", async () => {
    const body = bodyOf("{", "application/json");
    await expect(body.json()).rejects.toBeInstanceOf(BodyReadError);
    await expect(body.json()).rejects.toThrow("Request body could not be read as json");
  });

  test("invalid UTF-8 is a BodyReadError", async () => {
    const body = bodyOf(new Uint8Array([0xff, 0xfe, 0xfd]), "text/plain; charset=utf-8");
    await expect(body.text()).rejects.toBeInstanceOf(BodyReadError);
  });

  test("missing readers are a NoConverterError", async () => {
    const body = bodyOf("<a/>", "application/xml");
    await expect(body.json()).rejects.toBeInstanceOf(NoConverterError);
    await expect(body.json()).rejects.toThrow(
      "No body converter can read 'json' as 'application/xml'",
    );
  });

  test("a body without content type reads as bytes", async () => {
    const body = bodyOf(new Uint8Array([1, 2, 3]));
    expect(body.mediaType.essence).toBe("application/octet-stream");
    expect(await body.bytes()).toEqual(new Uint8Array([1, 2, 3]));
  });

  test("a reader returning the wrong shape fails", async () => {
    const lying = new BodyConverterRegistry([
      defineConverter({ name: "lying", types: ["*/*"], reads: ["text"], read: () => 42 }),
    ]);
    const body = new RequestBody({
      request: new Request("http://localhost/", { method: "POST", body: "x" }),
      registry: lying,
      mediaType: MediaTypes.plain,
      defaultCharset: "utf-8",
    });

    await expect(body.text()).rejects.toThrow("Body reader returned a value that is not 'text'");
  });
});
