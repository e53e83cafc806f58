import { test, expect, describe, vi } from "vitest";
import { z } from "zod";
import { createDispatcher } from "./dispatcher";
import { defineRoute } from "./route";
import type { Logger } from "../util/logger";

function testLogger(): Logger {
  return { log: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

describe("Request Middleware", () => {
  const routes = [
    defineRoute({
      method: "GET",
      path: "/protected",
      handler: async (_input, { json }) => {
        return json({ message: "You accessed protected resource" });
      },
    }),
    defineRoute({
      method: "POST",
      path: "/users",
      inputSchema: z.object({ name: z.string() }),
      handler: async ({ input }) => {
        const { name } = await input.valid();
        return { name };
      },
    }),
  ] as const;

  test("middleware can intercept and return early", async () => {
    const dispatcher = createDispatcher({ mountRoute: "/api", routes, logger: testLogger() });

    const withAuth = dispatcher.withMiddleware(async ({ queryParams }, { error }) => {
      if (queryParams.get("token") === "test-token") {
        return undefined;
      }

      return error({ message: "Unauthorized", code: "UNAUTHORIZED" }, 401);
    });

    const unauthorizedRes = await withAuth.handler(new Request("http://localhost/api/protected"));
    expect(unauthorizedRes.status).toBe(401);
    expect(await unauthorizedRes.json()).toEqual({
      error: "Unauthorized",
      code: "UNAUTHORIZED",
    });

    const authorizedRes = await withAuth.handler(
      new Request("http://localhost/api/protected?token=test-token"),
    );
    expect(authorizedRes.status).toBe(200);
    expect(await authorizedRes.json()).toEqual({ message: "You accessed protected resource" });
  });

  test("middleware sees the resolved route", async () => {
    const seen = vi.fn();
    const dispatcher = createDispatcher({ routes, logger: testLogger() }).withMiddleware(
      ({ path, method, route }) => {
        seen(path, method, route.method);
        return undefined;
      },
    );

    await dispatcher.handler(new Request("http://localhost/protected"));
    expect(seen).toHaveBeenCalledWith("/protected", "GET", "GET");
  });

  test("middleware is not called for unknown routes", async () => {
    const middleware = vi.fn(() => undefined);
    const dispatcher = createDispatcher({ routes, logger: testLogger() }).withMiddleware(middleware);

    const res = await dispatcher.handler(new Request("http://localhost/nowhere"));
    expect(res.status).toBe(404);
    expect(middleware).not.toHaveBeenCalled();
  });

  test("ifMatchesRoute only runs for the given route", async () => {
    const dispatcher = createDispatcher({ routes, logger: testLogger() }).withMiddleware(
      async ({ ifMatchesRoute }) => {
        return ifMatchesRoute("POST", "/users", ({ headers }) => {
          if (headers.get("x-api-key") !== "test-key") {
            return Response.json({ error: "Forbidden", code: "FORBIDDEN" }, { status: 403 });
          }
          return undefined;
        });
      },
    );

    const protectedRes = await dispatcher.handler(new Request("http://localhost/protected"));
    expect(protectedRes.status).toBe(200);

    const forbiddenRes = await dispatcher.callRoute("POST", "/users", { body: { name: "Ada" } });
    expect(forbiddenRes.status).toBe(403);

    const allowedRes = await dispatcher.callRoute("POST", "/users", {
      body: { name: "Ada" },
      headers: { "x-api-key": "test-key" },
    });
    expect(allowedRes.status).toBe(200);
    expect(await allowedRes.json()).toEqual({ name: "Ada" });
  });

  test("middleware and handler can both read the body", async () => {
    const dispatcher = createDispatcher({ routes, logger: testLogger() }).withMiddleware(
      async ({ body }) => {
        const value = await body.json();
        if (typeof value === "object" && value !== null && "name" in value) {
          return value.name === "blocked"
            ? Response.json({ error: "Blocked", code: "BLOCKED" }, { status: 422 })
            : undefined;
        }
        return undefined;
      },
    );

    const blocked = await dispatcher.callRoute("POST", "/users", { body: { name: "blocked" } });
    expect(blocked.status).toBe(422);

    const passed = await dispatcher.callRoute("POST", "/users", { body: { name: "Grace" } });
    expect(passed.status).toBe(200);
    expect(await passed.json()).toEqual({ name: "Grace" });
  });

  test("a throwing middleware becomes a 500", async () => {
    const logger = testLogger();
    const dispatcher = createDispatcher({ routes, logger }).withMiddleware(() => {
      throw new Error("middleware broke");
    });

    const res = await dispatcher.handler(new Request("http://localhost/protected"));
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: "Internal server error",
      code: "INTERNAL_SERVER_ERROR",
    });
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ event: "dispatch.middleware.failed", error: "middleware broke" }),
    );
  });

  test("only one middleware can be set", () => {
    const dispatcher = createDispatcher({ routes }).withMiddleware(() => undefined);

    expect(() => dispatcher.withMiddleware(() => undefined)).toThrow("Middleware already set");
  });

  test("withMiddleware leaves the original dispatcher untouched", async () => {
    const dispatcher = createDispatcher({ routes, logger: testLogger() });
    dispatcher.withMiddleware(() => new Response("intercepted", { status: 418 }));

    const res = await dispatcher.handler(new Request("http://localhost/protected"));
    expect(res.status).toBe(200);
  });
});
