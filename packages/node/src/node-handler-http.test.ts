import { createServer, type RequestListener, type Server } from "node:http";
import { test, expect, describe, afterEach } from "vitest";
import { z } from "zod";
import { createDispatcher, defineRoute, type Dispatcher } from "@switchyard/core";
import { toNodeHandler } from "./node-handler";

describe("Node.js http integration", () => {
  const usersRoute = defineRoute({
    method: "GET",
    path: "/users",
    produces: ["json"],
    handler: () => [{ id: 1, name: "John" }],
  });

  const createUserRoute = defineRoute({
    method: "POST",
    path: "/users",
    inputSchema: z.object({ name: z.string() }),
    handler: async ({ input }, output) => {
      const { name } = await input.valid();
      output.status(201);
      return { id: 2, name };
    },
  });

  const dispatcher = createDispatcher({
    mountRoute: "/api",
    routes: [usersRoute, createUserRoute],
  });

  let server: Server | undefined;

  async function listen(listenerFactory: (dispatcher: Dispatcher) => RequestListener) {
    server = createServer(listenerFactory(dispatcher));
    const listening = server;
    await new Promise<void>((resolve) => listening.listen(0, "127.0.0.1", resolve));

    const address = listening.address();
    if (!address || typeof address === "string") {
      throw new Error("Address invalid");
    }

    return `http://127.0.0.1:${address.port}`;
  }

  afterEach(async () => {
    const running = server;
    server = undefined;
    if (running) {
      await new Promise<void>((resolve) => running.close(() => resolve()));
    }
  });

  test("should fetch data from the GET /users route", async () => {
    const baseUrl = await listen((d) => toNodeHandler(d.handler));

    const response = await fetch(`${baseUrl}${dispatcher.mountRoute}/users`);

    expect(response.ok).toBe(true);
    expect(response.headers.get("content-type")).toBe("application/json; charset=utf-8");
    expect(await response.json()).toEqual([{ id: 1, name: "John" }]);
  });

  test("should read request bodies", async () => {
    const baseUrl = await listen((d) => toNodeHandler(d.handler));

    const response = await fetch(`${baseUrl}/api/users`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ name: "Ada" }),
    });

    expect(response.status).toBe(201);
    expect(await response.json()).toEqual({ id: 2, name: "Ada" });
  });

  test("should answer unknown routes with 404", async () => {
    const baseUrl = await listen((d) => toNodeHandler(d.handler));

    const response = await fetch(`${baseUrl}/api/unknown`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      error: "Route GET /unknown not found",
      code: "ROUTE_NOT_FOUND",
    });
  });

  test("should fall back to normal server for other routes", async () => {
    const baseUrl = await listen((d) => (req, res) => {
      if (req.url?.startsWith(d.mountRoute)) {
        const handler = toNodeHandler(d.handler);
        return handler(req, res);
      }

      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ message: "It's working." }));
    });

    const response = await fetch(`${baseUrl}/`);
    expect(response.ok).toBe(true);
    expect(await response.json()).toEqual({ message: "It's working." });
  });
});
