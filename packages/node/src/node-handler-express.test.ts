import express from "express";
import type { Server } from "node:http";
import { test, expect, describe, beforeAll, afterAll } from "vitest";
import { createDispatcher, defineRoute } from "@switchyard/core";
import { toNodeHandler } from "./node-handler";

describe("Express integration", () => {
  const dispatcher = createDispatcher({
    mountRoute: "/api/catalog",
    routes: [
      defineRoute({
        method: "GET",
        path: "/items/:id",
        handler: ({ pathParams }) => ({ id: pathParams.id }),
      }),
    ],
  });

  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = express();

    app.all("/api/catalog/{*any}", toNodeHandler(dispatcher.handler));

    // Add JSON body parsing middleware
    app.use(express.json());
    app.get("/some-other-route", (_req, res) => {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ message: "Hello world" }));
    });

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });

    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("Address invalid");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  test("should serve dispatcher routes", async () => {
    const response = await fetch(`${baseUrl}/api/catalog/items/42`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ id: "42" });
  });

  test("should leave other routes to express", async () => {
    const response = await fetch(`${baseUrl}/some-other-route`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ message: "Hello world" });
  });
});
