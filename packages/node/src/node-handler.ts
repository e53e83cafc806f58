import type { RequestListener } from "node:http";
import { createRequestListener } from "@remix-run/node-fetch-server";

/**
 * Creates a handler that can be used with `node:http` to serve requests through a dispatcher.
 *
 * @example
 * import { createServer } from "node:http";
 * import { createDispatcher } from "@switchyard/core";
 * import { toNodeHandler } from "@switchyard/node";
 *
 * const dispatcher = createDispatcher({ mountRoute: "/api", routes });
 *
 * const server = createServer(toNodeHandler(dispatcher.handler));
 * server.listen(8080);
 *
 * @example
 * import { createServer } from "node:http";
 * import { toNodeHandler } from "@switchyard/node";
 *
 * const server = createServer((req, res) => {
 *   if (req.url?.startsWith(dispatcher.mountRoute)) {
 *     const handler = toNodeHandler(dispatcher.handler);
 *     return handler(req, res);
 *   }
 *   // ... Your route handling
 * });
 * @example
 * import express from "express";
 * import { toNodeHandler } from "@switchyard/node";
 *
 * const app = express();
 * app.all("/api/{*any}", toNodeHandler(dispatcher.handler));
 *
 * app.listen(8080);
 */
export function toNodeHandler(handler: (req: Request) => Promise<Response>): RequestListener {
  return createRequestListener(handler);
}
