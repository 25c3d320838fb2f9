/**
 * HTTP front end on express: JSON in, `{ message, data? }` out, status from
 * the command outcome.
 */

import type { Server } from "node:http";
import express, { type ErrorRequestHandler, type Express, type RequestHandler, type Response } from "express";
import { errorMessage, isGatewayError, type GatewayErrorCode } from "@shelflight/core";
import { resolveLogger, type Logger, type LoggerFactory } from "@shelflight/gateway";
import { HttpStatus, type CommandOutcome } from "../commands/shelf-commands.js";
import type { Route } from "./routes.js";

const SERVICE_NAME = "shelf-gateway:http";

export type HttpServerOptions = {
  host?: string;
  port?: number;
  routes: Route[];
  /** Request bodies above this size are refused with 413 */
  maxBodyBytes?: number;
  loggerFactory?: LoggerFactory;
};

export type HttpServerHandle = {
  host: string;
  port: number;
  close: () => Promise<void>;
};

const CODE_STATUS: Partial<Record<GatewayErrorCode, number>> = {
  VALIDATION_ERROR: HttpStatus.BAD_REQUEST,
  NOT_FOUND: HttpStatus.NOT_FOUND,
  CONFLICT: HttpStatus.NOT_ACCEPTABLE,
  TRANSPORT_UNAVAILABLE: HttpStatus.SERVICE_UNAVAILABLE,
  TIMEOUT: HttpStatus.GATEWAY_TIMEOUT,
};

/** HTTP status for anything a handler throws. */
export function statusForError(err: unknown): number {
  if (!isGatewayError(err)) return HttpStatus.INTERNAL_ERROR;
  return err.status ?? CODE_STATUS[err.code] ?? HttpStatus.INTERNAL_ERROR;
}

/**
 * Client errors raised by express itself: body parsing (`type` set by
 * body-parser) and undecodable path parameters (`status` 400).
 */
function requestFailure(err: unknown, maxBodyBytes: number): CommandOutcome | null {
  if (!(err instanceof Error)) return null;
  const type = "type" in err ? err.type : undefined;
  if (type === "entity.parse.failed") {
    return { status: HttpStatus.BAD_REQUEST, message: `Request body is not valid JSON: ${err.message}` };
  }
  if (type === "entity.too.large") {
    return { status: 413, message: `Request body exceeds ${maxBodyBytes} bytes` };
  }
  const status = "status" in err ? err.status : undefined;
  if (typeof status === "number" && status >= 400 && status < 500) {
    return { status, message: err.message };
  }
  return null;
}

function send(res: Response, outcome: CommandOutcome): void {
  if (res.headersSent || res.writableEnded) return;
  const payload = outcome.data === undefined ? { message: outcome.message } : { message: outcome.message, data: outcome.data };
  res.status(outcome.status).json(payload);
}

function routeHandler(route: Route, log: Logger): RequestHandler {
  return (req, res, next) => {
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) controller.abort();
    });

    Promise.resolve()
      .then(() => route.handle({ body: req.body, query: req.query, params: req.params, signal: controller.signal }))
      .then((outcome) => {
        if (controller.signal.aborted) {
          log.info?.(
            { method: req.method, path: req.path, status: outcome.status },
            `${SERVICE_NAME}:handle - Client left before the response`,
          );
          return;
        }
        send(res, outcome);
      })
      .catch(next);
  };
}

function mount(app: Express, route: Route, handler: RequestHandler): void {
  switch (route.method) {
    case "GET":
      app.get(route.path, handler);
      break;
    case "POST":
      app.post(route.path, handler);
      break;
    case "PUT":
      app.put(route.path, handler);
      break;
    case "DELETE":
      app.delete(route.path, handler);
      break;
  }
}

/** Builds the express app for a route table without listening. */
export function createHttpApp(opts: Omit<HttpServerOptions, "host" | "port">): Express {
  const maxBodyBytes = opts.maxBodyBytes ?? 1024 * 1024;
  const log = resolveLogger(opts.loggerFactory, SERVICE_NAME);

  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: maxBodyBytes }));

  for (const route of opts.routes) {
    mount(app, route, routeHandler(route, log));
  }

  app.use((req, res) => {
    send(res, { status: HttpStatus.NOT_FOUND, message: `No route for ${req.method} ${req.path}` });
  });

  const onError: ErrorRequestHandler = (err: unknown, req, res, _next) => {
    const rejected = requestFailure(err, maxBodyBytes);
    if (rejected) {
      send(res, rejected);
      return;
    }
    const status = statusForError(err);
    if (status >= 500) {
      log.error?.({ method: req.method, path: req.path, error: errorMessage(err) }, `${SERVICE_NAME}:handle - Request failed`);
    }
    send(res, { status, message: status === HttpStatus.INTERNAL_ERROR ? "Internal server error" : errorMessage(err) });
  };
  app.use(onError);

  return app;
}

export async function startHttpServer(opts: HttpServerOptions): Promise<HttpServerHandle> {
  const host = opts.host ?? "127.0.0.1";
  const port = opts.port ?? 8000;
  const log = resolveLogger(opts.loggerFactory, SERVICE_NAME);

  if (!Number.isInteger(port) || port < 0) throw new Error(`invalid port: ${port}`);

  const app = createHttpApp(opts);
  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(port, host, () => resolve(listening));
    listening.once("error", reject);
  });

  const address = server.address();
  const actualPort = typeof address === "object" && address ? address.port : port;
  log.info?.({ host, port: actualPort, routes: opts.routes.length }, `${SERVICE_NAME}:start - Listening`);

  const close = async (): Promise<void> => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  };

  return { host, port: actualPort, close };
}
