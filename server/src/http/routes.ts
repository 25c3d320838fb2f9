/**
 * HTTP route table for the shelf commands.
 */

import { z } from "zod";
import { describeIssues } from "@shelflight/core";
import { HttpStatus, type CommandOutcome, type ShelfCommands } from "../commands/shelf-commands.js";
import {
  CreateShelfSchema,
  DeviceSelectionSchema,
  PositionSelectionSchema,
  RequestUploadSchema,
  SetLedsSchema,
  ShelfColorSchema,
  ShelfNumberParamSchema,
  ShelfPositionSchema,
  ShelfSelectionSchema,
  TurnOnSchema,
  UnsetLedsSchema,
} from "../commands/requests.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface RouteContext {
  /** Parsed JSON body; `{}` when the request has none */
  body: unknown;
  query: Record<string, unknown>;
  params: Record<string, string>;
  /** Aborted when the client goes away before the response is written */
  signal: AbortSignal;
}

export interface Route {
  method: HttpMethod;
  /** Express route path, e.g. /config/shelves/:shelfNumber */
  path: string;
  handle(ctx: RouteContext): CommandOutcome | Promise<CommandOutcome>;
}

type Handler<T> = (input: T, signal: AbortSignal) => CommandOutcome | Promise<CommandOutcome>;

function invalid(what: string, error: z.ZodError): CommandOutcome {
  return { status: HttpStatus.BAD_REQUEST, message: `Invalid ${what}: ${describeIssues(error)}` };
}

function withBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, run: Handler<T>): Route["handle"] {
  return (ctx) => {
    const parsed = schema.safeParse(ctx.body);
    if (!parsed.success) return invalid("request body", parsed.error);
    return run(parsed.data, ctx.signal);
  };
}

/**
 * Route table. `health` reports the gateway's transport state for GET /health.
 */
export function shelfRoutes(commands: ShelfCommands, health: () => CommandOutcome): Route[] {
  return [
    { method: "GET", path: "/health", handle: () => health() },

    // Light
    { method: "POST", path: "/light/turnOn", handle: withBody(TurnOnSchema, (r, s) => commands.turnOn(r, s)) },
    {
      method: "POST",
      path: "/light/turnOff",
      handle: withBody(PositionSelectionSchema, (r, s) => commands.turnOff(r, s)),
    },
    {
      method: "POST",
      path: "/light/turnOnAll",
      handle: withBody(ShelfColorSchema, (r, s) => commands.turnOnAll(r, s)),
    },
    {
      method: "POST",
      path: "/light/turnOffAll",
      handle: withBody(ShelfSelectionSchema, (r, s) => commands.turnOffAll(r, s)),
    },
    { method: "POST", path: "/light/setLEDs", handle: withBody(SetLedsSchema, (r, s) => commands.setLeds(r, s)) },
    {
      method: "POST",
      path: "/light/unsetLEDs",
      handle: withBody(UnsetLedsSchema, (r, s) => commands.unsetLeds(r, s)),
    },
    {
      method: "POST",
      path: "/light/resetDevice",
      handle: withBody(DeviceSelectionSchema, (r, s) => commands.resetDevice(r, s)),
    },
    {
      method: "POST",
      path: "/light/loadDevice",
      handle: withBody(ShelfSelectionSchema, (r, s) => commands.loadDevice(r, s)),
    },

    // Configuration
    { method: "PUT", path: "/config/createShelf", handle: withBody(CreateShelfSchema, (r) => commands.createShelf(r)) },
    {
      method: "PUT",
      path: "/config/createPosition",
      handle: withBody(ShelfPositionSchema, (r, s) => commands.createPosition(r, s)),
    },
    {
      method: "PUT",
      path: "/config/updatePosition",
      handle: withBody(ShelfPositionSchema, (r, s) => commands.updatePosition(r, s)),
    },
    {
      method: "DELETE",
      path: "/config/deletePosition",
      handle: withBody(PositionSelectionSchema, (r, s) => commands.deletePosition(r, s)),
    },
    {
      method: "DELETE",
      path: "/config/deleteShelf",
      handle: withBody(ShelfSelectionSchema, (r, s) => commands.deleteShelf(r, s)),
    },

    // Queries
    { method: "GET", path: "/config/shelves", handle: () => commands.listShelves() },
    {
      method: "GET",
      path: "/config/shelves/:shelfNumber",
      handle: (ctx) => {
        const parsed = ShelfNumberParamSchema.safeParse(ctx.params.shelfNumber);
        if (!parsed.success) return invalid("shelf number", parsed.error);
        return commands.getShelf(parsed.data);
      },
    },
    { method: "GET", path: "/config/unusedDevices", handle: () => commands.listUnusedDevices() },
    {
      method: "GET",
      path: "/config/requestUpload",
      handle: (ctx) => {
        const parsed = RequestUploadSchema.safeParse(ctx.query);
        if (!parsed.success) return invalid("query", parsed.error);
        return commands.requestUpload(parsed.data, ctx.signal);
      },
    },
  ];
}
