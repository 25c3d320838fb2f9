export { startShelfServer, type ShelfServer } from "./app.js";
export { loadConfig, GatewayProcessConfigSchema, type GatewayProcessConfig } from "./config.js";
export { createNodeJSLogger, isLogLevel, type LogLevel, type LoggerInstance, type LogSink } from "./logger.js";
export {
  ShelfCommands,
  HttpStatus,
  defaultShelfCommandsConfig,
  type CommandGateway,
  type CommandOutcome,
  type ShelfCommandsConfig,
} from "./commands/shelf-commands.js";
export * from "./commands/requests.js";
export {
  JsonShelfStore,
  ShelfDatabaseSchema,
  backupPathFor,
  type ShelfDatabase,
  type StoredPosition,
  type StoredShelf,
} from "./store/json-shelf-store.js";
export { shelfRoutes, type Route, type RouteContext, type HttpMethod } from "./http/routes.js";
export { createHttpApp, startHttpServer, statusForError, type HttpServerHandle, type HttpServerOptions } from "./http/server.js";
