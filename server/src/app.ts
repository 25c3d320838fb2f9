/**
 * Wires the gateway process together: store, device presence, correlation
 * gateway, shelf commands and the HTTP front end.
 */

import { DEFAULT_ACK_CHANNELS, type DefaultAckClass } from "@shelflight/core";
import {
  DevicePresence,
  ShelfGateway,
  resolveLogger,
  type BrokerConnect,
  type BrokerConnection,
  type LoggerFactory,
} from "@shelflight/gateway";
import type { GatewayProcessConfig } from "./config.js";
import { HttpStatus, ShelfCommands, type CommandOutcome } from "./commands/shelf-commands.js";
import { JsonShelfStore } from "./store/json-shelf-store.js";
import { shelfRoutes } from "./http/routes.js";
import { startHttpServer, type HttpServerHandle } from "./http/server.js";

const SERVICE_NAME = "shelf-gateway:app";

export interface ShelfServer {
  store: JsonShelfStore;
  gateway: ShelfGateway<DefaultAckClass>;
  commands: ShelfCommands;
  http: HttpServerHandle;
  stop(): Promise<void>;
}

export async function startShelfServer(params: {
  config: GatewayProcessConfig;
  loggerFactory?: LoggerFactory;
  /** Pre-created broker connection (optional; will connect if not provided) */
  connection?: BrokerConnection;
  connect?: BrokerConnect;
}): Promise<ShelfServer> {
  const { config, loggerFactory } = params;
  const log = resolveLogger(loggerFactory, SERVICE_NAME);

  const store = new JsonShelfStore({ path: config.storagePath, loggerFactory });
  const presence = new DevicePresence({ store, subjectPrefix: config.subjectPrefix, loggerFactory });
  const gateway = new ShelfGateway<DefaultAckClass>({
    ackChannels: DEFAULT_ACK_CHANNELS,
    session: {
      natsUrl: config.natsUrl,
      natsName: config.serviceName,
      subjectPrefix: config.subjectPrefix,
    },
    routes: presence.routes(),
    connection: params.connection,
    connect: params.connect,
    loggerFactory,
  });
  const commands = new ShelfCommands({
    store,
    gateway,
    config: { ackTimeoutMs: config.ackTimeoutMs, resetTimeoutMs: config.resetTimeoutMs },
    loggerFactory,
  });

  const health = (): CommandOutcome => {
    const transport = gateway.session.currentState;
    return {
      status: gateway.session.isConnected ? HttpStatus.OK : HttpStatus.SERVICE_UNAVAILABLE,
      message: transport,
      data: { transport, pending: gateway.registry.size(), acks: gateway.dispatcher.getStats() },
    };
  };

  await gateway.start();
  let http: HttpServerHandle;
  try {
    http = await startHttpServer({
      host: config.httpHost,
      port: config.httpPort,
      routes: shelfRoutes(commands, health),
      loggerFactory,
    });
  } catch (err) {
    await gateway.stop();
    throw err;
  }

  log.info?.(
    { http: `${http.host}:${http.port}`, natsUrl: config.natsUrl, subjectPrefix: config.subjectPrefix },
    `${SERVICE_NAME}:start - Started`,
  );

  const stop = async (): Promise<void> => {
    await http.close();
    await gateway.stop();
    log.info?.({}, `${SERVICE_NAME}:stop - Stopped`);
  };

  return { store, gateway, commands, http, stop };
}
