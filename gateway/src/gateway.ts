/**
 * ShelfGateway: the process-wide correlation engine.
 *
 * Owns one correlation registry and one transport session, wired together:
 *
 *   publishAndWait → AckGateway → registry.register → session.publish
 *   session (ack subscription) → AckDispatcher → registry.match → waiter resumes
 *
 * Construct once at startup, pass it to whatever serves requests, stop it at
 * shutdown.
 */

import type { AckChannel, AckResult } from "@shelflight/core";
import { resolveLogger, type Logger, type LoggerFactory } from "./logger.js";
import { CorrelationRegistry } from "./correlation/registry.js";
import { AckDispatcher } from "./correlation/dispatcher.js";
import { AckGateway, type AckGatewayConfig, type PublishAndWaitParams } from "./correlation/ack-gateway.js";
import {
  TransportSession,
  type BrokerConnect,
  type BrokerConnection,
  type InboundRoute,
  type TransportSessionConfig,
} from "./transport/session.js";

const SERVICE_NAME = "shelf-gateway";

export interface ShelfGatewayOptions<C extends string> {
  ackChannels: ReadonlyArray<AckChannel<C>>;
  session?: Partial<TransportSessionConfig>;
  ack?: Partial<AckGatewayConfig>;
  /** Extra subscriptions (e.g. DevicePresence.routes()) */
  routes?: InboundRoute[];
  /** Pre-created broker connection (optional) */
  connection?: BrokerConnection;
  connect?: BrokerConnect;
  clock?: { now(): number };
  random?: (max: number) => number;
  loggerFactory?: LoggerFactory;
}

export class ShelfGateway<C extends string = string> {
  readonly registry: CorrelationRegistry<C>;
  readonly dispatcher: AckDispatcher<C>;
  readonly session: TransportSession<C>;
  private acks: AckGateway<C>;
  private log: Logger;

  constructor(options: ShelfGatewayOptions<C>) {
    this.log = resolveLogger(options.loggerFactory, SERVICE_NAME);
    const subjectPrefix = options.session?.subjectPrefix ?? "pbl";

    this.registry = new CorrelationRegistry<C>({
      ackClasses: options.ackChannels.map((c) => c.ackClass),
      clock: options.clock,
      loggerFactory: options.loggerFactory,
    });
    this.dispatcher = new AckDispatcher<C>({
      registry: this.registry,
      subjectPrefix,
      loggerFactory: options.loggerFactory,
    });
    this.session = new TransportSession<C>({
      ackChannels: options.ackChannels,
      dispatcher: this.dispatcher,
      config: { ...options.session, subjectPrefix },
      routes: options.routes,
      connection: options.connection,
      connect: options.connect,
      loggerFactory: options.loggerFactory,
    });
    this.acks = new AckGateway<C>({
      registry: this.registry,
      publisher: this.session,
      config: options.ack,
      clock: options.clock,
      random: options.random,
      loggerFactory: options.loggerFactory,
    });
  }

  get subjectPrefix(): string {
    return this.session.subjectPrefix;
  }

  /** Brings the transport session online; resolves after the subscriptions are in place. */
  async start(): Promise<void> {
    await this.session.start();
    this.log.info?.({ subjectPrefix: this.subjectPrefix }, `${SERVICE_NAME}:start - Gateway online`);
  }

  publishAndWait(params: PublishAndWaitParams<C>): Promise<AckResult> {
    return this.acks.publishAndWait(params);
  }

  /** Releases every outstanding wait and closes the session. */
  async stop(): Promise<void> {
    const cancelled = this.registry.cancelAll();
    await this.session.stop();
    this.log.info?.({ cancelled }, `${SERVICE_NAME}:stop - Gateway stopped`);
  }
}
