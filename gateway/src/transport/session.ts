/**
 * Transport session: the gateway's single NATS connection.
 *
 * On start it subscribes to `<prefix>.*.<channel>.ack` for every
 * acknowledgment class, plus any extra inbound routes (device presence),
 * flushes so the server has registered every subscription, and only then
 * resolves. Ack messages go to the dispatcher tagged with their class.
 *
 * Connection loss does not touch in-flight waits; they resolve through their
 * own timeouts. While disconnected, publish() refuses with TRANSPORT_UNAVAILABLE
 * instead of letting the client buffer commands nobody is waiting for.
 */

import { connect, type ConnectionOptions } from "nats";
import { GatewayError, ackWildcard, errorMessage, type AckChannel, type InboundMessage } from "@shelflight/core";
import { resolveLogger, type Logger, type LoggerFactory } from "../logger.js";
import type { AckDispatcher } from "../correlation/dispatcher.js";
import type { AckPublisher } from "../correlation/ack-gateway.js";

const SERVICE_NAME = "shelf-gateway:transport-session";

// ── Broker contract ─────────────────────────────────────────────────

/** The slice of a NATS subscription the session uses. */
export interface BrokerSubscription extends AsyncIterable<InboundMessage> {
  unsubscribe(): void;
}

/** The slice of a NatsConnection the session uses. */
export interface BrokerConnection {
  publish(subject: string, data: Uint8Array): void;
  subscribe(subject: string): BrokerSubscription;
  flush(): Promise<void>;
  drain(): Promise<void>;
  isClosed(): boolean;
  closed(): Promise<void | Error>;
  status(): AsyncIterable<{ type: string; data?: unknown }>;
}

export type BrokerConnect = (opts: ConnectionOptions) => Promise<BrokerConnection>;

// ── Config ──────────────────────────────────────────────────────────

export interface TransportSessionConfig {
  /** NATS server URL */
  natsUrl: string;
  /** Connection name (for debugging) */
  natsName: string;
  /** First subject token of every device subject */
  subjectPrefix: string;
  /** Reconnect attempts; -1 retries forever */
  maxReconnectAttempts: number;
  /** Wait between reconnect attempts in milliseconds */
  reconnectTimeWaitMs: number;
}

export const defaultTransportSessionConfig: TransportSessionConfig = {
  natsUrl: "nats://127.0.0.1:4222",
  natsName: "shelf-gateway",
  subjectPrefix: "pbl",
  maxReconnectAttempts: -1,
  reconnectTimeWaitMs: 2_000,
};

/** A non-ack subscription, e.g. device registration. */
export interface InboundRoute {
  name: string;
  subject: string;
  handle(message: InboundMessage): void | Promise<void>;
}

export type SessionState = "idle" | "connected" | "disconnected" | "closed";

// ── Session ─────────────────────────────────────────────────────────

export class TransportSession<C extends string = string> implements AckPublisher {
  private config: TransportSessionConfig;
  private ackChannels: ReadonlyArray<AckChannel<C>>;
  private dispatcher: AckDispatcher<C>;
  private routes: InboundRoute[];
  private connectFn: BrokerConnect;
  private log: Logger;

  private connection?: BrokerConnection;
  private ownConnection = false;
  private subscriptions: BrokerSubscription[] = [];
  private loops: Promise<void>[] = [];
  private state: SessionState = "idle";

  constructor(params: {
    /** Acknowledgment classes and their subject channels */
    ackChannels: ReadonlyArray<AckChannel<C>>;
    dispatcher: AckDispatcher<C>;
    config?: Partial<TransportSessionConfig>;
    routes?: InboundRoute[];
    /** Pre-created connection (optional; will connect if not provided) */
    connection?: BrokerConnection;
    connect?: BrokerConnect;
    loggerFactory?: LoggerFactory;
  }) {
    this.config = { ...defaultTransportSessionConfig, ...params.config };
    this.ackChannels = params.ackChannels;
    this.dispatcher = params.dispatcher;
    this.routes = params.routes ?? [];
    this.connection = params.connection;
    this.connectFn = params.connect ?? connect;
    this.log = resolveLogger(params.loggerFactory, SERVICE_NAME);
  }

  get subjectPrefix(): string {
    return this.config.subjectPrefix;
  }

  get currentState(): SessionState {
    return this.state;
  }

  get isConnected(): boolean {
    return this.state === "connected" && this.connection !== undefined && !this.connection.isClosed();
  }

  /**
   * Connects, subscribes to every ack channel and inbound route, and resolves
   * once the server has processed the subscriptions.
   */
  async start(): Promise<void> {
    if (this.state !== "idle") {
      this.log.warn?.({ state: this.state }, `${SERVICE_NAME}:start - Already started`);
      return;
    }

    let connection = this.connection;
    if (!connection) {
      this.log.info?.(
        { natsUrl: this.config.natsUrl, natsName: this.config.natsName },
        `${SERVICE_NAME}:start - Connecting`,
      );
      try {
        connection = await this.connectFn({
          servers: this.config.natsUrl,
          name: this.config.natsName,
          maxReconnectAttempts: this.config.maxReconnectAttempts,
          reconnectTimeWait: this.config.reconnectTimeWaitMs,
        });
      } catch (err) {
        throw new GatewayError({
          code: "TRANSPORT_UNAVAILABLE",
          message: `${SERVICE_NAME}:start - Failed to connect to ${this.config.natsUrl}: ${errorMessage(err)}`,
          retryable: true,
          cause: err,
        });
      }
      this.connection = connection;
      this.ownConnection = true;
    }

    this.state = "connected";
    this.watchStatus(connection);

    for (const { ackClass, channel } of this.ackChannels) {
      const subject = ackWildcard(this.config.subjectPrefix, channel);
      this.listen(connection, subject, `ack:${ackClass}`, (message) => {
        this.dispatcher.dispatch(ackClass, message);
      });
    }
    for (const route of this.routes) {
      this.listen(connection, route.subject, route.name, (message) => this.runRoute(route, message));
    }

    await connection.flush();
    this.log.info?.(
      { subscriptions: this.subscriptions.length, ackClasses: this.ackChannels.map((c) => c.ackClass) },
      `${SERVICE_NAME}:start - Subscribed`,
    );
  }

  /**
   * Puts one frame on the wire.
   *
   * @throws GatewayError TRANSPORT_UNAVAILABLE when not started, disconnected or closed
   */
  publish(subject: string, data: Uint8Array): void {
    const connection = this.connection;
    if (!connection || !this.isConnected) {
      throw new GatewayError({
        code: "TRANSPORT_UNAVAILABLE",
        message: `${SERVICE_NAME}:publish - Session is ${this.state}, cannot publish to ${subject}`,
        retryable: true,
      });
    }
    try {
      connection.publish(subject, data);
    } catch (err) {
      throw new GatewayError({
        code: "TRANSPORT_UNAVAILABLE",
        message: `${SERVICE_NAME}:publish - ${errorMessage(err)}`,
        retryable: true,
        cause: err,
      });
    }
  }

  /** Unsubscribes and, when the session opened the connection, drains it. */
  async stop(): Promise<void> {
    if (this.state === "idle" || this.state === "closed") return;
    this.log.info?.({}, `${SERVICE_NAME}:stop - Stopping`);
    this.state = "closed";

    for (const sub of this.subscriptions) {
      sub.unsubscribe();
    }
    this.subscriptions = [];
    await Promise.allSettled(this.loops);
    this.loops = [];

    if (this.connection && this.ownConnection && !this.connection.isClosed()) {
      try {
        await this.connection.drain();
      } catch (err) {
        this.log.warn?.({ error: errorMessage(err) }, `${SERVICE_NAME}:stop - Error draining connection`);
      }
    }
    this.log.info?.({}, `${SERVICE_NAME}:stop - Stopped`);
  }

  // ── Private ────────────────────────────────────────────────────────

  private listen(
    connection: BrokerConnection,
    subject: string,
    name: string,
    handler: (message: InboundMessage) => void,
  ): void {
    const sub = connection.subscribe(subject);
    this.subscriptions.push(sub);
    this.log.debug?.({ subject, name }, `${SERVICE_NAME}:listen - Subscribed`);

    const loop = (async () => {
      for await (const msg of sub) {
        try {
          handler({ subject: msg.subject, data: msg.data });
        } catch (err) {
          this.log.error?.(
            { subject: msg.subject, name, error: errorMessage(err) },
            `${SERVICE_NAME}:listen - Handler threw`,
          );
        }
      }
    })().catch((err: unknown) => {
      this.log.error?.({ subject, name, error: errorMessage(err) }, `${SERVICE_NAME}:listen - Subscription loop error`);
    });
    this.loops.push(loop);
  }

  private runRoute(route: InboundRoute, message: InboundMessage): void {
    Promise.resolve(route.handle(message)).catch((err: unknown) => {
      this.log.error?.(
        { route: route.name, subject: message.subject, error: errorMessage(err) },
        `${SERVICE_NAME}:runRoute - Route failed`,
      );
    });
  }

  private watchStatus(connection: BrokerConnection): void {
    (async () => {
      for await (const status of connection.status()) {
        if (this.state === "closed") break;
        if (status.type === "disconnect") {
          this.state = "disconnected";
          this.log.warn?.({ server: status.data }, `${SERVICE_NAME}:watchStatus - Disconnected`);
        } else if (status.type === "reconnect") {
          this.state = "connected";
          this.log.info?.({ server: status.data }, `${SERVICE_NAME}:watchStatus - Reconnected`);
        }
      }
    })().catch((err: unknown) => {
      this.log.error?.({ error: errorMessage(err) }, `${SERVICE_NAME}:watchStatus - Status loop error`);
    });

    connection
      .closed()
      .then((err) => {
        if (this.state !== "closed") {
          this.state = "closed";
          this.log.error?.(
            { error: err ? errorMessage(err) : undefined },
            `${SERVICE_NAME}:watchStatus - Connection closed`,
          );
        }
      })
      .catch((err: unknown) => {
        this.log.error?.({ error: errorMessage(err) }, `${SERVICE_NAME}:watchStatus - Closed watcher failed`);
      });
  }
}
