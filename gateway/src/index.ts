/**
 * Shelf gateway: request/acknowledgment correlation over NATS.
 */

export { ShelfGateway, type ShelfGatewayOptions } from "./gateway.js";

export {
  CorrelationRegistry,
  type CorrelationKey,
  type WaitHandle,
  type WaitOutcome,
} from "./correlation/registry.js";
export { AckDispatcher, type DispatchOutcome, type DispatchStats } from "./correlation/dispatcher.js";
export {
  AckGateway,
  MAX_TIMER_DELAY_MS,
  type AckGatewayConfig,
  type AckPublisher,
  type PublishAndWaitParams,
} from "./correlation/ack-gateway.js";

export {
  TransportSession,
  defaultTransportSessionConfig,
  type BrokerConnect,
  type BrokerConnection,
  type BrokerSubscription,
  type InboundRoute,
  type SessionState,
  type TransportSessionConfig,
} from "./transport/session.js";

export {
  DevicePresence,
  type DeviceDirectory,
  type DeviceRecord,
  type PresenceStore,
  type UploadOutcome,
} from "./devices/presence.js";

export { consoleLogger, resolveLogger, type Logger, type LoggerFactory } from "./logger.js";
