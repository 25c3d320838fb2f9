/**
 * Acknowledgment dispatcher: invoked once per inbound ack message.
 * Decodes the frame and matches it against the correlation registry.
 * Never throws and never waits; malformed frames are logged and dropped.
 */

import { decodeAckFrame, errorMessage, type InboundMessage } from "@shelflight/core";
import { resolveLogger, type Logger, type LoggerFactory } from "../logger.js";
import type { CorrelationRegistry } from "./registry.js";

const SERVICE_NAME = "shelf-gateway:ack-dispatcher";

export type DispatchOutcome = "matched" | "unmatched" | "malformed";

export interface DispatchStats {
  matched: number;
  unmatched: number;
  malformed: number;
}

export class AckDispatcher<C extends string = string> {
  private registry: CorrelationRegistry<C>;
  private subjectPrefix: string;
  private log: Logger;
  private stats: DispatchStats = { matched: 0, unmatched: 0, malformed: 0 };

  constructor(params: {
    registry: CorrelationRegistry<C>;
    subjectPrefix: string;
    loggerFactory?: LoggerFactory;
  }) {
    this.registry = params.registry;
    this.subjectPrefix = params.subjectPrefix;
    this.log = resolveLogger(params.loggerFactory, SERVICE_NAME);
  }

  /**
   * Handles one ack message that arrived on the channel of `ackClass`.
   */
  dispatch(ackClass: C, message: InboundMessage): DispatchOutcome {
    const decoded = decodeAckFrame(this.subjectPrefix, message);
    if (!decoded.success) {
      this.stats.malformed++;
      this.log.warn?.(
        { ackClass, subject: message.subject, bytes: message.data.length, reason: decoded.reason },
        `${SERVICE_NAME}:dispatch - Dropping malformed acknowledgment`,
      );
      return "malformed";
    }

    const { deviceId, ackId } = decoded.data;
    let matched: boolean;
    try {
      matched = this.registry.match(ackClass, { deviceId, ackId });
    } catch (err) {
      // Only reachable with a class the registry does not know; the frame is dropped.
      this.stats.malformed++;
      this.log.error?.(
        { ackClass, deviceId, ackId, error: errorMessage(err) },
        `${SERVICE_NAME}:dispatch - Match failed`,
      );
      return "malformed";
    }

    if (!matched) {
      this.stats.unmatched++;
      this.log.debug?.(
        { ackClass, deviceId, ackId },
        `${SERVICE_NAME}:dispatch - No live entry (late or spurious acknowledgment)`,
      );
      return "unmatched";
    }

    this.stats.matched++;
    this.log.debug?.({ ackClass, deviceId, ackId }, `${SERVICE_NAME}:dispatch - Matched`);
    return "matched";
  }

  getStats(): DispatchStats {
    return { ...this.stats };
  }
}
