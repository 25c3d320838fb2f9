/**
 * Publish-and-wait: sends a command to one device and waits, for at most
 * `timeoutMs`, for the device to echo the command's ack id.
 *
 * Flow per call:
 *   allocate ack id → register wait entry → publish → wait on the entry
 *   → resolved by the dispatcher (matched), the timer (timed-out) or the
 *     caller's AbortSignal (cancelled)
 *
 * The registry decides the race between a late ack and the timer: whichever
 * removes the entry first wins, and the waiter only ever sees that outcome.
 */

import { randomInt } from "node:crypto";
import {
  ACK_ID_SPACE,
  ackMeta,
  encodeCommand,
  errorMessage,
  isGatewayError,
  type AckErrorCode,
  type AckResult,
} from "@shelflight/core";
import { resolveLogger, type Logger, type LoggerFactory } from "../logger.js";
import type { CorrelationRegistry, WaitHandle, WaitOutcome } from "./registry.js";

const SERVICE_NAME = "shelf-gateway:ack-gateway";

/** Longest delay setTimeout honors; longer waits are armed in steps of this size. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/** Anything that can put a frame on the wire; throws when it cannot. */
export interface AckPublisher {
  publish(subject: string, data: Uint8Array): void;
}

export interface AckGatewayConfig {
  /** Number of distinct ack ids per (device, class). Default: 256, one byte on the wire */
  ackIdSpace: number;
  /** Ids tried before giving up with TRANSPORT_UNAVAILABLE. Default: ackIdSpace */
  maxAllocationAttempts: number;
}

export interface PublishAndWaitParams<C extends string> {
  /** Zero, negative or NaN times out without publishing; Infinity waits for an ack or the signal */
  timeoutMs: number;
  deviceId: string;
  ackClass: C;
  /** Full command subject, e.g. pbl.<deviceId>.light.set */
  subject: string;
  /** Command body; the ack id is prepended on the wire */
  payload: Uint8Array;
  /** Aborting releases the wait entry and resolves as a cancelled timeout */
  signal?: AbortSignal;
}

export class AckGateway<C extends string = string> {
  private registry: CorrelationRegistry<C>;
  private publisher: AckPublisher;
  private config: AckGatewayConfig;
  private clock: { now(): number };
  private random: (max: number) => number;
  private log: Logger;
  /** Next candidate ack id per (class, device) */
  private counters = new Map<string, number>();

  constructor(params: {
    registry: CorrelationRegistry<C>;
    publisher: AckPublisher;
    config?: Partial<AckGatewayConfig>;
    clock?: { now(): number };
    /** Seeds each (class, device) counter; returns an integer in [0, max) */
    random?: (max: number) => number;
    loggerFactory?: LoggerFactory;
  }) {
    const ackIdSpace = params.config?.ackIdSpace ?? ACK_ID_SPACE;
    if (!Number.isInteger(ackIdSpace) || ackIdSpace < 1 || ackIdSpace > ACK_ID_SPACE) {
      throw new Error(`${SERVICE_NAME}:constructor - ackIdSpace must be an integer in 1..${ACK_ID_SPACE}`);
    }
    this.registry = params.registry;
    this.publisher = params.publisher;
    this.config = {
      ackIdSpace,
      maxAllocationAttempts: params.config?.maxAllocationAttempts ?? ackIdSpace,
    };
    this.clock = params.clock ?? { now: () => performance.now() };
    this.random = params.random ?? ((max) => randomInt(max));
    this.log = resolveLogger(params.loggerFactory, SERVICE_NAME);
  }

  /**
   * Publishes `payload` to `subject` and waits for the matching acknowledgment.
   * Never rejects for transport or timing reasons; those come back as
   * `{ ok: false }` with code TIMEOUT or TRANSPORT_UNAVAILABLE.
   */
  async publishAndWait(params: PublishAndWaitParams<C>): Promise<AckResult> {
    const { timeoutMs, deviceId, ackClass, subject, payload, signal } = params;
    const startedAt = this.clock.now();

    if (Number.isNaN(timeoutMs) || timeoutMs <= 0) {
      this.log.warn?.({ deviceId, ackClass, timeoutMs }, `${SERVICE_NAME}:publishAndWait - Non-positive timeout`);
      return this.failure("TIMEOUT", `Timeout of ${timeoutMs} ms elapsed before publishing`, startedAt);
    }
    if (signal?.aborted) {
      return this.failure("TIMEOUT", "Request was cancelled before publishing", startedAt, undefined, {
        cancelled: true,
      });
    }

    const handle = this.allocate(deviceId, ackClass);
    if (!handle) {
      this.log.error?.(
        { deviceId, ackClass, attempts: this.config.maxAllocationAttempts, live: this.registry.size(ackClass) },
        `${SERVICE_NAME}:publishAndWait - Ack id space exhausted`,
      );
      return this.failure(
        "TRANSPORT_UNAVAILABLE",
        `No free ack id for ${deviceId} on ${ackClass} after ${this.config.maxAllocationAttempts} attempts`,
        startedAt,
        undefined,
        { exhausted: true },
      );
    }
    const { key } = handle;

    try {
      this.publisher.publish(subject, encodeCommand(key.ackId, payload));
    } catch (err) {
      this.registry.cancel(ackClass, key);
      this.log.warn?.(
        { deviceId, ackClass, subject, ackId: key.ackId, error: errorMessage(err) },
        `${SERVICE_NAME}:publishAndWait - Publish failed`,
      );
      return this.failure("TRANSPORT_UNAVAILABLE", `Publish to ${subject} failed: ${errorMessage(err)}`, startedAt, key.ackId);
    }

    this.log.debug?.({ deviceId, ackClass, subject, ackId: key.ackId, timeoutMs }, `${SERVICE_NAME}:publishAndWait - Published`);

    const outcome = await this.waitFor(handle, timeoutMs - (this.clock.now() - startedAt), signal);

    if (outcome === "matched") {
      return { ok: true, ackId: key.ackId, meta: ackMeta(startedAt, this.clock.now()) };
    }
    if (outcome === "cancelled") {
      return this.failure("TIMEOUT", `Wait for ${deviceId} ack ${key.ackId} was cancelled`, startedAt, key.ackId, {
        cancelled: true,
      });
    }
    this.log.info?.({ deviceId, ackClass, ackId: key.ackId, timeoutMs }, `${SERVICE_NAME}:publishAndWait - Timed out`);
    return this.failure("TIMEOUT", `Device ${deviceId} did not acknowledge within ${timeoutMs} ms`, startedAt, key.ackId);
  }

  /** Live wait entries across all classes. */
  get pendingCount(): number {
    return this.registry.size();
  }

  // ── Private ────────────────────────────────────────────────────────

  /**
   * Registers a fresh (deviceId, ackId) key, stepping past ids that are still live.
   * Returns null once maxAllocationAttempts ids were all taken.
   */
  private allocate(deviceId: string, ackClass: C): WaitHandle<C> | null {
    for (let attempt = 0; attempt < this.config.maxAllocationAttempts; attempt++) {
      const ackId = this.nextAckId(deviceId, ackClass);
      try {
        return this.registry.register(ackClass, { deviceId, ackId });
      } catch (err) {
        if (!isGatewayError(err, "DUPLICATE_KEY")) throw err;
        this.log.debug?.({ deviceId, ackClass, ackId, attempt }, `${SERVICE_NAME}:allocate - Id in use, retrying`);
      }
    }
    return null;
  }

  private nextAckId(deviceId: string, ackClass: C): number {
    const counterKey = `${ackClass}:${deviceId}`;
    const ackId = this.counters.get(counterKey) ?? this.random(this.config.ackIdSpace);
    this.counters.set(counterKey, (ackId + 1) % this.config.ackIdSpace);
    return ackId;
  }

  private async waitFor(handle: WaitHandle<C>, remainingMs: number, signal?: AbortSignal): Promise<WaitOutcome> {
    const { ackClass, key } = handle;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const arm = (leftMs: number): void => {
      const stepMs = Math.min(leftMs, MAX_TIMER_DELAY_MS);
      timer = setTimeout(() => {
        if (leftMs > stepMs) {
          arm(leftMs - stepMs);
          return;
        }
        if (!this.registry.expire(ackClass, key)) {
          this.log.debug?.({ ackClass, ...key }, `${SERVICE_NAME}:waitFor - Ack won the race against the timer`);
        }
      }, stepMs);
    };
    if (Number.isFinite(remainingMs)) arm(Math.max(0, remainingMs));

    const onAbort = (): void => {
      this.registry.cancel(ackClass, key);
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      return await handle.outcome;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private failure(
    code: AckErrorCode,
    message: string,
    startedAt: number,
    ackId?: number,
    details?: Record<string, unknown>,
  ): AckResult {
    return {
      ok: false,
      ackId,
      error: { code, message, retryable: true, details },
      meta: ackMeta(startedAt, this.clock.now()),
    };
  }
}
