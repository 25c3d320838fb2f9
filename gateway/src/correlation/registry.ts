/**
 * Correlation registry: in-flight publish-and-wait entries, one keyed map per
 * acknowledgment class.
 *
 * Every operation is synchronous, so on the Node.js event loop register,
 * match, expire and cancel never interleave. Whichever of them removes an
 * entry first resolves it; later calls for the same key see nothing and
 * return false. Entries leave the map in the same call that resolves them.
 */

import { GatewayError } from "@shelflight/core";
import { resolveLogger, type Logger, type LoggerFactory } from "../logger.js";

const SERVICE_NAME = "shelf-gateway:correlation-registry";

export type WaitOutcome = "matched" | "timed-out" | "cancelled";

/** (device identity, acknowledgment identifier) */
export interface CorrelationKey {
  deviceId: string;
  ackId: number;
}

export interface WaitHandle<C extends string = string> {
  readonly ackClass: C;
  readonly key: CorrelationKey;
  /** Clock reading at registration */
  readonly createdAt: number;
  /** Settles exactly once, when the entry leaves the registry */
  readonly outcome: Promise<WaitOutcome>;
}

interface WaitEntry<C extends string> {
  handle: WaitHandle<C>;
  resolve: (outcome: WaitOutcome) => void;
}

export class CorrelationRegistry<C extends string = string> {
  private queues = new Map<C, Map<string, WaitEntry<C>>>();
  private clock: { now(): number };
  private log: Logger;

  constructor(params: {
    ackClasses: readonly C[];
    clock?: { now(): number };
    loggerFactory?: LoggerFactory;
  }) {
    if (params.ackClasses.length === 0) {
      throw new Error(`${SERVICE_NAME}:constructor - At least one acknowledgment class is required`);
    }
    for (const ackClass of params.ackClasses) {
      this.queues.set(ackClass, new Map());
    }
    this.clock = params.clock ?? { now: () => performance.now() };
    this.log = resolveLogger(params.loggerFactory, SERVICE_NAME);
  }

  /** Map key for a correlation key. The numeric id comes first so the first ":" always separates. */
  static keyOf(key: CorrelationKey): string {
    return `${key.ackId}:${key.deviceId}`;
  }

  get ackClasses(): C[] {
    return [...this.queues.keys()];
  }

  isAckClass(value: string): value is C {
    return this.ackClasses.some((ackClass) => ackClass === value);
  }

  /**
   * Creates a wait entry for (ackClass, key).
   *
   * @throws GatewayError DUPLICATE_KEY if a live entry already holds the key
   * @throws GatewayError UNKNOWN_ACK_CLASS for a class the registry was not built with
   */
  register(ackClass: C, key: CorrelationKey): WaitHandle<C> {
    const queue = this.queueFor(ackClass);
    const mapKey = CorrelationRegistry.keyOf(key);
    if (queue.has(mapKey)) {
      throw new GatewayError({
        code: "DUPLICATE_KEY",
        message: `${SERVICE_NAME}:register - Entry already live for ${ackClass} ${mapKey}`,
        retryable: true,
        details: { ackClass, ...key },
      });
    }

    let resolve: (outcome: WaitOutcome) => void = () => undefined;
    const outcome = new Promise<WaitOutcome>((res) => {
      resolve = res;
    });
    const handle: WaitHandle<C> = {
      ackClass,
      key: { ...key },
      createdAt: this.clock.now(),
      outcome,
    };
    queue.set(mapKey, { handle, resolve });
    this.log.debug?.({ ackClass, ...key, live: queue.size }, `${SERVICE_NAME}:register - Registered`);
    return handle;
  }

  /** Resolves the entry as matched. False for late, spurious or already-resolved acks. */
  match(ackClass: C, key: CorrelationKey): boolean {
    return this.settle(ackClass, key, "matched");
  }

  /** Resolves the entry as timed out. False means a match already resolved it. */
  expire(ackClass: C, key: CorrelationKey): boolean {
    return this.settle(ackClass, key, "timed-out");
  }

  /** Resolves the entry as cancelled (abandoned caller or failed publish). */
  cancel(ackClass: C, key: CorrelationKey): boolean {
    return this.settle(ackClass, key, "cancelled");
  }

  /** Cancels every live entry in every class. Returns how many were cancelled. */
  cancelAll(): number {
    let count = 0;
    for (const [ackClass, queue] of this.queues) {
      for (const entry of [...queue.values()]) {
        if (this.settle(ackClass, entry.handle.key, "cancelled")) count++;
      }
    }
    if (count > 0) {
      this.log.info?.({ count }, `${SERVICE_NAME}:cancelAll - Cancelled live entries`);
    }
    return count;
  }

  has(ackClass: C, key: CorrelationKey): boolean {
    return this.queueFor(ackClass).has(CorrelationRegistry.keyOf(key));
  }

  /** Live entries in one class, or across all classes. */
  size(ackClass?: C): number {
    if (ackClass !== undefined) return this.queueFor(ackClass).size;
    let total = 0;
    for (const queue of this.queues.values()) total += queue.size;
    return total;
  }

  // ── Private ────────────────────────────────────────────────────────

  private queueFor(ackClass: C): Map<string, WaitEntry<C>> {
    const queue = this.queues.get(ackClass);
    if (!queue) {
      throw new GatewayError({
        code: "UNKNOWN_ACK_CLASS",
        message: `${SERVICE_NAME}:queueFor - Unknown acknowledgment class "${ackClass}"`,
        details: { ackClass, known: this.ackClasses },
      });
    }
    return queue;
  }

  private settle(ackClass: C, key: CorrelationKey, outcome: WaitOutcome): boolean {
    const queue = this.queueFor(ackClass);
    const mapKey = CorrelationRegistry.keyOf(key);
    const entry = queue.get(mapKey);
    if (!entry) return false;

    queue.delete(mapKey);
    entry.resolve(outcome);
    this.log.debug?.(
      { ackClass, ...key, outcome, waitedMs: this.clock.now() - entry.handle.createdAt },
      `${SERVICE_NAME}:settle - Resolved`,
    );
    return true;
  }
}
