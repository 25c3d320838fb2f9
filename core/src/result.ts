/**
 * Result shapes for publish-and-wait calls.
 *
 * A call either succeeds (the device echoed the ack id in time) or fails with
 * one of the AckErrorCode kinds. Failures are values, not exceptions.
 */

import type { AckErrorCode } from "./errors.js";

export interface AckMeta {
  startedAtMs: number;
  endedAtMs: number;
  durationMs: number;
}

export interface AckOk {
  ok: true;
  ackId: number;
  meta: AckMeta;
}

export interface AckErr {
  ok: false;
  /** Absent when the call failed before an id was allocated */
  ackId?: number;
  error: {
    code: AckErrorCode;
    message: string;
    retryable: boolean;
    details?: Record<string, unknown>;
  };
  meta: AckMeta;
}

export type AckResult = AckOk | AckErr;

export function ackMeta(startedAtMs: number, endedAtMs: number): AckMeta {
  return { startedAtMs, endedAtMs, durationMs: endedAtMs - startedAtMs };
}
