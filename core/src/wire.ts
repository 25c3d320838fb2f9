/**
 * Device wire format over NATS.
 *
 * Subjects are `<prefix>.<deviceId>.<channel>.<command>`. Every command body
 * is prefixed with a one-byte ack id; the device echoes that byte as the first
 * byte of a message on `<prefix>.<deviceId>.<channel>.ack`.
 */

import { GatewayError } from "./errors.js";
import {
  AckFrameSchema,
  DeviceIdSchema,
  PositionUploadSchema,
  describeIssues,
  type AckFrame,
  type PositionUpload,
} from "./schemas.js";

export const DEFAULT_SUBJECT_PREFIX = "pbl";

/** Ack ids are a single byte on the wire. */
export const ACK_ID_SPACE = 256;

export const ACK_SUFFIX = "ack";

/** An acknowledgment class and the subject channel its acks arrive on. */
export interface AckChannel<C extends string = string> {
  ackClass: C;
  channel: string;
}

/** Default acknowledgment classes: lighting and configuration commands. */
export const DEFAULT_ACK_CHANNELS = [
  { ackClass: "light_ack", channel: "light" },
  { ackClass: "config_ack", channel: "config" },
] as const satisfies ReadonlyArray<AckChannel>;

export type DefaultAckClass = (typeof DEFAULT_ACK_CHANNELS)[number]["ackClass"];

export interface InboundMessage {
  subject: string;
  data: Uint8Array;
}

export type DecodeResult<T> =
  | { success: true; data: T }
  | { success: false; reason: string };

// ── Subjects ────────────────────────────────────────────────────────

export function isSubjectToken(value: string): boolean {
  return DeviceIdSchema.safeParse(value).success;
}

function requireDeviceToken(deviceId: string): string {
  const parsed = DeviceIdSchema.safeParse(deviceId);
  if (!parsed.success) {
    throw new GatewayError({
      code: "VALIDATION_ERROR",
      message: `Invalid device id "${deviceId}": ${describeIssues(parsed.error)}`,
      status: 400,
    });
  }
  return parsed.data;
}

export function commandSubject(prefix: string, deviceId: string, channel: string, command: string): string {
  return `${prefix}.${requireDeviceToken(deviceId)}.${channel}.${command}`;
}

export function ackSubject(prefix: string, deviceId: string, channel: string): string {
  return commandSubject(prefix, deviceId, channel, ACK_SUFFIX);
}

/** Subscription subject matching `<prefix>.<any device>.<channel>.<event>`. */
export function deviceWildcard(prefix: string, channel: string, event: string): string {
  return `${prefix}.*.${channel}.${event}`;
}

export function ackWildcard(prefix: string, channel: string): string {
  return deviceWildcard(prefix, channel, ACK_SUFFIX);
}

export function registerSubject(prefix: string): string {
  return `${prefix}.register`;
}

/**
 * Splits a per-device subject into its device id and the remaining tokens.
 * Returns null when the subject is outside the prefix or has no device token.
 */
export function parseDeviceSubject(
  prefix: string,
  subject: string,
): { deviceId: string; rest: string[] } | null {
  if (!subject.startsWith(`${prefix}.`)) return null;
  const [deviceId, ...rest] = subject.slice(prefix.length + 1).split(".");
  if (!deviceId) return null;
  return { deviceId, rest };
}

// ── Payloads ────────────────────────────────────────────────────────

/** Prefixes a command body with its ack id. */
export function encodeCommand(ackId: number, body: Uint8Array): Uint8Array {
  const frame = new Uint8Array(body.length + 1);
  frame[0] = ackId;
  frame.set(body, 1);
  return frame;
}

/** The frame a device sends back for a command carrying `ackId`. */
export function encodeAck(ackId: number): Uint8Array {
  return Uint8Array.of(ackId);
}

/**
 * Decodes an acknowledgment message. The device id comes from the subject,
 * the ack id from the first payload byte.
 */
export function decodeAckFrame(prefix: string, message: InboundMessage): DecodeResult<AckFrame> {
  const parts = parseDeviceSubject(prefix, message.subject);
  if (!parts || parts.rest.length !== 2 || parts.rest[1] !== ACK_SUFFIX) {
    return { success: false, reason: `Unexpected ack subject "${message.subject}"` };
  }
  if (message.data.length === 0) {
    return { success: false, reason: "Empty ack payload" };
  }
  const parsed = AckFrameSchema.safeParse({ deviceId: parts.deviceId, ackId: message.data[0] });
  if (!parsed.success) {
    return { success: false, reason: describeIssues(parsed.error) };
  }
  return { success: true, data: parsed.data };
}

/** Decodes a `config.put` upload: `[positionId, ...leds]`. */
export function decodePositionUpload(prefix: string, message: InboundMessage): DecodeResult<PositionUpload> {
  const parts = parseDeviceSubject(prefix, message.subject);
  if (!parts) {
    return { success: false, reason: `Unexpected upload subject "${message.subject}"` };
  }
  if (message.data.length === 0) {
    return { success: false, reason: "Empty upload payload" };
  }
  const parsed = PositionUploadSchema.safeParse({
    deviceId: parts.deviceId,
    positionId: message.data[0],
    leds: Array.from(message.data.subarray(1)),
  });
  if (!parsed.success) {
    return { success: false, reason: describeIssues(parsed.error) };
  }
  return { success: true, data: parsed.data };
}

/** Decodes a `register` announcement whose body is the device id as UTF-8. */
export function decodeRegistration(message: InboundMessage): DecodeResult<{ deviceId: string }> {
  const deviceId = new TextDecoder().decode(message.data).trim();
  const parsed = DeviceIdSchema.safeParse(deviceId);
  if (!parsed.success) {
    return { success: false, reason: `Invalid device id "${deviceId}": ${describeIssues(parsed.error)}` };
  }
  return { success: true, data: { deviceId: parsed.data } };
}
