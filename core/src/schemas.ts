/**
 * Zod runtime schemas for values arriving from devices.
 */

import { z } from "zod";

/** NATS subject token rules: no separators, wildcards or whitespace. */
const SUBJECT_TOKEN = /^[^.*>\s]+$/;

export const DeviceIdSchema = z
  .string()
  .min(1)
  .regex(SUBJECT_TOKEN, "must be a single subject token (no '.', '*', '>' or whitespace)");

/** One-byte numeric id echoed by the device. */
export const AckIdSchema = z.number().int().min(0).max(255);

export const AckFrameSchema = z.object({
  deviceId: DeviceIdSchema,
  ackId: AckIdSchema,
});

/** A stored position as uploaded by a device: [positionId, ...leds]. */
export const PositionUploadSchema = z.object({
  deviceId: DeviceIdSchema,
  positionId: z.number().int().min(0).max(255),
  leds: z.array(z.number().int().min(0).max(255)).min(1),
});

export type AckFrame = z.infer<typeof AckFrameSchema>;
export type PositionUpload = z.infer<typeof PositionUploadSchema>;

/** Flattens zod issues into one line for logs and error messages. */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
