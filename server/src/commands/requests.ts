/**
 * Request bodies accepted by the shelf commands (zod).
 */

import { z } from "zod";
import { DeviceIdSchema } from "@shelflight/core";

const Byte = z.number().int().min(0).max(255);
const ShelfNumber = z.number().int();
const Leds = z.array(Byte);

export const ShelfSelectionSchema = z.object({ shelfNumber: ShelfNumber });
export const ShelfColorSchema = z.object({ shelfNumber: ShelfNumber, color: z.string() });
export const PositionSelectionSchema = z.object({ shelfNumber: ShelfNumber, positionId: Byte });
export const TurnOnSchema = PositionSelectionSchema.extend({ color: z.string() });
export const DeviceSelectionSchema = z.object({ deviceId: DeviceIdSchema });
export const UnsetLedsSchema = z.object({ deviceId: DeviceIdSchema, leds: Leds });
export const SetLedsSchema = UnsetLedsSchema.extend({ color: z.string() });
export const CreateShelfSchema = z.object({ shelfNumber: ShelfNumber, deviceId: DeviceIdSchema });
export const ShelfPositionSchema = PositionSelectionSchema.extend({ leds: Leds.min(1) });

/** Query string of GET /config/requestUpload; values arrive as strings. */
export const RequestUploadSchema = z.object({
  deviceId: DeviceIdSchema,
  shelfNumber: z.coerce.number().int(),
});

/** Path parameter of GET /config/shelves/:shelfNumber. */
export const ShelfNumberParamSchema = z.coerce.number().int();

export type ShelfSelection = z.infer<typeof ShelfSelectionSchema>;
export type ShelfColor = z.infer<typeof ShelfColorSchema>;
export type PositionSelection = z.infer<typeof PositionSelectionSchema>;
export type TurnOn = z.infer<typeof TurnOnSchema>;
export type DeviceSelection = z.infer<typeof DeviceSelectionSchema>;
export type UnsetLeds = z.infer<typeof UnsetLedsSchema>;
export type SetLeds = z.infer<typeof SetLedsSchema>;
export type CreateShelf = z.infer<typeof CreateShelfSchema>;
export type ShelfPosition = z.infer<typeof ShelfPositionSchema>;
export type RequestUpload = z.infer<typeof RequestUploadSchema>;
