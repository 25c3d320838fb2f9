/**
 * Shelf and device store backed by one JSON file.
 *
 * The whole database is held in memory and written back synchronously after
 * every mutation, so a mutation and its write never interleave with another
 * event-loop turn. On open, every device is marked offline (devices announce
 * themselves again on reconnect) and a `<name>_backup.json` copy is written.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { DeviceIdSchema, GatewayError, describeIssues, errorMessage, type PositionUpload } from "@shelflight/core";
import {
  resolveLogger,
  type DeviceRecord,
  type Logger,
  type LoggerFactory,
  type PresenceStore,
  type UploadOutcome,
} from "@shelflight/gateway";

const SERVICE_NAME = "shelf-gateway:shelf-store";

// ── Schema ──────────────────────────────────────────────────────────

const ByteSchema = z.number().int().min(0).max(255);

export const StoredPositionSchema = z.object({
  positionId: ByteSchema,
  leds: z.array(ByteSchema).min(1),
});

export const StoredShelfSchema = z.object({
  shelfNumber: z.number().int(),
  deviceId: DeviceIdSchema,
  positions: z.array(StoredPositionSchema).default([]),
});

export const StoredDeviceSchema = z.object({
  deviceId: DeviceIdSchema,
  isUsed: z.boolean(),
  isOnline: z.boolean(),
});

export const ShelfDatabaseSchema = z.object({
  shelves: z.array(StoredShelfSchema).default([]),
  devices: z.array(StoredDeviceSchema).default([]),
});

export type StoredPosition = z.infer<typeof StoredPositionSchema>;
export type StoredShelf = z.infer<typeof StoredShelfSchema>;
export type ShelfDatabase = z.infer<typeof ShelfDatabaseSchema>;

/** Path of the backup copy written next to the database file. */
export function backupPathFor(storagePath: string): string {
  return storagePath.replace(/\.json$/, "_backup.json");
}

// ── Store ───────────────────────────────────────────────────────────

export class JsonShelfStore implements PresenceStore {
  private path: string;
  private db: ShelfDatabase;
  private log: Logger;

  /**
   * Loads `path`, or starts empty when it does not exist.
   *
   * @throws GatewayError VALIDATION_ERROR when the path is not a .json file or its content is invalid
   */
  constructor(params: { path: string; loggerFactory?: LoggerFactory }) {
    if (!params.path.endsWith(".json")) {
      throw new GatewayError({
        code: "VALIDATION_ERROR",
        message: `${SERVICE_NAME}:constructor - Storage path must end with .json: ${params.path}`,
      });
    }
    this.path = params.path;
    this.log = resolveLogger(params.loggerFactory, SERVICE_NAME);
    this.db = this.load();
    for (const device of this.db.devices) {
      device.isOnline = false;
    }
    mkdirSync(dirname(this.path), { recursive: true });
    this.save();
    this.saveTo(backupPathFor(this.path));
  }

  // ── Devices ────────────────────────────────────────────────────────

  listDevices(): DeviceRecord[] {
    return structuredClone(this.db.devices);
  }

  listUnusedDevices(): string[] {
    return this.db.devices.filter((d) => !d.isUsed).map((d) => d.deviceId);
  }

  lookupDevice(deviceId: string): DeviceRecord | undefined {
    const device = this.findDevice(deviceId);
    return device ? { ...device } : undefined;
  }

  deviceExists(deviceId: string): boolean {
    return this.findDevice(deviceId) !== undefined;
  }

  markOnline(deviceId: string, online: boolean): void {
    const device = this.findDevice(deviceId);
    if (!device || device.isOnline === online) return;
    device.isOnline = online;
    this.save();
  }

  addDevice(record: DeviceRecord): boolean {
    if (this.deviceExists(record.deviceId)) {
      this.log.warn?.({ deviceId: record.deviceId }, `${SERVICE_NAME}:addDevice - Device already exists`);
      return false;
    }
    this.db.devices.push({ ...record });
    this.save();
    return true;
  }

  // ── Shelves ────────────────────────────────────────────────────────

  listShelves(): StoredShelf[] {
    return structuredClone(this.db.shelves);
  }

  getShelf(shelfNumber: number): StoredShelf | undefined {
    const shelf = this.findShelf(shelfNumber);
    return shelf ? structuredClone(shelf) : undefined;
  }

  shelfExists(shelfNumber: number): boolean {
    return this.findShelf(shelfNumber) !== undefined;
  }

  /** Device assigned to the shelf, if the shelf exists. */
  deviceForShelf(shelfNumber: number): string | undefined {
    return this.findShelf(shelfNumber)?.deviceId;
  }

  /** Adds a shelf and marks its device used. False if the shelf exists or the device is unknown or taken. */
  addShelf(shelf: { shelfNumber: number; deviceId: string; positions?: StoredPosition[] }): boolean {
    if (this.shelfExists(shelf.shelfNumber)) {
      this.log.warn?.({ shelfNumber: shelf.shelfNumber }, `${SERVICE_NAME}:addShelf - Shelf number already in use`);
      return false;
    }
    const device = this.findDevice(shelf.deviceId);
    if (!device || device.isUsed) {
      this.log.warn?.(
        { shelfNumber: shelf.shelfNumber, deviceId: shelf.deviceId, known: device !== undefined },
        `${SERVICE_NAME}:addShelf - Device unknown or already assigned`,
      );
      return false;
    }
    device.isUsed = true;
    this.db.shelves.push({
      shelfNumber: shelf.shelfNumber,
      deviceId: shelf.deviceId,
      positions: structuredClone(shelf.positions ?? []),
    });
    this.save();
    return true;
  }

  /** Removes a shelf and frees its device. */
  deleteShelf(shelfNumber: number): boolean {
    const index = this.db.shelves.findIndex((s) => s.shelfNumber === shelfNumber);
    if (index < 0) return false;
    const [shelf] = this.db.shelves.splice(index, 1);
    const device = shelf ? this.findDevice(shelf.deviceId) : undefined;
    if (device) device.isUsed = false;
    this.save();
    return true;
  }

  // ── Positions ──────────────────────────────────────────────────────

  getPosition(shelfNumber: number, positionId: number): StoredPosition | undefined {
    const position = this.findShelf(shelfNumber)?.positions.find((p) => p.positionId === positionId);
    return position ? structuredClone(position) : undefined;
  }

  positionExists(shelfNumber: number, positionId: number): boolean {
    return this.getPosition(shelfNumber, positionId) !== undefined;
  }

  /**
   * True when any of `leds` belongs to a position of the shelf, ignoring the
   * position `exceptPositionId` (used when updating that position).
   */
  ledsInUse(shelfNumber: number, leds: readonly number[], exceptPositionId?: number): boolean {
    const shelf = this.findShelf(shelfNumber);
    if (!shelf) return false;
    return shelf.positions.some(
      (position) => position.positionId !== exceptPositionId && position.leds.some((led) => leds.includes(led)),
    );
  }

  addPosition(shelfNumber: number, position: StoredPosition): boolean {
    const shelf = this.findShelf(shelfNumber);
    if (!shelf || position.leds.length === 0) return false;
    if (this.positionExists(shelfNumber, position.positionId) || this.ledsInUse(shelfNumber, position.leds)) {
      return false;
    }
    shelf.positions.push({ positionId: position.positionId, leds: [...position.leds] });
    this.save();
    return true;
  }

  updatePosition(shelfNumber: number, position: StoredPosition): boolean {
    const existing = this.findShelf(shelfNumber)?.positions.find((p) => p.positionId === position.positionId);
    if (!existing || position.leds.length === 0) return false;
    if (this.ledsInUse(shelfNumber, position.leds, position.positionId)) return false;
    existing.leds = [...position.leds];
    this.save();
    return true;
  }

  deletePosition(shelfNumber: number, positionId: number): boolean {
    const shelf = this.findShelf(shelfNumber);
    if (!shelf) return false;
    const index = shelf.positions.findIndex((p) => p.positionId === positionId);
    if (index < 0) return false;
    shelf.positions.splice(index, 1);
    this.save();
    return true;
  }

  /** Stores a position a device uploaded into the shelf assigned to that device. */
  addUploadedPosition(upload: PositionUpload): UploadOutcome {
    const shelf = this.db.shelves.find((s) => s.deviceId === upload.deviceId);
    if (!shelf) return "no-shelf";
    return this.addPosition(shelf.shelfNumber, { positionId: upload.positionId, leds: upload.leds })
      ? "added"
      : "conflict";
  }

  // ── Private ────────────────────────────────────────────────────────

  private findDevice(deviceId: string): DeviceRecord | undefined {
    return this.db.devices.find((d) => d.deviceId === deviceId);
  }

  private findShelf(shelfNumber: number): StoredShelf | undefined {
    return this.db.shelves.find((s) => s.shelfNumber === shelfNumber);
  }

  private load(): ShelfDatabase {
    if (!existsSync(this.path)) {
      this.log.info?.({ path: this.path }, `${SERVICE_NAME}:load - No database file, starting empty`);
      return { shelves: [], devices: [] };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, "utf-8"));
    } catch (err) {
      throw new GatewayError({
        code: "VALIDATION_ERROR",
        message: `${SERVICE_NAME}:load - Cannot read ${this.path}: ${errorMessage(err)}`,
        cause: err,
      });
    }

    const parsed = ShelfDatabaseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new GatewayError({
        code: "VALIDATION_ERROR",
        message: `${SERVICE_NAME}:load - Invalid database ${this.path}: ${describeIssues(parsed.error)}`,
        details: parsed.error.issues,
      });
    }
    this.log.info?.(
      { path: this.path, shelves: parsed.data.shelves.length, devices: parsed.data.devices.length },
      `${SERVICE_NAME}:load - Loaded database`,
    );
    return parsed.data;
  }

  private save(): void {
    this.saveTo(this.path);
  }

  private saveTo(path: string): void {
    writeFileSync(path, JSON.stringify(this.db, null, 4), "utf-8");
  }
}
