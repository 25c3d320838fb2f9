/**
 * Unit tests for JsonShelfStore on a temp directory.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { isGatewayError } from "@shelflight/core";
import { JsonShelfStore, backupPathFor } from "./json-shelf-store.js";

// ── Mocks ───────────────────────────────────────────────────────────

const silentLogger = {
  get: () => silentLogger,
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, "utf-8"));
}

// ── Tests ───────────────────────────────────────────────────────────

describe("JsonShelfStore", () => {
  let dir: string;
  let path: string;
  let store: JsonShelfStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "shelf-store-"));
    path = join(dir, "data", "db.json");
    store = new JsonShelfStore({ path, loggerFactory: silentLogger });
    store.addDevice({ deviceId: "dev-1", isUsed: false, isOnline: true });
    store.addDevice({ deviceId: "dev-2", isUsed: false, isOnline: true });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("file handling", () => {
    it("should create the database and its backup when missing", () => {
      const fresh = join(dir, "fresh", "db.json");
      new JsonShelfStore({ path: fresh, loggerFactory: silentLogger });

      expect(readJson(fresh)).toEqual({ shelves: [], devices: [] });
      expect(existsSync(join(dir, "fresh", "db_backup.json"))).toBe(true);
    });

    it("should write every mutation through to disk", () => {
      store.addShelf({ shelfNumber: 1, deviceId: "dev-1" });
      expect(readJson(path)).toEqual({
        shelves: [{ shelfNumber: 1, deviceId: "dev-1", positions: [] }],
        devices: [
          { deviceId: "dev-1", isUsed: true, isOnline: true },
          { deviceId: "dev-2", isUsed: false, isOnline: true },
        ],
      });
    });

    it("should reload stored data with every device offline", () => {
      store.addShelf({ shelfNumber: 1, deviceId: "dev-1", positions: [{ positionId: 0, leds: [1, 2] }] });

      const reopened = new JsonShelfStore({ path, loggerFactory: silentLogger });

      expect(reopened.getShelf(1)).toEqual({ shelfNumber: 1, deviceId: "dev-1", positions: [{ positionId: 0, leds: [1, 2] }] });
      expect(reopened.listDevices().map((d) => d.isOnline)).toEqual([false, false]);
      expect(readJson(backupPathFor(path))).toEqual(readJson(path));
    });

    it("should reject invalid database files", () => {
      const broken = join(dir, "broken.json");
      writeFileSync(broken, JSON.stringify({ shelves: [{ shelfNumber: "one" }] }));

      let caught: unknown;
      try {
        new JsonShelfStore({ path: broken, loggerFactory: silentLogger });
      } catch (err) {
        caught = err;
      }
      expect(isGatewayError(caught, "VALIDATION_ERROR")).toBe(true);
    });

    it("should require a .json path", () => {
      expect(() => new JsonShelfStore({ path: join(dir, "db.txt"), loggerFactory: silentLogger })).toThrow(
        /must end with \.json/,
      );
    });
  });

  describe("devices", () => {
    it("should not add a device twice", () => {
      expect(store.addDevice({ deviceId: "dev-1", isUsed: false, isOnline: false })).toBe(false);
      expect(store.listDevices()).toHaveLength(2);
    });

    it("should track online state", () => {
      store.markOnline("dev-1", false);
      expect(store.lookupDevice("dev-1")?.isOnline).toBe(false);
      expect(store.lookupDevice("ghost")).toBeUndefined();
    });

    it("should list unused devices", () => {
      store.addShelf({ shelfNumber: 1, deviceId: "dev-1" });
      expect(store.listUnusedDevices()).toEqual(["dev-2"]);
    });
  });

  describe("shelves", () => {
    it("should assign a device to one shelf only", () => {
      expect(store.addShelf({ shelfNumber: 1, deviceId: "dev-1" })).toBe(true);
      expect(store.addShelf({ shelfNumber: 2, deviceId: "dev-1" })).toBe(false);
      expect(store.addShelf({ shelfNumber: 1, deviceId: "dev-2" })).toBe(false);
      expect(store.addShelf({ shelfNumber: 3, deviceId: "ghost" })).toBe(false);
      expect(store.deviceForShelf(1)).toBe("dev-1");
      expect(store.lookupDevice("dev-1")?.isUsed).toBe(true);
    });

    it("should free the device when the shelf is deleted", () => {
      store.addShelf({ shelfNumber: 1, deviceId: "dev-1" });
      expect(store.deleteShelf(1)).toBe(true);
      expect(store.shelfExists(1)).toBe(false);
      expect(store.lookupDevice("dev-1")?.isUsed).toBe(false);
      expect(store.deleteShelf(1)).toBe(false);
    });

    it("should hand out copies", () => {
      store.addShelf({ shelfNumber: 1, deviceId: "dev-1", positions: [{ positionId: 0, leds: [1] }] });
      const copy = store.getShelf(1);
      copy?.positions.push({ positionId: 9, leds: [9] });
      expect(store.getShelf(1)?.positions).toHaveLength(1);
    });
  });

  describe("positions", () => {
    beforeEach(() => {
      store.addShelf({ shelfNumber: 1, deviceId: "dev-1" });
      store.addPosition(1, { positionId: 0, leds: [1, 2, 3] });
      store.addPosition(1, { positionId: 1, leds: [4, 5] });
    });

    it("should refuse duplicate position ids and shared LEDs", () => {
      expect(store.addPosition(1, { positionId: 0, leds: [10] })).toBe(false);
      expect(store.addPosition(1, { positionId: 2, leds: [5, 6] })).toBe(false);
      expect(store.addPosition(1, { positionId: 2, leds: [6, 7] })).toBe(true);
      expect(store.addPosition(9, { positionId: 0, leds: [1] })).toBe(false);
    });

    it("should check LED conflicts excluding the position being updated", () => {
      expect(store.ledsInUse(1, [3, 9])).toBe(true);
      expect(store.ledsInUse(1, [3, 9], 0)).toBe(false);
      expect(store.ledsInUse(1, [4], 0)).toBe(true);
      expect(store.ledsInUse(2, [1])).toBe(false);
    });

    it("should update LEDs of an existing position", () => {
      expect(store.updatePosition(1, { positionId: 0, leds: [1, 9] })).toBe(true);
      expect(store.getPosition(1, 0)).toEqual({ positionId: 0, leds: [1, 9] });
      expect(store.updatePosition(1, { positionId: 0, leds: [4] })).toBe(false);
      expect(store.updatePosition(1, { positionId: 7, leds: [20] })).toBe(false);
    });

    it("should delete positions", () => {
      expect(store.deletePosition(1, 1)).toBe(true);
      expect(store.positionExists(1, 1)).toBe(false);
      expect(store.deletePosition(1, 1)).toBe(false);
    });

    it("should place uploads into the shelf of the uploading device", () => {
      expect(store.addUploadedPosition({ deviceId: "dev-1", positionId: 2, leds: [8] })).toBe("added");
      expect(store.addUploadedPosition({ deviceId: "dev-1", positionId: 2, leds: [30] })).toBe("conflict");
      expect(store.addUploadedPosition({ deviceId: "dev-2", positionId: 0, leds: [1] })).toBe("no-shelf");
      expect(store.getPosition(1, 2)).toEqual({ positionId: 2, leds: [8] });
    });
  });
});
