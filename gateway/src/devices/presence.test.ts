/**
 * Unit tests for DevicePresence.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import type { PositionUpload } from "@shelflight/core";
import { DevicePresence, type DeviceRecord, type PresenceStore, type UploadOutcome } from "./presence.js";

// ── Mocks ───────────────────────────────────────────────────────────

const silentLogger = {
  get: () => silentLogger,
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

class MemoryPresenceStore implements PresenceStore {
  devices = new Map<string, DeviceRecord>();
  uploads: PositionUpload[] = [];
  uploadOutcome: UploadOutcome = "added";

  lookupDevice(deviceId: string): DeviceRecord | undefined {
    return this.devices.get(deviceId);
  }

  deviceExists(deviceId: string): boolean {
    return this.devices.has(deviceId);
  }

  markOnline(deviceId: string, online: boolean): void {
    const device = this.devices.get(deviceId);
    if (device) device.isOnline = online;
  }

  addDevice(record: DeviceRecord): boolean {
    if (this.devices.has(record.deviceId)) return false;
    this.devices.set(record.deviceId, { ...record });
    return true;
  }

  addUploadedPosition(upload: PositionUpload): UploadOutcome {
    this.uploads.push(upload);
    return this.uploadOutcome;
  }
}

const encode = (text: string) => new TextEncoder().encode(text);

// ── Tests ───────────────────────────────────────────────────────────

describe("DevicePresence", () => {
  let store: MemoryPresenceStore;
  let presence: DevicePresence;

  beforeEach(() => {
    vi.clearAllMocks();
    store = new MemoryPresenceStore();
    presence = new DevicePresence({ store, subjectPrefix: "pbl", loggerFactory: silentLogger });
  });

  it("should expose register, offline and upload subscriptions", () => {
    expect(presence.routes().map((r) => [r.name, r.subject])).toEqual([
      ["presence:register", "pbl.register"],
      ["presence:offline", "pbl.*.config.offline"],
      ["presence:upload", "pbl.*.config.put"],
    ]);
  });

  it("should add an unknown device as unused and online", () => {
    presence.onRegister({ subject: "pbl.register", data: encode("AA:BB:CC:DD:EE:FF") });
    expect(store.lookupDevice("AA:BB:CC:DD:EE:FF")).toEqual({
      deviceId: "AA:BB:CC:DD:EE:FF",
      isUsed: false,
      isOnline: true,
    });
  });

  it("should mark a known device online without touching its assignment", () => {
    store.addDevice({ deviceId: "dev-1", isUsed: true, isOnline: false });
    presence.onRegister({ subject: "pbl.register", data: encode("dev-1") });
    expect(store.lookupDevice("dev-1")).toEqual({ deviceId: "dev-1", isUsed: true, isOnline: true });
  });

  it("should drop announcements with an invalid device id", () => {
    presence.onRegister({ subject: "pbl.register", data: encode("bad.id") });
    expect(store.devices.size).toBe(0);
    expect(silentLogger.warn).toHaveBeenCalledTimes(1);
  });

  it("should mark a known device offline", () => {
    store.addDevice({ deviceId: "dev-1", isUsed: false, isOnline: true });
    presence.onOffline({ subject: "pbl.dev-1.config.offline", data: new Uint8Array(0) });
    expect(store.lookupDevice("dev-1")?.isOnline).toBe(false);
  });

  it("should ignore offline notices for unknown devices", () => {
    presence.onOffline({ subject: "pbl.ghost.config.offline", data: new Uint8Array(0) });
    expect(store.devices.size).toBe(0);
  });

  it("should store uploaded positions", () => {
    presence.onPositionUpload({ subject: "pbl.dev-1.config.put", data: Uint8Array.of(4, 20, 21, 22) });
    expect(store.uploads).toEqual([{ deviceId: "dev-1", positionId: 4, leds: [20, 21, 22] }]);
    expect(silentLogger.info).toHaveBeenCalledTimes(1);
  });

  it("should warn when the upload cannot be stored", () => {
    store.uploadOutcome = "conflict";
    presence.onPositionUpload({ subject: "pbl.dev-1.config.put", data: Uint8Array.of(4, 20) });
    expect(silentLogger.warn).toHaveBeenCalledTimes(1);
  });

  it("should drop uploads without LEDs", () => {
    presence.onPositionUpload({ subject: "pbl.dev-1.config.put", data: Uint8Array.of(4) });
    expect(store.uploads).toEqual([]);
  });
});
