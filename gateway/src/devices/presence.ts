/**
 * Device presence: announcements, offline notices and position uploads that
 * devices send without being asked.
 *
 *   <prefix>.register               body = device id       → add or mark online
 *   <prefix>.<deviceId>.config.offline                     → mark offline
 *   <prefix>.<deviceId>.config.put  body = [posId, ...leds] → store uploaded position
 */

import {
  decodePositionUpload,
  decodeRegistration,
  deviceWildcard,
  parseDeviceSubject,
  registerSubject,
  type InboundMessage,
  type PositionUpload,
} from "@shelflight/core";
import { resolveLogger, type Logger, type LoggerFactory } from "../logger.js";
import type { InboundRoute } from "../transport/session.js";

const SERVICE_NAME = "shelf-gateway:device-presence";

export interface DeviceRecord {
  deviceId: string;
  /** Assigned to a shelf */
  isUsed: boolean;
  isOnline: boolean;
}

/** Read/update access to known devices. */
export interface DeviceDirectory {
  lookupDevice(deviceId: string): DeviceRecord | undefined;
  deviceExists(deviceId: string): boolean;
  markOnline(deviceId: string, online: boolean): void;
}

export type UploadOutcome = "added" | "no-shelf" | "conflict";

export interface PresenceStore extends DeviceDirectory {
  /** Returns false if the device already exists. */
  addDevice(record: DeviceRecord): boolean;
  /** Stores a position uploaded by a device into the shelf assigned to it. */
  addUploadedPosition(upload: PositionUpload): UploadOutcome;
}

export class DevicePresence {
  private store: PresenceStore;
  private subjectPrefix: string;
  private log: Logger;

  constructor(params: { store: PresenceStore; subjectPrefix: string; loggerFactory?: LoggerFactory }) {
    this.store = params.store;
    this.subjectPrefix = params.subjectPrefix;
    this.log = resolveLogger(params.loggerFactory, SERVICE_NAME);
  }

  /** Subscriptions for the transport session. */
  routes(): InboundRoute[] {
    return [
      {
        name: "presence:register",
        subject: registerSubject(this.subjectPrefix),
        handle: (message) => this.onRegister(message),
      },
      {
        name: "presence:offline",
        subject: deviceWildcard(this.subjectPrefix, "config", "offline"),
        handle: (message) => this.onOffline(message),
      },
      {
        name: "presence:upload",
        subject: deviceWildcard(this.subjectPrefix, "config", "put"),
        handle: (message) => this.onPositionUpload(message),
      },
    ];
  }

  onRegister(message: InboundMessage): void {
    const decoded = decodeRegistration(message);
    if (!decoded.success) {
      this.log.warn?.({ subject: message.subject, reason: decoded.reason }, `${SERVICE_NAME}:onRegister - Dropping announcement`);
      return;
    }

    const { deviceId } = decoded.data;
    if (this.store.deviceExists(deviceId)) {
      this.store.markOnline(deviceId, true);
      this.log.debug?.({ deviceId }, `${SERVICE_NAME}:onRegister - Device back online`);
      return;
    }

    if (this.store.addDevice({ deviceId, isUsed: false, isOnline: true })) {
      this.log.info?.({ deviceId }, `${SERVICE_NAME}:onRegister - Added device`);
    } else {
      this.log.warn?.({ deviceId }, `${SERVICE_NAME}:onRegister - Could not add device`);
    }
  }

  onOffline(message: InboundMessage): void {
    const parts = parseDeviceSubject(this.subjectPrefix, message.subject);
    if (!parts) {
      this.log.warn?.({ subject: message.subject }, `${SERVICE_NAME}:onOffline - Unexpected subject`);
      return;
    }
    if (!this.store.deviceExists(parts.deviceId)) {
      this.log.debug?.({ deviceId: parts.deviceId }, `${SERVICE_NAME}:onOffline - Unknown device`);
      return;
    }
    this.store.markOnline(parts.deviceId, false);
    this.log.info?.({ deviceId: parts.deviceId }, `${SERVICE_NAME}:onOffline - Device disconnected`);
  }

  onPositionUpload(message: InboundMessage): void {
    const decoded = decodePositionUpload(this.subjectPrefix, message);
    if (!decoded.success) {
      this.log.warn?.({ subject: message.subject, reason: decoded.reason }, `${SERVICE_NAME}:onPositionUpload - Dropping upload`);
      return;
    }

    const upload = decoded.data;
    const outcome = this.store.addUploadedPosition(upload);
    if (outcome === "added") {
      this.log.info?.({ ...upload }, `${SERVICE_NAME}:onPositionUpload - Added position`);
    } else if (outcome === "no-shelf") {
      this.log.warn?.({ deviceId: upload.deviceId }, `${SERVICE_NAME}:onPositionUpload - No shelf assigned to device`);
    } else {
      this.log.warn?.({ ...upload }, `${SERVICE_NAME}:onPositionUpload - Position id or LEDs already in use`);
    }
  }
}
