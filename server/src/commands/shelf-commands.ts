/**
 * Shelf commands: validate a request against the store, send the device
 * command through publish-and-wait, and update the store only after the
 * device acknowledged.
 *
 * Every operation resolves to a CommandOutcome whose status is the HTTP
 * status to answer with:
 *   200 done, 400 invalid, 404 unknown shelf/position/device,
 *   406 conflicts with stored state, 503 broker unreachable, 504 no ack in time
 */

import {
  commandSubject,
  parseColor,
  type AckErr,
  type AckResult,
  type DefaultAckClass,
} from "@shelflight/core";
import { resolveLogger, type Logger, type LoggerFactory, type PublishAndWaitParams } from "@shelflight/gateway";
import type { JsonShelfStore, StoredShelf } from "../store/json-shelf-store.js";
import type {
  CreateShelf,
  DeviceSelection,
  PositionSelection,
  RequestUpload,
  SetLeds,
  ShelfColor,
  ShelfPosition,
  ShelfSelection,
  TurnOn,
  UnsetLeds,
} from "./requests.js";

const SERVICE_NAME = "shelf-gateway:shelf-commands";

export const HttpStatus = {
  OK: 200,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  NOT_ACCEPTABLE: 406,
  INTERNAL_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
  GATEWAY_TIMEOUT: 504,
} as const;

export interface CommandOutcome {
  status: number;
  message: string;
  data?: unknown;
}

/** The part of ShelfGateway the commands need. */
export interface CommandGateway {
  readonly subjectPrefix: string;
  publishAndWait(params: PublishAndWaitParams<DefaultAckClass>): Promise<AckResult>;
}

export interface ShelfCommandsConfig {
  /** Wait for light and config acknowledgments */
  ackTimeoutMs: number;
  /** Wait for config.reset; devices clear their storage before answering */
  resetTimeoutMs: number;
}

export const defaultShelfCommandsConfig: ShelfCommandsConfig = {
  ackTimeoutMs: 5_000,
  resetTimeoutMs: 25_000,
};

type Channel = "light" | "config";

const CHANNEL_ACK_CLASS: Record<Channel, DefaultAckClass> = {
  light: "light_ack",
  config: "config_ack",
};

interface DeviceCommand {
  deviceId: string;
  channel: Channel;
  command: string;
  body: number[];
  timeoutMs?: number;
  signal?: AbortSignal;
}

function shelfNotFound(shelfNumber: number): CommandOutcome {
  return {
    status: HttpStatus.NOT_FOUND,
    message: `Shelf ${shelfNumber} was not found or has no device assigned.`,
  };
}

function deviceNotFound(deviceId: string): CommandOutcome {
  return { status: HttpStatus.NOT_FOUND, message: `Device ${deviceId} is not known.` };
}

function badColor(color: string): CommandOutcome {
  return { status: HttpStatus.BAD_REQUEST, message: `Color "${color}" does not match the format #RRGGBB.` };
}

function formatLeds(leds: readonly number[]): string {
  return `[${leds.join(", ")}]`;
}

export class ShelfCommands {
  private store: JsonShelfStore;
  private gateway: CommandGateway;
  private config: ShelfCommandsConfig;
  private log: Logger;

  constructor(params: {
    store: JsonShelfStore;
    gateway: CommandGateway;
    config?: Partial<ShelfCommandsConfig>;
    loggerFactory?: LoggerFactory;
  }) {
    this.store = params.store;
    this.gateway = params.gateway;
    this.config = { ...defaultShelfCommandsConfig, ...params.config };
    this.log = resolveLogger(params.loggerFactory, SERVICE_NAME);
  }

  // ── Light ──────────────────────────────────────────────────────────

  async turnOn(req: TurnOn, signal?: AbortSignal): Promise<CommandOutcome> {
    const shelf = this.store.getShelf(req.shelfNumber);
    if (!shelf) return this.report("turnOn", shelfNotFound(req.shelfNumber));
    const position = shelf.positions.find((p) => p.positionId === req.positionId);
    if (!position) return this.report("turnOn", this.positionNotFound(req));
    const rgb = parseColor(req.color);
    if (!rgb) return this.report("turnOn", badColor(req.color));

    const result = await this.send({
      deviceId: shelf.deviceId,
      channel: "light",
      command: "set",
      body: [...position.leds, ...rgb],
      signal,
    });
    if (!result.ok) return this.report("turnOn", this.failure(result, shelf.deviceId));
    return this.report("turnOn", {
      status: HttpStatus.OK,
      message: `Turned on LEDs ${formatLeds(position.leds)} of position ${req.positionId} on shelf ${req.shelfNumber} with color ${req.color}.`,
    });
  }

  async turnOff(req: PositionSelection, signal?: AbortSignal): Promise<CommandOutcome> {
    const shelf = this.store.getShelf(req.shelfNumber);
    if (!shelf) return this.report("turnOff", shelfNotFound(req.shelfNumber));
    const position = shelf.positions.find((p) => p.positionId === req.positionId);
    if (!position) return this.report("turnOff", this.positionNotFound(req));

    const result = await this.send({
      deviceId: shelf.deviceId,
      channel: "light",
      command: "unset",
      body: position.leds,
      signal,
    });
    if (!result.ok) return this.report("turnOff", this.failure(result, shelf.deviceId));
    return this.report("turnOff", {
      status: HttpStatus.OK,
      message: `Turned off LEDs ${formatLeds(position.leds)} of position ${req.positionId} on shelf ${req.shelfNumber}.`,
    });
  }

  async turnOnAll(req: ShelfColor, signal?: AbortSignal): Promise<CommandOutcome> {
    const deviceId = this.store.deviceForShelf(req.shelfNumber);
    if (deviceId === undefined) return this.report("turnOnAll", shelfNotFound(req.shelfNumber));
    const rgb = parseColor(req.color);
    if (!rgb) return this.report("turnOnAll", badColor(req.color));

    const result = await this.send({ deviceId, channel: "light", command: "allOn", body: [...rgb], signal });
    if (!result.ok) return this.report("turnOnAll", this.failure(result, deviceId));
    return this.report("turnOnAll", {
      status: HttpStatus.OK,
      message: `Turned on all positions on shelf ${req.shelfNumber} with color ${req.color}.`,
    });
  }

  async turnOffAll(req: ShelfSelection, signal?: AbortSignal): Promise<CommandOutcome> {
    const deviceId = this.store.deviceForShelf(req.shelfNumber);
    if (deviceId === undefined) return this.report("turnOffAll", shelfNotFound(req.shelfNumber));

    const result = await this.send({ deviceId, channel: "light", command: "allOff", body: [], signal });
    if (!result.ok) return this.report("turnOffAll", this.failure(result, deviceId));
    return this.report("turnOffAll", {
      status: HttpStatus.OK,
      message: `Turned off all positions on shelf ${req.shelfNumber}.`,
    });
  }

  async setLeds(req: SetLeds, signal?: AbortSignal): Promise<CommandOutcome> {
    if (!this.store.deviceExists(req.deviceId)) return this.report("setLeds", deviceNotFound(req.deviceId));
    const rgb = parseColor(req.color);
    if (!rgb) return this.report("setLeds", badColor(req.color));

    const result = await this.send({
      deviceId: req.deviceId,
      channel: "light",
      command: "set",
      body: [...req.leds, ...rgb],
      signal,
    });
    if (!result.ok) return this.report("setLeds", this.failure(result, req.deviceId));
    return this.report("setLeds", {
      status: HttpStatus.OK,
      message: `Set LEDs ${formatLeds(req.leds)} on device ${req.deviceId} with color ${req.color}.`,
    });
  }

  async unsetLeds(req: UnsetLeds, signal?: AbortSignal): Promise<CommandOutcome> {
    if (!this.store.deviceExists(req.deviceId)) return this.report("unsetLeds", deviceNotFound(req.deviceId));

    const result = await this.send({
      deviceId: req.deviceId,
      channel: "light",
      command: "unset",
      body: req.leds,
      signal,
    });
    if (!result.ok) return this.report("unsetLeds", this.failure(result, req.deviceId));
    return this.report("unsetLeds", {
      status: HttpStatus.OK,
      message: `Unset LEDs ${formatLeds(req.leds)} on device ${req.deviceId}.`,
    });
  }

  // ── Configuration ──────────────────────────────────────────────────

  /** Store-only: assigns an unused device to a new shelf number. */
  createShelf(req: CreateShelf): CommandOutcome {
    if (this.store.shelfExists(req.shelfNumber)) {
      return this.report("createShelf", {
        status: HttpStatus.NOT_ACCEPTABLE,
        message: `Shelf number ${req.shelfNumber} is already in use.`,
      });
    }
    const device = this.store.lookupDevice(req.deviceId);
    if (!device) return this.report("createShelf", deviceNotFound(req.deviceId));
    if (device.isUsed) {
      return this.report("createShelf", {
        status: HttpStatus.NOT_ACCEPTABLE,
        message: `Device ${req.deviceId} is already assigned to another shelf.`,
      });
    }
    if (!this.store.addShelf({ shelfNumber: req.shelfNumber, deviceId: req.deviceId })) {
      return this.report("createShelf", {
        status: HttpStatus.INTERNAL_ERROR,
        message: `Could not create shelf ${req.shelfNumber}.`,
      });
    }
    return this.report("createShelf", {
      status: HttpStatus.OK,
      message: `Created shelf ${req.shelfNumber} on device ${req.deviceId}.`,
      data: this.store.getShelf(req.shelfNumber),
    });
  }

  async createPosition(req: ShelfPosition, signal?: AbortSignal): Promise<CommandOutcome> {
    const deviceId = this.store.deviceForShelf(req.shelfNumber);
    if (deviceId === undefined) return this.report("createPosition", shelfNotFound(req.shelfNumber));
    if (this.store.positionExists(req.shelfNumber, req.positionId)) {
      return this.report("createPosition", {
        status: HttpStatus.NOT_ACCEPTABLE,
        message: `Position ${req.positionId} already exists on shelf ${req.shelfNumber}; use updatePosition to change it.`,
      });
    }
    if (this.store.ledsInUse(req.shelfNumber, req.leds)) return this.report("createPosition", this.ledsTaken(req));

    const result = await this.send({
      deviceId,
      channel: "config",
      command: "create_Position",
      body: [req.positionId, ...req.leds],
      signal,
    });
    if (!result.ok) {
      return this.report(
        "createPosition",
        this.failure(result, deviceId, "It is not guaranteed that the position was created."),
      );
    }
    if (!this.store.addPosition(req.shelfNumber, { positionId: req.positionId, leds: req.leds })) {
      return this.report("createPosition", this.ackedButNotStored(req, "added"));
    }
    return this.report("createPosition", {
      status: HttpStatus.OK,
      message: `Added position ${req.positionId} with LEDs ${formatLeds(req.leds)} on shelf ${req.shelfNumber}.`,
    });
  }

  async updatePosition(req: ShelfPosition, signal?: AbortSignal): Promise<CommandOutcome> {
    const deviceId = this.store.deviceForShelf(req.shelfNumber);
    if (deviceId === undefined) return this.report("updatePosition", shelfNotFound(req.shelfNumber));
    if (!this.store.positionExists(req.shelfNumber, req.positionId)) {
      return this.report("updatePosition", {
        status: HttpStatus.NOT_ACCEPTABLE,
        message: `Position ${req.positionId} does not exist on shelf ${req.shelfNumber}; use createPosition to add it.`,
      });
    }
    if (this.store.ledsInUse(req.shelfNumber, req.leds, req.positionId)) {
      return this.report("updatePosition", this.ledsTaken(req));
    }

    const result = await this.send({
      deviceId,
      channel: "config",
      command: "update_Position",
      body: [req.positionId, ...req.leds],
      signal,
    });
    if (!result.ok) {
      return this.report(
        "updatePosition",
        this.failure(result, deviceId, "It is not guaranteed that the position was updated."),
      );
    }
    if (!this.store.updatePosition(req.shelfNumber, { positionId: req.positionId, leds: req.leds })) {
      return this.report("updatePosition", this.ackedButNotStored(req, "updated"));
    }
    return this.report("updatePosition", {
      status: HttpStatus.OK,
      message: `Updated position ${req.positionId} on shelf ${req.shelfNumber} to LEDs ${formatLeds(req.leds)}.`,
    });
  }

  async deletePosition(req: PositionSelection, signal?: AbortSignal): Promise<CommandOutcome> {
    const deviceId = this.store.deviceForShelf(req.shelfNumber);
    if (deviceId === undefined) return this.report("deletePosition", shelfNotFound(req.shelfNumber));
    if (!this.store.positionExists(req.shelfNumber, req.positionId)) {
      return this.report("deletePosition", {
        status: HttpStatus.NOT_ACCEPTABLE,
        message: `Position ${req.positionId} does not exist on shelf ${req.shelfNumber}.`,
      });
    }

    const result = await this.send({
      deviceId,
      channel: "config",
      command: "delete_Position",
      body: [req.positionId],
      signal,
    });
    if (!result.ok) {
      return this.report(
        "deletePosition",
        this.failure(result, deviceId, "It is not guaranteed that the position was deleted."),
      );
    }
    if (!this.store.deletePosition(req.shelfNumber, req.positionId)) {
      return this.report("deletePosition", this.ackedButNotStored(req, "deleted"));
    }
    return this.report("deletePosition", {
      status: HttpStatus.OK,
      message: `Deleted position ${req.positionId} on shelf ${req.shelfNumber}.`,
    });
  }

  /** Resets the shelf's device, then removes the shelf and frees the device. */
  async deleteShelf(req: ShelfSelection, signal?: AbortSignal): Promise<CommandOutcome> {
    const deviceId = this.store.deviceForShelf(req.shelfNumber);
    if (deviceId === undefined) return this.report("deleteShelf", shelfNotFound(req.shelfNumber));

    const result = await this.send({
      deviceId,
      channel: "config",
      command: "reset",
      body: [],
      timeoutMs: this.config.resetTimeoutMs,
      signal,
    });
    if (!result.ok) {
      return this.report(
        "deleteShelf",
        this.failure(result, deviceId, "It is not guaranteed that the shelf was deleted."),
      );
    }
    if (!this.store.deleteShelf(req.shelfNumber)) {
      return this.report("deleteShelf", {
        status: HttpStatus.NOT_ACCEPTABLE,
        message: `Device ${deviceId} acknowledged the reset but shelf ${req.shelfNumber} could not be deleted.`,
      });
    }
    return this.report("deleteShelf", { status: HttpStatus.OK, message: `Deleted shelf ${req.shelfNumber}.` });
  }

  async resetDevice(req: DeviceSelection, signal?: AbortSignal): Promise<CommandOutcome> {
    if (!this.store.deviceExists(req.deviceId)) return this.report("resetDevice", deviceNotFound(req.deviceId));

    const result = await this.send({
      deviceId: req.deviceId,
      channel: "config",
      command: "reset",
      body: [],
      timeoutMs: this.config.resetTimeoutMs,
      signal,
    });
    if (!result.ok) {
      return this.report(
        "resetDevice",
        this.failure(result, req.deviceId, "It is not guaranteed that all positions were reset."),
      );
    }
    return this.report("resetDevice", {
      status: HttpStatus.OK,
      message: `Reset all positions on device ${req.deviceId}.`,
    });
  }

  /**
   * Prepares an empty shelf for the device and asks the device to upload its
   * stored positions. The uploads arrive on config.put and are stored by
   * device presence handling.
   */
  async requestUpload(req: RequestUpload, signal?: AbortSignal): Promise<CommandOutcome> {
    const { deviceId, shelfNumber } = req;
    const device = this.store.lookupDevice(deviceId);
    if (!device) return this.report("requestUpload", deviceNotFound(deviceId));

    const assigned = this.store.deviceForShelf(shelfNumber);
    if (assigned !== undefined && assigned !== deviceId) {
      return this.report("requestUpload", {
        status: HttpStatus.BAD_REQUEST,
        message: `Shelf ${shelfNumber} is assigned to device ${assigned}, not ${deviceId}.`,
      });
    }
    if (assigned === undefined && device.isUsed) {
      return this.report("requestUpload", {
        status: HttpStatus.NOT_ACCEPTABLE,
        message: `Device ${deviceId} is already assigned to another shelf.`,
      });
    }

    if (assigned === deviceId) this.store.deleteShelf(shelfNumber);
    if (!this.store.addShelf({ shelfNumber, deviceId })) {
      return this.report("requestUpload", {
        status: HttpStatus.INTERNAL_ERROR,
        message: `Could not prepare shelf ${shelfNumber} for the upload from device ${deviceId}.`,
      });
    }

    const result = await this.send({ deviceId, channel: "config", command: "get", body: [], signal });
    if (!result.ok) {
      return this.report(
        "requestUpload",
        this.failure(result, deviceId, "It is not guaranteed that all positions were uploaded."),
      );
    }
    return this.report("requestUpload", {
      status: HttpStatus.OK,
      message: `Asked device ${deviceId} to upload its positions into shelf ${shelfNumber}.`,
    });
  }

  /** Pushes every stored position of the shelf to its device, one at a time. */
  async loadDevice(req: ShelfSelection, signal?: AbortSignal): Promise<CommandOutcome> {
    const shelf = this.store.getShelf(req.shelfNumber);
    if (!shelf) return this.report("loadDevice", shelfNotFound(req.shelfNumber));

    const failed: number[] = [];
    let unreachable = false;
    for (const position of shelf.positions) {
      const result = await this.send({
        deviceId: shelf.deviceId,
        channel: "config",
        command: "update_Position",
        body: [position.positionId, ...position.leds],
        signal,
      });
      if (!result.ok) {
        failed.push(position.positionId);
        if (result.error.code === "TRANSPORT_UNAVAILABLE") unreachable = true;
      }
    }

    if (failed.length > 0) {
      return this.report("loadDevice", {
        status: unreachable ? HttpStatus.SERVICE_UNAVAILABLE : HttpStatus.GATEWAY_TIMEOUT,
        message: `Device ${shelf.deviceId} did not acknowledge positions ${formatLeds(failed)}. It is not guaranteed that all positions were loaded.`,
        data: { failed },
      });
    }
    return this.report("loadDevice", {
      status: HttpStatus.OK,
      message: `Loaded ${shelf.positions.length} positions to device ${shelf.deviceId}.`,
      data: { loaded: shelf.positions.map((p) => p.positionId) },
    });
  }

  // ── Queries ────────────────────────────────────────────────────────

  listShelves(): CommandOutcome {
    const shelves: StoredShelf[] = this.store.listShelves();
    return { status: HttpStatus.OK, message: `${shelves.length} shelves.`, data: shelves };
  }

  getShelf(shelfNumber: number): CommandOutcome {
    const shelf = this.store.getShelf(shelfNumber);
    if (!shelf) return shelfNotFound(shelfNumber);
    return { status: HttpStatus.OK, message: `Shelf ${shelfNumber}.`, data: shelf };
  }

  listUnusedDevices(): CommandOutcome {
    const devices = this.store.listUnusedDevices();
    if (devices.length === 0) {
      return { status: HttpStatus.NOT_FOUND, message: "There are no unused devices for a new shelf." };
    }
    return { status: HttpStatus.OK, message: `${devices.length} unused devices.`, data: devices };
  }

  // ── Private ────────────────────────────────────────────────────────

  private send(cmd: DeviceCommand): Promise<AckResult> {
    return this.gateway.publishAndWait({
      timeoutMs: cmd.timeoutMs ?? this.config.ackTimeoutMs,
      deviceId: cmd.deviceId,
      ackClass: CHANNEL_ACK_CLASS[cmd.channel],
      subject: commandSubject(this.gateway.subjectPrefix, cmd.deviceId, cmd.channel, cmd.command),
      payload: Uint8Array.from(cmd.body),
      signal: cmd.signal,
    });
  }

  private failure(result: AckErr, deviceId: string, caveat?: string): CommandOutcome {
    const suffix = caveat ? ` ${caveat}` : "";
    if (result.error.code === "TIMEOUT") {
      return {
        status: HttpStatus.GATEWAY_TIMEOUT,
        message: `Timeout warning! Device ${deviceId} did not respond in time.${suffix}`,
        data: { code: result.error.code },
      };
    }
    return {
      status: HttpStatus.SERVICE_UNAVAILABLE,
      message: `Device ${deviceId} is unreachable: ${result.error.message}${suffix}`,
      data: { code: result.error.code },
    };
  }

  private positionNotFound(req: PositionSelection): CommandOutcome {
    return {
      status: HttpStatus.NOT_FOUND,
      message: `Position ${req.positionId} was not found on shelf ${req.shelfNumber}.`,
    };
  }

  private ledsTaken(req: ShelfPosition): CommandOutcome {
    return {
      status: HttpStatus.NOT_ACCEPTABLE,
      message: `One or more of LEDs ${formatLeds(req.leds)} already belong to another position on shelf ${req.shelfNumber}.`,
    };
  }

  private ackedButNotStored(req: PositionSelection, action: "added" | "updated" | "deleted"): CommandOutcome {
    return {
      status: HttpStatus.NOT_ACCEPTABLE,
      message: `Device acknowledged but position ${req.positionId} on shelf ${req.shelfNumber} could not be ${action}.`,
    };
  }

  private report(method: string, outcome: CommandOutcome): CommandOutcome {
    const ctx = { status: outcome.status };
    if (outcome.status === HttpStatus.OK) {
      this.log.info?.(ctx, `${SERVICE_NAME}:${method} - ${outcome.message}`);
    } else {
      this.log.warn?.(ctx, `${SERVICE_NAME}:${method} - ${outcome.message}`);
    }
    return outcome;
  }
}
