import { describe, it, expect } from "vitest";
import {
  ackWildcard,
  commandSubject,
  decodeAckFrame,
  decodePositionUpload,
  decodeRegistration,
  deviceWildcard,
  encodeAck,
  encodeCommand,
  isSubjectToken,
  parseDeviceSubject,
  registerSubject,
} from "./wire.js";
import { GatewayError } from "./errors.js";

const DEVICE = "AA:BB:CC:DD:EE:FF";

describe("subjects", () => {
  it("should build command subjects from prefix, device, channel and command", () => {
    expect(commandSubject("pbl", DEVICE, "light", "set")).toBe("pbl.AA:BB:CC:DD:EE:FF.light.set");
    expect(commandSubject("pbl", DEVICE, "config", "create_Position")).toBe(
      "pbl.AA:BB:CC:DD:EE:FF.config.create_Position",
    );
  });

  it("should build subscription wildcards", () => {
    expect(ackWildcard("pbl", "light")).toBe("pbl.*.light.ack");
    expect(deviceWildcard("pbl", "config", "put")).toBe("pbl.*.config.put");
    expect(registerSubject("pbl")).toBe("pbl.register");
  });

  it("should reject device ids that are not a single subject token", () => {
    expect(() => commandSubject("pbl", "dev.1", "light", "set")).toThrow(GatewayError);
    expect(() => commandSubject("pbl", "dev*", "light", "set")).toThrow(/Invalid device id "dev\*"/);
    expect(isSubjectToken("dev 1")).toBe(false);
    expect(isSubjectToken("")).toBe(false);
    expect(isSubjectToken(DEVICE)).toBe(true);
  });

  it("should split device subjects", () => {
    expect(parseDeviceSubject("pbl", "pbl.dev-1.config.offline")).toEqual({
      deviceId: "dev-1",
      rest: ["config", "offline"],
    });
    expect(parseDeviceSubject("pbl", "other.dev-1.config.offline")).toBeNull();
    expect(parseDeviceSubject("pbl", "pbl.")).toBeNull();
  });
});

describe("payloads", () => {
  it("should prefix the command body with the ack id", () => {
    expect(encodeCommand(7, Uint8Array.of(1, 2, 3))).toEqual(Uint8Array.of(7, 1, 2, 3));
    expect(encodeCommand(255, new Uint8Array(0))).toEqual(Uint8Array.of(255));
  });

  it("should decode an ack frame from subject and first byte", () => {
    const decoded = decodeAckFrame("pbl", { subject: `pbl.${DEVICE}.light.ack`, data: Uint8Array.of(42, 9) });
    expect(decoded).toEqual({ success: true, data: { deviceId: DEVICE, ackId: 42 } });
  });

  it("should round-trip encodeAck through decodeAckFrame", () => {
    const decoded = decodeAckFrame("pbl", { subject: "pbl.dev-1.config.ack", data: encodeAck(0) });
    expect(decoded).toEqual({ success: true, data: { deviceId: "dev-1", ackId: 0 } });
  });

  it("should reject an empty ack payload", () => {
    expect(decodeAckFrame("pbl", { subject: "pbl.dev-1.light.ack", data: new Uint8Array(0) })).toEqual({
      success: false,
      reason: "Empty ack payload",
    });
  });

  it("should reject subjects that are not acks", () => {
    expect(decodeAckFrame("pbl", { subject: "pbl.dev-1.light.set", data: Uint8Array.of(1) })).toEqual({
      success: false,
      reason: 'Unexpected ack subject "pbl.dev-1.light.set"',
    });
    expect(decodeAckFrame("pbl", { subject: "xyz.dev-1.light.ack", data: Uint8Array.of(1) }).success).toBe(false);
  });

  it("should decode a position upload", () => {
    const decoded = decodePositionUpload("pbl", { subject: "pbl.dev-1.config.put", data: Uint8Array.of(3, 10, 11) });
    expect(decoded).toEqual({ success: true, data: { deviceId: "dev-1", positionId: 3, leds: [10, 11] } });
  });

  it("should reject uploads without LEDs", () => {
    expect(decodePositionUpload("pbl", { subject: "pbl.dev-1.config.put", data: Uint8Array.of(3) }).success).toBe(
      false,
    );
    expect(decodePositionUpload("pbl", { subject: "pbl.dev-1.config.put", data: new Uint8Array(0) })).toEqual({
      success: false,
      reason: "Empty upload payload",
    });
  });

  it("should decode registrations and trim whitespace", () => {
    const data = new TextEncoder().encode("dev-1\n");
    expect(decodeRegistration({ subject: "pbl.register", data })).toEqual({
      success: true,
      data: { deviceId: "dev-1" },
    });
    expect(decodeRegistration({ subject: "pbl.register", data: new TextEncoder().encode("a.b") }).success).toBe(false);
  });
});
