import { describe, it, expect } from "vitest";
import { createNodeJSLogger, isLogLevel, type LogLevel } from "./logger.js";

function capture() {
  const lines: Array<[LogLevel, string]> = [];
  return { lines, sink: (level: LogLevel, line: string) => lines.push([level, line]) };
}

describe("createNodeJSLogger", () => {
  it("should write one JSON line with service, prefix, context and message", () => {
    const { lines, sink } = capture();
    const factory = createNodeJSLogger("shelf-gateway", { sink });

    factory.get("shelf-gateway:http").info({ port: 8000 }, "shelf-gateway:http:start - Listening");

    expect(lines).toEqual([
      [
        "info",
        '{"level":"info","service":"shelf-gateway","prefix":"shelf-gateway:http","port":8000,"msg":"shelf-gateway:http:start - Listening"}',
      ],
    ]);
  });

  it("should omit the prefix on the root logger", () => {
    const { lines, sink } = capture();
    createNodeJSLogger("svc", { sink }).warn({}, "careful");
    expect(lines).toEqual([["warn", '{"level":"warn","service":"svc","msg":"careful"}']]);
  });

  it("should drop entries below the configured level", () => {
    const { lines, sink } = capture();
    const log = createNodeJSLogger("svc", { level: "warn", sink });

    log.debug({}, "a");
    log.info({}, "b");
    log.warn({}, "c");
    log.error({}, "d");

    expect(lines.map(([level]) => level)).toEqual(["warn", "error"]);
  });

  it("should recognise level names", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel("toString")).toBe(false);
  });
});
