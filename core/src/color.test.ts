import { describe, it, expect } from "vitest";
import { parseColor } from "./color.js";

describe("parseColor", () => {
  it("should parse #RRGGBB into three bytes", () => {
    expect(parseColor("#FF8000")).toEqual(Uint8Array.of(255, 128, 0));
  });

  it("should be case-insensitive", () => {
    expect(parseColor("#ff8000")).toEqual(Uint8Array.of(255, 128, 0));
    expect(parseColor("#aBcDeF")).toEqual(Uint8Array.of(0xab, 0xcd, 0xef));
  });

  it("should ignore characters after the first seven", () => {
    expect(parseColor("#00ff00zz")).toEqual(Uint8Array.of(0, 255, 0));
  });

  it("should return null for anything else", () => {
    expect(parseColor("FF8000")).toBeNull();
    expect(parseColor("#FF80")).toBeNull();
    expect(parseColor("#GG0000")).toBeNull();
    expect(parseColor(" #FF8000")).toBeNull();
    expect(parseColor("")).toBeNull();
  });
});
