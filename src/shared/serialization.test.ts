import { describe, expect, it } from "vitest";
import {
  decodeClientFrame,
  decodeServerFrame,
  encodeClientFrame,
  encodeServerFrame,
} from "./serialization.js";

describe("serialization", () => {
  it("binary mode produces binary frames", () => {
    const frame = encodeServerFrame({ type: "clock-sync", seq: 1, serverTime: 5 }, "binary");
    expect(frame.binary).toBe(true);
    expect(decodeServerFrame(frame)).toEqual({ type: "clock-sync", seq: 1, serverTime: 5 });
  });

  it("json mode produces text frames", () => {
    const frame = encodeServerFrame({ type: "kicked", reason: "bye" }, "json");
    expect(frame).toEqual({ binary: false, data: '{"type":"kicked","reason":"bye"}' });
  });

  it("accepts binary client frames regardless of mode", () => {
    const whoami = encodeClientFrame({ type: "whoami", role: 1 }, "binary");
    const input = encodeClientFrame({ type: "player-input", seq: 2, dx: 1, dy: 0 }, "json");
    expect(decodeClientFrame(whoami)).toEqual({ type: "whoami", role: 1 });
    expect(decodeClientFrame(input)).toEqual({ type: "player-input", seq: 2, dx: 1, dy: 0 });
  });

  it("throws on malformed text frames", () => {
    expect(() => decodeClientFrame({ binary: false, data: "not json" })).toThrow(SyntaxError);
    expect(() => decodeClientFrame({ binary: false, data: '{"type":"teleport"}' })).toThrow(
      "Malformed client message: teleport",
    );
    expect(() => decodeServerFrame({ binary: false, data: "[]" })).toThrow(
      "Malformed server message: undefined",
    );
  });
});
