import { describe, expect, it } from "vitest";
import { parseClientMessage, parseServerMessage } from "./protocol.js";

describe("parseClientMessage", () => {
  it("copies only known fields", () => {
    expect(parseClientMessage({ type: "whoami", role: 1, extra: true })).toEqual({
      type: "whoami",
      role: 1,
    });
  });

  it("rejects non-objects and missing fields", () => {
    expect(() => parseClientMessage(null)).toThrow("Client message is not an object");
    expect(() => parseClientMessage({ type: "clock-sync-reply", seq: 1, serverTime: 2 })).toThrow(
      "Malformed client message: clock-sync-reply",
    );
  });

  it("rejects non-finite numbers", () => {
    expect(() => parseClientMessage({ type: "player-input", seq: 1, dx: null, dy: 0 })).toThrow(
      "Malformed client message: player-input",
    );
  });
});

describe("parseServerMessage", () => {
  it("requires a complete position on player-start", () => {
    const base = { type: "player-start", entityId: 0, range: 500, visibilityRange: 500, seed: 1 };
    expect(() => parseServerMessage({ ...base, position: { x: 1 } })).toThrow(
      "Malformed server message: player-start",
    );
    expect(parseServerMessage({ ...base, position: { x: 1, y: 2 } })).toEqual({
      ...base,
      position: { x: 1, y: 2 },
    });
  });
});
