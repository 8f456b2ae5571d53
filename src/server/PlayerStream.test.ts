import { beforeEach, describe, expect, it, vi } from "vitest";
import { Channel } from "../shared/Channel.js";
import { encodeClientFrame } from "../shared/serialization.js";
import { LocalConnection } from "../transport/LocalConnection.js";
import type { FrameStream } from "../transport/Transport.js";
import { type ConnectionEvent, runPlayerStream } from "./PlayerStream.js";

describe("runPlayerStream", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("forwards messages in order, then one close event", async () => {
    const conn = new LocalConnection();
    const queue = new Channel<ConnectionEvent>(8);
    await conn.clientSide.sink.send(encodeClientFrame({ type: "player-input", seq: 1, dx: 1, dy: 0 }, "binary"));
    await conn.clientSide.sink.send(encodeClientFrame({ type: "chat", text: "gg" }, "json"));
    conn.close();

    await runPlayerStream(4, conn.serverSide.stream, queue);

    expect(queue.drain()).toEqual([
      { type: "message", playerId: 4, message: { type: "player-input", seq: 1, dx: 1, dy: 0 } },
      { type: "message", playerId: 4, message: { type: "chat", text: "gg" } },
      { type: "close", playerId: 4 },
    ]);
  });

  it("skips undecodable frames", async () => {
    const conn = new LocalConnection();
    const queue = new Channel<ConnectionEvent>(8);
    await conn.clientSide.sink.send({ binary: false, data: "{oops" });
    await conn.clientSide.sink.send(encodeClientFrame({ type: "chat", text: "ok" }, "json"));
    conn.close();

    await runPlayerStream(0, conn.serverSide.stream, queue);

    expect(queue.drain()).toEqual([
      { type: "message", playerId: 0, message: { type: "chat", text: "ok" } },
      { type: "close", playerId: 0 },
    ]);
  });

  it("reports close when the stream fails", async () => {
    const queue = new Channel<ConnectionEvent>(8);
    const broken: FrameStream = {
      next: () => Promise.reject(new Error("ECONNRESET")),
    };
    await runPlayerStream(2, broken, queue);
    expect(queue.drain()).toEqual([{ type: "close", playerId: 2 }]);
  });

  it("waits for room in a full queue", async () => {
    const conn = new LocalConnection();
    const queue = new Channel<ConnectionEvent>(1);
    await conn.clientSide.sink.send(encodeClientFrame({ type: "chat", text: "a" }, "json"));
    await conn.clientSide.sink.send(encodeClientFrame({ type: "chat", text: "b" }, "json"));
    conn.close();

    const task = runPlayerStream(1, conn.serverSide.stream, queue);
    const seen: ConnectionEvent[] = [];
    for (let event = await queue.recv(); event; event = await queue.recv()) {
      seen.push(event);
      if (event.type === "close") break;
    }
    await task;
    expect(seen.map((e) => e.type)).toEqual(["message", "message", "close"]);
  });

  it("exits quietly once the queue is closed", async () => {
    const conn = new LocalConnection();
    const queue = new Channel<ConnectionEvent>(1);
    queue.close();
    await conn.clientSide.sink.send(encodeClientFrame({ type: "chat", text: "late" }, "json"));

    await runPlayerStream(3, conn.serverSide.stream, queue);
    expect(queue.drain()).toEqual([]);
  });
});
