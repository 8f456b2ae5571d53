import { describe, expect, it } from "vitest";
import { LocalConnection } from "./LocalConnection.js";

describe("LocalConnection", () => {
  it("carries frames from client to server and back", async () => {
    const conn = new LocalConnection("pair");
    await conn.clientSide.sink.send({ binary: false, data: "ping" });
    expect(await conn.serverSide.stream.next()).toEqual({ binary: false, data: "ping" });

    await conn.serverSide.sink.send({ binary: false, data: "pong" });
    expect(await conn.clientSide.stream.next()).toEqual({ binary: false, data: "pong" });
  });

  it("closing one side ends both streams after buffered frames", async () => {
    const conn = new LocalConnection();
    await conn.serverSide.sink.send({ binary: false, data: "last" });
    conn.serverSide.sink.close(4001, "kicked");

    expect(conn.closeInfo).toEqual({ code: 4001, reason: "kicked" });
    expect(conn.clientSide.sink.closed).toBe(true);
    expect(await conn.clientSide.stream.next()).toEqual({ binary: false, data: "last" });
    expect(await conn.clientSide.stream.next()).toBeNull();
    expect(await conn.serverSide.stream.next()).toBeNull();
  });

  it("keeps the first close code", () => {
    const conn = new LocalConnection();
    conn.clientSide.sink.close();
    conn.serverSide.sink.close(1011, "later");
    expect(conn.closeInfo).toEqual({ code: undefined, reason: undefined });
  });

  it("rejects sends after close", async () => {
    const conn = new LocalConnection("gone");
    conn.close();
    await expect(conn.clientSide.sink.send({ binary: false, data: "x" })).rejects.toThrow(
      "gone: connection closed",
    );
  });

  it("failNextServerSend fails exactly one server send", async () => {
    const conn = new LocalConnection();
    conn.failNextServerSend = new Error("socket reset");
    await expect(conn.serverSide.sink.send({ binary: false, data: "a" })).rejects.toThrow(
      "socket reset",
    );
    await conn.serverSide.sink.send({ binary: false, data: "b" });
    expect(await conn.clientSide.stream.next()).toEqual({ binary: false, data: "b" });
  });

  it("a timed-out read leaves the next frame in place", async () => {
    const conn = new LocalConnection();
    await expect(conn.serverSide.stream.next(AbortSignal.abort(new Error("timeout")))).rejects.toThrow(
      "timeout",
    );
    await conn.clientSide.sink.send({ binary: false, data: "late" });
    expect(await conn.serverSide.stream.next()).toEqual({ binary: false, data: "late" });
  });
});
