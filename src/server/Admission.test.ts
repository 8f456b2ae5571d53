import { beforeEach, describe, expect, it, vi } from "vitest";
import { MatchClient } from "../client/MatchClient.js";
import { DEFAULT_SPAWN, WHO_AM_I_UNKNOWN } from "../config/constants.js";
import { ManualClock } from "../core/Time.js";
import { Channel } from "../shared/Channel.js";
import { encodeClientFrame } from "../shared/serialization.js";
import { LocalConnection } from "../transport/LocalConnection.js";
import { type AdmissionContext, type AdmissionState, admitConnection } from "./Admission.js";
import { CLOSE_KICKED } from "./Player.js";
import { PlayerRegistry } from "./PlayerRegistry.js";
import type { ConnectionEvent } from "./PlayerStream.js";

function setup(capacity = 4) {
  const clock = new ManualClock();
  const registry = new PlayerRegistry(capacity);
  const queue = new Channel<ConnectionEvent>(16);
  const tasks: Promise<void>[] = [];
  const states: AdmissionState[] = [];
  const ctx: AdmissionContext = {
    registry,
    queue,
    serialization: "binary",
    handshakeTimeoutMs: 50,
    clockSync: { samples: 2, timeoutMs: 100, clock },
    trackTask: (task) => tasks.push(task),
    onStateChange: (state) => states.push(state),
  };
  return { clock, registry, queue, tasks, states, ctx };
}

describe("admitConnection", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("admits a client that identifies and answers clock probes", async () => {
    const { clock, registry, tasks, states, ctx } = setup();
    const conn = new LocalConnection();
    const client = new MatchClient(conn.clientSide, { now: () => clock.wallNow() + 40 });
    await client.identify();

    const result = await admitConnection(conn.serverSide, ctx);

    expect(result.state).toBe("admitted");
    expect(states).toEqual(["awaiting-handshake", "validating", "admitted"]);
    expect(client.probesAnswered).toBe(2);
    expect(registry.playerCount).toBe(1);
    const player = registry.get(0);
    expect(player?.clockOffsetMs).toBe(40);
    expect(player?.position).toEqual(DEFAULT_SPAWN);
    expect(tasks).toHaveLength(1);
  });

  it("starts the receive task feeding the queue", async () => {
    const { clock, queue, tasks, ctx } = setup();
    const conn = new LocalConnection();
    const client = new MatchClient(conn.clientSide, { now: () => clock.wallNow() });
    await client.identify();
    await admitConnection(conn.serverSide, ctx);

    await client.send({ type: "player-input", seq: 1, dx: 0, dy: 1 });
    expect(await queue.recv()).toEqual({
      type: "message",
      playerId: 0,
      message: { type: "player-input", seq: 1, dx: 0, dy: 1 },
    });

    client.close();
    expect(await queue.recv()).toEqual({ type: "close", playerId: 0 });
    await Promise.all(tasks);
  });

  it("closes silently on a non-identification first frame", async () => {
    const { registry, states, ctx } = setup();
    const conn = new LocalConnection();
    const client = new MatchClient(conn.clientSide);
    await client.send({ type: "player-input", seq: 1, dx: 1, dy: 0 });

    const result = await admitConnection(conn.serverSide, ctx);

    expect(result).toEqual({ state: "rejected", reason: "not-whoami" });
    expect(states).toEqual(["awaiting-handshake", "rejected"]);
    expect(conn.closed).toBe(true);
    expect(conn.closeInfo).toEqual({ code: undefined, reason: undefined });
    expect(registry.playerCount).toBe(0);
    await client.done;
    expect(client.received).toEqual([]);
    expect(client.probesAnswered).toBe(0);
  });

  it("rejects a peer that is not a game client", async () => {
    const { ctx } = setup();
    const conn = new LocalConnection();
    await new MatchClient(conn.clientSide).identify(WHO_AM_I_UNKNOWN);
    expect(await admitConnection(conn.serverSide, ctx)).toEqual({ state: "rejected", reason: "not-client" });
  });

  it("rejects a text handshake", async () => {
    const { ctx } = setup();
    const conn = new LocalConnection();
    await conn.clientSide.sink.send(encodeClientFrame({ type: "whoami", role: 1 }, "json"));
    expect(await admitConnection(conn.serverSide, ctx)).toEqual({ state: "rejected", reason: "not-binary" });
  });

  it("rejects garbage bytes", async () => {
    const { ctx } = setup();
    const conn = new LocalConnection();
    await conn.clientSide.sink.send({ binary: true, data: new ArrayBuffer(3) });
    expect(await admitConnection(conn.serverSide, ctx)).toEqual({ state: "rejected", reason: "undecodable" });
  });

  it("rejects a connection that closes before identifying", async () => {
    const { ctx } = setup();
    const conn = new LocalConnection();
    conn.close();
    expect(await admitConnection(conn.serverSide, ctx)).toEqual({
      state: "rejected",
      reason: "stream-closed",
    });
  });

  it("rejects a connection that stays silent past the handshake timeout", async () => {
    const { registry, states, ctx } = setup();
    const conn = new LocalConnection();

    const result = await admitConnection(conn.serverSide, ctx);

    expect(result).toEqual({ state: "rejected", reason: "handshake-timeout" });
    expect(states).toEqual(["awaiting-handshake", "rejected"]);
    expect(conn.closed).toBe(true);
    expect(registry.playerCount).toBe(0);
  });

  it("admits the next client after a silent one times out", async () => {
    const { clock, registry, ctx } = setup();
    const silent = new LocalConnection();
    const valid = new LocalConnection();
    await new MatchClient(valid.clientSide, { now: () => clock.wallNow() }).identify();

    expect((await admitConnection(silent.serverSide, ctx)).state).toBe("rejected");
    expect((await admitConnection(valid.serverSide, ctx)).state).toBe("admitted");
    expect(registry.playerCount).toBe(1);
  });

  it("kicks a valid client when every id is taken", async () => {
    const { clock, registry, ctx } = setup(1);
    const first = new LocalConnection();
    await new MatchClient(first.clientSide, { now: () => clock.wallNow() }).identify();
    await admitConnection(first.serverSide, ctx);

    const second = new LocalConnection();
    const client = new MatchClient(second.clientSide, { now: () => clock.wallNow() });
    await client.identify();
    const result = await admitConnection(second.serverSide, ctx);

    expect(result).toEqual({ state: "rejected", reason: "match-full" });
    expect(await client.waitFor("kicked")).toEqual({ type: "kicked", reason: "Match is full" });
    expect(second.closeInfo).toEqual({ code: CLOSE_KICKED, reason: "Match is full" });
    expect(registry.playerCount).toBe(1);
  });
});
