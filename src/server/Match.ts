import { FAN_IN_CAPACITY } from "../config/constants.js";
import type { MatchConfig } from "../config/matchConfig.js";
import { type Clock, systemClock } from "../core/Time.js";
import { generateWorld, type WorldMap } from "../generation/WorldGenerator.js";
import type { AtomicCounter } from "../shared/AtomicCounter.js";
import { Channel } from "../shared/Channel.js";
import type { PlayerConnection } from "../transport/Transport.js";
import { type AdmissionResult, type AdmissionState, admitConnection } from "./Admission.js";
import type { MatchComms } from "./MatchComms.js";
import { MatchError } from "./MatchError.js";
import { type MatchHooks, MatchLoop } from "./MatchLoop.js";
import { PlayerRegistry } from "./PlayerRegistry.js";
import type { ConnectionEvent } from "./PlayerStream.js";
import { serverLog, serverLogError, serverWarn } from "./serverLog.js";
import { type BroadcastResult, broadcastStart } from "./StartBroadcaster.js";

export type MatchPhase = "admitting" | "starting" | "running" | "finished" | "failed";

export interface MatchOptions {
  clock?: Clock;
  hooks?: MatchHooks;
  /** Population counter shared with the match's owner. */
  population?: AtomicCounter;
  onAdmissionState?: (state: AdmissionState) => void;
}

export type MatchOutcome =
  | { status: "completed"; matchId: number; ticks: number; broadcast: BroadcastResult }
  | { status: "failed"; matchId: number; error: MatchError };

/** One game instance: admission, start broadcast, then the tick loop. */
export class Match {
  readonly world: WorldMap;
  readonly registry: PlayerRegistry;
  readonly queue = new Channel<ConnectionEvent>(FAN_IN_CAPACITY);
  private _phase: MatchPhase = "admitting";
  private readonly clock: Clock;
  private readonly receiveTasks = new Set<Promise<void>>();
  private readonly loop: MatchLoop;

  constructor(
    readonly config: MatchConfig,
    private readonly options: MatchOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
    this.world = generateWorld(config.seed);
    this.registry = new PlayerRegistry(config.capacity, options.population);
    this.loop = new MatchLoop(this.registry, this.queue, {
      tickMs: config.tickMs,
      clock: this.clock,
      label: `match ${config.matchId}`,
      hooks: options.hooks,
    });
  }

  get phase(): MatchPhase {
    return this._phase;
  }

  get playerCount(): number {
    return this.registry.playerCount;
  }

  get tickCount(): number {
    return this.loop.tickCount;
  }

  /** Readiness: the configured target population has been seated. */
  isReady(): boolean {
    return this.registry.playerCount >= this.config.targetPopulation;
  }

  info(): string {
    return `id=${this.config.matchId} player_count=${this.playerCount} seed=${this.config.seed}`;
  }

  admit(connection: PlayerConnection): Promise<AdmissionResult> {
    return admitConnection(connection, {
      registry: this.registry,
      queue: this.queue,
      serialization: this.config.serialization,
      handshakeTimeoutMs: this.config.handshakeTimeoutMs,
      clockSync: {
        samples: this.config.clockSyncSamples,
        timeoutMs: this.config.clockSyncTimeoutMs,
        clock: this.clock,
      },
      trackTask: (task) => this.track(task),
      onStateChange: this.options.onAdmissionState,
    });
  }

  /**
   * Admit lobby handoffs until ready. Anything but a connection, or the lobby
   * channel closing, is fatal for this match.
   */
  async waitForPlayers(comms: MatchComms): Promise<void> {
    while (!this.isReady()) {
      const msg = await comms.receiver.recv();
      if (!msg) {
        throw new MatchError("lobby-closed", "Lobby channel closed during admission");
      }
      if (msg.type !== "connection") {
        throw new MatchError("unexpected-lobby-message", `Lobby sent "${msg.type}" during admission`);
      }
      serverLog(`new player connection for match ${this.info()}`);
      await this.admit(msg.connection);
      serverLog(`ready check ${this.playerCount} >= ${this.config.targetPopulation}`);
    }
  }

  async start(): Promise<BroadcastResult> {
    this._phase = "starting";
    serverWarn(`starting match ${this.info()}`);
    const result = await broadcastStart(this.registry, this.config.seed);
    serverLog(
      `match ${this.config.matchId} started: ${result.delivered.length} notified, ${result.evicted.length} evicted`,
    );
    return result;
  }

  async runLoop(): Promise<number> {
    this._phase = "running";
    const ticks = await this.loop.run();
    this._phase = "finished";
    return ticks;
  }

  /** Kick everyone still seated. Used when the match cannot continue. */
  async abort(reason: string): Promise<void> {
    this._phase = "failed";
    const players = this.registry.seated();
    await Promise.all(players.map((p) => p.sink.kick(reason)));
    for (const player of players) this.registry.evict(player.id);
  }

  /** Stop accepting events and wait for every receive task to exit. */
  async shutdown(): Promise<void> {
    this.queue.close();
    await Promise.all(this.receiveTasks);
  }

  private track(task: Promise<void>): void {
    const settled: Promise<void> = task
      .catch((err: unknown) => {
        serverLogError(`match ${this.config.matchId}: receive task failed`, err);
      })
      .finally(() => {
        this.receiveTasks.delete(settled);
      });
    this.receiveTasks.add(settled);
  }
}

/**
 * Run one match to completion: admit until ready, optionally acknowledge the
 * lobby, broadcast start, and tick until every player has left. Fatal lobby
 * conditions resolve as a failed outcome rather than throwing.
 */
export async function runMatch(
  config: MatchConfig,
  comms: MatchComms,
  options: MatchOptions = {},
): Promise<MatchOutcome> {
  const match = new Match(config, options);
  serverLog(`new match started ${match.info()}`);

  const fail = async (error: MatchError): Promise<MatchOutcome> => {
    serverLogError(`match ${match.info()} failed`, error);
    await match.abort("Match aborted");
    await match.shutdown();
    return { status: "failed", matchId: config.matchId, error };
  };

  try {
    await match.waitForPlayers(comms);
  } catch (err) {
    if (err instanceof MatchError) return fail(err);
    throw err;
  }

  if (config.notifyLobby) {
    try {
      await comms.sender.send({ type: "start", matchId: config.matchId });
      serverWarn(`match ${match.info()} sent start`);
    } catch (err) {
      return fail(new MatchError("lobby-notify-failed", "Failed to send start to lobby", { cause: err }));
    }
  }

  const broadcast = await match.start();
  const ticks = await match.runLoop();
  serverWarn(`match ${match.info()} finished successfully`);

  if (config.notifyLobby) {
    try {
      await comms.sender.send({ type: "close", matchId: config.matchId });
    } catch (err) {
      serverLogError(`match ${config.matchId}: close notification not delivered`, err);
    }
  }

  await match.shutdown();
  return { status: "completed", matchId: config.matchId, ticks, broadcast };
}
