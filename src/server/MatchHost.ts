import type { MatchConfig } from "../config/matchConfig.js";
import { AtomicCounter } from "../shared/AtomicCounter.js";
import { ChannelClosedError } from "../shared/Channel.js";
import type { IServerTransport, PlayerConnection } from "../transport/Transport.js";
import { type MatchOptions, type MatchOutcome, runMatch } from "./Match.js";
import { createMatchComms, type MatchComms } from "./MatchComms.js";
import { serverLog, serverLogError, serverWarn } from "./serverLog.js";

export interface MatchHostOptions {
  /** Config for the match numbered `matchId`. The host always turns on lobby notification. */
  createConfig(matchId: number): MatchConfig;
  matchOptions?: Omit<MatchOptions, "population">;
  onMatchEnd?(outcome: MatchOutcome): void;
}

export interface HostedMatchInfo {
  matchId: number;
  admitting: boolean;
  population: number;
}

interface HostedMatch {
  matchId: number;
  comms: MatchComms;
  population: AtomicCounter;
  done: Promise<void>;
}

/**
 * Sequential lobby: every new connection goes to the match currently
 * admitting. Once that match reports start, the next connection opens a new
 * one. Connections still queued for a match that has started are handed on.
 */
export class MatchHost {
  private admitting: HostedMatch | null = null;
  private readonly matches = new Map<number, HostedMatch>();
  private nextMatchId = 1;
  private closed = false;

  constructor(private readonly options: MatchHostOptions) {}

  /** Route every connection from `transport` into matches. */
  attach(transport: IServerTransport): void {
    transport.onConnection((connection) => {
      this.handoff(connection).catch((err: unknown) => {
        serverLogError(`handoff of ${connection.label} failed`, err);
        connection.sink.close(1011, "Server error");
      });
    });
  }

  /** Give `connection` to the admitting match, opening one if none is. */
  async handoff(connection: PlayerConnection): Promise<void> {
    for (;;) {
      if (this.closed) {
        connection.sink.close(1001, "Server shutting down");
        return;
      }
      const match = this.admitting ?? this.openMatch();
      try {
        await match.comms.receiver.send({ type: "connection", connection });
        return;
      } catch (err) {
        // The match stopped admitting while we waited; try the next one.
        if (!(err instanceof ChannelClosedError)) throw err;
      }
    }
  }

  list(): HostedMatchInfo[] {
    return [...this.matches.values()].map((m) => ({
      matchId: m.matchId,
      admitting: m === this.admitting,
      population: m.population.load(),
    }));
  }

  /** Stop handing out connections. The admitting match fails; running matches play out. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    const match = this.admitting;
    this.admitting = null;
    match?.comms.receiver.close();
  }

  /** Resolves once every hosted match has ended. */
  async idle(): Promise<void> {
    while (this.matches.size > 0) {
      await Promise.all([...this.matches.values()].map((m) => m.done));
    }
  }

  private openMatch(): HostedMatch {
    const matchId = this.nextMatchId++;
    const config: MatchConfig = { ...this.options.createConfig(matchId), matchId, notifyLobby: true };
    const comms = createMatchComms();
    const population = new AtomicCounter(0);

    const done = runMatch(config, comms, { ...this.options.matchOptions, population })
      .then((outcome) => {
        if (outcome.status === "failed") {
          serverWarn(`match ${matchId} failed: ${outcome.error.code}`);
        }
        this.options.onMatchEnd?.(outcome);
      })
      .catch((err: unknown) => {
        serverLogError(`match ${matchId} crashed`, err);
      })
      .finally(() => {
        this.stopAdmitting(hosted);
        comms.sender.close();
        this.matches.delete(matchId);
      });

    const hosted: HostedMatch = { matchId, comms, population, done };
    this.matches.set(matchId, hosted);
    this.admitting = hosted;
    this.watch(hosted).catch((err: unknown) => {
      serverLogError(`match ${matchId}: lobby watcher failed`, err);
    });
    serverLog(`opened match ${matchId}`);
    return hosted;
  }

  private async watch(match: HostedMatch): Promise<void> {
    for (let msg = await match.comms.sender.recv(); msg; msg = await match.comms.sender.recv()) {
      if (msg.type === "start") {
        serverLog(`match ${msg.matchId} started, no longer admitting`);
        this.stopAdmitting(match);
      } else if (msg.type === "close") {
        serverLog(`match ${msg.matchId} closed`);
      } else {
        serverWarn(`match ${match.matchId} sent unexpected "${msg.type}"`);
      }
    }
  }

  /** Close the match's inbound channel and re-route anything still queued on it. */
  private stopAdmitting(match: HostedMatch): void {
    if (this.admitting === match) this.admitting = null;
    if (match.comms.receiver.isClosed) return;
    match.comms.receiver.close();
    for (const leftover of match.comms.receiver.drain()) {
      if (leftover.type !== "connection") continue;
      this.handoff(leftover.connection).catch((err: unknown) => {
        serverLogError(`re-handoff of ${leftover.connection.label} failed`, err);
        leftover.connection.sink.close(1011, "Server error");
      });
    }
  }
}
