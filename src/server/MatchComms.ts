import { Channel } from "../shared/Channel.js";
import type { PlayerConnection } from "../transport/Transport.js";

/** Messages exchanged between a match and the lobby that feeds it. */
export type LobbyMessage =
  | { type: "connection"; connection: PlayerConnection }
  | { type: "start"; matchId: number }
  | { type: "close"; matchId: number };

/**
 * The two directions of the lobby handoff. The lobby sends connections on
 * `receiver`; the match answers on `sender` when configured to notify.
 */
export interface MatchComms {
  receiver: Channel<LobbyMessage>;
  sender: Channel<LobbyMessage>;
}

const COMMS_CAPACITY = 16;

export function createMatchComms(capacity = COMMS_CAPACITY): MatchComms {
  return {
    receiver: new Channel<LobbyMessage>(capacity),
    sender: new Channel<LobbyMessage>(capacity),
  };
}
