import { type Channel, ChannelClosedError } from "../shared/Channel.js";
import type { ClientMessage } from "../shared/protocol.js";
import { decodeClientFrame } from "../shared/serialization.js";
import type { FrameStream } from "../transport/Transport.js";
import { serverDebug, serverLogError } from "./serverLog.js";

/** Per-connection event carried by a match's fan-in queue. */
export type ConnectionEvent =
  | { type: "message"; playerId: number; message: ClientMessage }
  | { type: "close"; playerId: number };

/**
 * Receive task for one seated player: moves decoded frames into the fan-in
 * queue, then reports exactly one close event when the stream ends or fails.
 * Undecodable frames are logged and skipped. Resolves once the close event is
 * queued, or immediately if the queue itself has been closed.
 */
export async function runPlayerStream(
  playerId: number,
  stream: FrameStream,
  queue: Channel<ConnectionEvent>,
): Promise<void> {
  try {
    for (let frame = await stream.next(); frame; frame = await stream.next()) {
      let message: ClientMessage;
      try {
        message = decodeClientFrame(frame);
      } catch (err) {
        serverLogError(`player ${playerId}: undecodable frame`, err);
        continue;
      }
      await queue.send({ type: "message", playerId, message });
    }
  } catch (err) {
    if (err instanceof ChannelClosedError) {
      serverDebug(`player ${playerId}: queue closed, receive task exiting`);
      return;
    }
    serverLogError(`player ${playerId}: stream error`, err);
  }

  try {
    await queue.send({ type: "close", playerId });
  } catch (err) {
    if (!(err instanceof ChannelClosedError)) throw err;
    serverDebug(`player ${playerId}: queue closed before close event`);
  }
}
