import type { Clock } from "../core/Time.js";
import type { SerializationMode } from "../shared/protocol.js";
import { decodeClientFrame, encodeServerFrame } from "../shared/serialization.js";
import type { FrameSink, FrameStream } from "../transport/Transport.js";
import { serverDebug, serverWarn } from "./serverLog.js";

export interface ClockSyncOptions {
  /** Round trips to perform. Zero skips sync entirely. */
  samples: number;
  /** How long each probe waits for its echo. */
  timeoutMs: number;
  serialization: SerializationMode;
  clock: Clock;
  /** Connection label for log lines. */
  label: string;
}

function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  return ((sorted[mid - 1] ?? upper) + upper) / 2;
}

/**
 * Estimate (client clock − server clock) in ms by round-tripping probes.
 *
 * Each probe carries the server's wall time; the client echoes it with its own.
 * Assuming a symmetric path, the client stamped its reply rtt/2 after the probe
 * left, so one sample is `clientTime − (serverTime + rtt / 2)`. The estimate is
 * the median sample. Any failure (send error, timeout, stream end, unexpected
 * reply) yields 0: sync is best-effort and never blocks admission.
 */
export async function syncClock(
  stream: FrameStream,
  sink: FrameSink,
  options: ClockSyncOptions,
): Promise<number> {
  const { samples, timeoutMs, serialization, clock, label } = options;
  if (samples <= 0) return 0;

  const offsets: number[] = [];
  try {
    for (let seq = 0; seq < samples; seq++) {
      const serverTime = clock.wallNow();
      const sentAt = clock.now();
      await sink.send(encodeServerFrame({ type: "clock-sync", seq, serverTime }, serialization));

      const frame = await stream.next(AbortSignal.timeout(timeoutMs));
      if (!frame) throw new Error("stream ended");
      const reply = decodeClientFrame(frame);
      if (reply.type !== "clock-sync-reply" || reply.seq !== seq) {
        throw new Error(`expected clock-sync-reply #${seq}, got ${reply.type}`);
      }
      const rtt = clock.now() - sentAt;
      offsets.push(reply.clientTime - (serverTime + rtt / 2));
    }
  } catch (err) {
    serverWarn(`clock sync with ${label} failed, using zero offset: ${String(err)}`);
    return 0;
  }

  const offset = Math.round(median(offsets));
  serverDebug(`clock sync with ${label}: offset=${offset}ms over ${samples} samples`);
  return offset;
}
