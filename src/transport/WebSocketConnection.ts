import type { RawData, WebSocket } from "ws";
import { serverLogError } from "../server/serverLog.js";
import { Channel } from "../shared/Channel.js";
import type { Frame, FrameSink, FrameStream, PlayerConnection } from "./Transport.js";

/** Frames buffered per socket before the peer is considered abusive. */
const RECEIVE_BUFFER_FRAMES = 4096;

const WS_OPEN = 1;

function toArrayBuffer(data: RawData): ArrayBuffer {
  // Node ws delivers Buffer (or Buffer[] for fragmented frames). Copy into a
  // standalone ArrayBuffer so the codec never sees pooled memory.
  const chunks = Array.isArray(data) ? data : [data instanceof ArrayBuffer ? Buffer.from(data) : data];
  const total = chunks.reduce((n, c) => n + c.byteLength, 0);
  const out = new ArrayBuffer(total);
  const bytes = new Uint8Array(out);
  let off = 0;
  for (const chunk of chunks) {
    bytes.set(chunk, off);
    off += chunk.byteLength;
  }
  return out;
}

/** Adapts one `ws` socket to the stream/sink pair the match consumes. */
export class WebSocketConnection implements PlayerConnection {
  readonly stream: FrameStream;
  readonly sink: FrameSink;
  private readonly inbound = new Channel<Frame>(RECEIVE_BUFFER_FRAMES);

  constructor(
    readonly label: string,
    ws: WebSocket,
  ) {
    ws.on("message", (data, isBinary) => {
      const frame: Frame = isBinary
        ? { binary: true, data: toArrayBuffer(data) }
        : { binary: false, data: Buffer.from(toArrayBuffer(data)).toString("utf8") };
      if (!this.inbound.trySend(frame)) {
        serverLogError(`receive buffer overflow on ${label}`, new Error("too many frames"));
        ws.close(1008, "Receive buffer overflow");
        this.inbound.close();
      }
    });
    ws.on("close", () => {
      this.inbound.close();
    });
    ws.on("error", (err) => {
      serverLogError(`WebSocket error for ${label}`, err);
      this.inbound.close();
    });

    const inbound = this.inbound;
    this.stream = {
      async next(signal?: AbortSignal): Promise<Frame | null> {
        return (await inbound.recv(signal)) ?? null;
      },
    };
    this.sink = {
      send(frame: Frame): Promise<void> {
        return new Promise((resolve, reject) => {
          if (ws.readyState !== WS_OPEN) {
            reject(new Error(`${label}: socket not open`));
            return;
          }
          ws.send(frame.data, { binary: frame.binary }, (err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      },
      close(code?: number, reason?: string): void {
        ws.close(code, reason);
      },
      get closed() {
        return ws.readyState !== WS_OPEN;
      },
    };
  }
}
