import { Channel } from "../shared/Channel.js";
import type { Frame, FrameSink, FrameStream, PlayerConnection } from "./Transport.js";

const LOCAL_BUFFER_FRAMES = 1024;

let nextLocalId = 1;

/**
 * In-memory socket pair. Frames sent on one side arrive on the other's stream;
 * closing either side ends both streams, like a real socket would.
 */
export class LocalConnection {
  readonly serverSide: PlayerConnection;
  readonly clientSide: PlayerConnection;

  /** Close code/reason of the first close call, from either side. */
  closeInfo: { code?: number | undefined; reason?: string | undefined } | null = null;
  /** When set, the next server-side send rejects with this error. */
  failNextServerSend: Error | null = null;

  private readonly toServer = new Channel<Frame>(LOCAL_BUFFER_FRAMES);
  private readonly toClient = new Channel<Frame>(LOCAL_BUFFER_FRAMES);

  constructor(label = `local-${nextLocalId++}`) {
    const self = this;

    const streamOf = (channel: Channel<Frame>): FrameStream => ({
      async next(signal?: AbortSignal): Promise<Frame | null> {
        return (await channel.recv(signal)) ?? null;
      },
    });

    const sinkOf = (channel: Channel<Frame>, isServer: boolean): FrameSink => ({
      async send(frame: Frame): Promise<void> {
        if (isServer && self.failNextServerSend) {
          const err = self.failNextServerSend;
          self.failNextServerSend = null;
          throw err;
        }
        if (self.closed) throw new Error(`${label}: connection closed`);
        await channel.send(frame);
      },
      close(code?: number, reason?: string): void {
        self.close(code, reason);
      },
      get closed() {
        return self.closed;
      },
    });

    this.serverSide = {
      label,
      stream: streamOf(this.toServer),
      sink: sinkOf(this.toClient, true),
    };
    this.clientSide = {
      label,
      stream: streamOf(this.toClient),
      sink: sinkOf(this.toServer, false),
    };
  }

  get closed(): boolean {
    return this.closeInfo !== null;
  }

  close(code?: number, reason?: string): void {
    if (this.closeInfo) return;
    this.closeInfo = { code, reason };
    this.toServer.close();
    this.toClient.close();
  }
}
