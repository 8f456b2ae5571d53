/** One transport-level message. Text frames only matter to JSON-mode matches. */
export type Frame = { binary: true; data: ArrayBuffer } | { binary: false; data: string };

/** Inbound half of a player connection. */
export interface FrameStream {
  /**
   * Resolve with the next frame, or null once the stream has ended (peer
   * closed, socket error). Aborting `signal` rejects the pending read without
   * consuming a frame.
   */
  next(signal?: AbortSignal): Promise<Frame | null>;
}

/** Outbound half of a player connection. */
export interface FrameSink {
  /** Resolves once the frame is handed to the socket; rejects if it is closed. */
  send(frame: Frame): Promise<void>;
  close(code?: number, reason?: string): void;
  readonly closed: boolean;
}

/** A paired stream and sink for one connected peer, as handed off by the lobby. */
export interface PlayerConnection {
  /** Transport-assigned label used in logs only. */
  readonly label: string;
  readonly stream: FrameStream;
  readonly sink: FrameSink;
}

export interface IServerTransport {
  onConnection(handler: (connection: PlayerConnection) => void): void;
  close(): void;
}
