export type MatchErrorCode = "lobby-closed" | "unexpected-lobby-message" | "lobby-notify-failed";

/** A condition that stops one match from making progress. Reported, never thrown past runMatch. */
export class MatchError extends Error {
  constructor(
    public readonly code: MatchErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "MatchError";
  }
}

export class MatchConfigError extends Error {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = "MatchConfigError";
  }
}
