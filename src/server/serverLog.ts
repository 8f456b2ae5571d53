import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";

let logPath: string | null = null;
let verbose = (process.env.LOG_LEVEL ?? "").toLowerCase() === "debug";

/** Initialize file logging. Call once at startup with the data directory. */
export function initServerLog(dataDir: string): void {
  mkdirSync(dataDir, { recursive: true });
  logPath = join(dataDir, "server.log");
}

/** Enable or disable debug lines (defaults to LOG_LEVEL=debug). */
export function setServerLogVerbose(enabled: boolean): void {
  verbose = enabled;
}

function timestamp(): string {
  return new Date().toISOString();
}

function write(line: string): void {
  console.error(line);
  if (logPath) {
    try {
      appendFileSync(logPath, `${line}\n`);
    } catch (err) {
      // The file is best-effort; stderr already has the line.
      console.error(`${timestamp()} [match] log file write failed: ${String(err)}`);
      logPath = null;
    }
  }
}

/** Log an informational message to stderr and the log file. */
export function serverLog(msg: string): void {
  write(`${timestamp()} [match] ${msg}`);
}

export function serverWarn(msg: string): void {
  write(`${timestamp()} [match] WARN ${msg}`);
}

/** High-volume lines (per-message, per-tick). Dropped unless verbose. */
export function serverDebug(msg: string): void {
  if (!verbose) return;
  write(`${timestamp()} [match] DEBUG ${msg}`);
}

/** Log an error (with stack trace) to stderr and the log file. */
export function serverLogError(label: string, err: unknown): void {
  const msg = err instanceof Error ? `${err.message}\n${err.stack}` : String(err);
  write(`${timestamp()} [match] ERROR ${label}: ${msg}`);
}

/**
 * Install global handlers for uncaught exceptions and unhandled rejections.
 * Logs the error, then exits so the crash is still noticed.
 */
export function installCrashHandlers(): void {
  process.on("uncaughtException", (err) => {
    serverLogError("uncaughtException", err);
    process.exit(1);
  });
  process.on("unhandledRejection", (reason) => {
    serverLogError("unhandledRejection", reason);
    process.exit(1);
  });
}
