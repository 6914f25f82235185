import fs from "node:fs";
import path from "node:path";
import os from "node:os";

const LOG_FILE = "provision.log";

export type LogLevel = "INFO" | "WARN" | "ERROR";

export interface ProvisionLog {
  /** Where lines end up: the requested directory, or the tmp fallback when it is not writable. */
  readonly path: string;
  info(scope: string, message: string): void;
  warn(scope: string, message: string): void;
  error(scope: string, err: unknown): void;
}

/** Fallback log path when the log dir is not writable (e.g. permissions). */
function getFallbackLogPath(): string {
  return path.join(os.tmpdir(), `docdash-${LOG_FILE}`);
}

function resolveLogPath(dir: string): string {
  const normalized = path.normalize(dir);
  try {
    if (!fs.existsSync(normalized)) fs.mkdirSync(normalized, { recursive: true });
    return path.join(normalized, LOG_FILE);
  } catch {
    return getFallbackLogPath();
  }
}

export function formatLogLine(level: LogLevel, scope: string, message: string, at = new Date()): string {
  return `${at.toISOString()} | ${level} | ${scope} | ${message}\n`;
}

/**
 * Append-only provisioning log. Command lines, exit codes and the stderr of failures the
 * terminal does not show all land here. Writing never throws.
 */
export function createProvisionLog(dir: string): ProvisionLog {
  let logPath = resolveLogPath(dir);

  const write = (line: string) => {
    try {
      fs.appendFileSync(logPath, line, "utf8");
      return;
    } catch {
      // fall through to fallback
    }
    const fallback = getFallbackLogPath();
    if (logPath === fallback) return;
    try {
      fs.appendFileSync(fallback, line, "utf8");
      logPath = fallback;
    } catch {
      // nowhere left to write; the terminal output still stands
    }
  };

  return {
    get path() {
      return logPath;
    },
    info: (scope, message) => write(formatLogLine("INFO", scope, message)),
    warn: (scope, message) => write(formatLogLine("WARN", scope, message)),
    error: (scope, err) => {
      const msg = err instanceof Error ? err.message : String(err);
      const stack = err instanceof Error && err.stack ? `\n${err.stack}` : "";
      write(formatLogLine("ERROR", scope, msg + stack));
    },
  };
}
