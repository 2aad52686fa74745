import fs from "node:fs";
import path from "node:path";
import pino, { type DestinationStream, type Logger } from "pino";

export type { Logger } from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

const LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>(["fatal", "error", "warn", "info", "debug", "trace"]);

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

export function parseLogLevel(raw: unknown, fallback: LogLevel): LogLevel {
  const normalized = String(raw ?? "")
    .trim()
    .toLowerCase();
  if (!normalized) return fallback;
  if (isLogLevel(normalized)) return normalized;
  throw new Error(`invalid log level: ${normalized}`);
}

export function safeFileSegment(raw: unknown, fallback: string, maxLen = 80): string {
  const trimmed = String(raw ?? "").trim();
  const replaced = trimmed.replace(/[^A-Za-z0-9._-]/g, "_");
  const collapsed = replaced.replace(/_+/g, "_").replace(/^_+|_+$/g, "");
  const clipped = collapsed.slice(0, Math.max(1, Math.trunc(maxLen)));
  return clipped || fallback;
}

export function resolveLaunchLogFile(params: { logsDir: string; runId: string }): string {
  return path.join(params.logsDir, `launch-${safeFileSegment(params.runId, "run")}.jsonl`);
}

function ensureLogFile(filePath: string, mode: number): string {
  const resolved = path.resolve(filePath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true, mode: 0o700 });
  const fd = fs.openSync(resolved, "a", mode);
  fs.closeSync(fd);
  fs.chmodSync(resolved, mode);
  return resolved;
}

export function createLogger(params: {
  name: string;
  level: LogLevel;
  // 1 = stdout, 2 = stderr
  console?: 1 | 2 | false;
  logFilePath?: string;
  logFileMode?: number;
  // Flush file writes synchronously; the bootstrapper log is tailed remotely while it runs.
  syncFile?: boolean;
  bindings?: Record<string, unknown>;
}): Logger {
  const streams: Array<{ stream: DestinationStream; level: LogLevel }> = [];
  const consoleFd = params.console ?? 2;
  if (consoleFd !== false) streams.push({ stream: pino.destination(consoleFd), level: params.level });

  const logFilePath = String(params.logFilePath || "").trim();
  if (logFilePath) {
    const resolved = ensureLogFile(logFilePath, params.logFileMode ?? 0o600);
    streams.push({
      stream: pino.destination({ dest: resolved, sync: Boolean(params.syncFile) }),
      level: params.level,
    });
  }

  const logger = pino(
    {
      name: params.name,
      level: params.level,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: { err: pino.stdSerializers.err },
    },
    pino.multistream(streams),
  );

  return params.bindings ? logger.child(params.bindings) : logger;
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
