import pino from "pino";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
const DEFAULT_LOG_LEVEL: LogLevel = "info";

function shouldColorizeLogs(): boolean {
  if (process.env.NO_COLOR === "1" || process.env.NO_COLOR === "true") {
    return false;
  }
  if (process.env.ROUTER_BRIDGE_DAEMON === "true") {
    return false;
  }
  return process.stdout.isTTY === true;
}

function resolveInitialLevel(): string {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (raw && (LOG_LEVELS as readonly string[]).includes(raw)) {
    return raw;
  }
  return DEFAULT_LOG_LEVEL;
}

const initialLevel = resolveInitialLevel();

// No pretty transport worker when silenced.
export const logger =
  initialLevel === "silent"
    ? pino({ level: initialLevel })
    : pino({
        level: initialLevel,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: shouldColorizeLogs(),
          },
        },
      });

export function configureLogger(level?: string): void {
  const normalized = (level || process.env.LOG_LEVEL || DEFAULT_LOG_LEVEL).trim().toLowerCase();
  if ((LOG_LEVELS as readonly string[]).includes(normalized)) {
    logger.level = normalized;
    return;
  }
  logger.warn({ level }, "Invalid logger level in config; keeping current level");
}

const SECRET_DISPLAY_LENGTH = 15;

/** Masks a key for log output: the first 15 characters, or `****` when too short to reveal safely. */
export function maskSecret(value: string): string {
  if (value.length > SECRET_DISPLAY_LENGTH) {
    return `${value.slice(0, SECRET_DISPLAY_LENGTH)}...`;
  }
  return "****";
}
