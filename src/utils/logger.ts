import winston from "winston";

const { combine, timestamp, printf, colorize } = winston.format;

const logFormat = printf(({ level, message, timestamp, module, video, stage, ...meta }) => {
  const parts: string[] = [`${timestamp} [${level}]`];

  if (module) parts.push(`[${module}]`);
  if (video) parts.push(`[video:${video}]`);
  if (stage) parts.push(`[stage:${stage}]`);

  parts.push(String(message));

  const extraKeys = Object.keys(meta).filter(
    (k) => !["splat", "label"].includes(k)
  );
  if (extraKeys.length > 0) {
    const extra = Object.fromEntries(extraKeys.map((k) => [k, meta[k]]));
    parts.push(JSON.stringify(extra));
  }

  return parts.join(" ");
});

const LEVELS = Object.keys(winston.config.npm.levels);

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  format: combine(timestamp({ format: "HH:mm:ss.SSS" }), logFormat),
  transports: [
    // all levels on stderr; stdout is left to command output
    new winston.transports.Console({
      stderrLevels: LEVELS,
      format: process.stderr.isTTY
        ? combine(colorize(), timestamp({ format: "HH:mm:ss.SSS" }), logFormat)
        : combine(timestamp({ format: "HH:mm:ss.SSS" }), logFormat),
    }),
  ],
});

export type Logger = winston.Logger;

export function createChildLogger(defaults: Record<string, unknown>): Logger {
  return logger.child(defaults);
}

/**
 * Change the level of the root logger (and therefore of every child).
 * The CLI applies LOG_LEVEL here, or debug under `--verbose`.
 */
export function setLogLevel(level: string): void {
  logger.level = level;
}
