import winston from "winston";

const { combine, timestamp, printf, colorize } = winston.format;

const logFormat = printf(({ level, message, timestamp: ts, module: mod, ...meta }) => {
  const moduleTag = mod ? `[${String(mod)}]` : "";
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${String(ts)} ${level} ${moduleTag} ${String(message)}${metaStr}`;
});

const level = process.env.LOG_LEVEL ?? "info";

export const logger = winston.createLogger({
  level: level === "silent" ? "error" : level,
  silent: level === "silent",
  format: combine(timestamp({ format: "HH:mm:ss.SSS" }), logFormat),
  transports: [
    new winston.transports.Console({
      format: combine(colorize(), timestamp({ format: "HH:mm:ss.SSS" }), logFormat),
    }),
  ],
});

export type Logger = winston.Logger;

export function createModuleLogger(moduleName: string): Logger {
  return logger.child({ module: moduleName });
}
