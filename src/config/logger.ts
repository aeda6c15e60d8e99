import winston from "winston";

/** Replace Error values in log metadata with their message and stack; JSON drops them otherwise. */
const serializeErrors = winston.format((info) => {
  for (const [key, value] of Object.entries(info)) {
    if (value instanceof Error) {
      info[key] = { name: value.name, message: value.message, stack: value.stack };
    }
  }
  return info;
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: winston.format.combine(
    serializeErrors(),
    winston.format.errors({ stack: true }),
    winston.format.timestamp(),
    winston.format.json(),
  ),
  defaultMeta: { service: "edge-dns-controller" },
  transports: [new winston.transports.Console()],
});

/** Apply the configured level once the config has been validated. */
export function setLogLevel(level: string): void {
  logger.level = level;
}
