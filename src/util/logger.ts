import winston from "winston";

export type Logger = winston.Logger;

export type LoggerOpts = {
  level?: string;
  silent?: boolean;
  file?: string;
};

export function createLogger(opts: LoggerOpts = {}): Logger {
  return winston.createLogger({
    level: opts.level ?? "info",
    silent: opts.silent ?? false,
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    transports: [new winston.transports.Console(), ...(opts.file ? [new winston.transports.File({ filename: opts.file })] : [])],
  });
}

/** for tests and library callers that do not want output */
export function silentLogger(): Logger {
  return createLogger({ silent: true });
}
