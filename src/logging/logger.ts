import pino from "pino";

export type ServiceLogger = {
  debug: (obj: Record<string, unknown>, msg?: string) => void;
  info: (obj: Record<string, unknown>, msg?: string) => void;
  warn: (obj: Record<string, unknown>, msg?: string) => void;
  error: (obj: Record<string, unknown>, msg?: string) => void;
};

export const REDACT_PATHS = [
  "adminToken",
  "secretKey",
  "*.adminToken",
  "*.secretKey",
  "req.headers.authorization",
  "headers.authorization",
];

type CreateLoggerArgs = {
  service: string;
  level?: string;
  pretty?: boolean;
  /** Where JSON lines go instead of stdout. */
  destination?: pino.DestinationStream;
};

export function createLogger(args: CreateLoggerArgs): pino.Logger {
  const isDev = process.env.NODE_ENV !== "production";
  const level =
    args.level ?? process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : isDev ? "debug" : "info");
  const pretty = args.pretty ?? (isDev && process.env.PINO_PRETTY === "1");

  const options: pino.LoggerOptions = {
    level,
    base: { service: args.service, pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: "[redacted]" },
    ...(pretty
      ? {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              singleLine: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          },
        }
      : {}),
  };
  return args.destination && !pretty ? pino(options, args.destination) : pino(options);
}

/**
 * Hides the password of a connection string so it can be logged.
 * Strings that are not URLs (e.g. `sqlite:./data/app.db`) pass through.
 */
export function maskConnectionString(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return value;
  }
  if (!url.password) return value;
  url.password = "***";
  return url.toString();
}
