import { Logger, type ILogObj } from "tslog";

const LOG_LEVELS = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function resolveLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toLowerCase() ?? "";
  return isLogLevel(normalized) ? normalized : "info";
}

const rootLogger = new Logger<ILogObj>({
  name: "groupwarden",
  type: "pretty",
  minLevel: LOG_LEVELS.indexOf(resolveLogLevel(process.env.GROUPWARDEN_LOG_LEVEL)),
});

export type SubsystemLogger = Logger<ILogObj>;

/** Child logger tagged with the subsystem name, e.g. `locks` or `rbac`. */
export function createSubsystemLogger(name: string): SubsystemLogger {
  return rootLogger.getSubLogger({ name });
}

export function logVerbose(message: string): void {
  rootLogger.debug(message);
}
