import { LogLevel } from "effect";

const capitalizeFirst = (s: string): string =>
  s.charAt(0).toUpperCase() + s.slice(1).toLowerCase();

const isLiteral = (value: string): value is LogLevel.Literal =>
  LogLevel.allLevels.some(level => level._tag === value);

/**
 * Minimum log level for a run: `--verbose` wins, then `LOG_LEVEL`
 * (e.g. "debug", "warning"), then Info.
 */
export const resolveLogLevel = (verbose: boolean, envLevel: string | undefined): LogLevel.LogLevel => {
  if (verbose) return LogLevel.Debug;
  if (!envLevel) return LogLevel.Info;

  const normalized = capitalizeFirst(envLevel);
  return isLiteral(normalized) ? LogLevel.fromLiteral(normalized) : LogLevel.Info;
};
