/**
 * Logger interface that implements all log levels.
 * Use the {@link LogLevel} when configuring to change which level to output.
 *
 * All methods should be pre-bound to the logger so they can be called from the level-filtered object.
 */
export interface ILogger {
  debug(...data: unknown[]): void;
  info(...data: unknown[]): void;
  warn(...data: unknown[]): void;
  error(...data: unknown[]): void;

  group(...label: unknown[]): void;
  groupEnd(): void;
}

export enum LogLevel {
  debug = 0,
  info = 1,
  warn = 2,
  error = 3,
}

export interface ILogConfig {
  readonly logger: ILogger;
  readonly level: LogLevel;
}

export interface ILogOptions {
  readonly log?: Partial<ILogConfig>;
}

export const logLevelEnvVar = 'KEYED_ARCHIVE_LOG_LEVEL';

function noopLog() {}
export function buildLeveledLogger({ level, logger }: ILogConfig): ILogger {
  return {
    debug: level <= LogLevel.debug ? logger.debug : noopLog,
    info: level <= LogLevel.info ? logger.info : noopLog,
    warn: level <= LogLevel.warn ? logger.warn : noopLog,
    error: level <= LogLevel.error ? logger.error : noopLog,
    group: logger.group,
    groupEnd: logger.groupEnd,
  };
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.debug;
    case 'info':
      return LogLevel.info;
    case 'warn':
      return LogLevel.warn;
    case 'error':
      return LogLevel.error;
  }
  return undefined;
}

/**
 * Fills in whatever the caller left out: `console` as the sink and the level from
 * `KEYED_ARCHIVE_LOG_LEVEL`, falling back to {@link LogLevel.warn}.
 */
export function resolveLogConfig(config: Partial<ILogConfig> = {}, env: NodeJS.ProcessEnv = process.env): ILogConfig {
  return {
    logger: config.logger ?? console,
    level: config.level ?? parseLogLevel(env[logLevelEnvVar]) ?? LogLevel.warn,
  };
}

export function resolveLogger(options: ILogOptions = {}): ILogger {
  return buildLeveledLogger(resolveLogConfig(options.log));
}
