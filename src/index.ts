export * from './NSKeyedArchiver';
export * as bplist from './bplist';
export { AssertError } from './shared/assert';
export { type ILogConfig, type ILogOptions, type ILogger, LogLevel, buildLeveledLogger, logLevelEnvVar, resolveLogConfig } from './shared/logger';
