export { logger, type LogLevel } from "./logger.js";
export { FileLogger, SessionFileLogger, pruneLogs, type FileLoggerOptions } from "./file-logger.js";
export * from "./errors.js";
export {
  CircuitBreaker,
  CircuitBreakerRegistry,
  type CircuitBreakerOptions,
  type CircuitState,
  type CircuitStatus,
} from "./circuit-breaker.js";
export { Watchdog, withTimeout, type WatchdogContext, type WatchdogOptions } from "./watchdog.js";
export { Semaphore } from "./semaphore.js";
export {
  CleanupManager,
  type CleanupTask,
  type CleanupTaskType,
  type CleanupResult,
} from "./cleanup-manager.js";
export {
  HealthChecker,
  type HealthCheckResult,
  type HealthCheckOptions,
  type HealthProbes,
  type HealthStatus,
} from "./health-check.js";
