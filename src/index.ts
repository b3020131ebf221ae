/**
 * Barrel exports for variety-engine.
 */

export * from './protocol/index.js';
export * from './process/index.js';
export * from './discovery/index.js';
export * from './installer/index.js';
export * from './routing/index.js';
export * from './acquisition/index.js';
export * from './runtime/index.js';

export {
  DEFAULT_RUNTIME_CONFIG,
  loadRuntimeConfigFromEnv,
  mergeRuntimeConfig,
  resolveRuntimeConfig,
} from './config/RuntimeConfig.js';
export type {
  BackoffConfig,
  DeepPartial,
  DiscoveryConfig,
  HealthConfig,
  InstallerConfig,
  MonitorConfig,
  ProtocolConfig,
  RegistrySourceConfig,
  ResearchSourceConfig,
  SupervisorConfig,
  VarietyRuntimeConfig,
} from './config/RuntimeConfig.js';

export type { ILogger } from './logging/ILogger.js';
export { PinoLogger } from './logging/PinoLogger.js';
export {
  NoopLogger,
  componentLogger,
  createLogger,
  resetLoggerFactory,
  setLoggerFactory,
  type LoggerFactory,
} from './logging/loggerFactory.js';

export { VarietyError, VarietyErrorCode, describeError, type VarietyErrorDetails } from './utils/errors.js';
export { tokenize } from './utils/tokens.js';
