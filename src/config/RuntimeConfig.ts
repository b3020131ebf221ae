/**
 * @fileoverview Runtime configuration for the acquisition engine.
 *
 * Configuration is layered: {@link DEFAULT_RUNTIME_CONFIG} ← environment
 * (`VARIETY_*`) ← explicit overrides passed by the embedding application.
 * The merged result is validated once with ajv before any component is built.
 */

import * as os from 'node:os';
import * as path from 'node:path';

import { VarietyError, VarietyErrorCode } from '../utils/errors.js';
import { compileSchema, formatSchemaErrors } from '../utils/schema.js';

// ============================================================================
// SECTIONS
// ============================================================================

export interface BackoffConfig {
  /** Delay after the first consecutive failure. @default 30000 */
  baseDelayMs: number;
  /** Upper bound on the delay between attempts. @default 600000 */
  maxDelayMs: number;
  /** Consecutive failures after which a capability is parked until re-injected. @default 5 */
  maxAttempts: number;
}

export interface MonitorConfig {
  /** Tick interval of the variety monitor. @default 30000 */
  intervalMs: number;
  /** Overall deadline of one acquisition attempt. @default 180000 */
  attemptTimeoutMs: number;
  backoff: BackoffConfig;
  /** Finished attempts kept for status queries. @default 100 */
  historyLimit: number;
  /** Capabilities the system declares it needs at all times. */
  requiredCapabilities: string[];
  /** Ratio of mapped/required capabilities below which a computed gap is reported. @default 0.85 */
  varietyThreshold: number;
  /** Remove the install directory when a later stage of the same attempt fails. @default false */
  cleanupOnFailure: boolean;
}

export interface ProtocolConfig {
  /** Default per-call timeout. @default 30000 */
  callTimeoutMs: number;
  /** Timeout of the `initialize` handshake call. @default 15000 */
  handshakeTimeoutMs: number;
  protocolVersion: string;
  clientInfo: { name: string; version: string };
}

export interface SupervisorConfig {
  /** Time between SIGTERM and SIGKILL on stop. @default 3000 */
  stopGraceMs: number;
  /** Lines of stderr kept per process for diagnostics. @default 200 */
  stderrBufferLines: number;
  /**
   * Window after spawn during which an exit is reported as a spawn failure.
   * Silence during this window does not count against the process. @default 250
   */
  startupGraceMs: number;
}

export interface HealthConfig {
  /** Ping registered plugin processes periodically. @default true */
  enabled: boolean;
  /** Time between health checks of one process. @default 30000 */
  intervalMs: number;
  /** Deadline of one `ping`. @default 5000 */
  timeoutMs: number;
  /** Consecutive failed pings after which the process is stopped and unmapped. @default 3 */
  maxFailures: number;
}

export interface InstallerConfig {
  /** Parent directory of every per-install working directory. */
  installRoot: string;
  /** Package manager executable. @default 'npm' */
  npmCommand: string;
  installTimeoutMs: number;
  /** Pass `--ignore-scripts` to the package manager. @default true */
  ignoreScripts: boolean;
  /** Optional registry override handed to the package manager. */
  registryUrl?: string;
}

export interface RegistrySourceConfig {
  enabled: boolean;
  baseURL: string;
  searchSize: number;
  requestTimeoutMs: number;
}

export interface ResearchSourceConfig {
  enabled: boolean;
  /** OpenAI-compatible base URL (`.../v1`). Research is skipped when unset. */
  baseURL?: string;
  apiKey?: string;
  model: string;
  requestTimeoutMs: number;
  maxSuggestions: number;
}

export interface DiscoveryConfig {
  curated: { enabled: boolean; mappingFile?: string };
  registry: RegistrySourceConfig;
  research: ResearchSourceConfig;
  /** Candidates kept after ranking. @default 10 */
  maxCandidates: number;
}

export interface VarietyRuntimeConfig {
  monitor: MonitorConfig;
  protocol: ProtocolConfig;
  supervisor: SupervisorConfig;
  health: HealthConfig;
  installer: InstallerConfig;
  discovery: DiscoveryConfig;
}

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends Array<infer U>
    ? U[]
    : T[K] extends object
      ? DeepPartial<T[K]>
      : T[K];
};

// ============================================================================
// DEFAULTS
// ============================================================================

export const DEFAULT_RUNTIME_CONFIG: Readonly<VarietyRuntimeConfig> = {
  monitor: {
    intervalMs: 30_000,
    attemptTimeoutMs: 180_000,
    backoff: { baseDelayMs: 30_000, maxDelayMs: 600_000, maxAttempts: 5 },
    historyLimit: 100,
    requiredCapabilities: [],
    varietyThreshold: 0.85,
    cleanupOnFailure: false,
  },
  protocol: {
    callTimeoutMs: 30_000,
    handshakeTimeoutMs: 15_000,
    protocolVersion: '2024-11-05',
    clientInfo: { name: 'variety-engine', version: '0.1.0' },
  },
  supervisor: {
    stopGraceMs: 3_000,
    stderrBufferLines: 200,
    startupGraceMs: 250,
  },
  health: {
    enabled: true,
    intervalMs: 30_000,
    timeoutMs: 5_000,
    maxFailures: 3,
  },
  installer: {
    installRoot: path.join(os.tmpdir(), 'variety-engine', 'packages'),
    npmCommand: 'npm',
    installTimeoutMs: 300_000,
    ignoreScripts: true,
  },
  discovery: {
    curated: { enabled: true },
    registry: {
      enabled: true,
      baseURL: 'https://registry.npmjs.org',
      searchSize: 20,
      requestTimeoutMs: 10_000,
    },
    research: {
      enabled: false,
      model: 'gpt-4o-mini',
      requestTimeoutMs: 30_000,
      maxSuggestions: 5,
    },
    maxCandidates: 10,
  },
};

// ============================================================================
// MERGING
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: object, override: object): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = out[key];
    out[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return out;
}

const runtimeConfigSchema = {
  type: 'object',
  required: ['monitor', 'protocol', 'supervisor', 'health', 'installer', 'discovery'],
  properties: {
    monitor: {
      type: 'object',
      required: ['intervalMs', 'attemptTimeoutMs', 'backoff', 'historyLimit', 'requiredCapabilities', 'varietyThreshold'],
      properties: {
        intervalMs: { type: 'integer', minimum: 10 },
        attemptTimeoutMs: { type: 'integer', minimum: 1 },
        backoff: {
          type: 'object',
          required: ['baseDelayMs', 'maxDelayMs', 'maxAttempts'],
          properties: {
            baseDelayMs: { type: 'integer', minimum: 0 },
            maxDelayMs: { type: 'integer', minimum: 0 },
            maxAttempts: { type: 'integer', minimum: 1 },
          },
        },
        historyLimit: { type: 'integer', minimum: 0 },
        requiredCapabilities: { type: 'array', items: { type: 'string' } },
        varietyThreshold: { type: 'number', minimum: 0, maximum: 1 },
        cleanupOnFailure: { type: 'boolean' },
      },
    },
    protocol: {
      type: 'object',
      required: ['callTimeoutMs', 'handshakeTimeoutMs', 'protocolVersion', 'clientInfo'],
      properties: {
        callTimeoutMs: { type: 'integer', minimum: 1 },
        handshakeTimeoutMs: { type: 'integer', minimum: 1 },
        protocolVersion: { type: 'string', minLength: 1 },
      },
    },
    supervisor: {
      type: 'object',
      properties: {
        stopGraceMs: { type: 'integer', minimum: 0 },
        stderrBufferLines: { type: 'integer', minimum: 0 },
        startupGraceMs: { type: 'integer', minimum: 0 },
      },
    },
    health: {
      type: 'object',
      required: ['enabled', 'intervalMs', 'timeoutMs', 'maxFailures'],
      properties: {
        enabled: { type: 'boolean' },
        intervalMs: { type: 'integer', minimum: 10 },
        timeoutMs: { type: 'integer', minimum: 1 },
        maxFailures: { type: 'integer', minimum: 1 },
      },
    },
    installer: {
      type: 'object',
      required: ['installRoot', 'npmCommand', 'installTimeoutMs'],
      properties: {
        installRoot: { type: 'string', minLength: 1 },
        npmCommand: { type: 'string', minLength: 1 },
        installTimeoutMs: { type: 'integer', minimum: 1 },
      },
    },
    discovery: {
      type: 'object',
      properties: {
        maxCandidates: { type: 'integer', minimum: 1 },
      },
    },
  },
};

const validateRuntimeConfig = compileSchema<VarietyRuntimeConfig>(runtimeConfigSchema);

/**
 * Deep-merges `override` onto `base` (arrays replace) and validates the result.
 *
 * @throws {VarietyError} `CONFIGURATION_ERROR` when the merged config is invalid.
 */
export function mergeRuntimeConfig(
  base: Readonly<VarietyRuntimeConfig>,
  override: DeepPartial<VarietyRuntimeConfig> = {},
): VarietyRuntimeConfig {
  const merged: unknown = deepMerge(base, override);
  if (!validateRuntimeConfig(merged)) {
    throw new VarietyError(
      `Invalid runtime configuration: ${formatSchemaErrors(validateRuntimeConfig.errors)}`,
      VarietyErrorCode.CONFIGURATION_ERROR,
      { errors: validateRuntimeConfig.errors ?? [] },
      'RuntimeConfig',
    );
  }
  return merged;
}

// ============================================================================
// ENVIRONMENT
// ============================================================================

function readInt(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new VarietyError(
      `${key} must be a non-negative integer, got '${raw}'`,
      VarietyErrorCode.CONFIGURATION_ERROR,
      { key, value: raw },
      'RuntimeConfig',
    );
  }
  return value;
}

function readList(env: NodeJS.ProcessEnv, key: string): string[] | undefined {
  const raw = env[key];
  if (!raw) return undefined;
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Reads `VARIETY_*` variables into a partial config. Unset variables are left
 * out so the defaults (or explicit overrides) win.
 */
export function loadRuntimeConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): DeepPartial<VarietyRuntimeConfig> {
  const llmBaseURL = env.VARIETY_LLM_BASE_URL || undefined;
  return {
    monitor: {
      intervalMs: readInt(env, 'VARIETY_MONITOR_INTERVAL_MS'),
      attemptTimeoutMs: readInt(env, 'VARIETY_ATTEMPT_TIMEOUT_MS'),
      requiredCapabilities: readList(env, 'VARIETY_REQUIRED_CAPABILITIES'),
    },
    protocol: {
      callTimeoutMs: readInt(env, 'VARIETY_CALL_TIMEOUT_MS'),
    },
    health: {
      intervalMs: readInt(env, 'VARIETY_HEALTH_INTERVAL_MS'),
    },
    installer: {
      installRoot: env.VARIETY_INSTALL_ROOT || undefined,
      registryUrl: env.VARIETY_NPM_REGISTRY_URL || undefined,
    },
    discovery: {
      registry: {
        baseURL: env.VARIETY_NPM_REGISTRY_URL || undefined,
      },
      research: {
        enabled: llmBaseURL ? true : undefined,
        baseURL: llmBaseURL,
        apiKey: env.VARIETY_LLM_API_KEY || undefined,
        model: env.VARIETY_LLM_MODEL || undefined,
      },
    },
  };
}

/**
 * Convenience: defaults ← env ← overrides, validated.
 */
export function resolveRuntimeConfig(
  overrides: DeepPartial<VarietyRuntimeConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): VarietyRuntimeConfig {
  const fromEnv = mergeRuntimeConfig(DEFAULT_RUNTIME_CONFIG, loadRuntimeConfigFromEnv(env));
  return mergeRuntimeConfig(fromEnv, overrides);
}
