/**
 * @fileoverview Error taxonomy for the acquisition engine.
 *
 * Every failure that crosses a component boundary is a {@link VarietyError}
 * carrying a stable {@link VarietyErrorCode}, so the acquisition loop can record
 * `failed(stage, code)` and callers can branch on codes instead of messages.
 */

export enum VarietyErrorCode {
  // Usage / configuration
  INVALID_ARGUMENT = 'SYS_INVALID_ARGUMENT',
  CONFIGURATION_ERROR = 'SYS_CONFIGURATION_ERROR',
  INTERNAL_ERROR = 'SYS_INTERNAL_ERROR',

  // Discovery
  DISCOVERY_EMPTY = 'DISCOVERY_EMPTY',
  DISCOVERY_SOURCE_FAILED = 'DISCOVERY_SOURCE_FAILED',

  // Installer
  INSTALL_FAILED = 'INSTALL_FAILED',

  // Supervisor
  SPAWN_NOT_FOUND = 'SPAWN_NOT_FOUND',
  SPAWN_FAILED = 'SPAWN_FAILED',
  PROCESS_NOT_RUNNING = 'PROCESS_NOT_RUNNING',
  PROCESS_CRASHED = 'PROCESS_CRASHED',

  // Protocol
  PROTOCOL_NOT_INITIALIZED = 'PROTOCOL_NOT_INITIALIZED',
  PROTOCOL_ALREADY_INITIALIZED = 'PROTOCOL_ALREADY_INITIALIZED',
  HANDSHAKE_FAILED = 'HANDSHAKE_FAILED',
  REQUEST_TIMEOUT = 'REQUEST_TIMEOUT',
  TRANSPORT_CLOSED = 'TRANSPORT_CLOSED',
  REMOTE_ERROR = 'REMOTE_ERROR',
  NO_TOOLS = 'NO_TOOLS',

  // Routing
  UNKNOWN_CAPABILITY = 'UNKNOWN_CAPABILITY',
  PROCESS_UNAVAILABLE = 'PROCESS_UNAVAILABLE',

  // Acquisition loop
  ACQUISITION_TIMEOUT = 'ACQUISITION_TIMEOUT',
}

export type VarietyErrorDetails = Record<string, unknown> | undefined;

export class VarietyError extends Error {
  public readonly code: VarietyErrorCode;
  public readonly details?: VarietyErrorDetails;
  public readonly component?: string;
  public readonly timestamp: string;
  public readonly cause?: unknown;

  constructor(
    message: string,
    code: VarietyErrorCode,
    details?: VarietyErrorDetails,
    component?: string,
    cause?: unknown,
  ) {
    super(message);
    this.name = 'VarietyError';
    this.code = code;
    this.details = details;
    this.component = component;
    this.timestamp = new Date().toISOString();
    this.cause = cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toPlainObject(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      component: this.component,
      timestamp: this.timestamp,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }

  toJSON(): Record<string, unknown> {
    return this.toPlainObject();
  }

  static isVarietyError(error: unknown): error is VarietyError {
    return error instanceof VarietyError;
  }

  static hasCode(error: unknown, code: VarietyErrorCode): error is VarietyError {
    return error instanceof VarietyError && error.code === code;
  }

  /**
   * Returns `error` untouched when it is already a VarietyError, otherwise
   * wraps it under the given code keeping the original as `cause`.
   */
  static wrap(
    error: unknown,
    code: VarietyErrorCode,
    message?: string,
    component?: string,
  ): VarietyError {
    if (error instanceof VarietyError) return error;
    const base = error instanceof Error ? error.message : String(error);
    return new VarietyError(message ? `${message}: ${base}` : base, code, undefined, component, error);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof VarietyError) return `${error.code}: ${error.message}`;
  if (error instanceof Error) return error.message;
  return String(error);
}
