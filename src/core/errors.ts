/**
 * Error Classes for grainctl
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIGURATION_ERROR = "E1000",
  INVALID_CREDENTIAL = "E1001",

  // Transport errors (2xxx)
  SSH_CONNECTION_FAILED = "E2000",
  SSH_SESSION_FAILED = "E2001",
  SSH_COMMAND_FAILED = "E2002",

  // Inventory / readiness errors (3xxx)
  READINESS_TIMEOUT = "E3000",
  INVENTORY_FAILED = "E3001",

  // Convergence errors (4xxx)
  CONVERGENCE_FAILED = "E4000",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  INVALID_ARGUMENT = "E9001",
}

/**
 * Base error class for all grainctl errors
 */
export class GrainctlError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "GrainctlError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  /**
   * Create a formatted error message
   */
  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Invalid or incomplete configuration
 */
export class ConfigurationError extends GrainctlError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context);
    this.name = "ConfigurationError";
  }
}

/**
 * The SSH private key could not be parsed
 */
export class InvalidCredentialError extends GrainctlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCode.INVALID_CREDENTIAL, undefined, options);
    this.name = "InvalidCredentialError";
  }
}

// =============================================================================
// Transport
// =============================================================================

/**
 * Context shared by every transport failure
 */
export interface TransportErrorContext {
  host: string;
  command: string;
  [key: string]: unknown;
}

export class ConnectionError extends GrainctlError {
  public readonly host: string;

  constructor(message: string, context: TransportErrorContext, options?: { cause?: unknown }) {
    super(message, ErrorCode.SSH_CONNECTION_FAILED, context, options);
    this.name = "ConnectionError";
    this.host = context.host;
  }
}

export class SessionError extends GrainctlError {
  public readonly host: string;

  constructor(message: string, context: TransportErrorContext, options?: { cause?: unknown }) {
    super(message, ErrorCode.SSH_SESSION_FAILED, context, options);
    this.name = "SessionError";
    this.host = context.host;
  }
}

/**
 * Remote command exited non-zero, or its stream failed mid-flight
 */
export class CommandError extends GrainctlError {
  public readonly host: string;
  public readonly command: string;
  public readonly exitCode?: number;
  public readonly output: string;
  public readonly stderr: string;

  constructor(
    message: string,
    context: TransportErrorContext & { exitCode?: number; output?: string; stderr?: string },
    options?: { cause?: unknown }
  ) {
    super(message, ErrorCode.SSH_COMMAND_FAILED, context, options);
    this.name = "CommandError";
    this.host = context.host;
    this.command = context.command;
    this.exitCode = context.exitCode;
    this.output = context.output ?? "";
    this.stderr = context.stderr ?? "";
  }
}

export type TransportError = ConnectionError | SessionError | CommandError | InvalidCredentialError;

// =============================================================================
// Readiness
// =============================================================================

export class ReadinessTimeoutError extends GrainctlError {
  public readonly host: string;
  public readonly timeoutMinutes: number;

  constructor(host: string, timeoutMinutes: number) {
    super(
      `timeout reached after ${timeoutMinutes} minutes; salt-key for ${host} not accepted`,
      ErrorCode.READINESS_TIMEOUT,
      { host, timeoutMinutes }
    );
    this.name = "ReadinessTimeoutError";
    this.host = host;
    this.timeoutMinutes = timeoutMinutes;
  }
}

export class InventoryError extends GrainctlError {
  public readonly status?: number;

  constructor(
    message: string,
    context?: Record<string, unknown> & { status?: number },
    options?: { cause?: unknown }
  ) {
    super(message, ErrorCode.INVENTORY_FAILED, context, options);
    this.name = "InventoryError";
    this.status = context?.status;
  }
}

// =============================================================================
// Convergence
// =============================================================================

export class ConvergenceError extends GrainctlError {
  public readonly host: string;

  constructor(message: string, host: string, options?: { cause?: unknown }) {
    super(message, ErrorCode.CONVERGENCE_FAILED, { host }, options);
    this.name = "ConvergenceError";
    this.host = host;
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Check if an error is a grainctl error
 */
export function isGrainctlError(error: unknown): error is GrainctlError {
  return error instanceof GrainctlError;
}

/**
 * Wrap an unknown error into a GrainctlError
 */
export function wrapError(
  error: unknown,
  defaultMessage = "An unknown error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): GrainctlError {
  if (isGrainctlError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new GrainctlError(error.message, code, { originalError: error.name }, { cause: error });
  }

  if (typeof error === "string") {
    return new GrainctlError(error, code);
  }

  return new GrainctlError(defaultMessage, code, { originalError: String(error) });
}

/**
 * Extract a message from any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
