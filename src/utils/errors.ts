/**
 * Error types and codes for the lint kit.
 * All errors raised by this package extend LintKitError.
 */

/**
 * Base error class for all lint kit errors.
 */
export class LintKitError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LintKitError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration errors (loading, parsing, validation of analysis options).
 */
export class ConfigError extends LintKitError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Errors raised by the lint framework while running rules.
 */
export class LintError extends LintKitError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'LintError';
  }
}

/**
 * A rule's node processor threw while the linter was walking a unit.
 * Collected on the lint result rather than thrown.
 */
export class RuleExecutionError extends LintError {
  constructor(
    public readonly ruleName: string,
    public readonly nodeKind: string,
    cause: unknown
  ) {
    super(
      ErrorCodes.RULE_EXECUTION_FAILED,
      `Rule '${ruleName}' failed on ${nodeKind}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { ruleName, nodeKind }
    );
    this.name = 'RuleExecutionError';
  }
}

/**
 * System errors (file access, YAML parse failures).
 */
export class SystemError extends LintKitError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Configuration
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',
  INVALID_CONFIG: 'INVALID_CONFIG',

  // Lint framework
  RULE_NOT_BOUND: 'RULE_NOT_BOUND',
  RULE_EXECUTION_FAILED: 'RULE_EXECUTION_FAILED',
  UNKNOWN_RULE: 'UNKNOWN_RULE',

  // System
  PARSE_ERROR: 'PARSE_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
