/**
 * netstate Error Hierarchy
 *
 * Typed error classes shared by the CLI and programmatic usage.
 *
 * Hierarchy:
 *   NetstateError (base)
 *   ├── ConfigError (configuration issues)
 *   │   ├── ConfigNotFoundError
 *   │   ├── InvalidConfigError
 *   │   ├── CircularExtendsError
 *   │   ├── ExtendsDepthError
 *   │   ├── UnknownHardwareProfileError
 *   │   ├── DesiredStateNotFoundError
 *   │   └── ControllerNotConfiguredError
 *   ├── ValidationError (desired-state violations)
 *   │   └── DesiredStateInvalidError
 *   ├── PlanningError (cycles, unresolved references)
 *   ├── ControllerError (remote API failures)
 *   │   ├── RateLimitedError          transient
 *   │   ├── NetworkError              transient
 *   │   ├── ServiceUnavailableError   transient
 *   │   ├── TimeoutError              transient
 *   │   ├── AuthenticationError       fatal
 *   │   ├── UnexpectedResponseError   fatal
 *   │   ├── NotFoundError
 *   │   ├── ConflictError
 *   │   ├── RejectedError
 *   │   └── RetryExhaustedError
 *   ├── SnapshotError
 *   └── ApplyAbortedError
 */

import type { Violation, ViolationClass, PlanningIssue } from '../domain/types.js'

interface NetstateErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: unknown
}

/**
 * Base error class for all netstate errors
 */
export class NetstateError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: NetstateErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'NetstateError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Convert to JSON for logging/debugging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context
    }
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends NetstateError {
  constructor(message: string, code: string, options?: NetstateErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when .netstate/config.yaml is required but missing
 */
export class ConfigNotFoundError extends ConfigError {
  constructor(searchedPath?: string) {
    super(
      searchedPath
        ? `Config file not found: ${searchedPath}`
        : 'No .netstate/config.yaml found',
      'CONFIG_NOT_FOUND',
      {
        suggestion: 'Create .netstate/config.yaml or pass --controller and --file explicitly',
        context: searchedPath ? { searchedPath } : undefined
      }
    )
    this.name = 'ConfigNotFoundError'
  }
}

export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath?: string, cause?: unknown) {
    super(
      configPath ? `Invalid config in ${configPath}: ${message}` : `Invalid config: ${message}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check your .netstate/config.yaml syntax',
        context: configPath ? { configPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidConfigError'
  }
}

export class CircularExtendsError extends ConfigError {
  constructor(configPath: string) {
    super(
      `Circular config inheritance detected: ${configPath}`,
      'CIRCULAR_EXTENDS',
      {
        suggestion: 'Check your "extends" fields for circular references',
        context: { configPath }
      }
    )
    this.name = 'CircularExtendsError'
  }
}

export class ExtendsDepthError extends ConfigError {
  constructor(maxDepth: number) {
    super(
      `Config inheritance depth exceeded (max ${maxDepth})`,
      'EXTENDS_DEPTH_EXCEEDED',
      {
        suggestion: 'Reduce nesting of "extends" in your config files',
        context: { maxDepth }
      }
    )
    this.name = 'ExtendsDepthError'
  }
}

export class UnknownHardwareProfileError extends ConfigError {
  constructor(profile: string, knownProfiles: string[]) {
    super(
      `Unknown hardware profile: "${profile}"`,
      'UNKNOWN_HARDWARE_PROFILE',
      {
        suggestion: `Supported profiles: ${knownProfiles.join(', ')}. Declare others under hardware_profiles in .netstate/config.yaml`,
        context: { profile, knownProfiles }
      }
    )
    this.name = 'UnknownHardwareProfileError'
  }
}

export class DesiredStateNotFoundError extends ConfigError {
  constructor(filePath: string) {
    super(
      `Desired-state document not found: ${filePath}`,
      'DESIRED_STATE_NOT_FOUND',
      {
        suggestion: 'Set desired_state in .netstate/config.yaml or pass --file',
        context: { filePath }
      }
    )
    this.name = 'DesiredStateNotFoundError'
  }
}

/**
 * The controller connection cannot be built from the resolved settings
 */
export class ControllerNotConfiguredError extends ConfigError {
  constructor(reason: string, suggestion: string) {
    super(`Controller not configured: ${reason}`, 'CONTROLLER_NOT_CONFIGURED', { suggestion })
    this.name = 'ControllerNotConfiguredError'
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

export class ValidationError extends NetstateError {
  constructor(message: string, code: string, options?: NetstateErrorOptions) {
    super(message, code, options)
    this.name = 'ValidationError'
  }
}

/**
 * Thrown when a desired-state document fails validation.
 * Carries every violation of the failing check class.
 */
export class DesiredStateInvalidError extends ValidationError {
  readonly stage: ViolationClass
  readonly violations: readonly Violation[]

  constructor(stage: ViolationClass, violations: readonly Violation[]) {
    super(
      `Desired state failed ${stage} validation with ${violations.length} violation${violations.length === 1 ? '' : 's'}`,
      'DESIRED_STATE_INVALID',
      {
        suggestion: 'Fix the listed fields in the desired-state document; no controller call was made',
        context: { stage, violations }
      }
    )
    this.name = 'DesiredStateInvalidError'
    this.stage = stage
    this.violations = violations
  }
}

// =============================================================================
// Planning Errors
// =============================================================================

/**
 * Thrown when operations cannot be ordered: dependency cycles, missing
 * operations or references to segments that exist nowhere.
 */
export class PlanningError extends NetstateError {
  readonly issues: readonly PlanningIssue[]

  constructor(issues: readonly PlanningIssue[]) {
    super(
      `Planning failed: ${issues.map(i => i.message).join('; ')}`,
      'PLANNING_FAILED',
      {
        suggestion: 'No operation was executed. Fix the desired state or the live references and plan again',
        context: { issues }
      }
    )
    this.name = 'PlanningError'
    this.issues = issues
  }
}

// =============================================================================
// Controller Errors
// =============================================================================

interface ControllerErrorOptions extends NetstateErrorOptions {
  status?: number
  transient?: boolean
  fatal?: boolean
}

/**
 * Base class for failures of a single controller call
 */
export class ControllerError extends NetstateError {
  /** HTTP status when the controller answered */
  readonly status?: number

  /** Safe to retry with backoff */
  readonly transient: boolean

  /** Halts the whole run */
  readonly fatal: boolean

  constructor(message: string, code: string, options: ControllerErrorOptions = {}) {
    super(message, code, options)
    this.name = 'ControllerError'
    this.status = options.status
    this.transient = options.transient ?? false
    this.fatal = options.fatal ?? false
  }
}

export class RateLimitedError extends ControllerError {
  /** Delay requested by the controller (Retry-After) */
  readonly retryAfterMs?: number

  constructor(operation: string, retryAfterMs?: number) {
    super(
      `Rate limited by controller during ${operation}`,
      'RATE_LIMITED',
      { status: 429, transient: true, context: { operation, retryAfterMs } }
    )
    this.name = 'RateLimitedError'
    this.retryAfterMs = retryAfterMs
  }
}

export class NetworkError extends ControllerError {
  constructor(operation: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause ?? 'unknown error')
    super(
      `Cannot reach controller during ${operation}: ${reason}`,
      'NETWORK_ERROR',
      {
        transient: true,
        suggestion: 'Check controller.url and that the controller is reachable from this host',
        context: { operation },
        cause
      }
    )
    this.name = 'NetworkError'
  }
}

export class ServiceUnavailableError extends ControllerError {
  constructor(operation: string, status: number) {
    super(
      `Controller temporarily unavailable (HTTP ${status}) during ${operation}`,
      'SERVICE_UNAVAILABLE',
      { status, transient: true, context: { operation } }
    )
    this.name = 'ServiceUnavailableError'
  }
}

export class TimeoutError extends ControllerError {
  constructor(operation: string, timeoutMs: number) {
    super(
      `Operation timed out after ${timeoutMs}ms: ${operation}`,
      'TIMEOUT',
      { transient: true, context: { operation, timeoutMs } }
    )
    this.name = 'TimeoutError'
  }
}

export class AuthenticationError extends ControllerError {
  constructor(detail?: string) {
    super(
      detail ? `Controller authentication failed: ${detail}` : 'Controller authentication failed',
      'AUTHENTICATION_FAILED',
      {
        status: 401,
        fatal: true,
        suggestion: 'Check UNIFI_USERNAME / UNIFI_PASSWORD (or controller.username / controller.password)'
      }
    )
    this.name = 'AuthenticationError'
  }
}

export class UnexpectedResponseError extends ControllerError {
  constructor(operation: string, status: number, body: string) {
    super(
      `Unexpected controller response (HTTP ${status}) during ${operation}: ${truncate(body, 200)}`,
      'UNEXPECTED_RESPONSE',
      { status, fatal: true, context: { operation, body: truncate(body, 2000) } }
    )
    this.name = 'UnexpectedResponseError'
  }
}

export class NotFoundError extends ControllerError {
  constructor(target: string) {
    super(`${target} not found on controller`, 'NOT_FOUND', { status: 404, context: { target } })
    this.name = 'NotFoundError'
  }
}

export class ConflictError extends ControllerError {
  constructor(target: string, detail?: string) {
    super(
      detail ? `${target} conflicts with existing controller state: ${detail}` : `${target} already exists on controller`,
      'CONFLICT',
      { status: 409, context: { target } }
    )
    this.name = 'ConflictError'
  }
}

/**
 * The controller refused the payload (validation on the controller side)
 */
export class RejectedError extends ControllerError {
  constructor(target: string, detail: string) {
    super(`Controller rejected ${target}: ${detail}`, 'REJECTED', { status: 400, context: { target, detail } })
    this.name = 'RejectedError'
  }
}

/**
 * A transient failure persisted through every retry attempt
 */
export class RetryExhaustedError extends ControllerError {
  readonly attempts: number

  constructor(operation: string, attempts: number, lastError: ControllerError) {
    super(
      `Gave up on ${operation} after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${lastError.message}`,
      'RETRY_EXHAUSTED',
      { status: lastError.status, context: { operation, attempts, lastCode: lastError.code }, cause: lastError }
    )
    this.name = 'RetryExhaustedError'
    this.attempts = attempts
  }
}

// =============================================================================
// Snapshot / Apply Errors
// =============================================================================

export class SnapshotError extends NetstateError {
  constructor(reason: string, cause?: unknown) {
    super(
      `Pre-apply snapshot failed: ${reason}`,
      'SNAPSHOT_FAILED',
      {
        suggestion: 'Nothing was changed on the controller. Fix the backup target or rerun with --no-snapshot',
        cause
      }
    )
    this.name = 'SnapshotError'
  }
}

export class ApplyAbortedError extends NetstateError {
  constructor(completed: number, remaining: number) {
    super(
      `Apply aborted after ${completed} operation${completed === 1 ? '' : 's'}; ${remaining} not attempted`,
      'APPLY_ABORTED',
      {
        suggestion: 'Applied operations stay committed. Rerun apply to converge the rest',
        context: { completed, remaining }
      }
    )
    this.name = 'ApplyAbortedError'
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isNetstateError(error: unknown): error is NetstateError {
  return error instanceof NetstateError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

export function isControllerError(error: unknown): error is ControllerError {
  return error instanceof ControllerError
}

export function isTransientError(error: unknown): error is ControllerError {
  return error instanceof ControllerError && error.transient
}

export function isFatalError(error: unknown): error is ControllerError {
  return error instanceof ControllerError && error.fatal
}

// =============================================================================
// Exit Codes
// =============================================================================

export const EXIT_CODES = {
  success: 0,
  usage: 1,
  validation: 2,
  planning: 3,
  partial: 4,
  fatal: 5
} as const

export type ExitCode = typeof EXIT_CODES[keyof typeof EXIT_CODES]

/**
 * Map an error escaping the pipeline to the process exit status
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (isValidationError(error)) return EXIT_CODES.validation
  if (error instanceof PlanningError) return EXIT_CODES.planning
  if (isConfigError(error)) return EXIT_CODES.usage
  if (error instanceof ApplyAbortedError || error instanceof SnapshotError || isControllerError(error)) {
    return EXIT_CODES.fatal
  }
  return EXIT_CODES.usage
}

function truncate(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max)}…` : value
}
