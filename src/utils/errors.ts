/**
 * Error types for the access decision engine
 *
 * Only validation and lookup failures on policy mutations reach callers.
 * Everything else is handled where it occurs and reported through results.
 */

export const ErrorCodes = {
  // Policy administration (400 / 404 / 409)
  POLICY_VALIDATION_FAILED: 'POLICY_VALIDATION_FAILED',
  POLICY_NOT_FOUND: 'POLICY_NOT_FOUND',
  POLICY_NAME_EXISTS: 'POLICY_NAME_EXISTS',

  // Step-up challenges (401)
  CHALLENGE_INVALID: 'CHALLENGE_INVALID',
  CHALLENGE_EXPIRED: 'CHALLENGE_EXPIRED',

  // Handled locally
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  EVALUATION_DEGRADED: 'EVALUATION_DEGRADED',
  EXTERNAL_SERVICE_TIMEOUT: 'EXTERNAL_SERVICE_TIMEOUT',

  // Storage (409 / 500 / 503)
  CONFLICT: 'CONFLICT',
  DATABASE_ERROR: 'DATABASE_ERROR',
  DATABASE_UNAVAILABLE: 'DATABASE_UNAVAILABLE',
  INTERNAL_ERROR: 'INTERNAL_ERROR'
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export const ErrorStatusCodes: Record<ErrorCode, number> = {
  [ErrorCodes.POLICY_VALIDATION_FAILED]: 400,
  [ErrorCodes.POLICY_NOT_FOUND]: 404,
  [ErrorCodes.POLICY_NAME_EXISTS]: 409,

  [ErrorCodes.CHALLENGE_INVALID]: 401,
  [ErrorCodes.CHALLENGE_EXPIRED]: 401,

  [ErrorCodes.CONFIGURATION_ERROR]: 500,
  [ErrorCodes.EVALUATION_DEGRADED]: 500,
  [ErrorCodes.EXTERNAL_SERVICE_TIMEOUT]: 504,

  [ErrorCodes.CONFLICT]: 409,
  [ErrorCodes.DATABASE_ERROR]: 500,
  [ErrorCodes.DATABASE_UNAVAILABLE]: 503,
  [ErrorCodes.INTERNAL_ERROR]: 500
};

export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCodes.POLICY_VALIDATION_FAILED]: 'Policy validation failed',
  [ErrorCodes.POLICY_NOT_FOUND]: 'Policy not found',
  [ErrorCodes.POLICY_NAME_EXISTS]: 'A policy with this name already exists',

  [ErrorCodes.CHALLENGE_INVALID]: 'Invalid step-up challenge',
  [ErrorCodes.CHALLENGE_EXPIRED]: 'Step-up challenge has expired',

  [ErrorCodes.CONFIGURATION_ERROR]: 'No policies configured',
  [ErrorCodes.EVALUATION_DEGRADED]: 'Risk factor source unavailable',
  [ErrorCodes.EXTERNAL_SERVICE_TIMEOUT]: 'External service timed out',

  [ErrorCodes.CONFLICT]: 'Resource conflict',
  [ErrorCodes.DATABASE_ERROR]: 'Database operation failed',
  [ErrorCodes.DATABASE_UNAVAILABLE]: 'Database temporarily unavailable',
  [ErrorCodes.INTERNAL_ERROR]: 'An unexpected error occurred'
};

export function getStatusCode(code: ErrorCode): number {
  return ErrorStatusCodes[code] || 500;
}

export function getDefaultMessage(code: ErrorCode): string {
  return ErrorMessages[code] || 'An unexpected error occurred';
}

/**
 * Base error for the engine
 */
export class EngineError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message?: string,
    details?: Record<string, unknown>
  ) {
    super(message || getDefaultMessage(code));
    this.name = 'EngineError';
    this.code = code;
    this.statusCode = getStatusCode(code);
    this.details = details;
  }
}

/**
 * Rejected policy write. Carries every validation message, not just the first.
 */
export class PolicyValidationError extends EngineError {
  public readonly errors: string[];

  constructor(errors: string[], code: ErrorCode = ErrorCodes.POLICY_VALIDATION_FAILED) {
    super(code, errors.join('; '), { errors });
    this.name = 'PolicyValidationError';
    this.errors = errors;
  }
}

export class PolicyNotFoundError extends EngineError {
  constructor(policyId: string) {
    super(ErrorCodes.POLICY_NOT_FOUND, `Policy ${policyId} not found`, { policyId });
    this.name = 'PolicyNotFoundError';
  }
}

export class ConfigurationError extends EngineError {
  constructor(message?: string) {
    super(ErrorCodes.CONFIGURATION_ERROR, message);
    this.name = 'ConfigurationError';
  }
}

export class ExternalServiceTimeout extends EngineError {
  public readonly service: string;
  public readonly timeoutMs: number;

  constructor(service: string, timeoutMs: number) {
    super(
      ErrorCodes.EXTERNAL_SERVICE_TIMEOUT,
      `${service} request timed out after ${timeoutMs}ms`,
      { service, timeoutMs }
    );
    this.name = 'ExternalServiceTimeout';
    this.service = service;
    this.timeoutMs = timeoutMs;
  }
}

export class EvaluationDegradation extends EngineError {
  public readonly factor: string;

  constructor(factor: string, cause: string) {
    super(ErrorCodes.EVALUATION_DEGRADED, `${factor}: ${cause}`, { factor });
    this.name = 'EvaluationDegradation';
    this.factor = factor;
  }
}

export class StepUpChallengeError extends EngineError {
  constructor(code: typeof ErrorCodes.CHALLENGE_INVALID | typeof ErrorCodes.CHALLENGE_EXPIRED, message?: string) {
    super(code, message);
    this.name = 'StepUpChallengeError';
  }
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map common AWS errors to EngineError
 */
export function mapAWSError(error: Error): EngineError {
  switch (error.name) {
    case 'ConditionalCheckFailedException':
    case 'TransactionCanceledException':
      return new EngineError(ErrorCodes.CONFLICT, 'Resource already exists or was modified');
    case 'ProvisionedThroughputExceededException':
    case 'ServiceUnavailable':
      return new EngineError(ErrorCodes.DATABASE_UNAVAILABLE);
    case 'ResourceNotFoundException':
      return new EngineError(ErrorCodes.DATABASE_ERROR, 'Table not found');
    default:
      return new EngineError(ErrorCodes.INTERNAL_ERROR);
  }
}
