import type { ZodError } from 'zod';

export type EngineErrorCode = 'CONFIGURATION_ERROR' | 'INPUT_VALIDATION_ERROR' | 'OPERATOR_MISUSE';

/**
 * Base class for everything the engine throws. Domain outcomes (alerts,
 * exceeded limits, unmet criteria, denials) are returned as data and never
 * surface as an EngineError.
 */
export class EngineError extends Error {
  constructor(
    public readonly code: EngineErrorCode,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends EngineError {
  constructor(message: string, details?: unknown) {
    super('CONFIGURATION_ERROR', message, details);
  }
}

export class InputValidationError extends EngineError {
  constructor(message: string, details?: unknown) {
    super('INPUT_VALIDATION_ERROR', message, details);
  }
}

export class OperatorMisuseError extends EngineError {
  constructor(message: string, details?: unknown) {
    super('OPERATOR_MISUSE', message, details);
  }
}

export class PriorAuthStateError extends OperatorMisuseError {
  constructor(requestId: string, status: string) {
    super(`Prior authorization ${requestId} is already ${status}`, { requestId, status });
  }
}

/** Flatten zod issues into `path: message` strings for error details. */
export function describeIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}
