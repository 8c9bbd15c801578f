// ============================================================================
// LOCATOR ERROR TYPES
// ============================================================================
// Thrown errors only. Resolution failures (target not found, no unique locator)
// are returned as data inside a ResolutionResult.

/**
 * Categories of errors surfaced to callers
 */
export enum LocatorErrorType {
  /** HTML could not be turned into an element tree at all */
  PARSE = 'parse',
  /** XPath expression is syntactically malformed or selects no node-set */
  INVALID_EXPRESSION = 'invalid_expression',
  /** Request body failed validation */
  VALIDATION = 'validation',
  UNKNOWN = 'unknown',
}

export abstract class LocatorError extends Error {
  abstract readonly type: LocatorErrorType;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ParseError extends LocatorError {
  readonly type = LocatorErrorType.PARSE;
}

export class InvalidExpressionError extends LocatorError {
  readonly type = LocatorErrorType.INVALID_EXPRESSION;

  constructor(
    readonly expression: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Invalid XPath expression "${expression}": ${reason}`, options);
  }
}

export class RequestValidationError extends LocatorError {
  readonly type = LocatorErrorType.VALIDATION;

  constructor(
    message: string,
    readonly field?: string
  ) {
    super(message);
  }
}

export interface ErrorResponse {
  status: number;
  body: {
    success: false;
    error: string;
    type: LocatorErrorType;
    field?: string;
  };
}

/**
 * Map any thrown value to an HTTP status and JSON body
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof RequestValidationError) {
    return {
      status: 400,
      body: { success: false, error: error.message, type: error.type, field: error.field },
    };
  }

  if (error instanceof LocatorError) {
    return { status: 400, body: { success: false, error: error.message, type: error.type } };
  }

  const message = error instanceof Error ? error.message : String(error);
  return { status: 500, body: { success: false, error: message, type: LocatorErrorType.UNKNOWN } };
}

/**
 * Extract a printable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
