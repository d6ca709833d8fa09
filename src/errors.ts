import { showValue } from "./types.js";

export const ErrorCodes = {
  // Construction errors (C001-C004)
  TOO_MANY_ARGUMENTS: "C001",
  NOT_A_MAPPING: "C002",
  NON_PATTERN_KEY: "C003",
  INVALID_DISPATCH_SOURCE: "C004",

  // Parametrization
  INVALID_ARGUMENT: "V001",

  // Lookup
  NO_MATCH: "L001",

  // Configuration
  INVALID_CONFIG: "K001",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base class of every error the engine throws on purpose.
 *
 * Argument-count mistakes when calling a dispatched handler are not wrapped:
 * they surface as the native `TypeError`.
 */
export class TypeShapeError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "TypeShapeError";
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
 * Malformed input to `DispatchTable` or `createDispatchFunction`.
 * Always thrown from the constructor itself.
 */
export class ConstructionError extends TypeShapeError {
  constructor(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(code, message, details);
    this.name = "ConstructionError";
  }
}

/**
 * Rejected parametrization: thrown by a pattern's `afterSubscription` hook.
 * `argument` is the position or attribute name of the offending argument.
 */
export class PatternValidationError extends TypeShapeError {
  constructor(
    readonly origin: string,
    readonly argument: string | number,
    message: string,
  ) {
    super(ErrorCodes.INVALID_ARGUMENT, `${origin}: ${message}`, {
      origin,
      argument,
    });
    this.name = "PatternValidationError";
  }
}

/** No dispatch entry accepts the item's pattern. */
export class PatternLookupError extends TypeShapeError {
  constructor(readonly item: unknown) {
    super(ErrorCodes.NO_MATCH, `No match for ${showValue(item)}`, {
      item: showValue(item),
    });
    this.name = "PatternLookupError";
  }
}

export class ConfigurationError extends TypeShapeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.INVALID_CONFIG, message, details);
    this.name = "ConfigurationError";
  }
}
