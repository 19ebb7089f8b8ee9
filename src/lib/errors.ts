/**
 * Base error class for all test generation errors
 */
export class TestGenError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "TestGenError";
    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Error for malformed test cases and registrations
 */
export class ValidationError extends TestGenError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * Error for configuration issues
 */
export class ConfigError extends TestGenError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}

/**
 * Error for a target name missing from the target table
 */
export class TargetNotFoundError extends TestGenError {
  constructor(targetName: string) {
    super(`Target not found: ${targetName}`, "TARGET_NOT_FOUND", { targetName });
    this.name = "TargetNotFoundError";
  }
}
