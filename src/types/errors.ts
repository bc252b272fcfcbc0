/**
 * Domain Error Types
 *
 * Structured errors raised by the code input controller. Rejected keystrokes are
 * not errors and never reach this module.
 */

/**
 * Base domain error class with structured error information
 */
export class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DomainError';
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

// ============================================
// CODE INPUT ERRORS
// ============================================

export class CodeInputError extends DomainError {
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = 'CodeInputError';
  }
}

export const CodeInputErrors = {
  INVALID_PATTERN: (pattern: string, reason: string) =>
    new CodeInputError('Input pattern is not a valid regular expression', 'CODE_INPUT_INVALID_PATTERN', {
      pattern,
      reason,
    }),

  NOT_INITIALIZED: () =>
    new CodeInputError('Controller has no configured length', 'CODE_INPUT_NOT_INITIALIZED'),

  DISPOSED: (operation: string) =>
    new CodeInputError('Controller is disposed', 'CODE_INPUT_DISPOSED', { operation }),
};

// ============================================
// VALIDATION ERRORS
// ============================================

export class ValidationError extends DomainError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', context);
    this.name = 'ValidationError';
  }
}

export const ValidationErrors = {
  OUT_OF_RANGE: (field: string, min?: number, max?: number) =>
    new ValidationError(`${field} is out of valid range`, { field, min, max }),
};
