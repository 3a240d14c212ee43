export type IdentityErrorCode =
  | 'VALIDATION_FAILED'
  | 'DUPLICATE_USERNAME'
  | 'DUPLICATE_EMAIL'
  | 'AUTHENTICATION_FAILED'
  | 'ACCOUNT_INACTIVE'
  | 'TOKEN_INVALID'
  | 'TOKEN_EXPIRED'
  | 'TOKEN_VERIFICATION_ERROR'
  | 'STORE_UNAVAILABLE'
  | 'UNROUTABLE_COMMAND'
  | 'FORBIDDEN'
  | 'PRINCIPAL_NOT_FOUND'
  | 'KEY_STORAGE_FAILED'
  | 'CONFIGURATION_ERROR';

export class IdentityError extends Error {
  constructor(
    public code: IdentityErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'IdentityError';

    // Maintain proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, IdentityError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

export function createIdentityError(
  code: IdentityErrorCode,
  message: string,
  statusCode: number = 500,
  details?: Record<string, unknown>
): IdentityError {
  return new IdentityError(code, message, statusCode, details);
}

export function isIdentityError(error: unknown, code?: IdentityErrorCode): error is IdentityError {
  return error instanceof IdentityError && (code === undefined || error.code === code);
}

// Predefined error types
export const IdentityErrors = {
  VALIDATION_FAILED: (violations: string[]) =>
    createIdentityError('VALIDATION_FAILED', `Validation failed: ${violations.join(', ')}`, 400, {
      violations,
    }),

  DUPLICATE_USERNAME: (username: string) =>
    createIdentityError('DUPLICATE_USERNAME', `Username '${username}' already exists`, 409),

  DUPLICATE_EMAIL: (email: string) =>
    createIdentityError('DUPLICATE_EMAIL', `Email '${email}' already exists`, 409),

  // Same message for unknown username and wrong password
  AUTHENTICATION_FAILED: () =>
    createIdentityError('AUTHENTICATION_FAILED', 'Invalid username or password', 401),

  ACCOUNT_INACTIVE: () => createIdentityError('ACCOUNT_INACTIVE', 'User account is inactive', 403),

  TOKEN_INVALID: (details?: Record<string, unknown>) =>
    createIdentityError('TOKEN_INVALID', 'Invalid token', 401, details),

  TOKEN_EXPIRED: (details?: Record<string, unknown>) =>
    createIdentityError('TOKEN_EXPIRED', 'Token has expired', 401, details),

  TOKEN_VERIFICATION_ERROR: (expected: string, actual: string) =>
    createIdentityError('TOKEN_VERIFICATION_ERROR', 'Invalid token type', 401, {
      expected,
      actual,
    }),

  STORE_UNAVAILABLE: (operation: string, cause?: unknown) =>
    createIdentityError('STORE_UNAVAILABLE', `Credential store unavailable during ${operation}`, 503, {
      cause: cause instanceof Error ? cause.message : undefined,
    }),

  UNROUTABLE_COMMAND: (kind: string) =>
    createIdentityError('UNROUTABLE_COMMAND', `No handler registered for command: ${kind}`, 500),

  FORBIDDEN: (role: string) =>
    createIdentityError('FORBIDDEN', `Role required: ${role}`, 403),

  PRINCIPAL_NOT_FOUND: (id: string) =>
    createIdentityError('PRINCIPAL_NOT_FOUND', `Principal not found: ${id}`, 404),

  KEY_STORAGE_FAILED: (reason: string) =>
    createIdentityError('KEY_STORAGE_FAILED', `Key storage failure: ${reason}`, 500),

  CONFIGURATION_ERROR: (message: string) =>
    createIdentityError('CONFIGURATION_ERROR', `Configuration error: ${message}`, 500),
} as const;

// Error sanitization for logging
export function sanitizeError(error: unknown): Record<string, unknown> {
  if (error instanceof IdentityError) {
    return {
      type: 'IdentityError',
      code: error.code,
      message: error.message,
      statusCode: error.statusCode,
      // Don't include details in production to prevent information leakage
      ...(process.env.NODE_ENV !== 'production' && { details: error.details }),
    };
  }

  if (error instanceof Error) {
    return {
      type: 'Error',
      message: error.message,
      name: error.name,
      // Only include stack trace in development
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
    };
  }

  return {
    type: 'Unknown',
    message: 'An unknown error occurred',
  };
}

// HTTP response helper
export function createErrorResponse(error: unknown): {
  statusCode: number;
  body: { error: { code: string; message: string; details?: Record<string, unknown> } };
} {
  if (!(error instanceof IdentityError)) {
    return {
      statusCode: 500,
      body: { error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } },
    };
  }

  // Violations are the caller's to fix; other details only in development
  const exposeDetails =
    error.details !== undefined &&
    (error.code === 'VALIDATION_FAILED' || process.env.NODE_ENV === 'development');

  return {
    statusCode: error.statusCode,
    body: {
      error: {
        code: error.code,
        message: error.message,
        ...(exposeDetails && { details: error.details }),
      },
    },
  };
}
