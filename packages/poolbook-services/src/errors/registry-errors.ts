/**
 * Registry Error Classes
 *
 * Every failure raised by the registries is a RegistryError subclass carrying a
 * stable `code` and the values that triggered it. Writes that throw leave
 * registry state untouched.
 */

export type ValidationErrorCode =
  | 'InvalidName'
  | 'InvalidIdentifier'
  | 'InvalidPoolAddress'
  | 'InvalidInput'
  | 'ZeroToken'
  | 'InvalidPair';

export type NotFoundErrorCode =
  | 'NameNotFound'
  | 'VersionNotFound'
  | 'IdentifierNotFound'
  | 'NotFound'
  | 'BasePoolNotFound'
  | 'OutOfBounds';

export type ConflictErrorCode =
  | 'AlreadyRegistered'
  | 'DuplicateIdentifier'
  | 'DuplicatePoolName'
  | 'ReentrantWrite';

export type AuthorizationErrorCode = 'MissingRole';

export type ExternalMismatchErrorCode = 'WrapperMismatch' | 'NotSaddleOwned';

export type ExternalUnavailableErrorCode = 'NoParameterData';

export type RegistryErrorCode =
  | ValidationErrorCode
  | NotFoundErrorCode
  | ConflictErrorCode
  | AuthorizationErrorCode
  | ExternalMismatchErrorCode
  | ExternalUnavailableErrorCode;

/**
 * Base class of all registry errors
 */
export abstract class RegistryError extends Error {
  abstract readonly code: RegistryErrorCode;

  constructor(
    message: string,
    public readonly details: Record<string, unknown> = {},
    cause?: unknown
  ) {
    super(message);
    this.cause = cause;
  }
}

/**
 * Malformed or zero input
 */
export class ValidationError extends RegistryError {
  constructor(
    public readonly code: ValidationErrorCode,
    message: string,
    details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, details, cause);
    this.name = 'ValidationError';
  }
}

/**
 * Lookup of something that was never registered (or is out of range)
 */
export class NotFoundError extends RegistryError {
  constructor(
    public readonly code: NotFoundErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, details);
    this.name = 'NotFoundError';
  }
}

/**
 * Write that collides with existing state
 */
export class ConflictError extends RegistryError {
  constructor(
    public readonly code: ConflictErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, details);
    this.name = 'ConflictError';
  }
}

/**
 * Caller lacks the role an operation requires
 */
export class AuthorizationError extends RegistryError {
  readonly code = 'MissingRole' as const;

  constructor(
    public readonly account: string,
    public readonly requiredRoles: readonly string[],
    operation: string
  ) {
    super(
      `${account} is not allowed to ${operation} (requires ${requiredRoles.join(' or ')})`,
      { account, requiredRoles, operation }
    );
    this.name = 'AuthorizationError';
  }
}

/**
 * A collaborator reported state inconsistent with the registration
 */
export class ExternalMismatchError extends RegistryError {
  constructor(
    public readonly code: ExternalMismatchErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, details);
    this.name = 'ExternalMismatchError';
  }
}

/**
 * No recognized collaborator response shape succeeded
 */
export class ExternalUnavailableError extends RegistryError {
  constructor(
    public readonly code: ExternalUnavailableErrorCode,
    message: string,
    details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, details, cause);
    this.name = 'ExternalUnavailableError';
  }
}
