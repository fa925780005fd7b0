/**
 * Spindle Error Model
 * Stable, typed errors with registry-neutral codes
 */

export enum ErrorCode {
  // Configuration errors
  InvalidConfig = 'INVALID_CONFIG',
  InvalidManifest = 'INVALID_MANIFEST',

  // Registry bookkeeping
  NotFound = 'NOT_FOUND',
  AlreadyExists = 'ALREADY_EXISTS',

  // Provider lifecycle
  ProviderConfiguration = 'PROVIDER_CONFIGURATION',
  ProviderProcessing = 'PROVIDER_PROCESSING',

  // Catch-all
  Internal = 'INTERNAL'
}

/**
 * Base error class for everything the registry, dispatcher and providers raise
 */
export abstract class SpindleError extends Error {
  abstract readonly code: ErrorCode;

  public readonly providerName: string;
  public readonly causeType: string;
  public readonly context: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    providerName: string,
    context: Record<string, unknown> = {},
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.providerName = providerName;
    this.causeType = cause instanceof Error ? cause.constructor.name : 'Unknown';
    this.context = { ...context };
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      providerName: this.providerName,
      causeType: this.causeType,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
      context: this.context,
      timestamp: this.timestamp.toISOString()
    };
  }
}

// Configuration Errors
export class InvalidConfigError extends SpindleError {
  readonly code = ErrorCode.InvalidConfig;
}

export class InvalidManifestError extends SpindleError {
  readonly code = ErrorCode.InvalidManifest;
}

// Registry Errors
export class NotFoundError extends SpindleError {
  readonly code = ErrorCode.NotFound;
}

export class AlreadyExistsError extends SpindleError {
  readonly code = ErrorCode.AlreadyExists;
}

/**
 * A provider could not be constructed. Discovery logs it and moves on to the
 * next entry.
 */
export class ProviderConfigurationError extends SpindleError {
  readonly code = ErrorCode.ProviderConfiguration;
}

/**
 * A selected provider failed while processing its input. The dispatcher
 * hands it back to the caller untouched.
 */
export class ProviderProcessingError extends SpindleError {
  readonly code = ErrorCode.ProviderProcessing;
}

// Internal/Unknown
export class InternalError extends SpindleError {
  readonly code = ErrorCode.Internal;
}

/**
 * Error factory for creating typed errors
 */
export class ErrorFactory {
  static create(
    code: ErrorCode,
    message: string,
    providerName: string,
    context: Record<string, unknown> = {},
    cause?: unknown
  ): SpindleError {
    switch (code) {
      case ErrorCode.InvalidConfig:
        return new InvalidConfigError(message, providerName, context, cause);
      case ErrorCode.InvalidManifest:
        return new InvalidManifestError(message, providerName, context, cause);
      case ErrorCode.NotFound:
        return new NotFoundError(message, providerName, context, cause);
      case ErrorCode.AlreadyExists:
        return new AlreadyExistsError(message, providerName, context, cause);
      case ErrorCode.ProviderConfiguration:
        return new ProviderConfigurationError(message, providerName, context, cause);
      case ErrorCode.ProviderProcessing:
        return new ProviderProcessingError(message, providerName, context, cause);
      case ErrorCode.Internal:
      default:
        return new InternalError(message, providerName, context, cause);
    }
  }

  static getErrorCode(error: unknown): ErrorCode | null {
    if (error instanceof SpindleError) {
      return error.code;
    }
    return null;
  }

  /**
   * Human-readable message of anything thrown
   */
  static describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
