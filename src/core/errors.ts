/**
 * Base error class for all relay errors.
 * Extends Error with a machine-readable code, HTTP status, and structured context.
 */
export class RelayError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(params: {
    message: string;
    code: string;
    statusCode?: number;
    cause?: Error;
    context?: Record<string, unknown>;
    isOperational?: boolean;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'RelayError';
    this.code = params.code;
    this.statusCode = params.statusCode ?? 500;
    this.context = params.context;
    this.isOperational = params.isOperational ?? true;
  }
}

/** Thrown when the environment does not describe a valid configuration. */
export class ConfigError extends RelayError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'CONFIG_ERROR',
      statusCode: 500,
      context,
      isOperational: false,
    });
    this.name = 'ConfigError';
  }
}

/** Inbound payload could not be decoded or does not match the webhook schema. */
export class ValidationError extends RelayError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ValidationError';
  }
}

/** Thrown when the completion provider call fails. */
export class ProviderError extends RelayError {
  constructor(provider: string, message: string, cause?: Error) {
    super({
      message: `Completion provider "${provider}" error: ${message}`,
      code: 'PROVIDER_ERROR',
      statusCode: 502,
      cause,
      context: { provider },
    });
    this.name = 'ProviderError';
  }
}
