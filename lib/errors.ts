/**
 * Error taxonomy for deployments.
 *
 * Connectivity, update, restart and certificate failures each get their own class so a
 * release record can say which class of failure ended it.
 */

export type ErrorCode =
  | 'CONFIG_ERROR'
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'SIGNATURE_ERROR'
  | 'COMMAND_FAILED'
  | 'CONNECTIVITY_FAILED'
  | 'UPDATE_FAILED'
  | 'RESTART_FAILED'
  | 'HEALTH_CHECK_FAILED'
  | 'CERTIFICATE_FAILED'
  | 'PROXY_CONFIG_INVALID';

export class PushgateError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'PushgateError';
  }
}

export class ConfigError extends PushgateError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends PushgateError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends PushgateError {
  constructor(
    public readonly resourceType: string,
    public readonly resourceId?: string | number,
  ) {
    super(
      `${resourceType}${resourceId !== undefined ? ` ${resourceId}` : ''} not found`,
      'NOT_FOUND',
      { resourceType, resourceId },
    );
    this.name = 'NotFoundError';
  }

  static target(id: string | number): NotFoundError {
    return new NotFoundError('Target', id);
  }

  static release(id: number): NotFoundError {
    return new NotFoundError('Release', id);
  }
}

export class SignatureError extends PushgateError {
  constructor(message = 'Invalid webhook signature') {
    super(message, 'SIGNATURE_ERROR');
    this.name = 'SignatureError';
  }
}

export class CommandError extends PushgateError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
  ) {
    super(
      `Command failed with exit code ${exitCode ?? 'null'}: ${command}${stderr ? `\n${stderr.trim()}` : ''}`,
      'COMMAND_FAILED',
      { command, exitCode },
    );
    this.name = 'CommandError';
  }
}

export class ConnectivityError extends PushgateError {
  constructor(message: string, public readonly host: string) {
    super(message, 'CONNECTIVITY_FAILED', { host });
    this.name = 'ConnectivityError';
  }
}

export class UpdateError extends PushgateError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'UPDATE_FAILED', details);
    this.name = 'UpdateError';
  }
}

export class RestartError extends PushgateError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RESTART_FAILED', details);
    this.name = 'RestartError';
  }
}

export class HealthCheckError extends PushgateError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'HEALTH_CHECK_FAILED', details);
    this.name = 'HealthCheckError';
  }
}

export class CertificateError extends PushgateError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CERTIFICATE_FAILED', details);
    this.name = 'CertificateError';
  }
}

export class ProxyConfigError extends PushgateError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PROXY_CONFIG_INVALID', details);
    this.name = 'ProxyConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error occurred';
}
