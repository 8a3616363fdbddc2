export class RelayWatchError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'RelayWatchError';
    this.code = code;
  }
}

export class ConfigValidationError extends RelayWatchError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration validation failed:\n${errors.join('\n')}`, 'CONFIG_VALIDATION_ERROR');
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

export class ControlConnectionError extends RelayWatchError {
  constructor(message: string) {
    super(message, 'CONTROL_CONNECTION_ERROR');
    this.name = 'ControlConnectionError';
  }
}

export class ControlAuthenticationError extends RelayWatchError {
  constructor(message: string) {
    super(message, 'CONTROL_AUTHENTICATION_ERROR');
    this.name = 'ControlAuthenticationError';
  }
}

export class ControlTimeoutError extends RelayWatchError {
  constructor(command: string) {
    super(`Control port request timed out: ${command}`, 'CONTROL_TIMEOUT');
    this.name = 'ControlTimeoutError';
  }
}

export class ControlReplyError extends RelayWatchError {
  public readonly status: number;

  constructor(status: number, message: string) {
    super(`${status} ${message}`, 'CONTROL_REPLY_ERROR');
    this.name = 'ControlReplyError';
    this.status = status;
  }
}

export class MailConfigurationError extends RelayWatchError {
  constructor(missing: string) {
    super(`Mail delivery is not configured: missing "${missing}"`, 'MAIL_CONFIGURATION_ERROR');
    this.name = 'MailConfigurationError';
  }
}

export class ReportFieldAlreadySetError extends RelayWatchError {
  constructor(field: string) {
    super(`Report field already set: ${field}`, 'REPORT_FIELD_ALREADY_SET');
    this.name = 'ReportFieldAlreadySetError';
  }
}

/**
 * Message text of anything thrown.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
