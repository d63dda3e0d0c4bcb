/**
 * Error codes raised by the client itself.
 *
 * Protocol errors reported by the authorization server (RFC 6749 §5.2) are
 * not among them: those are returned as token responses.
 */
export enum OAuth2ClientErrorCode {
  CONFIGURATION_ERROR = 'configuration_error',
  SERVER_ERROR = 'server_error',
  STATE_MISMATCH = 'state_mismatch',
  INVALID_RESPONSE = 'invalid_response',
}

/**
 * Base class of every error the client throws.
 * Messages are sanitized so that secrets and tokens never end up in logs.
 */
export class OAuth2ClientError extends Error {
  public readonly code: OAuth2ClientErrorCode;
  public readonly isRetryable: boolean;
  public readonly cause?: Error;

  public constructor(
    message: string,
    code: OAuth2ClientErrorCode,
    isRetryable: boolean = false,
    cause?: Error,
  ) {
    super(OAuth2ClientError.sanitizeMessage(message));
    this.name = 'OAuth2ClientError';
    this.code = code;
    this.isRetryable = isRetryable;
    this.cause = cause;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  private static sanitizeMessage(message: string): string {
    return message
      .replace(/\bBearer\s+[a-zA-Z0-9._~+/=-]+/gi, 'Bearer [REDACTED]')
      .replace(/\bBasic\s+[a-zA-Z0-9+/=]+/gi, 'Basic [REDACTED]')
      .replace(/\baccess_token[=:]\s*[^\s&]+/gi, 'access_token=[REDACTED]')
      .replace(/\brefresh_token[=:]\s*[^\s&]+/gi, 'refresh_token=[REDACTED]')
      .replace(/\bclient_secret[=:]\s*[^\s&]+/gi, 'client_secret=[REDACTED]')
      .replace(/\bpassword[=:]\s*[^\s&]+/gi, 'password=[REDACTED]')
      .replace(/\bcode[=:]\s*[^\s&]+/gi, 'code=[REDACTED]');
  }

  /**
   * Convert the error to a JSON representation (useful for logging/debugging)
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      isRetryable: this.isRetryable,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }
}

/**
 * A required endpoint is not configured, or the configuration is invalid.
 */
export class ConfigurationError extends OAuth2ClientError {
  public constructor(message: string, cause?: Error) {
    super(message, OAuth2ClientErrorCode.CONFIGURATION_ERROR, false, cause);
    this.name = 'ConfigurationError';
  }

  public static missingEndpoint(
    endpoint: 'authorizationEndpoint' | 'tokenEndpoint',
  ): ConfigurationError {
    return new ConfigurationError(
      `You need to provide ${endpoint} to use this operation`,
    );
  }
}

/**
 * The token endpoint answered with a 5xx status. Callers may retry.
 */
export class ServerError extends OAuth2ClientError {
  public readonly status: number;
  public readonly statusText: string;

  public constructor(status: number, statusText: string = '') {
    super(
      `Token endpoint returned HTTP ${status}${statusText ? ` ${statusText}` : ''}`,
      OAuth2ClientErrorCode.SERVER_ERROR,
      true,
    );
    this.name = 'ServerError';
    this.status = status;
    this.statusText = statusText;
  }

  public override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), status: this.status };
  }
}

/**
 * The `state` returned on the redirect differs from the one sent.
 * The flow must be abandoned.
 */
export class StateMismatchError extends OAuth2ClientError {
  public constructor() {
    super('state mismatch', OAuth2ClientErrorCode.STATE_MISMATCH);
    this.name = 'StateMismatchError';
  }
}

/**
 * The token endpoint body is not a JSON object.
 */
export class InvalidResponseError extends OAuth2ClientError {
  public constructor(message: string, cause?: Error) {
    super(message, OAuth2ClientErrorCode.INVALID_RESPONSE, false, cause);
    this.name = 'InvalidResponseError';
  }
}
