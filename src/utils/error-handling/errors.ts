/**
 * Error taxonomy for the SNS client.
 * Every error thrown by a client operation is an instance of SnsClientError.
 */

export class SnsClientError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SnsClientError';
    this.code = code;
  }
}

/**
 * No source produced a usable access key id and secret key
 */
export class MissingCredentialsError extends SnsClientError {
  readonly sourcesTried: string[];

  constructor(message: string, sourcesTried: string[]) {
    super('MissingCredentials', message);
    this.name = 'MissingCredentialsError';
    this.sourcesTried = sourcesTried;
  }
}

export class SignatureError extends SnsClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SignatureError', message, options);
    this.name = 'SignatureError';
  }
}

/**
 * Network level failure: connection refused, DNS lookup, timeout, socket reset
 */
export class TransportError extends SnsClientError {
  readonly action: string;
  readonly host: string;

  constructor(message: string, details: { action: string; host: string; cause: unknown }) {
    super('TransportError', message, { cause: details.cause });
    this.name = 'TransportError';
    this.action = details.action;
    this.host = details.host;
  }
}

export class ParameterValidationError extends SnsClientError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super('ParameterValidation', errors.join('; '));
    this.name = 'ParameterValidationError';
    this.errors = errors;
  }
}

/**
 * Fault reported by the service. `serviceCode` and `message` are verbatim from the response.
 */
export class ApiError extends SnsClientError {
  readonly serviceCode: string;
  readonly requestId: string;
  readonly statusCode: number;
  readonly type?: 'Sender' | 'Receiver';

  constructor(details: {
    code: string;
    message: string;
    requestId: string;
    statusCode: number;
    type?: 'Sender' | 'Receiver';
  }) {
    super(details.code, details.message);
    this.name = 'ApiError';
    this.serviceCode = details.code;
    this.requestId = details.requestId;
    this.statusCode = details.statusCode;
    this.type = details.type;
  }

  get senderFault(): boolean {
    return this.type !== 'Receiver';
  }
}

/**
 * Loggable description of an error. Only name, code and message are kept.
 */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof ApiError) {
    return {
      error: error.message,
      errorName: error.name,
      errorCode: error.serviceCode,
      requestId: error.requestId,
      statusCode: error.statusCode,
    };
  }

  if (error instanceof SnsClientError) {
    return { error: error.message, errorName: error.name, errorCode: error.code };
  }

  if (error instanceof Error) {
    return { error: error.message, errorName: error.name };
  }

  return { error: String(error) };
}
