import { SupportedPlatform } from './types';

export interface AutomationErrorOptions {
  platform?: SupportedPlatform;
  cause?: unknown;
}

export class AutomationError extends Error {
  readonly platform?: SupportedPlatform;

  constructor(message: string, options: AutomationErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'AutomationError';
    this.platform = options.platform;
  }
}

/** The browser runtime could not be launched. Fatal to the whole run. */
export class SessionStartError extends AutomationError {
  constructor(message: string, options?: AutomationErrorOptions) {
    super(message, options);
    this.name = 'SessionStartError';
  }
}

export class SessionClosedError extends AutomationError {
  constructor(message = 'Session is already closed') {
    super(message);
    this.name = 'SessionClosedError';
  }
}

/** Bad or missing credentials, a verification challenge, or a login timeout. Terminal for that platform. */
export class AuthenticationError extends AutomationError {
  constructor(message: string, options?: AutomationErrorOptions) {
    super(message, options);
    this.name = 'AuthenticationError';
  }
}

export class ExtractionFieldError extends AutomationError {
  readonly field: string;

  constructor(field: string, message: string, options?: AutomationErrorOptions) {
    super(message, options);
    this.name = 'ExtractionFieldError';
    this.field = field;
  }
}

export class NavigationError extends AutomationError {
  readonly url: string;

  constructor(url: string, message: string, options?: AutomationErrorOptions) {
    super(message, options);
    this.name = 'NavigationError';
    this.url = url;
  }
}

/**
 * One ordered sub-step of a publish failed. Earlier steps are not rolled back;
 * `partialState` lists whatever they left on the remote side.
 */
export class PublishStepError extends AutomationError {
  readonly step: string;
  readonly partialState: Record<string, string>;

  constructor(step: string, message: string, partialState: Record<string, string>, options?: AutomationErrorOptions) {
    super(message, options);
    this.name = 'PublishStepError';
    this.step = step;
    this.partialState = partialState;
  }
}

export class ConnectivityError extends AutomationError {
  constructor(message: string, options?: AutomationErrorOptions) {
    super(message, options);
    this.name = 'ConnectivityError';
  }
}

export class ConfigurationError extends AutomationError {
  constructor(message: string, options?: AutomationErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

export class MissingCredentialError extends ConfigurationError {
  readonly key: string;

  constructor(key: string, options?: AutomationErrorOptions) {
    super(`Missing credential ${key}`, options);
    this.name = 'MissingCredentialError';
    this.key = key;
  }
}

export class RequestValidationError extends AutomationError {
  constructor(message: string) {
    super(message);
    this.name = 'RequestValidationError';
  }
}

export class OperationCancelledError extends AutomationError {
  constructor(message = 'Operation cancelled', options?: AutomationErrorOptions) {
    super(message, options);
    this.name = 'OperationCancelledError';
  }
}
