export class CaddieError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CaddieError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InputEmptyError extends CaddieError {
  constructor(options?: ErrorOptions) {
    super('Input is empty', 'INPUT_EMPTY', options);
    this.name = 'InputEmptyError';
  }
}

export class ClassificationTimeoutError extends CaddieError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, options?: ErrorOptions) {
    super(`Classification exceeded ${timeoutMs}ms`, 'CLASSIFICATION_TIMEOUT', options);
    this.name = 'ClassificationTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ClassificationNetworkError extends CaddieError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CLASSIFICATION_NETWORK', options);
    this.name = 'ClassificationNetworkError';
  }
}

export class InvalidModelResponseError extends CaddieError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'INVALID_MODEL_RESPONSE', options);
    this.name = 'InvalidModelResponseError';
  }
}

export class ValidationError extends CaddieError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'VALIDATION_ERROR', options);
    this.name = 'ValidationError';
  }
}

export class NoActiveSessionError extends CaddieError {
  constructor(message = 'No active round', options?: ErrorOptions) {
    super(message, 'NO_ACTIVE_SESSION', options);
    this.name = 'NoActiveSessionError';
  }
}

export class ClassificationCancelledError extends CaddieError {
  constructor(options?: ErrorOptions) {
    super('Classification cancelled by a newer input', 'CANCELLED', options);
    this.name = 'ClassificationCancelledError';
  }
}

export class AdapterError extends CaddieError {
  constructor(adapter: string, message: string, options?: ErrorOptions) {
    super(message, `ADAPTER_${adapter.toUpperCase()}`, options);
    this.name = 'AdapterError';
  }
}

export class LLMError extends AdapterError {
  constructor(message: string, options?: ErrorOptions) {
    super('LLM', message, options);
    this.name = 'LLMError';
  }
}

export class ConfigError extends CaddieError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

export class ResourceError extends CaddieError {
  constructor(resource: string, message: string, options?: ErrorOptions) {
    super(`${resource}: ${message}`, 'RESOURCE_ERROR', options);
    this.name = 'ResourceError';
  }
}
