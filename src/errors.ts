/**
 * Error taxonomy for the agent team server.
 *
 * Normalization errors are absorbed at the edges (the offending entry is
 * dropped); storage and assembly errors fail the whole operation. The HTTP
 * error handler maps each class to a status code.
 */

export class ValidationError extends Error {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export class UnknownEnumValueError extends ValidationError {
  readonly enumName: string;
  readonly value: unknown;

  constructor(enumName: string, value: unknown) {
    super(`Unknown ${enumName}: ${JSON.stringify(value)}`, enumName);
    this.name = 'UnknownEnumValueError';
    this.enumName = enumName;
    this.value = value;
  }
}

export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
  }
}

export class AssemblyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AssemblyError';
  }
}

export class ModelBindingError extends AssemblyError {
  readonly provider: string;
  readonly modelId: string;

  constructor(provider: string, modelId: string, options?: { cause?: unknown }) {
    super(`Failed to bind model '${modelId}' for provider '${provider}'`, options);
    this.name = 'ModelBindingError';
    this.provider = provider;
    this.modelId = modelId;
  }
}

export class ToolBindingError extends AssemblyError {
  readonly kind: string;

  constructor(kind: string, options?: { cause?: unknown }) {
    super(`Failed to bind tool '${kind}'`, options);
    this.name = 'ToolBindingError';
    this.kind = kind;
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class RunTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Team run timed out after ${timeoutMs}ms`);
    this.name = 'RunTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Extract a loggable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
