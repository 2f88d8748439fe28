export enum ErrorCode {
  CONFIG_ERROR = "CONFIG_ERROR",
  STORE_CONNECTION_ERROR = "STORE_CONNECTION_ERROR",
  VALIDATION_ERROR = "VALIDATION_ERROR",
}

export class ConfigError extends Error {
  readonly code = ErrorCode.CONFIG_ERROR;
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class StoreConnectionError extends Error {
  readonly code = ErrorCode.STORE_CONNECTION_ERROR;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreConnectionError";
  }
}

export class ValidationError extends Error {
  readonly code = ErrorCode.VALIDATION_ERROR;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
