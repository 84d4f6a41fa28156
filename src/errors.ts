export type ErrorKind =
  | "DecodeError"
  | "DetectionServiceError"
  | "EncodeError"
  | "ConfigurationError"
  | "StorageError";

export class RedactionError extends Error {
  readonly kind: ErrorKind;

  constructor(
    kind: ErrorKind,
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.kind = kind;
    this.name = kind;
  }
}

export class DecodeError extends RedactionError {
  constructor(message: string, cause?: Error) {
    super("DecodeError", message, "DECODE_ERROR", cause);
  }
}

export class DetectionServiceError extends RedactionError {
  constructor(
    message: string,
    public readonly retryable: boolean = false,
    cause?: Error,
  ) {
    super("DetectionServiceError", message, "DETECTION_SERVICE_ERROR", cause);
  }
}

export class EncodeError extends RedactionError {
  constructor(message: string, cause?: Error) {
    super("EncodeError", message, "ENCODE_ERROR", cause);
  }
}

export class ConfigurationError extends RedactionError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    cause?: Error,
  ) {
    super("ConfigurationError", message, "CONFIGURATION_ERROR", cause);
  }
}

export class StorageError extends RedactionError {
  constructor(message: string, cause?: Error) {
    super("StorageError", message, "STORAGE_ERROR", cause);
  }
}

export interface ErrorBody {
  kind: ErrorKind;
  message: string;
}

export function toErrorBody(error: RedactionError): ErrorBody {
  return { kind: error.kind, message: error.message };
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
