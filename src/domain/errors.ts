import { Modality } from "./types.js";

export type OperationErrorKind =
  | "validation"
  | "malformed_content"
  | "transient_io"
  | "backend"
  | "internal";

export interface OperationError {
  kind: OperationErrorKind;
  message: string;
  cause?: unknown;
}

export type OperationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: OperationError };

export function succeed<T>(value: T): OperationResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(
  kind: OperationErrorKind,
  message: string,
  cause?: unknown,
): OperationResult<T> {
  return { ok: false, error: { kind, message, cause } };
}

/** Validation failures are deterministic, so retrying them cannot help. */
export function isRetryable(error: OperationError): boolean {
  return error.kind !== "validation";
}

/** Base class for errors that already know which kind they map to. */
export class ClassifiedError extends Error {
  constructor(
    readonly kind: OperationErrorKind,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ClassifiedError";
  }
}

export class ValidationError extends ClassifiedError {
  constructor(message: string, options?: ErrorOptions) {
    super("validation", message, options);
    this.name = "ValidationError";
  }
}

export class EmbeddingDimensionError extends ValidationError {
  constructor(
    readonly modality: Modality,
    readonly expected: number,
    readonly actual: number,
  ) {
    super(
      `Embedding for ${modality} has incorrect dimensions. Expected ${expected}, but got ${actual}.`,
    );
    this.name = "EmbeddingDimensionError";
  }
}

export class MalformedContentError extends ClassifiedError {
  constructor(message: string, options?: ErrorOptions) {
    super("malformed_content", message, options);
    this.name = "MalformedContentError";
  }
}

export class EmbeddingBackendError extends ClassifiedError {
  constructor(message: string, options?: ErrorOptions) {
    super("backend", message, options);
    this.name = "EmbeddingBackendError";
  }
}

/**
 * Converts anything thrown below a service boundary into an error value.
 * Unclassified errors are `internal`; the queue still retries them.
 */
export function toOperationError(error: unknown): OperationError {
  if (error instanceof ClassifiedError) {
    return { kind: error.kind, message: error.message, cause: error.cause };
  }
  if (error instanceof Error) {
    return { kind: "internal", message: error.message, cause: error };
  }
  return { kind: "internal", message: String(error), cause: error };
}
