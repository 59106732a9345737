export type EngineErrorKind =
  | "ClassificationUnavailable"
  | "GenerativeCallFailed"
  | "MalformedGenerativeResponse"
  | "PersistenceUnavailable";

export class EngineError extends Error {
  readonly kind: EngineErrorKind;

  constructor(kind: EngineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
  }
}

export class ClassificationUnavailableError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ClassificationUnavailable", message, options);
  }
}

export class GenerativeCallFailedError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("GenerativeCallFailed", message, options);
  }
}

export class MalformedGenerativeResponseError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("MalformedGenerativeResponse", message, options);
  }
}

export class PersistenceUnavailableError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PersistenceUnavailable", message, options);
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err ?? "unknown error");
}
