export type TriageErrorKind =
  | "configuration"
  | "incompatible_dimension"
  | "storage_unavailable"
  | "source_unavailable";

export class TriageError extends Error {
  readonly kind: TriageErrorKind;

  constructor(kind: TriageErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class ConfigurationError extends TriageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("configuration", message, options);
  }
}

export class IncompatibleDimensionError extends TriageError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super("incompatible_dimension", `dimension mismatch: store uses ${expected}-dim vectors, got ${actual}`);
    this.expected = expected;
    this.actual = actual;
  }
}

export class StorageUnavailableError extends TriageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("storage_unavailable", message, options);
  }
}

export class SourceUnavailableError extends TriageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("source_unavailable", message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Classifies any thrown value for stage error reporting. */
export function errorKind(err: unknown): string {
  if (err instanceof TriageError) return err.kind;
  return "unexpected";
}
