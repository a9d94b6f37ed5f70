// Per-entity errors (archive, serialization) are caught by the corpus loops and logged.
// StoreOpenError and UnsupportedFormatError end the run.

export class ArchiveParseError extends Error {
  constructor(
    message: string,
    public readonly archivePath: string,
    cause?: unknown
  ) {
    super(`${message} (${archivePath})`, { cause });
    this.name = 'ArchiveParseError';
  }
}

export class StoreOpenError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StoreOpenError';
  }
}

export class SerializationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'SerializationError';
  }
}

export class UnsupportedFormatError extends Error {
  constructor(public readonly format: string) {
    super(`Unsupported format: "${format}" (expected one of: html, text)`);
    this.name = 'UnsupportedFormatError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
