export type LeyningErrorCode =
  | 'INVALID_ORDINAL'
  | 'INVALID_ARGUMENTS'
  | 'SOURCE_UNAVAILABLE'
  | 'SINK_CONFLICT'
  | 'SINK_UNAVAILABLE'
  | 'CONFIG';

export class LeyningError extends Error {
  readonly code: LeyningErrorCode;

  constructor(code: LeyningErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidOrdinalError extends LeyningError {
  constructor(value: number) {
    super('INVALID_ORDINAL', `Ordinal must be a positive integer, got ${value}`);
  }
}

export class InvalidArgumentsError extends LeyningError {
  constructor(message: string) {
    super('INVALID_ARGUMENTS', message);
  }
}

export class SourceUnavailableError extends LeyningError {
  readonly attempts: number;

  constructor(message: string, attempts: number, cause?: unknown) {
    super('SOURCE_UNAVAILABLE', message, { cause });
    this.attempts = attempts;
  }
}

export class SinkConflictError extends LeyningError {
  readonly sheetName: string;

  constructor(sheetName: string, cause?: unknown) {
    super('SINK_CONFLICT', `Sheet "${sheetName}" already exists`, { cause });
    this.sheetName = sheetName;
  }
}

export class SinkUnavailableError extends LeyningError {
  constructor(message: string, cause?: unknown) {
    super('SINK_UNAVAILABLE', message, { cause });
  }
}

export class ConfigError extends LeyningError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
