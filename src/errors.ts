export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export class InvalidPatternError extends Error {
  constructor(
    message: string,
    public readonly pattern: string,
  ) {
    super(message);
    this.name = 'InvalidPatternError';
  }
}

/** A listing, stat or delete on `path` failed; the batch is aborted. */
export class IoError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'IoError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
