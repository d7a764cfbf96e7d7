export type ConfigIssueSeverity = 'error' | 'warning';

export type ConfigIssue = {
  readonly code: string;
  readonly message: string;
  readonly path: readonly (string | number)[];
  readonly severity: ConfigIssueSeverity;
};

export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly issues: readonly ConfigIssue[] = [],
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class AudioSourceError extends Error {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(`${source}: ${message}`, options);
    this.name = 'AudioSourceError';
    this.source = source;
  }
}

export type TransportOperation = 'connect' | 'create' | 'update' | 'remove' | 'close';

export class TransportError extends Error {
  readonly operation: TransportOperation;
  readonly handle?: string;

  constructor(
    operation: TransportOperation,
    message: string,
    options: { handle?: string; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
    this.operation = operation;
    this.handle = options.handle;
  }
}

export class PatternError extends Error {
  readonly input: string;

  constructor(input: string, message = `Unknown pattern "${input}"`) {
    super(message);
    this.name = 'PatternError';
    this.input = input;
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;
