export class CommitcraftError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CommitcraftError';
  }
}

/** git is missing, the cwd is not a work tree, or a diff query failed. */
export class EnvironmentError extends CommitcraftError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EnvironmentError';
  }
}

export class NoChangesError extends CommitcraftError {
  constructor(message = 'no changes detected in the repository') {
    super(message);
    this.name = 'NoChangesError';
  }
}

/** Any failure of a completion call. */
export abstract class GenerationError extends CommitcraftError {}

export class TransportError extends GenerationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class RemoteError extends GenerationError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`API error: ${body} (status code: ${status})`);
    this.name = 'RemoteError';
    this.status = status;
    this.body = body;
  }
}

export class ParseError extends GenerationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ParseError';
  }
}

export class EmptyResponseError extends GenerationError {
  constructor(message = 'no response from AI model') {
    super(message);
    this.name = 'EmptyResponseError';
  }
}

export class CommitError extends CommitcraftError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CommitError';
  }
}

export class ConfigError extends CommitcraftError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** stdin closed while a line was still expected. */
export class InputError extends CommitcraftError {
  constructor(message = 'input stream closed') {
    super(message);
    this.name = 'InputError';
  }
}

/** Prefix shown before a fatal error on the terminal. */
export function errorLabel(err: unknown): string {
  if (err instanceof EnvironmentError || err instanceof NoChangesError) {
    return 'Error getting git diff:';
  }
  if (err instanceof GenerationError) {
    return 'Error generating commit message:';
  }
  if (err instanceof CommitError) {
    return 'Error creating commit:';
  }
  if (err instanceof InputError) {
    return 'Error reading user input:';
  }
  if (err instanceof ConfigError) {
    return 'Configuration error:';
  }
  return 'Error:';
}
