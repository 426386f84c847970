export interface TagenvErrorOptions {
  cause?: unknown;
  hint?: string;
}

export class TagenvError extends Error {
  readonly hint?: string;

  constructor(message: string, options: TagenvErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TagenvError';
    this.hint = options.hint;
  }
}

/** Filesystem read or write failure. */
export class IOError extends TagenvError {
  constructor(message: string, options?: TagenvErrorOptions) {
    super(message, options);
    this.name = 'IOError';
  }
}

/** Malformed key, archive or config content. */
export class FormatError extends TagenvError {
  constructor(message: string, options?: TagenvErrorOptions) {
    super(message, options);
    this.name = 'FormatError';
  }
}

/** Envelope failed integrity checks: wrong key, truncation or tampering. */
export class AuthenticationError extends TagenvError {
  constructor(message = 'Decryption failed: wrong key or corrupted data', options?: TagenvErrorOptions) {
    super(message, options);
    this.name = 'AuthenticationError';
  }
}

export class NotFoundError extends TagenvError {
  constructor(message: string, options?: TagenvErrorOptions) {
    super(message, options);
    this.name = 'NotFoundError';
  }
}

export class ConfigError extends TagenvError {
  constructor(message: string, options?: TagenvErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Renders an error for the terminal: the message, its causes, and the hint
 * on its own line when there is one.
 */
export function formatError(error: unknown): string {
  const lines = [`❌ Error: ${errorMessage(error)}`];
  let cause = error instanceof Error ? error.cause : undefined;
  while (cause instanceof Error) {
    lines.push(`   caused by: ${cause.message}`);
    cause = cause.cause;
  }
  if (error instanceof TagenvError && error.hint) {
    lines.push(`💡 ${error.hint}`);
  }
  return lines.join('\n');
}
