import { describe, it, expect } from 'vitest';
import { AuthenticationError, ConfigError, IOError, NotFoundError, TagenvError, errorMessage, formatError } from './errors';

describe('errors', () => {
  it('should keep name, hint and cause', () => {
    const cause = new Error('ENOENT');
    const error = new IOError('Failed to read file .env', { cause, hint: 'Check the path' });

    expect(error).toBeInstanceOf(TagenvError);
    expect(error.name).toBe('IOError');
    expect(error.hint).toBe('Check the path');
    expect(error.cause).toBe(cause);
  });

  it('should give authentication failures a default message', () => {
    expect(new AuthenticationError().message).toBe('Decryption failed: wrong key or corrupted data');
  });

  it('should format the message, causes and hint', () => {
    const root = new AuthenticationError();
    const error = new AuthenticationError("Failed to decrypt tag 'v1'", {
      cause: root,
      hint: 'Check that the encryption key matches the one used to push this tag'
    });

    expect(formatError(error)).toBe(
      [
        "❌ Error: Failed to decrypt tag 'v1'",
        '   caused by: Decryption failed: wrong key or corrupted data',
        '💡 Check that the encryption key matches the one used to push this tag'
      ].join('\n')
    );
  });

  it('should format plain errors and unknown values', () => {
    expect(formatError(new Error('boom'))).toBe('❌ Error: boom');
    expect(formatError('text')).toBe('❌ Error: Unknown error');
    expect(errorMessage(new NotFoundError('missing'))).toBe('missing');
  });

  it('should omit the hint line when there is none', () => {
    expect(formatError(new ConfigError('Invalid config: storage.type is required'))).toBe(
      '❌ Error: Invalid config: storage.type is required'
    );
  });
});
