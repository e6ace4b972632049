// -- Error Types ---

/**
 * Machine-readable codes carried by every sourcelock error. Per-file results
 * and CLI output report these instead of class names.
 */
export type ErrorCode =
  | 'io_error'
  | 'format_error'
  | 'crypto_error'
  | 'integrity_error'
  | 'validation_error';

/**
 * Thrown when reading, writing or creating a file or directory fails.
 */
export class IOError extends Error {
  override readonly name = 'IOError' as const;
  readonly code: ErrorCode = 'io_error';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
  }
}

/**
 * Thrown when an artifact is missing one of its fields or a field cannot be decoded.
 */
export class FormatError extends Error {
  override readonly name = 'FormatError' as const;
  readonly code: ErrorCode = 'format_error';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
  }
}

/**
 * Thrown when AES-GCM encryption fails, or when a chunk does not authenticate
 * (tampered ciphertext, nonce or tag, or the wrong key).
 */
export class CryptoError extends Error {
  override readonly name = 'CryptoError' as const;
  readonly code: ErrorCode = 'crypto_error';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
  }
}

/**
 * Thrown when every chunk decrypted but the artifact's HMAC does not match
 * (chunks reordered, dropped or substituted).
 */
export class IntegrityError extends Error {
  override readonly name = 'IntegrityError' as const;
  readonly code: ErrorCode = 'integrity_error';

  constructor(message = 'Integrity verification failed') {
    super(message);
  }
}

/**
 * Thrown when a key package or an option is structurally invalid.
 */
export class ValidationError extends Error {
  override readonly name = 'ValidationError' as const;
  readonly code: ErrorCode = 'validation_error';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
  }
}

export type SourcelockError =
  | IOError
  | FormatError
  | CryptoError
  | IntegrityError
  | ValidationError;

export function isSourcelockError(error: unknown): error is SourcelockError {
  return (
    error instanceof IOError ||
    error instanceof FormatError ||
    error instanceof CryptoError ||
    error instanceof IntegrityError ||
    error instanceof ValidationError
  );
}

/**
 * Flatten any thrown value into a message and code for a structured result.
 */
export function describeError(error: unknown): { error: string; code: ErrorCode | 'unknown_error' } {
  if (isSourcelockError(error)) {
    return { error: error.message, code: error.code };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { error: message, code: 'unknown_error' };
}
