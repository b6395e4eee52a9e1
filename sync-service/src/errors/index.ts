/**
 * Base error of the sync engine. `isRecoverable` tells the coordinator whether
 * the note should go back to the retry queue.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly isRecoverable: boolean = true,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Store I/O failure. Always propagated, never retried by the store itself.
 */
export class StorageError extends AppError {
  constructor(
    public readonly operation: string,
    cause: unknown,
  ) {
    super(`storage failure in ${operation}: ${getErrorMessage(cause)}`, 'storage_error', false, { cause });
  }
}

export class ProviderUnavailableError extends AppError {
  constructor(vaultId: string) {
    super(`provider unavailable for vault ${vaultId}`, 'provider_unavailable', true);
  }
}

export class ProviderWriteError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'provider_write_error', true, options);
  }
}

export class ProviderReadError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'provider_read_error', true, options);
  }
}

export class NoteNotFoundError extends AppError {
  constructor(noteId: string) {
    super(`note not found: ${noteId}`, 'note_not_found', false);
  }
}

export class VaultNotFoundError extends AppError {
  constructor(vaultId: string) {
    super(`vault not found: ${vaultId}`, 'vault_not_found', false);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
