export type StoreErrorCode = 'WRITE_FAILED' | 'INVALID_RECORD' | 'UNREADABLE';

/**
 * Raised by ProjectStore.save. Loads never throw; they degrade to zero.
 */
export class StoreError extends Error {
  public readonly code: StoreErrorCode;

  constructor(code: StoreErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
    this.code = code;
  }
}

export function isStoreError(err: unknown): err is StoreError {
  return err instanceof StoreError;
}
