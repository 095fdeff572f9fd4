export type TutorErrorCode =
  | 'NotFound'
  | 'InvalidPair'
  | 'GenerationFailed'
  | 'PersistenceFailed'
  | 'SwapRejected'
  | 'Busy'
  | 'MemoryUnavailable';

/**
 * Error raised inside the tutor core. Only NotFound, InvalidPair, SwapRejected
 * and Busy ever reach a caller of apply; the rest are absorbed and logged.
 */
export class TutorError extends Error {
  readonly code: TutorErrorCode;

  constructor(code: TutorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TutorError';
    this.code = code;
  }
}

export function isTutorError(err: unknown, code?: TutorErrorCode): err is TutorError {
  return err instanceof TutorError && (code === undefined || err.code === code);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
