/**
 * Failure taxonomy for the identity pipeline, intake and registry.
 *
 * Every failure is scoped to the current submission or request; none of
 * them is fatal to the process.
 */
export type StoneErrorCode =
  | 'EXTRACTION_FAILURE'
  | 'NO_SUBJECT_DETECTED'
  | 'NOT_A_STONE'
  | 'NOT_FOUND'
  | 'NOT_OWNER'
  | 'GEOCODING_UNAVAILABLE'
  | 'INVALID_INPUT'
  | 'PERSISTENCE_FAILURE';

export class StoneError extends Error {
  readonly code: StoneErrorCode;

  constructor(code: StoneErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoneError';
    this.code = code;
  }
}

export function isStoneError(err: unknown, code?: StoneErrorCode): err is StoneError {
  return err instanceof StoneError && (code === undefined || err.code === code);
}
