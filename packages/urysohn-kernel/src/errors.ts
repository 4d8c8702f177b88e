/**
 * Error taxonomy for the kernel.
 *
 * Every failure is deterministic: a violated precondition or oracle contract
 * reproduces identically on retry, so callers should not retry.
 */

export type UrysohnErrorCode =
  | 'PRECONDITION_VIOLATED'
  | 'ORACLE_CONTRACT_VIOLATED'
  | 'INVALID_TOLERANCE'
  | 'INVALID_DEPTH'
  | 'INVALID_ARGUMENT';

export class UrysohnError extends Error {
  constructor(message: string, public readonly code: UrysohnErrorCode) {
    super(message);
    this.name = 'UrysohnError';
  }
}

/** `C ⊄ U` at the root, or the two closed sets to separate intersect. */
export class PreconditionViolatedError extends UrysohnError {
  constructor(message: string) {
    super(message, 'PRECONDITION_VIOLATED');
    this.name = 'PreconditionViolatedError';
  }
}

/** The oracle returned a set that does not separate, or could not find one. */
export class OracleContractViolatedError extends UrysohnError {
  constructor(
    message: string,
    /** L/R path of the node whose separation failed ('' = root). Unset when raised by an oracle. */
    public readonly path?: string,
  ) {
    super(message, 'ORACLE_CONTRACT_VIOLATED');
    this.name = 'OracleContractViolatedError';
  }
}

export class ToleranceError extends UrysohnError {
  constructor(tolerance: number) {
    super(`Tolerance must be a finite number > 0, got ${tolerance}`, 'INVALID_TOLERANCE');
    this.name = 'ToleranceError';
  }
}

/** Shared guard for recursion depths and certificate levels. */
export function assertLevel(value: number, what: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new UrysohnError(`${what} must be a non-negative integer, got ${value}`, 'INVALID_DEPTH');
  }
}
