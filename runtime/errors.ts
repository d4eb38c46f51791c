/**
 * Contract errors
 *
 * Every failure inside the runtime is a ContractError carrying a reason tag.
 * A thrown ContractError aborts the whole transaction; the Environment rolls
 * back every store before rethrowing it.
 */

export type RevertReason =
  | 'Unauthorized'
  | 'InvalidImplementation'
  | 'AlreadyInitialized'
  | 'InitializerDisabled'
  | 'InvalidReinitializationEpoch'
  | 'NotInitializing'
  | 'StorageCollision'
  | 'IncompatibleStorageLayout'
  | 'UnknownField'
  | 'UnauthorizedCallContext'
  | 'InvalidAdmin'
  | 'InvalidOwner'
  | 'FunctionNotFound'
  | 'InvalidCalldata'
  | 'CallDepthExceeded'
  | 'ValueOutOfRange'
  | 'ArithmeticOverflow';

export class ContractError extends Error {
  readonly reason: RevertReason;
  readonly detail?: string;

  constructor(reason: RevertReason, detail?: string) {
    super(detail ? `${reason}: ${detail}` : reason);
    this.name = 'ContractError';
    this.reason = reason;
    this.detail = detail;
  }
}

/**
 * Narrow an unknown thrown value, optionally to a specific reason.
 */
export function isContractError(err: unknown, reason?: RevertReason): err is ContractError {
  return err instanceof ContractError && (reason === undefined || err.reason === reason);
}

export function revert(reason: RevertReason, detail?: string): never {
  throw new ContractError(reason, detail);
}
