/**
 * Pool errors.
 *
 * Every rejected operation throws a PoolError. The code is stable and is what
 * the RPC edge sends back as `error`; the message is for humans.
 */

export type PoolErrorCode =
  | "Unauthorized"
  | "InsufficientFunds"
  | "ZeroOrBelowMinimum"
  | "BondAlreadyExists"
  | "NoSuchBond"
  | "NotYetExpired"
  | "AlreadyFinalized"
  | "InvalidAddress"
  | "UnknownCheckpoint"
  | "UnexpectedCheckpoint"
  | "OutOfTurn";

export class PoolError extends Error {
  readonly code: PoolErrorCode;

  constructor(code: PoolErrorCode, message: string) {
    super(message);
    this.name = "PoolError";
    this.code = code;
  }
}

export function isPoolError(err: unknown, code?: PoolErrorCode): err is PoolError {
  return err instanceof PoolError && (code === undefined || err.code === code);
}

/** HTTP status for each code. */
export const POOL_ERROR_STATUS: Record<PoolErrorCode, number> = {
  Unauthorized: 403,
  InsufficientFunds: 409,
  ZeroOrBelowMinimum: 422,
  BondAlreadyExists: 409,
  NoSuchBond: 404,
  NotYetExpired: 409,
  AlreadyFinalized: 409,
  InvalidAddress: 422,
  UnknownCheckpoint: 404,
  UnexpectedCheckpoint: 409,
  OutOfTurn: 403,
};
