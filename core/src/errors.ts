/**
 * Errors raised by ledger operations.
 *
 * `LedgerError` covers everything a caller can cause with bad input or by
 * touching objects it does not own. `LedgerInvariantError` means the ledger's
 * own bookkeeping is broken (supply drifted away from the balances it tracks)
 * and is never the caller's fault.
 */

export type LedgerErrorKind =
  | 'WrongCollection'
  | 'WrongTokenId'
  | 'InsufficientBalance'
  | 'InvalidArg'
  | 'ZeroAmount'
  | 'NotFound'
  | 'NotOwner'
  | 'UnknownObject'

export class LedgerError extends Error {
  readonly kind: LedgerErrorKind

  constructor(kind: LedgerErrorKind, message: string) {
    super(`${kind}: ${message}`)
    this.name = 'LedgerError'
    this.kind = kind
  }
}

export class LedgerInvariantError extends Error {
  readonly fatal = true

  constructor(message: string) {
    super(`Invariant violation: ${message}`)
    this.name = 'LedgerInvariantError'
  }
}

/**
 * Narrow an unknown thrown value to a LedgerError, optionally of one kind.
 */
export function isLedgerError(error: unknown, kind?: LedgerErrorKind): error is LedgerError {
  if (!(error instanceof LedgerError)) return false
  return kind === undefined || error.kind === kind
}
