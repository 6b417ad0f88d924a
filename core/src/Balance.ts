import { U64_MAX } from './constants.js'
import { LedgerError, LedgerInvariantError } from './errors.js'
import type { ObjectId } from './types.js'

// Amounts are kept off the instance; only this module's helpers change them
const amounts = new WeakMap<Balance, bigint>()

/**
 * An owned quantity of one token type under one Collection.
 *
 * Collection and token id never change. The amount only moves through
 * `withdrawFrom` (split) and `depositInto` (join), which the object store
 * calls after the transaction's ownership and collection checks. A Balance
 * built outside the ledger is never live, so every operation rejects it.
 */
export class Balance {
  constructor(
    readonly id: ObjectId,
    readonly collectionId: ObjectId,
    readonly tokenId: bigint,
    amount: bigint
  ) {
    amounts.set(this, amount)
    Object.freeze(this)
  }

  value(): bigint {
    return amounts.get(this) ?? 0n
  }
}

/**
 * @throws LedgerError (ZeroAmount) for a zero amount
 * @throws LedgerError (InsufficientBalance) if the balance holds less
 */
export function withdrawFrom(balance: Balance, amount: bigint): void {
  const current = balance.value()
  if (amount === 0n) {
    throw new LedgerError('ZeroAmount', 'Cannot split off zero tokens')
  }
  if (amount > current) {
    throw new LedgerError('InsufficientBalance', `Balance ${balance.id} holds ${current}, requested ${amount}`)
  }
  amounts.set(balance, current - amount)
}

/**
 * @throws LedgerInvariantError if the sum leaves the u64 range, which supply
 * bounds enforced at mint should make impossible
 */
export function depositInto(balance: Balance, amount: bigint): void {
  const next = balance.value() + amount
  if (next > U64_MAX) {
    throw new LedgerInvariantError(`balance ${balance.id} would overflow u64 (${next})`)
  }
  amounts.set(balance, next)
}

/** Rollback only */
export function restoreAmount(balance: Balance, amount: bigint): void {
  amounts.set(balance, amount)
}
