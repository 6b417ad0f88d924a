/**
 * SupplyReplayer - recompute supply from audit events
 *
 * Indexers that only see the event stream use this to answer supply queries.
 * Replaying every event a ledger committed must give the same totals as the
 * ledger's own SupplyLedger.
 */

import { BURN_EVENT, MINT_EVENT } from './constants.js'
import { LedgerInvariantError } from './errors.js'
import { SupplyLedger } from './SupplyLedger.js'
import type { LedgerEvent, ObjectId } from './types.js'

export class SupplyReplayer {
  private ledgers = new Map<ObjectId, SupplyLedger>()

  /**
   * Apply events in order. Mints add, burns subtract, transfers only move
   * ownership and leave supply alone.
   *
   * @throws LedgerInvariantError if a burn exceeds the replayed supply or a
   * mint overflows it
   */
  apply(events: Iterable<LedgerEvent>): this {
    for (const event of events) {
      if (event.type === MINT_EVENT) {
        this.ledgerFor(event.collection).increase(event.tokenId, event.amount)
      } else if (event.type === BURN_EVENT) {
        this.ledgerFor(event.collection).decrease(event.tokenId, event.amount)
      }
    }
    return this
  }

  totalSupply(collection: ObjectId, tokenId: bigint): bigint {
    return this.ledgers.get(collection)?.totalSupply(tokenId) ?? 0n
  }

  /** Token ids seen for a collection */
  tokenIds(collection: ObjectId): bigint[] {
    return this.ledgers.get(collection)?.tokenIds() ?? []
  }

  /**
   * Replay `events` and return the resulting supply of one token.
   */
  static replay(events: Iterable<LedgerEvent>, collection: ObjectId, tokenId: bigint): bigint {
    return new SupplyReplayer().apply(events).totalSupply(collection, tokenId)
  }

  /**
   * Throw if the replayed supply of any token differs from `lookup`.
   */
  verifyAgainst(collection: ObjectId, lookup: (tokenId: bigint) => bigint): void {
    for (const tokenId of this.tokenIds(collection)) {
      const replayed = this.totalSupply(collection, tokenId)
      const recorded = lookup(tokenId)
      if (replayed !== recorded) {
        throw new LedgerInvariantError(`replayed supply ${replayed} of token ${tokenId} differs from recorded ${recorded}`)
      }
    }
  }

  private ledgerFor(collection: ObjectId): SupplyLedger {
    let ledger = this.ledgers.get(collection)
    if (ledger === undefined) {
      ledger = new SupplyLedger()
      this.ledgers.set(collection, ledger)
    }
    return ledger
  }
}
