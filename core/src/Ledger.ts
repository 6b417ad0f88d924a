/**
 * Ledger - Multi-Token Accounting Engine
 *
 * Owns every Collection, CollectionCap and Balance, runs transactions against
 * them and publishes the audit events of committed transactions.
 *
 */

import type { Balance } from './Balance.js'
import type { Collection } from './Collection.js'
import type { CollectionCap } from './CollectionCap.js'
import { LEDGER_LOG_SCOPE } from './constants.js'
import { LedgerError, LedgerInvariantError, isLedgerError } from './errors.js'
import { LedgerTransaction } from './LedgerTransaction.js'
import { createLogger } from './logging.js'
import { ObjectStore, type LedgerObject } from './ObjectStore.js'
import type {
  Address,
  CommittedEvent,
  CommittedTransaction,
  LedgerConfig,
  Owner,
  ResolvedLedgerConfig,
  SupplyMismatch,
  TransactionListener
} from './types.js'
import { generateObjectId } from './utils.js'

/**
 * @example
 * ```typescript
 * const ledger = new Ledger()
 * const { collection, cap } = ledger.createCollection(admin)
 *
 * const tokenId = TokenId.make(100n, 1n)
 * ledger.execute(admin, tx => tx.mint(cap, collection, tokenId, 100n, alice))
 *
 * ledger.totalSupply(collection, tokenId) // 100n
 * ```
 */
export class Ledger {
  private config: ResolvedLedgerConfig
  private store = new ObjectStore()
  private committed: CommittedTransaction[] = []
  private listeners = new Set<TransactionListener>()
  private active = false

  constructor(config: LedgerConfig = {}) {
    this.config = this.resolveConfig(config)
  }

  // ---------------------------------------------------------------------------
  // Transactions
  // ---------------------------------------------------------------------------

  /**
   * Run `block` as one all-or-nothing transaction on behalf of `sender`.
   *
   * If `block` throws, every change it made is rolled back, its events are
   * dropped and the error is re-thrown. Otherwise the transaction gets a
   * digest, its events are recorded and subscribers are notified in
   * subscription order. A subscriber that throws is logged and skipped; the
   * transaction stays committed.
   *
   * @param sender - Address acting in the transaction
   * @param block - Synchronous function issuing ledger operations
   * @returns Whatever `block` returns
   * @throws LedgerError (InvalidArg) if called while another transaction runs
   */
  execute<T>(sender: Address, block: (tx: LedgerTransaction) => T): T {
    if (this.active) {
      throw new LedgerError('InvalidArg', 'Transactions cannot be nested')
    }

    const tx = new LedgerTransaction(sender, this.store, this.config.generateId)
    this.store.begin()
    this.active = true

    let result: T
    try {
      result = block(tx)
      if (result instanceof Promise) {
        // Whatever the block does once it resumes hits a closed transaction
        result.catch((error: unknown) => {
          this.config.logger.error(`Asynchronous transaction block of ${sender} failed after it was rejected`, error)
        })
        throw new LedgerError('InvalidArg', 'Transaction blocks must be synchronous')
      }
    } catch (error) {
      this.store.rollback()
      this.reportAbort(sender, error)
      throw error
    } finally {
      tx.close()
      this.active = false
    }
    this.store.commit()

    const digest = this.config.generateId()
    const transaction: CommittedTransaction = {
      digest,
      sender,
      events: tx.pendingEvents().map((event, eventIndex) => ({ ...event, txDigest: digest, eventIndex }))
    }
    this.committed.push(transaction)
    this.config.logger.debug(`Committed transaction ${digest}`, {
      sender,
      events: transaction.events.length
    })

    for (const listener of this.listeners) {
      try {
        listener(transaction)
      } catch (error) {
        this.config.logger.error(`Listener failed on committed transaction ${digest}`, error)
      }
    }
    return result
  }

  /**
   * Create a Collection and its CollectionCap; the cap goes to `sender`.
   */
  createCollection(sender: Address): { collection: Collection, cap: CollectionCap } {
    return this.execute(sender, tx => tx.createCollection())
  }

  /**
   * Receive every committed transaction from now on.
   *
   * @returns a function that removes the listener
   */
  subscribe(listener: TransactionListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /** Supply of `tokenId`, 0 if it was never minted */
  totalSupply(collection: Collection, tokenId: bigint): bigint {
    this.store.requireShared(collection)
    return collection.totalSupply(tokenId)
  }

  hasMetadata(collection: Collection, tokenId: bigint): boolean {
    this.store.requireShared(collection)
    return collection.hasMetadata(tokenId)
  }

  /**
   * @throws LedgerError (NotFound) if no metadata was set for the token
   */
  getMetadata(collection: Collection, tokenId: bigint): number[] {
    this.store.requireShared(collection)
    return collection.getMetadata(tokenId)
  }

  ownerOf(object: LedgerObject): Owner {
    return this.store.ownerOf(object)
  }

  /** False for handles to joined, burned or destroyed balances */
  isLive(object: LedgerObject): boolean {
    return this.store.isLive(object)
  }

  balancesOf(address: Address, collection?: Collection): Balance[] {
    return this.store.balancesOf(address, collection?.id)
  }

  transactions(): readonly CommittedTransaction[] {
    return this.committed
  }

  /** Every committed event, oldest first */
  events(): CommittedEvent[] {
    return this.committed.flatMap(transaction => transaction.events)
  }

  /**
   * Compare recorded supply with the sum of live balances for every token the
   * collection has seen.
   *
   * @returns the tokens that disagree; empty when the ledger is consistent
   */
  auditSupply(collection: Collection): SupplyMismatch[] {
    this.store.requireShared(collection)

    const sums = new Map<bigint, bigint>()
    for (const tokenId of collection.tokenIds()) {
      sums.set(tokenId, 0n)
    }
    for (const balance of this.store.balancesIn(collection.id)) {
      sums.set(balance.tokenId, (sums.get(balance.tokenId) ?? 0n) + balance.value())
    }

    const mismatches: SupplyMismatch[] = []
    for (const [tokenId, actual] of sums) {
      const recorded = collection.totalSupply(tokenId)
      if (recorded !== actual) {
        mismatches.push({ tokenId, recorded, actual })
      }
    }
    if (mismatches.length > 0) {
      this.config.logger.error(`Supply audit of collection ${collection.id} found ${mismatches.length} mismatches`, mismatches)
    }
    return mismatches
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  private reportAbort(sender: Address, error: unknown): void {
    if (error instanceof LedgerInvariantError) {
      this.config.logger.error('Invariant violation, transaction rolled back', { sender, reason: error.message })
    } else if (isLedgerError(error)) {
      this.config.logger.warn('Transaction aborted', { sender, kind: error.kind, reason: error.message })
    } else {
      this.config.logger.error('Transaction failed with unexpected error, rolled back', error)
    }
  }

  private resolveConfig(config: LedgerConfig): ResolvedLedgerConfig {
    return {
      logger: config.logger ?? createLogger(LEDGER_LOG_SCOPE),
      generateId: config.generateId ?? generateObjectId
    }
  }
}
