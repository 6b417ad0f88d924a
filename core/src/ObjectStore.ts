import { Balance, depositInto, restoreAmount, withdrawFrom } from './Balance.js'
import { collectionState, type Collection } from './Collection.js'
import type { CollectionCap } from './CollectionCap.js'
import { LedgerError, LedgerInvariantError } from './errors.js'
import type { Address, ObjectId, Owner } from './types.js'
import { UndoJournal } from './UndoJournal.js'

export type LedgerObject = Collection | CollectionCap | Balance

interface StoreEntry {
  object: LedgerObject
  owner: Owner
  /** Creation order, kept across rollbacks */
  order: number
}

/**
 * Registry of live ledger objects and their owners, and the only place that
 * changes supply, metadata and balance amounts.
 *
 * An object is live while the store holds that exact instance under its id.
 * Handles to joined, burned or destroyed balances stay around in caller code
 * but are rejected here.
 *
 * Changes are only accepted between `begin` and `commit`/`rollback`. Each
 * change journals the prior state of what it touches, so a rollback costs as
 * much as the transaction did, not the size of the store.
 */
export class ObjectStore {
  private readonly entries = new Map<ObjectId, StoreEntry>()
  private journal: UndoJournal | undefined
  private nextOrder = 0

  // ---------------------------------------------------------------------------
  // Transaction Boundaries
  // ---------------------------------------------------------------------------

  begin(): void {
    if (this.journal !== undefined) {
      throw new LedgerInvariantError('a store transaction is already open')
    }
    this.journal = new UndoJournal()
  }

  commit(): void {
    this.journal = undefined
  }

  rollback(): void {
    this.journal?.rollback()
    this.journal = undefined
  }

  // ---------------------------------------------------------------------------
  // Objects and Owners
  // ---------------------------------------------------------------------------

  add(object: LedgerObject, owner: Owner): void {
    if (this.entries.has(object.id)) {
      throw new LedgerError('InvalidArg', `Object id ${object.id} is already in use`)
    }
    this.rememberEntry(object.id)
    this.entries.set(object.id, { object, owner, order: this.nextOrder++ })
  }

  remove(object: LedgerObject): void {
    this.requireLive(object)
    this.rememberEntry(object.id)
    this.entries.delete(object.id)
  }

  isLive(object: LedgerObject): boolean {
    return this.entries.get(object.id)?.object === object
  }

  /**
   * @throws LedgerError (UnknownObject) if the object is not live
   */
  ownerOf(object: LedgerObject): Owner {
    return this.requireLive(object).owner
  }

  /**
   * Require `sender` to own `object`.
   *
   * @throws LedgerError (UnknownObject) if the object is not live
   * @throws LedgerError (NotOwner) if it is shared or owned by someone else
   */
  requireOwned(object: LedgerObject, sender: Address): void {
    const { owner } = this.requireLive(object)
    if (owner.kind !== 'address' || owner.address !== sender) {
      throw new LedgerError('NotOwner', `${sender} does not own object ${object.id}`)
    }
  }

  requireShared(collection: Collection): void {
    const { owner } = this.requireLive(collection)
    if (owner.kind !== 'shared') {
      throw new LedgerError('InvalidArg', `Collection ${collection.id} is not shared`)
    }
  }

  /**
   * Hand an owned object to a new address. Checks on the current owner are
   * the caller's job.
   */
  transfer(object: LedgerObject, recipient: Address): void {
    const entry = this.requireLive(object)
    if (entry.owner.kind === 'shared') {
      throw new LedgerError('InvalidArg', `Shared object ${object.id} cannot be transferred`)
    }
    this.rememberEntry(object.id)
    this.entries.set(object.id, { ...entry, owner: { kind: 'address', address: recipient } })
  }

  // ---------------------------------------------------------------------------
  // Amounts, Supply and Metadata
  // ---------------------------------------------------------------------------

  withdraw(balance: Balance, amount: bigint): void {
    this.rememberAmount(balance)
    withdrawFrom(balance, amount)
  }

  deposit(balance: Balance, amount: bigint): void {
    this.rememberAmount(balance)
    depositInto(balance, amount)
  }

  increaseSupply(collection: Collection, tokenId: bigint, amount: bigint): void {
    const { supply } = collectionState(collection)
    const prior = supply.entry(tokenId)
    this.remember(`supply:${collection.id}:${tokenId}`, () => supply.restoreEntry(tokenId, prior))
    supply.increase(tokenId, amount)
  }

  decreaseSupply(collection: Collection, tokenId: bigint, amount: bigint): void {
    const { supply } = collectionState(collection)
    const prior = supply.entry(tokenId)
    this.remember(`supply:${collection.id}:${tokenId}`, () => supply.restoreEntry(tokenId, prior))
    supply.decrease(tokenId, amount)
  }

  setMetadata(collection: Collection, tokenId: bigint, data: number[]): void {
    const { metadata } = collectionState(collection)
    const prior = metadata.entry(tokenId)
    this.remember(`metadata:${collection.id}:${tokenId}`, () => metadata.restoreEntry(tokenId, prior))
    metadata.set(tokenId, data)
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /** Live balances under a collection, in creation order */
  balancesIn(collectionId: ObjectId): Balance[] {
    return this.balancesWhere(({ object }) => object instanceof Balance && object.collectionId === collectionId)
  }

  /** Live balances held by `address`, optionally limited to one collection, in creation order */
  balancesOf(address: Address, collectionId?: ObjectId): Balance[] {
    return this.balancesWhere(({ object, owner }) =>
      owner.kind === 'address' &&
      owner.address === address &&
      object instanceof Balance &&
      (collectionId === undefined || object.collectionId === collectionId)
    )
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  private balancesWhere(match: (entry: StoreEntry) => boolean): Balance[] {
    const found: Array<{ balance: Balance, order: number }> = []
    for (const entry of this.entries.values()) {
      if (entry.object instanceof Balance && match(entry)) {
        found.push({ balance: entry.object, order: entry.order })
      }
    }
    return found.sort((a, b) => a.order - b.order).map(({ balance }) => balance)
  }

  private remember(key: string, undo: () => void): void {
    if (this.journal === undefined) {
      throw new LedgerInvariantError('ledger state changed outside a transaction')
    }
    this.journal.record(key, undo)
  }

  private rememberEntry(id: ObjectId): void {
    const prior = this.entries.get(id)
    this.remember(`entry:${id}`, () => {
      if (prior === undefined) {
        this.entries.delete(id)
      } else {
        this.entries.set(id, prior)
      }
    })
  }

  private rememberAmount(balance: Balance): void {
    const prior = balance.value()
    this.remember(`amount:${balance.id}`, () => restoreAmount(balance, prior))
  }

  private requireLive(object: LedgerObject): StoreEntry {
    const entry = this.entries.get(object.id)
    if (entry === undefined || entry.object !== object) {
      throw new LedgerError('UnknownObject', `Object ${object.id} does not exist`)
    }
    return entry
  }
}
