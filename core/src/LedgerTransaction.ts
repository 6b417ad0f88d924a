/**
 * LedgerTransaction - the operations available inside `Ledger.execute`
 *
 * Every operation validates before it mutates, so a failing call leaves the
 * ledger as it found it. Calls run in order; when one fails the ledger rolls
 * back everything the transaction did before it.
 */

import { Balance } from './Balance.js'
import { Collection } from './Collection.js'
import { authorize, issueCollectionCap, type CollectionCap } from './CollectionCap.js'
import { BURN_EVENT, MINT_EVENT, TRANSFER_EVENT } from './constants.js'
import { LedgerError } from './errors.js'
import type { ObjectStore } from './ObjectStore.js'
import type { Address, LedgerEvent, ObjectId } from './types.js'
import { assertBytes, assertU128, assertU64 } from './utils.js'

export class LedgerTransaction {
  private readonly events: LedgerEvent[] = []
  private open = true

  constructor(
    readonly sender: Address,
    private readonly store: ObjectStore,
    private readonly generateId: () => ObjectId
  ) { }

  // ---------------------------------------------------------------------------
  // Collections
  // ---------------------------------------------------------------------------

  /**
   * Create a shared Collection together with its one CollectionCap, which is
   * handed to the sender.
   */
  createCollection(): { collection: Collection, cap: CollectionCap } {
    this.ensureOpen()
    const collection = new Collection(this.generateId())
    const cap = issueCollectionCap(this.generateId(), collection.id)
    this.store.add(collection, { kind: 'shared' })
    this.store.add(cap, { kind: 'address', address: this.sender })
    return { collection, cap }
  }

  /**
   * Hand a CollectionCap, and with it mint and metadata authority, to `recipient`.
   */
  transferCap(cap: CollectionCap, recipient: Address): void {
    this.ensureOpen()
    this.store.requireOwned(cap, this.sender)
    this.store.transfer(cap, recipient)
  }

  // ---------------------------------------------------------------------------
  // Minting
  // ---------------------------------------------------------------------------

  /**
   * Mint `amount` of `tokenId` into a new balance owned by the sender.
   *
   * The Mint event names the sender as recipient even if the balance is
   * forwarded right after.
   */
  mintBalance(cap: CollectionCap, collection: Collection, tokenId: bigint, amount: bigint): Balance {
    this.ensureOpen()
    this.requireCap(cap, collection)
    assertU128(tokenId, 'token id')
    assertU64(amount, 'amount')
    if (amount === 0n) {
      throw new LedgerError('ZeroAmount', 'Cannot mint zero tokens')
    }

    this.store.increaseSupply(collection, tokenId, amount)
    const balance = new Balance(this.generateId(), collection.id, tokenId, amount)
    this.store.add(balance, { kind: 'address', address: this.sender })
    this.events.push({
      type: MINT_EVENT,
      collection: collection.id,
      tokenId,
      to: this.sender,
      amount
    })
    return balance
  }

  /**
   * Mint and give the new balance to `recipient`. No Transfer event is emitted
   * for the hand-over.
   */
  mint(cap: CollectionCap, collection: Collection, tokenId: bigint, amount: bigint, recipient: Address): Balance {
    const balance = this.mintBalance(cap, collection, tokenId, amount)
    this.store.transfer(balance, recipient)
    return balance
  }

  /**
   * Mint each `(tokenIds[i], amounts[i])` pair to `recipient`, in order.
   *
   * @throws LedgerError (InvalidArg) for empty or mismatched arrays, before
   * anything is minted
   */
  batchMint(
    cap: CollectionCap,
    collection: Collection,
    tokenIds: bigint[],
    amounts: bigint[],
    recipient: Address
  ): Balance[] {
    this.ensureOpen()
    if (tokenIds.length !== amounts.length) {
      throw new LedgerError('InvalidArg', `Got ${tokenIds.length} token ids but ${amounts.length} amounts`)
    }
    if (tokenIds.length === 0) {
      throw new LedgerError('InvalidArg', 'Batch mint needs at least one token id')
    }
    return tokenIds.map((tokenId, i) => this.mint(cap, collection, tokenId, amounts[i], recipient))
  }

  // ---------------------------------------------------------------------------
  // Burning
  // ---------------------------------------------------------------------------

  /**
   * Destroy a balance and remove its amount from supply. Needs no capability.
   *
   * @returns the amount burned
   */
  burn(collection: Collection, balance: Balance): bigint {
    this.ensureOpen()
    this.store.requireShared(collection)
    this.store.requireOwned(balance, this.sender)
    if (balance.collectionId !== collection.id) {
      throw new LedgerError('WrongCollection', `Balance ${balance.id} belongs to collection ${balance.collectionId}`)
    }

    const amount = balance.value()
    this.store.decreaseSupply(collection, balance.tokenId, amount)
    this.store.remove(balance)
    this.events.push({
      type: BURN_EVENT,
      collection: collection.id,
      tokenId: balance.tokenId,
      from: this.sender,
      amount
    })
    return amount
  }

  /** Burn each balance in order */
  batchBurn(collection: Collection, balances: Balance[]): bigint[] {
    return balances.map(balance => this.burn(collection, balance))
  }

  // ---------------------------------------------------------------------------
  // Transfers
  // ---------------------------------------------------------------------------

  transfer(balance: Balance, recipient: Address): void {
    this.ensureOpen()
    this.store.requireOwned(balance, this.sender)
    this.events.push({
      type: TRANSFER_EVENT,
      collection: balance.collectionId,
      tokenId: balance.tokenId,
      from: this.sender,
      to: recipient,
      amount: balance.value()
    })
    this.store.transfer(balance, recipient)
  }

  /**
   * Split `amount` off `balance` and send the new balance to `recipient`.
   */
  splitAndTransfer(balance: Balance, amount: bigint, recipient: Address): Balance {
    const part = this.split(balance, amount)
    this.transfer(part, recipient)
    return part
  }

  /** Transfer each balance, in order, to the same recipient */
  batchTransfer(balances: Balance[], recipient: Address): void {
    for (const balance of balances) {
      this.transfer(balance, recipient)
    }
  }

  // ---------------------------------------------------------------------------
  // Balance Operations
  // ---------------------------------------------------------------------------

  /**
   * Move `amount` out of `balance` into a new balance owned by the sender.
   * Supply is unchanged.
   */
  split(balance: Balance, amount: bigint): Balance {
    this.ensureOpen()
    this.store.requireOwned(balance, this.sender)
    assertU64(amount, 'amount')
    this.store.withdraw(balance, amount)

    const part = new Balance(this.generateId(), balance.collectionId, balance.tokenId, amount)
    this.store.add(part, { kind: 'address', address: this.sender })
    return part
  }

  /**
   * Merge `other` into `balance`; `other` stops existing.
   */
  join(balance: Balance, other: Balance): void {
    this.ensureOpen()
    if (balance === other) {
      throw new LedgerError('InvalidArg', `Cannot join balance ${balance.id} with itself`)
    }
    this.store.requireOwned(balance, this.sender)
    this.store.requireOwned(other, this.sender)
    if (balance.collectionId !== other.collectionId) {
      throw new LedgerError('WrongCollection', `Balances ${balance.id} and ${other.id} belong to different collections`)
    }
    if (balance.tokenId !== other.tokenId) {
      throw new LedgerError('WrongTokenId', `Cannot join token ${other.tokenId} into token ${balance.tokenId}`)
    }

    this.store.deposit(balance, other.value())
    this.store.remove(other)
  }

  /**
   * An empty balance, typically the starting point for repeated joins.
   */
  zero(collection: Collection, tokenId: bigint): Balance {
    this.ensureOpen()
    this.store.requireShared(collection)
    assertU128(tokenId, 'token id')
    const balance = new Balance(this.generateId(), collection.id, tokenId, 0n)
    this.store.add(balance, { kind: 'address', address: this.sender })
    return balance
  }

  /**
   * @throws LedgerError (InsufficientBalance) unless the balance is empty
   */
  destroyZero(balance: Balance): void {
    this.ensureOpen()
    this.store.requireOwned(balance, this.sender)
    if (balance.value() !== 0n) {
      throw new LedgerError('InsufficientBalance', `Balance ${balance.id} still holds ${balance.value()}`)
    }
    this.store.remove(balance)
  }

  // ---------------------------------------------------------------------------
  // Metadata
  // ---------------------------------------------------------------------------

  setMetadata(cap: CollectionCap, collection: Collection, tokenId: bigint, data: number[]): void {
    this.ensureOpen()
    this.requireCap(cap, collection)
    assertU128(tokenId, 'token id')
    assertBytes(data, 'metadata')
    this.store.setMetadata(collection, tokenId, data)
  }

  // ---------------------------------------------------------------------------
  // Bookkeeping
  // ---------------------------------------------------------------------------

  /** Events emitted so far, in order */
  pendingEvents(): readonly LedgerEvent[] {
    return this.events
  }

  /** Called by the ledger once the transaction committed or rolled back */
  close(): void {
    this.open = false
  }

  private ensureOpen(): void {
    if (!this.open) {
      throw new LedgerError('InvalidArg', 'Transaction is no longer active')
    }
  }

  private requireCap(cap: CollectionCap, collection: Collection): void {
    this.store.requireShared(collection)
    this.store.requireOwned(cap, this.sender)
    authorize(cap, collection)
  }
}
