/**
 * Ledger Tests
 *
 * Covers:
 * - Collection creation and capability checks
 * - Minting, batch minting and metadata
 * - Split, join, zero balances and burning
 * - Transfers and ownership
 * - Transaction rollback and event delivery
 * - Supply conservation across mixed operation sequences
 */

import { Ledger } from '../Ledger.js'
import { TokenId } from '../TokenId.js'
import { CollectionCap } from '../CollectionCap.js'
import { SupplyReplayer } from '../SupplyReplayer.js'
import { U64_MAX } from '../constants.js'
import type { Logger } from '../logging.js'
import { Balance } from '../Balance.js'
import { Collection } from '../Collection.js'
import * as core from '../index.js'
import type { CommittedTransaction } from '../types.js'

const ADMIN = '03' + 'a'.repeat(64)
const ALICE = '03' + 'b'.repeat(64)
const BOB = '03' + 'c'.repeat(64)

const T1 = TokenId.make(100n, 1n)
const T2 = TokenId.make(100n, 2n)
const T3 = TokenId.make(200n, 1n)

function createMockLogger(): Logger & { [K in keyof Logger]: jest.Mock } {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn()
  }
}

function sequentialIds(): () => string {
  let next = 0
  return () => `id-${++next}`
}

describe('Ledger', () => {
  let logger: ReturnType<typeof createMockLogger>
  let ledger: Ledger
  let collection: Collection
  let cap: CollectionCap

  beforeEach(() => {
    logger = createMockLogger()
    ledger = new Ledger({ logger, generateId: sequentialIds() })
    ;({ collection, cap } = ledger.createCollection(ADMIN))
  })

  function mintTo(recipient: string, tokenId: bigint, amount: bigint): Balance {
    return ledger.execute(ADMIN, tx => tx.mint(cap, collection, tokenId, amount, recipient))
  }

  describe('createCollection', () => {
    it('should share the collection and give the cap to the sender', () => {
      expect(ledger.ownerOf(collection)).toEqual({ kind: 'shared' })
      expect(ledger.ownerOf(cap)).toEqual({ kind: 'address', address: ADMIN })
      expect(cap.collection).toBe(collection.id)
    })

    it('should use generated ids', () => {
      expect(collection.id).toBe('id-1')
      expect(cap.id).toBe('id-2')
      expect(ledger.transactions()[0].digest).toBe('id-3')
    })

    it('should start with no supply and no metadata', () => {
      expect(ledger.totalSupply(collection, T1)).toBe(0n)
      expect(ledger.hasMetadata(collection, T1)).toBe(false)
    })
  })

  describe('mint', () => {
    it('should create a balance for the recipient and raise supply', () => {
      const balance = mintTo(ALICE, T1, 100n)

      expect(balance.value()).toBe(100n)
      expect(balance.tokenId).toBe(T1)
      expect(balance.collectionId).toBe(collection.id)
      expect(ledger.ownerOf(balance)).toEqual({ kind: 'address', address: ALICE })
      expect(ledger.totalSupply(collection, T1)).toBe(100n)
    })

    it('should name the sender in the Mint event, not the recipient', () => {
      mintTo(ALICE, T1, 100n)

      expect(ledger.events()).toEqual([
        {
          type: 'Mint',
          collection: collection.id,
          tokenId: T1,
          to: ADMIN,
          amount: 100n,
          txDigest: 'id-5',
          eventIndex: 0
        }
      ])
    })

    it('should keep mintBalance results with the sender', () => {
      const balance = ledger.execute(ADMIN, tx => tx.mintBalance(cap, collection, T1, 5n))
      expect(ledger.ownerOf(balance)).toEqual({ kind: 'address', address: ADMIN })
    })

    it('should reject a zero amount', () => {
      expect(() => mintTo(ALICE, T1, 0n)).toThrow('ZeroAmount:')
      expect(ledger.totalSupply(collection, T1)).toBe(0n)
    })

    it('should reject amounts beyond u64', () => {
      expect(() => mintTo(ALICE, T1, U64_MAX + 1n)).toThrow('InvalidArg:')
    })

    it('should reject a cap bound to another collection', () => {
      const other = ledger.createCollection(ADMIN)
      expect(() => ledger.execute(ADMIN, tx => tx.mint(other.cap, collection, T1, 1n, ALICE)))
        .toThrow('WrongCollection:')
    })

    it('should reject a cap the ledger never issued', () => {
      const forged = new CollectionCap('forged', collection.id)
      expect(() => ledger.execute(ADMIN, tx => tx.mint(forged, collection, T1, 1n, ALICE)))
        .toThrow('UnknownObject:')
    })

    it('should reject a cap issued by another ledger', () => {
      const foreign = new Ledger({ logger: createMockLogger() }).createCollection(ADMIN)
      expect(() => ledger.execute(ADMIN, tx => tx.mint(foreign.cap, collection, T1, 1n, ALICE)))
        .toThrow('UnknownObject:')
    })

    it('should reject a sender who does not hold the cap', () => {
      expect(() => ledger.execute(ALICE, tx => tx.mint(cap, collection, T1, 1n, ALICE)))
        .toThrow('NotOwner:')
    })

    it('should treat supply overflow as fatal and log it distinctly', () => {
      mintTo(ALICE, T1, U64_MAX)

      expect(() => mintTo(ALICE, T1, 1n)).toThrow('Invariant violation:')
      expect(logger.error).toHaveBeenCalledWith(
        'Invariant violation, transaction rolled back',
        expect.objectContaining({ sender: ADMIN })
      )
      expect(ledger.totalSupply(collection, T1)).toBe(U64_MAX)
    })

    it('should log user errors as warnings', () => {
      expect(() => mintTo(ALICE, T1, 0n)).toThrow()
      expect(logger.warn).toHaveBeenCalledWith(
        'Transaction aborted',
        expect.objectContaining({ kind: 'ZeroAmount' })
      )
      expect(logger.error).not.toHaveBeenCalled()
    })
  })

  describe('batchMint', () => {
    it('should mint each pair as an independent balance', () => {
      const balances = ledger.execute(ADMIN, tx => tx.batchMint(cap, collection, [T1, T2, T3], [10n, 5n, 20n], ALICE))

      expect(balances.map(b => b.value())).toEqual([10n, 5n, 20n])
      expect(balances.map(b => b.tokenId)).toEqual([T1, T2, T3])
      expect(ledger.totalSupply(collection, T1)).toBe(10n)
      expect(ledger.totalSupply(collection, T2)).toBe(5n)
      expect(ledger.totalSupply(collection, T3)).toBe(20n)
      expect(ledger.balancesOf(ALICE, collection)).toHaveLength(3)
    })

    it('should emit one Mint event per pair, in input order', () => {
      ledger.execute(ADMIN, tx => tx.batchMint(cap, collection, [T1, T2, T3], [10n, 5n, 20n], ALICE))

      const events = ledger.events()
      expect(events.map(e => [e.tokenId, e.amount, e.eventIndex])).toEqual([
        [T1, 10n, 0],
        [T2, 5n, 1],
        [T3, 20n, 2]
      ])
    })

    it('should fail with InvalidArg on mismatched lengths before minting anything', () => {
      mintTo(ALICE, T1, 7n)

      expect(() => ledger.execute(ADMIN, tx => tx.batchMint(cap, collection, [T1, T2, T3], [10n, 5n], ALICE)))
        .toThrow('InvalidArg: Got 3 token ids but 2 amounts')
      expect(ledger.totalSupply(collection, T1)).toBe(7n)
      expect(ledger.totalSupply(collection, T2)).toBe(0n)
      expect(ledger.totalSupply(collection, T3)).toBe(0n)
    })

    it('should fail with InvalidArg on empty input', () => {
      expect(() => ledger.execute(ADMIN, tx => tx.batchMint(cap, collection, [], [], ALICE)))
        .toThrow('InvalidArg: Batch mint needs at least one token id')
    })

    it('should roll back earlier pairs when a later pair fails', () => {
      expect(() => ledger.execute(ADMIN, tx => tx.batchMint(cap, collection, [T1, T2], [10n, 0n], ALICE)))
        .toThrow('ZeroAmount:')
      expect(ledger.totalSupply(collection, T1)).toBe(0n)
      expect(ledger.balancesOf(ALICE)).toEqual([])
      expect(ledger.events()).toEqual([])
    })
  })

  describe('metadata', () => {
    const bytes = [0x7b, 0x7d]

    it('should store metadata set by the cap holder', () => {
      ledger.execute(ADMIN, tx => tx.setMetadata(cap, collection, T1, bytes))
      expect(ledger.hasMetadata(collection, T1)).toBe(true)
      expect(ledger.getMetadata(collection, T1)).toEqual(bytes)
    })

    it('should overwrite existing metadata', () => {
      ledger.execute(ADMIN, tx => tx.setMetadata(cap, collection, T1, bytes))
      ledger.execute(ADMIN, tx => tx.setMetadata(cap, collection, T1, [1]))
      expect(ledger.getMetadata(collection, T1)).toEqual([1])
    })

    it('should fail with NotFound when never set, while supply reads zero', () => {
      expect(() => ledger.getMetadata(collection, T2)).toThrow('NotFound:')
      expect(ledger.totalSupply(collection, T2)).toBe(0n)
    })

    it('should reject a cap for another collection', () => {
      const other = ledger.createCollection(ADMIN)
      expect(() => ledger.execute(ADMIN, tx => tx.setMetadata(other.cap, collection, T1, bytes)))
        .toThrow('WrongCollection:')
      expect(ledger.hasMetadata(collection, T1)).toBe(false)
    })

    it('should reject values that are not bytes', () => {
      expect(() => ledger.execute(ADMIN, tx => tx.setMetadata(cap, collection, T1, [256])))
        .toThrow('InvalidArg: metadata[0] is not a byte: 256')
    })
  })

  describe('split and join', () => {
    let balance: Balance

    beforeEach(() => {
      balance = mintTo(ALICE, T1, 100n)
    })

    it('should move the split amount into a new balance without changing supply', () => {
      const part = ledger.execute(ALICE, tx => tx.split(balance, 30n))

      expect(balance.value()).toBe(70n)
      expect(part.value()).toBe(30n)
      expect(part.tokenId).toBe(T1)
      expect(part.collectionId).toBe(collection.id)
      expect(ledger.ownerOf(part)).toEqual({ kind: 'address', address: ALICE })
      expect(ledger.totalSupply(collection, T1)).toBe(100n)
    })

    it('should allow splitting off the whole amount', () => {
      const part = ledger.execute(ALICE, tx => tx.split(balance, 100n))
      expect(balance.value()).toBe(0n)
      expect(part.value()).toBe(100n)
    })

    it('should reject a zero split', () => {
      expect(() => ledger.execute(ALICE, tx => tx.split(balance, 0n))).toThrow('ZeroAmount:')
    })

    it('should reject splitting more than the balance holds', () => {
      expect(() => ledger.execute(ALICE, tx => tx.split(balance, 101n))).toThrow('InsufficientBalance:')
      expect(balance.value()).toBe(100n)
      expect(ledger.balancesOf(ALICE)).toHaveLength(1)
    })

    it('should reject a split by someone else', () => {
      expect(() => ledger.execute(BOB, tx => tx.split(balance, 1n))).toThrow('NotOwner:')
    })

    it('should restore the original amount when joined back in either order', () => {
      const part = ledger.execute(ALICE, tx => tx.split(balance, 30n))
      ledger.execute(ALICE, tx => tx.join(balance, part))
      expect(balance.value()).toBe(100n)
      expect(ledger.isLive(part)).toBe(false)

      const again = ledger.execute(ALICE, tx => tx.split(balance, 45n))
      ledger.execute(ALICE, tx => tx.join(again, balance))
      expect(again.value()).toBe(100n)
      expect(ledger.isLive(balance)).toBe(false)
      expect(ledger.totalSupply(collection, T1)).toBe(100n)
    })

    it('should reject joining different token ids and leave both untouched', () => {
      const other = mintTo(ALICE, T2, 5n)

      expect(() => ledger.execute(ALICE, tx => tx.join(balance, other))).toThrow('WrongTokenId:')
      expect(balance.value()).toBe(100n)
      expect(other.value()).toBe(5n)
      expect(ledger.isLive(balance)).toBe(true)
      expect(ledger.isLive(other)).toBe(true)
    })

    it('should reject joining balances of different collections', () => {
      const second = ledger.createCollection(ADMIN)
      const foreign = ledger.execute(ADMIN, tx => tx.mint(second.cap, second.collection, T1, 5n, ALICE))

      expect(() => ledger.execute(ALICE, tx => tx.join(balance, foreign))).toThrow('WrongCollection:')
      expect(foreign.value()).toBe(5n)
    })

    it('should reject joining a balance with itself', () => {
      expect(() => ledger.execute(ALICE, tx => tx.join(balance, balance))).toThrow('InvalidArg:')
      expect(balance.value()).toBe(100n)
    })

    it('should reject using a balance after it was joined away', () => {
      const part = ledger.execute(ALICE, tx => tx.split(balance, 10n))
      ledger.execute(ALICE, tx => tx.join(balance, part))

      expect(() => ledger.execute(ALICE, tx => tx.transfer(part, BOB))).toThrow('UnknownObject:')
    })
  })

  describe('zero and destroyZero', () => {
    it('should create and destroy an empty balance without touching supply', () => {
      const empty = ledger.execute(ALICE, tx => tx.zero(collection, T1))
      expect(empty.value()).toBe(0n)
      expect(ledger.ownerOf(empty)).toEqual({ kind: 'address', address: ALICE })

      ledger.execute(ALICE, tx => tx.destroyZero(empty))
      expect(ledger.isLive(empty)).toBe(false)
      expect(ledger.totalSupply(collection, T1)).toBe(0n)
      expect(ledger.events()).toEqual([])
    })

    it('should work as an accumulator for joins', () => {
      const a = mintTo(ALICE, T1, 3n)
      const b = mintTo(ALICE, T1, 4n)
      const total = ledger.execute(ALICE, tx => {
        const acc = tx.zero(collection, T1)
        tx.join(acc, a)
        tx.join(acc, b)
        return acc
      })
      expect(total.value()).toBe(7n)
      expect(ledger.balancesOf(ALICE)).toEqual([total])
    })

    it('should refuse to destroy a non-empty balance', () => {
      const balance = mintTo(ALICE, T1, 1n)
      expect(() => ledger.execute(ALICE, tx => tx.destroyZero(balance))).toThrow('InsufficientBalance:')
      expect(ledger.isLive(balance)).toBe(true)
    })
  })

  describe('transfer', () => {
    it('should move ownership and emit a Transfer event', () => {
      const balance = mintTo(ALICE, T1, 40n)
      ledger.execute(ALICE, tx => tx.transfer(balance, BOB))

      expect(ledger.ownerOf(balance)).toEqual({ kind: 'address', address: BOB })
      const [, transfer] = ledger.events()
      expect(transfer).toEqual(expect.objectContaining({
        type: 'Transfer',
        tokenId: T1,
        from: ALICE,
        to: BOB,
        amount: 40n
      }))
    })

    it('should reject a transfer by a non-owner', () => {
      const balance = mintTo(ALICE, T1, 40n)
      expect(() => ledger.execute(BOB, tx => tx.transfer(balance, BOB))).toThrow('NotOwner:')
      expect(ledger.ownerOf(balance)).toEqual({ kind: 'address', address: ALICE })
    })

    it('should split and transfer in one step', () => {
      const balance = mintTo(ALICE, T1, 40n)
      const sent = ledger.execute(ALICE, tx => tx.splitAndTransfer(balance, 15n, BOB))

      expect(balance.value()).toBe(25n)
      expect(sent.value()).toBe(15n)
      expect(ledger.ownerOf(sent)).toEqual({ kind: 'address', address: BOB })
    })

    it('should fail splitAndTransfer like split', () => {
      const balance = mintTo(ALICE, T1, 40n)
      expect(() => ledger.execute(ALICE, tx => tx.splitAndTransfer(balance, 41n, BOB))).toThrow('InsufficientBalance:')
      expect(ledger.balancesOf(BOB)).toEqual([])
    })

    it('should batch transfer every balance to one recipient', () => {
      const a = mintTo(ALICE, T1, 1n)
      const b = mintTo(ALICE, T2, 2n)
      ledger.execute(ALICE, tx => tx.batchTransfer([a, b], BOB))

      expect(ledger.balancesOf(BOB)).toEqual([a, b])
      expect(ledger.events().filter(e => e.type === 'Transfer')).toHaveLength(2)
    })
  })

  describe('burn', () => {
    it('should destroy the balance, lower supply and return the amount', () => {
      const balance = mintTo(ALICE, T1, 40n)
      const burned = ledger.execute(ALICE, tx => tx.burn(collection, balance))

      expect(burned).toBe(40n)
      expect(ledger.isLive(balance)).toBe(false)
      expect(ledger.totalSupply(collection, T1)).toBe(0n)
      expect(ledger.events()[1]).toEqual(expect.objectContaining({
        type: 'Burn',
        from: ALICE,
        amount: 40n
      }))
    })

    it('should reject a balance from another collection', () => {
      const second = ledger.createCollection(ADMIN)
      const balance = mintTo(ALICE, T1, 40n)
      expect(() => ledger.execute(ALICE, tx => tx.burn(second.collection, balance))).toThrow('WrongCollection:')
      expect(ledger.totalSupply(collection, T1)).toBe(40n)
    })

    it('should reject burning a balance someone else owns', () => {
      const balance = mintTo(ALICE, T1, 40n)
      expect(() => ledger.execute(BOB, tx => tx.burn(collection, balance))).toThrow('NotOwner:')
    })

    it('should batch burn in order and roll back on failure', () => {
      const a = mintTo(ALICE, T1, 10n)
      const b = mintTo(BOB, T1, 20n)

      expect(() => ledger.execute(ALICE, tx => tx.batchBurn(collection, [a, b]))).toThrow('NotOwner:')
      expect(ledger.isLive(a)).toBe(true)
      expect(ledger.totalSupply(collection, T1)).toBe(30n)

      const c = mintTo(ALICE, T2, 5n)
      expect(ledger.execute(ALICE, tx => tx.batchBurn(collection, [a, c]))).toEqual([10n, 5n])
      expect(ledger.totalSupply(collection, T1)).toBe(20n)
      expect(ledger.totalSupply(collection, T2)).toBe(0n)
    })
  })

  describe('collection cap', () => {
    it('should move mint authority with the cap', () => {
      ledger.execute(ADMIN, tx => tx.transferCap(cap, ALICE))

      expect(ledger.ownerOf(cap)).toEqual({ kind: 'address', address: ALICE })
      expect(() => mintTo(BOB, T1, 1n)).toThrow('NotOwner:')
      const balance = ledger.execute(ALICE, tx => tx.mint(cap, collection, T1, 1n, BOB))
      expect(balance.value()).toBe(1n)
    })
  })

  describe('transactions', () => {
    it('should run a whole scenario across several senders', () => {
      const tokenId = TokenId.make(100n, 1n)
      const held = mintTo(ALICE, tokenId, 100n)
      expect(ledger.totalSupply(collection, tokenId)).toBe(100n)

      const part = ledger.execute(ALICE, tx => tx.split(held, 30n))
      expect(held.value()).toBe(70n)
      expect(part.value()).toBe(30n)

      ledger.execute(ALICE, tx => tx.transfer(part, BOB))
      expect(ledger.balancesOf(BOB)).toEqual([part])
      expect(ledger.balancesOf(ALICE)).toEqual([held])

      ledger.execute(BOB, tx => tx.burn(collection, part))
      expect(ledger.totalSupply(collection, tokenId)).toBe(70n)
      expect(ledger.events().map(e => e.type)).toEqual(['Mint', 'Transfer', 'Burn'])
    })

    it('should undo every operation of a failed transaction', () => {
      const held = mintTo(ALICE, T1, 50n)
      const eventsBefore = ledger.events().length

      expect(() => ledger.execute(ALICE, tx => {
        const part = tx.split(held, 20n)
        tx.transfer(part, BOB)
        tx.burn(collection, held)
        tx.split(part, 1n)
      })).toThrow('NotOwner:')

      expect(held.value()).toBe(50n)
      expect(ledger.isLive(held)).toBe(true)
      expect(ledger.balancesOf(ALICE)).toEqual([held])
      expect(ledger.balancesOf(BOB)).toEqual([])
      expect(ledger.totalSupply(collection, T1)).toBe(50n)
      expect(ledger.events()).toHaveLength(eventsBefore)
    })

    it('should notify subscribers once per committed transaction', () => {
      const received: CommittedTransaction[] = []
      const unsubscribe = ledger.subscribe(tx => { received.push(tx) })

      mintTo(ALICE, T1, 1n)
      expect(() => mintTo(ALICE, T1, 0n)).toThrow()
      unsubscribe()
      mintTo(ALICE, T1, 1n)

      expect(received).toHaveLength(1)
      expect(received[0].sender).toBe(ADMIN)
      expect(received[0].events).toHaveLength(1)
    })

    it('should reject nested transactions', () => {
      expect(() => ledger.execute(ADMIN, () => ledger.execute(ADMIN, () => 1)))
        .toThrow('InvalidArg: Transactions cannot be nested')
    })

    it('should reject asynchronous blocks', () => {
      expect(() => ledger.execute(ADMIN, async () => 1))
        .toThrow('InvalidArg: Transaction blocks must be synchronous')
    })

    it('should keep a transaction committed when a subscriber throws', () => {
      const seen: string[] = []
      ledger.subscribe(() => { throw new Error('subscriber down') })
      ledger.subscribe(tx => { seen.push(tx.digest) })

      const balance = mintTo(ALICE, T1, 10n)

      expect(ledger.isLive(balance)).toBe(true)
      expect(ledger.totalSupply(collection, T1)).toBe(10n)
      expect(seen).toEqual(['id-5'])
      expect(logger.error).toHaveBeenCalledWith('Listener failed on committed transaction id-5', expect.any(Error))
    })

    it('should log an asynchronous block that fails after it was rejected', async () => {
      expect(() => ledger.execute(ADMIN, async tx => {
        await Promise.resolve()
        tx.mint(cap, collection, T1, 1n, ALICE)
      })).toThrow('InvalidArg: Transaction blocks must be synchronous')

      await new Promise<void>(resolve => { setImmediate(() => resolve()) })

      expect(logger.error).toHaveBeenCalledWith(
        `Asynchronous transaction block of ${ADMIN} failed after it was rejected`,
        expect.any(Error)
      )
      expect(ledger.totalSupply(collection, T1)).toBe(0n)
    })

    it('should reject a transaction handle used after it finished', () => {
      const finished = ledger.execute(ADMIN, tx => tx)
      expect(() => finished.zero(collection, T1)).toThrow('InvalidArg: Transaction is no longer active')
    })
  })

  describe('object state', () => {
    it('should expose no way to change supply or metadata through a collection', () => {
      expect(Reflect.get(collection, 'supply')).toBeUndefined()
      expect(Reflect.get(collection, 'metadata')).toBeUndefined()
      expect(Object.isFrozen(collection)).toBe(true)
    })

    it('should expose no way to change a balance amount through its handle', () => {
      const balance = mintTo(ALICE, T1, 10n)

      expect(Reflect.get(balance, 'deposit')).toBeUndefined()
      expect(Reflect.get(balance, 'withdraw')).toBeUndefined()
      expect(Reflect.set(balance, 'tokenId', T2)).toBe(false)
      expect(balance.tokenId).toBe(T1)
      expect(balance.value()).toBe(10n)
    })

    it('should keep the mutation helpers out of the package exports', () => {
      for (const name of ['withdrawFrom', 'depositInto', 'restoreAmount', 'collectionState', 'issueCollectionCap', 'authorize', 'SupplyLedger', 'MetadataStore']) {
        expect(Object.keys(core)).not.toContain(name)
      }
    })

    it('should reject a balance built outside the ledger', () => {
      const balance = mintTo(ALICE, T1, 10n)
      const counterfeit = new Balance(balance.id, collection.id, T1, 1000n)

      expect(() => ledger.execute(ALICE, tx => tx.join(balance, counterfeit))).toThrow('UnknownObject:')
      expect(() => ledger.execute(ALICE, tx => tx.burn(collection, counterfeit))).toThrow('UnknownObject:')
      expect(balance.value()).toBe(10n)
      expect(ledger.totalSupply(collection, T1)).toBe(10n)
      expect(ledger.auditSupply(collection)).toEqual([])
    })

    it('should reject a collection built outside the ledger', () => {
      const counterfeit = new Collection(collection.id)
      expect(() => ledger.totalSupply(counterfeit, T1)).toThrow('UnknownObject:')
      expect(() => ledger.execute(ADMIN, tx => tx.mint(cap, counterfeit, T1, 1n, ALICE))).toThrow('UnknownObject:')
    })
  })

  describe('conservation', () => {
    it('should keep supply equal to live balances through a mixed sequence', () => {
      const check = (): void => {
        expect(ledger.auditSupply(collection)).toEqual([])
        const replayed = new SupplyReplayer().apply(ledger.events())
        for (const tokenId of [T1, T2, T3]) {
          expect(replayed.totalSupply(collection.id, tokenId)).toBe(ledger.totalSupply(collection, tokenId))
        }
      }

      const a = mintTo(ALICE, T1, 1000n)
      check()
      const [b2, b3] = ledger.execute(ADMIN, tx => tx.batchMint(cap, collection, [T2, T3], [50n, 75n], BOB))
      check()

      const pieces: Balance[] = []
      for (const amount of [1n, 10n, 100n, 250n]) {
        pieces.push(ledger.execute(ALICE, tx => tx.split(a, amount)))
        check()
      }
      ledger.execute(ALICE, tx => tx.join(pieces[0], pieces[1]))
      check()
      ledger.execute(ALICE, tx => tx.batchTransfer([pieces[2], pieces[3]], BOB))
      check()
      ledger.execute(BOB, tx => {
        tx.join(pieces[2], pieces[3])
        tx.burn(collection, pieces[2])
        tx.splitAndTransfer(b2, 20n, ALICE)
      })
      check()
      ledger.execute(BOB, tx => tx.burn(collection, b3))
      check()
      ledger.execute(ALICE, tx => tx.burn(collection, a))
      check()

      expect(ledger.totalSupply(collection, T1)).toBe(11n)
      expect(ledger.totalSupply(collection, T2)).toBe(50n)
      expect(ledger.totalSupply(collection, T3)).toBe(0n)
      expect(logger.error).not.toHaveBeenCalled()
    })
  })
})
