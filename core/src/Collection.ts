import { LedgerError } from './errors.js'
import { MetadataStore } from './MetadataStore.js'
import { SupplyLedger } from './SupplyLedger.js'
import type { ObjectId } from './types.js'

export interface CollectionState {
  readonly supply: SupplyLedger
  readonly metadata: MetadataStore
}

// Supply and metadata live here rather than on the instance, so holding the
// shared Collection gives read access only
const states = new WeakMap<Collection, CollectionState>()

/**
 * The shared ledger instance: supply and metadata for every token type it
 * tracks. Collections are created together with their CollectionCap by
 * `Ledger.createCollection` and are never destroyed.
 */
export class Collection {
  constructor(readonly id: ObjectId) {
    states.set(this, { supply: new SupplyLedger(), metadata: new MetadataStore() })
    Object.freeze(this)
  }

  totalSupply(tokenId: bigint): bigint {
    return collectionState(this).supply.totalSupply(tokenId)
  }

  /** Token ids that were ever minted here */
  tokenIds(): bigint[] {
    return collectionState(this).supply.tokenIds()
  }

  hasMetadata(tokenId: bigint): boolean {
    return collectionState(this).metadata.has(tokenId)
  }

  getMetadata(tokenId: bigint): number[] {
    return collectionState(this).metadata.get(tokenId)
  }
}

/**
 * Mutable state of a collection. Used by the object store; not exported from
 * the package.
 *
 * @throws LedgerError (UnknownObject) for an object that was not built by the
 * Collection constructor
 */
export function collectionState(collection: Collection): CollectionState {
  const state = states.get(collection)
  if (state === undefined) {
    throw new LedgerError('UnknownObject', `Collection ${collection.id} does not exist`)
  }
  return state
}
