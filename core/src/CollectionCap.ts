import { LedgerError } from './errors.js'
import type { Collection } from './Collection.js'
import type { ObjectId } from './types.js'

// Caps handed out by issueCollectionCap; anything else is a forgery
const issuedCaps = new WeakSet<CollectionCap>()

/**
 * Capability authorizing mint and metadata changes on exactly one Collection.
 *
 * The binding to the collection is fixed at creation. A cap is moved between
 * owners like any other object but never copied.
 */
export class CollectionCap {
  constructor(
    readonly id: ObjectId,
    readonly collection: ObjectId
  ) {
    Object.freeze(this)
  }
}

/**
 * Create a cap the ledger will accept. Only `Ledger.createCollection` calls
 * this; it is not exported from the package.
 */
export function issueCollectionCap(id: ObjectId, collection: ObjectId): CollectionCap {
  const cap = new CollectionCap(id, collection)
  issuedCaps.add(cap)
  return cap
}

/**
 * Check that `cap` was issued by the ledger and is bound to `collection`.
 *
 * @throws LedgerError (UnknownObject) for a cap the ledger never issued
 * @throws LedgerError (WrongCollection) for a cap bound to another collection
 */
export function authorize(cap: CollectionCap, collection: Collection): void {
  if (!issuedCaps.has(cap)) {
    throw new LedgerError('UnknownObject', `CollectionCap ${cap.id} was not issued by this ledger`)
  }
  if (cap.collection !== collection.id) {
    throw new LedgerError('WrongCollection', `CollectionCap ${cap.id} does not govern collection ${collection.id}`)
  }
}
