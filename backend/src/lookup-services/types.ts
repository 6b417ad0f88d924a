import type { Address, ObjectId } from '@multitoken/core'

export type LedgerEventType = 'Mint' | 'Burn' | 'Transfer'

/**
 * Query parameters for ledger event lookups
 */
export interface LedgerQuery {
  collection?: ObjectId
  /** Token id as hex (see TokenId.toHex) */
  tokenId?: string
  /** Matches events where the address is sender or recipient */
  address?: Address
  type?: LedgerEventType
  limit?: number
  skip?: number
  sortOrder?: 'asc' | 'desc'
}

export interface LookupQuestion {
  service: string
  query: unknown
}

/**
 * An audit event as stored in the lookup database.
 * Token ids are hex and amounts decimal strings, since u64/u128 values do not
 * fit the database's number types.
 */
export interface LedgerEventRecord {
  txDigest: string
  eventIndex: number
  /** Order of the transaction in the index; increases by one per transaction */
  sequence: number
  type: LedgerEventType
  collection: ObjectId
  tokenId: string
  from?: Address
  to?: Address
  amount: string
  createdAt: Date
}

/**
 * Lookup answer: a stored event without its storage bookkeeping
 */
export type LedgerLookupResult = Omit<LedgerEventRecord, 'sequence' | 'createdAt'>

export interface LedgerRecordFilters {
  collection?: ObjectId
  tokenId?: string
  address?: Address
  type?: LedgerEventType
}

/**
 * Persistence used by the lookup service. LedgerStorageManager implements it
 * on MongoDB.
 */
export interface LedgerEventStore {
  nextSequence: () => Promise<number>
  /** Store the admitted events of one transaction in a single write */
  storeRecords: (records: Array<Omit<LedgerEventRecord, 'createdAt'>>) => Promise<void>
  /** Remove whatever an earlier attempt stored for a transaction */
  deleteTransaction: (txDigest: string) => Promise<number>
  findWithFilters: (
    filters: LedgerRecordFilters,
    limit?: number,
    skip?: number,
    sortOrder?: 'asc' | 'desc'
  ) => Promise<LedgerEventRecord[]>
  findAllRecords: (limit?: number, skip?: number, sortOrder?: 'asc' | 'desc') => Promise<LedgerEventRecord[]>
  /** Every event of one token, oldest first */
  findTokenHistory: (collection: ObjectId, tokenId: string) => Promise<LedgerEventRecord[]>
  findByDigest: (txDigest: string, eventIndex: number) => Promise<LedgerEventRecord | null>
}
