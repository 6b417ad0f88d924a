import type { Collection as MongoCollection, Db, Filter } from 'mongodb'
import { createLogger, type ObjectId } from '@multitoken/core'
import type { LedgerEventRecord, LedgerEventStore, LedgerRecordFilters } from './types.js'

interface SequenceCounter {
  _id: string
  value: number
}

const log = createLogger('storage')

/**
 * Storage manager for the ledger event index using MongoDB.
 */
export class LedgerStorageManager implements LedgerEventStore {
  private readonly records: MongoCollection<LedgerEventRecord>
  private readonly counters: MongoCollection<SequenceCounter>

  /**
   * @param db A connected MongoDB database handle.
   */
  constructor (db: Db) {
    this.records = db.collection<LedgerEventRecord>('ledgerEvents')
    this.counters = db.collection<SequenceCounter>('ledgerCounters')

    // Token history, used for supply replay
    this.records
      .createIndex({ collection: 1, tokenId: 1, sequence: 1 })
      .catch((error: unknown) => log.error('Failed to create token index', error))

    // Address lookups match either side of an event
    this.records
      .createIndex({ from: 1 })
      .catch((error: unknown) => log.error('Failed to create sender index', error))
    this.records
      .createIndex({ to: 1 })
      .catch((error: unknown) => log.error('Failed to create recipient index', error))

    // An event is identified by its transaction digest and position
    this.records
      .createIndex({ txDigest: 1, eventIndex: 1 }, { unique: true })
      .catch((error: unknown) => log.error('Failed to create event id index', error))
  }

  /**
   * Reserve the sequence number of the next indexed transaction.
   */
  async nextSequence (): Promise<number> {
    const counter = await this.counters.findOneAndUpdate(
      { _id: 'ledgerEvents' },
      { $inc: { value: 1 } },
      { upsert: true, returnDocument: 'after' }
    )
    if (counter === null) {
      throw new Error('Failed to reserve an event sequence number')
    }
    return counter.value
  }

  /**
   * Insert the records of one transaction with a single insertMany.
   */
  async storeRecords (records: Array<Omit<LedgerEventRecord, 'createdAt'>>): Promise<void> {
    if (records.length === 0) return
    const createdAt = new Date()
    await this.records.insertMany(records.map(record => ({ ...record, createdAt })), { ordered: true })
  }

  /**
   * Delete every record of a transaction.
   *
   * @returns number of records removed
   */
  async deleteTransaction (txDigest: string): Promise<number> {
    const result = await this.records.deleteMany({ txDigest })
    return result.deletedCount
  }

  /**
   * Find records with dynamic filter combinations.
   */
  async findWithFilters (
    filters: LedgerRecordFilters,
    limit: number = 50,
    skip: number = 0,
    sortOrder: 'asc' | 'desc' = 'desc'
  ): Promise<LedgerEventRecord[]> {
    const query: Filter<LedgerEventRecord> = {}

    if (filters.collection) {
      query.collection = filters.collection
    }

    if (filters.tokenId) {
      query.tokenId = filters.tokenId
    }

    if (filters.type) {
      query.type = filters.type
    }

    if (filters.address) {
      query.$or = [{ from: filters.address }, { to: filters.address }]
    }

    return await this.findRecordWithQuery(query, limit, skip, sortOrder)
  }

  /**
   * Fetch all records without filtering, with pagination and sorting.
   */
  async findAllRecords (
    limit: number = 50,
    skip: number = 0,
    sortOrder: 'asc' | 'desc' = 'desc'
  ): Promise<LedgerEventRecord[]> {
    return await this.findRecordWithQuery({}, limit, skip, sortOrder)
  }

  async findTokenHistory (collection: ObjectId, tokenId: string): Promise<LedgerEventRecord[]> {
    return await this.records
      .find({ collection, tokenId })
      .sort({ sequence: 1, eventIndex: 1 })
      .toArray()
  }

  /**
   * Find a specific record by transaction digest and event index.
   */
  async findByDigest (txDigest: string, eventIndex: number): Promise<LedgerEventRecord | null> {
    return await this.records.findOne({ txDigest, eventIndex })
  }

  /**
   * Helper function for querying from the database
   */
  private async findRecordWithQuery (
    query: Filter<LedgerEventRecord>,
    limit: number = 50,
    skip: number = 0,
    sortOrder: 'asc' | 'desc' = 'desc'
  ): Promise<LedgerEventRecord[]> {
    const sortDirection = sortOrder === 'desc' ? -1 : 1

    return await this.records
      .find(query)
      .sort({ sequence: sortDirection, eventIndex: sortDirection })
      .skip(skip)
      .limit(limit)
      .toArray()
  }
}
