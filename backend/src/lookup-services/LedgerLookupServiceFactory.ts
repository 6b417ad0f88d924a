import type { Db } from 'mongodb'
import {
  SupplyReplayer,
  TokenId,
  createLogger,
  type CommittedTransaction,
  type LedgerEvent,
  type Logger,
  type ObjectId
} from '@multitoken/core'
import LedgerEventValidator from '../event-validators/LedgerEventValidator.js'
import { LedgerStorageManager } from './LedgerStorageManager.js'
import type {
  LedgerEventRecord,
  LedgerEventStore,
  LedgerEventType,
  LedgerLookupResult,
  LedgerQuery,
  LookupQuestion
} from './types.js'
import docs from '../docs/LedgerLookupDocs.js'

const EVENT_TYPES: readonly LedgerEventType[] = ['Mint', 'Burn', 'Transfer']
const SORT_ORDERS: ReadonlyArray<'asc' | 'desc'> = ['asc', 'desc']

function optionalMember<T extends string>(value: unknown, allowed: readonly T[], name: string): T | undefined {
  if (value === undefined) return undefined
  const match = allowed.find(candidate => candidate === value)
  if (match === undefined) {
    throw new Error(`${name} must be one of ${allowed.join(', ')}`)
  }
  return match
}

export interface LookupServiceConfig {
  /** Page size when a query gives no limit (default 50) */
  defaultLimit?: number
  /** Largest page size a query may ask for (default 1000) */
  maxLimit?: number
  logger?: Logger
}

/**
 * Implements a lookup service for ledger audit events
 * @public
 */
class LedgerLookupService {
  static readonly SERVICE_ID = 'ls_ledger'

  private readonly defaultLimit: number
  private readonly maxLimit: number
  private readonly logger: Logger
  private readonly validator = new LedgerEventValidator()

  constructor(public storageManager: LedgerEventStore, config: LookupServiceConfig = {}) {
    this.defaultLimit = config.defaultLimit ?? 50
    this.maxLimit = config.maxLimit ?? 1000
    this.logger = config.logger ?? createLogger('lookup')
  }

  /**
   * Index the events of a committed transaction.
   *
   * Events are checked against the supply already indexed; rejected ones are
   * logged and left out, the rest are stored together under one sequence
   * number. Indexing the same transaction again replaces its earlier records.
   *
   * @returns number of events stored
   */
  async transactionCommitted(transaction: CommittedTransaction): Promise<number> {
    if (transaction.events.length === 0) {
      return 0
    }

    // A retried transaction replaces what an interrupted attempt left behind
    const stale = await this.storageManager.deleteTransaction(transaction.digest)
    if (stale > 0) {
      this.logger.warn(`Replacing ${stale} records of transaction ${transaction.digest} from an earlier attempt`)
    }

    // Seed the validator with the indexed supply of every touched token
    const indexed = new Map<string, bigint>()
    for (const event of transaction.events) {
      const key = `${event.collection}:${event.tokenId}`
      if (!indexed.has(key)) {
        indexed.set(key, await this.totalSupply(event.collection, event.tokenId))
      }
    }

    const { eventsToAdmit, rejected } = this.validator.identifyAdmissibleEvents(
      transaction.events,
      (collection, tokenId) => indexed.get(`${collection}:${tokenId}`) ?? 0n
    )

    for (const { index, reason } of rejected) {
      this.logger.warn(`Rejected event ${index} of transaction ${transaction.digest}: ${reason}`)
    }
    if (eventsToAdmit.length === 0) {
      return 0
    }

    const sequence = await this.storageManager.nextSequence()
    await this.storageManager.storeRecords(eventsToAdmit.map(index => {
      const event = transaction.events[index]
      return this.encodeEvent(event, transaction.digest, event.eventIndex, sequence)
    }))
    return eventsToAdmit.length
  }

  async lookup(question: LookupQuestion): Promise<LedgerLookupResult[]> {
    if (question.query === undefined || question.query === null) {
      throw new Error('A valid query must be provided')
    }
    if (question.service !== LedgerLookupService.SERVICE_ID) {
      throw new Error('Lookup service not supported')
    }

    const query = this.parseQuery(question.query)
    const limit = Math.min(query.limit ?? this.defaultLimit, this.maxLimit)

    // Check if we have any filters to apply
    const hasFilters = [query.collection, query.tokenId, query.address, query.type]
      .some(filter => filter !== undefined)

    let results: LedgerEventRecord[]

    if (hasFilters) {
      results = await this.storageManager.findWithFilters(
        {
          collection: query.collection,
          tokenId: query.tokenId,
          address: query.address,
          type: query.type
        },
        limit,
        query.skip,
        query.sortOrder
      )
    } else {
      results = await this.storageManager.findAllRecords(
        limit,
        query.skip,
        query.sortOrder
      )
    }

    return results.map(({ txDigest, eventIndex, type, collection, tokenId, from, to, amount }) => ({
      txDigest,
      eventIndex,
      type,
      collection,
      tokenId,
      ...(from !== undefined ? { from } : {}),
      ...(to !== undefined ? { to } : {}),
      amount
    }))
  }

  /**
   * Supply of a token recomputed from its indexed events.
   */
  async totalSupply(collection: ObjectId, tokenId: bigint): Promise<bigint> {
    const history = await this.storageManager.findTokenHistory(collection, TokenId.toHex(tokenId))
    return SupplyReplayer.replay(history.map(record => this.decodeRecord(record)), collection, tokenId)
  }

  async getDocumentation(): Promise<string> {
    return docs
  }

  async getMetaData(): Promise<{
    name: string
    shortDescription: string
    version?: string
  }> {
    return {
      name: 'Ledger Lookup Service',
      shortDescription: 'Find ledger events by collection, token, address or type.'
    }
  }

  private parseQuery(raw: unknown): LedgerQuery {
    if (typeof raw !== 'object' || raw === null) {
      throw new Error('A valid query must be provided')
    }
    const field = (name: keyof LedgerQuery): unknown => Reflect.get(raw, name)
    const optionalString = (name: 'collection' | 'tokenId' | 'address'): string | undefined => {
      const value = field(name)
      if (value === undefined) return undefined
      if (typeof value !== 'string' || value.length === 0) {
        throw new Error(`${name} must be a non-empty string`)
      }
      return value
    }
    const optionalInteger = (name: 'limit' | 'skip', min: number): number | undefined => {
      const value = field(name)
      if (value === undefined) return undefined
      if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
        throw new Error(`${name} must be an integer of at least ${min}`)
      }
      return value
    }

    const type = optionalMember(field('type'), EVENT_TYPES, 'type')
    const sortOrder = optionalMember(field('sortOrder'), SORT_ORDERS, 'sortOrder')
    const tokenId = optionalString('tokenId')

    return {
      collection: optionalString('collection'),
      tokenId: tokenId === undefined ? undefined : TokenId.toHex(TokenId.fromHex(tokenId)),
      address: optionalString('address'),
      type,
      limit: optionalInteger('limit', 1),
      skip: optionalInteger('skip', 0),
      sortOrder
    }
  }

  private encodeEvent(event: LedgerEvent, txDigest: string, eventIndex: number, sequence: number): Omit<LedgerEventRecord, 'createdAt'> {
    const base = {
      txDigest,
      eventIndex,
      sequence,
      collection: event.collection,
      tokenId: TokenId.toHex(event.tokenId),
      amount: event.amount.toString()
    }
    switch (event.type) {
      case 'Mint':
        return { ...base, type: event.type, to: event.to }
      case 'Burn':
        return { ...base, type: event.type, from: event.from }
      case 'Transfer':
        return { ...base, type: event.type, from: event.from, to: event.to }
    }
  }

  private decodeRecord(record: LedgerEventRecord): LedgerEvent {
    const base = {
      collection: record.collection,
      tokenId: TokenId.fromHex(record.tokenId),
      amount: BigInt(record.amount)
    }
    if (record.type === 'Mint' && record.to !== undefined) {
      return { ...base, type: 'Mint', to: record.to }
    }
    if (record.type === 'Burn' && record.from !== undefined) {
      return { ...base, type: 'Burn', from: record.from }
    }
    if (record.type === 'Transfer' && record.from !== undefined && record.to !== undefined) {
      return { ...base, type: 'Transfer', from: record.from, to: record.to }
    }
    throw new Error(`Malformed event record ${record.txDigest}.${record.eventIndex}`)
  }
}

// Factory function
export default (db: Db, config: LookupServiceConfig = {}): LedgerLookupService => {
  return new LedgerLookupService(new LedgerStorageManager(db), config)
}

export { LedgerLookupService }
