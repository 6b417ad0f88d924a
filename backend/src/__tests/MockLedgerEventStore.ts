import type { LedgerEventRecord, LedgerEventStore, LedgerRecordFilters } from '../lookup-services/types.js'

/**
 * In-memory stand-in for LedgerStorageManager
 */
export class MockLedgerEventStore implements LedgerEventStore {
  records: LedgerEventRecord[] = []
  private sequence = 0

  async nextSequence(): Promise<number> {
    this.sequence += 1
    return this.sequence
  }

  async storeRecords(records: Array<Omit<LedgerEventRecord, 'createdAt'>>): Promise<void> {
    for (const record of records) {
      this.records.push({ ...record, createdAt: new Date(0) })
    }
  }

  async deleteTransaction(txDigest: string): Promise<number> {
    const before = this.records.length
    this.records = this.records.filter(record => record.txDigest !== txDigest)
    return before - this.records.length
  }

  async findWithFilters(
    filters: LedgerRecordFilters,
    limit: number = 50,
    skip: number = 0,
    sortOrder: 'asc' | 'desc' = 'desc'
  ): Promise<LedgerEventRecord[]> {
    const matching = this.records.filter(record =>
      (filters.collection === undefined || record.collection === filters.collection) &&
      (filters.tokenId === undefined || record.tokenId === filters.tokenId) &&
      (filters.type === undefined || record.type === filters.type) &&
      (filters.address === undefined || record.from === filters.address || record.to === filters.address)
    )
    return this.page(matching, limit, skip, sortOrder)
  }

  async findAllRecords(limit: number = 50, skip: number = 0, sortOrder: 'asc' | 'desc' = 'desc'): Promise<LedgerEventRecord[]> {
    return this.page(this.records, limit, skip, sortOrder)
  }

  async findTokenHistory(collection: string, tokenId: string): Promise<LedgerEventRecord[]> {
    return this.sorted(
      this.records.filter(record => record.collection === collection && record.tokenId === tokenId),
      'asc'
    )
  }

  async findByDigest(txDigest: string, eventIndex: number): Promise<LedgerEventRecord | null> {
    return this.records.find(record => record.txDigest === txDigest && record.eventIndex === eventIndex) ?? null
  }

  private page(records: LedgerEventRecord[], limit: number, skip: number, sortOrder: 'asc' | 'desc'): LedgerEventRecord[] {
    return this.sorted(records, sortOrder).slice(skip, skip + limit)
  }

  private sorted(records: LedgerEventRecord[], sortOrder: 'asc' | 'desc'): LedgerEventRecord[] {
    const direction = sortOrder === 'desc' ? -1 : 1
    return [...records].sort((a, b) =>
      direction * (a.sequence !== b.sequence ? a.sequence - b.sequence : a.eventIndex - b.eventIndex)
    )
  }
}
