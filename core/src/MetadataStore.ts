import { LedgerError } from './errors.js'

/**
 * Opaque per-token metadata blobs held inside a Collection.
 *
 * Unlike supply, a missing entry is an error on read: blank metadata and no
 * metadata are different things. Authorization is checked by the caller
 * (the ledger transaction) before `set` is reached.
 */
export class MetadataStore {
  private readonly entries = new Map<bigint, number[]>()

  /** Insert or overwrite */
  set(tokenId: bigint, data: number[]): void {
    this.entries.set(tokenId, [...data])
  }

  /**
   * @returns a copy of the stored bytes
   * @throws LedgerError (NotFound) if no metadata was ever set for the token
   */
  get(tokenId: bigint): number[] {
    const data = this.entries.get(tokenId)
    if (data === undefined) {
      throw new LedgerError('NotFound', `No metadata for token ${tokenId}`)
    }
    return [...data]
  }

  has(tokenId: bigint): boolean {
    return this.entries.has(tokenId)
  }

  /** The stored bytes themselves; undefined when absent */
  entry(tokenId: bigint): number[] | undefined {
    return this.entries.get(tokenId)
  }

  /** Put back an entry read with `entry`. Rollback only */
  restoreEntry(tokenId: bigint, data: number[] | undefined): void {
    if (data === undefined) {
      this.entries.delete(tokenId)
    } else {
      this.entries.set(tokenId, data)
    }
  }
}
