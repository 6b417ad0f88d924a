import { U64_MAX } from './constants.js'
import { LedgerInvariantError } from './errors.js'

/**
 * Running total supply per token id, held inside a Collection.
 *
 * Only mint and burn move these numbers. A token that was never minted has a
 * supply of zero; absence is not an error.
 */
export class SupplyLedger {
  private readonly supply = new Map<bigint, bigint>()

  totalSupply(tokenId: bigint): bigint {
    return this.supply.get(tokenId) ?? 0n
  }

  /**
   * @returns the new total
   * @throws LedgerInvariantError if the total would leave the u64 range
   */
  increase(tokenId: bigint, delta: bigint): bigint {
    const next = this.totalSupply(tokenId) + delta
    if (next > U64_MAX) {
      throw new LedgerInvariantError(`supply of token ${tokenId} would overflow u64 (${next})`)
    }
    this.supply.set(tokenId, next)
    return next
  }

  /**
   * A decrease larger than the current total means a balance escaped supply
   * tracking.
   *
   * @returns the new total
   * @throws LedgerInvariantError on underflow
   */
  decrease(tokenId: bigint, delta: bigint): bigint {
    const current = this.totalSupply(tokenId)
    if (delta > current) {
      throw new LedgerInvariantError(`supply of token ${tokenId} is ${current}, cannot remove ${delta}`)
    }
    const next = current - delta
    this.supply.set(tokenId, next)
    return next
  }

  /** Token ids with a recorded entry (including ones burned back to zero) */
  tokenIds(): bigint[] {
    return Array.from(this.supply.keys())
  }

  /** The raw entry; undefined when the token was never recorded */
  entry(tokenId: bigint): bigint | undefined {
    return this.supply.get(tokenId)
  }

  /** Put back an entry read with `entry`. Rollback only */
  restoreEntry(tokenId: bigint, value: bigint | undefined): void {
    if (value === undefined) {
      this.supply.delete(tokenId)
    } else {
      this.supply.set(tokenId, value)
    }
  }
}
