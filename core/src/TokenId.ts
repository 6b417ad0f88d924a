/**
 * TokenId - 128-bit token identifiers
 *
 * A token id packs two 64-bit namespaces: the location in the high half and
 * the item in the low half.
 *
 * ```
 *   bit 127 ........ 64 | 63 ........ 0
 *        location       |     item
 * ```
 */

import { ITEM_MASK, LOCATION_SHIFT } from './constants.js'
import { LedgerError } from './errors.js'
import { assertU128, assertU64 } from './utils.js'

const HEX_DIGITS = 32

/**
 * @example
 * ```typescript
 * const id = TokenId.make(100n, 1n)
 * TokenId.location(id) // 100n
 * TokenId.item(id)     // 1n
 * TokenId.toHex(id)    // '00000000000000640000000000000001'
 * ```
 */
export class TokenId {
  /**
   * Pack a location and an item id into one token id.
   *
   * @throws LedgerError (InvalidArg) if either half is not a u64
   */
  static make(locationId: bigint, itemId: bigint): bigint {
    assertU64(locationId, 'location id')
    assertU64(itemId, 'item id')
    return (locationId << LOCATION_SHIFT) | itemId
  }

  /** Top 64 bits */
  static location(tokenId: bigint): bigint {
    assertU128(tokenId, 'token id')
    return tokenId >> LOCATION_SHIFT
  }

  /** Bottom 64 bits */
  static item(tokenId: bigint): bigint {
    assertU128(tokenId, 'token id')
    return tokenId & ITEM_MASK
  }

  static isValid(tokenId: bigint): boolean {
    try {
      assertU128(tokenId, 'token id')
      return true
    } catch {
      return false
    }
  }

  /**
   * Fixed-width lowercase hex, as used in events and the indexer.
   */
  static toHex(tokenId: bigint): string {
    assertU128(tokenId, 'token id')
    return tokenId.toString(16).padStart(HEX_DIGITS, '0')
  }

  static fromHex(hex: string): bigint {
    if (!/^[0-9a-fA-F]{1,32}$/.test(hex)) {
      throw new LedgerError('InvalidArg', `Invalid token id hex: ${hex}`)
    }
    return BigInt(`0x${hex}`)
  }
}
