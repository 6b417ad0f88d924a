/**
 * Utility functions for the ledger core
 */

import { Random, Utils } from '@bsv/sdk'
import { LedgerError } from './errors.js'
import { MAX_BYTE_VALUE, OBJECT_ID_BYTES, U128_MAX, U64_MAX } from './constants.js'
import type { ObjectId } from './types.js'

/**
 * Generate a fresh object id or transaction digest: 32 random bytes as hex.
 */
export function generateObjectId(): ObjectId {
  return Utils.toHex(Random(OBJECT_ID_BYTES))
}

/**
 * Reject values that do not fit an unsigned 64-bit integer.
 *
 * @param value - Value to check
 * @param what - Name used in the error message
 * @throws LedgerError (InvalidArg) if out of range
 */
export function assertU64(value: bigint, what: string): void {
  if (value < 0n || value > U64_MAX) {
    throw new LedgerError('InvalidArg', `${what} must be within 0..2^64-1, got ${value}`)
  }
}

/**
 * Reject values that do not fit an unsigned 128-bit integer.
 */
export function assertU128(value: bigint, what: string): void {
  if (value < 0n || value > U128_MAX) {
    throw new LedgerError('InvalidArg', `${what} must be within 0..2^128-1, got ${value}`)
  }
}

/**
 * Reject byte arrays holding anything other than integers in 0..255.
 */
export function assertBytes(data: number[], what: string): void {
  for (const [i, byte] of data.entries()) {
    if (!Number.isInteger(byte) || byte < 0 || byte > MAX_BYTE_VALUE) {
      throw new LedgerError('InvalidArg', `${what}[${i}] is not a byte: ${byte}`)
    }
  }
}
