/**
 * Ledger Constants
 *
 * Numeric bounds and identifiers used throughout the ledger core.
 */

// ---------------------------------------------------------------------------
// Numeric Bounds
// ---------------------------------------------------------------------------

/** Largest value representable as an unsigned 64-bit integer */
export const U64_MAX = (1n << 64n) - 1n

/** Largest value representable as an unsigned 128-bit integer */
export const U128_MAX = (1n << 128n) - 1n

/** Mask selecting the item half (low 64 bits) of a token id */
export const ITEM_MASK = U64_MAX

/** Bit offset of the location half of a token id */
export const LOCATION_SHIFT = 64n

/** Largest value a single metadata byte may hold */
export const MAX_BYTE_VALUE = 255

// ---------------------------------------------------------------------------
// Identifiers
// ---------------------------------------------------------------------------

/** Number of random bytes in a generated object id or transaction digest */
export const OBJECT_ID_BYTES = 32

/** Scope used by the ledger's default logger */
export const LEDGER_LOG_SCOPE = 'ledger'

/** Event type discriminants */
export const MINT_EVENT = 'Mint'
export const BURN_EVENT = 'Burn'
export const TRANSFER_EVENT = 'Transfer'
