/**
 * @multitoken/core - Multi-Token Ledger
 *
 * A shared Collection tracks supply and metadata for any number of token
 * types; owned Balance records hold spendable amounts of one token type.
 *
 * This library provides:
 * - 128-bit token ids packing a location and an item namespace
 * - Capability-gated minting and metadata
 * - Split, join, transfer and burn of owned balances
 * - All-or-nothing transactions with audit events for indexers
 * - Supply replay from the event stream
 *
 * @example
 * ```typescript
 * import { Ledger, TokenId } from '@multitoken/core'
 *
 * const ledger = new Ledger()
 * const { collection, cap } = ledger.createCollection(admin)
 * const tokenId = TokenId.make(100n, 1n)
 *
 * // Mint 100 to alice
 * ledger.execute(admin, tx => tx.mint(cap, collection, tokenId, 100n, alice))
 *
 * // Alice sends 30 to bob
 * const [holding] = ledger.balancesOf(alice, collection)
 * ledger.execute(alice, tx => tx.splitAndTransfer(holding, 30n, bob))
 * ```
 *
 * @packageDocumentation
 */

// Ledger and transactions
export { Ledger } from './Ledger.js'
export { LedgerTransaction } from './LedgerTransaction.js'

// Objects. Only the ledger creates live ones and only its transactions change
// them, so the classes are exported as types
export type { Collection } from './Collection.js'
export type { CollectionCap } from './CollectionCap.js'
export type { Balance } from './Balance.js'
export type { LedgerObject } from './ObjectStore.js'

// Building blocks
export { TokenId } from './TokenId.js'
export { SupplyReplayer } from './SupplyReplayer.js'

// Errors
export { LedgerError, LedgerInvariantError, isLedgerError } from './errors.js'
export type { LedgerErrorKind } from './errors.js'

// Logging
export { createLogger, safeFormat } from './logging.js'
export type { Logger } from './logging.js'
export type { LogLevel, LoggingConfig } from './logging.config.js'

// Types
export type {
  ObjectId,
  Address,
  Owner,
  MintEvent,
  BurnEvent,
  TransferEvent,
  LedgerEvent,
  CommittedEvent,
  CommittedTransaction,
  TransactionListener,
  SupplyMismatch,
  LedgerConfig,
  ResolvedLedgerConfig
} from './types.js'

// Constants
export {
  U64_MAX,
  U128_MAX,
  MINT_EVENT,
  BURN_EVENT,
  TRANSFER_EVENT
} from './constants.js'

// Validation helpers
export { assertU64, assertU128, assertBytes, generateObjectId } from './utils.js'
