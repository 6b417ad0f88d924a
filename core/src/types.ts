/**
 * Ledger Core Type Definitions
 */

import type { PubKeyHex } from '@bsv/sdk'
import type { Logger } from './logging.js'
import type { MINT_EVENT, BURN_EVENT, TRANSFER_EVENT } from './constants.js'

// ---------------------------------------------------------------------------
// Identity Types
// ---------------------------------------------------------------------------

/** Opaque unique identifier of a ledger object (hex) */
export type ObjectId = string

/** Identity of a transaction sender or object owner */
export type Address = PubKeyHex

/**
 * Who holds an object. Collections are shared; caps and balances belong to
 * exactly one address.
 */
export type Owner =
  | { kind: 'address', address: Address }
  | { kind: 'shared' }

// ---------------------------------------------------------------------------
// Audit Events
// ---------------------------------------------------------------------------

export interface MintEvent {
  type: typeof MINT_EVENT
  collection: ObjectId
  tokenId: bigint
  /** Sender of the minting transaction, whoever ends up holding the balance */
  to: Address
  amount: bigint
}

export interface BurnEvent {
  type: typeof BURN_EVENT
  collection: ObjectId
  tokenId: bigint
  from: Address
  amount: bigint
}

export interface TransferEvent {
  type: typeof TRANSFER_EVENT
  collection: ObjectId
  tokenId: bigint
  from: Address
  to: Address
  amount: bigint
}

export type LedgerEvent = MintEvent | BurnEvent | TransferEvent

/**
 * An event as delivered after its transaction committed
 */
export type CommittedEvent = LedgerEvent & {
  /** Digest of the transaction that emitted the event */
  txDigest: string
  /** Position of the event inside its transaction */
  eventIndex: number
}

export interface CommittedTransaction {
  digest: string
  sender: Address
  events: CommittedEvent[]
}

export type TransactionListener = (transaction: CommittedTransaction) => void

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

/**
 * A token whose recorded supply disagrees with the sum of its live balances
 */
export interface SupplyMismatch {
  tokenId: bigint
  recorded: bigint
  actual: bigint
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface LedgerConfig {
  /** Logger for transaction outcomes (default: scoped console logger) */
  logger?: Logger
  /** Generator for object ids and transaction digests (default: 32 random bytes as hex) */
  generateId?: () => ObjectId
}

export interface ResolvedLedgerConfig {
  logger: Logger
  generateId: () => ObjectId
}
