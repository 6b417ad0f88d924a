/**
 * Type definitions for the ledger backend services
 * @module types
 */

// Re-export lookup service types
export type {
  LedgerEventType,
  LedgerQuery,
  LookupQuestion,
  LedgerEventRecord,
  LedgerLookupResult,
  LedgerRecordFilters,
  LedgerEventStore
} from './lookup-services/types.js'
export type { LookupServiceConfig } from './lookup-services/LedgerLookupServiceFactory.js'
export type { AdmittanceInstructions, RejectedEvent, SupplyLookup } from './event-validators/LedgerEventValidator.js'
export type { IndexerHandle } from './attachIndexer.js'
