/**
 * @multitoken/backend - Event index for the multi-token ledger
 *
 * Stores committed ledger events in MongoDB and answers lookups by collection,
 * token, address and event type.
 *
 * @packageDocumentation
 */

export { default as createLookupService, LedgerLookupService } from './lookup-services/LedgerLookupServiceFactory.js'
export { LedgerStorageManager } from './lookup-services/LedgerStorageManager.js'
export { default as LedgerEventValidator } from './event-validators/LedgerEventValidator.js'
export { attachIndexer } from './attachIndexer.js'
export * from './types.js'
