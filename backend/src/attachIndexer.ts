import { createLogger, type CommittedTransaction, type Ledger, type Logger } from '@multitoken/core'
import type { LedgerLookupService } from './lookup-services/LedgerLookupServiceFactory.js'

export interface IndexerHandle {
  /** Stop receiving transactions; work already queued still runs */
  detach: () => void
  /** Resolves once every transaction received so far has been indexed */
  idle: () => Promise<void>
}

/**
 * Feed a ledger's committed transactions into a lookup service.
 *
 * Ledger listeners are synchronous, so indexing is queued and runs one
 * transaction at a time in commit order. A failed transaction is logged and
 * the queue moves on.
 */
export function attachIndexer(
  ledger: Ledger,
  service: LedgerLookupService,
  logger: Logger = createLogger('indexer')
): IndexerHandle {
  let queue: Promise<void> = Promise.resolve()

  const index = async (transaction: CommittedTransaction): Promise<void> => {
    try {
      const stored = await service.transactionCommitted(transaction)
      logger.debug(`Indexed ${stored} of ${transaction.events.length} events from ${transaction.digest}`)
    } catch (error) {
      logger.error(`Failed to index transaction ${transaction.digest}`, error)
    }
  }

  const detach = ledger.subscribe(transaction => {
    queue = queue.then(async () => await index(transaction))
  })

  return {
    detach,
    idle: async () => await queue
  }
}
