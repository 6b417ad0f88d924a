import { TokenId, U64_MAX, type LedgerEvent, type ObjectId } from '@multitoken/core'
import docs from '../docs/LedgerEventValidatorDocs.js'

export interface RejectedEvent {
  index: number
  reason: string
}

export interface AdmittanceInstructions {
  /** Indices of events that may enter the index, in input order */
  eventsToAdmit: number[]
  rejected: RejectedEvent[]
}

/** Current indexed supply of one token */
export type SupplyLookup = (collection: ObjectId, tokenId: bigint) => bigint

/**
 * Decides which events of a committed transaction the indexer accepts.
 *
 * Events arrive from outside the index, so each one is checked on its own
 * (shape, u64 amounts, valid token id) and against the supply the index
 * already holds. A burn may not take more than the supply left after the
 * earlier admitted events of the same batch.
 * @public
 */
export default class LedgerEventValidator {
  identifyAdmissibleEvents(events: LedgerEvent[], currentSupply: SupplyLookup): AdmittanceInstructions {
    const eventsToAdmit: number[] = []
    const rejected: RejectedEvent[] = []

    // Running supply per collection/token, seeded lazily from the index
    const running = new Map<string, bigint>()
    const supplyOf = (collection: ObjectId, tokenId: bigint): bigint => {
      const key = `${collection}:${tokenId}`
      const known = running.get(key)
      if (known !== undefined) return known
      const seeded = currentSupply(collection, tokenId)
      running.set(key, seeded)
      return seeded
    }

    for (const [index, event] of events.entries()) {
      const problem = this.checkShape(event)
      if (problem !== undefined) {
        rejected.push({ index, reason: problem })
        continue
      }

      const key = `${event.collection}:${event.tokenId}`
      const supply = supplyOf(event.collection, event.tokenId)

      if (event.type === 'Mint') {
        if (supply + event.amount > U64_MAX) {
          rejected.push({ index, reason: `Mint would overflow supply ${supply}` })
          continue
        }
        running.set(key, supply + event.amount)
      } else if (event.type === 'Burn') {
        if (event.amount > supply) {
          rejected.push({ index, reason: `Burn of ${event.amount} exceeds indexed supply ${supply}` })
          continue
        }
        running.set(key, supply - event.amount)
      }

      eventsToAdmit.push(index)
    }

    return { eventsToAdmit, rejected }
  }

  /**
   * Returns the documentation for the admission rules
   */
  async getDocumentation(): Promise<string> {
    return docs
  }

  async getMetaData(): Promise<{
    name: string
    shortDescription: string
    version?: string
  }> {
    return {
      name: 'Ledger Event Validator',
      shortDescription: 'Admission rules for indexed mint, burn and transfer events'
    }
  }

  private checkShape(event: LedgerEvent): string | undefined {
    if (event.type !== 'Mint' && event.type !== 'Burn' && event.type !== 'Transfer') {
      return 'Unknown event type'
    }
    if (typeof event.collection !== 'string' || event.collection.length === 0) {
      return 'Missing collection'
    }
    if (typeof event.tokenId !== 'bigint' || !TokenId.isValid(event.tokenId)) {
      return 'Invalid token id'
    }
    if (typeof event.amount !== 'bigint' || event.amount < 0n || event.amount > U64_MAX) {
      return 'Amount is not a u64'
    }
    if (event.type === 'Mint' && event.amount === 0n) {
      return 'Mint amount must be positive'
    }
    if ((event.type === 'Mint' || event.type === 'Transfer') && !this.isAddress(event.to)) {
      return 'Missing recipient'
    }
    if ((event.type === 'Burn' || event.type === 'Transfer') && !this.isAddress(event.from)) {
      return 'Missing sender'
    }
    return undefined
  }

  private isAddress(value: unknown): boolean {
    return typeof value === 'string' && value.length > 0
  }
}
