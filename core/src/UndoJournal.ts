/**
 * Undo log of one transaction.
 *
 * Each piece of state (a store entry, a balance amount, one token's supply or
 * metadata) is recorded the first time the transaction changes it; later
 * changes to the same key are covered by that first record. Rolling back runs
 * the records newest first.
 */
export class UndoJournal {
  private undos: Array<() => void> = []
  private touched = new Set<string>()

  record(key: string, undo: () => void): void {
    if (this.touched.has(key)) return
    this.touched.add(key)
    this.undos.push(undo)
  }

  /** Number of distinct keys recorded */
  get size(): number {
    return this.undos.length
  }

  rollback(): void {
    for (let i = this.undos.length - 1; i >= 0; i--) {
      this.undos[i]()
    }
    this.undos = []
    this.touched.clear()
  }
}
