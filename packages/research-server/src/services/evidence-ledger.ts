import type { ReaderReport } from '@deepseeker/shared'

type LedgerEntry = Readonly<Omit<ReaderReport, 'keyPoints'> & { keyPoints: readonly string[] }>

export type LedgerAppendResult = { ok: true; index: number } | { ok: false; reason: 'duplicate'; existingEntryId: string }

function ledgerKey(round: number, url: string) {
  return `${round}\u0000${url}`
}

/**
 * Append-only list of reader reports across rounds. One entry per
 * (round, url); failed reads are entries too.
 */
export class EvidenceLedger {
  private readonly entries: LedgerEntry[] = []
  private readonly byKey = new Map<string, string>()
  private readonly entryIds = new Set<string>()

  append(report: ReaderReport): LedgerAppendResult {
    const key = ledgerKey(report.round, report.url)
    const existing = this.byKey.get(key)
    if (existing !== undefined) {
      return { ok: false, reason: 'duplicate', existingEntryId: existing }
    }
    if (this.entryIds.has(report.entryId)) {
      return { ok: false, reason: 'duplicate', existingEntryId: report.entryId }
    }
    const frozen = Object.freeze({ ...report, keyPoints: Object.freeze([...report.keyPoints]) })
    this.entries.push(frozen)
    this.byKey.set(key, report.entryId)
    this.entryIds.add(report.entryId)
    return { ok: true, index: this.entries.length - 1 }
  }

  has(entryId: string) {
    return this.entryIds.has(entryId)
  }

  get size() {
    return this.entries.length
  }

  /** Frozen copies, in append order. */
  list(): ReaderReport[] {
    return this.entries.map((entry) => Object.freeze({ ...entry, keyPoints: [...entry.keyPoints] }))
  }
}
