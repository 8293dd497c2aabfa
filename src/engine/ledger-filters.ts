/**
 * Ledger Engine - Row Filters
 * Date-range and month selections a caller applies before handing the
 * ledger to the category processors. The processors never filter by date.
 *
 * @module ledger-filters
 */

import type { Ledger, TransactionRecord } from './ledger'

// ─── Constants ────────────────────────────────────────────────────────────

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
]

const DEFAULT_MONTH_COUNT = 3

// ─── Period ───────────────────────────────────────────────────────────────

export interface LedgerPeriod {
  start: Date
  end: Date
}

export function getLedgerPeriod(ledger: Ledger): LedgerPeriod | null {
  if (ledger.length === 0) return null
  let start = ledger[0].timestamp
  let end = ledger[0].timestamp
  for (const r of ledger) {
    if (r.timestamp < start) start = r.timestamp
    if (r.timestamp > end) end = r.timestamp
  }
  return { start, end }
}

// ─── Date Range ───────────────────────────────────────────────────────────

function startOfDay(d: Date): Date {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate())
}

/** Records on any calendar day from start to end, both days included */
export function filterByDateRange(ledger: Ledger, start: Date, end: Date): TransactionRecord[] {
  const from = startOfDay(start).getTime()
  const until = new Date(end.getFullYear(), end.getMonth(), end.getDate() + 1).getTime()
  return ledger.filter(r => r.timestamp.getTime() >= from && r.timestamp.getTime() < until)
}

// ─── Months ───────────────────────────────────────────────────────────────

/** "March_2024" */
export function monthLabel(d: Date): string {
  return `${MONTH_NAMES[d.getMonth()]}_${d.getFullYear()}`
}

/** Distinct month labels in chronological order */
export function listLedgerMonths(ledger: Ledger): string[] {
  const byKey = new Map<number, string>()
  for (const r of ledger) {
    const key = r.timestamp.getFullYear() * 12 + r.timestamp.getMonth()
    if (!byKey.has(key)) byKey.set(key, monthLabel(r.timestamp))
  }
  return Array.from(byKey.entries())
    .sort(([a], [b]) => a - b)
    .map(([, label]) => label)
}

export function defaultMonthSelection(months: readonly string[]): string[] {
  return months.slice(0, DEFAULT_MONTH_COUNT)
}

export function filterByMonths(ledger: Ledger, labels: readonly string[]): TransactionRecord[] {
  const wanted = new Set(labels)
  return ledger.filter(r => wanted.has(monthLabel(r.timestamp)))
}
