/**
 * Ledger Engine - Core Types & Category Markers
 * Normalized transaction records, per-category aggregates and results,
 * and the ordered marker table that assigns a record to its category.
 *
 * @module ledger
 */

// ─── Records ──────────────────────────────────────────────────────────────

export interface TransactionRecord {
  timestamp: Date
  categoryCode: string        // raw classification from the statement, e.g. "Pay Bill Online"
  subtypeDescription: string  // qualifier, e.g. "of Funds Charge" or "from Business"
  counterpartyRaw: string
  amountOut: number           // debited, 0 for inflows
  amountIn: number            // credited, 0 for outflows
}

export type Ledger = readonly TransactionRecord[]

export type TransactionCategory =
  | 'merchant_payments'
  | 'paybill_payments'
  | 'peer_transfers'
  | 'received_funds'
  | 'cash_withdrawals'
  | 'airtime_purchases'

export type CounterpartyKind = 'Individual' | 'Business'

// ─── Aggregates & Results ─────────────────────────────────────────────────

export interface EntityAggregate {
  entityName: string
  transactionCount: number
  totalAmount: number
  accounts?: string                  // pay-bill: comma-joined account references
  counterpartyKind?: CounterpartyKind // received funds only
}

export interface CategoryResult {
  category: TransactionCategory
  entities: EntityAggregate[]    // full table, descending by totalAmount
  topEntities: EntityAggregate[] // the topN largest, same order
  totalPrincipalAmount: number
  totalCharges: number
  totalTransactionCount: number
}

export function emptyCategoryResult(category: TransactionCategory): CategoryResult {
  return { category, entities: [], topEntities: [], totalPrincipalAmount: 0, totalCharges: 0, totalTransactionCount: 0 }
}

// ─── Category Markers ─────────────────────────────────────────────────────
// Membership is substring containment on categoryCode, evaluated in order.

export interface CategoryMarker {
  marker: string
  category: TransactionCategory
}

export const CATEGORY_MARKERS: readonly CategoryMarker[] = [
  { marker: 'Merchant Payment',    category: 'merchant_payments' },
  { marker: 'Pay Bill',            category: 'paybill_payments' },
  { marker: 'Customer Transfer',   category: 'peer_transfers' },
  { marker: 'Funds received',      category: 'received_funds' },
  { marker: 'Customer Withdrawal', category: 'cash_withdrawals' },
  { marker: 'Airtime',             category: 'airtime_purchases' },
]

export const ALL_CATEGORIES: readonly TransactionCategory[] = CATEGORY_MARKERS.map(m => m.category)

export function markerFor(category: TransactionCategory): string {
  const entry = CATEGORY_MARKERS.find(m => m.category === category)
  if (!entry) throw new Error(`No marker registered for category "${category}"`)
  return entry.marker
}

/** First category whose marker the record's categoryCode contains, or null */
export function classifyRecord(record: TransactionRecord): TransactionCategory | null {
  for (const { marker, category } of CATEGORY_MARKERS) {
    if (record.categoryCode.includes(marker)) return category
  }
  return null
}

/** Records whose categoryCode matches more than one category marker */
export function findMarkerOverlaps(ledger: Ledger): { record: TransactionRecord; categories: TransactionCategory[] }[] {
  const overlaps: { record: TransactionRecord; categories: TransactionCategory[] }[] = []
  for (const record of ledger) {
    const categories = CATEGORY_MARKERS
      .filter(m => record.categoryCode.includes(m.marker))
      .map(m => m.category)
    if (categories.length > 1) overlaps.push({ record, categories })
  }
  return overlaps
}

export function isInCategory(record: TransactionRecord, category: TransactionCategory): boolean {
  return record.categoryCode.includes(markerFor(category))
}
