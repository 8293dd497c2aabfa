/**
 * Ledger Engine - Aggregator
 * Single-pass group-by over ledger rows with running (count, sum)
 * accumulators, plus the ranking helpers used by every category.
 *
 * @module aggregator
 */

import type { CategoryResult, EntityAggregate, TransactionCategory, TransactionRecord } from './ledger'

// ─── Types ────────────────────────────────────────────────────────────────

export type AmountDirection = 'out' | 'in'

export interface GroupKey {
  entityName: string
  extras?: Partial<Pick<EntityAggregate, 'counterpartyKind'>>
}

interface Accumulator {
  aggregate: EntityAggregate
  accounts: string[]
}

export interface AggregateOptions {
  direction: AmountDirection
  /** Side attribute collected per group, e.g. pay-bill account references */
  collectAccount?: (record: TransactionRecord) => string
}

// ─── Amounts ──────────────────────────────────────────────────────────────

export function amountOf(record: TransactionRecord, direction: AmountDirection): number {
  return direction === 'out' ? record.amountOut : record.amountIn
}

export function sumAmounts(records: readonly TransactionRecord[], direction: AmountDirection): number {
  return records.reduce((s, r) => s + amountOf(r, direction), 0)
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals
  return Math.round(value * factor) / factor
}

// ─── Group-by ─────────────────────────────────────────────────────────────

function compositeKey(key: GroupKey): string {
  return key.extras?.counterpartyKind ? `${key.entityName}\u0000${key.extras.counterpartyKind}` : key.entityName
}

/**
 * Group rows by key, sorted by total descending. Ties keep the order in
 * which each group was first seen.
 */
export function aggregate(
  records: readonly TransactionRecord[],
  keyFn: (record: TransactionRecord) => GroupKey,
  options: AggregateOptions,
): EntityAggregate[] {
  const groups = new Map<string, Accumulator>()

  for (const record of records) {
    const key = keyFn(record)
    const id = compositeKey(key)
    let acc = groups.get(id)
    if (!acc) {
      acc = { aggregate: { entityName: key.entityName, transactionCount: 0, totalAmount: 0, ...key.extras }, accounts: [] }
      groups.set(id, acc)
    }
    acc.aggregate.transactionCount += 1
    acc.aggregate.totalAmount += amountOf(record, options.direction)

    if (options.collectAccount) {
      const account = options.collectAccount(record)
      if (account && !acc.accounts.includes(account)) acc.accounts.push(account)
    }
  }

  const result = Array.from(groups.values()).map(({ aggregate: agg, accounts }) =>
    options.collectAccount ? { ...agg, accounts: accounts.join(', ') } : agg,
  )
  // Array.prototype.sort is stable, so insertion order settles ties
  return result.sort((a, b) => b.totalAmount - a.totalAmount)
}

/**
 * Largest single group total among rows grouped by keyFn, 0 when there
 * are no rows. Used for fee sub-populations that normally collapse to one
 * fee-collecting entity.
 */
export function largestGroupTotal(
  records: readonly TransactionRecord[],
  keyFn: (record: TransactionRecord) => string,
  direction: AmountDirection,
): number {
  const grouped = aggregate(records, r => ({ entityName: keyFn(r) }), { direction })
  return grouped.length > 0 ? grouped[0].totalAmount : 0
}

// ─── Ranking ──────────────────────────────────────────────────────────────

/** N largest by totalAmount, ties keep input order */
export function selectTopN(entities: readonly EntityAggregate[], n: number): EntityAggregate[] {
  return [...entities].sort((a, b) => b.totalAmount - a.totalAmount).slice(0, Math.max(0, n))
}

/** Top-N chosen first, then re-sorted ascending for horizontal bar output */
export function toAscendingDisplay(entities: readonly EntityAggregate[], n: number): EntityAggregate[] {
  return selectTopN(entities, n).sort((a, b) => a.totalAmount - b.totalAmount)
}

/** Most frequented counterparties: N largest by transaction count */
export function rankByFrequency(entities: readonly EntityAggregate[], n: number): EntityAggregate[] {
  return [...entities].sort((a, b) => b.transactionCount - a.transactionCount).slice(0, Math.max(0, n))
}

// ─── Totals ───────────────────────────────────────────────────────────────

export function summarizeEntities(entities: readonly EntityAggregate[]): { totalAmount: number; totalCount: number } {
  let totalAmount = 0
  let totalCount = 0
  for (const e of entities) {
    totalAmount += e.totalAmount
    totalCount += e.transactionCount
  }
  return { totalAmount, totalCount }
}

export function toCategoryResult(
  category: TransactionCategory,
  entities: EntityAggregate[],
  totalCharges: number,
  topN: number,
): CategoryResult {
  const { totalAmount, totalCount } = summarizeEntities(entities)
  return {
    category,
    entities,
    topEntities: selectTopN(entities, topN),
    totalPrincipalAmount: totalAmount,
    totalCharges,
    totalTransactionCount: totalCount,
  }
}
