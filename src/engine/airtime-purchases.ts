/**
 * Ledger Engine - Airtime Purchases
 * Airtime and bundle purchases per provider. Not charged separately.
 *
 * @module airtime-purchases
 */

import { aggregate, toCategoryResult } from './aggregator'
import { filterCategory } from './category-filter'
import type { CategoryResult, Ledger } from './ledger'

export function processAirtimePurchases(ledger: Ledger, topN: number): CategoryResult {
  const { principal } = filterCategory(ledger, 'airtime_purchases')
  const entities = aggregate(principal, r => ({ entityName: r.counterpartyRaw }), { direction: 'out' })
  return toCategoryResult('airtime_purchases', entities, 0, topN)
}
