/**
 * Ledger Engine - Merchant Payments (Buy Goods)
 * Ranks the merchants paid through till numbers. Fees come from the
 * separate "Pay Merchant" rows and are reported, not subtracted.
 *
 * @module merchant-payments
 */

import { aggregate, roundTo, sumAmounts, toCategoryResult } from './aggregator'
import { filterCategory } from './category-filter'
import type { CategoryResult, Ledger } from './ledger'

export function processMerchantPayments(ledger: Ledger, topN: number): CategoryResult {
  const { principal, charges } = filterCategory(ledger, 'merchant_payments')
  const entities = aggregate(principal, r => ({ entityName: r.counterpartyRaw }), { direction: 'out' })
  return toCategoryResult('merchant_payments', entities, roundTo(sumAmounts(charges, 'out'), 2), topN)
}
