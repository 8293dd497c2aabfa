/**
 * Ledger Engine - Pay Bill Payments
 * Groups pay-bill payments by business, keeping the account numbers paid
 * to as a side attribute.
 *
 * @module paybill-payments
 */

import { aggregate, largestGroupTotal, roundTo, toCategoryResult } from './aggregator'
import { filterCategory } from './category-filter'
import { splitPayBillCounterparty } from './entity-names'
import type { CategoryResult, Ledger } from './ledger'

export function processPayBillPayments(ledger: Ledger, topN: number): CategoryResult {
  const { principal, charges } = filterCategory(ledger, 'paybill_payments')

  const entities = aggregate(
    principal,
    r => ({ entityName: splitPayBillCounterparty(r.counterpartyRaw).businessName }),
    { direction: 'out', collectAccount: r => splitPayBillCounterparty(r.counterpartyRaw).accountReference },
  )

  // Fees are collected by a single entity on real statements
  const totalCharges = largestGroupTotal(charges, r => r.counterpartyRaw, 'out')
  return toCategoryResult('paybill_payments', entities, roundTo(totalCharges, 2), topN)
}
