/**
 * Ledger Engine - Cash Withdrawals
 * Agent and ATM withdrawals grouped by location.
 *
 * The withdrawal table uses "Customer Withdrawal" while the charge total
 * sums every "Cash Withdrawal" row in the ledger; the two row sets are
 * computed independently.
 *
 * @module cash-withdrawals
 */

import { aggregate, roundTo, sumAmounts, toCategoryResult } from './aggregator'
import { filterCategory } from './category-filter'
import type { CategoryResult, Ledger } from './ledger'

export function processCashWithdrawals(ledger: Ledger, topN: number): CategoryResult {
  const { principal, charges } = filterCategory(ledger, 'cash_withdrawals')
  const entities = aggregate(principal, r => ({ entityName: r.counterpartyRaw }), { direction: 'out' })
  return toCategoryResult('cash_withdrawals', entities, roundTo(sumAmounts(charges, 'out'), 1), topN)
}
