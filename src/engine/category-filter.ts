/**
 * Ledger Engine - Category Filter
 * Partitions the ledger into principal and charge rows for one category.
 *
 * Charge rules differ per category. Merchant payments and cash withdrawals
 * take their fees from a separate categoryCode marker evaluated over the
 * whole ledger, so those charge rows are not a subset of the principal rows.
 *
 * @module category-filter
 */

import { isInCategory, type Ledger, type TransactionCategory, type TransactionRecord } from './ledger'

// ─── Types ────────────────────────────────────────────────────────────────

export interface CategoryPartition {
  principal: TransactionRecord[]
  charges: TransactionRecord[]
}

interface ChargeRule {
  /** Where charge rows are searched: the category's rows or the full ledger */
  scope: 'category' | 'ledger'
  matches: (record: TransactionRecord) => boolean
  /** Charge rows are dropped from the principal set */
  excludeFromPrincipal: boolean
}

// ─── Charge Markers ───────────────────────────────────────────────────────

export const MERCHANT_CHARGE_MARKER = 'Pay Merchant'
export const PAYBILL_CHARGE_MARKER = 'Charge'
export const TRANSFER_CHARGE_DESCRIPTION = 'of Funds Charge'
export const WITHDRAWAL_CHARGE_MARKER = 'Cash Withdrawal'

const CHARGE_RULES: Record<TransactionCategory, ChargeRule | null> = {
  merchant_payments: {
    scope: 'ledger',
    matches: r => r.categoryCode.includes(MERCHANT_CHARGE_MARKER),
    excludeFromPrincipal: false,
  },
  paybill_payments: {
    scope: 'category',
    matches: r => r.subtypeDescription.includes(PAYBILL_CHARGE_MARKER),
    excludeFromPrincipal: true,
  },
  peer_transfers: {
    scope: 'category',
    matches: r => r.subtypeDescription === TRANSFER_CHARGE_DESCRIPTION,
    excludeFromPrincipal: true,
  },
  received_funds: null,
  // TODO: decide with statement samples whether "Cash Withdrawal" rows belong to the
  // same population as "Customer Withdrawal"; both markers are kept distinct for now
  cash_withdrawals: {
    scope: 'ledger',
    matches: r => r.categoryCode.includes(WITHDRAWAL_CHARGE_MARKER),
    excludeFromPrincipal: false,
  },
  airtime_purchases: null,
}

// ─── Filter ───────────────────────────────────────────────────────────────

export function filterCategory(ledger: Ledger, category: TransactionCategory): CategoryPartition {
  const members = ledger.filter(r => isInCategory(r, category))
  const rule = CHARGE_RULES[category]
  if (!rule) return { principal: members, charges: [] }

  const charges = (rule.scope === 'ledger' ? ledger : members).filter(rule.matches)
  const principal = rule.excludeFromPrincipal ? members.filter(r => !rule.matches(r)) : members
  return { principal, charges }
}

export function hasChargeRule(category: TransactionCategory): boolean {
  return CHARGE_RULES[category] !== null
}
