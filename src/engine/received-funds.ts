/**
 * Ledger Engine - Received Funds
 * Money received from individuals and from businesses.
 *
 * Individual senders appear as "2547******09 Firstname Lastname" and are
 * resolved to the name; business senders are kept as written. A row is
 * tagged Individual when its description ends with the word "from".
 *
 * @module received-funds
 */

import { aggregate, toCategoryResult } from './aggregator'
import { filterCategory } from './category-filter'
import { resolvePersonName } from './entity-names'
import type { CategoryResult, CounterpartyKind, Ledger, TransactionRecord } from './ledger'

const BUSINESS_MARKER = 'Business'

export function counterpartyKindOf(subtypeDescription: string): CounterpartyKind {
  return /\bfrom$/.test(subtypeDescription) ? 'Individual' : 'Business'
}

function senderName(record: TransactionRecord): string {
  if (record.subtypeDescription.includes(BUSINESS_MARKER)) return record.counterpartyRaw
  return resolvePersonName(record.counterpartyRaw)
}

export function processReceivedFunds(ledger: Ledger, topN: number): CategoryResult {
  const { principal } = filterCategory(ledger, 'received_funds')

  // Individuals first, then businesses, so first-seen order matches the statement layout
  const individuals = principal.filter(r => !r.subtypeDescription.includes(BUSINESS_MARKER))
  const businesses = principal.filter(r => r.subtypeDescription.includes(BUSINESS_MARKER))

  const entities = aggregate(
    [...individuals, ...businesses],
    r => ({ entityName: senderName(r), extras: { counterpartyKind: counterpartyKindOf(r.subtypeDescription) } }),
    { direction: 'in' },
  )
  return toCategoryResult('received_funds', entities, 0, topN)
}
