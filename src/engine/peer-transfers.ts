/**
 * Ledger Engine - Peer Transfers (Send Money)
 * Person-to-person transfers, grouped by the recipient's resolved name.
 * "of Funds Charge" rows are fees and stay out of the recipient table.
 *
 * @module peer-transfers
 */

import { aggregate, largestGroupTotal, toCategoryResult } from './aggregator'
import { filterCategory } from './category-filter'
import { resolvePersonName } from './entity-names'
import type { CategoryResult, Ledger } from './ledger'

export function processPeerTransfers(ledger: Ledger, topN: number): CategoryResult {
  const { principal, charges } = filterCategory(ledger, 'peer_transfers')
  const entities = aggregate(principal, r => ({ entityName: resolvePersonName(r.counterpartyRaw) }), { direction: 'out' })
  const totalCharges = largestGroupTotal(charges, r => r.categoryCode, 'out')
  return toCategoryResult('peer_transfers', entities, totalCharges, topN)
}
