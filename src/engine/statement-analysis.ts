/**
 * Ledger Engine - Statement Analysis
 * Runs the six category processors over one ledger snapshot. Processors
 * share nothing but the read-only ledger; a processor that throws is
 * reported as a failure and its category falls back to an empty result,
 * so the remaining sections still render.
 *
 * @module statement-analysis
 */

import { processAirtimePurchases } from './airtime-purchases'
import { resolveAnalysisSettings, type AnalysisSettings } from './analysis-settings'
import { processCashWithdrawals } from './cash-withdrawals'
import { getErrorMessage } from './errors'
import { emptyCategoryResult, type CategoryResult, type Ledger, type TransactionCategory } from './ledger'
import { getLedgerPeriod, type LedgerPeriod } from './ledger-filters'
import { processMerchantPayments } from './merchant-payments'
import { processPayBillPayments } from './paybill-payments'
import { processPeerTransfers } from './peer-transfers'
import { processReceivedFunds } from './received-funds'

// ─── Types ────────────────────────────────────────────────────────────────

export type CategoryProcessor = (ledger: Ledger, topN: number) => CategoryResult

export interface CategoryFailure {
  category: TransactionCategory
  message: string
}

export interface StatementAnalysis {
  period: LedgerPeriod | null
  settings: AnalysisSettings
  results: Record<TransactionCategory, CategoryResult>
  failures: CategoryFailure[]
}

// ─── Processor Registry ───────────────────────────────────────────────────

export const CATEGORY_PROCESSORS: Record<TransactionCategory, CategoryProcessor> = {
  merchant_payments: processMerchantPayments,
  paybill_payments:  processPayBillPayments,
  peer_transfers:    processPeerTransfers,
  received_funds:    processReceivedFunds,
  cash_withdrawals:  processCashWithdrawals,
  airtime_purchases: processAirtimePurchases,
}

export function processCategory(category: TransactionCategory, ledger: Ledger, topN: number): CategoryResult {
  return CATEGORY_PROCESSORS[category](ledger, topN)
}

// ─── Analysis ─────────────────────────────────────────────────────────────

export function analyzeStatement(
  ledger: Ledger,
  overrides: Partial<AnalysisSettings> = {},
  processors: Record<TransactionCategory, CategoryProcessor> = CATEGORY_PROCESSORS,
): StatementAnalysis {
  const settings = resolveAnalysisSettings(overrides)
  const failures: CategoryFailure[] = []

  const run = (category: TransactionCategory): CategoryResult => {
    try {
      return processors[category](ledger, settings.topN)
    } catch (err) {
      console.error(`[Analysis] ${category} failed:`, err)
      failures.push({ category, message: getErrorMessage(err) })
      return emptyCategoryResult(category)
    }
  }

  const results: Record<TransactionCategory, CategoryResult> = {
    merchant_payments: run('merchant_payments'),
    paybill_payments:  run('paybill_payments'),
    peer_transfers:    run('peer_transfers'),
    received_funds:    run('received_funds'),
    cash_withdrawals:  run('cash_withdrawals'),
    airtime_purchases: run('airtime_purchases'),
  }

  return { period: getLedgerPeriod(ledger), settings, results, failures }
}
