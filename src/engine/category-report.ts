/**
 * Ledger Engine - Category Report
 * Turns Category Results into the sections a dashboard draws: chart rows,
 * headline metrics and the "most frequented" table. Colour scale and
 * template are carried through unread.
 *
 * @module category-report
 */

import type { AnalysisSettings } from './analysis-settings'
import { rankByFrequency, selectTopN, toAscendingDisplay } from './aggregator'
import { hasChargeRule } from './category-filter'
import { ALL_CATEGORIES, type CategoryResult, type CounterpartyKind, type TransactionCategory } from './ledger'
import type { StatementAnalysis } from './statement-analysis'

// ─── Types ────────────────────────────────────────────────────────────────

export type ChartKind = 'bar' | 'pie'

export interface ChartRow {
  label: string
  value: number
  count: number
  accounts?: string
  counterpartyKind?: CounterpartyKind
}

export interface SectionMetric {
  label: string
  value: string
}

export interface CategorySection {
  category: TransactionCategory
  visible: boolean
  heading: string
  emptyMessage: string
  chart: {
    kind: ChartKind
    title: string
    rows: ChartRow[]
    height: number
    colorScale: string
    template: string
  }
  metrics: SectionMetric[]
  frequencyTable: { columnLabel: string; rows: { label: string; count: number }[] }
}

interface SectionCopy {
  heading: string
  chartKind: ChartKind
  chartTitle: (topN: number) => string
  countLabel: string
  countUnit: string
  amountLabel: string
  chargesLabel: string
  frequencyLabel: string
  emptyMessage: string
}

// ─── Copy ─────────────────────────────────────────────────────────────────

const PIE_HEIGHT = 500

const SECTION_COPY: Record<TransactionCategory, SectionCopy> = {
  merchant_payments: {
    heading: 'Buy Goods',
    chartKind: 'bar',
    chartTitle: n => `These are the top ${n} merchants you paid with Buy Goods`,
    countLabel: 'Number of payments',
    countUnit: 'transactions',
    amountLabel: 'Amount paid to merchants',
    chargesLabel: 'Charges incurred',
    frequencyLabel: 'Most frequented Merchant',
    emptyMessage: 'No merchant payments found in the provided statement.',
  },
  paybill_payments: {
    heading: 'PayBill Section',
    chartKind: 'bar',
    chartTitle: n => `These are the top ${n} merchants you paid with Pay Bill`,
    countLabel: 'Number of payments',
    countUnit: 'transactions',
    amountLabel: 'Amount paid to merchants',
    chargesLabel: 'Charges incurred',
    frequencyLabel: 'Most frequented Paybills',
    emptyMessage: 'No pay bill payments found in the provided statement.',
  },
  peer_transfers: {
    heading: 'Cash Transfers (Send Money)',
    chartKind: 'bar',
    chartTitle: n => `These are the top ${n} Individuals you sent money`,
    countLabel: 'Number of transfers',
    countUnit: 'Transactions',
    amountLabel: 'Amount sent',
    chargesLabel: 'Charges incurred',
    frequencyLabel: 'Most frequented recipients',
    emptyMessage: 'No customer transfers found in the provided statement.',
  },
  received_funds: {
    heading: 'Received Money (From Individuals and Business)',
    chartKind: 'bar',
    chartTitle: n => `These are the top ${n} individuals & businesses you received money from`,
    countLabel: 'Total transactions',
    countUnit: 'Transactions',
    amountLabel: 'Total Received',
    chargesLabel: '',
    frequencyLabel: 'Most frequent senders',
    emptyMessage: 'No received money transactions found in the provided statement.',
  },
  cash_withdrawals: {
    heading: 'Cash Withdrawals',
    chartKind: 'bar',
    chartTitle: () => 'Cash Withdrawals by Location',
    countLabel: 'Total Transactions',
    countUnit: 'Withdrawals',
    amountLabel: 'Total Withdrawal',
    chargesLabel: 'Total Charges',
    frequencyLabel: 'Most frequented Agents',
    emptyMessage: 'No cash withdrawal transactions found in the provided statement.',
  },
  airtime_purchases: {
    heading: 'Airtime Purchases',
    chartKind: 'pie',
    chartTitle: () => 'Airtime Purchases',
    countLabel: 'Total Transactions',
    countUnit: 'Airtime Purchases',
    amountLabel: 'Total Airtime',
    chargesLabel: '',
    frequencyLabel: 'Most frequent recipients',
    emptyMessage: 'No airtime purchases found in the provided statement.',
  },
}

// ─── Formatting ───────────────────────────────────────────────────────────

const amountFormatter = new Intl.NumberFormat('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })

/** "Ksh. 1,234.50" */
export function formatAmount(value: number, currencyLabel: string = 'Ksh.'): string {
  const formatted = amountFormatter.format(Number.isFinite(value) ? value : 0)
  return currencyLabel ? `${currencyLabel} ${formatted}` : formatted
}

// ─── Sections ─────────────────────────────────────────────────────────────

export function buildCategorySection(result: CategoryResult, settings: AnalysisSettings): CategorySection {
  const copy = SECTION_COPY[result.category]
  const { topN } = settings

  const displayed = copy.chartKind === 'bar'
    ? toAscendingDisplay(result.entities, topN)
    : selectTopN(result.entities, topN)

  const metrics: SectionMetric[] = [
    { label: copy.countLabel, value: `${result.totalTransactionCount} ${copy.countUnit}` },
    { label: copy.amountLabel, value: formatAmount(result.totalPrincipalAmount, settings.currencyLabel) },
  ]
  if (hasChargeRule(result.category)) {
    metrics.push({ label: copy.chargesLabel, value: formatAmount(result.totalCharges, settings.currencyLabel) })
  }

  return {
    category: result.category,
    visible: result.totalTransactionCount > 0,
    heading: copy.heading,
    emptyMessage: copy.emptyMessage,
    chart: {
      kind: copy.chartKind,
      title: copy.chartTitle(topN),
      rows: displayed.map(e => ({
        label: e.entityName,
        value: e.totalAmount,
        count: e.transactionCount,
        ...(e.accounts !== undefined ? { accounts: e.accounts } : {}),
        ...(e.counterpartyKind !== undefined ? { counterpartyKind: e.counterpartyKind } : {}),
      })),
      height: copy.chartKind === 'pie' ? PIE_HEIGHT : (topN - 1) * 100,
      colorScale: settings.colorScale,
      template: settings.template,
    },
    metrics,
    frequencyTable: {
      columnLabel: copy.frequencyLabel,
      rows: rankByFrequency(result.entities, topN).map(e => ({ label: e.entityName, count: e.transactionCount })),
    },
  }
}

/** One section per category, in dashboard order */
export function buildStatementReport(analysis: StatementAnalysis): CategorySection[] {
  return ALL_CATEGORIES.map(category => buildCategorySection(analysis.results[category], analysis.settings))
}
