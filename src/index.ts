/**
 * Mobile-money ledger insights: per-category aggregation of a normalized
 * statement ledger.
 */

export * from './engine/ledger'
export * from './engine/entity-names'
export * from './engine/category-filter'
export * from './engine/aggregator'
export * from './engine/merchant-payments'
export * from './engine/paybill-payments'
export * from './engine/peer-transfers'
export * from './engine/received-funds'
export * from './engine/cash-withdrawals'
export * from './engine/airtime-purchases'
export * from './engine/statement-analysis'
export * from './engine/category-report'
export * from './engine/analysis-settings'
export * from './engine/ledger-filters'
export * from './engine/ledger-import'
export * from './engine/validation'
export * from './engine/errors'
