/**
 * Record builders shared by the engine test suites.
 */

import type { TransactionRecord } from './ledger'

export function makeRecord(overrides: Partial<TransactionRecord> = {}): TransactionRecord {
  return {
    timestamp: new Date(2024, 0, 15, 10, 0),
    categoryCode: 'Merchant Payment',
    subtypeDescription: '',
    counterpartyRaw: '',
    amountOut: 0,
    amountIn: 0,
    ...overrides,
  }
}

export const merchant = (name: string, amount: number): TransactionRecord =>
  makeRecord({ categoryCode: 'Merchant Payment Online', subtypeDescription: 'to', counterpartyRaw: name, amountOut: amount })

export const merchantCharge = (amount: number): TransactionRecord =>
  makeRecord({ categoryCode: 'Pay Merchant Charge', subtypeDescription: '', amountOut: amount })

export const paybill = (counterparty: string, amount: number): TransactionRecord =>
  makeRecord({ categoryCode: 'Pay Bill Online', subtypeDescription: 'to', counterpartyRaw: counterparty, amountOut: amount })

export const paybillCharge = (collector: string, amount: number): TransactionRecord =>
  makeRecord({ categoryCode: 'Pay Bill', subtypeDescription: 'Charge', counterpartyRaw: collector, amountOut: amount })

export const transfer = (counterparty: string, amount: number): TransactionRecord =>
  makeRecord({ categoryCode: 'Customer Transfer', subtypeDescription: 'to', counterpartyRaw: counterparty, amountOut: amount })

export const transferCharge = (amount: number): TransactionRecord =>
  makeRecord({ categoryCode: 'Customer Transfer', subtypeDescription: 'of Funds Charge', amountOut: amount })

export const received = (counterparty: string, amount: number, subtypeDescription: string = 'from'): TransactionRecord =>
  makeRecord({ categoryCode: 'Funds received', subtypeDescription, counterpartyRaw: counterparty, amountIn: amount })

export const withdrawal = (agent: string, amount: number): TransactionRecord =>
  makeRecord({ categoryCode: 'Customer Withdrawal', subtypeDescription: 'At Agent Till', counterpartyRaw: agent, amountOut: amount })

export const withdrawalCharge = (amount: number): TransactionRecord =>
  makeRecord({ categoryCode: 'Cash Withdrawal Charge', amountOut: amount })

export const airtime = (provider: string, amount: number): TransactionRecord =>
  makeRecord({ categoryCode: 'Airtime Purchase', counterpartyRaw: provider, amountOut: amount })
