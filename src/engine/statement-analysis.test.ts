import { describe, it, expect, vi, afterEach } from 'vitest'
import { SettingsError } from './errors'
import { analyzeStatement, processCategory, CATEGORY_PROCESSORS, type CategoryProcessor } from './statement-analysis'
import { airtime, makeRecord, merchant, received, transfer } from './test-fixtures'

describe('analyzeStatement', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  const ledger = [
    makeRecord({ ...merchant('Naivas', 500), timestamp: new Date(2024, 2, 3, 9, 30) }),
    makeRecord({ ...transfer('2547***12 Jane Roe', 300), timestamp: new Date(2024, 0, 8, 12, 0) }),
    makeRecord({ ...received('ABC Ltd', 2000, 'from Business'), timestamp: new Date(2024, 1, 20, 18, 45) }),
  ]

  it('should produce a result for every category', () => {
    const analysis = analyzeStatement(ledger)
    expect(Object.keys(analysis.results).sort()).toEqual([
      'airtime_purchases',
      'cash_withdrawals',
      'merchant_payments',
      'paybill_payments',
      'peer_transfers',
      'received_funds',
    ])
    expect(analysis.results.merchant_payments.totalPrincipalAmount).toBe(500)
    expect(analysis.results.peer_transfers.entities[0].entityName).toBe('Jane Roe')
    expect(analysis.results.received_funds.totalPrincipalAmount).toBe(2000)
    expect(analysis.results.airtime_purchases.totalTransactionCount).toBe(0)
    expect(analysis.failures).toEqual([])
  })

  it('should report the covered period', () => {
    expect(analyzeStatement(ledger).period).toEqual({
      start: new Date(2024, 0, 8, 12, 0),
      end: new Date(2024, 2, 3, 9, 30),
    })
    expect(analyzeStatement([]).period).toBeNull()
  })

  it('should apply topN from the settings', () => {
    const many = ['A', 'B', 'C', 'D', 'E', 'F', 'G'].map((name, i) => airtime(name, (i + 1) * 10))
    const analysis = analyzeStatement(many, { topN: 5 })
    expect(analysis.settings.topN).toBe(5)
    expect(analysis.results.airtime_purchases.topEntities.map(e => e.entityName)).toEqual(['G', 'F', 'E', 'D', 'C'])
    expect(analysis.results.airtime_purchases.entities).toHaveLength(7)
  })

  it('should reject an out-of-range topN before running', () => {
    expect(() => analyzeStatement(ledger, { topN: 20 })).toThrow(SettingsError)
  })

  it('should isolate a failing processor', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
    const broken: CategoryProcessor = () => {
      throw new Error('unexpected row shape')
    }
    const analysis = analyzeStatement(ledger, {}, { ...CATEGORY_PROCESSORS, peer_transfers: broken })

    expect(analysis.failures).toEqual([{ category: 'peer_transfers', message: 'unexpected row shape' }])
    expect(analysis.results.peer_transfers).toEqual({
      category: 'peer_transfers',
      entities: [],
      topEntities: [],
      totalPrincipalAmount: 0,
      totalCharges: 0,
      totalTransactionCount: 0,
    })
    expect(analysis.results.merchant_payments.totalPrincipalAmount).toBe(500)
    expect(errorSpy).toHaveBeenCalledTimes(1)
  })
})

describe('processCategory', () => {
  it('should dispatch to the registered processor', () => {
    const result = processCategory('merchant_payments', [merchant('Naivas', 100)], 9)
    expect(result.category).toBe('merchant_payments')
    expect(result.totalPrincipalAmount).toBe(100)
  })
})
