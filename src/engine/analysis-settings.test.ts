import { describe, it, expect, vi, afterEach } from 'vitest'
import { DEFAULT_ANALYSIS_SETTINGS, loadAnalysisSettings, resolveAnalysisSettings } from './analysis-settings'
import { SettingsError } from './errors'

describe('resolveAnalysisSettings', () => {
  it('should default to nine entities', () => {
    expect(resolveAnalysisSettings()).toEqual({
      topN: 9,
      colorScale: 'Blue',
      template: 'ggplot2',
      currencyLabel: 'Ksh.',
    })
  })

  it('should accept the bounds of topN', () => {
    expect(resolveAnalysisSettings({ topN: 5 }).topN).toBe(5)
    expect(resolveAnalysisSettings({ topN: 15 }).topN).toBe(15)
  })

  it('should reject topN outside 5-15 or fractional', () => {
    expect(() => resolveAnalysisSettings({ topN: 4 })).toThrow(SettingsError)
    expect(() => resolveAnalysisSettings({ topN: 16 })).toThrow(SettingsError)
    expect(() => resolveAnalysisSettings({ topN: 7.5 })).toThrow(SettingsError)
  })

  it('should name the offending field', () => {
    try {
      resolveAnalysisSettings({ topN: 0 })
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(SettingsError)
      expect(err instanceof SettingsError && err.field).toBe('topN')
    }
  })
})

describe('loadAnalysisSettings', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should read overrides from the environment', () => {
    const settings = loadAnalysisSettings({
      LEDGER_TOP_N: '12',
      LEDGER_COLOR_SCALE: 'Greens',
      LEDGER_TEMPLATE: 'plotly_white',
      LEDGER_CURRENCY_LABEL: 'KES',
    })
    expect(settings).toEqual({ topN: 12, colorScale: 'Greens', template: 'plotly_white', currencyLabel: 'KES' })
  })

  it('should keep defaults for an empty environment', () => {
    expect(loadAnalysisSettings({})).toEqual(DEFAULT_ANALYSIS_SETTINGS)
  })

  it('should warn and keep the default for an unusable topN', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {})
    expect(loadAnalysisSettings({ LEDGER_TOP_N: 'lots' }).topN).toBe(9)
    expect(loadAnalysisSettings({ LEDGER_TOP_N: '30' }).topN).toBe(9)
    expect(warnSpy).toHaveBeenCalledTimes(2)
  })
})
