/**
 * Ledger Engine - Analysis Settings
 * Per-invocation configuration: how many entities each ranked table keeps,
 * plus styling values handed through untouched to whatever draws the charts.
 *
 * @module analysis-settings
 */

import { z } from 'zod'
import { SettingsError } from './errors'

// ─── Types ────────────────────────────────────────────────────────────────

export interface AnalysisSettings {
  topN: number          // 5-15
  colorScale: string    // passed through to the chart layer
  template: string      // passed through to the chart layer
  currencyLabel: string // prefix for formatted amounts
}

export const TOP_N_MIN = 5
export const TOP_N_MAX = 15

export const DEFAULT_ANALYSIS_SETTINGS: AnalysisSettings = {
  topN: 9,
  colorScale: 'Blue',
  template: 'ggplot2',
  currencyLabel: 'Ksh.',
}

export const analysisSettingsSchema = z.object({
  topN: z.number().int().min(TOP_N_MIN).max(TOP_N_MAX),
  colorScale: z.string().min(1),
  template: z.string().min(1),
  currencyLabel: z.string(),
})

const ENV_KEYS: Record<keyof AnalysisSettings, string> = {
  topN: 'LEDGER_TOP_N',
  colorScale: 'LEDGER_COLOR_SCALE',
  template: 'LEDGER_TEMPLATE',
  currencyLabel: 'LEDGER_CURRENCY_LABEL',
}

// ─── Resolution ───────────────────────────────────────────────────────────

/** Merge overrides onto the defaults; throws SettingsError on an invalid value */
export function resolveAnalysisSettings(overrides: Partial<AnalysisSettings> = {}): AnalysisSettings {
  const result = analysisSettingsSchema.safeParse({ ...DEFAULT_ANALYSIS_SETTINGS, ...overrides })
  if (result.success) return result.data

  const issue = result.error.issues[0]
  const field = String(issue.path[0] ?? 'settings')
  throw new SettingsError(`Invalid analysis setting "${field}": ${issue.message}`, field)
}

/** Settings from environment variables; unusable values keep their default */
export function loadAnalysisSettings(env: NodeJS.ProcessEnv = process.env): AnalysisSettings {
  const settings: AnalysisSettings = { ...DEFAULT_ANALYSIS_SETTINGS }

  const rawTopN = env[ENV_KEYS.topN]
  if (rawTopN !== undefined && rawTopN.trim() !== '') {
    const topN = Number(rawTopN)
    if (analysisSettingsSchema.shape.topN.safeParse(topN).success) {
      settings.topN = topN
    } else {
      console.warn(`[Settings] ${ENV_KEYS.topN}="${rawTopN}" is not an integer between ${TOP_N_MIN} and ${TOP_N_MAX}; using ${DEFAULT_ANALYSIS_SETTINGS.topN}`)
    }
  }

  const colorScale = env[ENV_KEYS.colorScale]
  if (colorScale) settings.colorScale = colorScale
  const template = env[ENV_KEYS.template]
  if (template) settings.template = template
  const currencyLabel = env[ENV_KEYS.currencyLabel]
  if (currencyLabel !== undefined) settings.currencyLabel = currencyLabel

  return settings
}
