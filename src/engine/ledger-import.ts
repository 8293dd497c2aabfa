/**
 * Ledger Engine - Ledger CSV Import
 *
 * Reads the normalized ledger produced by statement extraction. Two header
 * spellings are recognised:
 *   - cleaned statement columns: date_time, type_class, type_desc, entity, withdrawn, paid_in
 *   - record columns: timestamp, category_code, subtype_description, counterparty_raw, amount_out, amount_in
 *
 * Rows with an unreadable date or amount are skipped and reported as warnings.
 *
 * @module ledger-import
 */

import { LedgerValidationError } from './errors'
import type { TransactionRecord } from './ledger'

// ─── Types ──────────────────────────────────────────────────────────────────

type LedgerField = keyof TransactionRecord

export interface LedgerImportResult {
  records: TransactionRecord[]
  warnings: string[]
  skippedRows: number
  totalRows: number
  rawHeaders: string[]
}

const HEADER_ALIASES: Record<LedgerField, string[]> = {
  timestamp:          ['date_time', 'timestamp', 'completion_time', 'date'],
  categoryCode:       ['type_class', 'category_code'],
  subtypeDescription: ['type_desc', 'subtype_description'],
  counterpartyRaw:    ['entity', 'counterparty_raw', 'counterparty'],
  amountOut:          ['withdrawn', 'amount_out'],
  amountIn:           ['paid_in', 'amount_in'],
}

const LEDGER_FIELDS: LedgerField[] = ['timestamp', 'categoryCode', 'subtypeDescription', 'counterpartyRaw', 'amountOut', 'amountIn']
const REQUIRED_FIELDS: LedgerField[] = ['timestamp', 'categoryCode']

// ─── CSV Parsing Core ───────────────────────────────────────────────────────

export function parseCSVLine(line: string): string[] {
  const result: string[] = []
  let current = ''
  let inQuotes = false
  for (let i = 0; i < line.length; i++) {
    const ch = line[i]
    if (ch === '"') {
      if (inQuotes && i + 1 < line.length && line[i + 1] === '"') {
        current += '"'
        i++
      } else {
        inQuotes = !inQuotes
      }
    } else if (ch === ',' && !inQuotes) {
      result.push(current.trim())
      current = ''
    } else {
      current += ch
    }
  }
  result.push(current.trim())
  return result
}

function parseCSV(text: string): { headers: string[]; rows: string[][] } {
  const lines = text.split(/\r?\n/).filter(l => l.trim().length > 0)
  if (lines.length === 0) return { headers: [], rows: [] }

  const headers = parseCSVLine(lines[0]).map(h => h.toLowerCase().replace(/[^a-z0-9_\s]/g, '').trim().replace(/\s+/g, '_'))
  const rows = lines.slice(1).map(parseCSVLine)
  return { headers, rows }
}

// ─── Column Mapping ─────────────────────────────────────────────────────────

export function mapLedgerColumns(headers: string[]): Partial<Record<LedgerField, number>> {
  const mapping: Partial<Record<LedgerField, number>> = {}
  for (const field of LEDGER_FIELDS) {
    const idx = headers.findIndex(h => HEADER_ALIASES[field].includes(h))
    if (idx !== -1) mapping[field] = idx
  }
  return mapping
}

// ─── Utility ────────────────────────────────────────────────────────────────

function parseTimestamp(val: string): Date | undefined {
  if (!val) return undefined
  // ISO dates without an offset are read as local time
  const iso = /^\d{4}-\d{2}-\d{2}$/.test(val) ? `${val}T00:00:00` : val.replace(/^(\d{4}-\d{2}-\d{2}) (\d)/, '$1T$2')
  const d = new Date(iso)
  return isNaN(d.getTime()) ? undefined : d
}

function parseAmount(val: string): number | undefined {
  const cleaned = val.replace(/[,"\s]/g, '')
  if (cleaned === '') return 0
  const num = Number(cleaned)
  return isNaN(num) || num < 0 ? undefined : num
}

// ─── Main Import Function ───────────────────────────────────────────────────

export function importLedgerCSV(csvText: string): LedgerImportResult {
  const { headers, rows } = parseCSV(csvText)
  const mapping = mapLedgerColumns(headers)

  const missing = REQUIRED_FIELDS.filter(f => mapping[f] === undefined)
  if (headers.length === 0 || missing.length > 0) {
    throw new LedgerValidationError(
      `Ledger CSV is missing required column(s): ${missing.join(', ') || REQUIRED_FIELDS.join(', ')}`,
      missing.map(f => ({ path: f, message: `Expected one of: ${HEADER_ALIASES[f].join(', ')}` })),
    )
  }

  const cell = (row: string[], field: LedgerField): string => {
    const idx = mapping[field]
    return idx === undefined ? '' : row[idx] ?? ''
  }

  const records: TransactionRecord[] = []
  const warnings: string[] = []

  rows.forEach((row, i) => {
    const line = i + 2
    const timestamp = parseTimestamp(cell(row, 'timestamp'))
    if (!timestamp) {
      warnings.push(`Row ${line}: unreadable date "${cell(row, 'timestamp')}"`)
      return
    }
    const amountOut = parseAmount(cell(row, 'amountOut'))
    const amountIn = parseAmount(cell(row, 'amountIn'))
    if (amountOut === undefined || amountIn === undefined) {
      warnings.push(`Row ${line}: unreadable or negative amount`)
      return
    }
    records.push({
      timestamp,
      categoryCode: cell(row, 'categoryCode'),
      subtypeDescription: cell(row, 'subtypeDescription'),
      counterpartyRaw: cell(row, 'counterpartyRaw'),
      amountOut,
      amountIn,
    })
  })

  const skippedRows = rows.length - records.length
  if (skippedRows > 0) {
    console.warn(`[Ledger] ${skippedRows} of ${rows.length} rows skipped during import`)
  }

  return { records, warnings, skippedRows, totalRows: rows.length, rawHeaders: headers }
}
