/**
 * Ledger Engine - Data Validation Schemas
 * Runtime validation for ledger rows handed to the engine by an
 * ingestion step. Uses Zod for type-safe validation.
 *
 * @module validation
 */

import { z } from 'zod'
import { parseCounterparty } from './entity-names'
import { LedgerValidationError, type ValidationIssue } from './errors'
import type { TransactionRecord } from './ledger'

// ─── Primitive Validators ─────────────────────────────────────────────────

const amount = z.number().min(0).max(1_000_000_000)
const optionalText = z.string().nullish().transform(v => v ?? '')

// ─── Ledger Record ────────────────────────────────────────────────────────

export const ledgerRecordSchema = z.object({
  timestamp: z.coerce.date(),
  categoryCode: z.string().min(1),
  subtypeDescription: optionalText,
  counterpartyRaw: optionalText,
  amountOut: amount.default(0),
  amountIn: amount.default(0),
})

export const ledgerSchema = z.array(ledgerRecordSchema)

// ─── Validation Functions ─────────────────────────────────────────────────

export interface ValidationResult {
  valid: boolean
  errors: ValidationIssue[]
  warnings: { path: string; message: string }[]
  sanitized?: TransactionRecord[]
}

/** Validate a full ledger */
export function validateLedger(data: unknown): ValidationResult {
  const result = ledgerSchema.safeParse(data)
  if (result.success) {
    return { valid: true, errors: [], warnings: generateWarnings(result.data), sanitized: result.data }
  }
  return {
    valid: false,
    errors: result.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
    warnings: [],
  }
}

/** Validate and return records, throwing on the first invalid batch */
export function parseLedger(rows: unknown): TransactionRecord[] {
  const result = validateLedger(rows)
  if (!result.valid || !result.sanitized) {
    const first = result.errors[0]
    throw new LedgerValidationError(
      `Ledger failed validation with ${result.errors.length} issue(s)${first ? `: ${first.path} ${first.message}` : ''}`,
      result.errors,
    )
  }
  return result.sanitized
}

// ─── Warning Generator ────────────────────────────────────────────────────

function generateWarnings(records: TransactionRecord[]): { path: string; message: string }[] {
  const warnings: { path: string; message: string }[] = []

  for (let i = 0; i < records.length; i++) {
    const r = records[i]
    if (r.amountOut > 0 && r.amountIn > 0) {
      warnings.push({ path: `[${i}]`, message: 'Row carries both an outflow and an inflow' })
    }
    const parsed = parseCounterparty(r.counterpartyRaw)
    if (parsed.kind === 'masked' && parsed.name === '') {
      warnings.push({ path: `[${i}].counterpartyRaw`, message: `Masked counterparty "${r.counterpartyRaw}" has no name` })
    }
  }

  return warnings
}
