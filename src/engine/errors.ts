/**
 * Ledger Engine - Errors
 *
 * @module errors
 */

export interface ValidationIssue {
  path: string
  message: string
  value?: unknown
}

/** Input ledger could not be turned into Transaction Records */
export class LedgerValidationError extends Error {
  constructor(
    message: string,
    public issues: ValidationIssue[] = [],
  ) {
    super(message)
    this.name = 'LedgerValidationError'
  }
}

export class SettingsError extends Error {
  constructor(
    message: string,
    public field: string,
  ) {
    super(message)
    this.name = 'SettingsError'
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message
  }
  if (typeof error === 'string') return error
  try {
    return JSON.stringify(error) ?? String(error)
  } catch {
    return String(error)
  }
}
