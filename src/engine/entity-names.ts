/**
 * Ledger Engine - Counterparty Name Resolution
 * Cleans the raw counterparty strings found on mobile-money statements:
 *   - masked phone prefixes ("2547*****23 John Doe" -> "John Doe")
 *   - pay-bill compounds ("KPLC PREPAID Acc. 123456")
 *   - plain names, title-cased
 *
 * @module entity-names
 */

// ─── Types ────────────────────────────────────────────────────────────────

export type ParsedCounterparty =
  | { kind: 'masked'; maskedNumber: string; name: string }
  | { kind: 'paybill'; businessName: string; accountReference: string }
  | { kind: 'plain'; name: string }

export interface PayBillCounterparty {
  businessName: string
  accountReference: string
}

// ─── Patterns ─────────────────────────────────────────────────────────────

const MASK_PATTERN = /\*+/
const PAYBILL_PATTERN = /^(.*?)(?:\s+Acc\.\s+(.*)|$)/
const PAYBILL_COMPOUND = /\s+Acc\.\s+/

// ─── Helpers ──────────────────────────────────────────────────────────────

/** Capitalise the first letter of every run of letters, lower-case the rest */
export function titleCase(text: string): string {
  return text.toLowerCase().replace(/\p{L}+/gu, word => word.charAt(0).toUpperCase() + word.slice(1))
}

export function isMasked(raw: string): boolean {
  return MASK_PATTERN.test(raw)
}

export function splitPayBillCounterparty(raw: string): PayBillCounterparty {
  const match = PAYBILL_PATTERN.exec(raw)
  if (!match) return { businessName: raw, accountReference: '' }
  return { businessName: match[1], accountReference: match[2] ?? '' }
}

// ─── Parser ───────────────────────────────────────────────────────────────
// Rules are tried in order: masked phone, pay-bill compound, raw passthrough.

export function parseCounterparty(raw: string): ParsedCounterparty {
  if (isMasked(raw)) {
    const boundary = raw.search(/\s/)
    if (boundary === -1) return { kind: 'masked', maskedNumber: raw, name: '' }
    return { kind: 'masked', maskedNumber: raw.slice(0, boundary), name: raw.slice(boundary + 1).trim() }
  }

  if (PAYBILL_COMPOUND.test(raw)) {
    return { kind: 'paybill', ...splitPayBillCounterparty(raw) }
  }

  return { kind: 'plain', name: raw }
}

/**
 * Display name for a counterparty. A masked string with nothing after the
 * masked number resolves to "".
 */
export function resolveEntityName(raw: string): string {
  const parsed = parseCounterparty(raw)
  if (parsed.kind === 'masked') return titleCase(parsed.name)
  return titleCase(raw)
}

/**
 * Resolved name for person-to-person rows. When a masked string cannot be
 * split, the row keeps its original text instead of an empty name.
 */
export function resolvePersonName(raw: string): string {
  const resolved = resolveEntityName(raw)
  if (resolved === '' && isMasked(raw)) return raw
  return resolved
}
