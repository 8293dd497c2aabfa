import { describe, it, expect } from 'vitest'
import { getErrorMessage, LedgerValidationError, SettingsError } from './errors'

describe('getErrorMessage', () => {
  it('should read Error instances and message-bearing objects', () => {
    expect(getErrorMessage(new Error('bad password'))).toBe('bad password')
    expect(getErrorMessage({ message: 'from a worker' })).toBe('from a worker')
  })

  it('should stringify anything else', () => {
    expect(getErrorMessage('plain')).toBe('plain')
    expect(getErrorMessage({ code: 7 })).toBe('{"code":7}')
    expect(getErrorMessage(42)).toBe('42')
  })
})

describe('error classes', () => {
  it('should carry their names and details', () => {
    const ledgerError = new LedgerValidationError('bad ledger', [{ path: '0.timestamp', message: 'Invalid date' }])
    expect(ledgerError.name).toBe('LedgerValidationError')
    expect(ledgerError.issues).toHaveLength(1)

    const settingsError = new SettingsError('bad topN', 'topN')
    expect(settingsError.name).toBe('SettingsError')
    expect(settingsError.field).toBe('topN')
    expect(settingsError).toBeInstanceOf(Error)
  })
})
