import { describe, it, expect } from 'vitest'
import {
  titleCase,
  resolveEntityName,
  resolvePersonName,
  splitPayBillCounterparty,
  parseCounterparty,
} from './entity-names'

describe('titleCase', () => {
  it('should capitalise each word and lower-case the rest', () => {
    expect(titleCase('SAFARICOM DATA BUNDLES')).toBe('Safaricom Data Bundles')
    expect(titleCase('jane roe')).toBe('Jane Roe')
  })

  it('should treat digits and punctuation as word boundaries', () => {
    expect(titleCase("o'neil")).toBe("O'Neil")
    expect(titleCase('kplc2go')).toBe('Kplc2Go')
  })
})

describe('resolveEntityName', () => {
  it('should drop a masked phone prefix', () => {
    expect(resolveEntityName('2547*****23 John Doe')).toBe('John Doe')
  })

  it('should title-case names that carry an upper-case mask', () => {
    expect(resolveEntityName('0712***678 MARY WANJIKU')).toBe('Mary Wanjiku')
  })

  it('should title-case plain strings', () => {
    expect(resolveEntityName('SAFARICOM DATA BUNDLES')).toBe('Safaricom Data Bundles')
  })

  it('should return an empty string for empty input', () => {
    expect(resolveEntityName('')).toBe('')
  })

  it('should return an empty string for a mask with no name', () => {
    expect(resolveEntityName('2547*****23')).toBe('')
  })
})

describe('resolvePersonName', () => {
  it('should keep a malformed masked string as written', () => {
    expect(resolvePersonName('2547*****23')).toBe('2547*****23')
  })

  it('should resolve well-formed masked strings like resolveEntityName', () => {
    expect(resolvePersonName('2547***12 jane roe')).toBe('Jane Roe')
  })
})

describe('splitPayBillCounterparty', () => {
  it('should split business name and account reference', () => {
    expect(splitPayBillCounterparty('KPLC PREPAID Acc. 123456')).toEqual({
      businessName: 'KPLC PREPAID',
      accountReference: '123456',
    })
  })

  it('should accept a missing account segment', () => {
    expect(splitPayBillCounterparty('KPLC PREPAID')).toEqual({
      businessName: 'KPLC PREPAID',
      accountReference: '',
    })
  })

  it('should keep everything after the marker as the account', () => {
    expect(splitPayBillCounterparty('Equity Paybill Acc. 0712 345 678').accountReference).toBe('0712 345 678')
  })
})

describe('parseCounterparty', () => {
  it('should try the masked rule first', () => {
    expect(parseCounterparty('2547*****23 John Doe')).toEqual({ kind: 'masked', maskedNumber: '2547*****23', name: 'John Doe' })
  })

  it('should recognise pay-bill compounds', () => {
    expect(parseCounterparty('NAIROBI WATER Acc. 55-01')).toEqual({
      kind: 'paybill',
      businessName: 'NAIROBI WATER',
      accountReference: '55-01',
    })
  })

  it('should fall back to the raw string', () => {
    expect(parseCounterparty('Naivas Westlands')).toEqual({ kind: 'plain', name: 'Naivas Westlands' })
  })
})
