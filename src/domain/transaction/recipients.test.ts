import { describe, it, expect } from 'vitest'
import {
  parseAmount,
  formatAmount,
  convertAmountInput,
  btcToSatoshis,
  evaluateRow,
  aggregateRecipients,
  type RecipientRow
} from './recipients'
import { TEST_ADDRESSES } from '../../test/factories'

function row(address: string, amountInput: string, id = 'row-1'): RecipientRow {
  return { id, address, amountInput }
}

describe('Recipients', () => {
  describe('parseAmount', () => {
    it('should parse whole sats', () => {
      expect(parseAmount('150000', 'sats')).toEqual({ ok: true, value: 150000 })
      expect(parseAmount('  42 ', 'sats')).toEqual({ ok: true, value: 42 })
    })

    it('should reject fractional or signed sats', () => {
      expect(parseAmount('1.5', 'sats').ok).toBe(false)
      expect(parseAmount('-5', 'sats').ok).toBe(false)
      expect(parseAmount('1e5', 'sats').ok).toBe(false)
      expect(parseAmount('1,000', 'sats').ok).toBe(false)
    })

    it('should parse BTC with up to 8 decimals', () => {
      expect(parseAmount('0.0015', 'btc')).toEqual({ ok: true, value: 150000 })
      expect(parseAmount('1', 'btc')).toEqual({ ok: true, value: 100_000_000 })
      expect(parseAmount('.5', 'btc')).toEqual({ ok: true, value: 50_000_000 })
      expect(parseAmount('0.00000001', 'btc')).toEqual({ ok: true, value: 1 })
    })

    it('should avoid floating point drift', () => {
      expect(parseAmount('0.29', 'btc')).toEqual({ ok: true, value: 29_000_000 })
      expect(btcToSatoshis(0.1 + 0.2)).toBe(30_000_000)
    })

    it('should reject more than 8 decimals', () => {
      const result = parseAmount('0.000000001', 'btc')
      expect(result.ok).toBe(false)
      if (result.ok) return
      expect(result.error.code).toBe('INVALID_AMOUNT')
    })

    it('should reject amounts above the supply cap', () => {
      expect(parseAmount('21000001', 'btc').ok).toBe(false)
      expect(parseAmount('21000000', 'btc').ok).toBe(true)
    })

    it('should reject empty input', () => {
      expect(parseAmount('', 'sats').ok).toBe(false)
      expect(parseAmount('.', 'btc').ok).toBe(false)
    })
  })

  describe('formatAmount', () => {
    it('should drop trailing zeros in BTC', () => {
      expect(formatAmount(150000, 'btc')).toBe('0.0015')
      expect(formatAmount(100_000_000, 'btc')).toBe('1')
      expect(formatAmount(1_000_000_000, 'btc')).toBe('10')
      expect(formatAmount(1, 'btc')).toBe('0.00000001')
      expect(formatAmount(0, 'btc')).toBe('0')
    })

    it('should print sats as an integer', () => {
      expect(formatAmount(150000, 'sats')).toBe('150000')
    })
  })

  describe('convertAmountInput', () => {
    it('should convert between denominations', () => {
      expect(convertAmountInput('150000', 'sats', 'btc')).toBe('0.0015')
      expect(convertAmountInput('0.0015', 'btc', 'sats')).toBe('150000')
    })

    it('should keep unparseable or blank text as typed', () => {
      expect(convertAmountInput('12abc', 'sats', 'btc')).toBe('12abc')
      expect(convertAmountInput('', 'sats', 'btc')).toBe('')
    })
  })

  describe('evaluateRow', () => {
    it('should include a row with a valid address and amount above dust', () => {
      const result = evaluateRow(row(TEST_ADDRESSES.p2pkh, '547'), 'sats')
      expect(result).toEqual({
        id: 'row-1',
        address: TEST_ADDRESSES.p2pkh,
        amountInput: '547',
        amountSats: 547,
        addressError: null,
        amountError: null,
        included: true
      })
    })

    it('should exclude an amount at the dust floor', () => {
      const result = evaluateRow(row(TEST_ADDRESSES.p2pkh, '546'), 'sats')
      expect(result.amountError).toBe('AMOUNT_BELOW_DUST')
      expect(result.included).toBe(false)
    })

    it('should carry the address error', () => {
      const result = evaluateRow(row('1BvBMSEYstWetqTFn5Au4m4GFg7xJaNVN3', '1000'), 'sats')
      expect(result.addressError).toBe('ADDRESS_INVALID_CHECKSUM')
      expect(result.included).toBe(false)
    })

    it('should leave blank fields without errors', () => {
      const result = evaluateRow(row('', ''), 'sats')
      expect(result.addressError).toBeNull()
      expect(result.amountError).toBeNull()
      expect(result.amountSats).toBeNull()
      expect(result.included).toBe(false)
    })

    it('should flag unparseable amounts', () => {
      expect(evaluateRow(row(TEST_ADDRESSES.p2pkh, 'abc'), 'sats').amountError).toBe('INVALID_AMOUNT')
    })
  })

  describe('aggregateRecipients', () => {
    it('should count and total only included rows', () => {
      const summary = aggregateRecipients(
        [
          row(TEST_ADDRESSES.p2pkh, '0.0001', 'a'),
          row(TEST_ADDRESSES.p2sh, '0.00002', 'b'),
          row('not-an-address', '0.01', 'c'),
          row(TEST_ADDRESSES.p2sh, '0.000005', 'd')
        ],
        'btc'
      )

      expect(summary.validRecipientCount).toBe(2)
      expect(summary.totalSendingSats).toBe(12_000)
      expect(summary.recipients).toEqual([
        { address: TEST_ADDRESSES.p2pkh, amountSats: 10_000 },
        { address: TEST_ADDRESSES.p2sh, amountSats: 2_000 }
      ])
      expect(summary.rows.map(r => r.included)).toEqual([true, true, false, false])
      expect(summary.rows[3].amountError).toBe('AMOUNT_BELOW_DUST')
    })

    it('should trim addresses in the committed list', () => {
      const summary = aggregateRecipients([row(`  ${TEST_ADDRESSES.p2pkh} `, '1000')], 'sats')
      expect(summary.recipients).toEqual([{ address: TEST_ADDRESSES.p2pkh, amountSats: 1000 }])
    })
  })
})
