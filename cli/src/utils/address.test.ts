import { describe, expect, it } from 'vitest'
import { addressFromPlaceholderName, formatAddress, parseAddress, tryParseAddress } from './address'

describe('address helpers', () => {
  it('formats lowercase 0x hex', () => {
    expect(formatAddress(0x11209)).toBe('0x11209')
    expect(formatAddress(0xabcdef)).toBe('0xabcdef')
  })

  it('accepts 0x, h-suffixed and bare hex', () => {
    expect(tryParseAddress('0x11209')).toBe(0x11209)
    expect(tryParseAddress('11209h')).toBe(0x11209)
    expect(tryParseAddress(' 1A2B ')).toBe(0x1a2b)
    expect(tryParseAddress(4096)).toBe(4096)
  })

  it('rejects non-addresses', () => {
    expect(tryParseAddress('sub_11170')).toBeNull()
    expect(tryParseAddress(-1)).toBeNull()
    expect(tryParseAddress(null)).toBeNull()
    expect(() => parseAddress('nope')).toThrow('Not a hex address: "nope"')
  })

  it('reads the address out of placeholder names', () => {
    expect(addressFromPlaceholderName('sub_11460')).toBe(0x11460)
    expect(addressFromPlaceholderName('j_sub_1A00')).toBe(0x1a00)
    expect(addressFromPlaceholderName('DriverEntry')).toBeNull()
  })
})
