import { describe, it, expect } from 'vitest'
import { dequantize16, halfToFloat, normalizeByte, normalizeUint16 } from './float16'

describe('halfToFloat', () => {
  it('decodes normal values', () => {
    expect(halfToFloat(0x3c00)).toBe(1)
    expect(halfToFloat(0xc000)).toBe(-2)
    expect(halfToFloat(0x3800)).toBe(0.5)
    expect(halfToFloat(0x3555)).toBe(0.333251953125)
    expect(halfToFloat(0x7bff)).toBe(65504)
  })

  it('keeps the sign of zero', () => {
    expect(Object.is(halfToFloat(0x0000), 0)).toBe(true)
    expect(Object.is(halfToFloat(0x8000), -0)).toBe(true)
  })

  it('decodes subnormals exactly', () => {
    expect(halfToFloat(0x0001)).toBe(2 ** -24)
    expect(halfToFloat(0x03ff)).toBe(1023 * 2 ** -24)
    expect(halfToFloat(0x8001)).toBe(-(2 ** -24))
    expect(halfToFloat(0x0400)).toBe(2 ** -14)
  })

  it('maps exponent 31 to infinities and NaN', () => {
    expect(halfToFloat(0x7c00)).toBe(Infinity)
    expect(halfToFloat(0xfc00)).toBe(-Infinity)
    expect(halfToFloat(0x7e00)).toBeNaN()
  })
})

describe('dequantize16', () => {
  it('hits both ends of the range exactly', () => {
    expect(dequantize16(0, -2, 4)).toBe(-2)
    expect(dequantize16(65535, -2, 4)).toBe(2)
  })

  it('interpolates linearly', () => {
    expect(dequantize16(32768, 0, 65535)).toBe(32768)
  })
})

describe('normalizeByte / normalizeUint16', () => {
  it('centres bytes on 128', () => {
    expect(normalizeByte(128)).toBe(0)
    expect(normalizeByte(255)).toBe(127 / 127.5)
    expect(normalizeByte(0)).toBe(-128 / 127.5)
  })

  it('maps uint16 to [0, 1]', () => {
    expect(normalizeUint16(0)).toBe(0)
    expect(normalizeUint16(65535)).toBe(1)
  })
})
