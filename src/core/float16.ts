/**
 * Numeric decoders shared by the field extractors.
 *
 * Half floats are converted by rebuilding the float32 bit pattern; subnormals,
 * signed zero and NaN payloads map bit-for-bit.
 */

const f32 = new Float32Array(1)
const u32 = new Uint32Array(f32.buffer)

// ---- Float16 decode ----
export function halfToFloat(h: number): number {
  const sign = (h >> 15) & 0x1
  let exp = (h >> 10) & 0x1f
  let mant = h & 0x3ff

  if (exp === 0) {
    if (mant === 0) {
      u32[0] = sign << 31
      return f32[0]
    }
    // Subnormal: shift until the implicit bit appears
    while ((mant & 0x400) === 0) {
      mant <<= 1
      exp -= 1
    }
    exp += 1
    mant &= ~0x400
  } else if (exp === 31) {
    u32[0] = (sign << 31) | 0x7f800000 | (mant << 13)
    return f32[0]
  }

  u32[0] = (sign << 31) | ((exp - 15 + 127) << 23) | (mant << 13)
  return f32[0]
}

/** Quantized uint16 → model space: `min + (raw / 65535) * range`. */
export function dequantize16(raw: number, min: number, range: number): number {
  return min + (raw / 65535) * range
}

/** Unsigned byte centred at 128, mapped to roughly [-1, 1]. */
export function normalizeByte(raw: number): number {
  return (raw - 128) / 127.5
}

/** Unsigned 16-bit texture coordinate mapped to [0, 1]. */
export function normalizeUint16(raw: number): number {
  return raw / 65535
}

