// packages/kademlia/src/proximity.ts
// XOR proximity order and distance comparison

import type { Address } from './address'
import { ADDRESS_BITS, ADDRESS_LENGTH } from './constants'

/** -1: `a` is closer, 1: `b` is closer, 0: equal distance. */
export type ProxCmpResult = -1 | 0 | 1

/**
 * Proximity order of two addresses: the number of leading bits they share,
 * i.e. the index of the first set bit of `one ^ other` read MSB first.
 *
 * 0 is farthest, 255 closest, 256 is self.
 */
export function proximity(one: Address, other: Address): number {
  for (let i = 0; i < ADDRESS_LENGTH; i++) {
    const oxo = one.byteAt(i) ^ other.byteAt(i)
    if (oxo !== 0) {
      // clz32 counts over 32 bits; a byte occupies the low 8
      return i * 8 + Math.clz32(oxo) - 24
    }
  }
  return ADDRESS_BITS
}

/**
 * Integer proximity order from a caller-supplied value: fractions are
 * floored, NaN reads as 0. Infinities pass through for callers to clamp.
 */
export function toProximityOrder(value: number): number {
  return Number.isNaN(value) ? 0 : Math.floor(value)
}

/**
 * Compare the distances `a -> target` and `b -> target` as full XOR
 * magnitudes, not only by proximity order.
 */
export function proxCmp(
  target: Address,
  a: Address,
  b: Address,
): ProxCmpResult {
  for (let i = 0; i < ADDRESS_LENGTH; i++) {
    const t = target.byteAt(i)
    const da = a.byteAt(i) ^ t
    const db = b.byteAt(i) ^ t
    if (da > db) return 1
    if (da < db) return -1
  }
  return 0
}
