// packages/kademlia/src/key-range.ts
// Common-bits transform and key ranges

import { compareBytes } from '@kadspace/utils'
import debugDefault from 'debug'

import { Address } from './address'
import {
  type ByteSource,
  constantByteSource,
  randomByteSource,
} from './byte-source'
import { ADDRESS_BITS, ADDRESS_LENGTH } from './constants'
import { proximity, toProximityOrder } from './proximity'

const debug = debugDefault('kad:range')

/**
 * Inclusive address range.
 */
export interface KeyRange {
  start: Address
  stop: Address
}

/**
 * Build an address sharing `min(proximity(reference, other), proxLimit)`
 * leading bits with `reference`, taking every remaining bit from `fill`.
 *
 * When `reference` and `other` diverge before `proxLimit`, the divergence bit
 * is flipped so the result follows `other` there. `proxLimit` is floored
 * and clamped to [0, 256]; NaN is treated as 0. `fill` is called once for
 * the boundary byte and once per following byte.
 */
export function commonBitsAddrF(
  reference: Address,
  other: Address,
  fill: ByteSource,
  proxLimit: number,
): Address {
  const actual = proximity(reference, other)
  const limit = Math.min(
    Math.max(toProximityOrder(proxLimit), 0),
    ADDRESS_BITS,
  )
  const diverges = limit > actual
  const prox = diverges ? actual : limit

  const bytes = reference.toBytes()
  if (prox >= ADDRESS_BITS) return new Address(bytes)

  const pos = Math.floor(prox / 8)
  const trans = prox % 8
  const fillMask = (diverges ? 0x7f : 0xff) >> trans

  let boundary = bytes[pos] & ~fillMask & 0xff
  if (diverges) boundary ^= 0x80 >> trans
  boundary |= fillMask & fill()
  bytes[pos] = boundary

  for (let i = pos + 1; i < ADDRESS_LENGTH; i++) {
    bytes[i] = fill() & 0xff
  }
  return new Address(bytes)
}

export function commonBitsAddr(
  reference: Address,
  other: Address,
  proxLimit: number,
  source: ByteSource = randomByteSource(),
): Address {
  return commonBitsAddrF(reference, other, source, proxLimit)
}

export function commonBitsAddrByte(
  reference: Address,
  other: Address,
  b: number,
  proxLimit: number,
): Address {
  return commonBitsAddrF(reference, other, constantByteSource(b), proxLimit)
}

/**
 * The inclusive range of addresses sharing `one`'s first
 * `min(proximity(one, other), proxLimit)` bits.
 */
export function keyRange(
  one: Address,
  other: Address,
  proxLimit: number,
): KeyRange {
  const prox = Math.min(proximity(one, other), toProximityOrder(proxLimit))
  const start = commonBitsAddrByte(one, other, 0x00, prox)
  const stop = commonBitsAddrByte(one, other, 0xff, prox)
  if (debug.enabled) {
    debug(`prox=${prox} [${start.toHex()}, ${stop.toHex()}]`)
  }
  return { start, stop }
}

export function inKeyRange(range: KeyRange, addr: Address): boolean {
  const bytes = addr.toBytes()
  return (
    compareBytes(range.start.toBytes(), bytes) <= 0 &&
    compareBytes(bytes, range.stop.toBytes()) <= 0
  )
}
