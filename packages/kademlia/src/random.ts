// packages/kademlia/src/random.ts
// Random addresses at a given proximity order

import debugDefault from 'debug'

import { Address } from './address'
import { type ByteSource, randomByteSource } from './byte-source'
import { ADDRESS_BITS, ADDRESS_LENGTH } from './constants'
import { toProximityOrder } from './proximity'

const debug = debugDefault('kad:random')

/**
 * Generate an address at exactly proximity order `prox` from `reference`.
 *
 * The result copies the first `prox` bits of `reference`, flips bit `prox`
 * and draws every later bit from `source`. A negative `prox` draws every
 * byte; `prox >= 256` returns the reference itself. Fractional orders are
 * floored and NaN is treated as 0.
 */
export function randomAddressAt(
  reference: Address,
  prox: number,
  source: ByteSource = randomByteSource(),
): Address {
  const order = toProximityOrder(prox)
  const bytes = reference.toBytes()
  if (order >= ADDRESS_BITS) return new Address(bytes)

  let next = 0
  if (order >= 0) {
    const pos = Math.floor(order / 8)
    const trans = order % 8
    // top trans+1 bits: the shared prefix plus the divergence bit
    const keep = (0xff00 >> (trans + 1)) & 0xff
    const flip = 0x80 >> trans
    bytes[pos] = ((bytes[pos] & keep) ^ flip) | (source() & ~keep & 0xff)
    next = pos + 1
  }
  for (let i = next; i < ADDRESS_LENGTH; i++) {
    bytes[i] = source() & 0xff
  }

  const addr = new Address(bytes)
  if (debug.enabled) {
    debug(`prox=${order} ref=${reference.toHex()} -> ${addr.toHex()}`)
  }
  return addr
}

/**
 * Generate an address with no proximity constraint.
 */
export function randomAddress(source: ByteSource = randomByteSource()): Address {
  return randomAddressAt(Address.zero(), -1, source)
}
