// packages/kademlia/src/address.ts
// Fixed-width identifier in the XOR metric space

import {
  bytesToBinary,
  bytesToUnprefixedHex,
  equalsBytes,
  isUnprefixedHex,
  safeSyncTry,
  stripHexPrefix,
  unprefixedHexToBytes,
  type Safe,
} from '@kadspace/utils'
import debugDefault from 'debug'

import { ADDRESS_BITS, ADDRESS_LENGTH } from './constants'
import { InvalidEncodingError, InvalidLengthError } from './errors'

const debug = debugDefault('kad:address')

/**
 * A 256-bit Kademlia address.
 *
 * Instances are immutable: the constructor copies its input and
 * {@link Address.toBytes} hands out a copy.
 */
export class Address {
  private readonly _bytes: Uint8Array

  constructor(bytes: Uint8Array) {
    if (bytes.length !== ADDRESS_LENGTH) {
      debug(`rejected ${bytes.length} byte input`)
      throw new InvalidLengthError(ADDRESS_LENGTH, bytes.length)
    }
    this._bytes = Uint8Array.from(bytes)
  }

  static zero(): Address {
    return new Address(new Uint8Array(ADDRESS_LENGTH))
  }

  static fromBytes(bytes: Uint8Array): Address {
    return new Address(bytes)
  }

  /**
   * Parse 64 hex characters, optionally `0x`-prefixed.
   */
  static fromHex(str: string): Address {
    const hex = stripHexPrefix(str)
    if (hex.length !== ADDRESS_LENGTH * 2) {
      debug(`rejected hex of length ${hex.length}`)
      throw new InvalidEncodingError(
        `expected ${ADDRESS_LENGTH * 2} hex characters, got ${hex.length}`,
        { input: str },
      )
    }
    if (!isUnprefixedHex(hex)) {
      debug('rejected non-hex input')
      throw new InvalidEncodingError('non-hex character', { input: str })
    }
    return new Address(unprefixedHexToBytes(hex))
  }

  static tryFromHex(str: string): Safe<Address> {
    return safeSyncTry(() => Address.fromHex(str))
  }

  /**
   * Inverse of `JSON.stringify(address)`: a quoted hex string.
   */
  static fromJSON(text: string): Address {
    let value: unknown
    try {
      value = JSON.parse(text)
    } catch (err) {
      debug('rejected malformed JSON')
      throw new InvalidEncodingError('malformed JSON', { input: text, cause: err })
    }
    if (typeof value !== 'string') {
      debug(`rejected JSON ${typeof value}`)
      throw new InvalidEncodingError('expected a JSON string', { input: text })
    }
    return Address.fromHex(value)
  }

  /**
   * Byte at `index` (0..31). Indexes outside the address read as 0.
   */
  byteAt(index: number): number {
    return this._bytes[index] ?? 0
  }

  /**
   * Bit at `index` (0..255), counting from the most significant bit of
   * byte 0. Indexes outside the address read as 0.
   */
  bit(index: number): 0 | 1 {
    if (!(index >= 0 && index < ADDRESS_BITS)) return 0
    return (this._bytes[index >> 3] >> (7 - (index & 7))) & 1 ? 1 : 0
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this._bytes)
  }

  toHex(): string {
    return bytesToUnprefixedHex(this._bytes)
  }

  /**
   * Binary string form, for diagnostics.
   */
  toBin(): string {
    return bytesToBinary(this._bytes)
  }

  equals(other: Address): boolean {
    return equalsBytes(this._bytes, other._bytes)
  }

  toString(): string {
    return this.toHex()
  }

  toJSON(): string {
    return this.toHex()
  }
}
