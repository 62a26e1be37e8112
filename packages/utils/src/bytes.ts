import { getRandomBytesSync } from 'ethereum-cryptography/random.js'
import {
  bytesToHex,
  equalsBytes,
  hexToBytes,
} from 'ethereum-cryptography/utils.js'

const HEX_REGEX = /^[0-9a-fA-F]*$/

/**
 * Lowercase hex without the `0x` prefix.
 */
export const bytesToUnprefixedHex = (bytes: Uint8Array): string =>
  bytesToHex(bytes)

/**
 * Expects an even-length hex string without prefix, either case.
 */
export const unprefixedHexToBytes = (hex: string): Uint8Array =>
  hexToBytes(hex)

export const stripHexPrefix = (str: string): string =>
  str.startsWith('0x') || str.startsWith('0X') ? str.slice(2) : str

export const isUnprefixedHex = (str: string): boolean =>
  str.length % 2 === 0 && HEX_REGEX.test(str)

/**
 * Render bytes as a string of `0`/`1`, eight characters per byte,
 * most significant bit first.
 */
export function bytesToBinary(bytes: Uint8Array): string {
  let out = ''
  for (const b of bytes) {
    out += b.toString(2).padStart(8, '0')
  }
  return out
}

/**
 * Big-endian unsigned comparison. A shorter input sorts first when it is a
 * prefix of the longer one.
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): -1 | 0 | 1 {
  const length = Math.min(a.length, b.length)
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) return a[i] < b[i] ? -1 : 1
  }
  if (a.length === b.length) return 0
  return a.length < b.length ? -1 : 1
}

export const randomBytes = (length: number): Uint8Array =>
  getRandomBytesSync(length)

export { equalsBytes }
