import { randomBytes } from '@kadspace/utils'

import { DEFAULT_POOL_SIZE } from './constants'
import { InvalidLengthError } from './errors'

/**
 * Supplies one byte (0-255) per call. Generation and range functions take
 * one as an argument, so tests can pass a deterministic sequence.
 */
export type ByteSource = () => number

/**
 * Uniform bytes over the full 0-255 range, drawn from the platform CSPRNG in
 * pools of `poolSize`. Every call returns an independent source with its own
 * pool.
 */
export function randomByteSource(poolSize = DEFAULT_POOL_SIZE): ByteSource {
  const size = Math.max(1, Math.floor(poolSize))
  let pool: Uint8Array = new Uint8Array(0)
  let offset = 0
  return () => {
    if (offset >= pool.length) {
      pool = randomBytes(size)
      offset = 0
    }
    return pool[offset++]
  }
}

export function constantByteSource(b: number): ByteSource {
  const value = b & 0xff
  return () => value
}

/**
 * Cycle through `bytes`, restarting at the first after the last.
 */
export function sequenceByteSource(
  bytes: Uint8Array | readonly number[],
): ByteSource {
  if (bytes.length === 0) {
    throw new InvalidLengthError(1, 0)
  }
  const values = Uint8Array.from(bytes)
  let index = 0
  return () => {
    const value = values[index]
    index = (index + 1) % values.length
    return value
  }
}
