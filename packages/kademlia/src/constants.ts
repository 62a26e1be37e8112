/** Address width in bytes. */
export const ADDRESS_LENGTH = 32

/** Address width in bits; also the proximity order of an address to itself. */
export const ADDRESS_BITS = ADDRESS_LENGTH * 8

/** Bytes drawn per refill by `randomByteSource`. */
export const DEFAULT_POOL_SIZE = 256
