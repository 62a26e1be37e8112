// packages/kademlia/src/index.ts
// Kademlia address space: identifiers, XOR proximity and key ranges

export { Address } from './address'
export {
  constantByteSource,
  randomByteSource,
  sequenceByteSource,
  type ByteSource,
} from './byte-source'
export { ADDRESS_BITS, ADDRESS_LENGTH, DEFAULT_POOL_SIZE } from './constants'
export {
  AddressError,
  AddressErrorCode,
  InvalidEncodingError,
  InvalidLengthError,
  isAddressError,
  type AddressErrorMetadata,
} from './errors'
export {
  commonBitsAddr,
  commonBitsAddrByte,
  commonBitsAddrF,
  inKeyRange,
  keyRange,
  type KeyRange,
} from './key-range'
export { proxCmp, proximity, type ProxCmpResult } from './proximity'
export { randomAddress, randomAddressAt } from './random'
