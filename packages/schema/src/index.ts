export {
  zAddress,
  zAddressHex,
  zKeyRange,
  type AddressInput,
  type KeyRangeInput,
} from './custom/address'
