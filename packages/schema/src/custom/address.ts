import { Address, ADDRESS_LENGTH } from '@kadspace/kademlia'
import { compareBytes, safeSyncTry } from '@kadspace/utils'
import { z } from 'zod'

export const zAddressHex = z
  .string()
  .regex(new RegExp(`^(0x)?[0-9a-fA-F]{${ADDRESS_LENGTH * 2}}$`), {
    message: `Address must be ${ADDRESS_LENGTH * 2} hex characters`,
  })

const toAddress = (val: Address | Uint8Array | string): Address => {
  if (val instanceof Address) return val
  if (val instanceof Uint8Array) return new Address(val)
  return Address.fromHex(val)
}

/**
 * Accepts an Address, raw bytes or hex; outputs an Address.
 */
export const zAddress = z
  .union([z.instanceof(Address), z.instanceof(Uint8Array), z.string()])
  .transform((val, ctx) => {
    const [err, addr] = safeSyncTry(() => toAddress(val))
    if (addr === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err?.message ?? 'Invalid address',
      })
      return z.NEVER
    }
    return addr
  })

export const zKeyRange = z
  .object({ start: zAddress, stop: zAddress })
  .refine(
    ({ start, stop }) => compareBytes(start.toBytes(), stop.toBytes()) <= 0,
    { message: 'Key range start must not exceed stop' },
  )

export type AddressInput = z.input<typeof zAddress>
export type KeyRangeInput = z.input<typeof zKeyRange>
