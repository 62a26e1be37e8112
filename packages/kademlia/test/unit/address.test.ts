import createDebug from 'debug'
import { afterEach, describe, expect, it, vi } from 'vitest'
import {
  Address,
  AddressErrorCode,
  InvalidEncodingError,
  InvalidLengthError,
  isAddressError,
  randomAddress,
  sequenceByteSource,
} from '../../src'

const counting = Uint8Array.from({ length: 32 }, (_, i) => i)
const countingHex = Array.from(counting, (b) =>
  b.toString(16).padStart(2, '0'),
).join('')

describe('Address construction', () => {
  it('should accept exactly 32 bytes', () => {
    expect(new Address(counting).toBytes()).toEqual(counting)
  })

  it('should reject other lengths with InvalidLengthError', () => {
    expect(() => new Address(new Uint8Array(31))).toThrow(InvalidLengthError)
    expect(() => new Address(new Uint8Array(33))).toThrow(InvalidLengthError)

    try {
      Address.fromBytes(new Uint8Array(4))
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidLengthError)
      if (err instanceof InvalidLengthError) {
        expect(err.code).toBe(AddressErrorCode.INVALID_LENGTH)
        expect(err.metadata).toEqual({ expected: 32, actual: 4 })
        expect(err.message).toBe('Invalid length: expected 32 bytes, got 4')
      }
    }
  })

  it('should not share memory with its input or output', () => {
    const input = new Uint8Array(32)
    const addr = new Address(input)
    input[0] = 0xff
    addr.toBytes()[1] = 0xff
    expect(addr.equals(Address.zero())).toBe(true)
  })
})

describe('Address hex encoding', () => {
  it('should render 64 lowercase hex characters', () => {
    const addr = new Address(counting)
    expect(addr.toHex()).toBe(countingHex)
    expect(addr.toString()).toBe(countingHex)
    expect(Address.fromBytes(new Uint8Array(32).fill(0xab)).toHex()).toBe(
      'ab'.repeat(32),
    )
  })

  it('should parse uppercase and 0x-prefixed input', () => {
    expect(Address.fromHex(`0x${'AB'.repeat(32)}`).toHex()).toBe(
      'ab'.repeat(32),
    )
  })

  it('should round trip through hex', () => {
    const source = sequenceByteSource([0x00, 0x7f, 0x80, 0xff, 0x13])
    for (let i = 0; i < 10; i++) {
      const addr = randomAddress(source)
      expect(Address.fromHex(addr.toHex()).equals(addr)).toBe(true)
    }
  })

  it('should reject the wrong length with InvalidEncodingError', () => {
    expect(() => Address.fromHex('ab'.repeat(31))).toThrow(InvalidEncodingError)
    expect(() => Address.fromHex('ab'.repeat(33))).toThrow(InvalidEncodingError)
    expect(() => Address.fromHex('')).toThrow(InvalidEncodingError)
    expect(() => Address.fromHex(`0x${'a'.repeat(63)}`)).toThrow(
      InvalidEncodingError,
    )
  })

  it('should reject non-hex characters with InvalidEncodingError', () => {
    expect(() => Address.fromHex(`zz${'ab'.repeat(31)}`)).toThrow(
      'Invalid encoding: non-hex character',
    )
    expect(() => Address.fromHex(`${'ab'.repeat(31)}g0`)).toThrow(
      InvalidEncodingError,
    )
  })

  it('should report parse failures as tuples from tryFromHex', () => {
    const [okErr, ok] = Address.tryFromHex(countingHex)
    expect(okErr).toBeUndefined()
    expect(ok?.toHex()).toBe(countingHex)

    const [err, res] = Address.tryFromHex('nothex')
    expect(err).toBeInstanceOf(InvalidEncodingError)
    expect(isAddressError(err) && err.code).toBe(
      AddressErrorCode.INVALID_ENCODING,
    )
    expect(res).toBeUndefined()
  })
})

describe('Address JSON encoding', () => {
  it('should serialize as a quoted hex string', () => {
    const addr = new Address(counting)
    expect(JSON.stringify({ id: addr })).toBe(`{"id":"${countingHex}"}`)
  })

  it('should parse a quoted hex string', () => {
    expect(Address.fromJSON(`"${countingHex}"`).equals(new Address(counting))).toBe(
      true,
    )
  })

  it('should reject JSON that is not a hex string', () => {
    expect(() => Address.fromJSON('42')).toThrow(
      'Invalid encoding: expected a JSON string',
    )
    expect(() => Address.fromJSON(countingHex)).toThrow(InvalidEncodingError)
    expect(() => Address.fromJSON('"abcd"')).toThrow(InvalidEncodingError)
  })

  describe('with kad:address logging enabled', () => {
    const defaultLog = createDebug.log
    let previous = ''

    const enableLogging = () => {
      const log = vi.fn()
      previous = createDebug.disable()
      createDebug.enable('kad:address')
      createDebug.log = log
      return log
    }

    afterEach(() => {
      createDebug.log = defaultLog
      createDebug.disable()
      if (previous) createDebug.enable(previous)
    })

    const logged = (log: ReturnType<typeof vi.fn>, text: string) =>
      log.mock.calls.some((args) => String(args[0]).includes(text))

    it('should log malformed JSON before throwing', () => {
      const log = enableLogging()
      expect(() => Address.fromJSON('{')).toThrow(
        'Invalid encoding: malformed JSON',
      )
      expect(logged(log, 'rejected malformed JSON')).toBe(true)
    })

    it('should log a non-string JSON value before throwing', () => {
      const log = enableLogging()
      expect(() => Address.fromJSON('42')).toThrow(InvalidEncodingError)
      expect(logged(log, 'rejected JSON number')).toBe(true)
    })
  })
})

describe('Address bits', () => {
  it('should render the binary form MSB first', () => {
    const bytes = new Uint8Array(32)
    bytes[0] = 0x80
    bytes[31] = 0x01
    const bin = new Address(bytes).toBin()
    expect(bin).toBe(`1${'0'.repeat(254)}1`)
    expect(bin.length).toBe(256)
  })

  it('should read single bits and bytes', () => {
    const bytes = new Uint8Array(32)
    bytes[0] = 0x40
    bytes[2] = 0x01
    const addr = new Address(bytes)
    expect(addr.bit(0)).toBe(0)
    expect(addr.bit(1)).toBe(1)
    expect(addr.bit(23)).toBe(1)
    expect(addr.bit(255)).toBe(0)
    expect(addr.byteAt(2)).toBe(0x01)
  })

  it('should read indexes outside the address as 0', () => {
    const addr = Address.fromHex('ff'.repeat(32))
    expect(addr.byteAt(31)).toBe(0xff)
    expect(addr.byteAt(32)).toBe(0)
    expect(addr.byteAt(-1)).toBe(0)
    expect(addr.bit(255)).toBe(1)
    expect(addr.bit(256)).toBe(0)
    expect(addr.bit(-1)).toBe(0)
  })

  it('should compare by value', () => {
    expect(new Address(counting).equals(Address.fromHex(countingHex))).toBe(true)
    expect(new Address(counting).equals(Address.zero())).toBe(false)
  })
})

describe('AddressError serialization', () => {
  it('should expose code and metadata in toJSON', () => {
    const json = new InvalidEncodingError('bad', { input: 'xyz' }).toJSON()
    expect(json.name).toBe('InvalidEncodingError')
    expect(json.code).toBe('INVALID_ENCODING')
    expect(json.message).toBe('Invalid encoding: bad')
    expect(json.metadata).toEqual({ input: 'xyz' })
  })
})
