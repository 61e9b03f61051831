import {describe, expect, it} from 'vitest'
import {BufferReader} from '../buffer_reader'
import {ErrorKind} from '../decode_error'
import {decodeErrorOf, sleb, uleb} from './fixtures'

function reader(bytes: number[]): BufferReader {
  return new BufferReader(new Uint8Array(bytes))
}

describe('readVarUint', () => {
  it('reads a multi-byte value', () => {
    const r = reader([0xe5, 0x8e, 0x26])
    expect(r.readVarUint()).toBe(624485)
    expect(r.isEof()).toBe(true)
  })

  it('accepts padded encodings within the width', () => {
    const r = reader([0x80, 0x00])
    expect(r.readVarUint()).toBe(0)
    expect(r.getOffset()).toBe(2)
  })

  it('reads the largest u32', () => {
    expect(reader([0xff, 0xff, 0xff, 0xff, 0x0f]).readVarUint()).toBe(0xffffffff)
  })

  it('rejects bits beyond 32', () => {
    const e = decodeErrorOf(() => reader([0xff, 0xff, 0xff, 0xff, 0x1f]).readVarUint())
    expect(e.kind).toBe(ErrorKind.INTEGER_OVERFLOW)
    expect(e.offset).toBe(4)
    expect(e.message).toBe('Integer too large for u32 at 0x04')
  })

  it('rejects encodings longer than the width allows', () => {
    const e = decodeErrorOf(() => reader([0x80, 0x80, 0x80, 0x80, 0x80, 0x00]).readVarUint())
    expect(e.kind).toBe(ErrorKind.INTEGER_OVERFLOW)
    expect(e.offset).toBe(4)
  })

  it('reports a truncated encoding', () => {
    const e = decodeErrorOf(() => reader([0x80, 0x80]).readVarUint())
    expect(e.kind).toBe(ErrorKind.UNEXPECTED_END)
    expect(e.offset).toBe(2)
  })

  it('round-trips encoded values', () => {
    for (const value of [0, 1, 127, 128, 255, 624485, 2 ** 31, 2 ** 32 - 1]) {
      const r = reader(uleb(value))
      expect(r.readVarUint()).toBe(value)
      expect(r.isEof()).toBe(true)
    }
  })

  it('rejects 2**32', () => {
    expect(decodeErrorOf(() => reader(uleb(2 ** 32)).readVarUint()).kind).toBe(ErrorKind.INTEGER_OVERFLOW)
  })
})

describe('readVarInt', () => {
  it('reads a negative value', () => {
    const r = reader([0xc0, 0xbb, 0x78])
    expect(r.readVarInt()).toBe(-123456)
    expect(r.isEof()).toBe(true)
  })

  it('reads the i32 extremes', () => {
    expect(reader([0xff, 0xff, 0xff, 0xff, 0x7f]).readVarInt()).toBe(-1)
    expect(reader([0x80, 0x80, 0x80, 0x80, 0x78]).readVarInt()).toBe(-2147483648)
    expect(reader([0xff, 0xff, 0xff, 0xff, 0x07]).readVarInt()).toBe(2147483647)
  })

  it('rejects unused bits that disagree with the sign', () => {
    const e = decodeErrorOf(() => reader([0xff, 0xff, 0xff, 0xff, 0x4f]).readVarInt())
    expect(e.kind).toBe(ErrorKind.INTEGER_OVERFLOW)
    expect(e.offset).toBe(4)
    expect(e.message).toBe('Integer too large for i32 at 0x04')
  })

  it('round-trips encoded values', () => {
    for (const value of [0, -1, 63, 64, -64, -65, -123456, 2 ** 31 - 1, -(2 ** 31)]) {
      const r = reader(sleb(value))
      expect(r.readVarInt()).toBe(value)
      expect(r.isEof()).toBe(true)
    }
  })
})

describe('readVarInt64', () => {
  it('reads bigint values', () => {
    expect(reader([0x7f]).readVarInt64()).toBe(-1n)
    expect(reader(sleb(2n ** 62n)).readVarInt64()).toBe(2n ** 62n)
    expect(reader([0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x7f]).readVarInt64()).toBe(-(2n ** 63n))
  })

  it('rejects values beyond 64 bits', () => {
    const e = decodeErrorOf(() => reader([0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x01]).readVarInt64())
    expect(e.kind).toBe(ErrorKind.INTEGER_OVERFLOW)
    expect(e.offset).toBe(9)
  })
})

describe('fixed-width reads', () => {
  it('reads little-endian values', () => {
    expect(reader([0x00, 0x61, 0x73, 0x6d]).readu32()).toBe(0x6d736100)
    expect(reader([0x00, 0x00, 0x80, 0x3f]).readu32()).toBe(0x3f800000)
    expect(reader([0, 0, 0, 0, 0, 0, 0xf8, 0x3f]).readu64()).toBe(0x3ff8000000000000n)
  })

  it('reports the end of the reader on a short read', () => {
    const e = decodeErrorOf(() => reader([0x00, 0x00]).readu32())
    expect(e.kind).toBe(ErrorKind.UNEXPECTED_END)
    expect(e.offset).toBe(2)
  })

  it('fails readu8 on empty input', () => {
    const e = decodeErrorOf(() => reader([]).readu8())
    expect(e.kind).toBe(ErrorKind.UNEXPECTED_END)
    expect(e.offset).toBe(0)
    expect(e.message).toBe('Unexpected end of input reading byte at 0x00')
  })

  it('returns views from readBytes', () => {
    const bytes = new Uint8Array([1, 2, 3, 4])
    const r = new BufferReader(bytes, 1)
    const view = r.readBytes(2)
    expect(Array.from(view)).toEqual([2, 3])
    expect(view.buffer).toBe(bytes.buffer)
    expect(r.getOffset()).toBe(3)
  })
})

describe('window', () => {
  it('keeps absolute offsets and stops at its end', () => {
    const r = reader([1, 2, 3, 4])
    const w = r.window(1, 3)
    expect(w.readu8()).toBe(2)
    expect(w.readu8()).toBe(3)
    expect(w.isEof()).toBe(true)
    expect(w.getOffset()).toBe(3)
    expect(decodeErrorOf(() => w.readu8()).offset).toBe(3)
  })
})

describe('readName', () => {
  it('decodes UTF-8', () => {
    const r = reader([0x05, 0x68, 0x65, 0x6c, 0x6c, 0x6f])
    expect(r.readName()).toBe('hello')
    expect(r.isEof()).toBe(true)
  })

  it('rejects malformed UTF-8 at the start of the name bytes', () => {
    const e = decodeErrorOf(() => reader([0x02, 0xc3, 0x28]).readName())
    expect(e.kind).toBe(ErrorKind.UTF8)
    expect(e.offset).toBe(1)
  })

  it('reports a name longer than the input', () => {
    const e = decodeErrorOf(() => reader([0x05, 0x68]).readName())
    expect(e.kind).toBe(ErrorKind.UNEXPECTED_END)
    expect(e.offset).toBe(2)
  })
})
