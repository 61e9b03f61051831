import {DecodeError, ErrorKind} from './decode_error'

const utf8Decoder = new TextDecoder('utf-8', {fatal: true})

// Reads primitive values from a byte buffer.
//
// Offsets are always absolute positions in the underlying Uint8Array, also
// for readers created by `window`, so errors point into the original input.
export class BufferReader {
  private offset: number
  private readonly end: number
  private readonly byteArray: Uint8Array
  private readonly view: DataView

  constructor(byteArray: Uint8Array, offset = 0, end = byteArray.byteLength) {
    this.byteArray = byteArray
    this.view = new DataView(byteArray.buffer, byteArray.byteOffset, byteArray.byteLength)
    this.offset = offset
    this.end = end
  }

  public getOffset(): number { return this.offset }
  public getEnd(): number { return this.end }
  public remaining(): number { return this.end - this.offset }
  public isEof(): boolean { return this.offset >= this.end }

  // A reader limited to [start, end) of the same buffer.
  public window(start: number, end: number): BufferReader {
    return new BufferReader(this.byteArray, start, end)
  }

  public peeku8(): number {
    if (this.offset >= this.end)
      throw DecodeError.unexpectedEnd(this.offset)
    return this.byteArray[this.offset]
  }

  public readu8(): number {
    if (this.offset >= this.end)
      throw DecodeError.unexpectedEnd(this.offset)
    return this.byteArray[this.offset++]
  }

  // Returns a view (not a copy) of the next `length` bytes.
  public readBytes(length: number): Uint8Array {
    if (length > this.end - this.offset)
      throw DecodeError.unexpectedEnd(this.end, `${length} bytes`)
    const bytes = this.byteArray.subarray(this.offset, this.offset + length)
    this.offset += length
    return bytes
  }

  public readu32(): number {
    this.ensure(4)
    const value = this.view.getUint32(this.offset, true)
    this.offset += 4
    return value
  }

  public readu64(): bigint {
    this.ensure(8)
    const value = this.view.getBigUint64(this.offset, true)
    this.offset += 8
    return value
  }

  // Unsigned LEB128 of at most `bits` (<= 32) bits.
  public readVarUint(bits = 32): number {
    let x = 0
    let shift = 0
    for (;;) {
      const c = this.readu8()
      const rest = bits - shift
      if (rest <= 7) {
        // Last byte allowed for this width: no continuation, no bits beyond `bits`.
        if ((c & 0x80) !== 0 || (c & 0x7f) >= (1 << rest))
          throw this.overflow(bits, false)
      }
      x += (c & 0x7f) * 2 ** shift
      shift += 7
      if ((c & 0x80) === 0)
        return x
    }
  }

  // Signed LEB128 of at most `bits` (<= 33) bits.
  public readVarInt(bits = 32): number {
    let x = 0
    let shift = 0
    for (;;) {
      const c = this.readu8()
      if (bits - shift <= 7)
        this.checkSignedTail(c, bits - shift, bits)
      x += (c & 0x7f) * 2 ** shift
      shift += 7
      if ((c & 0x80) === 0) {
        if ((c & 0x40) !== 0)
          x -= 2 ** shift
        return x
      }
    }
  }

  public readVarInt64(): bigint {
    const bits = 64
    let x = BigInt(0)
    let shift = 0
    for (;;) {
      const c = this.readu8()
      if (bits - shift <= 7)
        this.checkSignedTail(c, bits - shift, bits)
      x += BigInt(c & 0x7f) << BigInt(shift)
      shift += 7
      if ((c & 0x80) === 0) {
        if ((c & 0x40) !== 0)
          x -= BigInt(1) << BigInt(shift)
        return x
      }
    }
  }

  public readVecLength(): number {
    return this.readVarUint(32)
  }

  public readName(): string {
    const length = this.readVecLength()
    const start = this.offset
    const bytes = this.readBytes(length)
    try {
      return utf8Decoder.decode(bytes)
    } catch (e) {
      throw new DecodeError(ErrorKind.UTF8, start, `Malformed UTF-8 name (${e instanceof Error ? e.message : String(e)})`)
    }
  }

  private ensure(length: number): void {
    if (length > this.end - this.offset)
      throw DecodeError.unexpectedEnd(this.end, `${length} bytes`)
  }

  // The unused high bits of the last byte of a signed encoding must all
  // equal its sign bit.
  private checkSignedTail(c: number, rest: number, bits: number): void {
    const mask = (0x7f << (rest - 1)) & 0x7f
    if ((c & 0x80) !== 0 || ((c & mask) !== 0 && (c & mask) !== mask))
      throw this.overflow(bits, true)
  }

  private overflow(bits: number, signed: boolean): DecodeError {
    return new DecodeError(ErrorKind.INTEGER_OVERFLOW, this.offset - 1,
                           `Integer too large for ${signed ? 'i' : 'u'}${bits}`)
  }
}
