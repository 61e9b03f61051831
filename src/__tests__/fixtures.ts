// Small encoder used to build test modules.

import {DecodeError} from '../decode_error'

export const HEADER = [0x00, 0x61, 0x73, 0x6d, 0x01, 0x00, 0x00, 0x00]

export function uleb(value: number | bigint): number[] {
  let v = BigInt(value)
  const bytes = new Array<number>()
  do {
    let b = Number(v & 0x7fn)
    v >>= 7n
    if (v !== 0n)
      b |= 0x80
    bytes.push(b)
  } while (v !== 0n)
  return bytes
}

export function sleb(value: number | bigint): number[] {
  let v = BigInt(value)
  const bytes = new Array<number>()
  for (;;) {
    const b = Number(v & 0x7fn)
    v >>= 7n
    if ((v === 0n && (b & 0x40) === 0) || (v === -1n && (b & 0x40) !== 0)) {
      bytes.push(b)
      return bytes
    }
    bytes.push(b | 0x80)
  }
}

export function name(s: string): number[] {
  const bytes = Array.from(new TextEncoder().encode(s))
  return [...uleb(bytes.length), ...bytes]
}

export function vec(items: number[][]): number[] {
  return [...uleb(items.length), ...items.flat()]
}

export function section(id: number, payload: number[]): number[] {
  return [id, ...uleb(payload.length), ...payload]
}

export function wasm(...sections: number[][]): Uint8Array {
  return new Uint8Array([...HEADER, ...sections.flat()])
}

export const SAMPLE_BODY = [
  0x20, 0x00,        // local.get 0
  0x20, 0x01,        // local.get 1
  0x6a,              // i32.add
  0x22, 0x02,        // local.tee 2
  0x10, 0x00,        // call 0
  0x02, 0x7f,        // block (result i32)
  0x20, 0x02,        //   local.get 2
  0x28, 0x02, 0x04,  //   i32.load offset=4
  0x0b,              // end
  0x04, 0x40,        // if
  0x01,              //   nop
  0x05,              // else
  0x00,              //   unreachable
  0x0b,              // end
  0x0b,              // end
]

// One imported function, one defined function "add" (named "sum" in the
// name section), a memory, a global and a data segment.
export function sampleModule(): Uint8Array {
  const body = [...vec([[0x01, 0x7f]]), ...SAMPLE_BODY]
  return wasm(
    section(1, vec([
      [0x60, ...vec([[0x7f], [0x7f]]), ...vec([[0x7f]])],
      [0x60, ...vec([[0x7f]]), ...vec([])],
    ])),
    section(2, vec([[...name('env'), ...name('print'), 0x00, 0x01]])),
    section(3, vec([[0x00]])),
    section(5, vec([[0x00, 0x01]])),
    section(6, vec([[0x7f, 0x01, 0x41, 0x08, 0x0b]])),
    section(7, vec([[...name('add'), 0x00, 0x01]])),
    section(10, vec([[...uleb(body.length), ...body]])),
    section(11, vec([[0x00, 0x41, 0x10, 0x0b, ...vec([[0x68], [0x69], [0x0a]])]])),
    section(0, [...name('name'), 0x01, ...subsection(vec([[0x01, ...name('sum')]]))]),
  )
}

function subsection(payload: number[]): number[] {
  return [...uleb(payload.length), ...payload]
}

// Runs `f` and returns the DecodeError it throws.
export function decodeErrorOf(f: () => unknown): DecodeError {
  try {
    f()
  } catch (e) {
    if (e instanceof DecodeError)
      return e
    throw e
  }
  throw new Error('No DecodeError thrown')
}
