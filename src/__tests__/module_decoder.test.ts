import {describe, expect, it} from 'vitest'
import {DecodeError, ErrorKind} from '../decode_error'
import {decodeModule, parseModule} from '../module_decoder'
import {resolveOptions} from '../options'
import {SectionId, getCustomSections, getSection} from '../wasm_types'
import {HEADER, decodeErrorOf, name, sampleModule, section, uleb, vec, wasm} from './fixtures'

const ERROR_KINDS: readonly string[] = Object.values(ErrorKind)

// Deterministic pseudo random numbers (LCG).
function random(seed: number): () => number {
  let state = seed
  return () => {
    state = (state * 1103515245 + 12345) % 0x80000000
    return state
  }
}

describe('decodeModule', () => {
  it('accepts an empty module', () => {
    expect(decodeModule(new Uint8Array(HEADER))).toEqual({ok: true, value: {version: 1, sections: []}})
  })

  it('checks magic and version', () => {
    const badMagic = decodeModule(new Uint8Array([0x00, 0x61, 0x73, 0x6e, 0x01, 0x00, 0x00, 0x00]))
    expect(badMagic.ok).toBe(false)
    if (!badMagic.ok) {
      expect(badMagic.error.kind).toBe(ErrorKind.MAGIC_OR_VERSION)
      expect(badMagic.error.offset).toBe(0)
    }

    const badVersion = decodeModule(new Uint8Array([0x00, 0x61, 0x73, 0x6d, 0x02, 0x00, 0x00, 0x00]))
    expect(badVersion.ok).toBe(false)
    if (!badVersion.ok) {
      expect(badVersion.error.kind).toBe(ErrorKind.MAGIC_OR_VERSION)
      expect(badVersion.error.offset).toBe(4)
      expect(badVersion.error.message).toBe('Unsupported wasm version: 2 at 0x04')
    }
  })

  it('reports a short header as end of input', () => {
    const result = decodeModule(new Uint8Array([0x00, 0x61]))
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe(ErrorKind.UNEXPECTED_END)
      expect(result.error.offset).toBe(2)
    }
  })

  it('decodes every section of a module', () => {
    const result = decodeModule(sampleModule())
    if (!result.ok)
      throw result.error
    const module = result.value
    expect(module.sections.map(s => s.id)).toEqual([
      SectionId.TYPE, SectionId.IMPORT, SectionId.FUNC, SectionId.MEMORY, SectionId.GLOBAL,
      SectionId.EXPORT, SectionId.CODE, SectionId.DATA, SectionId.CUSTOM,
    ])
    expect(getSection(module, SectionId.FUNC)).toEqual([0])
    expect(getSection(module, SectionId.EXPORT)).toEqual([{name: 'add', kind: 0, index: 1}])
    expect(getSection(module, SectionId.MEMORY)).toEqual([{min: 1}])
    expect(getSection(module, SectionId.START)).toBeUndefined()
    expect(getCustomSections(module, 'name').length).toBe(1)
    expect(getCustomSections(module, 'other')).toEqual([])
    expect(getSection(module, SectionId.CODE)?.[0].body.map(inst => inst.op)).toEqual([
      'local.get', 'local.get', 'i32.add', 'local.tee', 'call', 'block', 'if',
    ])
  })

  it('allows custom sections anywhere', () => {
    const custom = section(0, name('x'))
    const result = decodeModule(wasm(custom, section(1, vec([])), custom, section(3, vec([])), custom))
    expect(result.ok).toBe(true)
  })

  it('rejects out-of-order and duplicate sections', () => {
    const outOfOrder = decodeErrorOf(() => parseModule(wasm(section(3, vec([])), section(1, vec([])))))
    expect(outOfOrder.kind).toBe(ErrorKind.SECTION_ORDER)
    expect(outOfOrder.offset).toBe(11)
    expect(outOfOrder.message).toBe('Out-of-order TYPE section after FUNC at 0x0b')

    const duplicate = decodeErrorOf(() => parseModule(wasm(section(1, vec([])), section(0, name('x')), section(1, vec([])))))
    expect(duplicate.kind).toBe(ErrorKind.SECTION_ORDER)
    expect(duplicate.message).toBe('Duplicate TYPE section after TYPE at 0x0f')
  })

  it('fails every truncated prefix unless it ends on a section boundary', () => {
    const bytes = sampleModule()
    const module = parseModule(bytes)
    const boundaries = new Set([HEADER.length, ...module.sections.map(s => s.offset)])
    for (let length = 0; length < bytes.length; ++length) {
      const result = decodeModule(bytes.subarray(0, length))
      if (boundaries.has(length)) {
        expect(result.ok).toBe(true)
      } else {
        expect(result.ok).toBe(false)
        if (!result.ok)
          expect(result.error.kind).toBe(ErrorKind.UNEXPECTED_END)
      }
    }
  })

  it('reports only decode errors for corrupted input', () => {
    const original = sampleModule()
    const next = random(12345)
    for (let i = 0; i < 2000; ++i) {
      const bytes = original.slice()
      const count = 1 + next() % 3
      for (let j = 0; j < count; ++j)
        bytes[HEADER.length + next() % (bytes.length - HEADER.length)] = next() & 0xff
      const result = decodeModule(bytes)
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(DecodeError)
        expect(ERROR_KINDS).toContain(result.error.kind)
        expect(result.error.offset).toBeGreaterThanOrEqual(0)
        expect(result.error.offset).toBeLessThanOrEqual(bytes.length)
      }
    }
  })

  it('passes the nesting limit down to function bodies', () => {
    const body = [0x00, 0x02, 0x40, 0x02, 0x40, 0x0b, 0x0b, 0x0b]
    const bytes = wasm(section(10, vec([[...uleb(body.length), ...body]])))
    expect(decodeModule(bytes).ok).toBe(true)
    const result = decodeModule(bytes, {maxDepth: 1})
    expect(result.ok).toBe(false)
    if (!result.ok)
      expect(result.error.kind).toBe(ErrorKind.NESTING_LIMIT)
  })

  it('logs each section', () => {
    const lines = new Array<string>()
    decodeModule(wasm(section(1, vec([])), section(3, vec([]))), {log: s => lines.push(s)})
    expect(lines).toEqual([';;=== 0x8: TYPE, len=1', ';;=== 0xb: FUNC, len=1'])
  })
})

describe('resolveOptions', () => {
  it('fills in defaults and rejects invalid depths', () => {
    expect(resolveOptions().maxDepth).toBe(1024)
    expect(() => resolveOptions({maxDepth: -1})).toThrow(RangeError)
    expect(() => resolveOptions({maxDepth: 1.5})).toThrow(RangeError)
  })
})
