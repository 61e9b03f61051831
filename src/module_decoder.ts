import {BufferReader} from './buffer_reader'
import {DecodeError, ErrorKind, hex, tryDecode, type DecodeResult} from './decode_error'
import {type DecoderOptions, type ResolvedOptions, resolveOptions} from './options'
import {decodeSection} from './section_decoder'
import {SectionId, SectionNames, WASM_MAGIC, WASM_VERSION, type Module, type Section} from './wasm_types'

export const HEADER_SIZE = 8

export function readHeader(bufferReader: BufferReader): number {
  if (bufferReader.remaining() < HEADER_SIZE)
    throw DecodeError.unexpectedEnd(bufferReader.getEnd(), 'module header')
  const offset = bufferReader.getOffset()
  const magic = bufferReader.readu32()
  if (magic !== WASM_MAGIC)
    throw new DecodeError(ErrorKind.MAGIC_OR_VERSION, offset, `No wasm header: ${hex(magic, 8)}`)
  const version = bufferReader.readu32()
  if (version !== WASM_VERSION)
    throw new DecodeError(ErrorKind.MAGIC_OR_VERSION, offset + 4, `Unsupported wasm version: ${version}`)
  return version
}

// Collects sections in input order. Known sections must come in ascending
// id order, each at most once; custom sections may appear anywhere.
export class ModuleBuilder {
  private readonly sections = new Array<Section>()
  private lastId = SectionId.CUSTOM

  constructor(private readonly version: number) {
  }

  public add(section: Section): void {
    if (section.id !== SectionId.CUSTOM) {
      if (section.id <= this.lastId) {
        const problem = section.id === this.lastId ? 'Duplicate' : 'Out-of-order'
        throw new DecodeError(ErrorKind.SECTION_ORDER, section.offset,
                              `${problem} ${SectionNames[section.id]} section after ${SectionNames[this.lastId]}`)
      }
      this.lastId = section.id
    }
    this.sections.push(section)
  }

  public build(): Module {
    return {version: this.version, sections: this.sections.slice()}
  }
}

export function readModule(bufferReader: BufferReader, opts: ResolvedOptions): Module {
  const builder = new ModuleBuilder(readHeader(bufferReader))
  while (!bufferReader.isEof())
    builder.add(decodeSection(bufferReader, opts))
  return builder.build()
}

// Decodes a complete module. Custom section and data segment payloads in the
// result are views into `bytes`.
export function decodeModule(bytes: Uint8Array, options?: DecoderOptions): DecodeResult<Module> {
  const opts = resolveOptions(options)
  return tryDecode(() => readModule(new BufferReader(bytes), opts))
}

// Like decodeModule, but throws the DecodeError.
export function parseModule(bytes: Uint8Array, options?: DecoderOptions): Module {
  return readModule(new BufferReader(bytes), resolveOptions(options))
}
