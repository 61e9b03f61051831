import {BufferReader} from './buffer_reader'
import {readRegion} from './section_decoder'
import type {CustomSection} from './wasm_types'

export const NAME_SECTION = 'name'

const enum NameType {
  MODULE   = 0,
  FUNCTION = 1,
  LOCAL    = 2,
}

export interface NameSection {
  readonly moduleName?: string
  readonly functionNames: ReadonlyMap<number, string>
  readonly localNames: ReadonlyMap<number, ReadonlyMap<number, string>>
}

function readNameMap(bufferReader: BufferReader): Map<number, string> {
  const names = new Map<number, string>()
  const count = bufferReader.readVecLength()
  for (let i = 0; i < count; ++i) {
    const index = bufferReader.readVarUint(32)
    names.set(index, bufferReader.readName())
  }
  return names
}

// Decodes the payload of a `name` custom section. Subsections other than
// module, function and local names are skipped. Error offsets are relative
// to the start of `section.bytes`.
export function decodeNameSection(section: CustomSection): NameSection {
  const bufferReader = new BufferReader(section.bytes)
  let moduleName: string | undefined
  let functionNames = new Map<number, string>()
  const localNames = new Map<number, Map<number, string>>()

  while (!bufferReader.isEof()) {
    const nametype = bufferReader.readu8()
    const size = bufferReader.readVarUint(32)
    readRegion(bufferReader, size, `Name subsection ${nametype}`, r => {
      switch (nametype) {
      case NameType.MODULE:
        moduleName = r.readName()
        break
      case NameType.FUNCTION:
        functionNames = readNameMap(r)
        break
      case NameType.LOCAL:
        {
          const count = r.readVecLength()
          for (let i = 0; i < count; ++i) {
            const funcIndex = r.readVarUint(32)
            localNames.set(funcIndex, readNameMap(r))
          }
        }
        break
      default:
        r.readBytes(r.remaining())
        break
      }
    })
  }
  return {moduleName, functionNames, localNames}
}
