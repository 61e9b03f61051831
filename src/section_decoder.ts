import {BufferReader} from './buffer_reader'
import {DecodeError, ErrorKind, hex} from './decode_error'
import {readExpr} from './inst_decoder'
import {type ResolvedOptions, resolveOptions} from './options'
import {readFuncType, readGlobalType, readLimits, readTableType, readValType} from './type_decoder'
import {
  ExternalKind, SectionId, SectionNames,
  type Code, type CustomSection, type DataSegment, type ElemSegment, type Export, type Global, type Import,
  type ImportDesc, type Local, type Section,
} from './wasm_types'

export function readVec<T>(bufferReader: BufferReader, readElem: (bufferReader: BufferReader) => T): T[] {
  const count = bufferReader.readVecLength()
  const elems = new Array<T>()
  for (let i = 0; i < count; ++i)
    elems.push(readElem(bufferReader))
  return elems
}

// Decodes `size` bytes with `decode`, which must consume them exactly.
// Reading past the region, or stopping short of its end, is a length
// mismatch: nothing after this point could be trusted.
export function readRegion<T>(bufferReader: BufferReader, size: number, what: string,
                              decode: (window: BufferReader) => T): T {
  const start = bufferReader.getOffset()
  bufferReader.readBytes(size)
  const end = start + size
  const window = bufferReader.window(start, end)
  let value: T
  try {
    value = decode(window)
  } catch (e) {
    if (e instanceof DecodeError && e.kind === ErrorKind.UNEXPECTED_END)
      throw new DecodeError(ErrorKind.SECTION_LENGTH_MISMATCH, end,
                            `${what} declared ${size} bytes but its contents run past the end`)
    throw e
  }
  if (!window.isEof())
    throw new DecodeError(ErrorKind.SECTION_LENGTH_MISMATCH, window.getOffset(),
                          `${what} declared ${size} bytes but its contents end after ${window.getOffset() - start}`)
  return value
}

// Reads one section: id byte, payload size, payload.
export function decodeSection(bufferReader: BufferReader, options?: ResolvedOptions): Section {
  const opts = options ?? resolveOptions()
  const offset = bufferReader.getOffset()
  const id = bufferReader.readu8()
  if (!isSectionId(id))
    throw DecodeError.invalidTag(offset, id, 'section id')
  const size = bufferReader.readVecLength()
  opts.log?.(`;;=== ${hex(offset, 1)}: ${SectionNames[id]}, len=${size}`)

  const what = `${SectionNames[id]} section`
  const maxDepth = opts.maxDepth
  switch (id) {
  case SectionId.CUSTOM:
    return {id, offset, size, content: readRegion(bufferReader, size, what, readCustomSection)}
  case SectionId.TYPE:
    return {id, offset, size, content: readRegion(bufferReader, size, what, r => readVec(r, readFuncType))}
  case SectionId.IMPORT:
    return {id, offset, size, content: readRegion(bufferReader, size, what, r => readVec(r, readImport))}
  case SectionId.FUNC:
    return {id, offset, size, content: readRegion(bufferReader, size, what, r => readVec(r, readIndex))}
  case SectionId.TABLE:
    return {id, offset, size, content: readRegion(bufferReader, size, what, r => readVec(r, readTableType))}
  case SectionId.MEMORY:
    return {id, offset, size, content: readRegion(bufferReader, size, what, r => readVec(r, readLimits))}
  case SectionId.GLOBAL:
    return {id, offset, size, content: readRegion(bufferReader, size, what, r => readVec(r, rr => readGlobal(rr, maxDepth)))}
  case SectionId.EXPORT:
    return {id, offset, size, content: readRegion(bufferReader, size, what, r => readVec(r, readExport))}
  case SectionId.START:
    return {id, offset, size, content: readRegion(bufferReader, size, what, r => ({funcIndex: readIndex(r)}))}
  case SectionId.ELEM:
    return {id, offset, size, content: readRegion(bufferReader, size, what, r => readVec(r, rr => readElem(rr, maxDepth)))}
  case SectionId.CODE:
    return {id, offset, size, content: readRegion(bufferReader, size, what, r => readVec(r, rr => readCode(rr, maxDepth)))}
  case SectionId.DATA:
    return {id, offset, size, content: readRegion(bufferReader, size, what, r => readVec(r, rr => readData(rr, maxDepth)))}
  }
}

export function isSectionId(id: number): id is SectionId {
  return Number.isInteger(id) && id >= SectionId.CUSTOM && id <= SectionId.DATA
}

// The name is followed by opaque bytes up to the end of the section.
function readCustomSection(bufferReader: BufferReader): CustomSection {
  const name = bufferReader.readName()
  const bytes = bufferReader.readBytes(bufferReader.remaining())
  return {name, bytes}
}

function readIndex(bufferReader: BufferReader): number {
  return bufferReader.readVarUint(32)
}

function readImport(bufferReader: BufferReader): Import {
  const module = bufferReader.readName()
  const name = bufferReader.readName()
  const offset = bufferReader.getOffset()
  const kind = bufferReader.readu8()
  let desc: ImportDesc
  switch (kind) {
  case ExternalKind.FUNC:
    desc = {kind: ExternalKind.FUNC, typeIndex: readIndex(bufferReader)}
    break
  case ExternalKind.TABLE:
    desc = {kind: ExternalKind.TABLE, table: readTableType(bufferReader)}
    break
  case ExternalKind.MEMORY:
    desc = {kind: ExternalKind.MEMORY, limits: readLimits(bufferReader)}
    break
  case ExternalKind.GLOBAL:
    desc = {kind: ExternalKind.GLOBAL, global: readGlobalType(bufferReader)}
    break
  default:
    throw DecodeError.invalidTag(offset, kind, 'import kind')
  }
  return {module, name, desc}
}

function readGlobal(bufferReader: BufferReader, maxDepth: number): Global {
  const type = readGlobalType(bufferReader)
  const init = readExpr(bufferReader, maxDepth)
  return {type, init}
}

function readExport(bufferReader: BufferReader): Export {
  const name = bufferReader.readName()
  const offset = bufferReader.getOffset()
  const kind = bufferReader.readu8()
  if (!isExternalKind(kind))
    throw DecodeError.invalidTag(offset, kind, 'export kind')
  return {name, kind, index: readIndex(bufferReader)}
}

function isExternalKind(kind: number): kind is ExternalKind {
  switch (kind) {
  case ExternalKind.FUNC:
  case ExternalKind.TABLE:
  case ExternalKind.MEMORY:
  case ExternalKind.GLOBAL:
    return true
  default:
    return false
  }
}

function readElem(bufferReader: BufferReader, maxDepth: number): ElemSegment {
  const tableIndex = readIndex(bufferReader)
  const offset = readExpr(bufferReader, maxDepth)
  const funcIndices = readVec(bufferReader, readIndex)
  return {tableIndex, offset, funcIndices}
}

// Each function body carries its own size and is held to it like a section.
function readCode(bufferReader: BufferReader, maxDepth: number): Code {
  const offset = bufferReader.getOffset()
  const size = bufferReader.readVarUint(32)
  return readRegion(bufferReader, size, `Function body at ${hex(offset)}`, window => {
    const locals = readVec(window, readLocal)
    const body = readExpr(window, maxDepth)
    return {offset, size, locals, body}
  })
}

function readLocal(bufferReader: BufferReader): Local {
  const count = bufferReader.readVarUint(32)
  const type = readValType(bufferReader)
  return {count, type}
}

function readData(bufferReader: BufferReader, maxDepth: number): DataSegment {
  const memoryIndex = readIndex(bufferReader)
  const offset = readExpr(bufferReader, maxDepth)
  const length = bufferReader.readVecLength()
  const bytes = bufferReader.readBytes(length)
  return {memoryIndex, offset, bytes}
}
