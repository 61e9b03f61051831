import {BufferReader} from './buffer_reader'
import {DecodeError} from './decode_error'
import {
  BLOCK_TYPE_EMPTY, FUNCREF, FUNC_TYPE_TAG, ValType,
  type BlockType, type FuncType, type GlobalType, type Limits, type TableType,
} from './wasm_types'

export function isValType(byte: number): byte is ValType {
  switch (byte) {
  case ValType.I32:
  case ValType.I64:
  case ValType.F32:
  case ValType.F64:
    return true
  default:
    return false
  }
}

export function readValType(bufferReader: BufferReader): ValType {
  const offset = bufferReader.getOffset()
  const t = bufferReader.readu8()
  if (!isValType(t))
    throw DecodeError.invalidTag(offset, t, 'value type')
  return t
}

export function readResultType(bufferReader: BufferReader): ValType[] {
  const count = bufferReader.readVecLength()
  const types = new Array<ValType>()
  for (let i = 0; i < count; ++i)
    types.push(readValType(bufferReader))
  return types
}

export function readFuncType(bufferReader: BufferReader): FuncType {
  expectTag(bufferReader, FUNC_TYPE_TAG, 'function type')
  const params = readResultType(bufferReader)
  const results = readResultType(bufferReader)
  return {params, results}
}

export function readLimits(bufferReader: BufferReader): Limits {
  const offset = bufferReader.getOffset()
  const flag = bufferReader.readu8()
  switch (flag) {
  case 0x00:
    return {min: bufferReader.readVarUint(32)}
  case 0x01:
    {
      const min = bufferReader.readVarUint(32)
      const max = bufferReader.readVarUint(32)
      return {min, max}
    }
  default:
    throw DecodeError.invalidTag(offset, flag, 'limits flag')
  }
}

export function readElemType(bufferReader: BufferReader): typeof FUNCREF {
  expectTag(bufferReader, FUNCREF, 'element type')
  return FUNCREF
}

export function readTableType(bufferReader: BufferReader): TableType {
  const elemType = readElemType(bufferReader)
  const limits = readLimits(bufferReader)
  return {elemType, limits}
}

export function readGlobalType(bufferReader: BufferReader): GlobalType {
  const type = readValType(bufferReader)
  const offset = bufferReader.getOffset()
  const mut = bufferReader.readu8()
  if (mut !== 0x00 && mut !== 0x01)
    throw DecodeError.invalidTag(offset, mut, 'mutability')
  return {type, mutable: mut === 0x01}
}

// The three alternatives are told apart by the leading byte: 0x40, a value
// type, or else a non-negative s33 type index.
export function readBlockType(bufferReader: BufferReader): BlockType {
  const offset = bufferReader.getOffset()
  const t = bufferReader.peeku8()
  if (t === BLOCK_TYPE_EMPTY) {
    bufferReader.readu8()
    return {kind: 'empty'}
  }
  if (isValType(t)) {
    bufferReader.readu8()
    return {kind: 'value', type: t}
  }
  const index = bufferReader.readVarInt(33)
  if (index < 0)
    throw DecodeError.invalidTag(offset, t, 'block type')
  return {kind: 'index', index}
}

function expectTag(bufferReader: BufferReader, tag: number, what: string): void {
  const offset = bufferReader.getOffset()
  const t = bufferReader.readu8()
  if (t !== tag)
    throw DecodeError.invalidTag(offset, t, what)
}
