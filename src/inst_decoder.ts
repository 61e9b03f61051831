import {BufferReader} from './buffer_reader'
import {DecodeError, ErrorKind, hex} from './decode_error'
import {Imm, InstTable, InstTableFC, type InstInfo} from './inst_table'
import {DEFAULT_MAX_DEPTH} from './options'
import {readBlockType} from './type_decoder'
import {InstKind, Opcode, type Expr, type Instruction, type MemoryArg} from './wasm_types'

// An open block/loop/if (or the top-level expression) whose body is still
// being read. Instructions are appended to `body`, which is the same array
// the already-emitted instruction holds.
interface Frame {
  readonly depth: number
  readonly isIf: boolean
  body: Instruction[]
  alternative?: Instruction[]
}

// Reads instructions up to and including the `end` that closes the
// expression.
export function readExpr(bufferReader: BufferReader, maxDepth = DEFAULT_MAX_DEPTH): Expr {
  const root: Frame = {depth: 0, isIf: false, body: []}
  readBodies(bufferReader, [root], maxDepth)
  return root.body
}

// Reads one instruction. For block, loop and if this includes the whole
// nested body and its closing `end`.
export function readInst(bufferReader: BufferReader, maxDepth = DEFAULT_MAX_DEPTH): Instruction {
  const offset = bufferReader.getOffset()
  const op = bufferReader.readu8()
  if (op === Opcode.ELSE || op === Opcode.END)
    throw DecodeError.invalidTag(offset, op, 'instruction position')

  const parent: Frame = {depth: 0, isIf: false, body: []}
  const frame = readOne(bufferReader, op, offset, parent, maxDepth)
  if (frame != null)
    readBodies(bufferReader, [frame], maxDepth)
  return parent.body[0]
}

// Consumes bytes until every frame on the stack is closed. The tree is built
// with this explicit stack so nesting depth never maps onto the call stack.
function readBodies(bufferReader: BufferReader, stack: Frame[], maxDepth: number): void {
  while (stack.length > 0) {
    const top = stack[stack.length - 1]
    const offset = bufferReader.getOffset()
    const op = bufferReader.readu8()

    switch (op) {
    case Opcode.END:
      stack.pop()
      continue
    case Opcode.ELSE:
      if (!top.isIf || top.alternative == null || top.body === top.alternative)
        throw DecodeError.invalidTag(offset, op, 'instruction position')
      top.body = top.alternative
      continue
    default:
      break
    }

    const frame = readOne(bufferReader, op, offset, top, maxDepth)
    if (frame != null)
      stack.push(frame)
  }
}

// Decodes the instruction starting with `op` and appends it to `parent`.
// Returns a new frame when the instruction opens a block.
function readOne(bufferReader: BufferReader, op: number, offset: number, parent: Frame,
                 maxDepth: number): Frame | undefined {
  if (op === Opcode.PREFIX_FC) {
    const opcodeEx = bufferReader.readVarUint(32)
    const info = InstTableFC.get(opcodeEx)
    if (info == null)
      throw new DecodeError(ErrorKind.UNKNOWN_OPCODE, offset, `Unknown opcode: ${hex(op)} ${opcodeEx}`,
                            {byte: op, selector: opcodeEx})
    parent.body.push({kind: InstKind.PLAIN, opcode: op, opcodeEx, op: info.op, offset})
    return undefined
  }

  const info = InstTable.get(op)
  if (info == null)
    throw new DecodeError(ErrorKind.UNKNOWN_OPCODE, offset, `Unknown opcode: ${hex(op)}`, {byte: op})

  switch (info.imm) {
  case Imm.BLOCK:
  case Imm.IF:
    {
      const depth = parent.depth + 1
      if (depth > maxDepth)
        throw new DecodeError(ErrorKind.NESTING_LIMIT, offset, `Blocks nested deeper than ${maxDepth}`)
      const blockType = readBlockType(bufferReader)
      const body = new Array<Instruction>()
      if (info.imm === Imm.BLOCK) {
        parent.body.push({kind: InstKind.BLOCK, opcode: op, op: info.op, offset, blockType, body})
        return {depth, isIf: false, body}
      }
      const alternative = new Array<Instruction>()
      parent.body.push({kind: InstKind.IF, opcode: op, op: info.op, offset, blockType,
                        consequent: body, alternative})
      return {depth, isIf: true, body, alternative}
    }
  default:
    parent.body.push(readImmediates(bufferReader, op, offset, info))
    return undefined
  }
}

function readImmediates(bufferReader: BufferReader, opcode: number, offset: number, info: InstInfo): Instruction {
  const op = info.op
  switch (info.imm) {
  case Imm.NONE:
    return {kind: InstKind.PLAIN, opcode, op, offset}
  case Imm.LABEL:
    return {kind: InstKind.BRANCH, opcode, op, offset, label: bufferReader.readVarUint(32)}
  case Imm.BR_TABLE:
    {
      const count = bufferReader.readVecLength()
      const labels = new Array<number>()
      for (let i = 0; i < count; ++i)
        labels.push(bufferReader.readVarUint(32))
      const defaultLabel = bufferReader.readVarUint(32)
      return {kind: InstKind.BR_TABLE, opcode, op, offset, labels, defaultLabel}
    }
  case Imm.FUNC:
    return {kind: InstKind.CALL, opcode, op, offset, funcIndex: bufferReader.readVarUint(32)}
  case Imm.CALL_INDIRECT:
    {
      const typeIndex = bufferReader.readVarUint(32)
      const tableIndex = readReserved(bufferReader)
      return {kind: InstKind.CALL_INDIRECT, opcode, op, offset, typeIndex, tableIndex}
    }
  case Imm.INDEX:
    return {kind: InstKind.VARIABLE, opcode, op, offset, index: bufferReader.readVarUint(32)}
  case Imm.MEMARG:
    return {kind: InstKind.MEMORY, opcode, op, offset, memarg: readMemArg(bufferReader)}
  case Imm.MEMORY_RESERVED:
    readReserved(bufferReader)
    return {kind: InstKind.MEMORY_RESERVED, opcode, op, offset}
  case Imm.I32:
    return {kind: InstKind.I32_CONST, opcode, op, offset, value: bufferReader.readVarInt(32)}
  case Imm.I64:
    return {kind: InstKind.I64_CONST, opcode, op, offset, value: bufferReader.readVarInt64()}
  case Imm.F32:
    {
      const bits = bufferReader.readu32()
      return {kind: InstKind.F32_CONST, opcode, op, offset, value: f32FromBits(bits), bits}
    }
  case Imm.F64:
    {
      const bits = bufferReader.readu64()
      return {kind: InstKind.F64_CONST, opcode, op, offset, value: f64FromBits(bits), bits}
    }
  case Imm.BLOCK:
  case Imm.IF:
    throw new Error(`Structured instruction ${op} reached readImmediates`)
  }
}

const scratch = new DataView(new ArrayBuffer(8))

function f32FromBits(bits: number): number {
  scratch.setUint32(0, bits, true)
  return scratch.getFloat32(0, true)
}

function f64FromBits(bits: bigint): number {
  scratch.setBigUint64(0, bits, true)
  return scratch.getFloat64(0, true)
}

function readMemArg(bufferReader: BufferReader): MemoryArg {
  const align = bufferReader.readVarUint(32)
  const offset = bufferReader.readVarUint(32)
  return {align, offset}
}

// Reserved index byte; only memory/table 0 exists.
function readReserved(bufferReader: BufferReader): number {
  const offset = bufferReader.getOffset()
  const b = bufferReader.readu8()
  if (b !== 0x00)
    throw DecodeError.invalidTag(offset, b, 'reserved byte')
  return b
}
