import opcodes from './opcodes.json'
import {Opcode} from './wasm_types'

// Immediate operands following an opcode.
export enum Imm {
  NONE,
  BLOCK,            // blocktype, body ... end
  IF,               // blocktype, body ... [else ...] end
  LABEL,            // labelidx
  BR_TABLE,         // vec(labelidx) labelidx
  FUNC,             // funcidx
  CALL_INDIRECT,    // typeidx 0x00
  INDEX,            // localidx / globalidx
  MEMARG,           // align offset
  MEMORY_RESERVED,  // 0x00
  I32,
  I64,
  F32,
  F64,
}

export interface InstInfo {
  readonly op: string
  readonly imm: Imm
}

const MEMARG_OPS: Array<[Opcode, string]> = [
  [Opcode.I32_LOAD, 'i32.load'],
  [Opcode.I64_LOAD, 'i64.load'],
  [Opcode.F32_LOAD, 'f32.load'],
  [Opcode.F64_LOAD, 'f64.load'],
  [Opcode.I32_LOAD8_S, 'i32.load8_s'],
  [Opcode.I32_LOAD8_U, 'i32.load8_u'],
  [Opcode.I32_LOAD16_S, 'i32.load16_s'],
  [Opcode.I32_LOAD16_U, 'i32.load16_u'],
  [Opcode.I64_LOAD8_S, 'i64.load8_s'],
  [Opcode.I64_LOAD8_U, 'i64.load8_u'],
  [Opcode.I64_LOAD16_S, 'i64.load16_s'],
  [Opcode.I64_LOAD16_U, 'i64.load16_u'],
  [Opcode.I64_LOAD32_S, 'i64.load32_s'],
  [Opcode.I64_LOAD32_U, 'i64.load32_u'],
  [Opcode.I32_STORE, 'i32.store'],
  [Opcode.I64_STORE, 'i64.store'],
  [Opcode.F32_STORE, 'f32.store'],
  [Opcode.F64_STORE, 'f64.store'],
  [Opcode.I32_STORE8, 'i32.store8'],
  [Opcode.I32_STORE16, 'i32.store16'],
  [Opcode.I64_STORE8, 'i64.store8'],
  [Opcode.I64_STORE16, 'i64.store16'],
  [Opcode.I64_STORE32, 'i64.store32'],
]

function buildTable(): Map<number, InstInfo> {
  const table = new Map<number, InstInfo>([
    [Opcode.UNREACHABLE, {op: 'unreachable', imm: Imm.NONE}],
    [Opcode.NOP, {op: 'nop', imm: Imm.NONE}],
    [Opcode.BLOCK, {op: 'block', imm: Imm.BLOCK}],
    [Opcode.LOOP, {op: 'loop', imm: Imm.BLOCK}],
    [Opcode.IF, {op: 'if', imm: Imm.IF}],
    [Opcode.BR, {op: 'br', imm: Imm.LABEL}],
    [Opcode.BR_IF, {op: 'br_if', imm: Imm.LABEL}],
    [Opcode.BR_TABLE, {op: 'br_table', imm: Imm.BR_TABLE}],
    [Opcode.RETURN, {op: 'return', imm: Imm.NONE}],
    [Opcode.CALL, {op: 'call', imm: Imm.FUNC}],
    [Opcode.CALL_INDIRECT, {op: 'call_indirect', imm: Imm.CALL_INDIRECT}],
    [Opcode.DROP, {op: 'drop', imm: Imm.NONE}],
    [Opcode.SELECT, {op: 'select', imm: Imm.NONE}],
    [Opcode.LOCAL_GET, {op: 'local.get', imm: Imm.INDEX}],
    [Opcode.LOCAL_SET, {op: 'local.set', imm: Imm.INDEX}],
    [Opcode.LOCAL_TEE, {op: 'local.tee', imm: Imm.INDEX}],
    [Opcode.GLOBAL_GET, {op: 'global.get', imm: Imm.INDEX}],
    [Opcode.GLOBAL_SET, {op: 'global.set', imm: Imm.INDEX}],
    [Opcode.MEMORY_SIZE, {op: 'memory.size', imm: Imm.MEMORY_RESERVED}],
    [Opcode.MEMORY_GROW, {op: 'memory.grow', imm: Imm.MEMORY_RESERVED}],
    [Opcode.I32_CONST, {op: 'i32.const', imm: Imm.I32}],
    [Opcode.I64_CONST, {op: 'i64.const', imm: Imm.I64}],
    [Opcode.F32_CONST, {op: 'f32.const', imm: Imm.F32}],
    [Opcode.F64_CONST, {op: 'f64.const', imm: Imm.F64}],
  ])
  for (const [opcode, op] of MEMARG_OPS)
    table.set(opcode, {op, imm: Imm.MEMARG})
  for (const [opcode, op] of Object.entries(opcodes.numeric))
    table.set(Number(opcode), {op, imm: Imm.NONE})
  return table
}

// Single-byte opcodes. `else` and `end` are structural and handled by the
// instruction decoder itself.
export const InstTable: ReadonlyMap<number, InstInfo> = buildTable()

// Selectors following the 0xFC prefix.
export const InstTableFC: ReadonlyMap<number, InstInfo> = new Map(
  Object.entries(opcodes.prefixFC).map(([sel, op]): [number, InstInfo] => [Number(sel), {op, imm: Imm.NONE}]))

export function opcodeName(opcode: number, opcodeEx?: number): string | undefined {
  switch (opcode) {
  case Opcode.ELSE:  return 'else'
  case Opcode.END:   return 'end'
  case Opcode.PREFIX_FC:
    return opcodeEx == null ? undefined : InstTableFC.get(opcodeEx)?.op
  default:
    return InstTable.get(opcode)?.op
  }
}
