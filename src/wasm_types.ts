export const WASM_MAGIC = 0x6d736100  // '\0asm', little-endian
export const WASM_VERSION = 1

export enum SectionId {
  CUSTOM    = 0,
  TYPE      = 1,
  IMPORT    = 2,
  FUNC      = 3,
  TABLE     = 4,
  MEMORY    = 5,
  GLOBAL    = 6,
  EXPORT    = 7,
  START     = 8,
  ELEM      = 9,
  CODE      = 10,
  DATA      = 11,
}

export const SectionNames: Record<SectionId, string> = {
  [SectionId.CUSTOM]: 'CUSTOM',
  [SectionId.TYPE]: 'TYPE',
  [SectionId.IMPORT]: 'IMPORT',
  [SectionId.FUNC]: 'FUNC',
  [SectionId.TABLE]: 'TABLE',
  [SectionId.MEMORY]: 'MEMORY',
  [SectionId.GLOBAL]: 'GLOBAL',
  [SectionId.EXPORT]: 'EXPORT',
  [SectionId.START]: 'START',
  [SectionId.ELEM]: 'ELEM',
  [SectionId.CODE]: 'CODE',
  [SectionId.DATA]: 'DATA',
}

// Opcodes the decoder treats specially. Operand-less numeric instructions
// are listed in opcodes.json.
export enum Opcode {
  UNREACHABLE   = 0x00,
  NOP           = 0x01,
  BLOCK         = 0x02,
  LOOP          = 0x03,
  IF            = 0x04,
  ELSE          = 0x05,
  END           = 0x0b,
  BR            = 0x0c,
  BR_IF         = 0x0d,
  BR_TABLE      = 0x0e,
  RETURN        = 0x0f,
  CALL          = 0x10,
  CALL_INDIRECT = 0x11,
  DROP          = 0x1a,
  SELECT        = 0x1b,
  LOCAL_GET     = 0x20,
  LOCAL_SET     = 0x21,
  LOCAL_TEE     = 0x22,
  GLOBAL_GET    = 0x23,
  GLOBAL_SET    = 0x24,
  I32_LOAD      = 0x28,
  I64_LOAD      = 0x29,
  F32_LOAD      = 0x2a,
  F64_LOAD      = 0x2b,
  I32_LOAD8_S   = 0x2c,
  I32_LOAD8_U   = 0x2d,
  I32_LOAD16_S  = 0x2e,
  I32_LOAD16_U  = 0x2f,
  I64_LOAD8_S   = 0x30,
  I64_LOAD8_U   = 0x31,
  I64_LOAD16_S  = 0x32,
  I64_LOAD16_U  = 0x33,
  I64_LOAD32_S  = 0x34,
  I64_LOAD32_U  = 0x35,
  I32_STORE     = 0x36,
  I64_STORE     = 0x37,
  F32_STORE     = 0x38,
  F64_STORE     = 0x39,
  I32_STORE8    = 0x3a,
  I32_STORE16   = 0x3b,
  I64_STORE8    = 0x3c,
  I64_STORE16   = 0x3d,
  I64_STORE32   = 0x3e,
  MEMORY_SIZE   = 0x3f,
  MEMORY_GROW   = 0x40,
  I32_CONST     = 0x41,
  I64_CONST     = 0x42,
  F32_CONST     = 0x43,
  F64_CONST     = 0x44,
  PREFIX_FC     = 0xfc,
}

export enum ValType {
  I32 = 0x7f,
  I64 = 0x7e,
  F32 = 0x7d,
  F64 = 0x7c,
}

export const BLOCK_TYPE_EMPTY = 0x40
export const FUNC_TYPE_TAG = 0x60
export const FUNCREF = 0x70

export enum ExternalKind {
  FUNC   = 0,
  TABLE  = 1,
  MEMORY = 2,
  GLOBAL = 3,
}

export function valTypeName(t: ValType): string {
  switch (t) {
  case ValType.I32:  return 'i32'
  case ValType.I64:  return 'i64'
  case ValType.F32:  return 'f32'
  case ValType.F64:  return 'f64'
  }
}

// Types

export type BlockType =
  | {readonly kind: 'empty'}
  | {readonly kind: 'value', readonly type: ValType}
  | {readonly kind: 'index', readonly index: number}

export interface FuncType {
  readonly params: readonly ValType[]
  readonly results: readonly ValType[]
}

export interface Limits {
  readonly min: number
  readonly max?: number
}

export interface TableType {
  readonly elemType: typeof FUNCREF
  readonly limits: Limits
}

export interface GlobalType {
  readonly type: ValType
  readonly mutable: boolean
}

export interface MemoryArg {
  readonly align: number
  readonly offset: number
}

// Instructions

export enum InstKind {
  PLAIN,
  BLOCK,
  IF,
  BRANCH,
  BR_TABLE,
  CALL,
  CALL_INDIRECT,
  VARIABLE,
  MEMORY,
  MEMORY_RESERVED,
  I32_CONST,
  I64_CONST,
  F32_CONST,
  F64_CONST,
}

interface InstBase {
  readonly opcode: number
  readonly opcodeEx?: number  // selector following a prefix opcode
  readonly op: string         // mnemonic
  readonly offset: number     // of the opcode byte
}

export interface PlainInst extends InstBase { readonly kind: InstKind.PLAIN }
// block and loop
export interface BlockInst extends InstBase {
  readonly kind: InstKind.BLOCK
  readonly blockType: BlockType
  readonly body: readonly Instruction[]
}
export interface IfInst extends InstBase {
  readonly kind: InstKind.IF
  readonly blockType: BlockType
  readonly consequent: readonly Instruction[]
  readonly alternative: readonly Instruction[]
}
// br and br_if
export interface BranchInst extends InstBase { readonly kind: InstKind.BRANCH, readonly label: number }
export interface BrTableInst extends InstBase {
  readonly kind: InstKind.BR_TABLE
  readonly labels: readonly number[]
  readonly defaultLabel: number
}
export interface CallInst extends InstBase { readonly kind: InstKind.CALL, readonly funcIndex: number }
export interface CallIndirectInst extends InstBase {
  readonly kind: InstKind.CALL_INDIRECT
  readonly typeIndex: number
  readonly tableIndex: number
}
// local.* and global.*
export interface VariableInst extends InstBase { readonly kind: InstKind.VARIABLE, readonly index: number }
export interface MemoryInst extends InstBase { readonly kind: InstKind.MEMORY, readonly memarg: MemoryArg }
// memory.size and memory.grow
export interface MemoryReservedInst extends InstBase { readonly kind: InstKind.MEMORY_RESERVED }
export interface I32ConstInst extends InstBase { readonly kind: InstKind.I32_CONST, readonly value: number }
export interface I64ConstInst extends InstBase { readonly kind: InstKind.I64_CONST, readonly value: bigint }
// `bits` is the raw IEEE 754 encoding, NaN payload included.
export interface F32ConstInst extends InstBase {
  readonly kind: InstKind.F32_CONST
  readonly value: number
  readonly bits: number
}
export interface F64ConstInst extends InstBase {
  readonly kind: InstKind.F64_CONST
  readonly value: number
  readonly bits: bigint
}

export type Instruction =
  | PlainInst
  | BlockInst
  | IfInst
  | BranchInst
  | BrTableInst
  | CallInst
  | CallIndirectInst
  | VariableInst
  | MemoryInst
  | MemoryReservedInst
  | I32ConstInst
  | I64ConstInst
  | F32ConstInst
  | F64ConstInst

// Instruction sequence terminated by `end` (not included).
export type Expr = readonly Instruction[]

// Sections

export interface CustomSection {
  readonly name: string
  readonly bytes: Uint8Array  // view into the input buffer
}

export type ImportDesc =
  | {readonly kind: ExternalKind.FUNC, readonly typeIndex: number}
  | {readonly kind: ExternalKind.TABLE, readonly table: TableType}
  | {readonly kind: ExternalKind.MEMORY, readonly limits: Limits}
  | {readonly kind: ExternalKind.GLOBAL, readonly global: GlobalType}

export interface Import {
  readonly module: string
  readonly name: string
  readonly desc: ImportDesc
}

export interface Global {
  readonly type: GlobalType
  readonly init: Expr
}

export interface Export {
  readonly name: string
  readonly kind: ExternalKind
  readonly index: number
}

export interface Start {
  readonly funcIndex: number
}

export interface ElemSegment {
  readonly tableIndex: number
  readonly offset: Expr
  readonly funcIndices: readonly number[]
}

export interface Local {
  readonly count: number
  readonly type: ValType
}

export interface Code {
  readonly offset: number  // of the size prefix
  readonly size: number
  readonly locals: readonly Local[]
  readonly body: Expr
}

export interface DataSegment {
  readonly memoryIndex: number
  readonly offset: Expr
  readonly bytes: Uint8Array  // view into the input buffer
}

export interface SectionContentMap {
  [SectionId.CUSTOM]: CustomSection
  [SectionId.TYPE]: readonly FuncType[]
  [SectionId.IMPORT]: readonly Import[]
  [SectionId.FUNC]: readonly number[]
  [SectionId.TABLE]: readonly TableType[]
  [SectionId.MEMORY]: readonly Limits[]
  [SectionId.GLOBAL]: readonly Global[]
  [SectionId.EXPORT]: readonly Export[]
  [SectionId.START]: Start
  [SectionId.ELEM]: readonly ElemSegment[]
  [SectionId.CODE]: readonly Code[]
  [SectionId.DATA]: readonly DataSegment[]
}

export type SectionOf<K extends SectionId> = {
  readonly id: K
  readonly offset: number  // of the id byte
  readonly size: number    // declared payload size
  readonly content: SectionContentMap[K]
}

export type Section = {[K in SectionId]: SectionOf<K>}[SectionId]

export interface Module {
  readonly version: number
  readonly sections: readonly Section[]
}

export function getSection<K extends SectionId>(module: Module, id: K): SectionContentMap[K] | undefined {
  for (const section of module.sections) {
    if (isSection(section, id))
      return section.content
  }
  return undefined
}

export function getCustomSections(module: Module, name?: string): CustomSection[] {
  const result = new Array<CustomSection>()
  for (const section of module.sections) {
    if (isSection(section, SectionId.CUSTOM) && (name == null || section.content.name === name))
      result.push(section.content)
  }
  return result
}

function isSection<K extends SectionId>(section: {readonly id: SectionId}, id: K): section is SectionOf<K> {
  return section.id === id
}
