import {tryDecode} from './decode_error'
import {NAME_SECTION, decodeNameSection} from './name_section'
import type {LogFunc} from './options'
import {
  ExternalKind, InstKind, SectionId, valTypeName,
  type BlockType, type Code, type CustomSection, type DataSegment, type ElemSegment, type Export, type Expr,
  type FuncType, type Global, type GlobalType, type Import, type Instruction, type Limits, type Local, type Module,
  type Section, type TableType,
} from './wasm_types'

export interface DisWasmOptions {
  dumpAddr?: boolean
}

const KindNames: Record<ExternalKind, string> = {
  [ExternalKind.FUNC]: 'func',
  [ExternalKind.TABLE]: 'table',
  [ExternalKind.MEMORY]: 'memory',
  [ExternalKind.GLOBAL]: 'global',
}

let SPACES = '    '
function makeIndent(indent: number): string {
  const len = indent * 2
  while (len > SPACES.length)
    SPACES += SPACES
  return SPACES.slice(0, len)
}

function funcTypeToString(t: FuncType): string {
  const params = t.params.length === 0 ? '' : ` (param ${t.params.map(valTypeName).join(' ')})`
  const results = t.results.length === 0 ? '' : ` (result ${t.results.map(valTypeName).join(' ')})`
  return `(func${params}${results})`
}

function limitsToString(limits: Limits): string {
  return limits.max == null ? `${limits.min}` : `${limits.min} ${limits.max}`
}

function globalTypeToString(t: GlobalType): string {
  return t.mutable ? `(mut ${valTypeName(t.type)})` : valTypeName(t.type)
}

function blockTypeToString(t: BlockType): string {
  switch (t.kind) {
  case 'empty':  return ''
  case 'value':  return ` (result ${valTypeName(t.type)})`
  case 'index':  return ` (type ${t.index})`
  }
}

// Locals are spelled out one by one up to this many; larger declarations
// are printed as one line per group.
const MAX_INLINE_LOCALS = 64

const F32_PAYLOAD_MASK = 0x7fffff
const F32_CANONICAL_NAN = 0x400000
const F64_PAYLOAD_MASK = 0xfffffffffffffn
const F64_CANONICAL_NAN = 0x8000000000000n

function floatToString(x: number, negative: boolean, payload: number | bigint, canonical: number | bigint): string {
  if (x === Number.POSITIVE_INFINITY)
    return 'inf'
  if (x === Number.NEGATIVE_INFINITY)
    return '-inf'
  if (isNaN(x)) {
    const sign = negative ? '-' : ''
    return payload === canonical ? `${sign}nan` : `${sign}nan:0x${payload.toString(16)}`
  }
  return x.toString()
}

type DumpTask = {readonly inst: Instruction, readonly indent: number} | string

// Queues `insts` so that they are popped in order.
function pushInsts(tasks: DumpTask[], insts: Expr, indent: number): void {
  for (let i = insts.length; --i >= 0; )
    tasks.push({inst: insts[i], indent})
}

// Alignment (as a power of two) a memory instruction gets when none is written.
function naturalAlign(op: string): number {
  if (/(load8|store8)/.test(op))
    return 0
  if (/(load16|store16)/.test(op))
    return 1
  if (/(^i32|^f32|load32|store32)/.test(op))
    return 2
  return 3
}

function escapeChar(c: number): string {
  switch (c) {
  case 34:  return '\\"'
  case 92:  return '\\\\'
  default:
    if (c < 0x20 || c > 0x7e)
      return `\\${c.toString(16).padStart(2, '0')}`
    return String.fromCharCode(c)
  }
}

// Prints a decoded module as WebAssembly text.
export class DisWasm {
  private log: LogFunc = console.log
  private functions = new Array<number>()
  private importFuncCount = 0
  private funcs = new Map<number, string>()
  private globals = new Map<number, string>()
  private funcNames = new Map<number, string>()

  constructor(private module: Module, private opts: DisWasmOptions = {}) {
  }

  public setLogFunc(logFunc: LogFunc): void {
    this.log = logFunc
  }

  public dump(): void {
    this.log('(module')
    this.log(`;; WASM version: ${this.module.version}`)
    this.findNameInfo()
    for (const section of this.module.sections)
      this.dumpSection(section)
    this.log(')')
  }

  private findNameInfo(): void {
    for (const section of this.module.sections) {
      if (section.id !== SectionId.CUSTOM || section.content.name !== NAME_SECTION)
        continue
      const custom = section.content
      const result = tryDecode(() => decodeNameSection(custom))
      if (result.ok)
        this.funcNames = new Map(result.value.functionNames)
      else
        this.log(`;; Ignoring malformed name section: ${result.error.message}`)
    }
  }

  private dumpSection(section: Section): void {
    switch (section.id) {
    case SectionId.CUSTOM:  this.dumpCustom(section.offset, section.content); break
    case SectionId.TYPE:    this.dumpTypes(section.content); break
    case SectionId.IMPORT:  this.dumpImports(section.content); break
    case SectionId.FUNC:    this.dumpFuncs(section.content); break
    case SectionId.TABLE:   this.dumpTables(section.content); break
    case SectionId.MEMORY:  this.dumpMemories(section.content); break
    case SectionId.GLOBAL:  this.dumpGlobals(section.content); break
    case SectionId.EXPORT:  this.dumpExports(section.content); break
    case SectionId.START:   this.log(`(start ${this.funcRef(section.content.funcIndex)})`); break
    case SectionId.ELEM:    this.dumpElems(section.content); break
    case SectionId.CODE:    this.dumpCodes(section.content); break
    case SectionId.DATA:    this.dumpData(section.content); break
    }
  }

  private dumpCustom(offset: number, custom: CustomSection): void {
    this.log(`${this.addr(offset)};; (custom "${custom.name}")`)
  }

  private dumpTypes(types: readonly FuncType[]): void {
    types.forEach((type, i) => this.log(`(type ${funcTypeToString(type)})  ;; ${i}`))
  }

  private dumpImports(imports: readonly Import[]): void {
    for (const {module: modName, name, desc} of imports) {
      switch (desc.kind) {
      case ExternalKind.FUNC:
        {
          const index = this.importFuncCount++
          this.log(`(import "${modName}" "${name}" (func $${name} (type ${desc.typeIndex})))  ;; ${index}`)
          this.funcs.set(index, name)
        }
        break
      case ExternalKind.TABLE:
        this.log(`(import "${modName}" "${name}" ${this.tableToString(desc.table)})`)
        break
      case ExternalKind.MEMORY:
        this.log(`(import "${modName}" "${name}" (memory ${limitsToString(desc.limits)}))`)
        break
      case ExternalKind.GLOBAL:
        {
          const index = this.globals.size
          this.log(`(import "${modName}" "${name}" (global ${globalTypeToString(desc.global)}))  ;; ${index}`)
          this.globals.set(index, name)
        }
        break
      }
    }
  }

  private dumpFuncs(typeIndices: readonly number[]): void {
    this.log(`;; func: #${typeIndices.length}`)
    typeIndices.forEach((typeIndex, i) => {
      this.functions.push(typeIndex)
      this.log(`;;   func ${i + this.importFuncCount}: type=#${typeIndex}`)
    })
  }

  private tableToString(table: TableType): string {
    return `(table ${limitsToString(table.limits)} funcref)`
  }

  private dumpTables(tables: readonly TableType[]): void {
    tables.forEach((table, i) => this.log(`${this.tableToString(table)}  ;; ${i}`))
  }

  private dumpMemories(memories: readonly Limits[]): void {
    for (const limits of memories)
      this.log(`(memory ${limitsToString(limits)})`)
  }

  private dumpGlobals(globals: readonly Global[]): void {
    globals.forEach((global, i) => {
      this.log(`(global (;${i};) ${globalTypeToString(global.type)} ${this.inlineExpr(global.init)})`)
    })
  }

  private dumpExports(exports: readonly Export[]): void {
    for (const {name, kind, index} of exports) {
      this.log(`(export "${name}" (${KindNames[kind]} ${index}))`)
      if (kind === ExternalKind.FUNC && !this.funcs.has(index))
        this.funcs.set(index, name)
    }
  }

  private dumpElems(segments: readonly ElemSegment[]): void {
    segments.forEach((segment, i) => {
      const elements = segment.funcIndices.map(index => this.funcRef(index))
      this.log(`(elem ${this.inlineExpr(segment.offset)} func ${elements.join(' ')})  ;; ${i}`)
    })
  }

  private dumpCodes(codes: readonly Code[]): void {
    codes.forEach((code, i) => {
      const funcNo = i + this.importFuncCount
      const name = this.funcName(funcNo)
      const funcComment = name != null ? `${name} (;${funcNo};)` : `(;${funcNo};)`
      const typeIndex = this.functions[i]
      const type = typeIndex == null ? '' : ` (type ${typeIndex})`
      this.log(`${this.addr(code.offset)}(func ${funcComment}${type}`)
      this.dumpLocals(code.locals)
      this.dumpInsts(code.body, 1)
      this.log(')')
    })
  }

  private dumpLocals(locals: readonly Local[]): void {
    const total = locals.reduce((sum, local) => sum + local.count, 0)
    if (total === 0)
      return
    if (total <= MAX_INLINE_LOCALS) {
      const types = locals.flatMap(local => new Array<string>(local.count).fill(valTypeName(local.type)))
      this.log(`  (local ${types.join(' ')})`)
      return
    }
    for (const local of locals) {
      if (local.count > 0)
        this.log(`  (local ${valTypeName(local.type)})  ;; x${local.count}`)
    }
  }

  // Nested bodies go through an explicit task stack, not recursion.
  private dumpInsts(insts: Expr, indent: number): void {
    const tasks = new Array<DumpTask>()
    pushInsts(tasks, insts, indent)
    for (let task = tasks.pop(); task != null; task = tasks.pop()) {
      if (typeof task === 'string') {
        this.log(task)
        continue
      }

      const {inst} = task
      const spaces = makeIndent(task.indent)
      this.log(`${this.addr(inst.offset)}${spaces}${this.instToString(inst)}`.trimEnd())
      switch (inst.kind) {
      case InstKind.BLOCK:
        tasks.push(`${spaces}end`)
        pushInsts(tasks, inst.body, task.indent + 1)
        break
      case InstKind.IF:
        tasks.push(`${spaces}end`)
        if (inst.alternative.length > 0) {
          pushInsts(tasks, inst.alternative, task.indent + 1)
          tasks.push(`${spaces}else`)
        }
        pushInsts(tasks, inst.consequent, task.indent + 1)
        break
      default:
        break
      }
    }
  }

  private instToString(inst: Instruction): string {
    switch (inst.kind) {
    case InstKind.PLAIN:
    case InstKind.MEMORY_RESERVED:
      return inst.op
    case InstKind.BLOCK:
    case InstKind.IF:
      return `${inst.op}${blockTypeToString(inst.blockType)}`
    case InstKind.BRANCH:
      return `${inst.op} ${inst.label}`
    case InstKind.BR_TABLE:
      return `${inst.op} ${[...inst.labels, inst.defaultLabel].join(' ')}`
    case InstKind.CALL:
      return `${inst.op} ${this.funcRef(inst.funcIndex)}`
    case InstKind.CALL_INDIRECT:
      return `${inst.op} (type ${inst.typeIndex})`
    case InstKind.VARIABLE:
      {
        const name = inst.op.startsWith('global.') ? this.globals.get(inst.index) : undefined
        return `${inst.op} ${name != null ? `$${name}` : inst.index}`
      }
    case InstKind.MEMORY:
      {
        const {align, offset} = inst.memarg
        const attrs = new Array<string>()
        if (offset !== 0)
          attrs.push(`offset=${offset}`)
        if (align !== naturalAlign(inst.op))
          attrs.push(`align=${2 ** align}`)
        return [inst.op, ...attrs].join(' ')
      }
    case InstKind.I32_CONST:
    case InstKind.I64_CONST:
      return `${inst.op} ${inst.value.toString()}`
    case InstKind.F32_CONST:
      return `${inst.op} ${floatToString(inst.value, inst.bits >>> 31 !== 0, inst.bits & F32_PAYLOAD_MASK, F32_CANONICAL_NAN)}`
    case InstKind.F64_CONST:
      return `${inst.op} ${floatToString(inst.value, inst.bits >> 63n !== 0n, inst.bits & F64_PAYLOAD_MASK, F64_CANONICAL_NAN)}`
    }
  }

  // Initializer expressions, e.g. `(i32.const 8)`.
  private inlineExpr(expr: Expr): string {
    return expr.map(inst => `(${this.instToString(inst)})`).join(' ')
  }

  private dumpData(segments: readonly DataSegment[]): void {
    segments.forEach((segment, i) => {
      const data = Array.from(segment.bytes, escapeChar).join('')
      this.log(`(data (;${i};) ${this.inlineExpr(segment.offset)} "${data}")`)
    })
  }

  private funcName(funcNo: number): string | undefined {
    const name = this.funcNames.get(funcNo) ?? this.funcs.get(funcNo)
    return name == null ? name : `$${name}`  // '$' is prepended.
  }

  private funcRef(funcNo: number): string {
    return this.funcName(funcNo) ?? `${funcNo}`
  }

  private addr(adr: number): string {
    return this.opts.dumpAddr ? `(;${adr.toString(16).padStart(5, '0')};) ` : ''
  }
}
