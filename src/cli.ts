import fsPromise from 'node:fs/promises'
import {Command, CommanderError, InvalidArgumentError} from 'commander'
import {DisWasm} from './diswasm'
import {decodeModule} from './module_decoder'
import type {LogFunc} from './options'

export interface CliIo {
  readFile: (path: string) => Promise<Uint8Array>
  log: LogFunc
  error: LogFunc
}

const defaultIo: CliIo = {
  readFile: path => fsPromise.readFile(path),
  log: console.log,
  error: console.error,
}

function parseDepth(value: string): number {
  const n = Number(value)
  if (!Number.isInteger(n) || n < 0)
    throw new InvalidArgumentError('Not a non-negative integer.')
  return n
}

// Disassembles the wasm file named in `argv` and returns the exit code.
export async function main(argv: string[], io: CliIo = defaultIo): Promise<number> {
  const program = new Command()
  program
    .name('diswasm')
    .argument('<file>', 'wasm file')
    .option('--dump-addr', 'Dump address')
    .option('--max-depth <n>', 'Maximum nesting of blocks', parseDepth)
    .exitOverride()
    .configureOutput({
      writeOut: s => io.log(s.trimEnd()),
      writeErr: s => io.error(s.trimEnd()),
    })

  try {
    program.parse(argv)
  } catch (e) {
    if (e instanceof CommanderError)
      return e.exitCode
    throw e
  }
  const opts = program.opts<{dumpAddr?: boolean, maxDepth?: number}>()
  const [file] = program.args

  let content: Uint8Array
  try {
    content = await io.readFile(file)
  } catch (e) {
    io.error(`${file}: ${e instanceof Error ? e.message : String(e)}`)
    return 1
  }
  const result = decodeModule(content, {maxDepth: opts.maxDepth})
  if (!result.ok) {
    io.error(`${file}: ${result.error.kind}: ${result.error.message}`)
    return 1
  }

  const diswasm = new DisWasm(result.value, {dumpAddr: opts.dumpAddr})
  diswasm.setLogFunc(io.log)
  diswasm.dump()
  return 0
}
