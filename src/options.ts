export type LogFunc = (s: string) => void

export interface DecoderOptions {
  // Maximum number of nested block/loop/if constructs in one expression.
  maxDepth?: number
  // Receives one trace line per decoded section.
  log?: LogFunc
}

export interface ResolvedOptions {
  readonly maxDepth: number
  readonly log?: LogFunc
}

export const DEFAULT_MAX_DEPTH = 1024

export function resolveOptions(opts: DecoderOptions = {}): ResolvedOptions {
  const maxDepth = opts.maxDepth ?? DEFAULT_MAX_DEPTH
  if (!Number.isInteger(maxDepth) || maxDepth < 0)
    throw new RangeError(`maxDepth must be a non-negative integer: ${maxDepth}`)
  return {maxDepth, log: opts.log}
}
