import {BufferReader} from './buffer_reader'
import {DecodeError, ErrorKind} from './decode_error'
import {HEADER_SIZE, ModuleBuilder, readHeader} from './module_decoder'
import {type DecoderOptions, type ResolvedOptions, resolveOptions} from './options'
import {decodeSection, isSectionId} from './section_decoder'
import type {Module} from './wasm_types'

export type StreamStatus =
  // `needed` is the number of bytes still missing for the construct in
  // progress; 0 when the input stopped at a section boundary.
  | {readonly status: 'incomplete', readonly needed: number}
  | {readonly status: 'error', readonly error: DecodeError}
  | {readonly status: 'done', readonly module: Module}

// Decodes a module whose bytes arrive in chunks. Each complete section is
// decoded as soon as its last byte has been pushed.
export class ModuleStream {
  private bytes = new Uint8Array(0)
  private length = 0
  private offset = 0
  private builder: ModuleBuilder | null = null
  private error: DecodeError | null = null
  private readonly opts: ResolvedOptions

  constructor(options?: DecoderOptions) {
    this.opts = resolveOptions(options)
  }

  public push(chunk: Uint8Array): StreamStatus {
    if (this.error != null)
      return {status: 'error', error: this.error}
    this.append(chunk)
    try {
      return this.advance()
    } catch (e) {
      return this.fail(e)
    }
  }

  // Signals the end of input.
  public finish(): StreamStatus {
    if (this.error != null)
      return {status: 'error', error: this.error}
    if (this.builder == null)
      return this.fail(DecodeError.unexpectedEnd(this.length, 'module header'))
    if (this.offset < this.length)
      return this.fail(DecodeError.unexpectedEnd(this.length, 'section'))
    return {status: 'done', module: this.builder.build()}
  }

  private advance(): StreamStatus {
    if (this.builder == null) {
      if (this.length < HEADER_SIZE)
        return {status: 'incomplete', needed: HEADER_SIZE - this.length}
      const reader = new BufferReader(this.bytes, 0, this.length)
      this.builder = new ModuleBuilder(readHeader(reader))
      this.offset = reader.getOffset()
    }

    for (;;) {
      if (this.offset >= this.length)
        return {status: 'incomplete', needed: 0}

      const reader = new BufferReader(this.bytes, this.offset, this.length)
      let payloadEnd: number
      try {
        const id = reader.readu8()
        if (!isSectionId(id))
          throw DecodeError.invalidTag(this.offset, id, 'section id')
        const size = reader.readVecLength()
        payloadEnd = reader.getOffset() + size
      } catch (e) {
        // The size prefix itself is cut off.
        if (e instanceof DecodeError && e.kind === ErrorKind.UNEXPECTED_END)
          return {status: 'incomplete', needed: 1}
        throw e
      }
      if (payloadEnd > this.length)
        return {status: 'incomplete', needed: payloadEnd - this.length}

      const sectionReader = new BufferReader(this.bytes, this.offset, payloadEnd)
      this.builder.add(decodeSection(sectionReader, this.opts))
      this.offset = sectionReader.getOffset()
    }
  }

  private append(chunk: Uint8Array): void {
    const needed = this.length + chunk.byteLength
    if (needed > this.bytes.byteLength) {
      let capacity = Math.max(this.bytes.byteLength * 2, 64)
      while (capacity < needed)
        capacity *= 2
      // Earlier sections keep viewing the old buffer, which is never modified.
      const bytes = new Uint8Array(capacity)
      bytes.set(this.bytes.subarray(0, this.length))
      this.bytes = bytes
    }
    this.bytes.set(chunk, this.length)
    this.length = needed
  }

  private fail(e: unknown): StreamStatus {
    if (!(e instanceof DecodeError))
      throw e
    this.error = e
    return {status: 'error', error: e}
  }
}
