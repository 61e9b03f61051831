export enum ErrorKind {
  UNEXPECTED_END = 'UnexpectedEndOfInput',
  INVALID_TAG = 'InvalidTag',
  UTF8 = 'Utf8Error',
  INTEGER_OVERFLOW = 'IntegerOverflow',
  UNKNOWN_OPCODE = 'UnknownOpcode',
  SECTION_LENGTH_MISMATCH = 'SectionLengthMismatch',
  SECTION_ORDER = 'SectionOrderViolation',
  MAGIC_OR_VERSION = 'MagicOrVersionMismatch',
  NESTING_LIMIT = 'NestingLimitExceeded',
}

export function hex(x: number, width = 2): string {
  return `0x${x.toString(16).padStart(width, '0')}`
}

export interface DecodeErrorDetail {
  // Offending tag or opcode byte (InvalidTag, UnknownOpcode).
  readonly byte?: number
  // Selector following a prefix opcode (UnknownOpcode).
  readonly selector?: number
}

// Every failure of the decoder is one of these, carrying the absolute byte
// offset in the input at which it was detected.
export class DecodeError extends Error {
  public readonly kind: ErrorKind
  public readonly offset: number
  public readonly byte?: number
  public readonly selector?: number

  constructor(kind: ErrorKind, offset: number, message: string, detail: DecodeErrorDetail = {}) {
    super(`${message} at ${hex(offset)}`)
    this.name = 'DecodeError'
    this.kind = kind
    this.offset = offset
    this.byte = detail.byte
    this.selector = detail.selector
  }

  public static unexpectedEnd(offset: number, what = 'byte'): DecodeError {
    return new DecodeError(ErrorKind.UNEXPECTED_END, offset, `Unexpected end of input reading ${what}`)
  }

  public static invalidTag(offset: number, byte: number, what: string): DecodeError {
    return new DecodeError(ErrorKind.INVALID_TAG, offset, `Invalid ${what}: ${hex(byte)}`, {byte})
  }
}

export type DecodeResult<T> = {ok: true, value: T} | {ok: false, error: DecodeError}

// Runs a decode step, turning a thrown DecodeError into a result value.
// Anything else is a bug and keeps propagating.
export function tryDecode<T>(f: () => T): DecodeResult<T> {
  try {
    return {ok: true, value: f()}
  } catch (e) {
    if (e instanceof DecodeError)
      return {ok: false, error: e}
    throw e
  }
}
