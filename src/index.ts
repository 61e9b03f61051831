export {BufferReader} from './buffer_reader'
export {DecodeError, ErrorKind, tryDecode, type DecodeErrorDetail, type DecodeResult} from './decode_error'
export {DisWasm, type DisWasmOptions} from './diswasm'
export {InstTable, InstTableFC, opcodeName} from './inst_table'
export {readExpr, readInst} from './inst_decoder'
export {ModuleBuilder, decodeModule, parseModule, readHeader} from './module_decoder'
export {ModuleStream, type StreamStatus} from './module_stream'
export {NAME_SECTION, decodeNameSection, type NameSection} from './name_section'
export {DEFAULT_MAX_DEPTH, resolveOptions, type DecoderOptions, type LogFunc} from './options'
export {decodeSection, readVec} from './section_decoder'
export {
  readBlockType, readElemType, readFuncType, readGlobalType, readLimits, readResultType, readTableType, readValType,
} from './type_decoder'
export * from './wasm_types'
