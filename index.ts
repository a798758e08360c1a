export { resolveOptions } from './config'
export { DEFAULT_DECODER_OPTIONS, INT64_MAX, INT64_MIN, RESP_TYPE } from './constants'
export { Decoder, decode, decodeFrame } from './decoder'
export { DecodeError } from './errors'
export { setLoggingEnabled } from './logger'
export { RespReader } from './respReader'
export type {
  DecodeErrorKind,
  DecodeResult,
  DecoderOptions,
  RespInput,
  RespValue,
  ResolvedDecoderOptions,
  SimpleError,
} from './types'
