import type { DecodeError } from './errors'

export type SimpleError = {
  kind: string
  message: string
}

export type RespValue =
  | { type: 'SimpleString'; value: string } // For '+' prefixed strings
  | { type: 'SimpleError'; value: SimpleError } // For '-' prefixed strings
  | { type: 'Integer'; value: bigint } // For ':' prefixed numbers
  | { type: 'BulkString'; value: Buffer } // For '$' prefixed strings
  | { type: 'NullBulkString' } // $-1
  | { type: 'Array'; value: RespValue[] } // For '*' prefixed arrays
  | { type: 'NullArray' } // *-1

export type DecodeErrorKind =
  | 'UnrecognizedType'
  | 'EmptyContent'
  | 'EmptyKind'
  | 'MalformedSeparator'
  | 'MalformedTerminator'
  | 'MalformedDigits'
  | 'Overflow'
  | 'InvalidLength'
  | 'LengthLimitExceeded'
  | 'TruncatedPayload'
  | 'TruncatedElements'
  | 'RecursionLimitExceeded'

export type DecoderOptions = {
  /** Maximum number of arrays open at once */
  maxDepth?: number
  /** Largest accepted bulk string length, in bytes */
  maxBulkLength?: number
  /** Largest accepted array element count */
  maxArrayLength?: number
}

export type ResolvedDecoderOptions = Required<DecoderOptions>

export type DecodeResult =
  | { status: 'complete'; value: RespValue; consumed: number }
  | { status: 'incomplete'; needed: number | null }
  | { status: 'invalid'; error: DecodeError }

export type RespInput = string | Uint8Array
