export const RESP_TYPE = {
  SIMPLE_STRING: 0x2b, // +
  SIMPLE_ERROR: 0x2d, // -
  INTEGER: 0x3a, // :
  BULK_STRING: 0x24, // $
  ARRAY: 0x2a, // *
} as const

export const BYTE = {
  CR: 0x0d,
  LF: 0x0a,
  SPACE: 0x20,
  PLUS: 0x2b,
  MINUS: 0x2d,
  DIGIT_0: 0x30,
  DIGIT_9: 0x39,
  UPPER_A: 0x41,
  UPPER_Z: 0x5a,
  LOWER_A: 0x61,
  LOWER_Z: 0x7a,
} as const

export const INT64_MIN = -(2n ** 63n)
export const INT64_MAX = 2n ** 63n - 1n

// Tag, one byte of content and CR LF, as in ':1\r\n'
export const MIN_FRAME_LENGTH = 4

export const DEFAULT_DECODER_OPTIONS = {
  maxDepth: 128,
  // 512 MiB, the server's default proto-max-bulk-len
  maxBulkLength: 512 * 1024 * 1024,
  maxArrayLength: 2147483647,
} as const
