import { resolveOptions } from './config'
import {
  BYTE,
  INT64_MAX,
  INT64_MIN,
  MIN_FRAME_LENGTH,
  RESP_TYPE,
} from './constants'
import { DecodeError } from './errors'
import logger from './logger'
import {
  type ScanResult,
  describeByte,
  isLowercase,
  isUppercase,
  scanCRLF,
  scanLine,
  scanSignedDigits,
} from './scanner'
import type {
  DecodeResult,
  DecoderOptions,
  RespInput,
  RespValue,
  ResolvedDecoderOptions,
} from './types'

interface RespDecoder {
  decode(): RespValue
}

/**
 * View the input as bytes. Strings are encoded as UTF-8; byte arrays are
 * wrapped without copying.
 */
export function toBuffer(input: RespInput): Buffer {
  if (typeof input === 'string') {
    return Buffer.from(input, 'utf8')
  }
  return Buffer.from(input.buffer, input.byteOffset, input.byteLength)
}

export class Decoder implements RespDecoder {
  private input: Buffer = Buffer.alloc(0)
  private current = 0
  private depth = 0
  readonly options: ResolvedDecoderOptions

  constructor(options: DecoderOptions = {}) {
    this.options = resolveOptions(options)
  }

  public setup(input: RespInput) {
    this.input = toBuffer(input)
    this.current = 0
    this.depth = 0
  }

  /**
   * Number of bytes consumed so far
   */
  get position(): number {
    return this.current
  }

  /**
   * Peek at the next byte without consuming it
   * @returns The byte, or undefined at end of input
   */
  private peek(): number | undefined {
    return this.current < this.input.length
      ? this.input[this.current]
      : undefined
  }

  /**
   * Consume the current byte and move to the next one
   */
  private consume(): number {
    return this.input[this.current++]
  }

  /**
   * Move the cursor past a scanned field and return its value
   */
  private advance<T>([next, value]: ScanResult<T>): T {
    this.current = next
    return value
  }

  private atEnd(): boolean {
    return this.current >= this.input.length
  }

  /**
   * Decode the single frame at the start of the input. Bytes after the
   * frame are left alone; see `position` for how many were used.
   */
  decode(): RespValue {
    return this.dispatch()
  }

  /**
   * Decode one frame from `input`, telling a bad frame apart from one that
   * has not fully arrived yet.
   */
  decodeFrame(input: RespInput): DecodeResult {
    this.setup(input)
    try {
      const value = this.decode()
      return { status: 'complete', value, consumed: this.current }
    } catch (error) {
      if (!(error instanceof DecodeError)) {
        throw error
      }
      if (error.incomplete) {
        return { status: 'incomplete', needed: error.needed }
      }
      logger.error('[Decoder]: rejected frame:', error.message)
      return { status: 'invalid', error }
    }
  }

  private dispatch(): RespValue {
    if (this.atEnd()) {
      throw DecodeError.endOfInput(
        'UnrecognizedType',
        this.current,
        'expected a type tag, reached end of input',
      )
    }

    const tag = this.consume()
    switch (tag) {
      case RESP_TYPE.SIMPLE_STRING:
        return { type: 'SimpleString', value: this.readTextField() }
      case RESP_TYPE.SIMPLE_ERROR:
        return this.decodeSimpleError()
      case RESP_TYPE.INTEGER:
        return this.decodeInteger()
      case RESP_TYPE.BULK_STRING:
        return this.decodeBulkString()
      case RESP_TYPE.ARRAY:
        return this.decodeArray()
      default:
        throw new DecodeError(
          'UnrecognizedType',
          this.current - 1,
          `unknown type tag ${describeByte(tag)}`,
        )
    }
  }

  /**
   * Simple string body. Also used for the message of a simple error, which
   * is why it returns the text rather than a RespValue.
   */
  private readTextField(): string {
    return this.advance(scanLine(this.input, this.current))
  }

  private decodeSimpleError(): RespValue {
    const kindStart = this.current
    while (!this.atEnd() && isUppercase(this.input[this.current])) {
      this.current++
    }
    const kind = this.input.toString('latin1', kindStart, this.current)

    const next = this.peek()
    if (kind.length === 0) {
      if (next === undefined) {
        throw DecodeError.endOfInput(
          'EmptyKind',
          this.current,
          'expected an error kind, reached end of input',
        )
      }
      throw new DecodeError(
        'EmptyKind',
        this.current,
        `error kind must start with an uppercase letter, found ${describeByte(next)}`,
      )
    }
    if (next === undefined) {
      throw DecodeError.endOfInput(
        'MalformedSeparator',
        this.current,
        'expected a separator after the error kind, reached end of input',
      )
    }
    if (isLowercase(next)) {
      throw new DecodeError(
        'EmptyKind',
        this.current,
        `error kind must be uppercase, found ${describeByte(next)} after '${kind}'`,
      )
    }

    // Any mix of spaces and line feeds separates kind from message
    const separatorStart = this.current
    while (
      !this.atEnd() &&
      (this.input[this.current] === BYTE.SPACE ||
        this.input[this.current] === BYTE.LF)
    ) {
      this.current++
    }
    if (this.current === separatorStart) {
      throw new DecodeError(
        'MalformedSeparator',
        this.current,
        `expected a space or LF after the error kind, found ${describeByte(next)}`,
      )
    }

    return {
      type: 'SimpleError',
      value: { kind, message: this.readTextField() },
    }
  }

  private decodeInteger(): RespValue {
    const start = this.current
    const value = this.advance(
      scanSignedDigits(this.input, this.current, (digits) => {
        if (digits < INT64_MIN || digits > INT64_MAX) {
          throw new DecodeError(
            'Overflow',
            start,
            `${digits} does not fit in a signed 64-bit integer`,
          )
        }
      }),
    )
    return { type: 'Integer', value }
  }

  /**
   * Read the length line of a bulk string or array.
   * @returns The length, or null for the -1 sentinel
   */
  private readLength(label: string, limit: number): number | null {
    const start = this.current
    const length = this.advance(
      scanSignedDigits(this.input, this.current, (digits) => {
        if (digits < -1n) {
          throw new DecodeError(
            'InvalidLength',
            start,
            `${label} length ${digits} is negative`,
          )
        }
        if (digits > BigInt(limit)) {
          throw new DecodeError(
            'LengthLimitExceeded',
            start,
            `${label} length ${digits} exceeds the limit of ${limit}`,
          )
        }
      }),
    )
    return length === -1n ? null : Number(length)
  }

  private decodeBulkString(): RespValue {
    const length = this.readLength('bulk string', this.options.maxBulkLength)
    if (length === null) {
      return { type: 'NullBulkString' }
    }

    const available = this.input.length - this.current
    if (available < length) {
      throw DecodeError.endOfInput(
        'TruncatedPayload',
        this.current,
        `declared ${length} bytes, only ${available} available`,
        length + 2 - available,
      )
    }

    const end = this.current + length
    // Copy so the value does not pin the caller's buffer
    const payload = Buffer.from(this.input.subarray(this.current, end))
    this.current = scanCRLF(this.input, end)
    return { type: 'BulkString', value: payload }
  }

  private decodeArray(): RespValue {
    if (this.depth >= this.options.maxDepth) {
      throw new DecodeError(
        'RecursionLimitExceeded',
        this.current - 1,
        `arrays nested deeper than ${this.options.maxDepth}`,
      )
    }

    const length = this.readLength('array', this.options.maxArrayLength)
    if (length === null) {
      return { type: 'NullArray' }
    }

    const elements: RespValue[] = []
    this.depth++
    try {
      for (let i = 0; i < length; i++) {
        if (this.atEnd()) {
          throw DecodeError.endOfInput(
            'TruncatedElements',
            this.current,
            `declared ${length} elements, found ${i}`,
            (length - i) * MIN_FRAME_LENGTH,
          )
        }
        elements.push(this.dispatch())
      }
    } finally {
      this.depth--
    }
    return { type: 'Array', value: elements }
  }
}

/**
 * Decode the first RESP2 frame in `input`. Throws DecodeError on the first
 * grammar violation, including input that ends mid-frame.
 */
export function decode(input: RespInput, options?: DecoderOptions): RespValue {
  const decoder = new Decoder(options)
  decoder.setup(input)
  return decoder.decode()
}

/**
 * Decode the first frame in `input` and report how many bytes it used, or
 * whether more input is needed.
 */
export function decodeFrame(
  input: RespInput,
  options?: DecoderOptions,
): DecodeResult {
  return new Decoder(options).decodeFrame(input)
}
