import { BYTE } from './constants'
import { DecodeError } from './errors'

export type ScanResult<T> = [number, T]

export const isDigit = (byte: number) =>
  byte >= BYTE.DIGIT_0 && byte <= BYTE.DIGIT_9

export const isUppercase = (byte: number) =>
  byte >= BYTE.UPPER_A && byte <= BYTE.UPPER_Z

export const isLowercase = (byte: number) =>
  byte >= BYTE.LOWER_A && byte <= BYTE.LOWER_Z

/**
 * Render a byte for error messages: printable ASCII as a quoted character,
 * anything else as hex.
 */
export function describeByte(byte: number): string {
  if (byte >= 0x21 && byte <= 0x7e) {
    return `'${String.fromCharCode(byte)}'`
  }
  return `0x${byte.toString(16).padStart(2, '0')}`
}

/**
 * Expect CR LF at `current`.
 * @returns The position just past the LF
 */
export function scanCRLF(input: Buffer, current: number): number {
  if (current >= input.length) {
    throw DecodeError.endOfInput(
      'MalformedTerminator',
      current,
      'expected CRLF, reached end of input',
      2,
    )
  }
  if (input[current] !== BYTE.CR) {
    throw new DecodeError(
      'MalformedTerminator',
      current,
      `expected CR, found ${describeByte(input[current])}`,
    )
  }
  if (current + 1 >= input.length) {
    throw DecodeError.endOfInput(
      'MalformedTerminator',
      current + 1,
      'expected LF after CR, reached end of input',
      1,
    )
  }
  if (input[current + 1] !== BYTE.LF) {
    throw new DecodeError(
      'MalformedTerminator',
      current + 1,
      `expected LF after CR, found ${describeByte(input[current + 1])}`,
    )
  }
  return current + 2
}

/**
 * Scan a non-empty run of bytes that are neither CR nor LF, followed by CR LF.
 * The run is decoded as UTF-8.
 */
export function scanLine(input: Buffer, current: number): ScanResult<string> {
  let end = current
  while (
    end < input.length &&
    input[end] !== BYTE.CR &&
    input[end] !== BYTE.LF
  ) {
    end++
  }

  if (end === current && input[end] === BYTE.CR) {
    throw new DecodeError('EmptyContent', current, 'line must not be empty')
  }

  return [scanCRLF(input, end), input.toString('utf8', current, end)]
}

/**
 * Scan an optionally signed run of ASCII digits followed by CR LF. The
 * magnitude is unbounded; callers apply their own range through `check`.
 *
 * `check` runs before the line ending is read, so it also sees a number cut
 * off at the end of input. Appending digits only grows the magnitude, so a
 * value that fails there can never become valid.
 */
export function scanSignedDigits(
  input: Buffer,
  current: number,
  check?: (value: bigint) => void,
): ScanResult<bigint> {
  let cursor = current
  const negative = input[cursor] === BYTE.MINUS
  if (negative || input[cursor] === BYTE.PLUS) {
    cursor++
  }

  const digitsStart = cursor
  while (cursor < input.length && isDigit(input[cursor])) {
    cursor++
  }

  if (cursor === digitsStart) {
    if (cursor >= input.length) {
      throw DecodeError.endOfInput(
        'MalformedDigits',
        cursor,
        'expected a digit, reached end of input',
      )
    }
    throw new DecodeError(
      'MalformedDigits',
      cursor,
      `expected a digit, found ${describeByte(input[cursor])}`,
    )
  }

  // Anything but the start of a line ending is part of a malformed number
  if (
    cursor < input.length &&
    input[cursor] !== BYTE.CR &&
    input[cursor] !== BYTE.LF
  ) {
    throw new DecodeError(
      'MalformedDigits',
      cursor,
      `unexpected ${describeByte(input[cursor])} after digits`,
    )
  }

  const magnitude = BigInt(input.toString('latin1', digitsStart, cursor))
  const value = negative ? -magnitude : magnitude
  check?.(value)

  return [scanCRLF(input, cursor), value]
}
