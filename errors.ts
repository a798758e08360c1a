import type { DecodeErrorKind, RespValue } from './types'

type DecodeErrorDetails = {
  incomplete?: boolean
  needed?: number | null
}

/**
 * Raised for the first grammar violation found in a frame.
 *
 * `incomplete` is set when the violation is only that the input ended early:
 * appending more bytes could still produce a valid frame.
 */
export class DecodeError extends Error {
  readonly kind: DecodeErrorKind
  readonly position: number
  readonly incomplete: boolean
  readonly needed: number | null
  /** Frames that decoded cleanly ahead of this one in the same chunk */
  decoded: RespValue[] = []

  constructor(
    kind: DecodeErrorKind,
    position: number,
    detail: string,
    details: DecodeErrorDetails = {},
  ) {
    super(`${kind} at byte ${position}: ${detail}`)
    this.name = 'DecodeError'
    this.kind = kind
    this.position = position
    this.incomplete = details.incomplete ?? false
    this.needed = details.needed ?? null
  }

  static endOfInput(
    kind: DecodeErrorKind,
    position: number,
    detail: string,
    needed: number | null = null,
  ): DecodeError {
    return new DecodeError(kind, position, detail, { incomplete: true, needed })
  }
}
