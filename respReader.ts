import { Decoder } from './decoder'
import logger from './logger'
import type { DecoderOptions, RespInput, RespValue } from './types'

/**
 * Frames consecutive RESP2 values out of chunks as a transport receives
 * them. Bytes of a frame that has not fully arrived are kept until the next
 * `feed`.
 */
export class RespReader {
  private chunks: Buffer[] = []
  private length = 0
  // Bytes still to arrive before the held frame can possibly complete
  private waiting = 0
  private decoder: Decoder

  constructor(options: DecoderOptions = {}) {
    this.decoder = new Decoder(options)
  }

  /**
   * Bytes received but not yet decoded
   */
  get pending(): number {
    return this.length
  }

  /**
   * Append a chunk and decode every frame now complete.
   * @returns The decoded values, in arrival order
   * @throws DecodeError when the buffered bytes can never form a valid frame;
   * the buffer is discarded first and the values decoded ahead of the bad
   * frame are attached as `decoded`
   */
  feed(chunk: RespInput): RespValue[] {
    const bytes =
      typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk)
    if (bytes.length > 0) {
      this.chunks.push(bytes)
      this.length += bytes.length
    }
    this.waiting = Math.max(0, this.waiting - bytes.length)
    if (this.waiting > 0 || this.length === 0) {
      return []
    }

    let buffer =
      this.chunks.length === 1
        ? this.chunks[0]
        : Buffer.concat(this.chunks, this.length)
    const values: RespValue[] = []
    while (buffer.length > 0) {
      const result = this.decoder.decodeFrame(buffer)
      if (result.status === 'incomplete') {
        this.waiting = result.needed ?? 0
        break
      }
      if (result.status === 'invalid') {
        this.reset()
        result.error.decoded = values
        throw result.error
      }
      values.push(result.value)
      buffer = buffer.subarray(result.consumed)
    }

    this.chunks = buffer.length > 0 ? [buffer] : []
    this.length = buffer.length
    logger.info(
      `[RespReader]: decoded ${values.length} frame(s), ${this.length} byte(s) pending`,
    )
    return values
  }

  reset() {
    this.chunks = []
    this.length = 0
    this.waiting = 0
  }
}
