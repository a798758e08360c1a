import { DEFAULT_DECODER_OPTIONS } from './constants'
import type { DecoderOptions, ResolvedDecoderOptions } from './types'

function checkLimit(name: keyof DecoderOptions, value: number, min: number) {
  if (!Number.isSafeInteger(value) || value < min) {
    throw new RangeError(
      `${name} must be a safe integer of at least ${min}, got ${value}`,
    )
  }
  return value
}

/**
 * Fill in defaults for any option left out and reject limits that are not
 * usable integers.
 */
export function resolveOptions(
  options: DecoderOptions = {},
): ResolvedDecoderOptions {
  return {
    maxDepth: checkLimit(
      'maxDepth',
      options.maxDepth ?? DEFAULT_DECODER_OPTIONS.maxDepth,
      1,
    ),
    maxBulkLength: checkLimit(
      'maxBulkLength',
      options.maxBulkLength ?? DEFAULT_DECODER_OPTIONS.maxBulkLength,
      0,
    ),
    maxArrayLength: checkLimit(
      'maxArrayLength',
      options.maxArrayLength ?? DEFAULT_DECODER_OPTIONS.maxArrayLength,
      0,
    ),
  }
}
