import { describe, expect, it } from 'vitest'
import {
  DecodeError,
  INT64_MAX,
  RESP_TYPE,
  RespReader,
  decode,
  decodeFrame,
} from './index'

describe('package entry', () => {
  it('should expose the decoder', () => {
    expect(decode(':9223372036854775807\r\n')).toEqual({
      type: 'Integer',
      value: INT64_MAX,
    })
    expect(decodeFrame('+OK\r\n')).toEqual({
      status: 'complete',
      value: { type: 'SimpleString', value: 'OK' },
      consumed: 5,
    })
    expect(new RespReader().feed('*-1\r\n')).toEqual([{ type: 'NullArray' }])
    expect(() => decode('?')).toThrowError(DecodeError)
  })

  it('should expose the type tags', () => {
    expect(String.fromCharCode(RESP_TYPE.ARRAY)).toBe('*')
    expect(String.fromCharCode(RESP_TYPE.BULK_STRING)).toBe('$')
  })
})
