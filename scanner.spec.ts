import { describe, expect, it } from 'vitest'
import { DecodeError } from './errors'
import { describeByte, scanCRLF, scanLine, scanSignedDigits } from './scanner'

const thrownBy = (fn: () => unknown): DecodeError => {
  try {
    fn()
  } catch (error) {
    if (error instanceof DecodeError) {
      return error
    }
    throw error
  }
  throw new Error('expected a DecodeError')
}

describe('scanner', () => {
  describe('scanCRLF()', () => {
    it('should return the position after the line ending', () => {
      expect(scanCRLF(Buffer.from('ab\r\n'), 2)).toBe(4)
    })

    it('should ask for both bytes at end of input', () => {
      const error = thrownBy(() => scanCRLF(Buffer.from('x'), 1))
      expect(error.kind).toBe('MalformedTerminator')
      expect(error.incomplete).toBe(true)
      expect(error.needed).toBe(2)
    })

    it('should ask for the LF after a trailing CR', () => {
      const error = thrownBy(() => scanCRLF(Buffer.from('x\r'), 1))
      expect(error.position).toBe(2)
      expect(error.needed).toBe(1)
    })

    it('should reject a CR followed by something other than LF', () => {
      const error = thrownBy(() => scanCRLF(Buffer.from('\r\r\n'), 0))
      expect(error.incomplete).toBe(false)
      expect(error.message).toBe(
        'MalformedTerminator at byte 1: expected LF after CR, found 0x0d',
      )
    })
  })

  describe('scanLine()', () => {
    it('should return the text up to CR LF', () => {
      expect(scanLine(Buffer.from('+OK\r\n:1\r\n'), 1)).toEqual([5, 'OK'])
    })

    it('should reject an empty line', () => {
      expect(thrownBy(() => scanLine(Buffer.from('\r\n'), 0)).kind).toBe(
        'EmptyContent',
      )
    })
  })

  describe('scanSignedDigits()', () => {
    it('should read a signed magnitude', () => {
      expect(scanSignedDigits(Buffer.from('-0042\r\nrest'), 0)).toEqual([
        7,
        -42n,
      ])
    })

    it('should not bound the magnitude', () => {
      const digits = '9'.repeat(23)
      expect(scanSignedDigits(Buffer.from(`${digits}\r\n`), 0)).toEqual([
        25,
        BigInt(digits),
      ])
    })

    it('should reject a sign with no digits', () => {
      const error = thrownBy(() => scanSignedDigits(Buffer.from('+x\r\n'), 0))
      expect(error.kind).toBe('MalformedDigits')
      expect(error.position).toBe(1)
    })
  })

  describe('describeByte()', () => {
    it('should quote printable characters and hex-encode the rest', () => {
      expect(describeByte(0x41)).toBe("'A'")
      expect(describeByte(0x0d)).toBe('0x0d')
      expect(describeByte(0x20)).toBe('0x20')
      expect(describeByte(0xff)).toBe('0xff')
    })
  })
})
