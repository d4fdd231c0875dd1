import { describe, it, expect } from 'vitest'
import { detectContentType } from '../../src/sniff.js'

const bytes = (...values: number[]): Uint8Array => Uint8Array.from(values)
const text = (value: string): Uint8Array => new TextEncoder().encode(value)

describe('detectContentType', () => {
  it('should recognise an empty file', () => {
    expect(detectContentType(new Uint8Array(0))).toEqual({
      name: 'empty file',
      mime: 'application/x-empty',
    })
  })

  it('should recognise a PNG image', () => {
    expect(detectContentType(bytes(0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0, 0))).toEqual({
      name: 'PNG image',
      mime: 'image/png',
    })
  })

  it('should tell shares from encrypted files', () => {
    expect(detectContentType(text('CCMS\u0001')).name).toBe('quorumseal share')
    expect(detectContentType(text('CCM\u0001')).name).toBe('quorumseal encrypted file')
  })

  it('should prefer the PGP signature over generic PEM', () => {
    expect(detectContentType(text('-----BEGIN PGP MESSAGE-----\n')).mime).toBe(
      'application/pgp-encrypted',
    )
    expect(detectContentType(text('-----BEGIN CERTIFICATE-----\n')).mime).toBe(
      'application/x-pem-file',
    )
  })

  it('should match signatures at an offset', () => {
    const tar = new Uint8Array(300)
    tar.set(text('ustar'), 257)
    expect(detectContentType(tar)).toEqual({ name: 'tar archive', mime: 'application/x-tar' })
  })

  it('should not match a signature past the end of the data', () => {
    expect(detectContentType(text('ustar')).name).toBe('text')
  })

  it('should classify UTF-8 text', () => {
    expect(detectContentType(text('héllo wörld\r\n\ttabbed\n'))).toEqual({
      name: 'text',
      mime: 'text/plain',
    })
  })

  it('should classify control bytes as binary', () => {
    expect(detectContentType(bytes(0x68, 0x69, 0x00, 0x01))).toEqual({
      name: 'binary data',
      mime: 'application/octet-stream',
    })
  })

  it('should classify invalid UTF-8 as binary', () => {
    expect(detectContentType(bytes(0x61, 0xc3, 0x28, 0x62)).name).toBe('binary data')
  })
})
