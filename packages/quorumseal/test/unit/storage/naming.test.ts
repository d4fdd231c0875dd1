import { describe, it, expect } from 'vitest'
import {
  decryptedPathFor,
  encryptedPathFor,
  shareFileName,
  toHex,
} from '../../../src/storage/naming.js'
import { fixedNonce } from '../../helpers/candidates.js'

describe('toHex', () => {
  it('should encode lowercase hex', () => {
    expect(toHex(Uint8Array.of(0, 15, 171, 255))).toBe('000fabff')
  })
})

describe('shareFileName', () => {
  it('should combine the index and the hex nonce', () => {
    expect(shareFileName(3, fixedNonce())).toBe('3-000102030405060708090a0b.ccms')
  })

  it('should not pad the index', () => {
    expect(shareFileName(255, fixedNonce(0xff))).toBe('255-ffffffffffffffffffffffff.ccms')
  })
})

describe('encryptedPathFor', () => {
  it('should append the container extension', () => {
    expect(encryptedPathFor('/data/report.pdf')).toBe('/data/report.pdf.ccm')
  })
})

describe('decryptedPathFor', () => {
  it('should strip the container extension', () => {
    expect(decryptedPathFor('/data/report.pdf.ccm')).toBe('/data/report.pdf')
  })

  it('should append a suffix when there is no container extension', () => {
    expect(decryptedPathFor('/data/blob')).toBe('/data/blob.decrypted')
  })

  it('should never return the input path', () => {
    expect(decryptedPathFor('.ccm')).toBe('.ccm.decrypted')
  })
})
