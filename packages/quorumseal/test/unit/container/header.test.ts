import { describe, it, expect } from 'vitest'
import {
  assembleContainer,
  decodeFileHeader,
  decodeShareHeader,
  encodeBaseHeader,
  encodeFileHeader,
  encodeShareHeader,
  headerLength,
  peekHeader,
} from '../../../src/container/header.js'
import type { ContainerHeader, SignatureBlock } from '../../../src/container/header.js'
import { FormatError } from '../../../src/errors.js'
import { Ed25519Signatures } from '../../../src/signing/ed25519.js'
import { fixedNonce } from '../../helpers/candidates.js'

function signatureBlock(): SignatureBlock {
  const identity = new Ed25519Signatures().generateIdentity()
  return { publicKey: identity.publicKey, signature: identity.sign(new Uint8Array([1, 2, 3])) }
}

function expectFormatError(fn: () => unknown, code: string): void {
  let caught: unknown
  try {
    fn()
  } catch (err) {
    caught = err
  }
  expect(caught).toBeInstanceOf(FormatError)
  if (caught instanceof FormatError) {
    expect(caught.code).toBe(code)
  }
}

describe('headerLength', () => {
  it('should derive lengths from the signed flag', () => {
    expect(headerLength('file', false)).toBe(18)
    expect(headerLength('file', true)).toBe(114)
    expect(headerLength('share', false)).toBe(20)
    expect(headerLength('share', true)).toBe(116)
  })
})

describe('encodeFileHeader', () => {
  it('should lay out magic, version, threshold, flag and nonce', () => {
    const bytes = encodeFileHeader({ version: 1, threshold: 3, nonce: fixedNonce() })
    expect([...bytes]).toEqual([0x43, 0x43, 0x4d, 1, 3, 0, 0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11])
  })

  it('should append the public key and signature when signed', () => {
    const signing = signatureBlock()
    const bytes = encodeFileHeader({ version: 1, threshold: 2, nonce: fixedNonce(), signing })
    expect(bytes.length).toBe(114)
    expect(bytes[5]).toBe(1)
    expect(bytes.subarray(18, 50)).toEqual(signing.publicKey)
    expect(bytes.subarray(50, 114)).toEqual(signing.signature)
  })

  it('should reject a threshold that does not fit in a byte', () => {
    expect(() => encodeFileHeader({ version: 1, threshold: 256, nonce: fixedNonce() })).toThrow(
      RangeError,
    )
  })

  it('should reject a nonce of the wrong length', () => {
    expect(() =>
      encodeFileHeader({ version: 1, threshold: 2, nonce: new Uint8Array(11) }),
    ).toThrow('nonce must be 12 bytes')
  })
})

describe('encodeShareHeader', () => {
  it('should lay out the share magic and a trailing zero padding byte', () => {
    const bytes = encodeShareHeader({ version: 1, threshold: 3, nonce: fixedNonce(0xaa) })
    expect(bytes.length).toBe(20)
    expect([...bytes.subarray(0, 7)]).toEqual([0x43, 0x43, 0x4d, 0x53, 1, 3, 0])
    expect([...bytes.subarray(7, 19)]).toEqual(new Array<number>(12).fill(0xaa))
    expect(bytes[19]).toBe(0)
  })
})

describe('encodeBaseHeader', () => {
  it('should write the signed flag as given, without a signature block', () => {
    const bytes = encodeBaseHeader('share', { version: 1, threshold: 2, nonce: fixedNonce() }, true)
    expect(bytes.length).toBe(20)
    expect(bytes[6]).toBe(1)
  })
})

describe('decodeFileHeader', () => {
  for (const threshold of [1, 255]) {
    it(`should round-trip an unsigned header with threshold ${String(threshold)}`, () => {
      const header: ContainerHeader = { version: 1, threshold, nonce: fixedNonce() }
      const body = new Uint8Array([9, 8, 7])
      const decoded = decodeFileHeader(assembleContainer(encodeFileHeader(header), body))
      expect(decoded.kind).toBe('file')
      expect(decoded.header).toEqual(header)
      expect(decoded.headerLength).toBe(18)
      expect(decoded.body).toEqual(body)
    })

    it(`should round-trip a signed header with threshold ${String(threshold)}`, () => {
      const header: ContainerHeader = {
        version: 1,
        threshold,
        nonce: fixedNonce(),
        signing: signatureBlock(),
      }
      const body = new Uint8Array([1, 1, 2, 3, 5, 8])
      const decoded = decodeFileHeader(assembleContainer(encodeFileHeader(header), body))
      expect(decoded.header).toEqual(header)
      expect(decoded.headerLength).toBe(114)
      expect(decoded.body).toEqual(body)
    })
  }

  it('should not confuse a body that starts with the magic bytes', () => {
    const body = encodeFileHeader({ version: 1, threshold: 4, nonce: fixedNonce(7) })
    const decoded = decodeFileHeader(
      assembleContainer(encodeFileHeader({ version: 1, threshold: 2, nonce: fixedNonce() }), body),
    )
    expect(decoded.header.threshold).toBe(2)
    expect(decoded.body).toEqual(body)
  })

  it('should decode an empty body', () => {
    const decoded = decodeFileHeader(encodeFileHeader({ version: 1, threshold: 2, nonce: fixedNonce() }))
    expect(decoded.body.length).toBe(0)
  })

  it('should reject bytes without the file magic', () => {
    expectFormatError(() => decodeFileHeader(new Uint8Array([0x50, 0x4b, 0x03, 0x04])), 'missing-magic')
  })

  it('should reject input shorter than the magic', () => {
    expectFormatError(() => decodeFileHeader(new Uint8Array([0x43, 0x43])), 'missing-magic')
  })

  it('should reject a truncated base header', () => {
    const bytes = encodeFileHeader({ version: 1, threshold: 2, nonce: fixedNonce() })
    expectFormatError(() => decodeFileHeader(bytes.subarray(0, 10)), 'truncated')
  })

  it('should reject a signed header cut inside the signature block', () => {
    const bytes = encodeFileHeader({
      version: 1,
      threshold: 2,
      nonce: fixedNonce(),
      signing: signatureBlock(),
    })
    expectFormatError(() => decodeFileHeader(bytes.subarray(0, 60)), 'truncated')
  })

  it('should reject a public key that is not a curve point', () => {
    const signing = signatureBlock()
    const bytes = encodeFileHeader({
      version: 1,
      threshold: 2,
      nonce: fixedNonce(),
      signing: { publicKey: new Uint8Array(32).fill(0xff), signature: signing.signature },
    })
    expectFormatError(() => decodeFileHeader(bytes), 'bad-public-key')
  })

  it('should reject a signature whose scalar is out of range', () => {
    const signing = signatureBlock()
    const signature = signing.signature.slice()
    signature.fill(0xff, 32)
    const bytes = encodeFileHeader({
      version: 1,
      threshold: 2,
      nonce: fixedNonce(),
      signing: { publicKey: signing.publicKey, signature },
    })
    expectFormatError(() => decodeFileHeader(bytes), 'bad-signature')
  })

  it('should use the validator it is given', () => {
    const bytes = encodeFileHeader({
      version: 1,
      threshold: 2,
      nonce: fixedNonce(),
      signing: { publicKey: new Uint8Array(32), signature: new Uint8Array(64) },
    })
    const decoded = decodeFileHeader(bytes, {
      validator: { isValidPublicKey: () => true, isValidSignature: () => true },
    })
    expect(decoded.header.signing?.publicKey).toEqual(new Uint8Array(32))
  })
})

describe('decodeShareHeader', () => {
  it('should round-trip a signed share header and skip the padding byte', () => {
    const header: ContainerHeader = {
      version: 1,
      threshold: 3,
      nonce: fixedNonce(),
      signing: signatureBlock(),
    }
    const share = new Uint8Array(33).fill(5)
    const decoded = decodeShareHeader(assembleContainer(encodeShareHeader(header), share))
    expect(decoded.kind).toBe('share')
    expect(decoded.header).toEqual(header)
    expect(decoded.headerLength).toBe(116)
    expect(decoded.body).toEqual(share)
  })

  it('should reject an encrypted-file container', () => {
    const file = encodeFileHeader({ version: 1, threshold: 2, nonce: fixedNonce() })
    expectFormatError(() => decodeShareHeader(assembleContainer(file, new Uint8Array(8))), 'missing-magic')
  })
})

describe('peekHeader', () => {
  it('should read the base fields without validating the signature block', () => {
    const bytes = encodeShareHeader({
      version: 1,
      threshold: 4,
      nonce: fixedNonce(3),
      signing: { publicKey: new Uint8Array(32).fill(0xff), signature: new Uint8Array(64) },
    })
    expect(peekHeader('share', bytes)).toEqual({
      version: 1,
      threshold: 4,
      signed: true,
      nonce: fixedNonce(3),
    })
  })
})
