import { describe, it, expect } from 'vitest'
import { ChaCha20Poly1305Cipher } from '../../../src/cipher/chacha20-poly1305.js'
import { AuthenticationError } from '../../../src/errors.js'
import { fixedNonce, randomBytes, utf8 } from '../../helpers/candidates.js'

describe('ChaCha20Poly1305Cipher', () => {
  const cipher = new ChaCha20Poly1305Cipher()
  const key = new Uint8Array(32).fill(7)
  const nonce = fixedNonce()

  it('should round-trip a payload', () => {
    const plaintext = utf8('the quick brown fox')
    const sealed = cipher.seal(key, nonce, plaintext)
    expect(cipher.open(key, nonce, sealed)).toEqual(plaintext)
  })

  it('should add a 16-byte tag', () => {
    expect(cipher.seal(key, nonce, new Uint8Array(100)).length).toBe(116)
    expect(cipher.overhead).toBe(16)
  })

  it('should seal an empty payload to just the tag', () => {
    const sealed = cipher.seal(key, nonce, new Uint8Array(0))
    expect(sealed.length).toBe(16)
    expect(cipher.open(key, nonce, sealed)).toEqual(new Uint8Array(0))
  })

  it('should be deterministic for a fixed key and nonce', () => {
    const plaintext = randomBytes(64)
    expect(cipher.seal(key, nonce, plaintext)).toEqual(cipher.seal(key, nonce, plaintext))
  })

  it('should reject a flipped ciphertext bit', () => {
    const sealed = cipher.seal(key, nonce, utf8('payload'))
    sealed[2] = (sealed[2] ?? 0) ^ 0x01
    expect(() => cipher.open(key, nonce, sealed)).toThrow(AuthenticationError)
  })

  it('should reject a flipped tag bit', () => {
    const sealed = cipher.seal(key, nonce, utf8('payload'))
    const last = sealed.length - 1
    sealed[last] = (sealed[last] ?? 0) ^ 0x80
    expect(() => cipher.open(key, nonce, sealed)).toThrow('Authentication failed')
  })

  it('should reject the wrong key', () => {
    const sealed = cipher.seal(key, nonce, utf8('payload'))
    expect(() => cipher.open(new Uint8Array(32).fill(8), nonce, sealed)).toThrow(
      AuthenticationError,
    )
  })

  it('should reject the wrong nonce', () => {
    const sealed = cipher.seal(key, nonce, utf8('payload'))
    expect(() => cipher.open(key, fixedNonce(0xee), sealed)).toThrow(AuthenticationError)
  })

  it('should reject input shorter than a tag', () => {
    expect(() => cipher.open(key, nonce, new Uint8Array(15))).toThrow(AuthenticationError)
  })

  it('should reject keys and nonces of the wrong size', () => {
    expect(() => cipher.seal(new Uint8Array(16), nonce, new Uint8Array(1))).toThrow(
      'chacha20-poly1305 key must be 32 bytes',
    )
    expect(() => cipher.seal(key, new Uint8Array(8), new Uint8Array(1))).toThrow(
      'chacha20-poly1305 nonce must be 12 bytes',
    )
  })
})
