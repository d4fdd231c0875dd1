/**
 * Authenticated-encryption capability types.
 */

/**
 * An AEAD cipher with a fixed key and nonce size. `seal` output carries its
 * own authentication tag; `open` throws on any mismatch.
 */
export interface AeadCipher {
  /** Algorithm name (e.g. `'chacha20-poly1305'`). */
  readonly name: string
  readonly keyLength: number
  readonly nonceLength: number
  /** Bytes `seal` adds to the plaintext length. */
  readonly overhead: number
  seal(key: Uint8Array, nonce: Uint8Array, plaintext: Uint8Array): Uint8Array
  open(key: Uint8Array, nonce: Uint8Array, ciphertext: Uint8Array): Uint8Array
}
