/**
 * Cipher adapter: payload encryption with a mandatory decrypt-back check.
 */

import { AuthenticationError, InternalConsistencyError } from '../errors.js'
import type { KeyMaterial } from '../keys/key-material.js'
import { ChaCha20Poly1305Cipher } from './chacha20-poly1305.js'
import type { AeadCipher } from './types.js'

/**
 * Encrypts and decrypts payloads with a recovered key and the container nonce.
 */
export class CipherAdapter {
  readonly #cipher: AeadCipher

  constructor(cipher: AeadCipher = new ChaCha20Poly1305Cipher()) {
    this.#cipher = cipher
  }

  /** The underlying AEAD. */
  get cipher(): AeadCipher {
    return this.#cipher
  }

  /**
   * Encrypt `plaintext`, then decrypt the result and compare it to the input.
   *
   * @throws {InternalConsistencyError} If the ciphertext does not decrypt back to `plaintext`.
   */
  encrypt(key: KeyMaterial, nonce: Uint8Array, plaintext: Uint8Array): Uint8Array {
    return key.use((raw) => {
      const ciphertext = this.#cipher.seal(raw, nonce, plaintext)

      let roundTrip: Uint8Array
      try {
        roundTrip = this.#cipher.open(raw, nonce, ciphertext)
      } catch {
        throw new InternalConsistencyError('Fresh ciphertext failed to decrypt', 'encrypt')
      }
      if (!Buffer.from(roundTrip).equals(plaintext)) {
        throw new InternalConsistencyError(
          'Decrypted ciphertext does not match the plaintext',
          'encrypt',
        )
      }
      return ciphertext
    })
  }

  /**
   * Decrypt and authenticate `ciphertext`.
   *
   * @throws {AuthenticationError} If the key, nonce and ciphertext do not belong together.
   */
  decrypt(key: KeyMaterial, nonce: Uint8Array, ciphertext: Uint8Array): Uint8Array {
    return key.use((raw) => {
      try {
        return this.#cipher.open(raw, nonce, ciphertext)
      } catch {
        throw new AuthenticationError()
      }
    })
  }
}
