/**
 * ChaCha20-Poly1305 via Node.js native crypto.
 *
 * Output format: `ciphertext || tag[16]`.
 */

import * as crypto from 'node:crypto'
import { KEY_LENGTH, NONCE_LENGTH } from '../container/constants.js'
import { AuthenticationError } from '../errors.js'
import type { AeadCipher } from './types.js'

const ALGORITHM = 'chacha20-poly1305'
const TAG_LENGTH = 16

/**
 * ChaCha20-Poly1305 AEAD.
 * @internal
 */
export class ChaCha20Poly1305Cipher implements AeadCipher {
  readonly name = ALGORITHM
  readonly keyLength = KEY_LENGTH
  readonly nonceLength = NONCE_LENGTH
  readonly overhead = TAG_LENGTH

  seal(key: Uint8Array, nonce: Uint8Array, plaintext: Uint8Array): Uint8Array {
    this.#checkParams(key, nonce)
    const cipher = crypto.createCipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_LENGTH })
    const encrypted = Buffer.concat([cipher.update(plaintext), cipher.final()])
    const tag = cipher.getAuthTag()
    return new Uint8Array(Buffer.concat([encrypted, tag]))
  }

  /**
   * @throws {AuthenticationError} On any failure. The reason is not disclosed.
   */
  open(key: Uint8Array, nonce: Uint8Array, ciphertext: Uint8Array): Uint8Array {
    this.#checkParams(key, nonce)
    if (ciphertext.length < TAG_LENGTH) {
      throw new AuthenticationError()
    }
    const body = ciphertext.subarray(0, ciphertext.length - TAG_LENGTH)
    const tag = ciphertext.subarray(ciphertext.length - TAG_LENGTH)
    try {
      const decipher = crypto.createDecipheriv(ALGORITHM, key, nonce, {
        authTagLength: TAG_LENGTH,
      })
      decipher.setAuthTag(tag)
      return new Uint8Array(Buffer.concat([decipher.update(body), decipher.final()]))
    } catch {
      throw new AuthenticationError()
    }
  }

  #checkParams(key: Uint8Array, nonce: Uint8Array): void {
    if (key.length !== KEY_LENGTH) {
      throw new RangeError(`${ALGORITHM} key must be ${String(KEY_LENGTH)} bytes`)
    }
    if (nonce.length !== NONCE_LENGTH) {
      throw new RangeError(`${ALGORITHM} nonce must be ${String(NONCE_LENGTH)} bytes`)
    }
  }
}
