/**
 * Symmetric key lifecycle: generation, scoped use, and zeroization.
 *
 * A `KeyMaterial` owns its buffer. Whoever creates or reconstructs one runs
 * it through {@link withKeyMaterial}, whose `finally` block overwrites the
 * bytes on every exit path.
 */

import * as crypto from 'node:crypto'
import { KEY_LENGTH, NONCE_LENGTH } from '../container/constants.js'

const INSPECT_CUSTOM = Symbol.for('nodejs.util.inspect.custom')

/**
 * A symmetric key held in memory for the duration of one operation.
 * @internal
 */
export class KeyMaterial {
  readonly #bytes: Uint8Array
  #disposed = false

  private constructor(bytes: Uint8Array) {
    this.#bytes = bytes
  }

  /** Generate a fresh random key of `length` bytes. */
  static generate(length: number = KEY_LENGTH): KeyMaterial {
    return new KeyMaterial(new Uint8Array(crypto.randomBytes(length)))
  }

  /**
   * Take ownership of `bytes`. The caller must not keep using the array: it
   * is zeroed when the key is disposed.
   */
  static adopt(bytes: Uint8Array): KeyMaterial {
    return new KeyMaterial(bytes)
  }

  /** Key length in bytes. */
  get length(): number {
    return this.#bytes.length
  }

  /** `true` once {@link dispose} has run. */
  get disposed(): boolean {
    return this.#disposed
  }

  /**
   * Pass the raw key to `callback`. The callback must not retain the array.
   *
   * @throws {Error} If the key has already been disposed.
   */
  use<T>(callback: (bytes: Uint8Array) => T): T {
    if (this.#disposed) {
      throw new Error('KeyMaterial has been disposed')
    }
    return callback(this.#bytes)
  }

  /** Constant-time comparison against another key. */
  equals(other: KeyMaterial): boolean {
    return this.use((mine) =>
      other.use(
        (theirs) =>
          mine.length === theirs.length && crypto.timingSafeEqual(mine, theirs),
      ),
    )
  }

  /** Overwrite the key with zeros. Safe to call more than once. */
  dispose(): void {
    this.#bytes.fill(0)
    this.#disposed = true
  }

  [INSPECT_CUSTOM](): string {
    return '[KeyMaterial]'
  }
}

/**
 * Run `callback` with `key`, then zero the key whether the callback returns,
 * throws or rejects.
 */
export async function withKeyMaterial<T>(
  key: KeyMaterial,
  callback: (key: KeyMaterial) => T | Promise<T>,
): Promise<T> {
  try {
    return await callback(key)
  } finally {
    key.dispose()
  }
}

/** Generate a fresh random correlation nonce. */
export function generateNonce(): Uint8Array {
  return new Uint8Array(crypto.randomBytes(NONCE_LENGTH))
}
