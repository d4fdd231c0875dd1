/**
 * File naming for containers and shares.
 */

import { FILE_EXTENSION, SHARE_EXTENSION } from '../container/constants.js'

/** Suffix used for decrypted output when the input has no container extension. */
export const DECRYPTED_SUFFIX = '.decrypted'

/** Lowercase hex encoding of `bytes`. */
export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex')
}

/**
 * Share file name: `<index>-<hex nonce>.ccms`. The nonce in the name keeps
 * shares of different files apart when they share a directory.
 */
export function shareFileName(index: number, nonce: Uint8Array): string {
  return `${String(index)}-${toHex(nonce)}${SHARE_EXTENSION}`
}

/** Path of the encrypted container written for `plainPath`. */
export function encryptedPathFor(plainPath: string): string {
  return `${plainPath}${FILE_EXTENSION}`
}

/**
 * Path the plaintext is written to when decrypting `containerPath`. Never
 * equal to `containerPath`.
 */
export function decryptedPathFor(containerPath: string): string {
  if (containerPath.endsWith(FILE_EXTENSION) && containerPath.length > FILE_EXTENSION.length) {
    return containerPath.slice(0, -FILE_EXTENSION.length)
  }
  return `${containerPath}${DECRYPTED_SUFFIX}`
}
