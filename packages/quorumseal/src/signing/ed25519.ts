/**
 * Ed25519 signature scheme.
 *
 * Signing and verification go through Node.js native crypto. Node accepts any
 * 32 bytes as an Ed25519 public key, so structural checks on embedded keys
 * and signatures (point decompression, canonical scalar) use `@noble/curves`.
 */

import * as crypto from 'node:crypto'
import { ed25519 } from '@noble/curves/ed25519.js'
import { bytesToNumberLE } from '@noble/curves/utils.js'
import { PUBLIC_KEY_LENGTH, SIGNATURE_LENGTH } from '../container/constants.js'
import type { SignatureScheme, SigningIdentity } from './types.js'

function decodesToPoint(bytes: Uint8Array): boolean {
  try {
    ed25519.Point.fromBytes(bytes)
    return true
  } catch {
    return false
  }
}

function importPublicKey(raw: Uint8Array): crypto.KeyObject {
  return crypto.createPublicKey({
    key: { kty: 'OKP', crv: 'Ed25519', x: Buffer.from(raw).toString('base64url') },
    format: 'jwk',
  })
}

function exportPublicKey(key: crypto.KeyObject): Uint8Array {
  const jwk = key.export({ format: 'jwk' })
  if (typeof jwk.x !== 'string') {
    throw new Error('Ed25519 public key export did not include the x coordinate')
  }
  return new Uint8Array(Buffer.from(jwk.x, 'base64url'))
}

/**
 * Ed25519 signatures with raw 32-byte public keys and 64-byte signatures.
 * @internal
 */
export class Ed25519Signatures implements SignatureScheme {
  readonly name = 'ed25519'
  readonly publicKeyLength = PUBLIC_KEY_LENGTH
  readonly signatureLength = SIGNATURE_LENGTH

  generateIdentity(): SigningIdentity {
    const { publicKey, privateKey } = crypto.generateKeyPairSync('ed25519')
    return {
      publicKey: exportPublicKey(publicKey),
      sign: (message: Uint8Array): Uint8Array =>
        new Uint8Array(crypto.sign(null, message, privateKey)),
    }
  }

  verify(publicKey: Uint8Array, message: Uint8Array, signature: Uint8Array): boolean {
    if (publicKey.length !== PUBLIC_KEY_LENGTH || signature.length !== SIGNATURE_LENGTH) {
      return false
    }
    try {
      return crypto.verify(null, message, importPublicKey(publicKey), signature)
    } catch {
      return false
    }
  }

  isValidPublicKey(bytes: Uint8Array): boolean {
    return bytes.length === PUBLIC_KEY_LENGTH && decodesToPoint(bytes)
  }

  isValidSignature(bytes: Uint8Array): boolean {
    if (bytes.length !== SIGNATURE_LENGTH) {
      return false
    }
    const s = bytesToNumberLE(bytes.subarray(32))
    return s < ed25519.Point.Fn.ORDER && decodesToPoint(bytes.subarray(0, 32))
  }
}
