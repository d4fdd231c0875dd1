/**
 * Signature binder: builds the canonical signable byte sequence of a
 * container and signs or verifies it.
 *
 * Signable bytes = base header (signed flag set) || public key || body.
 * Verification rebuilds them from parsed fields, never from raw file bytes.
 */

import { encodeBaseHeader } from '../container/header.js'
import type { ContainerHeader, ContainerKind, DecodedContainer, SignatureBlock } from '../container/header.js'
import { Ed25519Signatures } from './ed25519.js'
import type { SignatureScheme, SigningIdentity } from './types.js'

/** Header fields covered by a signature, besides the public key. */
export type SignedFields = Pick<ContainerHeader, 'version' | 'threshold' | 'nonce'>

/**
 * Build the byte sequence a container signature covers.
 */
export function signableBytes(
  kind: ContainerKind,
  fields: SignedFields,
  publicKey: Uint8Array,
  body: Uint8Array,
): Uint8Array {
  const base = encodeBaseHeader(kind, fields, true)
  const out = new Uint8Array(base.length + publicKey.length + body.length)
  out.set(base, 0)
  out.set(publicKey, base.length)
  out.set(body, base.length + publicKey.length)
  return out
}

/**
 * Signs shares and files with a one-time identity and verifies them later.
 */
export class SignatureBinder {
  readonly #scheme: SignatureScheme

  constructor(scheme: SignatureScheme = new Ed25519Signatures()) {
    this.#scheme = scheme
  }

  /** The underlying signature scheme. */
  get scheme(): SignatureScheme {
    return this.#scheme
  }

  /** Generate the ephemeral identity for one encryption operation. */
  createIdentity(): SigningIdentity {
    return this.#scheme.generateIdentity()
  }

  /** Sign a share container's header fields and share bytes. */
  signShare(identity: SigningIdentity, fields: SignedFields, share: Uint8Array): SignatureBlock {
    return this.#sign('share', identity, fields, share)
  }

  /** Sign an encrypted-file container's header fields and ciphertext. */
  signFile(identity: SigningIdentity, fields: SignedFields, ciphertext: Uint8Array): SignatureBlock {
    return this.#sign('file', identity, fields, ciphertext)
  }

  /** Verify a detached signature over already-reconstructed signable bytes. */
  verify(publicKey: Uint8Array, reconstructed: Uint8Array, signature: Uint8Array): boolean {
    return this.#scheme.verify(publicKey, reconstructed, signature)
  }

  /**
   * Verify a decoded container against its own embedded key and signature.
   * Unsigned containers never verify.
   */
  verifyContainer(container: DecodedContainer): boolean {
    const { signing } = container.header
    if (signing === undefined) {
      return false
    }
    const message = signableBytes(container.kind, container.header, signing.publicKey, container.body)
    return this.verify(signing.publicKey, message, signing.signature)
  }

  #sign(
    kind: ContainerKind,
    identity: SigningIdentity,
    fields: SignedFields,
    body: Uint8Array,
  ): SignatureBlock {
    const message = signableBytes(kind, fields, identity.publicKey, body)
    return { publicKey: identity.publicKey, signature: identity.sign(message) }
  }
}
