/**
 * Signature capability types.
 */

/**
 * A one-time signing keypair. The private half never leaves the object and
 * is dropped with it once the encryption operation that created it finishes.
 */
export interface SigningIdentity {
  /** Raw public key bytes, as embedded in signed containers. */
  readonly publicKey: Uint8Array
  /** Produce a detached signature over `message`. */
  sign(message: Uint8Array): Uint8Array
}

/**
 * A detached-signature scheme with fixed-length raw keys and signatures.
 */
export interface SignatureScheme {
  /** Human-readable algorithm name (e.g. `'ed25519'`). */
  readonly name: string
  /** Raw public key length in bytes. */
  readonly publicKeyLength: number
  /** Raw signature length in bytes. */
  readonly signatureLength: number
  /** Generate a fresh ephemeral keypair. */
  generateIdentity(): SigningIdentity
  /**
   * Verify a detached signature. Malformed keys or signatures yield `false`
   * rather than an exception.
   */
  verify(publicKey: Uint8Array, message: Uint8Array, signature: Uint8Array): boolean
  /** Whether `bytes` decode to a usable public key (not merely the right length). */
  isValidPublicKey(bytes: Uint8Array): boolean
  /** Whether `bytes` decode to a well-formed signature (not merely the right length). */
  isValidSignature(bytes: Uint8Array): boolean
}

/** The part of a {@link SignatureScheme} the header codec needs to vet embedded keys. */
export type SignatureBlockValidator = Pick<SignatureScheme, 'isValidPublicKey' | 'isValidSignature'>
