/**
 * Threshold secret-sharing capability types.
 */

/**
 * A threshold secret-sharing primitive. Any `threshold` distinct shares
 * recover the secret; fewer reveal nothing about it.
 */
export interface SecretSharingScheme {
  /** Human-readable scheme name (e.g. `'shamir-gf256'`). */
  readonly name: string
  /**
   * Split `secret` into `players` shares, any `threshold` of which recover it.
   * Callers validate `1 <= threshold <= players <= 255` beforehand.
   */
  split(secret: Uint8Array, players: number, threshold: number): Promise<Uint8Array[]>
  /**
   * Recover the secret from distinct, well-formed shares. The count check
   * against the threshold is the caller's responsibility.
   */
  combine(shares: Uint8Array[], threshold: number): Promise<Uint8Array>
  /** Whether `bytes` can be a share of a `secretLength`-byte secret. */
  isWellFormedShare(bytes: Uint8Array, secretLength: number): boolean
  /** Stable identifier of the point a share encodes (its x-coordinate). */
  shareId(bytes: Uint8Array): number
}
