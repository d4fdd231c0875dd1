/**
 * Key-split engine: splits a symmetric key into threshold shares and
 * reconstructs it from a quorum.
 */

import { KEY_LENGTH } from '../container/constants.js'
import {
  ConfigurationError,
  CorruptSharesError,
  InsufficientSharesError,
  InternalConsistencyError,
} from '../errors.js'
import { KeyMaterial, withKeyMaterial } from '../keys/key-material.js'
import { ShamirSecretSharing } from './shamir.js'
import type { SecretSharingScheme } from './types.js'

/** Upper bound on players and threshold (one byte on the wire). */
export const MAX_SHARES = 255

/** How many shares to produce and how many recover the key. */
export interface ShareLayout {
  players: number
  threshold: number
}

function assertCount(value: number, field: string): void {
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${field} must be a whole number`, field)
  }
  if (value < 1) {
    throw new ConfigurationError(`${field} cannot be zero`, field)
  }
  if (value > MAX_SHARES) {
    throw new ConfigurationError(`${field} cannot exceed ${String(MAX_SHARES)}`, field)
  }
}

/**
 * Check `1 <= threshold <= players <= 255`.
 *
 * @throws {ConfigurationError} Naming the offending field.
 */
export function validateShareLayout(layout: ShareLayout): void {
  assertCount(layout.players, 'players')
  assertCount(layout.threshold, 'threshold')
  if (layout.threshold > layout.players) {
    throw new ConfigurationError(
      `Threshold (${String(layout.threshold)}) exceeds the number of shares (${String(layout.players)}); the file would be unrecoverable`,
      'threshold',
    )
  }
}

/**
 * Splits and reconstructs {@link KeyMaterial} through a
 * {@link SecretSharingScheme}.
 */
export class KeySplitEngine {
  readonly #scheme: SecretSharingScheme

  constructor(scheme: SecretSharingScheme = new ShamirSecretSharing()) {
    this.#scheme = scheme
  }

  /** The underlying sharing scheme. */
  get scheme(): SecretSharingScheme {
    return this.#scheme
  }

  /**
   * Split `key` into `layout.players` shares, then recover the key from the
   * first `layout.threshold` of them and compare.
   *
   * @throws {ConfigurationError} If the layout is invalid.
   * @throws {InternalConsistencyError} If the produced shares do not recover `key`.
   */
  async split(key: KeyMaterial, layout: ShareLayout): Promise<Uint8Array[]> {
    validateShareLayout(layout)

    const secret = key.use((bytes) => bytes.slice())
    let shares: Uint8Array[]
    try {
      shares = await this.#scheme.split(secret, layout.players, layout.threshold)
    } finally {
      secret.fill(0)
    }

    if (shares.length !== layout.players) {
      throw new InternalConsistencyError(
        `Sharing scheme produced ${String(shares.length)} shares, expected ${String(layout.players)}`,
        'split',
      )
    }

    let recovered: KeyMaterial
    try {
      recovered = await this.reconstruct(shares.slice(0, layout.threshold), layout.threshold)
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new InternalConsistencyError(`Unable to recover the key from fresh shares: ${reason}`, 'split')
    }

    const matches = await withKeyMaterial(recovered, (r) => r.equals(key))
    if (!matches) {
      throw new InternalConsistencyError('Fresh shares recover a different key', 'split')
    }

    return shares
  }

  /**
   * Recover a key from `shares`. Duplicate shares (identical bytes) count
   * once; more than `threshold` shares are accepted.
   *
   * @throws {InsufficientSharesError} If fewer than `threshold` distinct shares are given.
   * @throws {CorruptSharesError} If a share is malformed or two shares claim the same point.
   */
  async reconstruct(shares: Uint8Array[], threshold: number): Promise<KeyMaterial> {
    assertCount(threshold, 'threshold')

    const distinct = new Map<number, Uint8Array>()
    for (const share of shares) {
      if (!this.#scheme.isWellFormedShare(share, KEY_LENGTH)) {
        throw new CorruptSharesError(
          `Malformed share (${String(share.length)} bytes) cannot be used for recovery`,
        )
      }
      const id = this.#scheme.shareId(share)
      const existing = distinct.get(id)
      if (existing === undefined) {
        distinct.set(id, share)
      } else if (!Buffer.from(existing).equals(share)) {
        throw new CorruptSharesError(`Conflicting shares for point ${String(id)}`)
      }
    }

    if (distinct.size < threshold) {
      throw new InsufficientSharesError(
        `Recovery needs ${String(threshold)} distinct share(s) but only ${String(distinct.size)} were found`,
        threshold,
        distinct.size,
      )
    }

    let secret: Uint8Array
    try {
      secret = await this.#scheme.combine([...distinct.values()], threshold)
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new CorruptSharesError(`Share recovery failed: ${reason}`)
    }

    if (secret.length !== KEY_LENGTH) {
      secret.fill(0)
      throw new CorruptSharesError(
        `Recovered secret is ${String(secret.length)} bytes, expected ${String(KEY_LENGTH)}`,
      )
    }

    return KeyMaterial.adopt(secret)
  }
}
