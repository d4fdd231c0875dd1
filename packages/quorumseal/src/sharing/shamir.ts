/**
 * Shamir's secret sharing over GF(256), backed by `shamir-secret-sharing`.
 *
 * Share layout (from the library): `y[secretLength] || x[1]`.
 */

import { split, combine } from 'shamir-secret-sharing'
import type { SecretSharingScheme } from './types.js'

/**
 * Shamir adapter.
 *
 * The library only accepts thresholds of 2 or more. A threshold of 1 is a
 * degree-0 polynomial: every share's `y` is the secret itself, with
 * x-coordinates `1..players`. Those shares are handled here and stay
 * compatible with the library's `combine`.
 *
 * @internal
 */
export class ShamirSecretSharing implements SecretSharingScheme {
  readonly name = 'shamir-gf256'

  split(secret: Uint8Array, players: number, threshold: number): Promise<Uint8Array[]> {
    if (threshold === 1) {
      const shares = Array.from({ length: players }, (_, i) => {
        const share = new Uint8Array(secret.length + 1)
        share.set(secret, 0)
        share[secret.length] = i + 1
        return share
      })
      return Promise.resolve(shares)
    }
    return split(secret, players, threshold)
  }

  combine(shares: Uint8Array[], _threshold: number): Promise<Uint8Array> {
    const [only] = shares
    if (shares.length === 1 && only !== undefined) {
      return Promise.resolve(only.slice(0, only.length - 1))
    }
    return combine(shares)
  }

  isWellFormedShare(bytes: Uint8Array, secretLength: number): boolean {
    return bytes.length === secretLength + 1 && this.shareId(bytes) !== 0
  }

  shareId(bytes: Uint8Array): number {
    return bytes[bytes.length - 1] ?? 0
  }
}
