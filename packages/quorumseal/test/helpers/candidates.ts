/**
 * Shared test helpers for building share candidates.
 */

import * as crypto from 'node:crypto'
import type { SealedShare } from '../../src/types.js'
import type { ShareCandidate } from '../../src/storage/types.js'

/** A candidate that reads back a copy of `bytes`. */
export function candidate(name: string, bytes: Uint8Array): ShareCandidate {
  return { name, read: () => Promise.resolve(bytes.slice()) }
}

/** A candidate whose read always fails. */
export function unreadableCandidate(name: string, message = 'EACCES: permission denied'): ShareCandidate {
  return { name, read: () => Promise.reject(new Error(message)) }
}

/** Candidates for sealed shares, named by their suggested file names. */
export function shareCandidates(shares: readonly SealedShare[]): ShareCandidate[] {
  return shares.map((share) => candidate(share.fileName, share.bytes))
}

/** `length` random bytes. */
export function randomBytes(length: number): Uint8Array {
  return new Uint8Array(crypto.randomBytes(length))
}

/** UTF-8 encode `text`. */
export function utf8(text: string): Uint8Array {
  return new TextEncoder().encode(text)
}

/** A fixed nonce `0x00..0x0b`, or every byte set to `fill`. */
export function fixedNonce(fill?: number): Uint8Array {
  return fill === undefined
    ? Uint8Array.from({ length: 12 }, (_, i) => i)
    : new Uint8Array(12).fill(fill)
}
