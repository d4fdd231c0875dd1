/**
 * Builders for hand-made file and share containers.
 */

import {
  assembleContainer,
  decodeFileHeader,
  encodeFileHeader,
  encodeShareHeader,
} from '../../src/container/header.js'
import type { ContainerHeader, DecodedContainer } from '../../src/container/header.js'
import { SignatureBinder } from '../../src/signing/binder.js'
import type { SigningIdentity } from '../../src/signing/types.js'
import { fixedNonce, randomBytes } from './candidates.js'

export const binder = new SignatureBinder()

export interface ShareLayout {
  nonce?: Uint8Array
  threshold?: number
  version?: number
  /** Share bytes; defaults to 32 random bytes and x = `x`. */
  body?: Uint8Array
  x?: number
  /** Signs the share when given. */
  identity?: SigningIdentity
}

/** A share body of 32 random bytes followed by the x-coordinate. */
export function shareBody(x = 1): Uint8Array {
  const body = new Uint8Array(33)
  body.set(randomBytes(32), 0)
  body[32] = x
  return body
}

/** Encoded share container. */
export function buildShare(layout: ShareLayout = {}): Uint8Array {
  const fields = {
    version: layout.version ?? 1,
    threshold: layout.threshold ?? 2,
    nonce: layout.nonce ?? fixedNonce(),
  }
  const body = layout.body ?? shareBody(layout.x)
  const header: ContainerHeader =
    layout.identity === undefined
      ? fields
      : { ...fields, signing: binder.signShare(layout.identity, fields, body) }
  return assembleContainer(encodeShareHeader(header), body)
}

export interface FileLayout {
  nonce?: Uint8Array
  threshold?: number
  ciphertext?: Uint8Array
  identity?: SigningIdentity
}

/** Encoded file container. */
export function buildFile(layout: FileLayout = {}): Uint8Array {
  const fields = {
    version: 1,
    threshold: layout.threshold ?? 2,
    nonce: layout.nonce ?? fixedNonce(),
  }
  const ciphertext = layout.ciphertext ?? randomBytes(24)
  const header: ContainerHeader =
    layout.identity === undefined
      ? fields
      : { ...fields, signing: binder.signFile(layout.identity, fields, ciphertext) }
  return assembleContainer(encodeFileHeader(header), ciphertext)
}

/** Decoded file container, for use as a reconciliation target. */
export function fileTarget(layout: FileLayout = {}): DecodedContainer {
  return decodeFileHeader(buildFile(layout))
}
