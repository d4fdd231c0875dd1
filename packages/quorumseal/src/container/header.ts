/**
 * Binary header codec for encrypted-file and share containers.
 *
 * The header length is always derived from the signed flag: the signature
 * block sits between the base header and the body, so reading it wrong would
 * shift the payload boundary.
 */

import { FormatError } from '../errors.js'
import { Ed25519Signatures } from '../signing/ed25519.js'
import type { SignatureBlockValidator } from '../signing/types.js'
import {
  FILE_HEADER_LENGTH,
  FILE_MAGIC,
  NONCE_LENGTH,
  PUBLIC_KEY_LENGTH,
  SHARE_HEADER_LENGTH,
  SHARE_MAGIC,
  SIGNATURE_BLOCK_LENGTH,
  SIGNATURE_LENGTH,
} from './constants.js'

/** Which of the two container layouts a header uses. */
export type ContainerKind = 'file' | 'share'

/** Public key and detached signature carried by a signed container. */
export interface SignatureBlock {
  publicKey: Uint8Array
  signature: Uint8Array
}

/**
 * Parsed header fields. A container is signed exactly when `signing` is
 * present.
 */
export interface ContainerHeader {
  /** Algorithm version byte. */
  version: number
  /** Share threshold recorded by the writer (1..255). */
  threshold: number
  /** Correlation nonce, {@link NONCE_LENGTH} bytes. */
  nonce: Uint8Array
  /** Present on signed containers. */
  signing?: SignatureBlock | undefined
}

/** A container split into its parsed header and its body. */
export interface DecodedContainer {
  kind: ContainerKind
  header: ContainerHeader
  /** Total header length including the signature block, if any. */
  headerLength: number
  /** Everything after the header: ciphertext for files, share bytes for shares. */
  body: Uint8Array
}

/** Options for decoding a container header. */
export interface DecodeOptions {
  /** Validates embedded keys and signatures. Defaults to Ed25519. */
  validator?: SignatureBlockValidator | undefined
}

interface Layout {
  magic: readonly number[]
  baseLength: number
  label: string
}

const LAYOUTS: Record<ContainerKind, Layout> = {
  file: { magic: FILE_MAGIC, baseLength: FILE_HEADER_LENGTH, label: 'encrypted file' },
  share: { magic: SHARE_MAGIC, baseLength: SHARE_HEADER_LENGTH, label: 'share' },
}

const defaultValidator = new Ed25519Signatures()

/** Base header length for `kind`, plus the signature block when `signed`. */
export function headerLength(kind: ContainerKind, signed: boolean): number {
  return LAYOUTS[kind].baseLength + (signed ? SIGNATURE_BLOCK_LENGTH : 0)
}

function assertByte(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0 || value > 255) {
    throw new RangeError(`${field} must be an integer between 0 and 255`)
  }
}

/**
 * Encode the fixed base header (no signature block). The signed flag is
 * written as given, so this is also the prefix that signatures cover.
 */
export function encodeBaseHeader(
  kind: ContainerKind,
  fields: Pick<ContainerHeader, 'version' | 'threshold' | 'nonce'>,
  signed: boolean,
): Uint8Array {
  assertByte(fields.version, 'version')
  assertByte(fields.threshold, 'threshold')
  if (fields.nonce.length !== NONCE_LENGTH) {
    throw new RangeError(`nonce must be ${String(NONCE_LENGTH)} bytes`)
  }

  const { magic, baseLength } = LAYOUTS[kind]
  const out = new Uint8Array(baseLength)
  out.set(magic, 0)
  let offset = magic.length
  out[offset++] = fields.version
  out[offset++] = fields.threshold
  out[offset++] = signed ? 1 : 0
  out.set(fields.nonce, offset)
  // share headers end with one zeroed padding byte, left as-is
  return out
}

function encodeHeader(kind: ContainerKind, header: ContainerHeader): Uint8Array {
  const base = encodeBaseHeader(kind, header, header.signing !== undefined)
  if (header.signing === undefined) {
    return base
  }
  const { publicKey, signature } = header.signing
  if (publicKey.length !== PUBLIC_KEY_LENGTH) {
    throw new RangeError(`publicKey must be ${String(PUBLIC_KEY_LENGTH)} bytes`)
  }
  if (signature.length !== SIGNATURE_LENGTH) {
    throw new RangeError(`signature must be ${String(SIGNATURE_LENGTH)} bytes`)
  }
  const out = new Uint8Array(base.length + SIGNATURE_BLOCK_LENGTH)
  out.set(base, 0)
  out.set(publicKey, base.length)
  out.set(signature, base.length + PUBLIC_KEY_LENGTH)
  return out
}

function hasMagic(bytes: Uint8Array, magic: readonly number[]): boolean {
  if (bytes.length < magic.length) {
    return false
  }
  return magic.every((b, i) => bytes[i] === b)
}

/** Fixed base-header fields, read without touching the signature block. */
export interface HeaderPeek {
  version: number
  threshold: number
  signed: boolean
  nonce: Uint8Array
}

/**
 * Read the base header of a container: magic, version, threshold, signed
 * flag and nonce. Does not look at the signature block or the body.
 *
 * @throws {FormatError} `missing-magic` or `truncated`.
 */
export function peekHeader(kind: ContainerKind, bytes: Uint8Array): HeaderPeek {
  const { magic, baseLength, label } = LAYOUTS[kind]

  if (!hasMagic(bytes, magic)) {
    throw new FormatError(`Not a ${label} container (magic bytes missing)`, 'missing-magic')
  }
  if (bytes.length < baseLength) {
    throw new FormatError(
      `Truncated ${label} header: ${String(bytes.length)} of ${String(baseLength)} bytes`,
      'truncated',
    )
  }

  let offset = magic.length
  const version = bytes[offset++] ?? 0
  const threshold = bytes[offset++] ?? 0
  const signed = (bytes[offset++] ?? 0) !== 0
  const nonce = bytes.slice(offset, offset + NONCE_LENGTH)
  return { version, threshold, signed, nonce }
}

function decodeContainer(
  kind: ContainerKind,
  bytes: Uint8Array,
  options?: DecodeOptions,
): DecodedContainer {
  const { baseLength, label } = LAYOUTS[kind]
  const { version, threshold, signed, nonce } = peekHeader(kind, bytes)

  const length = headerLength(kind, signed)
  if (bytes.length < length) {
    throw new FormatError(
      `Truncated signed ${label} header: ${String(bytes.length)} of ${String(length)} bytes`,
      'truncated',
    )
  }

  const header: ContainerHeader = { version, threshold, nonce }

  if (signed) {
    const validator = options?.validator ?? defaultValidator
    const publicKey = bytes.slice(baseLength, baseLength + PUBLIC_KEY_LENGTH)
    const signature = bytes.slice(baseLength + PUBLIC_KEY_LENGTH, length)
    if (!validator.isValidPublicKey(publicKey)) {
      throw new FormatError(`The ${label} carries an invalid public key`, 'bad-public-key')
    }
    if (!validator.isValidSignature(signature)) {
      throw new FormatError(`The ${label} carries an invalid signature`, 'bad-signature')
    }
    header.signing = { publicKey, signature }
  }

  return { kind, header, headerLength: length, body: bytes.slice(length) }
}

/** Encode an encrypted-file header (including the signature block when signed). */
export function encodeFileHeader(header: ContainerHeader): Uint8Array {
  return encodeHeader('file', header)
}

/**
 * Decode an encrypted-file container into header and ciphertext.
 *
 * @throws {FormatError} `missing-magic`, `truncated`, `bad-public-key` or `bad-signature`.
 */
export function decodeFileHeader(bytes: Uint8Array, options?: DecodeOptions): DecodedContainer {
  return decodeContainer('file', bytes, options)
}

/** Encode a share header (including the signature block when signed). */
export function encodeShareHeader(header: ContainerHeader): Uint8Array {
  return encodeHeader('share', header)
}

/**
 * Decode a share container into header and share bytes.
 *
 * @throws {FormatError} `missing-magic`, `truncated`, `bad-public-key` or `bad-signature`.
 */
export function decodeShareHeader(bytes: Uint8Array, options?: DecodeOptions): DecodedContainer {
  return decodeContainer('share', bytes, options)
}

/** Concatenate an encoded header and a body into one container. */
export function assembleContainer(header: Uint8Array, body: Uint8Array): Uint8Array {
  const out = new Uint8Array(header.length + body.length)
  out.set(header, 0)
  out.set(body, header.length)
  return out
}
