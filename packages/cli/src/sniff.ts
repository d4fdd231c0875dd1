/**
 * Content-type sniffing for decrypted output.
 *
 * @remarks
 * Entries in `magic-numbers.json` are tried in order; the first whose
 * signature matches at its offset wins, so more specific signatures come
 * first in the table.
 *
 * @internal
 */

import table from './magic-numbers.json' with { type: 'json' }
import type { ContentType } from './types.js'

interface MagicNumber {
  name: string
  mime: string
  offset: number
  signature: Uint8Array
}

const MAGIC_NUMBERS: readonly MagicNumber[] = table.map((entry) => ({
  name: entry.name,
  mime: entry.mime,
  offset: entry.offset,
  signature: new Uint8Array(Buffer.from(entry.signature, 'hex')),
}))

const EMPTY: ContentType = { name: 'empty file', mime: 'application/x-empty' }
const TEXT: ContentType = { name: 'text', mime: 'text/plain' }
const BINARY: ContentType = { name: 'binary data', mime: 'application/octet-stream' }

/** How many leading bytes are inspected when deciding whether data is text. */
const TEXT_PROBE_LENGTH = 4096

function matchesAt(bytes: Uint8Array, magic: MagicNumber): boolean {
  const { offset, signature } = magic
  if (bytes.length < offset + signature.length) {
    return false
  }
  return signature.every((b, i) => bytes[offset + i] === b)
}

function looksLikeText(bytes: Uint8Array): boolean {
  const probe = bytes.subarray(0, TEXT_PROBE_LENGTH)
  for (const b of probe) {
    // NUL and C0 controls other than tab, LF, FF and CR
    if (b < 0x20 && b !== 0x09 && b !== 0x0a && b !== 0x0c && b !== 0x0d) {
      return false
    }
  }
  try {
    // a multi-byte sequence cut at the probe boundary is not an error
    new TextDecoder('utf-8', { fatal: true }).decode(probe, { stream: true })
    return true
  } catch {
    return false
  }
}

/** Identify the content type of `bytes` from its leading bytes. */
export function detectContentType(bytes: Uint8Array): ContentType {
  if (bytes.length === 0) {
    return EMPTY
  }
  const match = MAGIC_NUMBERS.find((magic) => matchesAt(bytes, magic))
  if (match !== undefined) {
    return { name: match.name, mime: match.mime }
  }
  return looksLikeText(bytes) ? TEXT : BINARY
}
