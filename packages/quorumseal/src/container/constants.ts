/**
 * Wire constants for the encrypted-file and share containers.
 *
 * File header (18 bytes unsigned):
 *   'C' 'C' 'M' | version | threshold | signed | nonce[12]
 *
 * Share header (20 bytes unsigned):
 *   'C' 'C' 'M' 'S' | version | threshold | signed | nonce[12] | padding
 *
 * Signed containers append `publicKey[32] | signature[64]` to the header,
 * before the body.
 */

/** Algorithm version written into every new container. */
export const ALGORITHM_VERSION = 1

/** Symmetric key length in bytes (ChaCha20-Poly1305). */
export const KEY_LENGTH = 32

/** Nonce length in bytes. Also the correlation id between a file and its shares. */
export const NONCE_LENGTH = 12

/** Embedded signing public key length in bytes (Ed25519). */
export const PUBLIC_KEY_LENGTH = 32

/** Embedded signature length in bytes (Ed25519). */
export const SIGNATURE_LENGTH = 64

/** Magic prefix of an encrypted-file container ("CCM"). */
export const FILE_MAGIC: readonly number[] = [0x43, 0x43, 0x4d]

/** Magic prefix of a share container ("CCMS"). */
export const SHARE_MAGIC: readonly number[] = [0x43, 0x43, 0x4d, 0x53]

/** Unsigned file header length. */
export const FILE_HEADER_LENGTH = FILE_MAGIC.length + 3 + NONCE_LENGTH

/** Unsigned share header length (includes one reserved padding byte). */
export const SHARE_HEADER_LENGTH = SHARE_MAGIC.length + 3 + NONCE_LENGTH + 1

/** Extra header bytes carried by a signed container. */
export const SIGNATURE_BLOCK_LENGTH = PUBLIC_KEY_LENGTH + SIGNATURE_LENGTH

/** File name suffix of encrypted containers. */
export const FILE_EXTENSION = '.ccm'

/** File name suffix of share containers. */
export const SHARE_EXTENSION = '.ccms'
