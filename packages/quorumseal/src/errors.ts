/**
 * Error hierarchy for quorumseal.
 *
 * @packageDocumentation
 */

/** Base error for all quorumseal errors. */
export class QuorumSealError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'QuorumSealError'
  }
}

// --- Configuration ---

/**
 * Thrown when the requested share layout cannot work (e.g. a threshold larger
 * than the number of players). Raised before any key or nonce is generated.
 */
export class ConfigurationError extends QuorumSealError {
  /** The option that was rejected (e.g. `'threshold'`, `'players'`). */
  readonly field: string

  constructor(message: string, field: string) {
    super(message)
    this.name = 'ConfigurationError'
    this.field = field
  }
}

// --- Container format ---

/** Machine-readable cause of a {@link FormatError}. */
export type FormatErrorCode =
  | 'missing-magic'
  | 'truncated'
  | 'bad-public-key'
  | 'bad-signature'
  | 'unsupported-version'

/**
 * Thrown when container bytes do not follow the header layout. For the target
 * file this aborts the operation; for a candidate share it only excludes that
 * share.
 */
export class FormatError extends QuorumSealError {
  readonly code: FormatErrorCode

  constructor(message: string, code: FormatErrorCode) {
    super(message)
    this.name = 'FormatError'
    this.code = code
  }
}

// --- Correlation ---

/** Machine-readable cause of a {@link CorrelationError}. */
export type CorrelationErrorCode = 'nonce-mismatch'

/**
 * Raised when a share does not belong with the target file. It excludes that
 * share only, and is kept on the share's `RejectedShare` entry.
 */
export class CorrelationError extends QuorumSealError {
  readonly code: CorrelationErrorCode

  constructor(message: string, code: CorrelationErrorCode) {
    super(message)
    this.name = 'CorrelationError'
    this.code = code
  }
}

// --- Authentication ---

/**
 * Thrown when authenticated decryption fails. The message never says why:
 * callers only learn that the ciphertext, key and nonce do not belong together.
 */
export class AuthenticationError extends QuorumSealError {
  constructor(message = 'Authentication failed') {
    super(message)
    this.name = 'AuthenticationError'
  }
}

/**
 * Thrown in strict mode when a signature check fails or a share's signing
 * state disagrees with the file's.
 */
export class StrictModeViolationError extends AuthenticationError {
  /** Label of the container that failed verification (a share file name, or the target file). */
  readonly source: string

  constructor(message: string, source: string) {
    super(message)
    this.name = 'StrictModeViolationError'
    this.source = source
  }
}

// --- Reconstruction ---

/**
 * Thrown when fewer distinct shares than the threshold are available.
 */
export class InsufficientSharesError extends QuorumSealError {
  /** Number of distinct shares the threshold demands. */
  readonly required: number

  /** Number of distinct shares that were supplied. */
  readonly available: number

  constructor(message: string, required: number, available: number) {
    super(message)
    this.name = 'InsufficientSharesError'
    this.required = required
    this.available = available
  }
}

/**
 * Thrown when share bytes handed to reconstruction are structurally invalid
 * or contradict each other.
 */
export class CorruptSharesError extends QuorumSealError {
  constructor(message: string) {
    super(message)
    this.name = 'CorruptSharesError'
  }
}

// --- Pipeline defects ---

/** Pipeline stage whose self-check failed. */
export type ConsistencyStage = 'split' | 'encrypt'

/**
 * Thrown when a self-check inside the cryptographic pipeline fails (shares do
 * not recover the key they were split from, or ciphertext does not decrypt
 * back to its plaintext). Nothing is written when this is raised.
 */
export class InternalConsistencyError extends QuorumSealError {
  readonly stage: ConsistencyStage

  constructor(message: string, stage: ConsistencyStage) {
    super(message)
    this.name = 'InternalConsistencyError'
    this.stage = stage
  }
}

// --- Operator decisions ---

/**
 * Thrown when a reconciliation policy (or the operator behind it) chose to stop.
 */
export class OperationAbortedError extends QuorumSealError {
  constructor(message: string) {
    super(message)
    this.name = 'OperationAbortedError'
  }
}

// --- Infrastructure ---

/**
 * Thrown when a filesystem operation on a target file or share directory
 * fails.
 */
export class FilesystemError extends QuorumSealError {
  /**
   * The absolute path of the file or directory that caused the error.
   */
  readonly path: string

  /**
   * The access that was attempted (`'read'`, `'write'`, `'list'`).
   */
  readonly permission: string

  constructor(message: string, filePath: string, permission: string) {
    super(message)
    this.name = 'FilesystemError'
    this.path = filePath
    this.permission = permission
  }
}
