/**
 * Share reconciliation: turns a directory listing into a pool of shares that
 * belong to one encrypted file.
 *
 * @remarks
 * Every candidate goes through the same checks in order: size, share magic,
 * nonce, algorithm version, header and signature block, share shape,
 * recorded threshold, signatures. A failed check rejects that candidate
 * only; the scan always runs to the end. The whole operation stops only when
 * the policy says so, or in strict mode when a signed share fails against a
 * signed file. Signatures are only compared when both the file and the share
 * are signed; a difference in signing state is a warning.
 */

import {
  ALGORITHM_VERSION,
  KEY_LENGTH,
  SHARE_HEADER_LENGTH,
} from '../container/constants.js'
import { decodeShareHeader, peekHeader } from '../container/header.js'
import type { ContainerHeader, DecodedContainer } from '../container/header.js'
import {
  ConfigurationError,
  CorrelationError,
  FormatError,
  OperationAbortedError,
  StrictModeViolationError,
} from '../errors.js'
import type { FormatErrorCode, QuorumSealError } from '../errors.js'
import { SignatureBinder } from '../signing/binder.js'
import { MAX_SHARES } from '../sharing/engine.js'
import { ShamirSecretSharing } from '../sharing/shamir.js'
import type { SecretSharingScheme } from '../sharing/types.js'
import type { ShareCandidate } from '../storage/types.js'
import type {
  ReconciliationPolicy,
  ReconciliationReport,
  RejectedShare,
  RejectionReason,
  SignatureFailureKind,
  SigningMismatch,
  SigningMismatchKind,
  ThresholdDecision,
  UnsealEventListener,
} from './types.js'

/** Collaborators for a {@link ShareReconciler}. */
export interface ReconcilerOptions {
  policy: ReconciliationPolicy
  binder?: SignatureBinder | undefined
  scheme?: SecretSharingScheme | undefined
  onEvent?: UnsealEventListener | undefined
}

const FORMAT_REASONS: Record<FormatErrorCode, RejectionReason> = {
  'missing-magic': 'not-a-share',
  truncated: 'truncated',
  'bad-public-key': 'bad-public-key',
  'bad-signature': 'bad-signature',
  'unsupported-version': 'unsupported-version',
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return Buffer.from(a).equals(b)
}

/** One-line description of a signing mismatch, for warnings and errors. */
export function describeSigningMismatch(mismatch: Pick<SigningMismatch, 'source' | 'kind'>): string {
  const messages: Record<SigningMismatchKind, string> = {
    'unsigned-share': 'is not signed, but the encrypted file is',
    'unsigned-file': 'is signed, but the encrypted file is not',
    'public-key-mismatch': 'was signed with a different key than the encrypted file',
    'invalid-share-signature': 'carries a signature that does not verify',
  }
  return `Share ${mismatch.source} ${messages[mismatch.kind]}`
}

/**
 * Gathers shares for one encrypted file and settles disagreements through a
 * {@link ReconciliationPolicy}.
 *
 * @remarks
 * The effective threshold starts at the file's recorded threshold and only
 * changes through an `override` resolution. Each change is recorded in the
 * report, and later shares are compared against the new value.
 */
export class ShareReconciler {
  readonly #target: ContainerHeader
  readonly #policy: ReconciliationPolicy
  readonly #binder: SignatureBinder
  readonly #scheme: SecretSharingScheme
  readonly #emit: UnsealEventListener

  #effectiveThreshold: number
  readonly #pool: Uint8Array[] = []
  readonly #accepted: string[] = []
  readonly #rejected: RejectedShare[] = []
  readonly #warnings: string[] = []
  readonly #decisions: ThresholdDecision[] = []

  constructor(target: ContainerHeader, options: ReconcilerOptions) {
    this.#target = target
    this.#policy = options.policy
    this.#binder = options.binder ?? new SignatureBinder()
    this.#scheme = options.scheme ?? new ShamirSecretSharing()
    this.#emit = options.onEvent ?? (() => undefined)
    this.#effectiveThreshold = target.threshold
  }

  /** Threshold to reconstruct with, after any overrides so far. */
  get effectiveThreshold(): number {
    return this.#effectiveThreshold
  }

  /**
   * Examine every candidate in order and return the share bytes that passed.
   *
   * @throws {OperationAbortedError} If the policy aborts.
   * @throws {StrictModeViolationError} In strict mode, when a share disagrees with a signed file.
   */
  async gather(candidates: readonly ShareCandidate[]): Promise<Uint8Array[]> {
    for (const candidate of candidates) {
      await this.#examine(candidate)
    }
    return [...this.#pool]
  }

  /**
   * Check the target file's own signature. Unsigned files pass. A failure
   * aborts in strict mode; otherwise the policy decides.
   */
  async verifyFile(file: DecodedContainer, source: string): Promise<void> {
    const { signing } = file.header
    if (signing === undefined) {
      return
    }
    if (this.#binder.verifyContainer(file)) {
      this.#emit({ type: 'file-verified', publicKey: signing.publicKey })
      return
    }

    const mismatch = { source, publicKey: signing.publicKey }
    const strict = this.#policy.strict
    this.#emit({ type: 'file-signature-mismatch', mismatch, strict })
    const message = `The signature on ${source} does not verify`
    if (strict) {
      throw new StrictModeViolationError(message, source)
    }
    const resolution = await this.#policy.resolveFileSignatureMismatch(mismatch)
    if (resolution === 'abort') {
      throw new OperationAbortedError(`Stopped: ${message}`)
    }
    this.#warnings.push(message)
  }

  /** Snapshot of the run so far. */
  report(): ReconciliationReport {
    return {
      fileThreshold: this.#target.threshold,
      effectiveThreshold: this.#effectiveThreshold,
      accepted: [...this.#accepted],
      rejected: [...this.#rejected],
      warnings: [...this.#warnings],
      thresholdResolutions: [...this.#decisions],
    }
  }

  async #examine(candidate: ShareCandidate): Promise<void> {
    const source = candidate.name

    let bytes: Uint8Array
    try {
      bytes = await candidate.read()
    } catch (err) {
      this.#reject(source, 'unreadable', `Cannot read ${source}: ${errorText(err)}`)
      return
    }

    if (bytes.length < SHARE_HEADER_LENGTH) {
      this.#reject(
        source,
        'malformed',
        `${source} is ${String(bytes.length)} bytes, shorter than a share header`,
      )
      return
    }

    let share: DecodedContainer
    try {
      const peek = peekHeader('share', bytes)
      if (!sameBytes(peek.nonce, this.#target.nonce)) {
        const err = new CorrelationError(`${source} belongs to a different encrypted file`, 'nonce-mismatch')
        this.#reject(source, 'wrong-file', err.message, err)
        return
      }
      if (peek.version !== ALGORITHM_VERSION) {
        throw new FormatError(
          `Algorithm version ${String(peek.version)} is not supported (expected ${String(ALGORITHM_VERSION)})`,
          'unsupported-version',
        )
      }
      share = decodeShareHeader(bytes, { validator: this.#binder.scheme })
    } catch (err) {
      if (err instanceof FormatError) {
        this.#reject(source, FORMAT_REASONS[err.code], `${source}: ${err.message}`, err)
        return
      }
      throw err
    }

    if (!this.#scheme.isWellFormedShare(share.body, KEY_LENGTH)) {
      this.#reject(
        source,
        'corrupt-share',
        `${source} does not hold a well-formed key share (${String(share.body.length)} bytes)`,
      )
      return
    }

    await this.#crossCheckThreshold(source, share.header.threshold)

    if (!(await this.#crossCheckSigning(source, share))) {
      return
    }

    this.#pool.push(share.body)
    this.#accepted.push(source)
    this.#emit({ type: 'share-accepted', source, signed: share.header.signing !== undefined })
  }

  async #crossCheckThreshold(source: string, shareThreshold: number): Promise<void> {
    const from = this.#effectiveThreshold
    if (shareThreshold === from) {
      return
    }

    const mismatch = {
      source,
      fileThreshold: this.#target.threshold,
      shareThreshold,
      effectiveThreshold: from,
    }
    this.#emit({ type: 'threshold-mismatch', mismatch })
    const resolution = await this.#policy.resolveThresholdMismatch(mismatch)
    this.#emit({ type: 'threshold-resolved', mismatch, resolution })

    switch (resolution.action) {
      case 'abort':
        throw new OperationAbortedError(
          `Stopped at ${source}: it records threshold ${String(shareThreshold)}, expected ${String(from)}`,
        )
      case 'keep':
        this.#decisions.push({ source, shareThreshold, from, to: from })
        return
      case 'override': {
        const to = resolution.threshold
        if (!Number.isInteger(to) || to < 1 || to > MAX_SHARES) {
          throw new ConfigurationError(
            `Override threshold must be a whole number between 1 and ${String(MAX_SHARES)}`,
            'threshold',
          )
        }
        this.#decisions.push({ source, shareThreshold, from, to })
        this.#effectiveThreshold = to
        return
      }
    }
  }

  /** Returns whether the share stays in the running. */
  async #crossCheckSigning(source: string, share: DecodedContainer): Promise<boolean> {
    const fileSigning = this.#target.signing
    const shareSigning = share.header.signing
    if (fileSigning === undefined && shareSigning === undefined) {
      return true
    }

    if (fileSigning === undefined || shareSigning === undefined) {
      const notice: SigningMismatch = {
        source,
        kind: shareSigning === undefined ? 'unsigned-share' : 'unsigned-file',
        filePublicKey: fileSigning?.publicKey,
        sharePublicKey: shareSigning?.publicKey,
      }
      this.#emit({ type: 'signing-mismatch', mismatch: notice, strict: false })
      this.#warnings.push(describeSigningMismatch(notice))
      return true
    }

    let kind: SignatureFailureKind | undefined
    if (!this.#binder.verifyContainer(share)) {
      kind = 'invalid-share-signature'
    } else if (!sameBytes(fileSigning.publicKey, shareSigning.publicKey)) {
      kind = 'public-key-mismatch'
    }
    if (kind === undefined) {
      return true
    }

    const mismatch = {
      source,
      kind,
      filePublicKey: fileSigning.publicKey,
      sharePublicKey: shareSigning.publicKey,
    }
    const strict = this.#policy.strict
    this.#emit({ type: 'signing-mismatch', mismatch, strict })
    const message = describeSigningMismatch(mismatch)

    if (strict) {
      throw new StrictModeViolationError(message, source)
    }

    const resolution = await this.#policy.resolveSigningMismatch(mismatch)
    switch (resolution) {
      case 'abort':
        throw new OperationAbortedError(`Stopped: ${message}`)
      case 'exclude':
        this.#reject(source, 'signature-mismatch', message)
        return false
      case 'accept':
        this.#warnings.push(message)
        return true
    }
  }

  #reject(source: string, reason: RejectionReason, message: string, error?: QuorumSealError): void {
    this.#rejected.push({ source, reason, message, error })
    this.#emit({ type: 'share-rejected', source, reason, message })
  }
}
