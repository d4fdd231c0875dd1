/**
 * QuorumSeal main class: wires the codec, key-split engine, cipher adapter,
 * signature binder and share reconciliation together.
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { CipherAdapter } from './cipher/adapter.js'
import type { AeadCipher } from './cipher/types.js'
import { loadConfig, getDefaultConfigDir } from './config.js'
import { ALGORITHM_VERSION } from './container/constants.js'
import {
  assembleContainer,
  decodeFileHeader,
  encodeFileHeader,
  encodeShareHeader,
  peekHeader,
} from './container/header.js'
import { runDoctor } from './doctor/runner.js'
import { FilesystemError, FormatError, QuorumSealError } from './errors.js'
import { KeyMaterial, generateNonce, withKeyMaterial } from './keys/key-material.js'
import { createStaticPolicy } from './reconcile/policy.js'
import { ShareReconciler } from './reconcile/protocol.js'
import type { ReconciliationPolicy } from './reconcile/types.js'
import { KeySplitEngine, validateShareLayout } from './sharing/engine.js'
import type { SecretSharingScheme } from './sharing/types.js'
import { SignatureBinder } from './signing/binder.js'
import type { SignatureScheme } from './signing/types.js'
import { decryptedPathFor, encryptedPathFor, shareFileName } from './storage/naming.js'
import type { ShareCandidate } from './storage/types.js'
import type {
  PreflightResult,
  QuorumSealConfig,
  SealFileOptions,
  SealFileResult,
  SealOptions,
  SealedArtifacts,
  SealedShare,
  UnsealFileOptions,
  UnsealFileResult,
  UnsealOptions,
  UnsealResult,
} from './types.js'

/** Options for creating a QuorumSeal instance. */
export interface QuorumSealOptions {
  /** Override the config directory. */
  configDir?: string | undefined
  /** Supply config directly, skipping file load. */
  config?: QuorumSealConfig | undefined
  /** Skip the doctor preflight check. */
  skipDoctor?: boolean | undefined
  /** Secret-sharing scheme. Defaults to Shamir over GF(256). */
  sharing?: SecretSharingScheme | undefined
  /** AEAD cipher. Defaults to ChaCha20-Poly1305. */
  cipher?: AeadCipher | undefined
  /** Signature scheme. Defaults to Ed25519. */
  signatures?: SignatureScheme | undefined
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

async function readTarget(filePath: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await fs.readFile(filePath))
  } catch (err) {
    throw new FilesystemError(`Cannot read ${filePath}: ${errorText(err)}`, path.resolve(filePath), 'read')
  }
}

async function writeOutput(filePath: string, bytes: Uint8Array): Promise<void> {
  try {
    await fs.writeFile(filePath, bytes, { mode: 0o600 })
  } catch (err) {
    throw new FilesystemError(`Cannot write ${filePath}: ${errorText(err)}`, path.resolve(filePath), 'write')
  }
}

/**
 * Main entry point for quorumseal. Seals payloads into an encrypted container
 * plus threshold shares, and unseals them from a gathered set of shares.
 */
export class QuorumSeal {
  readonly #config: QuorumSealConfig
  readonly #engine: KeySplitEngine
  readonly #cipher: CipherAdapter
  readonly #binder: SignatureBinder

  private constructor(config: QuorumSealConfig, options: QuorumSealOptions) {
    this.#config = config
    this.#engine = new KeySplitEngine(options.sharing)
    this.#cipher = new CipherAdapter(options.cipher)
    this.#binder = new SignatureBinder(options.signatures)
  }

  /**
   * Create a new QuorumSeal instance.
   * Runs doctor checks (unless skipped) and loads config.
   */
  static async create(options?: QuorumSealOptions): Promise<QuorumSeal> {
    const configDir = options?.configDir ?? getDefaultConfigDir()

    if (options?.skipDoctor !== true) {
      const doctorResult = await runDoctor({ configDir })
      if (!doctorResult.ready) {
        throw new QuorumSealError(`System not ready: ${doctorResult.nextSteps.join('; ')}`)
      }
    }

    const config = options?.config ?? (await loadConfig(configDir))
    return new QuorumSeal(config, options ?? {})
  }

  /** Run doctor checks without creating an instance. */
  static async doctor(): Promise<PreflightResult> {
    return runDoctor()
  }

  /** The configuration in effect. */
  get config(): QuorumSealConfig {
    return this.#config
  }

  /**
   * Policy used when an unseal call brings none: the configured strictness,
   * and the configured threshold handling (`prompt` becomes `abort`, since
   * nobody can be asked here).
   */
  defaultPolicy(): ReconciliationPolicy {
    const { strict, thresholdMismatch } = this.#config.defaults
    return createStaticPolicy({
      strict,
      thresholdMismatch: thresholdMismatch === 'use-file' ? 'use-file' : 'abort',
    })
  }

  /**
   * Encrypt `plaintext` under a fresh key and split the key into shares.
   *
   * @remarks
   * The share layout is checked before any key or nonce exists. Nothing is
   * returned unless every step, including the split and encrypt self-checks,
   * succeeded.
   *
   * @throws {ConfigurationError} If `threshold` or `players` is out of range.
   * @throws {InternalConsistencyError} If a self-check fails.
   */
  async seal(plaintext: Uint8Array, options: SealOptions): Promise<SealedArtifacts> {
    const layout = { players: options.players, threshold: options.threshold }
    validateShareLayout(layout)
    const sign = options.sign ?? this.#config.defaults.sign

    const nonce = generateNonce()
    const fields = { version: ALGORITHM_VERSION, threshold: layout.threshold, nonce }

    return withKeyMaterial(KeyMaterial.generate(), async (key) => {
      const rawShares = await this.#engine.split(key, layout)
      try {
        const ciphertext = this.#cipher.encrypt(key, nonce, plaintext)
        // the private half never leaves this call
        const identity = sign ? this.#binder.createIdentity() : undefined

        const shares: SealedShare[] = rawShares.map((share, i) => {
          const signing = identity !== undefined ? this.#binder.signShare(identity, fields, share) : undefined
          const index = i + 1
          return {
            index,
            fileName: shareFileName(index, nonce),
            bytes: assembleContainer(encodeShareHeader({ ...fields, signing }), share),
          }
        })

        const signing = identity !== undefined ? this.#binder.signFile(identity, fields, ciphertext) : undefined
        const container = assembleContainer(encodeFileHeader({ ...fields, signing }), ciphertext)

        return { nonce, container, shares, publicKey: identity?.publicKey }
      } finally {
        for (const share of rawShares) {
          share.fill(0)
        }
      }
    })
  }

  /**
   * Recover the plaintext of an encrypted container from candidate shares.
   *
   * @remarks
   * Candidates are gathered exhaustively; rejected ones are listed in the
   * report. The key is recovered with the effective threshold, the file
   * signature (if any) is checked, then the payload is decrypted.
   *
   * @throws {FormatError} If the container itself is malformed or of an unknown version.
   * @throws {InsufficientSharesError} If too few valid shares were found.
   * @throws {AuthenticationError} If the payload fails authentication.
   * @throws {OperationAbortedError} If the policy stopped the operation.
   */
  async unseal(
    container: Uint8Array,
    candidates: readonly ShareCandidate[],
    options?: UnsealOptions,
  ): Promise<UnsealResult> {
    const source = options?.source ?? 'encrypted file'

    const { version } = peekHeader('file', container)
    if (version !== ALGORITHM_VERSION) {
      throw new FormatError(
        `${source} uses algorithm version ${String(version)}; only ${String(ALGORITHM_VERSION)} is supported`,
        'unsupported-version',
      )
    }
    const file = decodeFileHeader(container, { validator: this.#binder.scheme })

    const reconciler = new ShareReconciler(file.header, {
      policy: options?.policy ?? this.defaultPolicy(),
      binder: this.#binder,
      scheme: this.#engine.scheme,
      onEvent: options?.onEvent,
    })

    const shares = await reconciler.gather(candidates)
    let plaintext: Uint8Array
    try {
      const threshold = reconciler.effectiveThreshold
      const key = await this.#engine.reconstruct(shares, threshold)
      plaintext = await withKeyMaterial(key, async (k) => {
        options?.onEvent?.({ type: 'key-recovered', shares: shares.length, threshold })
        await reconciler.verifyFile(file, source)
        return this.#cipher.decrypt(k, file.header.nonce, file.body)
      })
    } finally {
      for (const share of shares) {
        share.fill(0)
      }
    }

    return { plaintext, report: reconciler.report() }
  }

  /**
   * Seal a file on disk: shares go to `options.shareDirectory`, the
   * container to `<path>.ccm`. The container is written last.
   */
  async sealFile(filePath: string, options: SealFileOptions): Promise<SealFileResult> {
    validateShareLayout(options)
    const plaintext = await readTarget(filePath)
    const artifacts = await this.seal(plaintext, options)

    for (const share of artifacts.shares) {
      await options.shareDirectory.write(share.fileName, share.bytes)
    }

    const containerPath = options.outputPath ?? encryptedPathFor(filePath)
    await writeOutput(containerPath, artifacts.container)

    return {
      containerPath,
      shareNames: artifacts.shares.map((share) => share.fileName),
      nonce: artifacts.nonce,
      publicKey: artifacts.publicKey,
    }
  }

  /**
   * Unseal a container on disk using the shares found in
   * `options.shareDirectory`. The plaintext is written next to the
   * container, never over it.
   */
  async unsealFile(filePath: string, options: UnsealFileOptions): Promise<UnsealFileResult> {
    const container = await readTarget(filePath)
    const scope = options.scope ?? (this.#config.defaults.allFiles ? 'all' : 'containers')
    const candidates = await options.shareDirectory.list(scope)

    const result = await this.unseal(container, candidates, {
      policy: options.policy,
      onEvent: options.onEvent,
      source: options.source ?? path.basename(filePath),
    })

    const outputPath = options.outputPath ?? decryptedPathFor(filePath)
    await writeOutput(outputPath, result.plaintext)

    return { ...result, outputPath }
  }
}
