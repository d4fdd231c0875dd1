/**
 * Pre-configured QuorumSeal for consumer tests.
 */

import { QuorumSeal } from 'quorumseal'
import type {
  QuorumSealConfig,
  SealOptions,
  SealedArtifacts,
  UnsealOptions,
  UnsealResult,
} from 'quorumseal'
import { InMemoryShareDirectory } from './in-memory-share-directory.js'

/** Default test configuration: unsigned, lenient, threshold taken from the file. */
const TEST_CONFIG: QuorumSealConfig = {
  version: 1,
  defaults: {
    sign: false,
    strict: false,
    allFiles: false,
    thresholdMismatch: 'use-file',
  },
}

/**
 * Options for creating a {@link TestSeal}.
 * @public
 */
export interface TestSealOptions {
  /** Sign sealed payloads by default. */
  sign?: boolean | undefined
  /** Use strict mode by default when unsealing. */
  strict?: boolean | undefined
}

/**
 * A pre-configured QuorumSeal for consumer test workflows.
 *
 * @remarks
 * `TestSeal` wraps a real `QuorumSeal` instance whose shares go to an
 * {@link InMemoryShareDirectory}. It skips doctor checks and never touches
 * the file system.
 *
 * @example
 * ```ts
 * const seal = await TestSeal.create()
 * const { container } = await seal.seal(new TextEncoder().encode('hello'), { players: 3, threshold: 2 })
 * const { plaintext } = await seal.unseal(container)
 * ```
 *
 * @public
 */
export class TestSeal {
  /** The underlying QuorumSeal instance. */
  readonly quorumSeal: QuorumSeal

  /** The in-memory share directory used by this test seal. */
  readonly shares: InMemoryShareDirectory

  private constructor(quorumSeal: QuorumSeal, shares: InMemoryShareDirectory) {
    this.quorumSeal = quorumSeal
    this.shares = shares
  }

  /**
   * Create a new TestSeal, ready for use.
   *
   * @public
   */
  static async create(options?: TestSealOptions): Promise<TestSeal> {
    const config: QuorumSealConfig = {
      ...TEST_CONFIG,
      defaults: {
        ...TEST_CONFIG.defaults,
        sign: options?.sign ?? TEST_CONFIG.defaults.sign,
        strict: options?.strict ?? TEST_CONFIG.defaults.strict,
      },
    }
    const quorumSeal = await QuorumSeal.create({ skipDoctor: true, config })
    return new TestSeal(quorumSeal, new InMemoryShareDirectory())
  }

  /**
   * Seal `plaintext` and write every share into {@link shares}.
   *
   * @public
   */
  async seal(plaintext: Uint8Array, options: SealOptions): Promise<SealedArtifacts> {
    const artifacts = await this.quorumSeal.seal(plaintext, options)
    for (const share of artifacts.shares) {
      await this.shares.write(share.fileName, share.bytes)
    }
    return artifacts
  }

  /**
   * Unseal `container` with the share files currently in {@link shares}.
   *
   * @public
   */
  async unseal(container: Uint8Array, options?: UnsealOptions): Promise<UnsealResult> {
    const candidates = await this.shares.list('containers')
    return this.quorumSeal.unseal(container, candidates, options)
  }
}
