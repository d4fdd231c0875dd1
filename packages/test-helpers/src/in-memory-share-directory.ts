/**
 * In-memory share directory for testing.
 */

import { SHARE_EXTENSION } from 'quorumseal'
import type { CandidateScope, ShareCandidate, ShareDirectory } from 'quorumseal'

/**
 * A fully in-memory `ShareDirectory` for testing.
 *
 * @remarks
 * Files live in a plain `Map` keyed by name. Besides shares written by
 * quorumseal, tests can drop in arbitrary files with {@link put} and
 * files that fail to read with {@link putUnreadable}.
 *
 * @public
 */
export class InMemoryShareDirectory implements ShareDirectory {
  readonly location: string
  readonly #files = new Map<string, Uint8Array>()
  readonly #unreadable = new Set<string>()

  constructor(location = 'memory://shares') {
    this.location = location
  }

  /** @public */
  list(scope: CandidateScope): Promise<ShareCandidate[]> {
    const names = [...this.#files.keys(), ...this.#unreadable]
      .filter((name) => scope === 'all' || name.endsWith(SHARE_EXTENSION))
      .sort()
    return Promise.resolve(names.map((name) => this.#candidate(name)))
  }

  /** @public */
  write(name: string, bytes: Uint8Array): Promise<void> {
    this.put(name, bytes)
    return Promise.resolve()
  }

  /**
   * Store a copy of `bytes` under `name`, replacing any existing file.
   * @public
   */
  put(name: string, bytes: Uint8Array): void {
    this.#unreadable.delete(name)
    this.#files.set(name, bytes.slice())
  }

  /**
   * Register a file whose `read()` always rejects.
   * @public
   */
  putUnreadable(name: string): void {
    this.#files.delete(name)
    this.#unreadable.add(name)
  }

  /**
   * Contents stored under `name`, if any.
   * @public
   */
  get(name: string): Uint8Array | undefined {
    return this.#files.get(name)
  }

  /**
   * Remove one file. Returns whether it existed.
   * @public
   */
  remove(name: string): boolean {
    return this.#files.delete(name) || this.#unreadable.delete(name)
  }

  /**
   * Remove all files. Useful for test teardown.
   * @public
   */
  clear(): void {
    this.#files.clear()
    this.#unreadable.clear()
  }

  /**
   * All file names, sorted.
   * @public
   */
  names(): string[] {
    return [...this.#files.keys(), ...this.#unreadable].sort()
  }

  /**
   * The number of files currently stored.
   * @public
   */
  get size(): number {
    return this.#files.size + this.#unreadable.size
  }

  #candidate(name: string): ShareCandidate {
    return {
      name,
      read: () => {
        const bytes = this.#files.get(name)
        if (bytes === undefined) {
          return Promise.reject(new Error(`Cannot read ${name}`))
        }
        return Promise.resolve(bytes.slice())
      },
    }
  }
}
