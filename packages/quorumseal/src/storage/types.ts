/**
 * Share directory abstraction.
 */

/**
 * Which entries of a share directory count as candidates: only files with
 * the share extension, or every regular file.
 */
export type CandidateScope = 'containers' | 'all'

/**
 * One file discovered in a share directory. The name only labels
 * diagnostics; it is never parsed for meaning.
 */
export interface ShareCandidate {
  /** File name (without directory) used in reports and events. */
  readonly name: string

  /** Load the full contents of the candidate. */
  read(): Promise<Uint8Array>
}

/**
 * A place shares are written to at encryption time and gathered from at
 * decryption time.
 *
 * @public
 */
export interface ShareDirectory {
  /** Human-readable location (a path for file-system directories). */
  readonly location: string

  /**
   * List candidate files, sorted by name.
   * @param scope - Whether to filter on the share extension
   */
  list(scope: CandidateScope): Promise<ShareCandidate[]>

  /**
   * Write one share container.
   * @param name - File name inside the directory
   * @param bytes - Encoded share container
   */
  write(name: string, bytes: Uint8Array): Promise<void>
}
