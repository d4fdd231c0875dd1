/** Options parsed from the `quorumseal encrypt` command line. */
export interface EncryptCommandOptions {
  /** File to encrypt. */
  file: string
  /** Number of shares to produce. */
  players: number
  /** Shares required to decrypt. */
  threshold: number
  /** Directory to write shares to. */
  shareDir?: string | undefined
  /** Sign the container and shares with a one-time key. */
  sign: boolean
}

/** Options parsed from the `quorumseal decrypt` command line. */
export interface DecryptCommandOptions {
  /** Encrypted container to decrypt. */
  file: string
  /** Directory to gather shares from. */
  shareDir?: string | undefined
  /** Consider every file in the share directory, not only `.ccm` shares. */
  all: boolean
  /** Abort on any signing disagreement. */
  strict: boolean
}

/** A content type recognised from leading bytes. */
export interface ContentType {
  /** Short human-readable name, e.g. `PNG image`. */
  name: string
  /** MIME type, when one is registered. */
  mime: string
}
