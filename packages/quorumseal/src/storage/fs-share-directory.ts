/**
 * Share directory backed by the local file system.
 *
 * @remarks
 * Lists regular files only (no recursion, no symlinked directories), sorted
 * by name so that gathering is deterministic. Shares are written owner-only.
 */

import type { Dirent } from 'node:fs'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { SHARE_EXTENSION } from '../container/constants.js'
import { FilesystemError } from '../errors.js'
import type { CandidateScope, ShareCandidate, ShareDirectory } from './types.js'

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * {@link ShareDirectory} over a directory on disk.
 *
 * @public
 */
export class FsShareDirectory implements ShareDirectory {
  readonly location: string

  constructor(directory: string) {
    this.location = path.resolve(directory)
  }

  async list(scope: CandidateScope): Promise<ShareCandidate[]> {
    let entries: Dirent[]
    try {
      entries = await fs.readdir(this.location, { withFileTypes: true })
    } catch (err) {
      throw new FilesystemError(
        `Cannot list share directory ${this.location}: ${errorText(err)}`,
        this.location,
        'list',
      )
    }

    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .filter((name) => scope === 'all' || name.endsWith(SHARE_EXTENSION))
      .sort()
      .map((name) => this.#candidate(name))
  }

  async write(name: string, bytes: Uint8Array): Promise<void> {
    if (name !== path.basename(name)) {
      throw new FilesystemError(`Share name must not contain a directory: ${name}`, name, 'write')
    }
    const target = path.join(this.location, name)
    try {
      await fs.mkdir(this.location, { recursive: true, mode: 0o700 })
      await fs.writeFile(target, bytes, { mode: 0o600 })
    } catch (err) {
      throw new FilesystemError(`Cannot write share ${target}: ${errorText(err)}`, target, 'write')
    }
  }

  #candidate(name: string): ShareCandidate {
    const filePath = path.join(this.location, name)
    return {
      name,
      read: async () => new Uint8Array(await fs.readFile(filePath)),
    }
  }
}
