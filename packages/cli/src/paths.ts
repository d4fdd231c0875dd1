import * as os from 'node:os'
import * as path from 'node:path'

/** Inputs for {@link resolveShareDirectory}. */
export interface ShareDirectoryChoice {
  /** Value of `--share-dir`, if given. */
  flag?: string | undefined
  /** `defaults.shareDir` from the config file, if set. */
  configured?: string | undefined
  /** Working directory to fall back to. */
  cwd?: string | undefined
  /** Asks the operator about the fallback; omitted when nobody can be asked. */
  confirm?: ((proposed: string) => Promise<string>) | undefined
}

/** Expand a leading `~` to the home directory. */
export function expandHome(dir: string): string {
  if (dir === '~') {
    return os.homedir()
  }
  if (dir.startsWith('~/') || dir.startsWith(`~${path.sep}`)) {
    return path.join(os.homedir(), dir.slice(2))
  }
  return dir
}

/**
 * Pick the share directory: the flag, else the configured directory, else
 * the working directory after confirmation.
 *
 * @internal
 */
export async function resolveShareDirectory(choice: ShareDirectoryChoice): Promise<string> {
  if (choice.flag !== undefined) {
    return path.resolve(expandHome(choice.flag))
  }
  if (choice.configured !== undefined) {
    return path.resolve(expandHome(choice.configured))
  }
  const fallback = path.resolve(choice.cwd ?? process.cwd())
  if (choice.confirm === undefined) {
    return fallback
  }
  return choice.confirm(fallback)
}
