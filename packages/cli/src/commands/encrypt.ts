/**
 * The `quorumseal encrypt` command: encrypt a file and split its key into
 * share files.
 *
 * @internal
 */

import { parseArgs } from 'node:util'
import { FsShareDirectory, QuorumSeal, loadConfig, toHex, validateShareLayout } from 'quorumseal'
import { bold, formatError, plural } from '../output.js'
import { resolveShareDirectory } from '../paths.js'
import { confirmShareDirectory, isInteractive } from '../prompts.js'
import type { EncryptCommandOptions } from '../types.js'

const USAGE = 'Usage: quorumseal encrypt <file> <players> <threshold> [--share-dir <dir>] [--sign]\n'

function parseCount(raw: string): number | undefined {
  return /^\d+$/.test(raw) ? parseInt(raw, 10) : undefined
}

/** Parse encrypt arguments; returns an error message on bad input. */
export function parseEncryptArgs(args: string[]): EncryptCommandOptions | string {
  const { values, positionals } = parseArgs({
    args,
    options: {
      'share-dir': { type: 'string' },
      sign: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: true,
  })

  const [file, rawPlayers, rawThreshold] = positionals
  if (file === undefined || rawPlayers === undefined || rawThreshold === undefined) {
    return 'Error: <file>, <players> and <threshold> are required'
  }
  if (positionals.length > 3) {
    return `Error: unexpected argument: ${positionals[3] ?? ''}`
  }

  const players = parseCount(rawPlayers)
  const threshold = parseCount(rawThreshold)
  if (players === undefined) {
    return `Error: <players> must be a whole number, got "${rawPlayers}"`
  }
  if (threshold === undefined) {
    return `Error: <threshold> must be a whole number, got "${rawThreshold}"`
  }

  return { file, players, threshold, shareDir: values['share-dir'], sign: values.sign }
}

export async function encryptCommand(args: string[]): Promise<number> {
  let options: EncryptCommandOptions | string
  try {
    options = parseEncryptArgs(args)
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    process.stderr.write(USAGE)
    return 1
  }
  if (typeof options === 'string') {
    process.stderr.write(`${options}\n`)
    process.stderr.write(USAGE)
    return 1
  }

  try {
    // reject a bad layout before asking anything
    validateShareLayout(options)

    const config = await loadConfig()
    const shareDir = await resolveShareDirectory({
      flag: options.shareDir,
      configured: config.defaults.shareDir,
      confirm: isInteractive() ? confirmShareDirectory : undefined,
    })

    const quorumSeal = await QuorumSeal.create({ config })
    const result = await quorumSeal.sealFile(options.file, {
      players: options.players,
      threshold: options.threshold,
      sign: options.sign ? true : undefined,
      shareDirectory: new FsShareDirectory(shareDir),
    })

    process.stdout.write(`Encrypted ${options.file} -> ${bold(result.containerPath)}\n`)
    process.stdout.write(
      `Wrote ${plural(result.shareNames.length, 'share')} to ${shareDir}; any ${String(options.threshold)} recover the file\n`,
    )
    for (const name of result.shareNames) {
      process.stdout.write(`  ${name}\n`)
    }
    if (result.publicKey !== undefined) {
      process.stdout.write(`Signed with one-time key ${toHex(result.publicKey)}\n`)
    }
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
