/**
 * The `quorumseal decrypt` command: gather shares, recover the key and
 * decrypt a container.
 *
 * @internal
 */

import { parseArgs } from 'node:util'
import { FsShareDirectory, QuorumSeal, createStaticPolicy, loadConfig } from 'quorumseal'
import type { QuorumSealConfig, ReconciliationPolicy } from 'quorumseal'
import { printEvent } from '../events.js'
import { bold, formatError, plural } from '../output.js'
import { resolveShareDirectory } from '../paths.js'
import { createInteractivePolicy } from '../policy.js'
import { confirmShareDirectory, isInteractive } from '../prompts.js'
import { detectContentType } from '../sniff.js'
import type { DecryptCommandOptions } from '../types.js'

const USAGE = 'Usage: quorumseal decrypt <file> [--share-dir <dir>] [--all] [--strict]\n'

/** Parse decrypt arguments; returns an error message on bad input. */
export function parseDecryptArgs(args: string[]): DecryptCommandOptions | string {
  const { values, positionals } = parseArgs({
    args,
    options: {
      'share-dir': { type: 'string' },
      all: { type: 'boolean', default: false },
      strict: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: true,
  })

  const [file] = positionals
  if (file === undefined) {
    return 'Error: <file> is required'
  }
  if (positionals.length > 1) {
    return `Error: unexpected argument: ${positionals[1] ?? ''}`
  }

  return { file, shareDir: values['share-dir'], all: values.all, strict: values.strict }
}

/**
 * Policy for this run: interactive on a terminal, otherwise the configured
 * answers (`prompt` falls back to `abort`).
 */
export function choosePolicy(
  options: DecryptCommandOptions,
  config: QuorumSealConfig,
  interactive: boolean,
): ReconciliationPolicy {
  const strict = options.strict || config.defaults.strict
  const { thresholdMismatch } = config.defaults
  if (interactive) {
    return createInteractivePolicy({ strict, thresholdMismatch })
  }
  return createStaticPolicy({
    strict,
    thresholdMismatch: thresholdMismatch === 'use-file' ? 'use-file' : 'abort',
  })
}

export async function decryptCommand(args: string[]): Promise<number> {
  let options: DecryptCommandOptions | string
  try {
    options = parseDecryptArgs(args)
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
    const config = await loadConfig()
    const interactive = isInteractive()
    const shareDir = await resolveShareDirectory({
      flag: options.shareDir,
      configured: config.defaults.shareDir,
      confirm: interactive ? confirmShareDirectory : undefined,
    })

    const quorumSeal = await QuorumSeal.create({ config })
    process.stdout.write(`Gathering shares from ${shareDir}\n`)
    const result = await quorumSeal.unsealFile(options.file, {
      shareDirectory: new FsShareDirectory(shareDir),
      scope: options.all || config.defaults.allFiles ? 'all' : 'containers',
      policy: choosePolicy(options, config, interactive),
      onEvent: printEvent,
    })

    const { report } = result
    const contentType = detectContentType(result.plaintext)
    process.stdout.write(
      `Decrypted ${options.file} -> ${bold(result.outputPath)} (${contentType.name}, ${contentType.mime})\n`,
    )
    process.stdout.write(
      `Used ${plural(report.accepted.length, 'share')}; ${String(report.rejected.length)} rejected\n`,
    )
    if (report.warnings.length > 0) {
      process.stderr.write(`${bold('Completed with warnings:')}\n`)
      for (const warning of report.warnings) {
        process.stderr.write(`  ⚠ ${warning}\n`)
      }
    }
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
