#!/usr/bin/env node
/**
 * CLI entry point for quorumseal.
 *
 * Each subcommand is lazy-loaded via dynamic import() so only the requested
 * command's module (and its dependencies) is loaded.
 *
 * argv layout: [node, script, subcommand, ...commandArgs]
 *
 * @internal
 */

import { parseArgs } from 'node:util'

const { positionals } = parseArgs({
  allowPositionals: true,
  strict: false,
})

const subcommand = positionals[0]
// argv[0]=node, argv[1]=script, argv[2]=subcommand, argv[3..]=commandArgs
const commandArgs = process.argv.slice(3)

function printHelp(): void {
  process.stdout.write(
    'Usage: quorumseal <command> [options]\n\n' +
      'Commands:\n' +
      '  encrypt <file> <players> <threshold> [--share-dir <dir>] [--sign]\n' +
      '               Encrypt a file and split its key into share files\n' +
      '  decrypt <file> [--share-dir <dir>] [--all] [--strict]\n' +
      '               Gather shares and decrypt a .ccm file\n' +
      '  doctor       Run preflight checks\n' +
      '  config       Manage configuration (init, show)\n',
  )
}

async function main(): Promise<number> {
  if (subcommand === undefined || subcommand === '--help' || subcommand === '-h') {
    printHelp()
    return 0
  }

  switch (subcommand) {
    case 'encrypt': {
      const { encryptCommand } = await import('./commands/encrypt.js')
      return encryptCommand(commandArgs)
    }
    case 'decrypt': {
      const { decryptCommand } = await import('./commands/decrypt.js')
      return decryptCommand(commandArgs)
    }
    case 'doctor': {
      const { doctorCommand } = await import('./commands/doctor.js')
      return doctorCommand(commandArgs)
    }
    case 'config': {
      const { configCommand } = await import('./commands/config.js')
      return configCommand(commandArgs)
    }
    default:
      process.stderr.write(`Unknown command: ${subcommand}\n`)
      printHelp()
      return 1
  }
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`)
    process.exitCode = 1
  })
