import { parseArgs } from 'node:util'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { CONFIG_FILE_NAME, defaultConfig, getDefaultConfigDir, loadConfig } from 'quorumseal'
import { formatError } from '../output.js'

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath)
    return true
  } catch {
    return false
  }
}

export async function configCommand(args: string[]): Promise<number> {
  const { positionals } = parseArgs({
    args,
    allowPositionals: true,
    strict: false,
  })

  const subcommand = positionals[0]

  switch (subcommand) {
    case 'init': {
      try {
        const configDir = getDefaultConfigDir()
        const configPath = path.join(configDir, CONFIG_FILE_NAME)
        await fs.mkdir(configDir, { recursive: true, mode: 0o700 })

        if (await fileExists(configPath)) {
          process.stderr.write(`Config already exists at ${configPath}\n`)
          return 1
        }

        const content = JSON.stringify(defaultConfig(), null, 2)
        await fs.writeFile(configPath, content + '\n', { encoding: 'utf8', mode: 0o600 })
        process.stdout.write(`Config created at ${configPath}\n`)
        return 0
      } catch (err) {
        process.stderr.write(`${formatError(err)}\n`)
        return 1
      }
    }

    case 'show': {
      try {
        const config = await loadConfig()
        process.stdout.write(JSON.stringify(config, null, 2) + '\n')
        return 0
      } catch (err) {
        process.stderr.write(`${formatError(err)}\n`)
        return 1
      }
    }

    default:
      process.stderr.write('Usage: quorumseal config <init|show>\n')
      return 1
  }
}
