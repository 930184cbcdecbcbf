#!/usr/bin/env node
import 'dotenv/config'
import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { HELP_TEXT, UsageError, parseCliArgs } from './cli/args.js'
import { runDump, runLock } from './cli/commands.js'
import { loadGlobalConfig } from './config/global.js'
import { logger } from './utils/logger.js'

function readVersion(): string {
  const pkgPath = fileURLToPath(new URL('../package.json', import.meta.url))
  const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'))
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version
  }
  return 'unknown'
}

function main(): number {
  try {
    const args = parseCliArgs(process.argv.slice(2))
    if (args.version) {
      console.log(readVersion())
      return 0
    }
    if (args.help) {
      console.log(HELP_TEXT)
      return 0
    }

    const global = loadGlobalConfig()
    logger.level = global.log_level

    if (args.command === 'lock') {
      runLock(args, { global })
    } else {
      runDump(args, { global })
    }
    return 0
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}\n\n${HELP_TEXT}`)
      return 2
    }
    logger.error({ error }, 'confweave failed')
    return 1
  }
}

process.exitCode = main()
