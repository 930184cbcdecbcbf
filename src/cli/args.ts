import { parseArgs } from 'util'
import type { DocumentFormat } from '../config/loader.js'

export type Command = 'dump' | 'lock'

export interface CliArgs {
  command: Command | null
  files: string[]
  format: DocumentFormat
  indent: number | undefined
  sortKeys: boolean | undefined
  useLock: boolean | undefined
  help: boolean
  version: boolean
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

export const HELP_TEXT = `Usage: confweave <command> [options] <config-file>...

Commands:
  dump             Print the effective configuration after resolving includes
  lock             Pin floating repos in lockfiles (<file>.lock.<ext>)

Options:
  -f, --format <fmt>   Output format of dump: yaml (default) or json
  --indent <n>         Indentation of written documents
  --sort               Sort keys when writing documents
  --no-lock            Ignore lockfiles when resolving (dump only)
  -V, --version        Show version number
  -h, --help           Show this help message

Environment:
  LOG_LEVEL            fatal | error | warn | info | debug | trace | silent
  CONFWEAVE_WORK_DIR   Directory of repo checkouts (default: current directory)
  CONFWEAVE_USE_LOCK   Use lockfiles when resolving (default: true)
  CONFWEAVE_INDENT     Default indentation (default: 4)
  CONFWEAVE_SORT_KEYS  Sort keys by default (default: false)

CLI options override environment variables.`

function isCommand(value: string): value is Command {
  return value === 'dump' || value === 'lock'
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      format: { type: 'string', short: 'f' },
      indent: { type: 'string' },
      sort: { type: 'boolean' },
      'no-lock': { type: 'boolean' },
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'V', default: false },
    },
  })
}

export function parseCliArgs(argv: string[]): CliArgs {
  let parsed: ReturnType<typeof readArgs>
  try {
    parsed = readArgs(argv)
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error))
  }

  const { values, positionals } = parsed
  const help = values.help ?? false
  const version = values.version ?? false
  if (help || version) {
    return { command: null, files: [], format: 'yaml', indent: undefined, sortKeys: undefined, useLock: undefined, help, version }
  }

  const [command, ...files] = positionals
  if (command === undefined || !isCommand(command)) {
    throw new UsageError(command === undefined ? 'Missing command' : `Unknown command: ${command}`)
  }
  if (files.length === 0) {
    throw new UsageError('At least one config file is required')
  }

  const format = values.format ?? 'yaml'
  if (format !== 'yaml' && format !== 'json') {
    throw new UsageError(`Invalid format: ${format}. Must be "yaml" or "json".`)
  }

  let indent: number | undefined
  if (values.indent !== undefined) {
    indent = Number(values.indent)
    if (!Number.isInteger(indent) || indent < 0) {
      throw new UsageError(`Invalid indent: ${values.indent}. Must be a non-negative integer.`)
    }
  }

  return {
    command,
    files,
    format,
    indent,
    sortKeys: values.sort,
    useLock: values['no-lock'] ? false : undefined,
    help,
    version,
  }
}
