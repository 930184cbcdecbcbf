import yaml from 'js-yaml'
import type { ConfigDocument } from '../config/document.js'
import { formatFromExtension } from '../config/loader.js'
import type { DocumentFormat } from '../config/loader.js'
import { isMapping } from '../config/value.js'
import type { ConfigMapping, ConfigValue } from '../config/value.js'
import { nodeFileSystem } from '../utils/fs.js'
import type { FileSystem } from '../utils/fs.js'
import { logger } from '../utils/logger.js'

export interface SerializeOptions {
  indent?: number
  // Por defecto se conserva el orden de inserción de las claves
  sortKeys?: boolean
}

export interface DocumentWriter {
  write(document: ConfigDocument): void
}

function sortValue(value: ConfigValue): ConfigValue {
  if (Array.isArray(value)) return value.map(sortValue)
  if (!isMapping(value)) return value

  const sorted: ConfigMapping = {}
  for (const key of Object.keys(value).sort()) {
    sorted[key] = sortValue(value[key])
  }
  return sorted
}

export function serializeDocument(
  body: ConfigMapping,
  format: DocumentFormat,
  options: SerializeOptions = {}
): string {
  const indent = options.indent ?? 4

  if (format === 'json') {
    const data = options.sortKeys ? sortValue(body) : body
    return `${JSON.stringify(data, null, indent)}\n`
  }

  return yaml.dump(body, {
    indent: Math.max(indent, 1),
    sortKeys: options.sortKeys ?? false,
    lineWidth: -1,
    noRefs: true,
  })
}

/**
 * Escribe documentos a disco, en JSON o YAML según la extensión
 */
export class FileDocumentWriter implements DocumentWriter {
  private fs: FileSystem
  private options: SerializeOptions

  constructor(options: SerializeOptions = {}, fs: FileSystem = nodeFileSystem) {
    this.options = options
    this.fs = fs
  }

  write(document: ConfigDocument): void {
    const format = formatFromExtension(document.location) === 'json' ? 'json' : 'yaml'
    const content = serializeDocument(document.body, format, this.options)
    this.fs.writeFile(document.location, content)
    logger.info({ location: document.location, format }, 'Config file written')
  }
}
