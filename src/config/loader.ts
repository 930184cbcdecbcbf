import { extname } from 'path'
import yaml from 'js-yaml'
import { ConfigDocument } from './document.js'
import type { DocumentFlags } from './document.js'
import { IncludeError, LoadConfigError } from './errors.js'
import {
  ConfigDocumentSchema,
  DEFAULT_VERSION_RANGE,
  formatIssues,
  normalizeVersion,
} from './schema.js'
import type { VersionRange } from './schema.js'
import { isMapping, toConfigValue } from './value.js'
import type { ConfigValue } from './value.js'
import { nodeFileSystem } from '../utils/fs.js'
import type { FileSystem } from '../utils/fs.js'
import { logger } from '../utils/logger.js'

export type DocumentFormat = 'json' | 'yaml'

export interface DocumentLoaderOptions {
  fs?: FileSystem
  versions?: VersionRange
}

/**
 * Formato según la extensión del archivo, o null si no se reconoce
 */
export function formatFromExtension(location: string): DocumentFormat | null {
  const ext = extname(location)
  if (ext === '.json') return 'json'
  if (ext === '.yml' || ext === '.yaml') return 'yaml'
  return null
}

export class DocumentLoader {
  readonly fs: FileSystem
  readonly versions: VersionRange

  constructor(options: DocumentLoaderOptions = {}) {
    this.fs = options.fs ?? nodeFileSystem
    this.versions = options.versions ?? DEFAULT_VERSION_RANGE
  }

  /**
   * Carga, parsea y valida un archivo de configuración.
   * @throws LoadConfigError si el archivo no existe, no parsea, no valida o
   *   tiene una versión incompatible
   * @throws IncludeError si el contenido no es un mapping
   */
  load(location: string, flags: DocumentFlags = {}): ConfigDocument {
    const format = formatFromExtension(location)
    if (!format) {
      throw new LoadConfigError('Config file extension not recognized', location)
    }

    if (!this.fs.exists(location)) {
      throw new LoadConfigError('Configuration file not found', location)
    }

    let content: string
    try {
      content = this.fs.readFile(location)
    } catch (error) {
      logger.error({ error, location }, 'Failed to read config file')
      throw new LoadConfigError('Configuration file could not be read', location)
    }

    const body = this.parse(content, format, location)
    if (!isMapping(body)) {
      throw new IncludeError(
        `Configuration file does not contain a dictionary as base type: ${location}`
      )
    }

    const result = ConfigDocumentSchema.safeParse(body)
    if (!result.success) {
      // Se reportan todos los errores juntos, no solo el primero
      const issues = formatIssues(result.error)
      for (const issue of issues) {
        logger.error({ location, issue }, 'Config file validation error')
      }
      throw new LoadConfigError('Error(s) occurred while validating the config file', location, issues)
    }

    const data = result.data
    const version = normalizeVersion(data.header.version)
    if (version < this.versions.min || version > this.versions.max) {
      throw new LoadConfigError(
        `This tool is compatible with version ${this.versions.min} to ${this.versions.max}, ` +
          `file has version ${version}`,
        location
      )
    }

    if (data.proxy_config) {
      logger.warn({ location }, "Obsolete 'proxy_config' detected. This has no effect and will be rejected soon.")
    }

    logger.debug({ location, version, isLockDocument: flags.isLockDocument ?? false }, 'Config file loaded')

    return new ConfigDocument(location, body, {
      ...flags,
      version,
      includes: data.header.includes ?? [],
      sourceDirOverride: data._source_dir ?? null,
      sourceDirHost: data._source_dir_host ?? null,
    })
  }

  private parse(content: string, format: DocumentFormat, location: string): ConfigValue {
    let raw: unknown
    try {
      raw =
        format === 'json'
          ? JSON.parse(content)
          : yaml.load(content, { filename: location, schema: yaml.CORE_SCHEMA })
    } catch (error) {
      logger.error({ error, location }, 'Failed to parse config file')
      throw new LoadConfigError('Config file could not be parsed', location)
    }

    const value = toConfigValue(raw)
    if (value === undefined) {
      throw new LoadConfigError('Config file contains unsupported values', location)
    }
    return value
  }
}
