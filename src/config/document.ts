import { FILE_VERSION } from './schema.js'
import type { IncludeReference } from './schema.js'
import type { ConfigMapping } from './value.js'

export interface DocumentFlags {
  isLockDocument?: boolean
  isExternal?: boolean
}

export interface DocumentMetadata extends DocumentFlags {
  version: number
  includes?: IncludeReference[]
  sourceDirOverride?: string | null
  sourceDirHost?: string | null
}

/**
 * Un archivo de configuración ya parseado y validado.
 *
 * `body` solo lo modifican el merge (sobre copias) y el reconciliador de
 * locks (in place, sobre documentos lock).
 */
export class ConfigDocument {
  readonly location: string
  readonly body: ConfigMapping
  readonly version: number
  readonly includes: IncludeReference[]
  readonly isLockDocument: boolean
  // true si se llegó a través de un include de otro repo
  readonly isExternal: boolean
  // Solo lo define el archivo de bootstrap auto-generado
  readonly sourceDirOverride: string | null
  readonly sourceDirHost: string | null

  constructor(location: string, body: ConfigMapping, metadata: DocumentMetadata) {
    this.location = location
    this.body = body
    this.version = metadata.version
    this.includes = metadata.includes ?? []
    this.isLockDocument = metadata.isLockDocument ?? false
    this.isExternal = metadata.isExternal ?? false
    this.sourceDirOverride = metadata.sourceDirOverride ?? null
    this.sourceDirHost = metadata.sourceDirHost ?? null
  }

  /**
   * Crea un lockfile vacío en memoria (header mínimo y overrides.repos vacío)
   */
  static createLockfile(location: string): ConfigDocument {
    const body: ConfigMapping = {
      header: { version: FILE_VERSION },
      overrides: { repos: {} },
    }
    return new ConfigDocument(location, body, {
      version: FILE_VERSION,
      isLockDocument: true,
    })
  }
}
