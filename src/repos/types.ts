/**
 * Estado de un repo tal como lo ve la herramienta. Solo se lee.
 */
export interface RepoRef {
  key: string
  name: string
  type: RepoType
  // Ruta del checkout; null si todavía no se conoce
  path: string | null
  // Commit que declara el repo; null si el repo es flotante
  commit: string | null
  // Commit fijado por un lockfile (overrides.repos)
  lockedCommit: string | null
  // Commit actual del checkout; null si no hay checkout
  revision: string | null
  // true: la herramienta no gestiona el ciclo de vida de este checkout
  operationsDisabled: boolean
}

export interface ManagedRepo {
  key: string
  path: string
  operationsDisabled: boolean
}

/**
 * Consulta el commit actual de un checkout
 */
export interface RevisionProvider {
  getRevision(path: string, type: RepoType): string | null
}

export type RepoType = 'git' | 'hg'
