import { resolve } from 'path'
import { isMapping } from '../config/value.js'
import type { ConfigMapping, ConfigValue } from '../config/value.js'
import type { FileSystem } from '../utils/fs.js'
import type { ManagedRepo, RepoRef, RevisionProvider } from './types.js'

export interface RepoRegistryOptions {
  topRepoPath: string
  // Directorio base de los checkouts de repos con url
  workDir: string
  fs: FileSystem
  revisions: RevisionProvider
}

function stringValue(value: ConfigValue | undefined): string | null {
  return typeof value === 'string' && value !== '' ? value : null
}

function mappingAt(mapping: ConfigMapping, ...keys: string[]): ConfigMapping {
  let current: ConfigValue = mapping
  for (const key of keys) {
    if (!isMapping(current)) return {}
    current = current[key] ?? null
  }
  return isMapping(current) ? current : {}
}

/**
 * Construye las referencias a repos a partir de la configuración efectiva.
 *
 * - Sin `url`: repo local, en `path` relativo al repo principal (o el propio
 *   repo principal). La herramienta no lo gestiona.
 * - Con `url`: checkout en `workDir/<path o clave>`, gestionado.
 *
 * `commit` es el que declara el repo (null si es flotante); el que fija un
 * lockfile en `overrides.repos.<clave>.commit` queda aparte en `lockedCommit`.
 */
export function buildRepoRefs(config: ConfigMapping, options: RepoRegistryOptions): RepoRef[] {
  const repos = mappingAt(config, 'repos')
  const locks = mappingAt(config, 'overrides', 'repos')

  return Object.entries(repos).map(([key, value]) => {
    const entry = isMapping(value) ? value : {}
    const url = stringValue(entry.url)
    const configuredPath = stringValue(entry.path)
    const type = entry.type === 'hg' ? 'hg' : 'git'

    const path = url
      ? resolve(options.workDir, configuredPath ?? key)
      : configuredPath
        ? resolve(options.topRepoPath, configuredPath)
        : options.topRepoPath

    const lock = locks[key]
    const lockedCommit = isMapping(lock) ? stringValue(lock.commit) : null

    return {
      key,
      name: stringValue(entry.name) ?? key,
      type,
      path,
      commit: stringValue(entry.commit),
      lockedCommit,
      revision: options.fs.exists(path) ? options.revisions.getRevision(path, type) : null,
      operationsDisabled: url === null,
    }
  })
}

/**
 * Repos cuyo checkout ya existe, para pasarle al resolver
 */
export function availableRepos(repos: readonly RepoRef[], fs: FileSystem): Record<string, string> {
  const available: Record<string, string> = {}
  for (const repo of repos) {
    if (repo.path && fs.exists(repo.path)) {
      available[repo.key] = repo.path
    }
  }
  return available
}

export function managedRepos(repos: readonly RepoRef[]): ManagedRepo[] {
  return repos.flatMap((repo) =>
    repo.path ? [{ key: repo.key, path: repo.path, operationsDisabled: repo.operationsDisabled }] : []
  )
}
