import { isAbsolute, relative } from 'path'
import { ConfigDocument } from '../config/document.js'
import { RepoStateError } from '../config/errors.js'
import { isMapping } from '../config/value.js'
import type { ConfigMapping } from '../config/value.js'
import type { ManagedRepo, RepoRef } from '../repos/types.js'
import { logger } from '../utils/logger.js'
import type { DocumentWriter } from './writer.js'

export interface LockReconcilerOptions {
  // Lockfile canónico: hermano del primer archivo de configuración
  lockfilePath: string
  writer: DocumentWriter
}

export interface ReconcileResult {
  // Lockfiles modificados o creados, ya escritos
  written: ConfigDocument[]
  // Repos que ningún lockfile existente cubría (fijados en el lockfile canónico)
  unlocked: string[]
}

/**
 * Repos a fijar: flotantes (sin commit) y gestionados por la herramienta
 */
export function selectFloatingRepos(repos: readonly RepoRef[]): RepoRef[] {
  return repos.filter((repo) => !repo.operationsDisabled && !repo.commit)
}

export function isPathInside(path: string, parent: string): boolean {
  const rel = relative(parent, path)
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel))
}

function requireRevision(repo: RepoRef): string {
  if (!repo.revision) {
    throw new RepoStateError(`Repo ${repo.name} has no current revision to lock`)
  }
  return repo.revision
}

function getLockedRepos(document: ConfigDocument): ConfigMapping | null {
  const overrides = document.body.overrides
  if (!isMapping(overrides)) return null
  const repos = overrides.repos
  return isMapping(repos) ? repos : null
}

function ensureLockedRepos(document: ConfigDocument): ConfigMapping {
  const existing = getLockedRepos(document)
  if (existing) return existing

  const repos: ConfigMapping = {}
  const overrides = document.body.overrides
  if (isMapping(overrides)) {
    overrides.repos = repos
  } else {
    document.body.overrides = { repos }
  }
  return repos
}

/**
 * Reconcilia los repos flotantes con los lockfiles.
 *
 * 1. Actualiza los locks existentes (sin agregar nuevos). Los lockfiles que
 *    viven dentro de un repo gestionado son externos: no se reescriben.
 * 2. Escribe los lockfiles que cambiaron.
 * 3. Los repos que no cubre ningún lockfile se agregan al lockfile canónico,
 *    que se crea si no existe.
 */
export class LockReconciler {
  private lockfilePath: string
  private writer: DocumentWriter

  constructor(options: LockReconcilerOptions) {
    this.lockfilePath = options.lockfilePath
    this.writer = options.writer
  }

  reconcile(
    lockDocuments: readonly ConfigDocument[],
    floatingRepos: readonly RepoRef[],
    managedRepos: readonly ManagedRepo[]
  ): ReconcileResult {
    let pending = [...floatingRepos]
    const written: ConfigDocument[] = []

    if (pending.length === 0) {
      logger.info('No floating repos found. Nothing to lock.')
      return { written, unlocked: [] }
    }

    for (const document of lockDocuments) {
      const external = this.isExternalLockfile(document, managedRepos)
      const result = this.updateLockfile(document, pending, external)
      pending = result.pending
      if (result.dirty) {
        logger.info({ location: document.location }, 'Updating lockfile')
        this.writer.write(document)
        written.push(document)
      }
    }

    const unlocked = pending.map((repo) => repo.key)
    if (pending.length === 0) {
      return { written, unlocked }
    }

    logger.warn(
      { repos: pending.map((repo) => repo.name), lockfile: this.lockfilePath },
      'The following repos are not covered by any lockfile. Adding to top lockfile'
    )

    const target =
      lockDocuments.find((document) => document.location === this.lockfilePath) ??
      ConfigDocument.createLockfile(this.lockfilePath)
    const locked = ensureLockedRepos(target)
    for (const repo of pending) {
      locked[repo.key] = { commit: requireRevision(repo) }
    }

    this.writer.write(target)
    if (!written.includes(target)) {
      written.push(target)
    }

    return { written, unlocked }
  }

  /**
   * Un lockfile es externo si está dentro de un repo gestionado
   * (operaciones habilitadas): ese checkout puede sobrescribirse.
   */
  isExternalLockfile(document: ConfigDocument, managedRepos: readonly ManagedRepo[]): boolean {
    return managedRepos.some(
      (repo) => !repo.operationsDisabled && isPathInside(document.location, repo.path)
    )
  }

  private updateLockfile(
    document: ConfigDocument,
    floatingRepos: RepoRef[],
    external: boolean
  ): { pending: RepoRef[]; dirty: boolean } {
    const locked = getLockedRepos(document)
    if (!locked) {
      return { pending: floatingRepos, dirty: false }
    }

    let pending = floatingRepos
    let dirty = false

    for (const [key, entry] of Object.entries(locked)) {
      const repo = pending.find((candidate) => candidate.key === key)
      if (!repo || !isMapping(entry)) continue

      // Cubierto por este lockfile: ya no lo procesan los siguientes
      pending = pending.filter((candidate) => candidate !== repo)
      const revision = requireRevision(repo)

      if (entry.commit === revision) {
        logger.info({ repo: repo.name, revision }, 'Lock is up-to-date')
      } else if (!external) {
        logger.info({ repo: repo.name, from: entry.commit, to: revision }, 'Updating lock')
        entry.commit = revision
        dirty = true
      } else {
        logger.warn(
          { repo: repo.name, lockfile: document.location },
          'Repo is locked in remote lockfile. Not updating.'
        )
      }
    }

    return { pending, dirty }
  }
}
