import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { ConfigDocument } from '../../../src/config/document.js'
import { RepoStateError } from '../../../src/config/errors.js'
import { LockReconciler, isPathInside, selectFloatingRepos } from '../../../src/lock/reconciler.js'
import type { DocumentWriter } from '../../../src/lock/writer.js'
import type { ManagedRepo, RepoRef } from '../../../src/repos/types.js'
import { logger } from '../../../src/utils/logger.js'

class RecordingWriter implements DocumentWriter {
  readonly writes: ConfigDocument[] = []

  write(document: ConfigDocument): void {
    this.writes.push(document)
  }
}

function repo(key: string, revision: string | null, overrides: Partial<RepoRef> = {}): RepoRef {
  return {
    key,
    name: key,
    type: 'git',
    path: `/work/${key}`,
    commit: null,
    lockedCommit: null,
    revision,
    operationsDisabled: false,
    ...overrides,
  }
}

function lockfile(location: string, repos: Record<string, string | null>): ConfigDocument {
  const entries = Object.fromEntries(Object.entries(repos).map(([key, commit]) => [key, { commit }]))
  return new ConfigDocument(
    location,
    { header: { version: 14 }, overrides: { repos: entries } },
    { version: 14, isLockDocument: true }
  )
}

function commitOf(document: ConfigDocument, key: string): unknown {
  const overrides = document.body.overrides
  if (overrides === null || typeof overrides !== 'object' || Array.isArray(overrides)) return undefined
  const repos = overrides.repos
  if (repos === null || typeof repos !== 'object' || Array.isArray(repos)) return undefined
  const entry = repos[key]
  if (entry === null || typeof entry !== 'object' || Array.isArray(entry)) return undefined
  return entry.commit
}

describe('LockReconciler', () => {
  const lockfilePath = '/project/project.lock.yml'
  const managed: ManagedRepo[] = [
    { key: 'meta', path: '/work/meta', operationsDisabled: false },
    { key: 'project', path: '/project', operationsDisabled: true },
  ]

  let writer: RecordingWriter
  let reconciler: LockReconciler

  beforeEach(() => {
    writer = new RecordingWriter()
    reconciler = new LockReconciler({ lockfilePath, writer })
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('debe actualizar el lock de un lockfile propio y escribirlo', () => {
    const lock = lockfile('/project/project.lock.yml', { r1: 'AAA' })

    const result = reconciler.reconcile([lock], [repo('r1', 'BBB')], managed)

    expect(commitOf(lock, 'r1')).toBe('BBB')
    expect(result.written).toEqual([lock])
    expect(result.unlocked).toEqual([])
    expect(writer.writes).toEqual([lock])
  })

  it('no debe reescribir un lockfile externo, pero sí marcar el repo como cubierto', () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined)
    const lock = lockfile('/work/meta/meta.lock.yml', { r1: 'AAA' })

    const result = reconciler.reconcile([lock], [repo('r1', 'BBB')], managed)

    expect(commitOf(lock, 'r1')).toBe('AAA')
    expect(result.written).toEqual([])
    expect(result.unlocked).toEqual([])
    expect(writer.writes).toEqual([])
    expect(warn).toHaveBeenCalledWith(
      { repo: 'r1', lockfile: '/work/meta/meta.lock.yml' },
      'Repo is locked in remote lockfile. Not updating.'
    )
  })

  it('un lockfile dentro de un repo con operaciones deshabilitadas no es externo', () => {
    const lock = lockfile('/project/layers/layer.lock.yml', { r1: 'AAA' })

    expect(reconciler.isExternalLockfile(lock, managed)).toBe(false)
    reconciler.reconcile([lock], [repo('r1', 'BBB')], managed)
    expect(commitOf(lock, 'r1')).toBe('BBB')
  })

  it('no debe escribir si el lock ya está al día', () => {
    const lock = lockfile('/project/project.lock.yml', { r1: 'AAA' })

    const result = reconciler.reconcile([lock], [repo('r1', 'AAA')], managed)

    expect(result.written).toEqual([])
    expect(writer.writes).toEqual([])
  })

  it('debe crear el lockfile canónico para repos no cubiertos', () => {
    const result = reconciler.reconcile([], [repo('r2', 'CCC')], managed)

    expect(result.unlocked).toEqual(['r2'])
    expect(result.written).toHaveLength(1)
    const created = result.written[0]
    expect(created.location).toBe(lockfilePath)
    expect(created.isLockDocument).toBe(true)
    expect(created.body).toEqual({
      header: { version: 14 },
      overrides: { repos: { r2: { commit: 'CCC' } } },
    })
    expect(writer.writes).toEqual([created])
  })

  it('debe reutilizar el lockfile canónico si ya existe', () => {
    const canonical = lockfile(lockfilePath, { r1: 'AAA' })

    const result = reconciler.reconcile([canonical], [repo('r1', 'BBB'), repo('r2', 'CCC')], managed)

    expect(commitOf(canonical, 'r1')).toBe('BBB')
    expect(commitOf(canonical, 'r2')).toBe('CCC')
    expect(result.written).toEqual([canonical])
    expect(result.unlocked).toEqual(['r2'])
    expect(writer.writes).toHaveLength(2)
  })

  it('los repos ya cubiertos no se procesan en lockfiles posteriores', () => {
    const first = lockfile('/project/a.lock.yml', { r1: 'AAA' })
    const second = lockfile('/project/b.lock.yml', { r1: 'ZZZ' })

    const result = reconciler.reconcile([first, second], [repo('r1', 'BBB')], managed)

    expect(commitOf(first, 'r1')).toBe('BBB')
    expect(commitOf(second, 'r1')).toBe('ZZZ')
    expect(result.written).toEqual([first])
  })

  it('debe ignorar lockfiles sin overrides.repos', () => {
    const empty = new ConfigDocument('/project/x.lock.yml', { header: { version: 14 } }, {
      version: 14,
      isLockDocument: true,
    })

    const result = reconciler.reconcile([empty], [repo('r1', 'BBB')], managed)

    expect(result.unlocked).toEqual(['r1'])
    expect(result.written.map((document) => document.location)).toEqual([lockfilePath])
  })

  it('debe fallar si un repo flotante no tiene revisión actual', () => {
    expect(() => reconciler.reconcile([], [repo('r3', null)], managed)).toThrow(RepoStateError)
    expect(writer.writes).toEqual([])
  })

  it('no debe hacer nada sin repos flotantes', () => {
    const lock = lockfile(lockfilePath, { r1: 'AAA' })

    const result = reconciler.reconcile([lock], [], managed)

    expect(result).toEqual({ written: [], unlocked: [] })
    expect(writer.writes).toEqual([])
  })
})

describe('selectFloatingRepos', () => {
  it('debe quedarse con repos gestionados y sin commit', () => {
    const repos = [
      repo('floating', 'A'),
      repo('pinned', 'B', { commit: 'B' }),
      repo('local', 'C', { operationsDisabled: true }),
      repo('locked', 'D', { lockedCommit: 'D' }),
    ]

    expect(selectFloatingRepos(repos).map((r) => r.key)).toEqual(['floating', 'locked'])
  })
})

describe('isPathInside', () => {
  it('debe comparar por segmentos de ruta', () => {
    expect(isPathInside('/work/meta/project.lock.yml', '/work/meta')).toBe(true)
    expect(isPathInside('/work/meta', '/work/meta')).toBe(true)
    expect(isPathInside('/work/meta2/project.lock.yml', '/work/meta')).toBe(false)
    expect(isPathInside('/project/project.lock.yml', '/work/meta')).toBe(false)
  })
})
