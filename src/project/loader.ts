import { dirname, resolve } from 'path'
import type { ConfigDocument } from '../config/document.js'
import { DocumentLoader } from '../config/loader.js'
import { IncludeResolver } from '../config/resolver.js'
import type { ConfigMapping } from '../config/value.js'
import { availableRepos, buildRepoRefs } from '../repos/registry.js'
import { VcsRevisionProvider, findRepoRoot } from '../repos/revision.js'
import type { RepoRef, RevisionProvider } from '../repos/types.js'
import { nodeFileSystem } from '../utils/fs.js'
import type { FileSystem } from '../utils/fs.js'
import { logger } from '../utils/logger.js'

export interface ProjectOptions {
  files: string[]
  workDir: string
  useLock: boolean
  // Por defecto, la raíz del repo que contiene el primer archivo
  topRepoPath?: string
  fs?: FileSystem
  revisions?: RevisionProvider
}

export interface Project {
  resolver: IncludeResolver
  config: ConfigMapping
  documents: ConfigDocument[]
  repos: RepoRef[]
  // Repos que siguen faltando: hay que hacer checkout y volver a cargar
  missingRepos: string[]
}

/**
 * Carga la configuración completa de un proyecto.
 *
 * Resuelve los includes, mergea, y con la configuración resultante averigua
 * qué repos ya tienen checkout. Si alguno de los repos faltantes aparece,
 * vuelve a resolver con ese conjunto más grande. Termina cuando no falta
 * nada o cuando una vuelta no aporta repos nuevos.
 */
export function loadProject(options: ProjectOptions): Project {
  const fs = options.fs ?? nodeFileSystem
  const revisions = options.revisions ?? new VcsRevisionProvider()
  const files = options.files.map((file) => resolve(file))
  if (files.length === 0) {
    throw new Error('No configuration files given')
  }

  const topRepoPath = options.topRepoPath ?? findRepoRoot(dirname(files[0]), fs)
  const resolver = new IncludeResolver(files, topRepoPath, {
    useLock: options.useLock,
    loader: new DocumentLoader({ fs }),
  })

  let known: Record<string, string> = {}
  for (let round = 1; ; round++) {
    const { config, documents, missingRepos } = resolver.getConfig(known)
    const repos = buildRepoRefs(config, {
      topRepoPath: resolver.getTopRepoPath(),
      workDir: options.workDir,
      fs,
      revisions,
    })

    const available = availableRepos(repos, fs)
    const found = missingRepos.filter((key) => available[key] !== undefined)

    logger.debug({ round, documents: documents.length, missingRepos, found }, 'Configuration resolved')

    if (missingRepos.length === 0 || found.length === 0) {
      return { resolver, config, documents, repos, missingRepos }
    }

    // Solo crece: cada vuelta agrega al menos un repo conocido
    known = { ...available, ...known }
  }
}
