import { dirname, isAbsolute, join, parse, resolve } from 'path'
import type { ConfigDocument } from './document.js'
import { IncludeError } from './errors.js'
import { DocumentLoader } from './loader.js'
import { mergeDocuments } from './merge.js'
import type { IncludeReference, RepoInclude } from './schema.js'
import type { ConfigMapping } from './value.js'
import { logger } from '../utils/logger.js'

/** Clave de repo -> ruta del checkout, para los repos ya disponibles */
export type KnownRepos = Readonly<Record<string, string>>

export interface ResolveResult {
  // Orden de resolución: includes antes que el documento que los incluye
  documents: ConfigDocument[]
  // Repos referenciados que todavía no tienen checkout (sin duplicados)
  missingRepos: string[]
}

export interface ResolvedConfig extends ResolveResult {
  config: ConfigMapping
}

export interface IncludeResolverOptions {
  useLock?: boolean
  loader?: DocumentLoader
}

interface VisitContext {
  repoPath: string
  isLockDocument: boolean
  isExternal: boolean
  // Documentos abiertos en la cadena de includes actual
  chain: string[]
}

/**
 * Ruta del lockfile hermano: `name.ext` -> `name.lock.ext`
 */
export function lockfilePathFor(file: string): string {
  const { dir, name, ext } = parse(file)
  return join(dir, `${name}.lock${ext}`)
}

/**
 * Documentos lock, en orden de resolución
 */
export function lockDocuments(documents: readonly ConfigDocument[]): ConfigDocument[] {
  return documents.filter((document) => document.isLockDocument)
}

function lookupRepo(repos: KnownRepos, key: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(repos, key) ? repos[key] : undefined
}

function appendUnique(target: string[], items: readonly string[]): void {
  for (const item of items) {
    if (!target.includes(item)) target.push(item)
  }
}

/**
 * Resuelve los includes de uno o más archivos de configuración.
 *
 * Cada archivo puede declarar en `header.includes`:
 *   - un string: ruta relativa a la raíz del repo actual
 *   - `{ repo, file }`: archivo relativo a la raíz de otro repo
 *
 * Los includes se recorren en profundidad y de arriba hacia abajo; cada
 * documento queda después de todo lo que incluye, de modo que al mergear
 * el que incluye siempre gana.
 *
 * Con `useLock`, si existe `<file>.lock.<ext>` junto a un archivo se
 * inserta justo antes que él (un solo nivel: el lock de un lock no se busca).
 */
export class IncludeResolver {
  readonly topFiles: string[]
  readonly useLock: boolean
  private topRepoPath: string
  private readonly loader: DocumentLoader

  constructor(topFiles: string[], topRepoPath: string, options: IncludeResolverOptions = {}) {
    if (topFiles.length === 0) {
      throw new IncludeError('At least one configuration file is required')
    }
    this.topFiles = topFiles.map((file) => resolve(file))
    this.topRepoPath = resolve(topRepoPath)
    this.useLock = options.useLock ?? true
    this.loader = options.loader ?? new DocumentLoader()
  }

  /** Lockfile canónico: hermano del archivo dado, o del primer top file */
  getLockfilePath(file?: string): string {
    return lockfilePathFor(file ?? this.topFiles[0])
  }

  /** Raíz del repo principal (puede cambiarla un `_source_dir`) */
  getTopRepoPath(): string {
    return this.topRepoPath
  }

  resolve(knownRepos: KnownRepos = {}): ResolveResult {
    const documents: ConfigDocument[] = []
    const missingRepos: string[] = []

    for (const file of this.topFiles) {
      // topRepoPath se lee en cada vuelta: un _source_dir afecta a los siguientes
      const result = this.visit(file, knownRepos, {
        repoPath: this.topRepoPath,
        isLockDocument: false,
        isExternal: false,
        chain: [],
      })
      documents.push(...result.documents)
      appendUnique(missingRepos, result.missingRepos)
    }

    if (missingRepos.length > 0) {
      logger.debug({ missingRepos }, 'Configuration references repos that are not available yet')
    }

    return { documents, missingRepos }
  }

  /** Resuelve y mergea en un solo paso */
  getConfig(knownRepos: KnownRepos = {}): ResolvedConfig {
    const { documents, missingRepos } = this.resolve(knownRepos)
    return { config: mergeDocuments(documents), documents, missingRepos }
  }

  private visit(location: string, knownRepos: KnownRepos, context: VisitContext): ResolveResult {
    if (context.chain.includes(location)) {
      throw new IncludeError(
        `Circular include detected: ${[...context.chain, location].join(' -> ')}`
      )
    }
    const chain = [...context.chain, location]

    const documents: ConfigDocument[] = []
    const missingRepos: string[] = []

    const current = this.loader.load(location, {
      isLockDocument: context.isLockDocument,
      isExternal: context.isExternal,
    })

    if (this.useLock && !context.isLockDocument) {
      const lockfile = lockfilePathFor(location)
      if (this.loader.fs.exists(lockfile)) {
        logger.debug({ lockfile }, 'Appending lockfile')
        const result = this.visit(lockfile, knownRepos, {
          repoPath: context.repoPath,
          isLockDocument: true,
          isExternal: context.isExternal,
          chain,
        })
        documents.push(...result.documents)
        missingRepos.push(...result.missingRepos)
      }
    }

    let repoPath = context.repoPath
    if (current.sourceDirOverride) {
      repoPath = resolve(current.sourceDirOverride)
      this.topRepoPath = repoPath
    }

    for (const include of current.includes) {
      const result = this.visitInclude(include, current, knownRepos, {
        repoPath,
        isLockDocument: false,
        isExternal: context.isExternal,
        chain,
      })
      documents.push(...result.documents)
      missingRepos.push(...result.missingRepos)
    }

    documents.push(current)

    return { documents, missingRepos: [...new Set(missingRepos)] }
  }

  private visitInclude(
    include: IncludeReference,
    parent: ConfigDocument,
    knownRepos: KnownRepos,
    context: VisitContext
  ): ResolveResult {
    if (typeof include === 'string') {
      return this.visit(this.resolveLocalInclude(include, parent, context.repoPath), knownRepos, context)
    }
    return this.visitRepoInclude(include, knownRepos, context)
  }

  private resolveLocalInclude(include: string, parent: ConfigDocument, repoPath: string): string {
    if (isAbsolute(include)) return include

    const candidate = resolve(repoPath, include)
    if (this.loader.fs.exists(candidate)) return candidate

    const alternate = resolve(dirname(parent.location), include)
    if (this.loader.fs.exists(alternate)) {
      logger.warn(
        { include, location: parent.location },
        'Falling back to file-relative addressing of local include. ' +
          'Update your layer to repo-relative addressing to avoid this warning'
      )
      return alternate
    }

    // Se deja fallar en el loader con el path relativo al repo
    return candidate
  }

  private visitRepoInclude(
    include: RepoInclude,
    knownRepos: KnownRepos,
    context: VisitContext
  ): ResolveResult {
    const includeDir = lookupRepo(knownRepos, include.repo)
    if (includeDir === undefined) {
      return { documents: [], missingRepos: [include.repo] }
    }
    if (!include.file) {
      throw new IncludeError(`"file" is not specified: ${JSON.stringify(include)}`)
    }

    const repoPath = resolve(includeDir)
    return this.visit(join(repoPath, include.file), knownRepos, {
      ...context,
      repoPath,
      isExternal: true,
    })
  }
}
