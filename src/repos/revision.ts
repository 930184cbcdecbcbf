import { execFileSync } from 'child_process'
import { dirname, join, resolve } from 'path'
import type { RepoType, RevisionProvider } from './types.js'
import type { FileSystem } from '../utils/fs.js'
import { logger } from '../utils/logger.js'

const REVISION_COMMANDS: Record<RepoType, string[]> = {
  git: ['git', 'rev-parse', '--verify', 'HEAD'],
  hg: ['hg', 'log', '-r', '.', '--template', '{node}'],
}

/**
 * Lee el commit actual ejecutando git / hg en el checkout
 */
export class VcsRevisionProvider implements RevisionProvider {
  getRevision(path: string, type: RepoType): string | null {
    const [command, ...args] = REVISION_COMMANDS[type]
    try {
      const output = execFileSync(command, args, {
        cwd: path,
        encoding: 'utf-8',
        stdio: ['ignore', 'pipe', 'pipe'],
      })
      const revision = output.trim()
      return revision === '' ? null : revision
    } catch (error) {
      logger.warn({ error, path, type }, 'Could not query current revision')
      return null
    }
  }
}

/**
 * Raíz del repo que contiene `dir`: el primer ancestro con `.git` o `.hg`.
 * Si no hay ninguno, el propio `dir`.
 */
export function findRepoRoot(dir: string, fs: FileSystem): string {
  let current = resolve(dir)
  for (;;) {
    if (fs.exists(join(current, '.git')) || fs.exists(join(current, '.hg'))) {
      return current
    }
    const parent = dirname(current)
    if (parent === current) return resolve(dir)
    current = parent
  }
}
