import type { RepoType, RevisionProvider } from '../../src/repos/types.js'
import { MemoryFileSystem } from './memory-fs.js'

export class MapRevisions implements RevisionProvider {
  constructor(private readonly revisions: Record<string, string>) {}

  getRevision(path: string, _type: RepoType): string | null {
    return this.revisions[path] ?? null
  }
}

/**
 * Proyecto con un repo principal en /project que incluye `meta`, y `meta`
 * a su vez incluye `extra`. Los checkouts viven en /work.
 */
export function multiRepoProject(options: { withExtra?: boolean } = {}): MemoryFileSystem {
  const fs = new MemoryFileSystem({
    '/project/project.yml': [
      'header:',
      '  version: 14',
      '  includes:',
      '    - repo: meta',
      '      file: meta.yml',
      'repos:',
      '  project:',
      '  meta:',
      '    url: https://example.com/meta.git',
      '    branch: main',
      'machine: top',
      '',
    ].join('\n'),
    '/work/meta/meta.yml': [
      'header:',
      '  version: 14',
      '  includes:',
      '    - repo: extra',
      '      file: extra.yml',
      'repos:',
      '  extra:',
      '    url: https://example.com/extra.git',
      'distro: meta',
      '',
    ].join('\n'),
  })
  fs.addDir('/project/.git')

  if (options.withExtra ?? true) {
    fs.writeFile('/work/extra/extra.yml', ['header:', '  version: 14', 'target: extra-image', ''].join('\n'))
  }
  return fs
}
