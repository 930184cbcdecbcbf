import type { CliArgs } from './args.js'
import type { GlobalConfig } from '../config/global.js'
import { lockDocuments } from '../config/resolver.js'
import { LockReconciler, selectFloatingRepos } from '../lock/reconciler.js'
import type { ReconcileResult } from '../lock/reconciler.js'
import { FileDocumentWriter, serializeDocument } from '../lock/writer.js'
import type { SerializeOptions } from '../lock/writer.js'
import { loadProject } from '../project/loader.js'
import type { Project } from '../project/loader.js'
import { managedRepos } from '../repos/registry.js'
import type { RevisionProvider } from '../repos/types.js'
import type { FileSystem } from '../utils/fs.js'
import { logger } from '../utils/logger.js'

export interface CommandContext {
  global: GlobalConfig
  fs?: FileSystem
  revisions?: RevisionProvider
  stdout?: (text: string) => void
}

function serializeOptions(args: CliArgs, global: GlobalConfig): SerializeOptions {
  return {
    indent: args.indent ?? global.dump.indent,
    sortKeys: args.sortKeys ?? global.dump.sort_keys,
  }
}

function loadComplete(args: CliArgs, context: CommandContext, useLock: boolean): Project {
  const project = loadProject({
    files: args.files,
    workDir: context.global.work_dir,
    useLock,
    fs: context.fs,
    revisions: context.revisions,
  })

  if (project.missingRepos.length > 0) {
    throw new Error(
      `Repos not available: ${project.missingRepos.join(', ')}. ` +
        `Check them out under ${context.global.work_dir} and run again.`
    )
  }
  return project
}

/**
 * Imprime la configuración efectiva
 */
export function runDump(args: CliArgs, context: CommandContext): void {
  const project = loadComplete(args, context, args.useLock ?? context.global.use_lock)
  const output = serializeDocument(project.config, args.format, serializeOptions(args, context.global))
  const write = context.stdout ?? ((text: string) => process.stdout.write(text))
  write(output)
}

/**
 * Crea o actualiza los lockfiles del proyecto
 */
export function runLock(args: CliArgs, context: CommandContext): ReconcileResult {
  const project = loadComplete(args, context, true)

  const reconciler = new LockReconciler({
    lockfilePath: project.resolver.getLockfilePath(),
    writer: new FileDocumentWriter(serializeOptions(args, context.global), context.fs),
  })

  const result = reconciler.reconcile(
    lockDocuments(project.documents),
    selectFloatingRepos(project.repos),
    managedRepos(project.repos)
  )

  logger.info(
    { written: result.written.map((document) => document.location), newLocks: result.unlocked },
    'Lock finished'
  )
  return result
}
