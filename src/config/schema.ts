import { z } from 'zod'

// Versión de formato que escribe esta herramienta y la más antigua que acepta
export const FILE_VERSION = 14
export const COMPATIBLE_FILE_VERSION = 1

export interface VersionRange {
  min: number
  max: number
}

export const DEFAULT_VERSION_RANGE: VersionRange = {
  min: COMPATIBLE_FILE_VERSION,
  max: FILE_VERSION,
}

export const SOURCE_DIR_OVERRIDE_KEY = '_source_dir'
export const SOURCE_DIR_HOST_OVERRIDE_KEY = '_source_dir_host'

const LocalIncludeSchema = z.string().min(1)

const RepoIncludeSchema = z
  .object({
    repo: z.string().min(1),
    // Opcional en el schema: el resolver reporta IncludeError si falta
    file: z.string().min(1).optional(),
  })
  .strict()

const IncludeSchema = z.union([LocalIncludeSchema, RepoIncludeSchema])

export type IncludeReference = z.infer<typeof IncludeSchema>
export type RepoInclude = z.infer<typeof RepoIncludeSchema>

const HeaderSchema = z
  .object({
    // '0.10' es el formato de versión previo a los enteros y equivale a 1
    version: z.union([z.number().int().positive(), z.literal('0.10')]),
    includes: z.array(IncludeSchema).optional(),
  })
  .strict()

const RepoSchema = z
  .object({
    name: z.string().optional(),
    url: z.string().optional(),
    type: z.enum(['git', 'hg']).optional(),
    path: z.string().optional(),
    commit: z.string().nullable().optional(),
    branch: z.string().nullable().optional(),
    tag: z.string().nullable().optional(),
    layers: z.record(z.unknown()).optional(),
    patches: z.record(z.unknown()).optional(),
  })
  .passthrough()

const LockEntrySchema = z
  .object({
    commit: z.string().nullable(),
  })
  .passthrough()

const OverridesSchema = z
  .object({
    repos: z.record(LockEntrySchema).optional(),
  })
  .strict()

export const ConfigDocumentSchema = z
  .object({
    header: HeaderSchema,
    build_system: z.enum(['openembedded', 'oe', 'isar']).optional(),
    defaults: z.record(z.unknown()).optional(),
    machine: z.string().optional(),
    distro: z.string().optional(),
    target: z.union([z.string(), z.array(z.string())]).optional(),
    env: z.record(z.string().nullable()).optional(),
    task: z.string().optional(),
    repos: z.record(RepoSchema.nullable()).optional(),
    overrides: OverridesSchema.optional(),
    bblayers_conf_header: z.record(z.string()).optional(),
    local_conf_header: z.record(z.string()).optional(),
    menu_configuration: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
    artifacts: z.record(z.string()).optional(),
    signers: z.record(z.unknown()).optional(),
    buildtools: z.record(z.unknown()).optional(),
    // Obsoleto: se acepta pero solo genera un warning
    proxy_config: z.unknown().optional(),
    [SOURCE_DIR_OVERRIDE_KEY]: z.string().optional(),
    [SOURCE_DIR_HOST_OVERRIDE_KEY]: z.string().optional(),
  })
  .strict()

export type ConfigDocumentData = z.infer<typeof ConfigDocumentSchema>

/**
 * Normaliza header.version a entero
 */
export function normalizeVersion(version: ConfigDocumentData['header']['version']): number {
  return version === '0.10' ? 1 : version
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '<root>'
    return `${path}: ${issue.message}`
  })
}
