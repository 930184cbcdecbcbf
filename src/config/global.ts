import { z } from 'zod'
import { logger } from '../utils/logger.js'

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1')

const GlobalConfigSchema = z.object({
  log_level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  // Directorio donde viven los checkouts de repos con url
  work_dir: z.string().min(1),
  use_lock: booleanFromEnv.default('true'),
  dump: z.object({
    indent: z.coerce.number().int().min(0).max(16).default(4),
    sort_keys: booleanFromEnv.default('false'),
  }),
})

export type GlobalConfig = z.infer<typeof GlobalConfigSchema>

export type Environment = Record<string, string | undefined>

/**
 * Carga la configuración global desde variables de entorno.
 * Los flags de la CLI se aplican encima (ver cli/args.ts).
 */
export function loadGlobalConfig(env: Environment = process.env, cwd = process.cwd()): GlobalConfig {
  // Variables vacías cuentan como no definidas
  const read = (key: string) => (env[key] === '' ? undefined : env[key])

  try {
    const config = GlobalConfigSchema.parse({
      log_level: read('LOG_LEVEL'),
      work_dir: read('CONFWEAVE_WORK_DIR') ?? cwd,
      use_lock: read('CONFWEAVE_USE_LOCK'),
      dump: {
        indent: read('CONFWEAVE_INDENT'),
        sort_keys: read('CONFWEAVE_SORT_KEYS'),
      },
    })
    logger.debug({ workDir: config.work_dir, useLock: config.use_lock }, 'Global config loaded')
    return config
  } catch (error) {
    logger.error({ error }, 'Failed to load global config')
    throw error
  }
}
