/**
 * Errores fatales de la resolución de configuración.
 * Abortan la resolución / el lock completo, no se reintentan.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/**
 * Error al cargar un archivo: extensión desconocida, archivo inexistente,
 * parse fallido, schema inválido o versión fuera de rango.
 */
export class LoadConfigError extends ConfigError {
  readonly filename: string
  readonly issues: string[]

  constructor(message: string, filename: string, issues: string[] = []) {
    super(`${message}: ${filename}`)
    this.filename = filename
    this.issues = issues
  }
}

/** Error del mecanismo de includes y del merge */
export class IncludeError extends ConfigError {}

/** Un repo flotante no tiene revisión actual que fijar */
export class RepoStateError extends ConfigError {}
