/**
 * Representación de los valores de un documento de configuración.
 * Todo lo que sale de JSON/YAML se normaliza a este árbol.
 */
export type ConfigScalar = string | number | boolean | null

export type ConfigValue = ConfigScalar | ConfigValue[] | ConfigMapping

export interface ConfigMapping {
  [key: string]: ConfigValue
}

export type ValueKind = 'mapping' | 'sequence' | 'string' | 'number' | 'boolean' | 'null'

export function kindOf(value: ConfigValue): ValueKind {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'sequence'
  switch (typeof value) {
    case 'string':
      return 'string'
    case 'number':
      return 'number'
    case 'boolean':
      return 'boolean'
    default:
      return 'mapping'
  }
}

export function isMapping(value: ConfigValue | undefined): value is ConfigMapping {
  return value !== undefined && kindOf(value) === 'mapping'
}

function isPlainObject(raw: object): raw is Record<string, unknown> {
  const proto = Object.getPrototypeOf(raw)
  return proto === Object.prototype || proto === null
}

/**
 * Convierte el resultado de un parser a ConfigValue.
 * Devuelve undefined si aparece algo que no es representable
 * (funciones, instancias de clases, etc.).
 */
export function toConfigValue(raw: unknown): ConfigValue | undefined {
  if (raw === null || raw === undefined) return null
  if (typeof raw === 'string' || typeof raw === 'number' || typeof raw === 'boolean') {
    return raw
  }
  if (Array.isArray(raw)) {
    const items: ConfigValue[] = []
    for (const item of raw) {
      const converted = toConfigValue(item)
      if (converted === undefined) return undefined
      items.push(converted)
    }
    return items
  }
  if (typeof raw === 'object' && isPlainObject(raw)) {
    const mapping: ConfigMapping = {}
    for (const [key, item] of Object.entries(raw)) {
      const converted = toConfigValue(item)
      if (converted === undefined) return undefined
      mapping[key] = converted
    }
    return mapping
  }
  return undefined
}

/** Copia profunda, conservando el orden de las claves */
export function cloneValue(value: ConfigValue): ConfigValue {
  if (Array.isArray(value)) return value.map(cloneValue)
  if (isMapping(value)) return cloneMapping(value)
  return value
}

export function cloneMapping(mapping: ConfigMapping): ConfigMapping {
  const copy: ConfigMapping = {}
  for (const [key, item] of Object.entries(mapping)) {
    copy[key] = cloneValue(item)
  }
  return copy
}
