import type { ConfigDocument } from './document.js'
import { IncludeError } from './errors.js'
import { cloneMapping, cloneValue, isMapping } from './value.js'
import type { ConfigMapping, ConfigValue } from './value.js'

/**
 * Mezcla `upd` sobre una copia de `dest`.
 *
 * Si ambos valores de una clave son mappings se mezclan recursivamente;
 * en cualquier otro caso gana el de `upd` (las listas se reemplazan, no se
 * concatenan). Las claves nuevas quedan al final, en el orden de `upd`.
 */
export function mergeMappings(dest: ConfigValue, upd: ConfigValue): ConfigMapping {
  if (!isMapping(dest) || !isMapping(upd)) {
    throw new IncludeError('Cannot merge using non-dict')
  }

  const merged = cloneMapping(dest)
  for (const [key, value] of Object.entries(upd)) {
    const current = merged[key]
    merged[key] = isMapping(current) && isMapping(value) ? mergeMappings(current, value) : cloneValue(value)
  }
  return merged
}

/**
 * Configuración efectiva: fold de izquierda a derecha sobre los documentos
 * en orden de resolución. El orden importa, el merge no es conmutativo.
 */
export function mergeDocuments(documents: readonly ConfigDocument[]): ConfigMapping {
  return documents.reduce<ConfigMapping>((config, document) => mergeMappings(config, document.body), {})
}
