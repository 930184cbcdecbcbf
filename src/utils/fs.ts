import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'fs'
import { dirname } from 'path'

/**
 * Acceso síncrono a archivos. El resolver, el loader y el writer lo reciben
 * inyectado para poder probarlos sin tocar el disco.
 */
export interface FileSystem {
  exists(path: string): boolean
  readFile(path: string): string
  writeFile(path: string, content: string): void
}

export const nodeFileSystem: FileSystem = {
  exists(path) {
    return existsSync(path)
  },
  readFile(path) {
    return readFileSync(path, 'utf-8')
  },
  writeFile(path, content) {
    mkdirSync(dirname(path), { recursive: true })
    writeFileSync(path, content, 'utf-8')
  },
}
