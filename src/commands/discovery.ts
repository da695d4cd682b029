import { existsSync } from 'node:fs'
import { readdir } from 'node:fs/promises'
import { basename, extname, join, resolve } from 'node:path'

const MODULE_EXTENSIONS = ['.ts', '.mts', '.js', '.mjs']
const INDEX_FILES = MODULE_EXTENSIONS.map((ext) => `index${ext}`)

/** Returns the extension id for a module file name, or null for non-modules. */
export function moduleIdFromFile(fileName: string): string | null {
  if (fileName.endsWith('.d.ts') || /\.(test|spec)\.[mc]?[jt]s$/.test(fileName)) return null
  const ext = extname(fileName)
  if (!MODULE_EXTENSIONS.includes(ext)) return null
  return basename(fileName, ext)
}

const byName = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0)

function isPrivateName(name: string): boolean {
  return name.startsWith('_') || name.startsWith('.')
}

/**
 * Lists the extension modules in `dir` as id -> absolute module path.
 *
 * A module is a file with a script extension or a directory with an index
 * module. Names starting with `_` are private and skipped. When two entries
 * map to the same id the first in name order wins. Ids come out sorted.
 */
export async function scanExtensionDir(dir: string): Promise<Map<string, string>> {
  const root = resolve(dir)
  const entries = await readdir(root, { withFileTypes: true })
  entries.sort((a, b) => byName(a.name, b.name))

  const found = new Map<string, string>()
  for (const entry of entries) {
    if (isPrivateName(entry.name)) continue

    if (entry.isDirectory()) {
      const index = INDEX_FILES.find((file) => existsSync(join(root, entry.name, file)))
      if (index && !found.has(entry.name)) found.set(entry.name, join(root, entry.name, index))
      continue
    }

    if (!entry.isFile()) continue
    const id = moduleIdFromFile(entry.name)
    if (id && !isPrivateName(id) && !found.has(id)) found.set(id, join(root, entry.name))
  }

  return new Map([...found.entries()].sort(([a], [b]) => byName(a, b)))
}
