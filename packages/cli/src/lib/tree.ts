import { copyFile, mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import { PipelineError } from 'shared'
import type { RenameEntry } from 'shared'
import { filterStringsXml } from './strings-xml.js'

export type TreeEdit =
  | { kind: 'move'; from: string; to: string }
  | { kind: 'copy'; from: string; to: string }
  | { kind: 'delete'; path: string }
  | { kind: 'filter-strings'; path: string; keep: (name: string) => boolean }

/**
 * What a transform wants done to one resource directory. Transforms only
 * plan; `applyToPathSet` and `applyToDirectory` carry the plan out.
 */
export interface TransformPlan {
  edits: TreeEdit[]
  renames: RenameEntry[]
}

export function emptyPlan(): TransformPlan {
  return { edits: [], renames: [] }
}

/**
 * Every file below `root` as a sorted list of `/`-separated relative paths.
 */
export async function listFiles(root: string): Promise<string[]> {
  const files: string[] = []

  async function walk(dir: string, prefix: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true })
    for (const entry of entries) {
      const relative = prefix ? `${prefix}/${entry.name}` : entry.name
      if (entry.isDirectory()) {
        await walk(join(dir, entry.name), relative)
      } else {
        files.push(relative)
      }
    }
  }

  await walk(root, '')
  return files.sort()
}

/**
 * Replay edits on an in-memory path set. Returns the resulting sorted listing.
 */
export function applyToPathSet(paths: Iterable<string>, edits: TreeEdit[]): string[] {
  const result = new Set(paths)
  for (const edit of edits) {
    switch (edit.kind) {
      case 'move':
        requirePath(result, edit.from)
        result.delete(edit.from)
        result.add(edit.to)
        break
      case 'copy':
        requirePath(result, edit.from)
        result.add(edit.to)
        break
      case 'delete':
        result.delete(edit.path)
        break
      case 'filter-strings':
        requirePath(result, edit.path)
        break
    }
  }
  return [...result].sort()
}

function requirePath(paths: Set<string>, path: string): void {
  if (!paths.has(path)) {
    throw new PipelineError('InvariantViolation', `Edit refers to missing resource ${path}`)
  }
}

/**
 * Carry edits out on disk, in order, relative to `root`.
 */
export async function applyToDirectory(root: string, edits: TreeEdit[]): Promise<void> {
  for (const edit of edits) {
    switch (edit.kind) {
      case 'move':
        await mkdir(dirname(join(root, edit.to)), { recursive: true })
        await rename(join(root, edit.from), join(root, edit.to))
        break
      case 'copy':
        await mkdir(dirname(join(root, edit.to)), { recursive: true })
        await copyFile(join(root, edit.from), join(root, edit.to))
        break
      case 'delete':
        await rm(join(root, edit.path), { force: true })
        break
      case 'filter-strings': {
        const filePath = join(root, edit.path)
        const content = await readFile(filePath, 'utf-8')
        const filtered = filterStringsXml(content, edit.keep, edit.path)
        if (filtered !== content) {
          await writeFile(filePath, filtered)
        }
        break
      }
    }
  }
}
