import { access, mkdir, readFile, writeFile } from 'node:fs/promises'
import { basename, dirname, isAbsolute, join, normalize } from 'node:path'
import JSZip from 'jszip'
import { PipelineError } from 'shared'

function isPathTraversal(filePath: string): boolean {
  const normalized = normalize(filePath)
  return normalized.startsWith('..') || isAbsolute(filePath)
}

async function fileExists(filePath: string): Promise<boolean> {
  try { await access(filePath); return true } catch { return false }
}

async function loadZip(zipPath: string): Promise<JSZip> {
  if (!(await fileExists(zipPath))) {
    throw new PipelineError('MissingResource', `Dependency archive not found: ${zipPath}`)
  }
  try {
    return await JSZip.loadAsync(await readFile(zipPath))
  } catch (error) {
    throw new PipelineError('MalformedResource', `Failed to read archive ${zipPath}: ${error}`)
  }
}

/**
 * Extract every file of a zip archive below `destination`.
 * Returns the extracted relative paths, sorted.
 */
export async function extractArchive(zipPath: string, destination: string): Promise<string[]> {
  const zip = await loadZip(zipPath)
  const files = Object.values(zip.files).filter(f => !f.dir)

  for (const file of files) {
    if (isPathTraversal(file.name)) {
      throw new PipelineError('InvariantViolation', `Unsafe entry ${file.name} in ${zipPath}`)
    }
  }

  await mkdir(destination, { recursive: true })
  const written: string[] = []
  for (const file of files) {
    const target = join(destination, file.name)
    await mkdir(dirname(target), { recursive: true })
    await writeFile(target, await file.async('nodebuffer'))
    written.push(file.name)
  }
  return written.sort()
}

/**
 * Extract each dependency archive into its own subdirectory of `depsDir`,
 * named after the archive. Two archives with the same name collide.
 */
export async function extractDependencies(archives: string[], depsDir: string): Promise<string[]> {
  const subdirs: string[] = []
  const names = new Set<string>()
  for (const archive of archives) {
    const name = basename(archive).replace(/\.zip$/, '')
    if (names.has(name)) {
      throw new PipelineError('InvariantViolation', `Resource archive name conflict: ${basename(archive)}`)
    }
    names.add(name)
    const subdir = join(depsDir, name)
    await extractArchive(archive, subdir)
    subdirs.push(subdir)
  }
  return subdirs
}

/**
 * Rewrite an archive with its entries ordered by name. The link step
 * consumes partials in entry order, so this keeps its output stable.
 */
export async function sortArchive(sourcePath: string, sortedPath: string): Promise<void> {
  const original = await loadZip(sourcePath)
  const sorted = new JSZip()
  const entries = Object.values(original.files).sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

  for (const entry of entries) {
    if (entry.dir) {
      sorted.file(entry.name, null, { dir: true, date: entry.date })
      continue
    }
    sorted.file(entry.name, await entry.async('nodebuffer'), {
      date: entry.date,
      comment: entry.comment,
      unixPermissions: entry.unixPermissions,
      dosPermissions: entry.dosPermissions,
      compression: entry.options.compression,
    })
  }

  const buffer = await sorted.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' })
  await writeFile(sortedPath, buffer)
}
