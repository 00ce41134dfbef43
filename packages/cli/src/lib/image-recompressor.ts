import { rm } from 'node:fs/promises'
import { join } from 'node:path'
import pLimit from 'p-limit'
import { PipelineError } from 'shared'
import type { RenameEntry } from 'shared'
import type { ToolRunner } from './tool-runner.js'

/**
 * PNGs that must stay PNGs: 9-patches need the format, and the named assets
 * break on specific devices once converted.
 */
export const WEBP_EXCLUSIONS = /(?:^|\/)star_gray\.png$|\.9\.png$|(?:^|\/)daydream_icon_[^/]*\.png$/

export const DEFAULT_CONCURRENCY = 10

/** Writes a lossless copy of `source` at `destination`. */
export type ImageEncoder = (source: string, destination: string) => Promise<void>

export interface ImageTarget {
  /** Resource directory the path is relative to. */
  root: string
  path: string
}

export interface RecompressOptions {
  concurrency?: number
  exclude?: RegExp
}

export function webpEncoder(binary: string, run: ToolRunner): ImageEncoder {
  return async (source, destination) => {
    await run([binary, source, '-mt', '-quiet', '-m', '6', '-q', '100', '-lossless', '-o', destination])
  }
}

function toWebpPath(path: string): string {
  return path.replace(/\.png$/, '.webp')
}

export function isRecompressible(path: string, exclude: RegExp = WEBP_EXCLUSIONS): boolean {
  return path.endsWith('.png') && !exclude.test(path)
}

/**
 * Convert every eligible PNG to WebP in place, on a bounded pool. All jobs
 * run to completion before the first failure, if any, is reported.
 *
 * `targets` lists every file of the trees involved; a PNG whose WebP name is
 * already taken fails the whole batch before anything is encoded.
 */
export async function recompressImages(
  targets: ImageTarget[],
  encode: ImageEncoder,
  options: RecompressOptions = {},
): Promise<RenameEntry[]> {
  const exclude = options.exclude ?? WEBP_EXCLUSIONS
  const limit = pLimit(options.concurrency ?? DEFAULT_CONCURRENCY)
  const eligible = targets.filter(t => isRecompressible(t.path, exclude))

  const resident = new Set(targets.map(t => join(t.root, t.path)))
  for (const target of eligible) {
    const source = join(target.root, target.path)
    const destination = join(target.root, toWebpPath(target.path))
    if (resident.has(destination)) {
      throw new PipelineError(
        'InvariantViolation',
        `Cannot convert ${source} to ${destination}: destination already exists`,
      )
    }
  }

  const settled = await Promise.allSettled(eligible.map(target => limit(async (): Promise<RenameEntry> => {
    const webpPath = toWebpPath(target.path)
    await encode(join(target.root, target.path), join(target.root, webpPath))
    await rm(join(target.root, target.path))
    return { newPath: webpPath, originalPath: target.path }
  })))

  const renames: RenameEntry[] = []
  const failures: string[] = []
  settled.forEach((outcome, i) => {
    if (outcome.status === 'fulfilled') {
      renames.push(outcome.value)
    } else {
      const reason = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason)
      failures.push(`${join(eligible[i].root, eligible[i].path)}: ${reason}`)
    }
  })

  if (failures.length > 0) {
    throw new PipelineError(
      'ExternalToolFailure',
      `Failed to recompress ${failures.length} image(s):\n${failures.join('\n')}`,
    )
  }

  return renames.sort((a, b) => (a.newPath < b.newPath ? -1 : a.newPath > b.newPath ? 1 : 0))
}
