import { minimatch } from 'minimatch'
import { classifyResourcePath } from '../resource-path.js'
import type { TreeEdit } from '../tree.js'

export interface KeepPolicy {
  /** Resources matching this are dropped, unless they are mipmaps or exceptions. */
  blacklistRegex?: string
  /** Globs of blacklisted resources to keep anyway. A glob without `/` matches the file name. */
  exceptions?: string[]
}

export type KeepPredicate = (path: string) => boolean

/**
 * Build the predicate deciding which resource files survive.
 *
 * Dotfiles never survive. A drawable whose name survives the blacklist in
 * any density survives in every density, so an image is never present in
 * only some of its buckets.
 *
 * `trees` lists every resource tree of the run; the density closure is
 * computed across all of them.
 */
export function createKeepPredicate(trees: string[][], policy: KeepPolicy): KeepPredicate {
  const notDotfile = (path: string): boolean => !classifyResourcePath(path).isDotfile
  if (!policy.blacklistRegex) return notDotfile

  const blacklist = new RegExp(policy.blacklistRegex)
  const exceptions = policy.exceptions ?? []
  const isException = (path: string): boolean =>
    exceptions.some(glob => minimatch(path, glob, { matchBase: true, dot: true }))

  const naive = (path: string): boolean =>
    !blacklist.test(path) || classifyResourcePath(path).type === 'mipmap' || isException(path)

  const survivingDrawables = new Set<string>()
  for (const paths of trees) {
    for (const path of paths) {
      const resource = classifyResourcePath(path)
      if (resource.type === 'drawable' && naive(path)) {
        survivingDrawables.add(resource.name)
      }
    }
  }

  return (path: string): boolean => {
    const resource = classifyResourcePath(path)
    if (resource.isDotfile) return false
    if (naive(path)) return true
    return resource.type === 'drawable' && survivingDrawables.has(resource.name)
  }
}

/**
 * Delete edits for every path the predicate rejects.
 */
export function planDeletions(paths: string[], keep: KeepPredicate): TreeEdit[] {
  return [...paths].sort()
    .filter(path => !keep(path))
    .map(path => ({ kind: 'delete' as const, path }))
}
