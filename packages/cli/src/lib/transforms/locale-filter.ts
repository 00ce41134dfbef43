import type { LocaleDuplication } from 'shared'
import { toPlatformLocales } from '../locale.js'
import { classifyResourcePath } from '../resource-path.js'
import { emptyPlan, type TransformPlan } from '../tree.js'

export interface LocalePolicy {
  /** Locales to ship in full. Unset keeps every observed locale. */
  wanted?: string[]
  /** Locales to ship for shared strings only. Unset means the same as `wanted`. */
  shared?: string[]
  /** Names of the shared string resources. */
  sharedNames: ReadonlySet<string>
  duplication?: LocaleDuplication
}

export interface LocalePartition {
  wantedOnly: string[]
  sharedOnly: string[]
  both: string[]
  removed: string[]
}

export interface LocaleFilterResult {
  partition: LocalePartition
  /** One plan per input tree, in input order. */
  plans: TransformPlan[]
}

/**
 * Decide, for every string resource file of every tree, whether it is
 * deleted, reduced to shared strings, stripped of shared strings, or kept.
 * Each locale's outcome depends only on its own membership.
 */
export function planLocaleFilter(trees: string[][], policy: LocalePolicy): LocaleFilterResult {
  const filesByTree = trees.map(paths => {
    const byLocale = new Map<string, string[]>()
    for (const path of [...paths].sort()) {
      const locale = classifyResourcePath(path).locale
      if (!locale) continue
      const files = byLocale.get(locale) ?? []
      files.push(path)
      byLocale.set(locale, files)
    }
    return byLocale
  })

  const observed = new Set<string>()
  for (const byLocale of filesByTree) {
    for (const locale of byLocale.keys()) observed.add(locale)
  }

  const hasWanted = (policy.wanted?.length ?? 0) > 0
  const hasShared = (policy.shared?.length ?? 0) > 0
  if (!hasWanted && !hasShared) {
    return {
      partition: { wantedOnly: [], sharedOnly: [], both: [...observed].sort(), removed: [] },
      plans: trees.map(() => emptyPlan()),
    }
  }

  const wanted = hasWanted && policy.wanted ? toPlatformLocales(policy.wanted, policy.duplication) : observed
  const shared = hasShared && policy.shared ? toPlatformLocales(policy.shared, policy.duplication) : wanted

  const partition: LocalePartition = { wantedOnly: [], sharedOnly: [], both: [], removed: [] }
  for (const locale of [...observed].sort()) {
    const inWanted = wanted.has(locale)
    const inShared = shared.has(locale)
    if (inWanted && inShared) partition.both.push(locale)
    else if (inWanted) partition.wantedOnly.push(locale)
    else if (inShared) partition.sharedOnly.push(locale)
    else partition.removed.push(locale)
  }

  const removed = new Set(partition.removed)
  const sharedOnly = new Set(partition.sharedOnly)
  const wantedOnly = new Set(partition.wantedOnly)
  const keepShared = (name: string): boolean => policy.sharedNames.has(name)
  const dropShared = (name: string): boolean => !policy.sharedNames.has(name)

  const plans = filesByTree.map(byLocale => {
    const plan = emptyPlan()
    for (const [locale, files] of [...byLocale.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      for (const path of files) {
        if (removed.has(locale)) {
          plan.edits.push({ kind: 'delete', path })
        } else if (sharedOnly.has(locale)) {
          plan.edits.push({ kind: 'filter-strings', path, keep: keepShared })
        } else if (wantedOnly.has(locale)) {
          plan.edits.push({ kind: 'filter-strings', path, keep: dropShared })
        }
      }
    }
    return plan
  })

  return { partition, plans }
}
