import { PipelineError } from 'shared'
import type { LocaleDuplication } from 'shared'
import { classifyResourcePath, findQualifierRun, withQualifiers } from '../resource-path.js'
import { emptyPlan, type TransformPlan } from '../tree.js'

export const DEFAULT_LOCALE_DUPLICATION: LocaleDuplication = { from: 'zh-rTW', to: 'zh-rHK' }

/**
 * The duplication a `duplicateLocale` setting asks for, if any.
 */
export function resolveLocaleDuplication(setting: boolean | LocaleDuplication | undefined): LocaleDuplication | undefined {
  if (setting === true) return DEFAULT_LOCALE_DUPLICATION
  return setting || undefined
}

/**
 * Plan copies of every resource qualified with `duplication.from` into the
 * matching `duplication.to` directory, e.g. `values-zh-rTW/strings.xml` to
 * `values-zh-rHK/strings.xml`. Sources stay in place.
 *
 * `allowLists` holds the locale allow-lists of the run; naming the target
 * locale there as well would include it twice.
 */
export function duplicateLocale(
  paths: string[],
  duplication: LocaleDuplication,
  allowLists: string[][] = [],
): TransformPlan {
  const targetRegion = regionOf(duplication.to)
  for (const list of allowLists) {
    const clash = list.find(entry => entry === duplication.to || (targetRegion !== null && regionOf(entry) === targetRegion))
    if (clash) {
      throw new PipelineError(
        'ConfigurationContradiction',
        `Locale ${clash} is already allow-listed; it cannot also be duplicated from ${duplication.from}`,
      )
    }
  }

  const plan = emptyPlan()
  const present = new Set(paths)
  const target = duplication.to.split('-')
  const sourceLength = duplication.from.split('-').length

  for (const path of [...paths].sort()) {
    const resource = classifyResourcePath(path)
    if (!resource.governed) continue
    const index = findQualifierRun(resource.qualifiers, duplication.from)
    if (index === -1) continue

    const qualifiers = [
      ...resource.qualifiers.slice(0, index),
      ...target,
      ...resource.qualifiers.slice(index + sourceLength),
    ]
    const destination = withQualifiers(resource, qualifiers)
    if (present.has(destination)) {
      throw new PipelineError(
        'InvariantViolation',
        `Cannot duplicate ${path}: ${destination} already exists`,
      )
    }

    plan.edits.push({ kind: 'copy', from: path, to: destination })
    plan.renames.push({ newPath: destination, originalPath: path })
    present.add(destination)
  }

  return plan
}

function regionOf(locale: string): string | null {
  const match = locale.match(/^[a-z]{2,3}-r?([A-Z]{2})$/)
  return match ? match[1] : null
}
