import { PipelineError } from 'shared'
import { canonicalQualifier } from '../locale.js'
import { classifyResourcePath } from '../resource-path.js'
import { emptyPlan, type TransformPlan } from '../tree.js'

/**
 * Plan moves of string resource files from non-canonical locale directories
 * (`values-fil/`, `values-no/`, `values-b+en+US/`) to canonical ones
 * (`values-tl/`, `values-nb/`, `values-en-rUS/`).
 *
 * A destination that already exists is left alone and the source stays where
 * it is: libraries sometimes ship both `values-nb/` and `values-no/` with the
 * same content. A rewrite that maps a path onto itself throws instead.
 */
export function normalizeLocales(paths: string[]): TransformPlan {
  const plan = emptyPlan()
  const present = new Set(paths)

  for (const path of [...paths].sort()) {
    const resource = classifyResourcePath(path)
    if (!resource.locale) continue

    const canonical = canonicalQualifier(resource.locale)
    if (canonical === null || canonical === resource.locale) continue

    const destination = `values-${canonical}/${resource.fileName}`
    if (destination === path) {
      throw new PipelineError(
        'ConfigurationContradiction',
        `Could not substitute locale ${resource.locale} for ${canonical} in ${path}`,
      )
    }
    if (present.has(destination)) continue

    plan.edits.push({ kind: 'move', from: path, to: destination })
    plan.renames.push({ newPath: destination, originalPath: path })
    present.delete(path)
    present.add(destination)
  }

  return plan
}
