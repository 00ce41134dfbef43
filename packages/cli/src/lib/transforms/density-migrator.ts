import { PipelineError } from 'shared'
import { classifyResourcePath, withQualifiers } from '../resource-path.js'
import { emptyPlan, type TransformPlan } from '../tree.js'

const LEGACY_DENSITY = 'mdpi'
const MIGRATED_EXTENSIONS = new Set(['.png', '.webp'])

/**
 * Plan moves of raster images out of `drawable-*mdpi*` directories into the
 * same directory without the `mdpi` qualifier (`drawable-mdpi-v4/icon.png`
 * to `drawable-v4/icon.png`). Only this one legacy bucket is collapsed.
 */
export function migrateLegacyDensity(paths: string[]): TransformPlan {
  const plan = emptyPlan()
  const present = new Set(paths)

  for (const path of [...paths].sort()) {
    const resource = classifyResourcePath(path)
    if (resource.type !== 'drawable' || !resource.qualifiers.includes(LEGACY_DENSITY)) continue
    if (!MIGRATED_EXTENSIONS.has(resource.extension)) continue

    const destination = withQualifiers(resource, resource.qualifiers.filter(q => q !== LEGACY_DENSITY))
    if (present.has(destination)) {
      throw new PipelineError(
        'InvariantViolation',
        `Cannot move ${path} to ${destination}: destination already exists`,
      )
    }

    plan.edits.push({ kind: 'move', from: path, to: destination })
    plan.renames.push({ newPath: destination, originalPath: path })
    present.delete(path)
    present.add(destination)
  }

  return plan
}
