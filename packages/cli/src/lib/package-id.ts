import { PipelineError } from 'shared'
import type { CompileConfig } from 'shared'

export const APP_PACKAGE_ID = 0x7f
export const SHARED_LIBRARY_PACKAGE_ID = 0x00

type PackageIdPolicy = Pick<CompileConfig, 'packageId' | 'packageName' | 'packageNameToId' | 'sharedResources'>

export function formatPackageId(id: number): string {
  return `0x${id.toString(16).padStart(2, '0')}`
}

export function parsePackageId(value: string): number {
  const id = Number.parseInt(value, 16)
  if (!/^(0x)?[0-9a-fA-F]{1,2}$/.test(value) || Number.isNaN(id)) {
    throw new PipelineError('ConfigurationContradiction', `Invalid package ID: ${value}`)
  }
  return id
}

/**
 * The package ID the configuration asks for, if any. A package name takes
 * precedence over an explicit ID and must appear in the name-to-ID table.
 */
export function requestedPackageId(policy: PackageIdPolicy): number | null {
  if (policy.packageName) {
    const mapped = policy.packageNameToId?.[policy.packageName]
    if (mapped === undefined) {
      throw new PipelineError(
        'ConfigurationContradiction',
        `Package name ${policy.packageName} is not present in packageNameToId`,
      )
    }
    return parsePackageId(mapped)
  }
  return policy.packageId ? parsePackageId(policy.packageId) : null
}

export function expectedPackageId(policy: PackageIdPolicy): number {
  const requested = requestedPackageId(policy)
  if (requested !== null) return requested
  return policy.sharedResources ? SHARED_LIBRARY_PACKAGE_ID : APP_PACKAGE_ID
}

export function verifyPackageId(actual: number, expected: number): void {
  if (actual !== expected) {
    throw new PipelineError(
      'PolicyMismatch',
      `Invalid package ID ${formatPackageId(actual)} (expected ${formatPackageId(expected)})`,
    )
  }
}
