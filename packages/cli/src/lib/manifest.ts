import { access, readFile, writeFile } from 'node:fs/promises'
import { PipelineError } from 'shared'

async function readRequired(filePath: string, what: string): Promise<string> {
  try {
    await access(filePath)
  } catch {
    throw new PipelineError('MissingResource', `${what} not found: ${filePath}`)
  }
  return readFile(filePath, 'utf-8')
}

export async function readManifestPackage(manifestPath: string): Promise<string> {
  const content = await readRequired(manifestPath, 'Manifest')
  const match = content.match(/<manifest\b[^>]*?\spackage="([^"]+)"/)
  if (!match) {
    throw new PipelineError('MalformedResource', `No package attribute on <manifest> in ${manifestPath}`)
  }
  return match[1]
}

/**
 * Comparison form of a manifest: trailing whitespace and blank lines removed.
 */
export function normalizeManifest(content: string): string {
  return content
    .split(/\r?\n/)
    .map(line => line.trimEnd())
    .filter(line => line.length > 0)
    .join('\n') + '\n'
}

/**
 * Line-by-line differences, `-` for expected and `+` for actual. Empty when equal.
 */
export function diffLines(expected: string, actual: string): string {
  const a = expected.split('\n')
  const b = actual.split('\n')
  const out: string[] = []
  const length = Math.max(a.length, b.length)
  for (let i = 0; i < length; i++) {
    if (a[i] === b[i]) continue
    if (a[i] !== undefined) out.push(`-${a[i]}`)
    if (b[i] !== undefined) out.push(`+${b[i]}`)
  }
  return out.join('\n')
}

export interface ManifestCheck {
  manifest: string
  expected: string
  /** Where to write the normalized manifest. */
  normalizedOut?: string
  /** Fail instead of warning when the manifest does not match. */
  strict: boolean
}

/**
 * Compare the manifest with its checked-in expectation. Returns the diff
 * (empty when they match); throws `PolicyMismatch` on a mismatch when strict.
 */
export async function verifyManifest(check: ManifestCheck): Promise<string> {
  const actual = normalizeManifest(await readRequired(check.manifest, 'Manifest'))
  const expected = normalizeManifest(await readRequired(check.expected, 'Manifest expectation'))
  if (check.normalizedOut) {
    await writeFile(check.normalizedOut, actual)
  }

  const diff = diffLines(expected, actual)
  if (!diff) return ''

  const message = `Manifest ${check.manifest} does not match expectation ${check.expected}:\n${diff}`
  if (check.strict) {
    throw new PipelineError('PolicyMismatch', message)
  }
  console.error(`⚠ ${message}`)
  return diff
}
