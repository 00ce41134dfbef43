import { access, readFile, writeFile } from 'node:fs/promises'
import { PipelineError } from 'shared'
import type { RenameEntry } from 'shared'

const LEDGER_PREFIX = 'Rename:'

async function fileExists(filePath: string): Promise<boolean> {
  try { await access(filePath); return true } catch { return false }
}

/**
 * Renames recorded during one packaging run, keyed by the new path.
 */
export class RenameLedger {
  private readonly entries = new Map<string, string>()

  /**
   * Record that `newPath` came from `originalPath`. Recording the same pair
   * twice is a no-op; a second, different origin for one path is a collision.
   */
  record(newPath: string, originalPath: string): void {
    const existing = this.entries.get(newPath)
    if (existing !== undefined && existing !== originalPath) {
      throw new PipelineError(
        'InvariantViolation',
        `Rename collision for ${newPath}: already recorded from ${existing}, now from ${originalPath}`,
      )
    }
    this.entries.set(newPath, originalPath)
  }

  recordAll(renames: RenameEntry[]): void {
    for (const r of renames) this.record(r.newPath, r.originalPath)
  }

  get size(): number {
    return this.entries.size
  }

  toEntries(): RenameEntry[] {
    return [...this.entries.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([newPath, originalPath]) => ({ newPath, originalPath }))
  }
}

export function formatLedgerLine(entry: RenameEntry): string {
  return `${LEDGER_PREFIX}${entry.newPath},${entry.originalPath}\n`
}

/**
 * Parse ledger text. Lines that are not rename records are ignored.
 */
export function parseLedger(text: string, source = 'ledger'): RenameEntry[] {
  const entries: RenameEntry[] = []
  for (const line of text.split('\n')) {
    const trimmed = line.trimEnd()
    if (!trimmed.startsWith(LEDGER_PREFIX)) continue
    const body = trimmed.slice(LEDGER_PREFIX.length)
    const comma = body.indexOf(',')
    if (comma <= 0 || comma === body.length - 1) {
      throw new PipelineError('MalformedResource', `Malformed rename record in ${source}: ${trimmed}`)
    }
    entries.push({ newPath: body.slice(0, comma), originalPath: body.slice(comma + 1) })
  }
  return entries
}

/**
 * Follow rename records from a final path back to where it started.
 */
export function resolveOriginalPath(entries: RenameEntry[], path: string): string {
  const origins = new Map(entries.map(e => [e.newPath, e.originalPath]))
  const seen = new Set<string>()
  let current = path
  let origin = origins.get(current)
  while (origin !== undefined) {
    if (seen.has(current)) {
      throw new PipelineError('InvariantViolation', `Rename cycle through ${current}`)
    }
    seen.add(current)
    current = origin
    origin = origins.get(current)
  }
  return current
}

/**
 * Merge this run's renames with the ledgers shipped beside each dependency
 * archive (`<archive>.info`), dedupe, sort and write once.
 */
export async function writeMergedLedger(
  outputPath: string,
  ledger: RenameLedger,
  dependencyArchives: string[],
): Promise<string[]> {
  const lines = new Set<string>()
  for (const archive of dependencyArchives) {
    const infoPath = `${archive}.info`
    if (!(await fileExists(infoPath))) continue
    const content = await readFile(infoPath, 'utf-8')
    for (const line of content.split('\n')) {
      const trimmed = line.trimEnd()
      if (trimmed.length > 0) lines.add(`${trimmed}\n`)
    }
  }
  for (const entry of ledger.toEntries()) {
    lines.add(formatLedgerLine(entry))
  }

  const sorted = [...lines].sort()
  await writeFile(outputPath, sorted.join(''))
  return sorted
}
