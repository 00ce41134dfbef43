import { access, readFile, writeFile } from 'node:fs/promises'
import { isPipelineError } from 'shared'
import type { Result } from 'shared'
import { formatLedgerLine, parseLedger, resolveOriginalPath } from '../lib/ledger.js'

async function fileExists(filePath: string): Promise<boolean> {
  try { await access(filePath); return true } catch { return false }
}

/**
 * Combine several rename ledgers into one sorted, deduplicated ledger.
 */
export async function ledgerMergeCommand(output: string, inputs: string[]): Promise<Result<number, string>> {
  const lines = new Set<string>()
  for (const input of inputs) {
    if (!(await fileExists(input))) {
      return { ok: false, error: `Ledger not found: ${input}` }
    }
    try {
      for (const entry of parseLedger(await readFile(input, 'utf-8'), input)) {
        lines.add(formatLedgerLine(entry))
      }
    } catch (error) {
      if (isPipelineError(error)) return { ok: false, error: error.message }
      throw error
    }
  }

  await writeFile(output, [...lines].sort().join(''))
  console.error(`✅ Wrote ${lines.size} rename records to ${output}`)
  return { ok: true, value: lines.size }
}

/**
 * Print the dependency path a packaged resource path originally came from.
 */
export async function ledgerResolveCommand(ledgerPath: string, path: string): Promise<Result<string, string>> {
  if (!(await fileExists(ledgerPath))) {
    return { ok: false, error: `Ledger not found: ${ledgerPath}` }
  }
  try {
    const entries = parseLedger(await readFile(ledgerPath, 'utf-8'), ledgerPath)
    const original = resolveOriginalPath(entries, path)
    console.log(original)
    return { ok: true, value: original }
  } catch (error) {
    if (isPipelineError(error)) return { ok: false, error: error.message }
    throw error
  }
}
