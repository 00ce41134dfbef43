import { access, readFile } from 'node:fs/promises'
import { PipelineError } from 'shared'

export interface SymbolEntry {
  javaType: string
  resourceType: string
  name: string
  value: string
}

const SYMBOL_LINE = /^(int(?:\[\])?)\s+(\S+)\s+(\S+)\s+(.+)$/

/**
 * Parse a textual symbol listing (`R.txt`): one `int <type> <name> <value>`
 * line per resource.
 */
export function parseSymbols(text: string): SymbolEntry[] {
  const entries: SymbolEntry[] = []
  for (const line of text.split('\n')) {
    const match = line.trim().match(SYMBOL_LINE)
    if (!match) continue
    entries.push({ javaType: match[1], resourceType: match[2], name: match[3], value: match[4] })
  }
  return entries
}

export function stringResourceNames(text: string): string[] {
  return parseSymbols(text)
    .filter(e => e.javaType === 'int' && e.resourceType === 'string')
    .map(e => e.name)
}

/**
 * `id` resources as `id/<name>`. UI automation looks views up by these
 * names, so they are exempt from name obfuscation.
 */
export function idResources(text: string): string[] {
  return parseSymbols(text)
    .filter(e => e.javaType === 'int' && e.resourceType === 'id')
    .map(e => `id/${e.name}`)
}

export async function loadSharedStringNames(symbolsPath: string): Promise<Set<string>> {
  try {
    await access(symbolsPath)
  } catch {
    throw new PipelineError('MissingResource', `Shared symbol table not found: ${symbolsPath}`)
  }
  return new Set(stringResourceNames(await readFile(symbolsPath, 'utf-8')))
}
