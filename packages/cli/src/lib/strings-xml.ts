import { PipelineError } from 'shared'

const RESOURCES_OPEN = /<resources\b[^>]*>/
const RESOURCES_CLOSE = '</resources>'
const STRING_ENTRY = /<(string-array|string|plurals)(?=[\s/>])[^>]*?\sname="([^"]+)"[^>]*?(?:\/>|>[\s\S]*?<\/\1\s*>)/g

export interface StringEntry {
  name: string
  element: string
  start: number
  end: number
}

/**
 * Named string entries of a strings XML document, in source order.
 */
export function parseStringEntries(xml: string, path = 'strings.xml'): StringEntry[] {
  const open = RESOURCES_OPEN.exec(xml)
  const closeIndex = xml.lastIndexOf(RESOURCES_CLOSE)
  if (!open || closeIndex < open.index) {
    throw new PipelineError('MalformedResource', `No <resources> element in ${path}`)
  }

  const bodyStart = open.index + open[0].length
  const body = xml.slice(bodyStart, closeIndex)
  const entries: StringEntry[] = []
  for (const match of body.matchAll(STRING_ENTRY)) {
    const start = bodyStart + (match.index ?? 0)
    entries.push({ name: match[2], element: match[1], start, end: start + match[0].length })
  }
  return entries
}

/**
 * Drop every entry whose name fails `keep`, leaving the rest of the document
 * byte-for-byte as it was. A dropped entry takes its indentation and the line
 * break before it along.
 */
export function filterStringsXml(xml: string, keep: (name: string) => boolean, path?: string): string {
  const entries = parseStringEntries(xml, path)
  const dropped = entries.filter(e => !keep(e.name))
  if (dropped.length === 0) return xml

  let output = ''
  let cursor = 0
  for (const entry of dropped) {
    let start = entry.start
    while (start > cursor && (xml[start - 1] === ' ' || xml[start - 1] === '\t')) start--
    if (start > cursor && xml[start - 1] === '\n') start--
    if (start > cursor && xml[start - 1] === '\r') start--
    output += xml.slice(cursor, start)
    cursor = entry.end
  }
  output += xml.slice(cursor)
  return output
}
