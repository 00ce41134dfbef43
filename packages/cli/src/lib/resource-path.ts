import { posix } from 'node:path'
import { isLocaleQualifier } from './locale.js'

const RESOURCE_TYPES = new Set([
  'anim',
  'animator',
  'color',
  'drawable',
  'font',
  'interpolator',
  'layout',
  'menu',
  'mipmap',
  'navigation',
  'raw',
  'transition',
  'values',
  'xml',
])

export const DENSITY_QUALIFIERS = new Set([
  'ldpi',
  'mdpi',
  'tvdpi',
  'hdpi',
  'xhdpi',
  'xxhdpi',
  'xxxhdpi',
  'nodpi',
  'anydpi',
])

const IMAGE_TYPES = new Set(['drawable', 'mipmap'])

export interface ResourcePath {
  path: string
  /** False for paths outside a `<type>(-<qualifier>)*` directory; transforms leave them alone. */
  governed: boolean
  directory: string | null
  type: string | null
  qualifiers: string[]
  fileName: string
  /** Resource name as referenced from code: the file name up to its first dot. */
  name: string
  extension: string
  /** Locale qualifier of a `values-<locale>/*.xml` string resource file. */
  locale: string | null
  density: string | null
  isDotfile: boolean
}

/**
 * Split a resource-relative path into its structured parts.
 */
export function classifyResourcePath(path: string): ResourcePath {
  const segments = path.split('/')
  const fileName = segments[segments.length - 1]
  const dotIndex = fileName.indexOf('.', 1)
  const name = dotIndex === -1 ? fileName : fileName.slice(0, dotIndex)
  const extension = posix.extname(fileName)
  const isDotfile = fileName.startsWith('.')

  const directory = segments.length === 2 ? segments[0] : null
  const dirParts = directory ? directory.split('-') : []
  const type = dirParts.length > 0 && RESOURCE_TYPES.has(dirParts[0]) ? dirParts[0] : null

  if (directory === null || type === null) {
    return {
      path, governed: false, directory, type: null, qualifiers: [],
      fileName, name, extension, locale: null, density: null, isDotfile,
    }
  }

  const qualifiers = dirParts.slice(1)
  const qualifierText = qualifiers.join('-')

  let locale: string | null = null
  if (type === 'values' && extension === '.xml' && qualifierText && isLocaleQualifier(qualifierText)) {
    locale = qualifierText
  }

  let density: string | null = null
  if (IMAGE_TYPES.has(type)) {
    density = qualifiers.find(q => DENSITY_QUALIFIERS.has(q)) ?? null
  }

  return {
    path, governed: true, directory, type, qualifiers,
    fileName, name, extension, locale, density, isDotfile,
  }
}

/**
 * Index of the first run of `needle` inside `qualifiers`, or -1.
 * Locale qualifiers such as `zh-rTW` span two dash-separated parts.
 */
export function findQualifierRun(qualifiers: string[], needle: string): number {
  const run = needle.split('-')
  for (let i = 0; i + run.length <= qualifiers.length; i++) {
    if (run.every((part, j) => qualifiers[i + j] === part)) return i
  }
  return -1
}

/**
 * Rewrite a path's directory as `<type>-<qualifiers...>`, keeping the file name.
 */
export function withQualifiers(resource: ResourcePath, qualifiers: string[]): string {
  const directory = [resource.type, ...qualifiers].join('-')
  return `${directory}/${resource.fileName}`
}
