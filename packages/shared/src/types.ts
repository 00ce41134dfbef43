export interface OutputPaths {
  arsc?: string
  proto?: string
  optimizedArsc?: string
  optimizedProto?: string
  rTxt?: string
  info?: string
  proguard?: string
  proguardMainDex?: string
  emitIds?: string
  pathMap?: string
  obfuscationConfig?: string
}

export interface LocaleDuplication {
  from: string
  to: string
}

export interface CompileConfig {
  linker: string
  manifest: string
  dependencies: string[]
  minSdkVersion: number
  targetSdkVersion: number
  maxSdkVersion?: number
  includeResources?: string[]
  versionCode?: string
  versionName?: string
  renameManifestPackage?: string
  manifestExpected?: string
  manifestNormalizedOut?: string
  failOnUnexpectedManifest?: boolean
  sharedResources?: boolean
  packageId?: string
  packageName?: string
  packageNameToId?: Record<string, string>
  localeWhitelist?: string[]
  sharedLocaleWhitelist?: string[]
  sharedSymbols?: string
  /** `true` duplicates `zh-rTW` into `zh-rHK`. */
  duplicateLocale?: boolean | LocaleDuplication
  blacklistRegex?: string
  blacklistExceptions?: string[]
  pngToWebp?: boolean
  webpEncoder?: string
  migrateLegacyDensity?: boolean
  noXmlNamespaces?: boolean
  shortResourcePaths?: boolean
  stripResourceNames?: boolean
  resourcesConfig?: string
  stableIdsIn?: string
  debugOutputRoot?: string
  outputs: OutputPaths
}

export interface RenameEntry {
  newPath: string
  originalPath: string
}

export type RunState =
  | 'Started'
  | 'Extracted'
  | 'Normalized'
  | 'Filtered'
  | 'Recompressed'
  | 'LedgerWritten'
  | 'Linked'
  | 'Validated'
  | 'Finalized'

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

export type ValidationError = {
  path: string
  message: string
}
