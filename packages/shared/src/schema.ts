const stringList = {
  type: 'array',
  items: { type: 'string', minLength: 1 },
} as const

const packageIdPattern = '^0x[0-9a-fA-F]{1,2}$'

// Directory form (`zh-rTW`), not the language tag form.
const localeQualifierPattern = '^[a-z]{2,3}(-r[A-Z]{2})?$'

export const compileConfigSchema = {
  type: 'object',
  required: ['linker', 'manifest', 'dependencies', 'minSdkVersion', 'targetSdkVersion', 'outputs'],
  properties: {
    linker: { type: 'string', minLength: 1 },
    manifest: { type: 'string', minLength: 1 },
    dependencies: stringList,
    minSdkVersion: { type: 'integer', minimum: 1 },
    targetSdkVersion: { type: 'integer', minimum: 1 },
    maxSdkVersion: { type: 'integer', minimum: 1 },
    includeResources: stringList,
    versionCode: { type: 'string', pattern: '^\\d+$' },
    versionName: { type: 'string', minLength: 1 },
    renameManifestPackage: { type: 'string', minLength: 1 },
    manifestExpected: { type: 'string', minLength: 1 },
    manifestNormalizedOut: { type: 'string', minLength: 1 },
    failOnUnexpectedManifest: { type: 'boolean' },
    sharedResources: { type: 'boolean' },
    packageId: { type: 'string', pattern: packageIdPattern },
    packageName: { type: 'string', minLength: 1 },
    packageNameToId: {
      type: 'object',
      additionalProperties: { type: 'string', pattern: packageIdPattern },
    },
    localeWhitelist: stringList,
    sharedLocaleWhitelist: stringList,
    sharedSymbols: { type: 'string', minLength: 1 },
    duplicateLocale: {
      anyOf: [
        { type: 'boolean' },
        {
          type: 'object',
          required: ['from', 'to'],
          properties: {
            from: { type: 'string', pattern: localeQualifierPattern },
            to: { type: 'string', pattern: localeQualifierPattern },
          },
          additionalProperties: false,
        },
      ],
    },
    blacklistRegex: { type: 'string' },
    blacklistExceptions: stringList,
    pngToWebp: { type: 'boolean' },
    webpEncoder: { type: 'string', minLength: 1 },
    migrateLegacyDensity: { type: 'boolean' },
    noXmlNamespaces: { type: 'boolean' },
    shortResourcePaths: { type: 'boolean' },
    stripResourceNames: { type: 'boolean' },
    resourcesConfig: { type: 'string', minLength: 1 },
    stableIdsIn: { type: 'string', minLength: 1 },
    debugOutputRoot: { type: 'string', minLength: 1 },
    outputs: {
      type: 'object',
      properties: {
        arsc: { type: 'string', minLength: 1 },
        proto: { type: 'string', minLength: 1 },
        optimizedArsc: { type: 'string', minLength: 1 },
        optimizedProto: { type: 'string', minLength: 1 },
        rTxt: { type: 'string', minLength: 1 },
        info: { type: 'string', minLength: 1 },
        proguard: { type: 'string', minLength: 1 },
        proguardMainDex: { type: 'string', minLength: 1 },
        emitIds: { type: 'string', minLength: 1 },
        pathMap: { type: 'string', minLength: 1 },
        obfuscationConfig: { type: 'string', minLength: 1 },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
} as const
