import { describe, it, expect } from 'vitest'
import { classifyResourcePath, findQualifierRun, withQualifiers } from '../src/lib/resource-path.js'

describe('classifyResourcePath', () => {
  it('reads the locale of a string resource file', () => {
    const resource = classifyResourcePath('values-zh-rTW/strings.xml')
    expect(resource.governed).toBe(true)
    expect(resource.type).toBe('values')
    expect(resource.qualifiers).toEqual(['zh', 'rTW'])
    expect(resource.locale).toBe('zh-rTW')
    expect(resource.name).toBe('strings')
  })

  const locales: [string, string | null][] = [
    ['values-fr/strings.xml', 'fr'],
    ['values-b+sr+Latn/strings.xml', 'b+sr+Latn'],
    ['values-fil/arrays.xml', 'fil'],
    ['values/strings.xml', null],
    ['values-v21/styles.xml', null],
    ['values-fr/colors.json', null],
    ['layout-fr/main.xml', null],
  ]

  it.each(locales)('locale of %s is %s', (path, locale) => {
    expect(classifyResourcePath(path).locale).toBe(locale)
  })

  it('reads densities of images', () => {
    const resource = classifyResourcePath('drawable-xhdpi-v4/icon.9.png')
    expect(resource.density).toBe('xhdpi')
    expect(resource.name).toBe('icon')
    expect(resource.extension).toBe('.png')
    expect(classifyResourcePath('mipmap-hdpi/ic_launcher.webp').density).toBe('hdpi')
    expect(classifyResourcePath('drawable/shape.xml').density).toBeNull()
  })

  it('flags dotfiles', () => {
    const resource = classifyResourcePath('raw/.gitkeep')
    expect(resource.isDotfile).toBe(true)
    expect(resource.name).toBe('.gitkeep')
  })

  it.each([
    'AndroidManifest.xml',
    'assets/fonts.txt',
    'values/nested/strings.xml',
  ])('leaves %s ungoverned', (path) => {
    const resource = classifyResourcePath(path)
    expect(resource.governed).toBe(false)
    expect(resource.type).toBeNull()
    expect(resource.locale).toBeNull()
  })
})

describe('findQualifierRun', () => {
  it('finds multi-part locale runs', () => {
    expect(findQualifierRun(['zh', 'rTW', 'v21'], 'zh-rTW')).toBe(0)
    expect(findQualifierRun(['land', 'zh', 'rTW'], 'zh-rTW')).toBe(1)
    expect(findQualifierRun(['zh'], 'zh-rTW')).toBe(-1)
    expect(findQualifierRun(['en', 'rTW'], 'zh-rTW')).toBe(-1)
  })
})

describe('withQualifiers', () => {
  it('rebuilds the directory', () => {
    const resource = classifyResourcePath('values-zh-rTW/strings.xml')
    expect(withQualifiers(resource, ['zh', 'rHK'])).toBe('values-zh-rHK/strings.xml')
    expect(withQualifiers(resource, [])).toBe('values/strings.xml')
  })
})
