import { describe, it, expect } from 'vitest'
import { classifyResourcePath } from '../src/lib/resource-path.js'
import { createKeepPredicate, planDeletions } from '../src/lib/transforms/keep-filter.js'

const TREE = [
  'drawable-hdpi/gone.png',
  'drawable-hdpi/unused.png',
  'drawable-mdpi/unused.png',
  'drawable/keep_icon.xml',
  'drawable/old_icon.xml',
  'mipmap-hdpi/launcher_icon.png',
  'raw/.keep',
  'values/strings.xml',
]

describe('createKeepPredicate', () => {
  it('keeps a drawable in every density when one density survives', () => {
    const keep = createKeepPredicate([TREE], { blacklistRegex: 'drawable-hdpi/' })
    expect(keep('drawable-hdpi/unused.png')).toBe(true)
    expect(keep('drawable-mdpi/unused.png')).toBe(true)
    expect(keep('drawable-hdpi/gone.png')).toBe(false)
  })

  it('applies the closure across trees', () => {
    const trees = [['drawable-hdpi/unused.png'], ['drawable-mdpi/unused.png']]
    const keep = createKeepPredicate(trees, { blacklistRegex: 'drawable-hdpi/' })
    expect(keep('drawable-hdpi/unused.png')).toBe(true)
  })

  it('plans deletions for blacklisted files and dotfiles', () => {
    const keep = createKeepPredicate([TREE], {
      blacklistRegex: '(drawable-hdpi/|_icon)',
      exceptions: ['keep_icon.xml'],
    })
    expect(planDeletions(TREE, keep)).toEqual([
      { kind: 'delete', path: 'drawable-hdpi/gone.png' },
      { kind: 'delete', path: 'drawable/old_icon.xml' },
      { kind: 'delete', path: 'raw/.keep' },
    ])
  })

  it('matches exception globs against full paths', () => {
    const keep = createKeepPredicate([TREE], {
      blacklistRegex: '_icon',
      exceptions: ['drawable/old_*'],
    })
    expect(keep('drawable/old_icon.xml')).toBe(true)
    expect(keep('drawable/keep_icon.xml')).toBe(false)
  })

  it('only drops dotfiles without a blacklist', () => {
    const keep = createKeepPredicate([TREE], {})
    expect(planDeletions(TREE, keep)).toEqual([{ kind: 'delete', path: 'raw/.keep' }])
  })

  it('never keeps a drawable in only some densities', () => {
    const tree = [
      'drawable-hdpi/a.png', 'drawable-mdpi/a.png', 'drawable-xhdpi/a.png',
      'drawable-hdpi/b.png', 'drawable-xhdpi/b.png',
      'drawable-mdpi/c.png',
    ]
    const keep = createKeepPredicate([tree], { blacklistRegex: '(hdpi/a|/b|mdpi/c)' })
    const byName = new Map<string, boolean[]>()
    for (const path of tree) {
      const name = classifyResourcePath(path).name
      byName.set(name, [...(byName.get(name) ?? []), keep(path)])
    }
    for (const outcomes of byName.values()) {
      expect(new Set(outcomes).size).toBe(1)
    }
    expect(byName.get('a')).toEqual([true, true, true])
    expect(byName.get('b')).toEqual([false, false])
    expect(byName.get('c')).toEqual([false])
  })
})
