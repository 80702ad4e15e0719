import { describe, expect, it } from 'vitest'
import { describeRules, findCategory, findLanguage, loadRulesCatalog } from './rules-catalog.js'

describe('rules catalogue', () => {
  const catalog = loadRulesCatalog()

  it.each([
    ['A03', 'A03'],
    ['a07', 'A07'],
    ['injection', 'A03'],
    ['Access Control', 'A01'],
    ['server-side', 'A10'],
  ])('finds the category for %s', (query, id) => {
    expect(findCategory(catalog, query)?.id).toBe(id)
  })

  it.each(['a', 'inject', 'control access denied', '  '])('finds no category for %j', (query) => {
    expect(findCategory(catalog, query)).toBeUndefined()
  })

  it('finds languages by alias', () => {
    expect(findLanguage(catalog, 'golang')?.id).toBe('go')
    expect(findLanguage(catalog, 'TS')?.id).toBe('javascript')
  })

  it('lists every category when unfiltered', () => {
    const lines = describeRules(catalog).split('\n')
    expect(lines).toContain('- A01: Broken Access Control')
    expect(lines).toContain('- A10: Server-Side Request Forgery')
  })
})
