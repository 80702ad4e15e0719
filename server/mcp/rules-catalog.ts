// Copyright (c) 2025-present Mstro, Inc. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

/**
 * Rule Catalogue
 *
 * Static description of what Bearer's rule set covers. Bearer itself has no
 * command that lists its rules, so bearer_list_rules answers from this file.
 */

import { readFileSync } from 'node:fs'
import { z } from 'zod'
import { InvalidArgumentError } from '../scanner/errors.js'
import { RULES_CATALOG_PATH } from '../utils/paths.js'

const catalogSchema = z.object({
  documentationUrl: z.string(),
  ruleCount: z.string(),
  languages: z.array(z.object({
    id: z.string(),
    name: z.string(),
    rulePrefix: z.string(),
    aliases: z.array(z.string()),
  })),
  categories: z.array(z.object({
    id: z.string(),
    name: z.string(),
    cwe: z.array(z.string()),
  })),
  languageConcerns: z.array(z.string()),
})

export type RulesCatalog = z.infer<typeof catalogSchema>
export type CatalogLanguage = RulesCatalog['languages'][number]
export type CatalogCategory = RulesCatalog['categories'][number]

let cachedCatalog: RulesCatalog | null = null

export function loadRulesCatalog(path: string = RULES_CATALOG_PATH): RulesCatalog {
  if (path === RULES_CATALOG_PATH && cachedCatalog) return cachedCatalog
  const catalog = catalogSchema.parse(JSON.parse(readFileSync(path, 'utf-8')))
  if (path === RULES_CATALOG_PATH) cachedCatalog = catalog
  return catalog
}

export function findLanguage(catalog: RulesCatalog, query: string): CatalogLanguage | undefined {
  const needle = query.trim().toLowerCase()
  return catalog.languages.find(lang =>
    lang.id === needle || lang.name.toLowerCase() === needle || lang.aliases.includes(needle)
  )
}

function words(text: string): string[] {
  return text.toLowerCase().split(/[^a-z0-9]+/).filter(word => word.length > 0)
}

/**
 * Find a category by ID (A03) or by whole words of its name ("injection",
 * "access control"). Partial words never match.
 */
export function findCategory(catalog: RulesCatalog, query: string): CatalogCategory | undefined {
  const needle = query.trim().toLowerCase()
  const needleWords = words(needle)
  if (needleWords.length === 0) return undefined
  return catalog.categories.find(cat => {
    if (cat.id.toLowerCase() === needle) return true
    const nameWords = words(cat.name)
    return needleWords.every(word => nameWords.includes(word))
  })
}

/**
 * Render the catalogue as text, optionally narrowed to one language and/or category
 */
export function describeRules(
  catalog: RulesCatalog,
  filters: { language?: string; category?: string } = {}
): string {
  const language = filters.language ? findLanguage(catalog, filters.language) : undefined
  if (filters.language && !language) {
    throw new InvalidArgumentError(
      `Unknown language "${filters.language}". Supported: ${catalog.languages.map(l => l.id).join(', ')}`,
      'language'
    )
  }

  const category = filters.category ? findCategory(catalog, filters.category) : undefined
  if (filters.category && !category) {
    throw new InvalidArgumentError(
      `Unknown category "${filters.category}". Use an OWASP Top 10 ID (A01-A10) or name`,
      'category'
    )
  }

  const lines = [
    'Bearer Security Rules Information:',
    '',
    `Bearer has ${catalog.ruleCount} security rules across multiple programming languages:`,
    ...catalog.languages.map(lang => `- ${lang.name}`),
    '',
    'Rules are categorized by:',
    '- OWASP Top 10 categories (A01-A10)',
    '- CWE (Common Weakness Enumeration) numbers',
    '- Language-specific vulnerabilities',
    '',
    'To use specific rules in scans:',
    '- rules argument (--only-rule): "rule_id_1,rule_id_2"',
    '- skip_rules argument (--skip-rule): "rule_id_1,rule_id_2"',
  ]

  if (language) {
    lines.push(
      '',
      `Language-specific information for ${language.name}:`,
      '',
      `Bearer detects ${language.name} files automatically. Rule IDs for this language start with "${language.rulePrefix}".`,
      `Common ${language.name} rule categories include:`,
      ...catalog.languageConcerns.map(concern => `- ${concern}`),
    )
  }

  if (category) {
    lines.push(
      '',
      `OWASP ${category.id}: ${category.name}`,
      `Related CWEs: ${category.cwe.join(', ')}`,
    )
  } else if (!language) {
    lines.push(
      '',
      'OWASP Top 10 categories:',
      ...catalog.categories.map(cat => `- ${cat.id}: ${cat.name}`),
    )
  }

  lines.push('', 'For the complete list of rules and their descriptions, visit:', catalog.documentationUrl)
  return lines.join('\n')
}
