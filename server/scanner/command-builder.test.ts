import { describe, expect, it } from 'vitest'
import {
  buildInitArgs,
  buildScanArgs,
  buildVersionArgs,
  formatCommandLine,
  normalizeScanArguments,
  parseRuleList
} from './command-builder.js'
import { InvalidArgumentError } from './errors.js'
import { SCAN_FORMATS } from './types.js'

const BASE = ['scan', '/workspace/src', '--scanner', 'sast,secrets']

describe('buildScanArgs', () => {
  it('uses json and the fixed flags when only a path is given', () => {
    expect(buildScanArgs({ path: '/workspace/src' })).toEqual([
      ...BASE,
      '--format', 'json',
      '--no-color', '--skip-test=false'
    ])
  })

  it.each(SCAN_FORMATS)('emits exactly one --format flag for %s', (format) => {
    const args = buildScanArgs({ path: '/workspace/src', format })
    expect(args.filter(arg => arg === '--format')).toHaveLength(1)
    expect(args[args.indexOf('--format') + 1]).toBe(format)
  })

  it('rejects an unsupported format', () => {
    expect(() => buildScanArgs({ path: '/workspace/src', format: 'pdf' })).toThrow(InvalidArgumentError)
    expect(() => buildScanArgs({ path: '/workspace/src', format: 'pdf' }))
      .toThrow('Unsupported format "pdf". Expected one of: json, yaml, sarif, html')
  })

  it('rejects an unsupported severity', () => {
    expect(() => buildScanArgs({ path: '/workspace/src', severity: 'urgent' }))
      .toThrow('Unsupported severity "urgent". Expected one of: critical, high, medium, low')
  })

  it('rejects a flag-shaped rule ID before building argv', () => {
    expect(() => buildScanArgs({ path: '/workspace/src', rules: '--quiet' }))
      .toThrow('Invalid rule ID "--quiet" in rules')
  })

  it('maps every optional field onto its flag, in a stable order', () => {
    expect(buildScanArgs({
      path: '/workspace/src',
      format: 'sarif',
      severity: 'high',
      rules: 'javascript_lang_eval,ruby_rails_logger',
      skipRules: ['javascript_lang_logger'],
      outputFile: '/workspace/reports/out.sarif',
      quiet: true
    })).toEqual([
      ...BASE,
      '--format', 'sarif',
      '--no-color', '--skip-test=false',
      '--severity', 'high',
      '--only-rule', 'javascript_lang_eval,ruby_rails_logger',
      '--skip-rule', 'javascript_lang_logger',
      '--output', '/workspace/reports/out.sarif',
      '--quiet'
    ])
  })

  it('omits flags for absent or empty fields', () => {
    const args = buildScanArgs({ path: '/workspace/src', rules: ' , ', outputFile: '', quiet: false })
    expect(args).not.toContain('--only-rule')
    expect(args).not.toContain('--output')
    expect(args).not.toContain('--quiet')
  })

  it('keeps a path with shell metacharacters as a single token', () => {
    const args = buildScanArgs({ path: '/workspace/my dir; rm -rf /' })
    expect(args[1]).toBe('/workspace/my dir; rm -rf /')
  })
})

describe('parseRuleList', () => {
  it('splits comma-separated lists and trims entries', () => {
    expect(parseRuleList(' a_rule , b_rule,,', 'rules')).toEqual(['a_rule', 'b_rule'])
  })

  it('accepts arrays', () => {
    expect(parseRuleList(['go_gosec_sql', 'php_lang_eval'], 'rules')).toEqual(['go_gosec_sql', 'php_lang_eval'])
  })

  it('returns undefined for missing or blank input', () => {
    expect(parseRuleList(undefined, 'rules')).toBeUndefined()
    expect(parseRuleList('', 'rules')).toBeUndefined()
  })

  it('rejects IDs that could smuggle extra arguments', () => {
    expect(() => parseRuleList('ok_rule,--output=/etc/x', 'skip_rules'))
      .toThrow('Invalid rule ID "--output=/etc/x" in skip_rules')
  })

  it.each(['--quiet', '-x', '.hidden'])('rejects the flag-shaped entry %s', (id) => {
    expect(() => parseRuleList(['ok_rule', id], 'rules')).toThrow(`Invalid rule ID "${id}" in rules`)
  })

  it('accepts IDs with dots and dashes after the first character', () => {
    expect(parseRuleList('gitleaks.aws-key,_custom_rule', 'rules')).toEqual(['gitleaks.aws-key', '_custom_rule'])
  })
})

describe('normalizeScanArguments', () => {
  it('fills defaults', () => {
    expect(normalizeScanArguments({ path: '/workspace' })).toEqual({
      path: '/workspace',
      format: 'json',
      severity: undefined,
      rules: undefined,
      skipRules: undefined,
      outputFile: undefined,
      quiet: false
    })
  })
})

describe('other commands', () => {
  it('builds version and init argv', () => {
    expect(buildVersionArgs()).toEqual(['version'])
    expect(buildInitArgs()).toEqual(['init'])
  })

  it('quotes tokens with whitespace when rendering a command line', () => {
    expect(formatCommandLine('bearer', ['scan', '/a b', '--quiet'])).toBe('bearer scan "/a b" --quiet')
  })
})
