import { mkdtempSync, realpathSync, rmSync, symlinkSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createWorkspace } from '../../tests/helpers.js'
import { InvalidPathError } from '../scanner/errors.js'
import {
  containsDangerousPatterns,
  getRelativePath,
  resolveConfinedPath,
  validatePathWithinWorkingDir
} from './pathUtils.js'

describe('validatePathWithinWorkingDir', () => {
  let root: string
  let cleanup: () => void

  beforeEach(() => {
    ({ root, cleanup } = createWorkspace())
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    cleanup()
    vi.restoreAllMocks()
  })

  it('accepts the root itself', () => {
    expect(validatePathWithinWorkingDir('.', root)).toEqual({ valid: true, resolvedPath: root })
  })

  it('resolves relative paths against the root', () => {
    expect(validatePathWithinWorkingDir('src/app.js', root)).toEqual({
      valid: true,
      resolvedPath: join(root, 'src', 'app.js')
    })
  })

  it('accepts absolute paths inside the root', () => {
    const target = join(root, 'lib')
    expect(validatePathWithinWorkingDir(target, root).resolvedPath).toBe(target)
  })

  it('accepts paths that do not exist yet', () => {
    expect(validatePathWithinWorkingDir('reports/new/out.json', root)).toEqual({
      valid: true,
      resolvedPath: join(root, 'reports', 'new', 'out.json')
    })
  })

  it.each([
    '..',
    '../outside',
    'src/../../etc/passwd',
    '/etc/passwd',
  ])('rejects %s which resolves outside the root', (target) => {
    expect(validatePathWithinWorkingDir(target, root)).toEqual({
      valid: false,
      resolvedPath: '',
      error: 'Access denied: path is outside working directory'
    })
  })

  it('rejects a sibling directory that shares the root as a prefix', () => {
    const result = validatePathWithinWorkingDir(`${root}-evil/file`, root)
    expect(result.valid).toBe(false)
  })

  describe('symlinks', () => {
    let outside: string

    beforeEach(() => {
      outside = realpathSync(mkdtempSync(join(tmpdir(), 'bearer-mcp-outside-')))
      symlinkSync(outside, join(root, 'escape'))
    })

    afterEach(() => {
      rmSync(outside, { recursive: true, force: true })
    })

    it('rejects a symlink inside the root that points outside', () => {
      expect(validatePathWithinWorkingDir('escape', root).valid).toBe(false)
    })

    it('rejects paths below such a symlink, even when they do not exist', () => {
      expect(validatePathWithinWorkingDir('escape/report.json', root).valid).toBe(false)
    })

    it('rejects a dangling symlink whose target lies outside the root', () => {
      symlinkSync(`${root}-outside-report.json`, join(root, 'reports', 'out.json'))
      expect(validatePathWithinWorkingDir('reports/out.json', root).valid).toBe(false)
    })

    it('rejects a dangling directory symlink with a missing tail below it', () => {
      symlinkSync(join(outside, 'not-yet'), join(root, 'reports', 'later'))
      expect(validatePathWithinWorkingDir('reports/later/out.json', root).valid).toBe(false)
    })

    it('accepts a dangling symlink whose target stays inside the root', () => {
      symlinkSync(join(root, 'reports', 'real.json'), join(root, 'reports', 'alias.json'))
      expect(validatePathWithinWorkingDir('reports/alias.json', root)).toEqual({
        valid: true,
        resolvedPath: join(root, 'reports', 'alias.json')
      })
    })

    it('rejects a symlink loop', () => {
      symlinkSync(join(root, 'loop-b'), join(root, 'loop-a'))
      symlinkSync(join(root, 'loop-a'), join(root, 'loop-b'))
      expect(validatePathWithinWorkingDir('loop-a', root).valid).toBe(false)
    })

    it('accepts a symlink that stays inside the root', () => {
      symlinkSync(join(root, 'src'), join(root, 'src-link'))
      expect(validatePathWithinWorkingDir('src-link', root)).toEqual({
        valid: true,
        resolvedPath: join(root, 'src-link')
      })
    })
  })

  it('rejects command substitution before resolving', () => {
    const result = validatePathWithinWorkingDir('$(whoami)', root)
    expect(result).toEqual({
      valid: false,
      resolvedPath: '',
      error: 'Invalid path: contains unsupported characters or shell expansion'
    })
  })
})

describe('resolveConfinedPath', () => {
  let root: string
  let cleanup: () => void

  beforeEach(() => {
    ({ root, cleanup } = createWorkspace())
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    cleanup()
    vi.restoreAllMocks()
  })

  it('returns the absolute path for a valid target', () => {
    expect(resolveConfinedPath('src', root, { directory: true })).toBe(join(root, 'src'))
  })

  it('throws InvalidPathError for traversal outside the root', () => {
    expect(() => resolveConfinedPath('../../etc', root)).toThrow(InvalidPathError)
    expect(() => resolveConfinedPath('../../etc', root)).toThrow('Access denied: path is outside working directory')
  })

  it('throws when a required path does not exist', () => {
    expect(() => resolveConfinedPath('missing', root, { mustExist: true }))
      .toThrow('Path does not exist: missing')
  })

  it('throws when a directory is required but a file is given', () => {
    expect(() => resolveConfinedPath('src/app.js', root, { directory: true }))
      .toThrow(`Not a directory: ${join('src', 'app.js')}`)
  })

  it('carries the offending path in the error details', () => {
    try {
      resolveConfinedPath('../secret', root)
      expect.fail('expected an InvalidPathError')
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidPathError)
      if (error instanceof InvalidPathError) {
        expect(error.toPayload()).toEqual({
          kind: 'invalid_path',
          message: 'Access denied: path is outside working directory',
          details: { path: '../secret' }
        })
      }
    }
  })
})

describe('containsDangerousPatterns', () => {
  it.each(['~/project', 'a\0b', '${HOME}/x', 'src/$(id)'])('flags %s', (path) => {
    expect(containsDangerousPatterns(path)).toBe(true)
  })

  it.each(['src/app.js', '/workspace/lib', 'weird name/with spaces'])('allows %s', (path) => {
    expect(containsDangerousPatterns(path)).toBe(false)
  })
})

describe('getRelativePath', () => {
  it('returns the path relative to the working directory', () => {
    expect(getRelativePath('/workspace/src/app.js', '/workspace')).toBe(join('src', 'app.js'))
  })
})
