import { mkdirSync, mkdtempSync, readFileSync, realpathSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { BearerExecutor, type ExecutorConfig } from '../server/scanner/executor.js'

export const FAKE_BEARER = fileURLToPath(new URL('./fixtures/fake-bearer.mjs', import.meta.url))
export const BEARER_WRAPPER = fileURLToPath(new URL('./fixtures/bearer-wrapper.sh', import.meta.url))

/**
 * Executor running the fake Bearer script through the current Node binary
 */
export function createFakeExecutor(env: Record<string, string> = {}, overrides: Partial<ExecutorConfig> = {}) {
  return new BearerExecutor({
    command: process.execPath,
    baseArgs: [FAKE_BEARER],
    timeoutMs: 10_000,
    killGraceMs: 500,
    ...overrides,
    env,
  })
}

/**
 * Temporary project tree:
 *   <root>/src/app.js
 *   <root>/lib/util.js
 *   <root>/reports/
 */
export function createWorkspace(): { root: string; cleanup: () => void } {
  const root = realpathSync(mkdtempSync(join(tmpdir(), 'bearer-mcp-')))
  mkdirSync(join(root, 'src'))
  mkdirSync(join(root, 'lib'))
  mkdirSync(join(root, 'reports'))
  writeFileSync(join(root, 'src', 'app.js'), 'eval(process.argv[2])\n')
  writeFileSync(join(root, 'lib', 'util.js'), 'module.exports = {}\n')
  return {
    root,
    cleanup: () => rmSync(root, { recursive: true, force: true })
  }
}

/**
 * True while the process exists and is not a zombie waiting to be reaped
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
  } catch {
    return false
  }
  if (process.platform !== 'linux') return true
  try {
    const stat = readFileSync(`/proc/${pid}/stat`, 'utf-8')
    return stat.charAt(stat.lastIndexOf(')') + 2) !== 'Z'
  } catch {
    return false
  }
}
