import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { vi } from 'vitest'

import type { CommandResult, CommandRunner } from '../src/core/runner.js'
import type { EnvironmentSnapshot } from '../src/core/types.js'

export interface TempProject {
  /** Canonical project root, contains `src/` */
  root: string
  srcDir: string
  outDir: string
}

export function createTempProject(prefix = 'tailwind-prebuild-'): TempProject {
  const root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)))
  const srcDir = path.join(root, 'src')
  fs.mkdirSync(srcDir)
  return { root, srcDir, outDir: path.join(root, 'out') }
}

export function cleanupTempDir(dir: string): void {
  if (fs.existsSync(dir)) {
    fs.rmSync(dir, { recursive: true, force: true })
  }
}

export function snapshotFor(
  project: TempProject,
  vars: Record<string, string | undefined> = {}
): EnvironmentSnapshot {
  return { vars: { OUT_DIR: project.outDir, ...vars }, cwd: project.root }
}

export const OK: CommandResult = { exitCode: 0, signal: null }

/**
 * Stand-in for npm/npx. Succeeds unless `results` says otherwise for a command.
 */
export function createSpyRunner(results: Partial<Record<string, CommandResult>> = {}) {
  return vi.fn<CommandRunner>(async (command) => results[command] ?? OK)
}

export function readModuleJson(file: string, prefix: string): unknown {
  const text = fs.readFileSync(file, 'utf-8')
  if (!text.startsWith(prefix)) {
    throw new Error(`${file} does not start with ${prefix}`)
  }
  return JSON.parse(text.slice(prefix.length))
}
