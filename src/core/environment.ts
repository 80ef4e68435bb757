import * as path from 'path'

import type { ArtifactPaths, EnvironmentSnapshot } from './types.js'
import { MissingEnvironmentError } from './errors.js'

/** Build profile name, `release` or `debug` */
export const PROFILE_VAR = 'PROFILE'

/** Directory the build writes its artifacts to */
export const OUT_DIR_VAR = 'OUT_DIR'

/** Absolute path of the compiled stylesheet (compile mode) */
export const CSS_PATH_VAR = 'TAILWIND_CSS_PATH'

/** Absolute path of the generated `tailwind.config = ...` script (JIT mode) */
export const JIT_CONFIG_PATH_VAR = 'TAILWIND_JIT_CONFIG_PATH'

/** CDN script URL (JIT mode) */
export const JIT_URL_VAR = 'TAILWIND_JIT_URL'

/**
 * Capture the current process state once, at the start of an invocation.
 */
export function captureEnvironment(
  overrides: Record<string, string | undefined> = {},
  cwd: string = process.cwd()
): EnvironmentSnapshot {
  const vars: Record<string, string | undefined> = { ...process.env }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      vars[key] = value
    }
  }
  return { vars: Object.freeze(vars), cwd }
}

/**
 * The output directory is required; there is nothing sensible to fall back to.
 */
export function requireOutDir(env: EnvironmentSnapshot): string {
  const outDir = env.vars[OUT_DIR_VAR]
  if (!outDir) {
    throw new MissingEnvironmentError(OUT_DIR_VAR)
  }
  return path.resolve(env.cwd, outDir)
}

export function artifactPaths(outDir: string): ArtifactPaths {
  return {
    outDir,
    packageJson: path.join(outDir, 'package.json'),
    nodeModules: path.join(outDir, 'node_modules'),
    tailwindConfig: path.join(outDir, 'tailwind.config.js'),
    styleInput: path.join(outDir, 'style.in.css'),
    styleOutput: path.join(outDir, 'style.css'),
    jitConfig: path.join(outDir, 'jit_config.js'),
  }
}
