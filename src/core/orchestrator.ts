import * as fs from 'fs/promises'
import * as path from 'path'

import type { ArtifactPaths, BuildOutcome, EnvironmentSnapshot } from './types.js'
import type { BuildConfiguration } from './config.js'
import { createCollectingSink, fanOut, type DirectiveSink } from './directives.js'
import {
  artifactPaths,
  captureEnvironment,
  CSS_PATH_VAR,
  JIT_CONFIG_PATH_VAR,
  JIT_URL_VAR,
  requireOutDir,
} from './environment.js'
import { BuildIoError, CompileError, StylesheetNotFoundError, ToolInstallError } from './errors.js'
import { detectProfile, selectMode } from './profile.js'
import { describeCommand, isSuccess, spawnCommand, type CommandRunner } from './runner.js'
import { renderJitConfigScript, renderTailwindConfigModule } from './template.js'
import { createDebugLogger } from '../utils/debug.js'

const log = createDebugLogger('Orchestrator')

export const DEFAULT_PACKAGE_JSON = `{
    "name": "tailwind-prebuild-toolchain",
    "version": "1.0.0",
    "description": "the autogenerated package.json for tailwind-prebuild",
    "private": true,
    "devDependencies": {
        "tailwindcss": "^3.4.4"
    }
}
`

export const DEFAULT_STYLE_CSS = `
@tailwind base;
@tailwind components;
@tailwind utilities;
`

/** Conventional stylesheet looked up at the project root */
export const CONVENTIONAL_STYLESHEET = 'style.css'

export const INSTALL_COMMAND = { command: 'npm', args: ['install'] } as const

export const COMPILE_COMMAND = 'npx'

export interface BuildOptions {
  /** Defaults to the current process environment and cwd */
  env?: EnvironmentSnapshot
  /** Defaults to spawning through PATH */
  runner?: CommandRunner
  /** Receives directives as they are emitted, in addition to the outcome */
  sink?: DirectiveSink
}

type StylesheetSource =
  | { kind: 'custom'; path: string }
  | { kind: 'project'; path: string }
  | { kind: 'default' }

export interface PipelineContext {
  config: BuildConfiguration
  env: EnvironmentSnapshot
  paths: ArtifactPaths
  sourceDir: string
  runner: CommandRunner
  sink: DirectiveSink
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target)
    return true
  } catch (error) {
    if (isMissing(error)) {
      return false
    }
    throw new BuildIoError('access', target, error)
  }
}

async function isFile(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isFile()
  } catch (error) {
    if (isMissing(error)) {
      return false
    }
    throw new BuildIoError('stat', target, error)
  }
}

function isMissing(error: unknown): boolean {
  return isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}

async function io<T>(operation: string, target: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn()
  } catch (error) {
    throw new BuildIoError(operation, target, error)
  }
}

async function canonicalSourceDir(config: BuildConfiguration, env: EnvironmentSnapshot): Promise<string> {
  const target = path.resolve(env.cwd, config.sourceDir)
  return io('canonicalize', target, () => fs.realpath(target))
}

/**
 * Decide where `style.in.css` comes from before anything is written or spawned.
 */
async function resolveStylesheetSource(ctx: PipelineContext): Promise<StylesheetSource> {
  const custom = ctx.config.stylesheetPath
  if (custom !== undefined) {
    const resolved = path.resolve(ctx.env.cwd, custom)
    ctx.sink.emit({ kind: 'rerun-if-changed', path: resolved })
    if (!(await isFile(resolved))) {
      throw new StylesheetNotFoundError(resolved)
    }
    return { kind: 'custom', path: resolved }
  }

  const conventional = path.join(ctx.env.cwd, CONVENTIONAL_STYLESHEET)
  if (await isFile(conventional)) {
    return { kind: 'project', path: conventional }
  }
  return { kind: 'default' }
}

async function ensurePackageJson(ctx: PipelineContext): Promise<void> {
  const target = ctx.paths.packageJson
  if (await exists(target)) {
    log.info('package.json already exists, not creating another one')
    return
  }
  log.info(`creating package.json (${target})`)
  await io('write', target, () => fs.writeFile(target, DEFAULT_PACKAGE_JSON))
}

async function ensureToolchain(ctx: PipelineContext): Promise<void> {
  if (await exists(ctx.paths.nodeModules)) {
    log.info('node_modules already exists, not installing')
    return
  }

  const { command } = INSTALL_COMMAND
  const args = [...INSTALL_COMMAND.args]
  log.info('installing tailwind')
  const result = await ctx.runner(command, args, { cwd: ctx.paths.outDir })
  if (!isSuccess(result)) {
    throw new ToolInstallError({
      command: describeCommand(command, args),
      exitCode: result.exitCode,
      signal: result.signal,
      cause: result.error,
    })
  }
}

async function writeTailwindConfig(ctx: PipelineContext): Promise<void> {
  const target = ctx.paths.tailwindConfig
  log.info(`writing tailwind config (${target})`)
  const contents = renderTailwindConfigModule(ctx.config.frameworkConfig, ctx.sourceDir)
  await io('write', target, () => fs.writeFile(target, contents))
}

async function writeInputStylesheet(ctx: PipelineContext, source: StylesheetSource): Promise<void> {
  const target = ctx.paths.styleInput
  switch (source.kind) {
    case 'custom':
      log.info(`copying ${source.path} to build css`)
      await io('copy', source.path, () => fs.copyFile(source.path, target))
      return
    case 'project':
      log.info(`copying ${CONVENTIONAL_STYLESHEET} (default path)`)
      await io('copy', source.path, () => fs.copyFile(source.path, target))
      return
    case 'default':
      log.info(`creating default ${CONVENTIONAL_STYLESHEET}`)
      await io('write', target, () => fs.writeFile(target, DEFAULT_STYLE_CSS))
      return
  }
}

async function compileStylesheet(ctx: PipelineContext): Promise<void> {
  const args = ['tailwindcss', '-i', ctx.paths.styleInput, '-o', ctx.paths.styleOutput, '--minify']
  log.info('compiling styles')
  const result = await ctx.runner(COMPILE_COMMAND, args, { cwd: ctx.paths.outDir })
  if (!isSuccess(result)) {
    throw new CompileError({
      command: describeCommand(COMPILE_COMMAND, args),
      exitCode: result.exitCode,
      signal: result.signal,
      cause: result.error,
    })
  }
}

/**
 * Install the toolchain (once), render the config, compile a minified
 * stylesheet and hand its path to the consuming build.
 */
export async function runCompilePipeline(ctx: PipelineContext): Promise<void> {
  const stylesheet = await resolveStylesheetSource(ctx)

  await ensurePackageJson(ctx)
  await ensureToolchain(ctx)
  await writeTailwindConfig(ctx)
  await writeInputStylesheet(ctx, stylesheet)
  await compileStylesheet(ctx)

  ctx.sink.emit({ kind: 'env', name: CSS_PATH_VAR, value: ctx.paths.styleOutput })
}

/**
 * Write the browser-side config script and point the consuming build at it
 * and at the CDN. Spawns nothing.
 */
export async function runJitPipeline(ctx: PipelineContext): Promise<void> {
  const target = ctx.paths.jitConfig
  log.info(`writing jit config (${target})`)
  const contents = renderJitConfigScript(ctx.config.frameworkConfig, ctx.sourceDir)
  await io('write', target, () => fs.writeFile(target, contents))

  ctx.sink.emit({ kind: 'env', name: JIT_CONFIG_PATH_VAR, value: target })
  ctx.sink.emit({ kind: 'env', name: JIT_URL_VAR, value: ctx.config.cdnSource })
}

/**
 * Run one build invocation for the given configuration snapshot.
 */
export async function runBuild(config: BuildConfiguration, options: BuildOptions = {}): Promise<BuildOutcome> {
  const env = options.env ?? captureEnvironment()
  const collected = createCollectingSink()
  const sink = options.sink ? fanOut(collected, options.sink) : collected

  const outDir = requireOutDir(env)
  const profile = detectProfile(env, sink)
  const mode = selectMode(profile, config.forceAlways)
  log.step('build', { profile, mode, outDir })

  await io('mkdir', outDir, () => fs.mkdir(outDir, { recursive: true }))
  const sourceDir = await canonicalSourceDir(config, env)

  const ctx: PipelineContext = {
    config,
    env,
    paths: artifactPaths(outDir),
    sourceDir,
    runner: options.runner ?? spawnCommand,
    sink,
  }

  if (mode === 'compile') {
    await runCompilePipeline(ctx)
  } else {
    await runJitPipeline(ctx)
  }

  return {
    mode,
    profile,
    artifacts: ctx.paths,
    directives: [...collected.directives],
  }
}
