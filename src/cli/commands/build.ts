import { Command } from 'commander'
import pc from 'picocolors'
import ora from 'ora'
import * as fs from 'fs'
import * as path from 'path'

import type { BuildOutcome, EnvironmentSnapshot } from '../../core/types.js'
import { TailwindBuildConfig } from '../../core/config.js'
import { formatEnvFile } from '../../core/directives.js'
import { captureEnvironment, OUT_DIR_VAR, PROFILE_VAR } from '../../core/environment.js'
import type { CommandRunner } from '../../core/runner.js'
import { displayError, displayOutcome, info, printDirectives, success } from '../display.js'
import {
  applyConfig,
  getConfigPath,
  loadConfig,
  loadConfigFromFile,
  mergeOptions,
  type PrebuildConfig,
} from '../config.js'

export const buildCommand = new Command('build')
  .description('Prepare Tailwind for the current build profile')
  .option('-c, --config <file>', 'Path to config file')
  .option('-o, --out-dir <dir>', `Output directory (defaults to $${OUT_DIR_VAR})`)
  .option('-p, --profile <name>', `Build profile (defaults to $${PROFILE_VAR})`)
  .option('--always', 'Always compile, never use JIT')
  .option('--css <file>', 'Stylesheet to compile from')
  .option('--cdn <url>', 'CDN script used by JIT builds')
  .option('--src-dir <dir>', 'Directory substituted for {src_dir}')
  .option('--env-file <file>', 'Also write the emitted values as a dotenv file')
  .option('--json', 'Print the outcome as JSON instead of directive lines')
  .action(async (options: BuildCommandOptions) => {
    try {
      await build(options)
    } catch (error) {
      displayError(error)
      process.exit(1)
    }
  })

export interface BuildCommandOptions {
  config?: string
  outDir?: string
  profile?: string
  always?: boolean
  css?: string
  cdn?: string
  srcDir?: string
  envFile?: string
  json?: boolean
}

export interface BuildRuntime {
  env?: EnvironmentSnapshot
  runner?: CommandRunner
}

async function resolveFileConfig(options: BuildCommandOptions, cwd: string): Promise<PrebuildConfig> {
  if (options.config) {
    const configPath = path.resolve(cwd, options.config)
    const config = await loadConfigFromFile(configPath)
    info(`Using config from ${pc.cyan(options.config)}`)
    return config
  }

  const configPath = getConfigPath(cwd)
  if (!configPath) {
    return {}
  }
  info(`Using config from ${pc.cyan(path.relative(cwd, configPath))}`)
  return loadConfig(cwd)
}

export async function build(options: BuildCommandOptions, runtime: BuildRuntime = {}): Promise<BuildOutcome> {
  const baseEnv = runtime.env ?? captureEnvironment()
  const env: EnvironmentSnapshot = {
    cwd: baseEnv.cwd,
    vars: {
      ...baseEnv.vars,
      ...(options.outDir !== undefined ? { [OUT_DIR_VAR]: options.outDir } : {}),
      ...(options.profile !== undefined ? { [PROFILE_VAR]: options.profile } : {}),
    },
  }

  const fileConfig = await resolveFileConfig(options, env.cwd)
  const cliConfig: PrebuildConfig = {
    cssPath: options.css,
    cdnSrc: options.cdn,
    srcDir: options.srcDir,
    always: options.always,
  }
  const merged = mergeOptions(cliConfig, fileConfig)
  const builder = applyConfig(TailwindBuildConfig.create(), merged)

  const spinner = ora({ text: 'Preparing Tailwind...', isEnabled: !options.json && process.stderr.isTTY === true }).start()
  let outcome: BuildOutcome
  try {
    outcome = await builder.build({ env, runner: runtime.runner })
    spinner.succeed(outcome.mode === 'compile' ? 'Stylesheet compiled' : 'JIT config written')
  } catch (error) {
    spinner.fail('Tailwind prebuild failed')
    throw error
  }

  if (options.envFile) {
    const envFilePath = path.resolve(env.cwd, options.envFile)
    fs.writeFileSync(envFilePath, formatEnvFile(outcome.directives))
    success(`Wrote ${pc.cyan(path.relative(env.cwd, envFilePath) || envFilePath)}`)
  }

  if (options.json) {
    console.log(JSON.stringify(outcome, null, 2))
  } else {
    displayOutcome(outcome)
    printDirectives(outcome)
  }

  return outcome
}
