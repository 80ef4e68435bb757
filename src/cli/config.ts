import * as fs from 'fs'
import * as path from 'path'
import { pathToFileURL } from 'url'
import { z } from 'zod'

import type { JsonValue } from '../core/types.js'
import type { TailwindBuildConfig } from '../core/config.js'
import { TailwindBuildError } from '../core/errors.js'

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
)

const prebuildConfigSchema = z
  .object({
    /** Stylesheet to compile from; `null` means the conventional `style.css` */
    cssPath: z.string().min(1).nullable().optional(),
    /** CDN script used by JIT builds */
    cdnSrc: z.string().url().optional(),
    /** Tailwind config as JSON, `{src_dir}` is expanded */
    tailwindConfig: jsonValueSchema.optional(),
    /** Always compile, never JIT */
    always: z.boolean().optional(),
    /** Source directory substituted for `{src_dir}` */
    srcDir: z.string().min(1).optional(),
  })
  .strict()

/**
 * Configuration options read from a config file
 */
export type PrebuildConfig = z.infer<typeof prebuildConfigSchema>

export class ConfigFileError extends TailwindBuildError {
  readonly configPath: string

  constructor(message: string, configPath: string, cause?: unknown) {
    super('CONFIG_FILE', message, { cause })
    this.name = 'ConfigFileError'
    this.configPath = configPath
  }
}

/**
 * Config file names to search for, in order of priority
 */
export const CONFIG_FILES = [
  '.tailwindprebuildrc',
  '.tailwindprebuildrc.json',
  'tailwind-prebuild.config.js',
  'tailwind-prebuild.config.mjs',
]

/**
 * Find the config file in the given directory or its parents
 */
function findConfigFile(startDir: string): string | null {
  let currentDir = startDir

  while (true) {
    for (const configFile of CONFIG_FILES) {
      const configPath = path.join(currentDir, configFile)
      if (fs.existsSync(configPath)) {
        return configPath
      }
    }

    const parentDir = path.dirname(currentDir)
    if (parentDir === currentDir) {
      // Reached filesystem root
      break
    }
    currentDir = parentDir
  }

  return null
}

function validateConfig(config: unknown, configPath: string): PrebuildConfig {
  const result = prebuildConfigSchema.safeParse(config)
  if (result.success) {
    return result.data
  }

  const details = result.error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)'
      return `  - ${where}: ${issue.message}`
    })
    .join('\n')
  throw new ConfigFileError(`Invalid config in ${configPath}\n${details}`, configPath)
}

/**
 * Load a JSON config file (.tailwindprebuildrc or .tailwindprebuildrc.json)
 */
function loadJsonConfig(configPath: string): PrebuildConfig {
  let content: string
  try {
    content = fs.readFileSync(configPath, 'utf-8')
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigFileError(`Failed to read config file: ${configPath}\nReason: ${message}`, configPath, error)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigFileError(`Invalid JSON in config file: ${configPath}\nReason: ${message}`, configPath, error)
  }
  return validateConfig(parsed, configPath)
}

/**
 * Load a JavaScript config file; the default export is the config
 */
async function loadJsConfig(configPath: string): Promise<PrebuildConfig> {
  let loaded: unknown
  try {
    const fileUrl = pathToFileURL(configPath).href
    loaded = await import(fileUrl)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigFileError(`Failed to load config file: ${configPath}\nReason: ${message}`, configPath, error)
  }

  const config = typeof loaded === 'object' && loaded !== null && 'default' in loaded ? loaded.default : loaded
  return validateConfig(config, configPath)
}

function loadConfigAt(configPath: string): Promise<PrebuildConfig> | PrebuildConfig {
  const ext = path.extname(configPath)
  if (ext === '.js' || ext === '.mjs') {
    return loadJsConfig(configPath)
  }
  // .tailwindprebuildrc has no extension and is JSON
  return loadJsonConfig(configPath)
}

/**
 * Load configuration from a config file
 * Searches for config files starting from the given directory
 *
 * @param startDir - Directory to start searching from (defaults to cwd)
 * @returns Loaded config or empty object if no config file found
 */
export async function loadConfig(startDir?: string): Promise<PrebuildConfig> {
  const configPath = findConfigFile(startDir || process.cwd())
  if (!configPath) {
    return {}
  }
  return loadConfigAt(configPath)
}

/**
 * Load config from a specific file path
 */
export async function loadConfigFromFile(configPath: string): Promise<PrebuildConfig> {
  if (!fs.existsSync(configPath)) {
    throw new ConfigFileError(`Config file not found: ${configPath}`, configPath)
  }
  return loadConfigAt(configPath)
}

/**
 * Get the path to the config file that would be loaded, if any
 */
export function getConfigPath(startDir?: string): string | null {
  return findConfigFile(startDir || process.cwd())
}

/**
 * Merge CLI options with config file settings.
 * A CLI option overrides the file only when it was given.
 */
export function mergeOptions(cliOptions: PrebuildConfig, config: PrebuildConfig): PrebuildConfig {
  const merged: PrebuildConfig = { ...config }
  if (cliOptions.cssPath !== undefined) merged.cssPath = cliOptions.cssPath
  if (cliOptions.cdnSrc !== undefined) merged.cdnSrc = cliOptions.cdnSrc
  if (cliOptions.tailwindConfig !== undefined) merged.tailwindConfig = cliOptions.tailwindConfig
  if (cliOptions.always !== undefined) merged.always = cliOptions.always
  if (cliOptions.srcDir !== undefined) merged.srcDir = cliOptions.srcDir
  return merged
}

/**
 * Apply file/CLI settings on top of a builder
 */
export function applyConfig(builder: TailwindBuildConfig, config: PrebuildConfig): TailwindBuildConfig {
  let next = builder
  if (config.cssPath !== undefined) next = next.withPath(config.cssPath)
  if (config.cdnSrc !== undefined) next = next.withCdnSource(config.cdnSrc)
  if (config.tailwindConfig !== undefined) next = next.withFrameworkConfig(config.tailwindConfig)
  if (config.srcDir !== undefined) next = next.withSourceDir(config.srcDir)
  if (config.always) next = next.always()
  return next
}

/**
 * Define configuration with type safety (for JS config files)
 *
 * @example
 * // tailwind-prebuild.config.mjs
 * import { defineConfig } from 'tailwind-prebuild'
 *
 * export default defineConfig({
 *   cssPath: 'assets/app.css',
 *   tailwindConfig: { content: ['{src_dir}/**\/*.html'] },
 * })
 */
export function defineConfig(config: PrebuildConfig): PrebuildConfig {
  return config
}
