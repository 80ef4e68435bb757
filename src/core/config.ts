import type { BuildOutcome, JsonValue } from './types.js'
import { runBuild, type BuildOptions } from './orchestrator.js'

export const DEFAULT_CDN_SOURCE = 'https://cdn.tailwindcss.com'

export const DEFAULT_SOURCE_DIR = 'src'

export function defaultFrameworkConfig(): JsonValue {
  return {
    content: ['{src_dir}/**/*.{html,js,ts,jsx,tsx}'],
    theme: { extend: {} },
    plugins: [],
  }
}

/**
 * Options snapshot the orchestrator runs from.
 */
export interface BuildConfiguration {
  /** Custom input stylesheet; when set it must exist */
  readonly stylesheetPath?: string
  /** Compile even outside a release profile */
  readonly forceAlways: boolean
  /** Tailwind config; `{src_dir}` expands to the canonical source dir */
  readonly frameworkConfig: JsonValue
  /** CDN script used by JIT builds */
  readonly cdnSource: string
  /** Directory substituted for `{src_dir}`, relative to the project root */
  readonly sourceDir: string
}

/** Deep copy of a JSON document with every array and object frozen */
function frozenCopy(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    const items = value.map(frozenCopy)
    Object.freeze(items)
    return items
  }
  if (value !== null && typeof value === 'object') {
    const copy: { [key: string]: JsonValue } = {}
    for (const [key, entry] of Object.entries(value)) {
      copy[key] = frozenCopy(entry)
    }
    Object.freeze(copy)
    return copy
  }
  return value
}

/**
 * Immutable builder for a Tailwind build.
 *
 * @example
 * await TailwindBuildConfig.create().withCdnSource('https://my.cdn.com').build()
 */
export class TailwindBuildConfig {
  readonly options: BuildConfiguration

  private constructor(options: BuildConfiguration) {
    this.options = Object.freeze({ ...options, frameworkConfig: frozenCopy(options.frameworkConfig) })
    Object.freeze(this)
  }

  static create(): TailwindBuildConfig {
    return new TailwindBuildConfig({
      forceAlways: false,
      frameworkConfig: defaultFrameworkConfig(),
      cdnSource: DEFAULT_CDN_SOURCE,
      sourceDir: DEFAULT_SOURCE_DIR,
    })
  }

  private with(changes: Partial<BuildConfiguration>): TailwindBuildConfig {
    return new TailwindBuildConfig({ ...this.options, ...changes })
  }

  /**
   * Set the stylesheet Tailwind compiles from.
   *
   * `null`/`undefined` looks for `style.css` at the project root and falls
   * back to the three `@tailwind` directives when it is not there.
   */
  withPath(stylesheetPath: string | null | undefined): TailwindBuildConfig {
    if (stylesheetPath === null || stylesheetPath === undefined) {
      const { stylesheetPath: _dropped, ...rest } = this.options
      return new TailwindBuildConfig(rest)
    }
    return this.with({ stylesheetPath })
  }

  withCdnSource(cdnSource: string): TailwindBuildConfig {
    return this.with({ cdnSource })
  }

  /**
   * Replace the Tailwind config. It is used by both the JIT script and the
   * compiled build, so it is given as JSON.
   */
  withFrameworkConfig(frameworkConfig: JsonValue): TailwindBuildConfig {
    return this.with({ frameworkConfig })
  }

  withSourceDir(sourceDir: string): TailwindBuildConfig {
    return this.with({ sourceDir })
  }

  /** Always compile, never use JIT */
  always(): TailwindBuildConfig {
    return this.with({ forceAlways: true })
  }

  build(options: BuildOptions = {}): Promise<BuildOutcome> {
    return runBuild(this.options, options)
  }
}

/** Build Tailwind with the default configuration */
export function buildTailwind(options: BuildOptions = {}): Promise<BuildOutcome> {
  return TailwindBuildConfig.create().build(options)
}
