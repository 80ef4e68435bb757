export type JsonPrimitive = string | number | boolean | null

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue }

export type JsonObject = { [key: string]: JsonValue }

/**
 * Build profile as read from the environment.
 * `unknown` covers both a missing and an unrecognized value and behaves as `debug`.
 */
export type BuildProfile = 'release' | 'debug' | 'unknown'

/** Which pipeline the orchestrator runs */
export type BuildMode = 'compile' | 'jit'

/**
 * Explicit capture of the ambient process state a build reads.
 * Passing it in keeps detection and orchestration free of `process.env`.
 */
export interface EnvironmentSnapshot {
  vars: Readonly<Record<string, string | undefined>>
  /** Project root: the conventional `style.css` and the source dir are resolved against it */
  cwd: string
}

/** Paths inside a single build output directory */
export interface ArtifactPaths {
  outDir: string
  packageJson: string
  nodeModules: string
  tailwindConfig: string
  styleInput: string
  styleOutput: string
  jitConfig: string
}

export type BuildDirective =
  | { kind: 'rerun-if-env-changed'; name: string }
  | { kind: 'rerun-if-changed'; path: string }
  | { kind: 'warning'; message: string }
  | { kind: 'env'; name: string; value: string }

export interface BuildOutcome {
  mode: BuildMode
  profile: BuildProfile
  artifacts: ArtifactPaths
  /** Every directive emitted during the invocation, in order */
  directives: BuildDirective[]
}
