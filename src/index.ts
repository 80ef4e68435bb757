// Configuration builder
export {
  TailwindBuildConfig,
  buildTailwind,
  defaultFrameworkConfig,
  DEFAULT_CDN_SOURCE,
  DEFAULT_SOURCE_DIR,
  type BuildConfiguration,
} from './core/config.js'

// Orchestration
export {
  runBuild,
  runCompilePipeline,
  runJitPipeline,
  DEFAULT_PACKAGE_JSON,
  DEFAULT_STYLE_CSS,
  type BuildOptions,
  type PipelineContext,
} from './core/orchestrator.js'
export { detectProfile, isReleaseProfile, selectMode } from './core/profile.js'
export {
  captureEnvironment,
  requireOutDir,
  artifactPaths,
  PROFILE_VAR,
  OUT_DIR_VAR,
  CSS_PATH_VAR,
  JIT_CONFIG_PATH_VAR,
  JIT_URL_VAR,
} from './core/environment.js'

// Templating
export {
  renderConfig,
  renderTailwindConfigModule,
  renderJitConfigScript,
  serializeConfig,
  countPlaceholders,
  SRC_DIR_TOKEN,
} from './core/template.js'

// Directives
export {
  createCollectingSink,
  createStreamSink,
  fanOut,
  formatDirective,
  formatEnvFile,
  envValues,
  type DirectiveSink,
  type CollectingSink,
} from './core/directives.js'

// External commands
export { spawnCommand, type CommandRunner, type CommandResult, type CommandOptions } from './core/runner.js'

// Consumer side
export { readTailwindArtifacts, type TailwindArtifacts } from './core/artifacts.js'

// Errors
export {
  TailwindBuildError,
  MissingEnvironmentError,
  InvalidSourcePathError,
  ConfigSerializationError,
  StylesheetNotFoundError,
  CommandFailedError,
  ToolInstallError,
  CompileError,
  BuildIoError,
  ArtifactsNotFoundError,
} from './core/errors.js'

// Config files
export { defineConfig, loadConfig, loadConfigFromFile, type PrebuildConfig } from './cli/config.js'

// Types
export type {
  BuildProfile,
  BuildMode,
  BuildDirective,
  BuildOutcome,
  ArtifactPaths,
  EnvironmentSnapshot,
  JsonValue,
  JsonObject,
} from './core/types.js'
