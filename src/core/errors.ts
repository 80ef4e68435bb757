/**
 * Base class for every failure the build reports.
 * The library never exits the process; the CLI decides that.
 */
export class TailwindBuildError extends Error {
  readonly code: string

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TailwindBuildError'
    this.code = code
  }
}

export class MissingEnvironmentError extends TailwindBuildError {
  readonly variable: string

  constructor(variable: string) {
    super('MISSING_ENV', `${variable} not provided`)
    this.name = 'MissingEnvironmentError'
    this.variable = variable
  }
}

export class InvalidSourcePathError extends TailwindBuildError {
  constructor(readonly sourceDir: string) {
    super('INVALID_SRC_PATH', 'the source dir contained invalid unicode')
    this.name = 'InvalidSourcePathError'
  }
}

export class ConfigSerializationError extends TailwindBuildError {
  constructor(reason: string, cause?: unknown) {
    super('CONFIG_SERIALIZATION', `could not serialize tailwind config: ${reason}`, { cause })
    this.name = 'ConfigSerializationError'
  }
}

export class StylesheetNotFoundError extends TailwindBuildError {
  constructor(readonly stylesheetPath: string) {
    super('STYLESHEET_NOT_FOUND', `specified a css path but it does not exist: ${stylesheetPath}`)
    this.name = 'StylesheetNotFoundError'
  }
}

/** Failure of an external command, carrying how it ended */
export class CommandFailedError extends TailwindBuildError {
  readonly command: string
  readonly exitCode: number | null
  readonly signal: string | null

  constructor(
    code: string,
    message: string,
    details: { command: string; exitCode: number | null; signal: string | null; cause?: unknown }
  ) {
    const how = details.signal ? `signal ${details.signal}` : `exit code ${details.exitCode}`
    super(code, `${message} (${details.command}: ${how})`, { cause: details.cause })
    this.name = 'CommandFailedError'
    this.command = details.command
    this.exitCode = details.exitCode
    this.signal = details.signal
  }
}

export class ToolInstallError extends CommandFailedError {
  constructor(details: { command: string; exitCode: number | null; signal: string | null; cause?: unknown }) {
    super('TAILWIND_INSTALL', 'tailwind could not be installed', details)
    this.name = 'ToolInstallError'
  }
}

export class CompileError extends CommandFailedError {
  constructor(details: { command: string; exitCode: number | null; signal: string | null; cause?: unknown }) {
    super('TAILWIND_COMPILE', 'could not build styles', details)
    this.name = 'CompileError'
  }
}

export class BuildIoError extends TailwindBuildError {
  readonly path: string

  constructor(operation: string, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super('IO', `${operation} failed for ${path}: ${reason}`, { cause })
    this.name = 'BuildIoError'
    this.path = path
  }
}

export class ArtifactsNotFoundError extends TailwindBuildError {
  constructor() {
    super(
      'ARTIFACTS_NOT_FOUND',
      'neither TAILWIND_CSS_PATH nor TAILWIND_JIT_CONFIG_PATH/TAILWIND_JIT_URL are set; run tailwind-prebuild build first'
    )
    this.name = 'ArtifactsNotFoundError'
  }
}
