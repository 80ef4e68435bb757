import type { BuildDirective } from './types.js'

/**
 * Receives build directives as the orchestrator emits them.
 */
export interface DirectiveSink {
  emit(directive: BuildDirective): void
}

export interface CollectingSink extends DirectiveSink {
  readonly directives: BuildDirective[]
}

export const DIRECTIVE_PREFIX = 'tailwind-prebuild:'

export function createCollectingSink(): CollectingSink {
  const directives: BuildDirective[] = []
  return {
    directives,
    emit(directive) {
      directives.push(directive)
    },
  }
}

/** Writes one formatted line per directive */
export function createStreamSink(write: (line: string) => void): DirectiveSink {
  return {
    emit(directive) {
      write(`${formatDirective(directive)}\n`)
    },
  }
}

export function fanOut(...sinks: DirectiveSink[]): DirectiveSink {
  return {
    emit(directive) {
      for (const sink of sinks) {
        sink.emit(directive)
      }
    },
  }
}

/**
 * One-line form read by the consuming build, e.g.
 * `tailwind-prebuild:env=TAILWIND_CSS_PATH=/out/style.css`
 */
export function formatDirective(directive: BuildDirective): string {
  switch (directive.kind) {
    case 'rerun-if-env-changed':
      return `${DIRECTIVE_PREFIX}rerun-if-env-changed=${directive.name}`
    case 'rerun-if-changed':
      return `${DIRECTIVE_PREFIX}rerun-if-changed=${directive.path}`
    case 'warning':
      return `${DIRECTIVE_PREFIX}warning=${directive.message}`
    case 'env':
      return `${DIRECTIVE_PREFIX}env=${directive.name}=${directive.value}`
  }
}

/**
 * dotenv lines for the `env` directives; later values for the same name win.
 */
export function formatEnvFile(directives: readonly BuildDirective[]): string {
  const values = new Map<string, string>()
  for (const directive of directives) {
    if (directive.kind === 'env') {
      values.set(directive.name, directive.value)
    }
  }

  let output = ''
  for (const [name, value] of values) {
    output += `${name}=${JSON.stringify(value)}\n`
  }
  return output
}

export function envValues(directives: readonly BuildDirective[]): Record<string, string> {
  const values: Record<string, string> = {}
  for (const directive of directives) {
    if (directive.kind === 'env') {
      values[directive.name] = directive.value
    }
  }
  return values
}
