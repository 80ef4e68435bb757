import pc from 'picocolors'

import type { BuildOutcome } from '../core/types.js'
import { TailwindBuildError } from '../core/errors.js'
import { formatDirective } from '../core/directives.js'
import { isDebugEnabled } from '../utils/debug.js'

// stdout is reserved for directives and --json output

/**
 * Display a build summary
 */
export function displayOutcome(outcome: BuildOutcome): void {
  const divider = '─'.repeat(60)
  const modeLabel = outcome.mode === 'compile' ? pc.green('compile') : pc.cyan('jit')

  console.error()
  console.error(pc.bold('Tailwind prebuild'))
  console.error(pc.dim(divider))
  console.error(pc.dim('Profile:'), outcome.profile)
  console.error(pc.dim('Mode:'), modeLabel)
  console.error(pc.dim('Output:'), outcome.artifacts.outDir)
  console.error(pc.dim(divider))
}

/**
 * Print directives, one per line, for the consuming build
 */
export function printDirectives(outcome: BuildOutcome): void {
  for (const directive of outcome.directives) {
    console.log(formatDirective(directive))
  }
}

/**
 * Display an error
 */
export function displayError(error: unknown): void {
  console.error()
  console.error(pc.bold(pc.red('Error')))

  if (!(error instanceof Error)) {
    console.error(pc.red(String(error)))
    return
  }

  console.error(pc.red(error.message))
  if (error instanceof TailwindBuildError) {
    console.error(pc.dim(`code: ${error.code}`))
    if (!isDebugEnabled()) return
  }
  if (error.stack) {
    console.error(pc.dim(error.stack))
  }
}

/**
 * Display info message
 */
export function info(message: string): void {
  console.error(pc.blue('ℹ'), message)
}

/**
 * Display success message
 */
export function success(message: string): void {
  console.error(pc.green('✓'), message)
}
