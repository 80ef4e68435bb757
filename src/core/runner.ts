import { spawn } from 'child_process'

import { createDebugLogger } from '../utils/debug.js'

const log = createDebugLogger('Runner')

export interface CommandOptions {
  cwd: string
}

export interface CommandResult {
  exitCode: number | null
  signal: string | null
  /** Set when the process could not be started at all (e.g. not on PATH) */
  error?: Error
}

/**
 * Runs an external command to completion. Tests substitute a spy.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options: CommandOptions
) => Promise<CommandResult>

export function isSuccess(result: CommandResult): boolean {
  return result.error === undefined && result.exitCode === 0
}

export function describeCommand(command: string, args: string[]): string {
  return [command, ...args].join(' ')
}

/**
 * Quote an argument for cmd.exe, which receives the joined command line when
 * spawning through a shell.
 */
export function quoteForShell(arg: string): string {
  if (arg !== '' && !/[\s"&|<>^()%!]/.test(arg)) {
    return arg
  }
  return `"${arg.replace(/"/g, '""')}"`
}

/**
 * Spawns through PATH with no timeout. The child's stdout is sent to stderr so
 * that stdout stays reserved for build directives.
 */
export const spawnCommand: CommandRunner = (command, args, options) => {
  log.debug(`spawning ${describeCommand(command, args)}`, { cwd: options.cwd })

  // npm and npx are .cmd shims on Windows
  const shell = process.platform === 'win32'

  return new Promise((resolve) => {
    const child = spawn(command, shell ? args.map(quoteForShell) : args, {
      cwd: options.cwd,
      stdio: ['ignore', 2, 2],
      shell,
    })

    let settled = false
    child.once('error', (error) => {
      if (settled) return
      settled = true
      resolve({ exitCode: null, signal: null, error })
    })
    child.once('close', (exitCode, signal) => {
      if (settled) return
      settled = true
      resolve({ exitCode, signal })
    })
  })
}
