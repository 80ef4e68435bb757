/**
 * Debug logging utility for tailwind-prebuild
 *
 * Enable with DEBUG=true or TAILWIND_PREBUILD_DEBUG=true.
 * Warnings and errors are always printed.
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error'

interface DebugOptions {
  /** Component/module name for prefixing */
  prefix: string
  /** Whether to include timestamps */
  timestamp?: boolean
}

function debugEnabled(): boolean {
  return process.env['DEBUG'] === 'true' ||
         process.env['TAILWIND_PREBUILD_DEBUG'] === 'true'
}

class DebugLogger {
  private prefix: string
  private timestamp: boolean

  constructor(options: DebugOptions) {
    this.prefix = options.prefix
    this.timestamp = options.timestamp ?? true
  }

  private formatMessage(level: LogLevel, message: string, data?: unknown): string {
    const ts = this.timestamp ? `[${new Date().toISOString()}]` : ''
    const levelTag = `[${level.toUpperCase()}]`
    const prefixTag = `[${this.prefix}]`

    let formatted = `${ts}${levelTag}${prefixTag} ${message}`
    if (data !== undefined) {
      try {
        const dataStr = typeof data === 'object' ? JSON.stringify(data, null, 2) : String(data)
        formatted += `\n${dataStr}`
      } catch {
        formatted += `\n[Unserializable data]`
      }
    }
    return formatted
  }

  // stdout may carry build directives, so every level goes to stderr
  debug(message: string, data?: unknown): void {
    if (!debugEnabled()) return
    console.error(this.formatMessage('debug', message, data))
  }

  info(message: string, data?: unknown): void {
    if (!debugEnabled()) return
    console.error(this.formatMessage('info', message, data))
  }

  warn(message: string, data?: unknown): void {
    console.warn(this.formatMessage('warn', message, data))
  }

  error(message: string, data?: unknown): void {
    console.error(this.formatMessage('error', message, data))
  }

  /** Log a pipeline step */
  step(name: string, details?: Record<string, unknown>): void {
    this.info(`→ ${name}`, details)
  }
}

/** Create a debug logger for a component/module */
export function createDebugLogger(prefix: string): DebugLogger {
  return new DebugLogger({ prefix })
}

/** Check if debug mode is enabled */
export function isDebugEnabled(): boolean {
  return debugEnabled()
}

export type { DebugLogger }
