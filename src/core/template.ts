import type { JsonValue } from './types.js'
import { ConfigSerializationError, InvalidSourcePathError } from './errors.js'

/** Token replaced by the canonical source directory */
export const SRC_DIR_TOKEN = '{src_dir}'

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/

export function countPlaceholders(text: string): number {
  return text.split(SRC_DIR_TOKEN).length - 1
}

/**
 * Pretty-print the config document as JSON (2-space indent).
 */
export function serializeConfig(document: JsonValue): string {
  let serialized: string | undefined
  try {
    serialized = JSON.stringify(document, null, 2)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigSerializationError(reason, error)
  }
  // JSON.stringify returns undefined for undefined, functions and symbols
  if (typeof serialized !== 'string') {
    throw new ConfigSerializationError('document is not representable as JSON')
  }
  return serialized
}

/**
 * The source dir as it must appear between the quotes of a JSON string.
 * Output of `serializeConfig` is JSON, so the token can only occur inside a
 * string literal.
 */
export function escapeSourceDir(sourceDir: string): string {
  if (LONE_SURROGATE.test(sourceDir)) {
    throw new InvalidSourcePathError(sourceDir)
  }
  return JSON.stringify(sourceDir).slice(1, -1)
}

/**
 * Serialize `document` and replace every `{src_dir}` with `sourceDir`.
 *
 * The replacement is textual, on the serialized form, so the token is found
 * in keys and anywhere inside string values.
 */
export function renderConfig(document: JsonValue, sourceDir: string): string {
  const escaped = escapeSourceDir(sourceDir)
  // split/join: String#replaceAll would expand `$&` style patterns in paths
  return serializeConfig(document).split(SRC_DIR_TOKEN).join(escaped)
}

/** `tailwind.config.js` read by the Tailwind CLI */
export function renderTailwindConfigModule(document: JsonValue, sourceDir: string): string {
  return `module.exports = ${renderConfig(document, sourceDir)}\n`
}

/** Script run in the browser before the CDN build of Tailwind */
export function renderJitConfigScript(document: JsonValue, sourceDir: string): string {
  return `tailwind.config = ${renderConfig(document, sourceDir)}\n`
}
