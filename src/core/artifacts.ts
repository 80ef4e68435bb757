import { CSS_PATH_VAR, JIT_CONFIG_PATH_VAR, JIT_URL_VAR } from './environment.js'
import { ArtifactsNotFoundError } from './errors.js'

export type TailwindArtifacts =
  | { mode: 'compile'; cssPath: string }
  | { mode: 'jit'; configScriptPath: string; cdnUrl: string }

/**
 * Read back what a build handed to the consuming application.
 * A compiled stylesheet wins when both sets of values are present.
 */
export function readTailwindArtifacts(
  vars: Readonly<Record<string, string | undefined>> = process.env
): TailwindArtifacts {
  const cssPath = vars[CSS_PATH_VAR]
  if (cssPath) {
    return { mode: 'compile', cssPath }
  }

  const configScriptPath = vars[JIT_CONFIG_PATH_VAR]
  const cdnUrl = vars[JIT_URL_VAR]
  if (configScriptPath && cdnUrl) {
    return { mode: 'jit', configScriptPath, cdnUrl }
  }

  throw new ArtifactsNotFoundError()
}
