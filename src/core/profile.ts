import type { BuildMode, BuildProfile, EnvironmentSnapshot } from './types.js'
import type { DirectiveSink } from './directives.js'
import { PROFILE_VAR } from './environment.js'
import { createDebugLogger } from '../utils/debug.js'

const log = createDebugLogger('Profile')

/**
 * Resolve the build profile from the snapshot.
 *
 * An unrecognized or missing value never fails the build: it is reported as a
 * warning and treated as a debug build. The consuming build is always asked to
 * rerun when the variable changes.
 */
export function detectProfile(env: EnvironmentSnapshot, sink: DirectiveSink): BuildProfile {
  sink.emit({ kind: 'rerun-if-env-changed', name: PROFILE_VAR })

  const value = env.vars[PROFILE_VAR]
  switch (value) {
    case 'release':
      return 'release'
    case 'debug':
      return 'debug'
    case undefined:
    case '': {
      const message = `'${PROFILE_VAR}' was not defined, defaulting to debug`
      log.warn(message)
      sink.emit({ kind: 'warning', message })
      return 'unknown'
    }
    default: {
      const message = `'${PROFILE_VAR}' was neither release nor debug ('${value}')`
      log.warn(message)
      sink.emit({ kind: 'warning', message })
      return 'unknown'
    }
  }
}

export function isReleaseProfile(profile: BuildProfile): boolean {
  return profile === 'release'
}

/**
 * Compile iff this is a release build or compilation is forced.
 */
export function selectMode(profile: BuildProfile, forceAlways: boolean): BuildMode {
  return isReleaseProfile(profile) || forceAlways ? 'compile' : 'jit'
}
