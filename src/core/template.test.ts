import { describe, it, expect } from 'vitest'

import type { JsonObject, JsonValue } from './types.js'
import { ConfigSerializationError, InvalidSourcePathError } from './errors.js'
import {
  countPlaceholders,
  renderConfig,
  renderJitConfigScript,
  renderTailwindConfigModule,
  serializeConfig,
} from './template.js'
import { defaultFrameworkConfig } from './config.js'

function occurrences(text: string, needle: string): number {
  return text.split(needle).length - 1
}

describe('renderConfig', () => {
  it('expands the default content glob', () => {
    const rendered = renderConfig(defaultFrameworkConfig(), '/proj/src')

    expect(JSON.parse(rendered)).toEqual({
      content: ['/proj/src/**/*.{html,js,ts,jsx,tsx}'],
      theme: { extend: {} },
      plugins: [],
    })
  })

  it('pretty prints with two-space indentation', () => {
    expect(renderConfig({ a: '{src_dir}' }, '/x')).toBe('{\n  "a": "/x"\n}')
  })

  it('replaces every token, including keys and nested strings', () => {
    const document: JsonValue = {
      content: ['{src_dir}/**/*.html', '{src_dir}/pages/*.js'],
      theme: { '{src_dir}': { note: 'scan {src_dir} only' } },
    }
    const before = countPlaceholders(serializeConfig(document))
    const rendered = renderConfig(document, '/proj/src')

    expect(before).toBe(4)
    expect(countPlaceholders(rendered)).toBe(0)
    expect(occurrences(rendered, '/proj/src')).toBe(before)
  })

  it('leaves documents without the token untouched', () => {
    const document: JsonValue = { content: ['./index.html'], plugins: [] }

    expect(renderConfig(document, '/proj/src')).toBe(serializeConfig(document))
  })

  it('matches the content-glob scenario for a forced build', () => {
    const rendered = renderConfig({ content: ['{src_dir}/**/*.html'] }, '/proj/src')

    expect(JSON.parse(rendered)).toEqual({ content: ['/proj/src/**/*.html'] })
  })

  it('escapes quotes and backslashes in the source dir', () => {
    const sourceDir = 'C:\\proj\\"quoted"\\src'
    const rendered = renderConfig({ content: ['{src_dir}/**/*.html'] }, sourceDir)

    expect(JSON.parse(rendered)).toEqual({ content: ['C:\\proj\\"quoted"\\src/**/*.html'] })
  })

  it('keeps replacement patterns in paths literal', () => {
    const rendered = renderConfig({ content: ['{src_dir}/*.html'] }, "/proj/$&/$'/src")

    expect(JSON.parse(rendered)).toEqual({ content: ["/proj/$&/$'/src/*.html"] })
  })

  it('rejects a source dir with unpaired surrogates', () => {
    expect(() => renderConfig(defaultFrameworkConfig(), '/proj/\uD800/src')).toThrow(InvalidSourcePathError)
  })

  it('accepts paired surrogates', () => {
    const rendered = renderConfig({ dir: '{src_dir}' }, '/proj/\uD83D\uDE00')

    expect(JSON.parse(rendered)).toEqual({ dir: '/proj/\uD83D\uDE00' })
  })

  it('reports documents that cannot be serialized', () => {
    const cyclic: JsonObject = {}
    cyclic['self'] = cyclic

    expect(() => renderConfig(cyclic, '/proj/src')).toThrow(ConfigSerializationError)
  })
})

describe('config wrappers', () => {
  const document: JsonValue = { content: ['{src_dir}/**/*.html'] }

  it('writes a CommonJS module for the Tailwind CLI', () => {
    expect(renderTailwindConfigModule(document, '/proj/src')).toBe(
      'module.exports = {\n  "content": [\n    "/proj/src/**/*.html"\n  ]\n}\n'
    )
  })

  it('writes a browser script assigning tailwind.config', () => {
    expect(renderJitConfigScript(document, '/proj/src')).toBe(
      'tailwind.config = {\n  "content": [\n    "/proj/src/**/*.html"\n  ]\n}\n'
    )
  })

  it('renders the same document in both modes', () => {
    const compiled = renderTailwindConfigModule(document, '/a "b"/src').slice('module.exports = '.length)
    const jit = renderJitConfigScript(document, '/a "b"/src').slice('tailwind.config = '.length)

    expect(compiled).toBe(jit)
  })
})
