import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs'
import * as path from 'path'
import * as os from 'os'

import {
  applyConfig,
  ConfigFileError,
  defineConfig,
  getConfigPath,
  loadConfig,
  loadConfigFromFile,
  mergeOptions,
  type PrebuildConfig,
} from './config.js'
import { TailwindBuildConfig } from '../core/config.js'

describe('config', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'tailwind-prebuild-config-test-')))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  describe('loadConfig', () => {
    it('returns empty config when no config file exists', async () => {
      const config = await loadConfig(tempDir)
      expect(config).toEqual({})
    })

    it('loads .tailwindprebuildrc JSON config', async () => {
      fs.writeFileSync(
        path.join(tempDir, '.tailwindprebuildrc'),
        JSON.stringify({
          cssPath: 'assets/app.css',
          always: true,
          tailwindConfig: { content: ['{src_dir}/**/*.html'] },
        })
      )

      const config = await loadConfig(tempDir)
      expect(config).toEqual({
        cssPath: 'assets/app.css',
        always: true,
        tailwindConfig: { content: ['{src_dir}/**/*.html'] },
      })
    })

    it('loads .tailwindprebuildrc.json config', async () => {
      fs.writeFileSync(
        path.join(tempDir, '.tailwindprebuildrc.json'),
        JSON.stringify({ cdnSrc: 'https://cdn.example.test/tw.js', srcDir: 'app' })
      )

      const config = await loadConfig(tempDir)
      expect(config.cdnSrc).toBe('https://cdn.example.test/tw.js')
      expect(config.srcDir).toBe('app')
    })

    it('loads tailwind-prebuild.config.mjs config', async () => {
      fs.writeFileSync(
        path.join(tempDir, 'tailwind-prebuild.config.mjs'),
        `export default {
          srcDir: 'web',
          always: false,
        }`
      )

      const config = await loadConfig(tempDir)
      expect(config).toEqual({ srcDir: 'web', always: false })
    })

    it('prefers .tailwindprebuildrc over JS configs', async () => {
      fs.writeFileSync(path.join(tempDir, '.tailwindprebuildrc'), JSON.stringify({ srcDir: 'from-rc' }))
      fs.writeFileSync(path.join(tempDir, 'tailwind-prebuild.config.mjs'), `export default { srcDir: 'from-js' }`)

      const config = await loadConfig(tempDir)
      expect(config.srcDir).toBe('from-rc')
    })

    it('searches parent directories', async () => {
      fs.writeFileSync(path.join(tempDir, '.tailwindprebuildrc'), JSON.stringify({ always: true }))
      const nested = path.join(tempDir, 'packages', 'web')
      fs.mkdirSync(nested, { recursive: true })

      expect(await loadConfig(nested)).toEqual({ always: true })
      expect(getConfigPath(nested)).toBe(path.join(tempDir, '.tailwindprebuildrc'))
    })

    it('accepts a null cssPath', async () => {
      fs.writeFileSync(path.join(tempDir, '.tailwindprebuildrc'), JSON.stringify({ cssPath: null }))

      expect(await loadConfig(tempDir)).toEqual({ cssPath: null })
    })

    it('reports invalid JSON', async () => {
      fs.writeFileSync(path.join(tempDir, '.tailwindprebuildrc'), '{ not json')

      await expect(loadConfig(tempDir)).rejects.toThrow(ConfigFileError)
      await expect(loadConfig(tempDir)).rejects.toThrow('Invalid JSON in config file')
    })

    it('reports fields of the wrong type', async () => {
      fs.writeFileSync(path.join(tempDir, '.tailwindprebuildrc'), JSON.stringify({ always: 'yes' }))

      await expect(loadConfig(tempDir)).rejects.toThrow(/always: Expected boolean, received string/)
    })

    it('rejects an invalid CDN url', async () => {
      fs.writeFileSync(path.join(tempDir, '.tailwindprebuildrc'), JSON.stringify({ cdnSrc: 'not a url' }))

      await expect(loadConfig(tempDir)).rejects.toThrow(/cdnSrc: Invalid url/)
    })

    it('rejects unknown keys', async () => {
      fs.writeFileSync(path.join(tempDir, '.tailwindprebuildrc'), JSON.stringify({ cdn: 'https://x.test' }))

      await expect(loadConfig(tempDir)).rejects.toThrow(ConfigFileError)
    })

    it('rejects a non-object config', async () => {
      fs.writeFileSync(path.join(tempDir, '.tailwindprebuildrc'), '[]')

      await expect(loadConfig(tempDir)).rejects.toThrow(/\(root\)/)
    })
  })

  describe('loadConfigFromFile', () => {
    it('loads the given file', async () => {
      const configPath = path.join(tempDir, 'custom.json')
      fs.writeFileSync(configPath, JSON.stringify({ srcDir: 'lib' }))

      expect(await loadConfigFromFile(configPath)).toEqual({ srcDir: 'lib' })
    })

    it('fails for a missing file', async () => {
      const configPath = path.join(tempDir, 'missing.json')

      await expect(loadConfigFromFile(configPath)).rejects.toThrow(`Config file not found: ${configPath}`)
    })
  })

  describe('mergeOptions', () => {
    it('lets given CLI options win', () => {
      const file: PrebuildConfig = { cssPath: 'a.css', cdnSrc: 'https://a.test', always: false }
      const cli: PrebuildConfig = { cssPath: 'b.css', cdnSrc: undefined, always: true }

      expect(mergeOptions(cli, file)).toEqual({ cssPath: 'b.css', cdnSrc: 'https://a.test', always: true })
    })
  })

  describe('applyConfig', () => {
    it('maps settings onto the builder', () => {
      const builder = applyConfig(TailwindBuildConfig.create(), {
        cssPath: 'assets/app.css',
        cdnSrc: 'https://cdn.example.test/tw.js',
        tailwindConfig: { content: [] },
        srcDir: 'app',
        always: true,
      })

      expect(builder.options).toEqual({
        stylesheetPath: 'assets/app.css',
        cdnSource: 'https://cdn.example.test/tw.js',
        frameworkConfig: { content: [] },
        sourceDir: 'app',
        forceAlways: true,
      })
    })

    it('leaves defaults alone for an empty config', () => {
      expect(applyConfig(TailwindBuildConfig.create(), {}).options).toEqual(TailwindBuildConfig.create().options)
    })
  })

  it('defineConfig returns its input', () => {
    const config = { srcDir: 'src' }
    expect(defineConfig(config)).toBe(config)
  })
})
