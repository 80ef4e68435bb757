import { Command } from 'commander'
import pc from 'picocolors'
import * as fs from 'fs'
import * as path from 'path'

import { CONFIG_FILES } from '../config.js'
import { displayError, info, success } from '../display.js'

export const initCommand = new Command('init')
  .description('Write a starter tailwind-prebuild config')
  .argument('[dir]', 'Project directory', '.')
  .option('--json', 'Write a JSON .tailwindprebuildrc instead of a JS module')
  .action(async (dir: string, options: InitOptions) => {
    try {
      await init(dir, options)
    } catch (error) {
      displayError(error)
      process.exit(1)
    }
  })

export interface InitOptions {
  json?: boolean
}

export const JS_TEMPLATE = `import { defineConfig } from 'tailwind-prebuild'

export default defineConfig({
  // stylesheet to compile from; leave unset to use ./style.css or the @tailwind defaults
  // cssPath: 'style.css',
  srcDir: 'src',
  tailwindConfig: {
    content: ['{src_dir}/**/*.{html,js,ts,jsx,tsx}'],
    theme: { extend: {} },
    plugins: [],
  },
})
`

export const JSON_TEMPLATE = `${JSON.stringify(
  {
    srcDir: 'src',
    tailwindConfig: {
      content: ['{src_dir}/**/*.{html,js,ts,jsx,tsx}'],
      theme: { extend: {} },
      plugins: [],
    },
  },
  null,
  2
)}\n`

export async function init(dir: string, options: InitOptions = {}, cwd: string = process.cwd()): Promise<string> {
  const targetDir = path.resolve(cwd, dir)

  const existing = CONFIG_FILES.filter((file) => fs.existsSync(path.join(targetDir, file)))
  if (existing.length > 0) {
    throw new Error(`Config already exists: ${existing.join(', ')}. Remove it to reinitialize.`)
  }

  if (!fs.existsSync(targetDir)) {
    fs.mkdirSync(targetDir, { recursive: true })
    info(`Created directory: ${pc.cyan(dir)}`)
  }

  const fileName = options.json ? '.tailwindprebuildrc' : 'tailwind-prebuild.config.mjs'
  const filePath = path.join(targetDir, fileName)
  fs.writeFileSync(filePath, options.json ? JSON_TEMPLATE : JS_TEMPLATE)
  success(`Created ${pc.cyan(fileName)}`)

  console.error()
  console.error('Next steps:')
  console.error(pc.dim('  1.'), 'npm install --save-dev tailwind-prebuild')
  console.error(pc.dim('  2.'), 'OUT_DIR=dist PROFILE=debug npx tailwind-prebuild build')
  console.error()

  return filePath
}
