import { Command } from 'commander'
import pc from 'picocolors'

import { buildCommand } from './commands/build.js'
import { initCommand } from './commands/init.js'

export const VERSION = '0.1.0'

export function createProgram(): Command {
  const program = new Command()
    .name('tailwind-prebuild')
    .description('Prepare Tailwind CSS at build time: JIT in development, compiled in release')
    .version(VERSION, '-V, --version', 'Print version')

  program.addCommand(buildCommand)
  program.addCommand(initCommand)

  program.configureHelp({
    sortSubcommands: true,
    sortOptions: true,
  })

  program.addHelpText(
    'after',
    `
${pc.bold('Examples:')}
  ${pc.dim('$')} OUT_DIR=dist PROFILE=debug tailwind-prebuild build      ${pc.dim('# JIT config + CDN')}
  ${pc.dim('$')} OUT_DIR=dist PROFILE=release tailwind-prebuild build    ${pc.dim('# Compile minified css')}
  ${pc.dim('$')} tailwind-prebuild build -o dist --always --env-file .env.tailwind
  ${pc.dim('$')} tailwind-prebuild init
`
  )

  // Default action (no command) - show help
  program.action(() => {
    program.help()
  })

  return program
}
