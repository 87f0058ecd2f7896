#!/usr/bin/env node
/**
 * Pagesmith CLI - Main entry point
 * Provides the `pagesmith` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { createLogger } from '../utils/logger.js'
import { isPlainObject } from '../utils/helpers.js'
import { registerRunCommand } from './commands/run.js'
import { registerHealthCommand } from './commands/health.js'
import { registerConfigCommand } from './commands/config.js'

const logger = createLogger('cli')

/** Resolve the package version from package.json beside src/ or dist/ */
async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  for (const pkgPath of [resolve(here, '../../package.json'), resolve(here, '../package.json')]) {
    let content: string
    try {
      content = await readFile(pkgPath, 'utf-8')
    } catch {
      continue
    }
    const pkg: unknown = JSON.parse(content)
    if (isPlainObject(pkg) && typeof pkg['version'] === 'string') {
      return pkg['version']
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('pagesmith')
    .description('Pagesmith - turn task briefs into published single-page sites')
    .version(version, '-v, --version', 'Output the current version')

  registerRunCommand(program, version)
  registerHealthCommand(program, version)
  registerConfigCommand(program, version)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Errors are handled inside main(), which exits with 1
void main()
