/**
 * `pagesmith config` command group
 *
 * Subcommands:
 *   - `pagesmith config show`   display merged config (credentials masked)
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { loadCliConfig, locationOptions, type ConfigLocationOptions } from '../utils/load-config.js'

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const CONFIG_EXIT_SUCCESS = 0
export const CONFIG_EXIT_ERROR = 1
export const CONFIG_EXIT_INVALID = 2

// ---------------------------------------------------------------------------
// `config show` action
// ---------------------------------------------------------------------------

export interface ConfigShowOptions extends ConfigLocationOptions {
  format?: 'yaml' | 'json'
}

export async function runConfigShow(opts: ConfigShowOptions = {}): Promise<number> {
  const loaded = await loadCliConfig(opts)
  if (!loaded.ok) {
    return loaded.invalid ? CONFIG_EXIT_INVALID : CONFIG_EXIT_ERROR
  }

  const masked = loaded.system.getMasked()
  const format = opts.format ?? 'yaml'

  if (format === 'json') {
    process.stdout.write(JSON.stringify(masked, null, 2) + '\n')
  } else {
    process.stdout.write('# Pagesmith Configuration (credentials masked)\n\n')
    process.stdout.write(yaml.dump(masked))
  }

  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// Command registration
// ---------------------------------------------------------------------------

export function registerConfigCommand(program: Command, _version: string): void {
  const configCmd = program.command('config').description('View Pagesmith configuration')

  configCmd
    .command('show')
    .description('Display the merged configuration with credentials masked')
    .option('--format <format>', 'Output format: yaml (default) or json', 'yaml')
    .option('--project-config-dir <dir>', 'Path to project .pagesmith/ directory')
    .option('--global-config-dir <dir>', 'Path to global .pagesmith/ directory')
    .action(async (opts: { format: string; projectConfigDir?: string; globalConfigDir?: string }) => {
      if (opts.format !== 'yaml' && opts.format !== 'json') {
        process.stderr.write(`  Error: unknown format "${opts.format}" (expected yaml or json)\n`)
        process.exit(CONFIG_EXIT_INVALID)
      }
      const exitCode = await runConfigShow({ format: opts.format, ...locationOptions(opts) })
      process.exit(exitCode)
    })
}
