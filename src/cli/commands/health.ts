/**
 * `pagesmith health` command
 *
 * Builds an engine from the merged configuration and prints whether the
 * generative provider and hosting credentials are in place.
 *
 * Exit codes:
 *   0 - Report printed (including a degraded report)
 *   1 - System error
 *   2 - Invalid configuration
 */

import type { Command } from 'commander'
import { createEngine } from '../../core/engine-impl.js'
import type { EngineOptions } from '../../core/engine.js'
import { errorMessage } from '../../utils/helpers.js'
import { renderHealthHuman } from '../formatters/status-formatter.js'
import { loadCliConfig, locationOptions, type ConfigLocationOptions } from '../utils/load-config.js'
import type { OutputFormat } from './run.js'

export const HEALTH_EXIT_SUCCESS = 0
export const HEALTH_EXIT_ERROR = 1
export const HEALTH_EXIT_INVALID = 2

export interface HealthActionOptions extends ConfigLocationOptions {
  outputFormat: OutputFormat
  engine?: Omit<EngineOptions, 'config' | 'env'>
}

export async function runHealthAction(opts: HealthActionOptions): Promise<number> {
  const loaded = await loadCliConfig(opts)
  if (!loaded.ok) {
    return loaded.invalid ? HEALTH_EXIT_INVALID : HEALTH_EXIT_ERROR
  }

  try {
    const engine = await createEngine({
      ...opts.engine,
      config: loaded.config,
      ...(opts.env !== undefined && { env: opts.env }),
    })
    const report = engine.health()
    await engine.shutdown()

    if (opts.outputFormat === 'json') {
      process.stdout.write(JSON.stringify(report, null, 2) + '\n')
    } else {
      process.stdout.write(renderHealthHuman(report) + '\n')
    }
    return HEALTH_EXIT_SUCCESS
  } catch (err) {
    process.stderr.write(`  Error: ${errorMessage(err)}\n`)
    return HEALTH_EXIT_ERROR
  }
}

export function registerHealthCommand(program: Command, _version: string): void {
  program
    .command('health')
    .description('Report whether the generator and hosting are configured')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--project-config-dir <dir>', 'Path to project .pagesmith/ directory')
    .option('--global-config-dir <dir>', 'Path to global .pagesmith/ directory')
    .action(async (opts: { outputFormat: string; projectConfigDir?: string; globalConfigDir?: string }) => {
      if (opts.outputFormat !== 'human' && opts.outputFormat !== 'json') {
        process.stderr.write(`  Error: unknown output format "${opts.outputFormat}" (expected human or json)\n`)
        process.exit(HEALTH_EXIT_INVALID)
      }
      const exitCode = await runHealthAction({ outputFormat: opts.outputFormat, ...locationOptions(opts) })
      process.exit(exitCode)
    })
}
