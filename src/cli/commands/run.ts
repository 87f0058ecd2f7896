/**
 * `pagesmith run` command
 *
 * Validates a submission JSON file, runs it through the full pipeline and
 * prints the terminal status.
 *
 * Usage:
 *   pagesmith run task.json
 *   pagesmith run task.json --output-format json
 *
 * Exit codes:
 *   0 - Task completed
 *   1 - Task failed, or a system error
 *   2 - Usage error (unreadable payload, invalid submission, bad configuration)
 */

import type { Command } from 'commander'
import { readFile } from 'node:fs/promises'
import { createEngine } from '../../core/engine-impl.js'
import type { Engine, EngineOptions } from '../../core/engine.js'
import { ValidationError } from '../../core/errors.js'
import type { TaskStatusView } from '../../core/types.js'
import { errorMessage } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { renderTaskStatusHuman } from '../formatters/status-formatter.js'
import { loadCliConfig, locationOptions, type ConfigLocationOptions } from '../utils/load-config.js'

const logger = createLogger('run-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const RUN_EXIT_COMPLETED = 0
export const RUN_EXIT_FAILED = 1
export const RUN_EXIT_USAGE = 2

export type OutputFormat = 'human' | 'json'

export interface RunActionOptions extends ConfigLocationOptions {
  payloadPath: string
  outputFormat: OutputFormat
  /** Drain and exit on SIGTERM/SIGINT */
  handleSignals?: boolean
  /** Replacements for the engine's provider, hosting client or fetch */
  engine?: Omit<EngineOptions, 'config' | 'env'>
}

// ---------------------------------------------------------------------------
// Payload reading
// ---------------------------------------------------------------------------

async function readPayload(path: string): Promise<unknown> {
  const content = await readFile(path, 'utf-8')
  try {
    return JSON.parse(content)
  } catch (err) {
    throw new Error(`${path} is not valid JSON: ${errorMessage(err)}`)
  }
}

function printStatus(status: TaskStatusView, format: OutputFormat): void {
  if (format === 'json') {
    process.stdout.write(JSON.stringify(status, null, 2) + '\n')
  } else {
    process.stdout.write(renderTaskStatusHuman(status) + '\n')
  }
}

// ---------------------------------------------------------------------------
// runRunAction
// ---------------------------------------------------------------------------

export async function runRunAction(opts: RunActionOptions): Promise<number> {
  let payload: unknown
  try {
    payload = await readPayload(opts.payloadPath)
  } catch (err) {
    process.stderr.write(`  Error: cannot read payload: ${errorMessage(err)}\n`)
    return RUN_EXIT_USAGE
  }

  const loaded = await loadCliConfig(opts)
  if (!loaded.ok) {
    return loaded.invalid ? RUN_EXIT_USAGE : RUN_EXIT_FAILED
  }

  let engine: Engine | undefined
  try {
    engine = await createEngine({
      ...opts.engine,
      config: loaded.config,
      ...(opts.env !== undefined && { env: opts.env }),
      handleSignals: opts.handleSignals ?? false,
    })

    let accepted: TaskStatusView
    try {
      accepted = engine.submit(payload)
    } catch (err) {
      if (err instanceof ValidationError) {
        process.stderr.write(`  Error: ${err.message}\n`)
        return RUN_EXIT_USAGE
      }
      throw err
    }

    const status = await engine.waitForTask(accepted.nonce)
    printStatus(status, opts.outputFormat)
    return status.state === 'completed' ? RUN_EXIT_COMPLETED : RUN_EXIT_FAILED
  } catch (err) {
    logger.error({ err }, 'Run failed')
    process.stderr.write(`  Error: ${errorMessage(err)}\n`)
    return RUN_EXIT_FAILED
  } finally {
    await engine?.shutdown()
  }
}

// ---------------------------------------------------------------------------
// Command registration
// ---------------------------------------------------------------------------

export function registerRunCommand(program: Command, _version: string): void {
  program
    .command('run <payload>')
    .description('Run one task submission (JSON file) to completion')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--project-config-dir <dir>', 'Path to project .pagesmith/ directory')
    .option('--global-config-dir <dir>', 'Path to global .pagesmith/ directory')
    .action(
      async (
        payloadPath: string,
        opts: { outputFormat: string; projectConfigDir?: string; globalConfigDir?: string }
      ) => {
        if (opts.outputFormat !== 'human' && opts.outputFormat !== 'json') {
          process.stderr.write(`  Error: unknown output format "${opts.outputFormat}" (expected human or json)\n`)
          process.exit(RUN_EXIT_USAGE)
        }
        const exitCode = await runRunAction({
          payloadPath,
          outputFormat: opts.outputFormat,
          handleSignals: true,
          ...locationOptions(opts),
        })
        process.exit(exitCode)
      }
    )
}
