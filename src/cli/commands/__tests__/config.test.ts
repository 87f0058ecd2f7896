import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, writeFile, rm } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import yaml from 'js-yaml'
import { runConfigShow, CONFIG_EXIT_SUCCESS, CONFIG_EXIT_INVALID } from '../config.js'
import { DEFAULT_CONFIG } from '../../../modules/config/defaults.js'
import { captureOutput, type CapturedOutput } from '../../../../test/fakes/output.js'

let testDir: string
let projectConfigDir: string
let globalConfigDir: string
let output: CapturedOutput

beforeEach(async () => {
  testDir = join(tmpdir(), `pagesmith-config-cmd-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  projectConfigDir = join(testDir, '.pagesmith')
  globalConfigDir = join(testDir, 'global', '.pagesmith')
  await mkdir(projectConfigDir, { recursive: true })
  await mkdir(globalConfigDir, { recursive: true })
  output = captureOutput()
})

afterEach(async () => {
  output.restore()
  await rm(testDir, { recursive: true, force: true })
})

function show(format: 'yaml' | 'json'): Promise<number> {
  return runConfigShow({ format, projectConfigDir, globalConfigDir, env: {} })
}

describe('runConfigShow', () => {
  it('prints the defaults as JSON', async () => {
    const code = await show('json')

    expect(code).toBe(CONFIG_EXIT_SUCCESS)
    expect(JSON.parse(output.stdout())).toEqual(DEFAULT_CONFIG)
  })

  it('prints YAML under a header', async () => {
    await show('yaml')

    const [header, ...rest] = output.stdout().split('\n\n')
    expect(header).toBe('# Pagesmith Configuration (credentials masked)')
    expect(yaml.load(rest.join('\n\n'))).toEqual(DEFAULT_CONFIG)
  })

  it('applies the project file over the global file', async () => {
    await writeFile(join(globalConfigDir, 'config.yaml'), 'hosting:\n  owner: global-owner\n  repo_prefix: g-\n')
    await writeFile(join(projectConfigDir, 'config.yaml'), 'hosting:\n  owner: project-owner\n')

    await show('json')

    expect(JSON.parse(output.stdout())).toMatchObject({ hosting: { owner: 'project-owner', repo_prefix: 'g-' } })
  })

  it('rejects unknown credential fields without echoing them', async () => {
    await writeFile(join(projectConfigDir, 'config.yaml'), 'hosting:\n  token: test-secret\n')

    const code = await show('json')

    expect(code).toBe(CONFIG_EXIT_INVALID)
    expect(output.stdout()).toBe('')
    expect(output.stderr()).not.toContain('test-secret')
  })

  it('exits 2 on an invalid value', async () => {
    await writeFile(join(projectConfigDir, 'config.yaml'), 'global:\n  max_concurrent_tasks: 0\n')

    const code = await show('json')

    expect(code).toBe(CONFIG_EXIT_INVALID)
    expect(output.stderr()).toContain('global.max_concurrent_tasks')
  })
})
