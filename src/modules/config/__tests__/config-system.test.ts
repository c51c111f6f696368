/**
 * Unit tests for config-system-impl.ts
 *
 * Tests:
 *  - Hierarchy loading (defaults < global < project < env < CLI)
 *  - Config validation errors
 *  - get() dot-notation access
 *  - set() with project file update
 *  - getMasked() credential masking
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, writeFile, readFile, rm } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { createConfigSystem, deepMerge, getByPath, setByPath } from '../config-system-impl.js'
import type { ConfigSystemOptions } from '../config-system.js'
import { ConfigError, ConfigIncompatibleFormatError } from '../../../core/errors.js'

// ---------------------------------------------------------------------------
// Test setup: temporary directories
// ---------------------------------------------------------------------------

let testDir: string
let projectConfigDir: string
let globalConfigDir: string

beforeEach(async () => {
  testDir = join(tmpdir(), `taskgate-config-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  projectConfigDir = join(testDir, 'project', '.taskgate')
  globalConfigDir = join(testDir, 'global', '.taskgate')
  await mkdir(projectConfigDir, { recursive: true })
  await mkdir(globalConfigDir, { recursive: true })
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
})

function createSystem(overrides: Partial<ConfigSystemOptions> = {}): ReturnType<typeof createConfigSystem> {
  return createConfigSystem({
    projectConfigDir,
    globalConfigDir,
    env: {},
    ...overrides,
  })
}

async function writeYaml(dir: string, content: string): Promise<void> {
  await writeFile(join(dir, 'config.yaml'), content, 'utf-8')
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

describe('ConfigSystem - default config', () => {
  it('returns default config when no config files exist', async () => {
    const system = createSystem()
    await system.load()
    const config = system.getConfig()
    expect(config.config_format_version).toBe('1')
    expect(config.global.log_level).toBe('info')
    expect(config.global.database_path).toBe('.taskgate/state.db')
    expect(config.gates.max_revisions).toBe(5)
    expect(config.dispatch.timeout_ms).toBe(300000)
    expect(config.sync.timeout_ms).toBe(30000)
    expect(config.sync.version_control.branch_prefix).toBe('task/')
  })

  it('throws ConfigError if getConfig called before load', () => {
    const system = createSystem()
    expect(() => system.getConfig()).toThrow(ConfigError)
    expect(system.isLoaded).toBe(false)
  })

  it('treats an empty config file as no overrides', async () => {
    await writeYaml(projectConfigDir, '')
    const system = createSystem()
    await system.load()
    expect(system.getConfig().gates.max_revisions).toBe(5)
  })
})

// ---------------------------------------------------------------------------
// Hierarchy loading
// ---------------------------------------------------------------------------

describe('ConfigSystem - hierarchy loading', () => {
  it('global config overrides defaults', async () => {
    await writeYaml(globalConfigDir, 'global:\n  log_level: debug\n')
    const system = createSystem()
    await system.load()
    expect(system.getConfig().global.log_level).toBe('debug')
  })

  it('project config overrides global config', async () => {
    await writeYaml(globalConfigDir, 'gates:\n  max_revisions: 3\n')
    await writeYaml(projectConfigDir, 'gates:\n  max_revisions: 8\n')
    const system = createSystem()
    await system.load()
    expect(system.getConfig().gates.max_revisions).toBe(8)
  })

  it('nested sections merge key by key', async () => {
    await writeYaml(projectConfigDir, 'sync:\n  version_control:\n    base_branch: trunk\n')
    const system = createSystem()
    await system.load()
    const vcs = system.getConfig().sync.version_control
    expect(vcs.base_branch).toBe('trunk')
    expect(vcs.remote).toBe('origin')
    expect(vcs.kind).toBe('git')
  })

  it('TASKGATE_* env vars override project config', async () => {
    await writeYaml(projectConfigDir, 'gates:\n  max_revisions: 8\n')
    const system = createSystem({
      env: { TASKGATE_MAX_REVISIONS: '2', TASKGATE_ISSUE_TRACKER: 'disabled' },
    })
    await system.load()
    expect(system.getConfig().gates.max_revisions).toBe(2)
    expect(system.getConfig().sync.issue_tracker.kind).toBe('disabled')
  })

  it('ignores invalid env overrides', async () => {
    const system = createSystem({ env: { TASKGATE_VERSION_CONTROL: 'svn' } })
    await system.load()
    expect(system.getConfig().sync.version_control.kind).toBe('git')
  })

  it('CLI overrides win over env vars', async () => {
    const system = createSystem({
      env: { TASKGATE_LOG_LEVEL: 'debug' },
      cliOverrides: { global: { log_level: 'error' } },
    })
    await system.load()
    expect(system.getConfig().global.log_level).toBe('error')
  })

  it('reads agent commands from the project config', async () => {
    await writeYaml(
      projectConfigDir,
      [
        'dispatch:',
        '  agents:',
        '    planner-reviewer:',
        '      command: ./agents/review.sh',
        '      timeout_ms: 1000',
        '',
      ].join('\n'),
    )
    const system = createSystem()
    await system.load()
    expect(system.getConfig().dispatch.agents['planner-reviewer']).toEqual({
      command: './agents/review.sh',
      args: [],
      timeout_ms: 1000,
    })
  })
})

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe('ConfigSystem - validation', () => {
  it('rejects unknown keys in a config file', async () => {
    await writeYaml(projectConfigDir, 'gates:\n  max_retries: 3\n')
    const system = createSystem()
    await expect(system.load()).rejects.toThrow(ConfigError)
  })

  it('rejects an unknown agent name', async () => {
    await writeYaml(projectConfigDir, 'dispatch:\n  agents:\n    reviewer:\n      command: x\n')
    const system = createSystem()
    await expect(system.load()).rejects.toThrow(ConfigError)
  })

  it('rejects an unsupported config_format_version', async () => {
    await writeYaml(projectConfigDir, 'config_format_version: "9"\n')
    const system = createSystem()
    await expect(system.load()).rejects.toThrow(ConfigIncompatibleFormatError)
  })

  it('wraps YAML syntax errors in ConfigError', async () => {
    await writeYaml(projectConfigDir, 'gates: [unclosed\n')
    const system = createSystem()
    await expect(system.load()).rejects.toThrow(ConfigError)
  })
})

// ---------------------------------------------------------------------------
// get / set / getMasked
// ---------------------------------------------------------------------------

describe('ConfigSystem - get/set', () => {
  it('get() resolves dot-notation keys', async () => {
    const system = createSystem()
    await system.load()
    expect(system.get('sync.issue_tracker.token_env')).toBe('GH_TOKEN')
    expect(system.get('sync.nope')).toBeUndefined()
  })

  it('set() writes the project file and reloads', async () => {
    const system = createSystem()
    await system.load()
    await system.set('gates.max_revisions', 7)
    expect(system.getConfig().gates.max_revisions).toBe(7)
    const written = await readFile(join(projectConfigDir, 'config.yaml'), 'utf-8')
    expect(written).toBe('gates:\n  max_revisions: 7\n')
  })

  it('set() accepts optional keys that have no default', async () => {
    const system = createSystem()
    await system.load()
    await system.set('global.operator', 'alex')
    expect(system.getConfig().global.operator).toBe('alex')
  })

  it('set() rejects unknown keys and whole sections', async () => {
    const system = createSystem()
    await system.load()
    await expect(system.set('gates.nope', 1)).rejects.toThrow('Unknown config key: gates.nope')
    await expect(system.set('sync', 1)).rejects.toThrow(ConfigError)
  })

  it('set() rejects invalid values', async () => {
    const system = createSystem()
    await system.load()
    await expect(system.set('gates.max_revisions', 0)).rejects.toThrow(ConfigError)
  })

  it('getMasked() hides credential fields', async () => {
    const system = createSystem()
    await system.load()
    expect(system.getMasked().sync.issue_tracker.token_env).toBe('***')
    expect(system.getConfig().sync.issue_tracker.token_env).toBe('GH_TOKEN')
  })
})

// ---------------------------------------------------------------------------
// Path helpers
// ---------------------------------------------------------------------------

describe('path helpers', () => {
  it('setByPath creates intermediate objects without mutating the input', () => {
    const input = { a: { b: 1 } }
    const out = setByPath(input, 'a.c.d', 2)
    expect(out).toEqual({ a: { b: 1, c: { d: 2 } } })
    expect(input).toEqual({ a: { b: 1 } })
  })

  it('getByPath returns undefined through scalars', () => {
    expect(getByPath({ a: 1 }, 'a.b')).toBeUndefined()
  })

  it('deepMerge replaces arrays instead of concatenating', () => {
    expect(deepMerge({ list: [1, 2], keep: true }, { list: [3] })).toEqual({ list: [3], keep: true })
  })
})
