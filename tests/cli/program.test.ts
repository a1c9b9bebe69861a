/**
 * Tests for the netstate program
 *
 * Runs the commander program end to end against an in-memory controller
 * in a temporary project: argument parsing, settings resolution, output
 * streams and exit codes.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import YAML from 'yaml'
import { createProgram } from '../../src/cli/program.js'
import { stripAnsi } from '../../src/cli/lib/colors.js'
import { InMemoryController } from '../../src/controller/memory.js'
import { AuthenticationError, RejectedError } from '../../src/lib/errors.js'
import { document, ruleEntry, segmentEntry } from '../helpers/fixtures.js'

let tmpDir: string
let stdout: string[]
let stderr: string[]

function writeConfig(extra: Record<string, unknown> = {}): void {
  const configDir = path.join(tmpDir, '.netstate')
  fs.mkdirSync(configDir, { recursive: true })
  fs.writeFileSync(path.join(configDir, 'config.yaml'), YAML.stringify({
    version: '1',
    hardware_profile: 'udm-pro',
    controller: { url: 'memory://lab' },
    apply: { retry: { max_attempts: 1 } },
    ...extra
  }))
}

function writeNetwork(content: Record<string, unknown>): string {
  const filePath = path.join(tmpDir, 'network.yaml')
  fs.writeFileSync(filePath, YAML.stringify(content))
  return filePath
}

/** Two segments and a rule dropping traffic into VLAN 20 */
function labNetwork(): Record<string, unknown> {
  return document(
    [segmentEntry(10, { name: 'trusted' }), segmentEntry(20, { name: 'iot' })],
    [ruleEntry(2000, { name: 'block-iot', destination: { segment: 20 } })]
  )
}

async function run(...args: string[]): Promise<number> {
  await createProgram(new AbortController().signal).parseAsync(['--cwd', tmpDir, ...args], { from: 'user' })
  const code = process.exitCode
  return typeof code === 'number' ? code : 0
}

function stdoutText(): string {
  return stdout.join('')
}

function stdoutJson(): unknown {
  return JSON.parse(stdoutText())
}

function stderrText(): string {
  return stripAnsi(stderr.join('\n'))
}

function snapshotsDir(): string {
  return path.join(tmpDir, '.netstate', 'snapshots')
}

function snapshotIds(): string[] {
  return fs.existsSync(snapshotsDir()) ? fs.readdirSync(snapshotsDir()) : []
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'netstate-cli-'))
  stdout = []
  stderr = []
  vi.spyOn(process.stdout, 'write').mockImplementation((chunk: unknown) => {
    stdout.push(String(chunk))
    return true
  })
  vi.spyOn(console, 'error').mockImplementation((message: unknown) => {
    stderr.push(String(message))
  })
  writeConfig()
})

afterEach(() => {
  vi.restoreAllMocks()
  process.exitCode = undefined
  fs.rmSync(tmpDir, { recursive: true, force: true })
})

// ============================================================================
// validate
// ============================================================================

describe('netstate validate', () => {
  it('reports counts on stderr for a valid document', async () => {
    const filePath = writeNetwork(labNetwork())

    expect(await run('validate')).toBe(0)
    expect(stdoutText()).toBe('')
    expect(stderrText()).toContain(`${filePath} is valid: 2 segments, 1 rule`)
  })

  it('prints the result as JSON', async () => {
    const filePath = writeNetwork(labNetwork())

    expect(await run('validate', '--json')).toBe(0)
    expect(stdoutJson()).toEqual({
      valid: true,
      file: filePath,
      profile: 'udm-pro',
      segments: 2,
      rules: 1,
      maxSegments: 31
    })
  })

  it('exits 2 with the violations of an invalid document', async () => {
    writeNetwork(document([segmentEntry(10), segmentEntry(10, { name: 'again', subnet: '10.0.11.0/24', gateway: '10.0.11.1', dhcp: { start: '10.0.11.100', stop: '10.0.11.200' } })]))

    expect(await run('validate', '--json')).toBe(2)
    const result = stdoutJson()
    expect(result).toMatchObject({ valid: false, profile: 'udm-pro', stage: 'uniqueness' })
    expect(result).toHaveProperty('violations', [expect.objectContaining({ rule: 'vlan.unique' })])
  })
})

// ============================================================================
// plan
// ============================================================================

describe('netstate plan', () => {
  it('prints the plan as JSON against the in-memory controller', async () => {
    writeNetwork(labNetwork())

    expect(await run('plan', '--json')).toBe(0)
    const plan = stdoutJson()
    expect(plan).toHaveProperty('operations', [
      expect.objectContaining({ id: 'segment:10:create' }),
      expect.objectContaining({ id: 'segment:20:create' }),
      expect.objectContaining({ id: 'rule:LAN-IN:2000:create' })
    ])
    expect(plan).toHaveProperty('excluded', [expect.objectContaining({ id: 'segment:1:delete' })])
  })

  it('exits 3 when an operation depends on the protected management network', async () => {
    writeNetwork(document([segmentEntry(30, {
      subnet: '192.168.1.0/24',
      gateway: '192.168.1.1',
      dhcp: { start: '192.168.1.100', stop: '192.168.1.200' }
    })]))

    expect(await run('plan')).toBe(3)
    expect(stdoutText()).toBe('')
    expect(stderrText()).toContain('Planning failed with 1 issue')
    expect(stderrText()).toContain(
      'segment:30:create depends on segment:1:delete, which targets the protected management network'
    )
  })
})

// ============================================================================
// apply
// ============================================================================

describe('netstate apply', () => {
  it('applies every operation after a pre-apply snapshot', async () => {
    writeNetwork(labNetwork())

    expect(await run('apply', '--json')).toBe(0)
    const report = stdoutJson()
    expect(report).toMatchObject({ dryRun: false, status: 'success', failed: [], skipped: [] })
    expect(report).toHaveProperty('succeeded', ['segment:10:create', 'segment:20:create', 'rule:LAN-IN:2000:create'])
    expect(report).toHaveProperty('snapshot.driver', 'live-state')
    expect(snapshotIds()).toHaveLength(1)
  })

  it('warns and takes no snapshot with --no-snapshot', async () => {
    writeNetwork(labNetwork())

    expect(await run('apply', '--no-snapshot', '--json')).toBe(0)
    expect(stderrText()).toContain('Applying without a pre-apply snapshot')
    expect(stdoutJson()).not.toHaveProperty('snapshot')
    expect(snapshotIds()).toEqual([])
  })

  it('follows apply.snapshot from config when the flag is absent', async () => {
    writeConfig({ apply: { snapshot: false, retry: { max_attempts: 1 } } })
    writeNetwork(labNetwork())

    expect(await run('apply', '--json')).toBe(0)
    expect(stderrText()).toContain('Applying without a pre-apply snapshot')
    expect(snapshotIds()).toEqual([])
  })

  it('mutates nothing on --dry-run', async () => {
    writeNetwork(labNetwork())
    const createSegment = vi.spyOn(InMemoryController.prototype, 'createSegment')

    expect(await run('apply', '--dry-run', '--json')).toBe(0)
    expect(stdoutJson()).toMatchObject({ dryRun: true, succeeded: [] })
    expect(createSegment).not.toHaveBeenCalled()
    expect(snapshotIds()).toEqual([])
  })

  it('exits 4 when an operation is rejected', async () => {
    writeNetwork(labNetwork())
    vi.spyOn(InMemoryController.prototype, 'createRule')
      .mockRejectedValue(new RejectedError('rule LAN-IN/2000', 'invalid destination'))

    expect(await run('apply', '--json')).toBe(4)
    expect(stdoutJson()).toMatchObject({
      status: 'partial',
      succeeded: ['segment:10:create', 'segment:20:create'],
      failed: ['rule:LAN-IN:2000:create']
    })
  })

  it('exits 5 when a fatal error halts the run', async () => {
    writeNetwork(labNetwork())
    vi.spyOn(InMemoryController.prototype, 'createSegment')
      .mockRejectedValue(new AuthenticationError('session expired'))

    expect(await run('apply', '--no-snapshot')).toBe(5)
    expect(stderrText()).toContain('Halted by segment:10:create: AUTHENTICATION_FAILED: Controller authentication failed: session expired')
  })
})

// ============================================================================
// status
// ============================================================================

describe('netstate status', () => {
  it('reports live inventory and drift as JSON', async () => {
    writeNetwork(labNetwork())

    expect(await run('status', '--json')).toBe(0)
    expect(stdoutJson()).toMatchObject({
      controller: { kind: 'memory', url: 'memory://lab', site: 'lab' },
      reachable: true,
      live: { segments: 1, rules: 0 },
      profile: { id: 'udm-pro', maxSegments: 31 },
      drift: { state: 'computed', summary: { inSync: false, creates: 3, updates: 0, deletes: 0 } }
    })
  })

  it('reports a missing desired-state document as unknown drift', async () => {
    expect(await run('status', '--json')).toBe(0)
    expect(stdoutJson()).toHaveProperty('drift', {
      state: 'missing',
      reason: `${path.join(tmpDir, 'network.yaml')} not found`
    })
  })

  it('exits 5 when the controller is unreachable', async () => {
    vi.spyOn(InMemoryController.prototype, 'fetchSegments')
      .mockRejectedValue(new AuthenticationError('bad credentials'))

    expect(await run('status')).toBe(5)
    expect(stdoutText()).toBe([
      'Controller=memory://lab',
      'Site=lab',
      'Reachable=no (Controller authentication failed: bad credentials)',
      ''
    ].join('\n'))
  })

  it('reports unreachable as JSON', async () => {
    vi.spyOn(InMemoryController.prototype, 'fetchSegments')
      .mockRejectedValue(new AuthenticationError())

    expect(await run('status', '--json')).toBe(5)
    expect(stdoutJson()).toMatchObject({
      reachable: false,
      error: { code: 'AUTHENTICATION_FAILED', message: 'Controller authentication failed' }
    })
  })
})

// ============================================================================
// backup
// ============================================================================

describe('netstate backup', () => {
  async function createBackup(): Promise<string> {
    expect(await run('backup', 'create', '--name', 'before-iot')).toBe(0)
    const id = stdoutText().trim()
    stdout.length = 0
    return id
  }

  it('creates a snapshot and lists it', async () => {
    const id = await createBackup()

    expect(id).toMatch(/before-iot$/)
    expect(await run('backup', 'list', '--json')).toBe(0)
    expect(stdoutJson()).toEqual([expect.objectContaining({
      id,
      driver: 'live-state',
      site: 'lab',
      segments: 1,
      rules: 0,
      name: 'before-iot'
    })])
  })

  it('lists snapshots as tab-separated rows when stdout is not a terminal', async () => {
    const id = await createBackup()

    expect(await run('backup', 'list')).toBe(0)
    const lines = stdoutText().split('\n')
    expect(lines[0]).toBe('ID\tDRIVER\tSITE\tSEGMENTS\tRULES\tCREATED')
    expect(lines[1].startsWith(`${id}\tlive-state\tlab\t1\t0\t`)).toBe(true)
  })

  it('verifies an intact snapshot', async () => {
    const id = await createBackup()

    expect(await run('backup', 'verify', id)).toBe(0)
    expect(stdoutText()).toBe('valid\n')
  })

  it('exits 5 for a snapshot whose data no longer matches its checksum', async () => {
    const id = await createBackup()
    fs.writeFileSync(path.join(snapshotsDir(), id, 'state.json.gz'), 'tampered')

    expect(await run('backup', 'verify', id)).toBe(5)
    expect(stdoutText()).toBe('invalid\n')
    expect(stderrText()).toContain('Checksum mismatch')
  })

  it('exits 1 for an unknown snapshot id', async () => {
    expect(await run('backup', 'verify', 'no-such-snapshot')).toBe(1)
    expect(stderrText()).toContain('No snapshot matches "no-such-snapshot"')
  })

  it('prints a hint when there are no snapshots', async () => {
    expect(await run('backup', 'list')).toBe(0)
    expect(stdoutText()).toBe('')
    expect(stderrText()).toContain('No snapshots found.')
  })
})
