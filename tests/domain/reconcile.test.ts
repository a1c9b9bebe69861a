import { describe, it, expect, vi } from 'vitest'
import { exitCodeForStatus, reconcile, type ReconcileOptions } from '../../src/domain/reconcile.js'
import { InMemoryController } from '../../src/controller/memory.js'
import { BUILTIN_HARDWARE_PROFILES } from '../../src/lib/hardware-profiles.js'
import {
  AuthenticationError,
  DesiredStateInvalidError,
  InvalidConfigError,
  NetworkError,
  PlanningError,
  RejectedError
} from '../../src/lib/errors.js'
import { document, ruleEntry, segment, segmentEntry } from '../helpers/fixtures.js'

const PROFILE = BUILTIN_HARDWARE_PROFILES['udm-pro']
const NOW = new Date('2026-04-01T08:00:00.000Z')

const DOCUMENT = document(
  [segmentEntry(10), segmentEntry(30)],
  [ruleEntry(10, { source: { segment: 30 }, destination: { segment: 10 } })]
)

function options(overrides: Partial<ReconcileOptions>): ReconcileOptions {
  return {
    mode: 'apply',
    document: DOCUMENT,
    profile: PROFILE,
    now: NOW,
    sleep: async () => {},
    ...overrides
  }
}

describe('exitCodeForStatus', () => {
  it('maps apply statuses to exit codes', () => {
    expect(exitCodeForStatus('noop')).toBe(0)
    expect(exitCodeForStatus('success')).toBe(0)
    expect(exitCodeForStatus('partial')).toBe(4)
    expect(exitCodeForStatus('failed')).toBe(5)
    expect(exitCodeForStatus('aborted')).toBe(5)
  })
})

// ============================================================================
// Validation
// ============================================================================

describe('reconcile validate mode', () => {
  it('validates without a controller', async () => {
    const outcome = await reconcile(options({ mode: 'validate' }))

    expect(outcome.stage).toBe('validate')
    expect(outcome.exitCode).toBe(0)
    if (outcome.stage !== 'validate') return
    expect(outcome.desired?.segments.map(s => s.vlan)).toEqual([10, 30])
  })

  it('stops with exit code 2 on an invalid document', async () => {
    const controller = new InMemoryController()
    const outcome = await reconcile(options({ document: document([segmentEntry(5000)]), controller }))

    expect(outcome.exitCode).toBe(2)
    if (outcome.stage !== 'validate') throw new Error(`unexpected stage ${outcome.stage}`)
    expect(outcome.error).toBeInstanceOf(DesiredStateInvalidError)
    expect(outcome.error?.stage).toBe('structural')
    expect(controller.calls).toEqual([])
  })
})

// ============================================================================
// Dry run & apply
// ============================================================================

describe('reconcile', () => {
  it('plans without mutating in dry-run mode', async () => {
    const controller = new InMemoryController({ segments: [segment(10)] })

    const outcome = await reconcile(options({ mode: 'dry-run', controller }))

    if (outcome.stage !== 'apply') throw new Error(`unexpected stage ${outcome.stage}`)
    expect(outcome.exitCode).toBe(0)
    expect(outcome.report.dryRun).toBe(true)
    expect(outcome.plan.operations.map(op => op.id)).toEqual(['segment:30:create', 'rule:LAN-IN:10:create'])
    expect(outcome.plan.excluded.map(op => op.id)).toEqual(['segment:1:delete'])
    expect(controller.mutations).toEqual([])
  })

  it('requires a controller outside validate mode', async () => {
    await expect(reconcile(options({ mode: 'dry-run' }))).rejects.toBeInstanceOf(InvalidConfigError)
  })

  it('applies the plan and is idempotent', async () => {
    const controller = new InMemoryController({ segments: [segment(10)] })

    const first = await reconcile(options({ controller, label: 'lab' }))
    const second = await reconcile(options({ controller }))

    if (first.stage !== 'apply' || second.stage !== 'apply') throw new Error('expected apply outcomes')
    expect(first.report.status).toBe('success')
    expect(first.plan.id).toBe('lab-2026-04-01T08-00-00-000Z')
    expect(second.report.status).toBe('noop')
    expect(second.exitCode).toBe(0)
    expect(controller.state.segments.map(s => s.vlan)).toEqual([1, 10, 30])
  })

  it('exits 4 on a partial apply', async () => {
    const controller = new InMemoryController({ segments: [segment(10)] })
    controller.injectFault('createSegment', new RejectedError('segment vlan 30', 'invalid gateway'))

    const outcome = await reconcile(options({ controller }))

    if (outcome.stage !== 'apply') throw new Error(`unexpected stage ${outcome.stage}`)
    expect(outcome.report.status).toBe('partial')
    expect(outcome.report.skipped).toEqual(['rule:LAN-IN:10:create'])
    expect(outcome.exitCode).toBe(4)
  })

  it('exits 3 when a rule references a management network the controller lacks', async () => {
    const controller = new InMemoryController({ withManagement: false })
    const doc = document([segmentEntry(10)], [ruleEntry(10, { source: { segment: 1 } })])

    const outcome = await reconcile(options({ document: doc, controller }))

    if (outcome.stage !== 'plan') throw new Error(`unexpected stage ${outcome.stage}`)
    expect(outcome.exitCode).toBe(3)
    expect(outcome.error).toBeInstanceOf(PlanningError)
    expect(outcome.error.issues.map(issue => issue.missing)).toEqual(['vlan 1'])
    expect(controller.mutations).toEqual([])
  })

  it('accepts a rule referencing the live management network', async () => {
    const controller = new InMemoryController()
    const doc = document([segmentEntry(10)], [ruleEntry(10, { source: { segment: 1 } })])

    const outcome = await reconcile(options({ document: doc, controller }))

    expect(outcome.exitCode).toBe(0)
  })

  it('retries a transient fetch failure', async () => {
    const controller = new InMemoryController({ segments: [segment(10)] })
    controller.injectFault('fetchSegments', new NetworkError('fetchSegments', new Error('ECONNRESET')))
    const onRetry = vi.fn()

    const outcome = await reconcile(options({ mode: 'dry-run', controller, retry: { baseDelayMs: 1 }, onRetry }))

    expect(outcome.stage).toBe('apply')
    expect(onRetry).toHaveBeenCalledWith('fetchSegments', 1, expect.any(NetworkError), 1)
  })

  it('throws controller errors raised while fetching', async () => {
    const controller = new InMemoryController()
    controller.injectFault('fetchFirewallRules', new AuthenticationError('bad credentials'))

    await expect(reconcile(options({ controller }))).rejects.toThrow('Controller authentication failed: bad credentials')
    expect(controller.mutations).toEqual([])
  })
})
