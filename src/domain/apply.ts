/**
 * Applier
 *
 * Executes a ReconciliationPlan against the controller.
 *
 * - dry-run renders every operation and makes no call
 * - live runs take a snapshot first, then run operations in plan order;
 *   with concurrency > 1 an operation starts once all its dependencies
 *   have succeeded
 * - transient errors are retried by RetryingController; a failed operation
 *   skips its transitive dependents while independent ones continue
 * - fatal errors halt the run; an aborted signal stops it between
 *   operations; nothing is rolled back
 */

import pLimit from 'p-limit'
import type { ControllerApi } from '../controller/api.js'
import { RetryingController } from '../controller/retrying.js'
import { ConflictError, NotFoundError, SnapshotError, isFatalError, isNetstateError } from '../lib/errors.js'
import type { RetryPolicy } from '../lib/retry.js'
import { describeOperation } from './plan.js'
import { ruleKeyOf } from './types.js'
import type {
  ApplyReport,
  ApplyStatus,
  Operation,
  OperationResult,
  ReconciliationPlan,
  RuleOperation,
  SegmentOperation,
  SnapshotHandle
} from './types.js'

// ============================================================================
// Types
// ============================================================================

/** Backup collaborator invoked before any live apply */
export interface SnapshotProvider {
  snapshot(): Promise<SnapshotHandle>
}

export interface ApplyOptions {
  controller: ControllerApi
  dryRun?: boolean
  /** Independent operations in flight at once. Default: 1 */
  concurrency?: number
  retry?: Partial<RetryPolicy>
  /** Omit to apply without a snapshot */
  snapshot?: SnapshotProvider
  signal?: AbortSignal
  sleep?: (ms: number) => Promise<void>
  onOperation?: (result: OperationResult) => void
  onRetry?: (operationId: string, attempt: number, error: unknown, delayMs: number) => void
}

interface Execution {
  note?: string
  calls: number
}

// ============================================================================
// Plan Execution
// ============================================================================

/**
 * Apply a plan. Per-operation failures are reported, not thrown; only a
 * snapshot failure rejects (before anything is mutated).
 */
export async function apply(plan: ReconciliationPlan, options: ApplyOptions): Promise<ApplyReport> {
  const startedAt = new Date().toISOString()
  const actions = plan.operations.map(describeOperation)

  if (options.dryRun || plan.operations.length === 0) {
    return {
      planId: plan.id,
      dryRun: options.dryRun ?? false,
      status: plan.operations.length === 0 ? 'noop' : 'success',
      actions,
      results: [],
      succeeded: [],
      failed: [],
      skipped: [],
      notAttempted: [],
      startedAt,
      finishedAt: new Date().toISOString()
    }
  }

  const snapshot = options.snapshot ? await takeSnapshot(options.snapshot) : undefined
  const run = new ApplyRun(plan, options)
  await run.execute()

  return run.report({ startedAt, actions, snapshot })
}

async function takeSnapshot(provider: SnapshotProvider): Promise<SnapshotHandle> {
  try {
    return await provider.snapshot()
  } catch (error) {
    if (error instanceof SnapshotError) throw error
    throw new SnapshotError(error instanceof Error ? error.message : String(error), error)
  }
}

class ApplyRun {
  private readonly results = new Map<string, OperationResult>()
  private haltedBy?: { id: string; code: string; message: string }
  private aborted = false

  constructor(
    private readonly plan: ReconciliationPlan,
    private readonly options: ApplyOptions
  ) {}

  async execute(): Promise<void> {
    const concurrency = this.options.concurrency ?? 1

    if (concurrency <= 1) {
      for (const op of this.plan.operations) {
        await this.step(op)
      }
      return
    }

    const limit = pLimit(concurrency)
    const done = new Map<string, Promise<void>>()

    for (const op of this.plan.operations) {
      // Plan order is topological, so every dependency is already registered
      const dependencies = op.dependsOn.map(id => done.get(id) ?? Promise.resolve())
      done.set(op.id, Promise.all(dependencies).then(() => limit(() => this.step(op))))
    }

    await Promise.all(done.values())
  }

  /**
   * Decide whether an operation may start, run it, then checkpoint
   */
  private async step(op: Operation): Promise<void> {
    if (this.haltedBy) {
      this.record({ ...this.pending(op), outcome: 'not-attempted', reason: 'halted' })
      return
    }
    if (this.aborted || this.options.signal?.aborted) {
      this.aborted = true
      this.record({ ...this.pending(op), outcome: 'not-attempted', reason: 'aborted' })
      return
    }

    const blockedBy = this.blockersOf(op)
    if (blockedBy.length > 0) {
      this.record({ ...this.pending(op), outcome: 'skipped', blockedBy })
      return
    }

    await this.run(op)

    if (this.options.signal?.aborted) {
      this.aborted = true
    }
  }

  private async run(op: Operation): Promise<void> {
    const start = Date.now()
    let retries = 0
    const client = new RetryingController(this.options.controller, {
      ...this.options.retry,
      sleep: this.options.sleep,
      onRetry: (_call, attempt, error, delayMs) => {
        retries++
        this.options.onRetry?.(op.id, attempt, error, delayMs)
      }
    })
    const execution: Execution = { calls: 0 }

    try {
      await executeOperation(op, client, execution)
      this.record({
        ...this.pending(op),
        outcome: 'succeeded',
        attempts: execution.calls + retries,
        durationMs: Date.now() - start,
        note: execution.note
      })
    } catch (error) {
      const code = isNetstateError(error) ? error.code : 'UNKNOWN_ERROR'
      const message = error instanceof Error ? error.message : String(error)
      this.record({
        ...this.pending(op),
        outcome: 'failed',
        attempts: execution.calls + retries,
        durationMs: Date.now() - start,
        error: { code, message }
      })
      if (isFatalError(error) && !this.haltedBy) {
        this.haltedBy = { id: op.id, code, message }
      }
    }
  }

  /**
   * Failed operations upstream of `op`, following skipped dependencies
   */
  private blockersOf(op: Operation): string[] {
    const blockers = new Set<string>()
    for (const dependency of op.dependsOn) {
      const result = this.results.get(dependency)
      if (!result) continue
      if (result.outcome === 'failed') blockers.add(dependency)
      if (result.outcome === 'skipped') result.blockedBy?.forEach(id => blockers.add(id))
    }
    return [...blockers].sort()
  }

  private pending(op: Operation): OperationResult {
    return { id: op.id, action: describeOperation(op), outcome: 'not-attempted', attempts: 0, durationMs: 0 }
  }

  private record(result: OperationResult): void {
    if (result.note === undefined) delete result.note
    this.results.set(result.id, result)
    this.options.onOperation?.(result)
  }

  report(base: { startedAt: string; actions: string[]; snapshot?: SnapshotHandle }): ApplyReport {
    const results = this.plan.operations.map(op => this.results.get(op.id) ?? { ...this.pending(op), reason: 'aborted' as const })
    const idsWith = (outcome: OperationResult['outcome']) => results.filter(r => r.outcome === outcome).map(r => r.id)

    const report: ApplyReport = {
      planId: this.plan.id,
      dryRun: false,
      status: 'success',
      actions: base.actions,
      results,
      succeeded: idsWith('succeeded'),
      failed: idsWith('failed'),
      skipped: idsWith('skipped'),
      notAttempted: idsWith('not-attempted'),
      startedAt: base.startedAt,
      finishedAt: new Date().toISOString()
    }
    if (base.snapshot) report.snapshot = base.snapshot
    if (this.haltedBy) report.haltedBy = this.haltedBy
    // An abort after the last operation finished leaves nothing unattempted
    report.status = statusOf(report, results.some(r => r.reason === 'aborted'))
    return report
  }
}

function statusOf(report: ApplyReport, aborted: boolean): ApplyStatus {
  if (aborted) return 'aborted'
  if (report.haltedBy) return 'failed'
  if (report.failed.length > 0 || report.skipped.length > 0) return 'partial'
  return 'success'
}

// ============================================================================
// Individual Operation Application
// ============================================================================

/**
 * Run one operation, converging on the target when the controller already
 * reflects part of it:
 *   delete + not found   → succeeded, "already absent"
 *   create + conflict    → update, "already present"
 *   update + not found   → create, "recreated"; a conflict on that
 *                          create means the rule already sits at its
 *                          target, so it is updated there, "already present"
 */
async function executeOperation(op: Operation, client: ControllerApi, execution: Execution): Promise<void> {
  const call: Call = fn => {
    execution.calls++
    return fn()
  }
  return op.resource === 'segment'
    ? executeSegmentOperation(op, client, execution, call)
    : executeRuleOperation(op, client, execution, call)
}

type Call = <T>(fn: () => Promise<T>) => Promise<T>

async function executeSegmentOperation(
  op: SegmentOperation,
  client: ControllerApi,
  execution: Execution,
  call: Call
): Promise<void> {
  const { desired, live } = op
  switch (op.kind) {
    case 'create':
      if (!desired) throw new Error(`${op.id} has no desired segment`)
      try {
        await call(() => client.createSegment(desired))
      } catch (error) {
        if (!(error instanceof ConflictError)) throw error
        await call(() => client.updateSegment(desired))
        execution.note = 'already present'
      }
      return
    case 'update':
      if (!desired) throw new Error(`${op.id} has no desired segment`)
      try {
        await call(() => client.updateSegment(desired))
      } catch (error) {
        if (!(error instanceof NotFoundError)) throw error
        await call(() => client.createSegment(desired))
        execution.note = 'recreated'
      }
      return
    case 'delete':
      if (!live) throw new Error(`${op.id} has no live segment`)
      try {
        await call(() => client.deleteSegment(live.vlan))
      } catch (error) {
        if (!(error instanceof NotFoundError)) throw error
        execution.note = 'already absent'
      }
      return
  }
}

async function executeRuleOperation(
  op: RuleOperation,
  client: ControllerApi,
  execution: Execution,
  call: Call
): Promise<void> {
  const { desired, live } = op
  switch (op.kind) {
    case 'create':
      if (!desired) throw new Error(`${op.id} has no desired rule`)
      try {
        await call(() => client.createRule(desired))
      } catch (error) {
        if (!(error instanceof ConflictError)) throw error
        await call(() => client.updateRule(desired))
        execution.note = 'already present'
      }
      return
    case 'update':
      if (!desired) throw new Error(`${op.id} has no desired rule`)
      try {
        await call(() => client.updateRule(desired, live ? ruleKeyOf(live) : undefined))
      } catch (error) {
        if (!(error instanceof NotFoundError)) throw error
        try {
          await call(() => client.createRule(desired))
          execution.note = 'recreated'
        } catch (recreateError) {
          if (!(recreateError instanceof ConflictError)) throw recreateError
          await call(() => client.updateRule(desired))
          execution.note = 'already present'
        }
      }
      return
    case 'delete':
      if (!live) throw new Error(`${op.id} has no live rule`)
      try {
        await call(() => client.deleteRule(ruleKeyOf(live)))
      } catch (error) {
        if (!(error instanceof NotFoundError)) throw error
        execution.note = 'already absent'
      }
      return
  }
}
