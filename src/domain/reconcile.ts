/**
 * Reconciliation pipeline
 *
 * validate → fetch → diff → plan → apply, stopping where the run mode
 * ends:
 *   validate  no network call
 *   dry-run   fetch, diff, plan and render; nothing is mutated
 *   apply     full pipeline
 *
 * Validation and planning failures come back as outcomes with their exit
 * code. Controller and snapshot failures before the first operation are
 * thrown.
 */

import type { ControllerApi } from '../controller/api.js'
import { RetryingController } from '../controller/retrying.js'
import { DesiredStateInvalidError, EXIT_CODES, InvalidConfigError, PlanningError, type ExitCode } from '../lib/errors.js'
import type { RetryPolicy } from '../lib/retry.js'
import { apply, type SnapshotProvider } from './apply.js'
import { diff } from './diff.js'
import { fetchLiveState } from './live.js'
import { plan } from './plan.js'
import type {
  ApplyReport,
  ApplyStatus,
  DesiredState,
  HardwareProfile,
  LiveState,
  OperationResult,
  ReconciliationPlan
} from './types.js'
import { validate } from './validator.js'

export type RunMode = 'validate' | 'dry-run' | 'apply'

export interface ReconcileOptions {
  mode: RunMode
  /** Parsed desired-state document */
  document: unknown
  profile: HardwareProfile
  /** Required unless mode is validate */
  controller?: ControllerApi
  retry?: Partial<RetryPolicy>
  concurrency?: number
  snapshot?: SnapshotProvider
  signal?: AbortSignal
  /** Plan id prefix */
  label?: string
  now?: Date
  sleep?: (ms: number) => Promise<void>
  onOperation?: (result: OperationResult) => void
  onRetry?: (call: string, attempt: number, error: unknown, delayMs: number) => void
}

export type RunOutcome =
  | { mode: RunMode; stage: 'validate'; exitCode: ExitCode; desired?: DesiredState; error?: DesiredStateInvalidError }
  | { mode: RunMode; stage: 'plan'; exitCode: ExitCode; desired: DesiredState; live: LiveState; error: PlanningError }
  | { mode: RunMode; stage: 'apply'; exitCode: ExitCode; desired: DesiredState; live: LiveState; plan: ReconciliationPlan; report: ApplyReport }

export function exitCodeForStatus(status: ApplyStatus): ExitCode {
  switch (status) {
    case 'noop':
    case 'success':
      return EXIT_CODES.success
    case 'partial':
      return EXIT_CODES.partial
    case 'failed':
    case 'aborted':
      return EXIT_CODES.fatal
  }
}

export async function reconcile(options: ReconcileOptions): Promise<RunOutcome> {
  const { mode } = options

  const validation = validate(options.document, options.profile)
  if (!validation.ok) {
    return {
      mode,
      stage: 'validate',
      exitCode: EXIT_CODES.validation,
      error: new DesiredStateInvalidError(validation.stage, validation.violations)
    }
  }
  const desired = validation.state

  if (mode === 'validate') {
    return { mode, stage: 'validate', exitCode: EXIT_CODES.success, desired }
  }

  if (!options.controller) {
    throw new InvalidConfigError(`a controller is required for ${mode}`)
  }

  const { onRetry, sleep } = options
  const reader = new RetryingController(options.controller, { ...options.retry, onRetry, sleep })
  const live = await fetchLiveState(reader)

  let reconciliationPlan: ReconciliationPlan
  try {
    const operations = diff(desired, live, { includeProtected: true })
    reconciliationPlan = plan(operations, { desired, live }, { now: options.now, label: options.label })
  } catch (error) {
    if (error instanceof PlanningError) {
      return { mode, stage: 'plan', exitCode: EXIT_CODES.planning, desired, live, error }
    }
    throw error
  }

  const report = await apply(reconciliationPlan, {
    controller: options.controller,
    dryRun: mode === 'dry-run',
    concurrency: options.concurrency,
    retry: options.retry,
    snapshot: options.snapshot,
    signal: options.signal,
    sleep,
    onOperation: options.onOperation,
    onRetry
  })

  return {
    mode,
    stage: 'apply',
    exitCode: exitCodeForStatus(report.status),
    desired,
    live,
    plan: reconciliationPlan,
    report
  }
}
