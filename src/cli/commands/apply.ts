/**
 * netstate `apply` Command
 *
 * Runs the full pipeline: validate, fetch, diff, plan, snapshot, apply.
 * Apply is best-effort: operations whose dependencies failed are skipped,
 * everything else runs. Ctrl+C stops between operations.
 *
 * Usage:
 *   netstate apply                        Apply with a pre-apply snapshot
 *   netstate apply --dry-run              Print intended actions only
 *   netstate apply --concurrency 4        Run independent operations in parallel
 *   netstate apply --no-snapshot          Skip the pre-apply snapshot
 *   netstate apply --json                 ApplyReport as JSON
 */

import { RetryingController } from '../../controller/retrying.js'
import { reconcile } from '../../domain/reconcile.js'
import { readDesiredStateDocument } from '../../lib/config-loader.js'
import type { ExitCode } from '../../lib/errors.js'
import { createSnapshotDriver, snapshotProvider } from '../../lib/snapshot.js'
import type { CliContext } from '../lib/context.js'
import { withController } from '../lib/create-client.js'
import {
  logRetry,
  planText,
  printApplyFooter,
  printOperationResult,
  printPlanningIssues,
  printViolations,
  reportSummary
} from '../lib/report.js'
import * as ui from '../ui.js'

export interface ApplyCommandOptions {
  dryRun?: boolean
  json?: boolean
}

export async function runApply(ctx: CliContext, options: ApplyCommandOptions): Promise<ExitCode> {
  const { settings } = ctx
  const dryRun = options.dryRun ?? false
  const document = readDesiredStateDocument(settings.desiredStatePath)

  return withController(settings.controller, async (controller) => {
    const snapshot = !dryRun && settings.apply.snapshot
      ? snapshotProvider(createSnapshotDriver(
        settings.snapshots.driver,
        settings.snapshots.dir,
        new RetryingController(controller, { ...settings.apply.retry, onRetry: logRetry })
      ))
      : undefined

    if (!dryRun && !snapshot) {
      ui.warn('Applying without a pre-apply snapshot')
    }

    const outcome = await reconcile({
      mode: dryRun ? 'dry-run' : 'apply',
      document,
      profile: settings.hardwareProfile,
      controller,
      retry: settings.apply.retry,
      concurrency: settings.apply.concurrency,
      snapshot,
      signal: ctx.signal,
      label: settings.controller.site,
      onOperation: options.json ? undefined : printOperationResult,
      onRetry: logRetry
    })

    switch (outcome.stage) {
      case 'validate':
        if (outcome.error) printViolations(outcome.error)
        return outcome.exitCode
      case 'plan':
        printPlanningIssues(outcome.error)
        return outcome.exitCode
      case 'apply': {
        const { plan, report } = outcome
        if (options.json) {
          ui.outputJson(report)
          return outcome.exitCode
        }
        if (dryRun) {
          ui.output(planText(plan))
          ui.log(reportSummary(report))
          return outcome.exitCode
        }
        ui.output(report.actions.length === 0 ? 'No changes. Live state matches desired state.' : reportSummary(report))
        printApplyFooter(report)
        return outcome.exitCode
      }
    }
  })
}
