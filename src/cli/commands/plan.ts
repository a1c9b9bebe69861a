/**
 * netstate `plan` Command
 *
 * Fetches live state, diffs it against the desired state and prints the
 * ordered plan. Nothing is mutated.
 *
 * Usage:
 *   netstate plan                         Text plan
 *   netstate plan --format markdown       Markdown (for PR comments)
 *   netstate plan --json                  Plan as JSON
 */

import { reconcile } from '../../domain/reconcile.js'
import { formatPlan, type PlanFormat } from '../../domain/plan.js'
import { readDesiredStateDocument } from '../../lib/config-loader.js'
import type { ExitCode } from '../../lib/errors.js'
import type { CliContext } from '../lib/context.js'
import { withController } from '../lib/create-client.js'
import { logRetry, planText, printPlanningIssues, printViolations } from '../lib/report.js'
import * as ui from '../ui.js'

export const PLAN_FORMATS: readonly PlanFormat[] = ['text', 'markdown', 'json']

export interface PlanCommandOptions {
  json?: boolean
  format?: PlanFormat
}

export async function runPlan(ctx: CliContext, options: PlanCommandOptions): Promise<ExitCode> {
  const { settings } = ctx
  const format: PlanFormat = options.json ? 'json' : options.format ?? 'text'
  const document = readDesiredStateDocument(settings.desiredStatePath)

  return withController(settings.controller, async (controller) => {
    const outcome = await reconcile({
      mode: 'dry-run',
      document,
      profile: settings.hardwareProfile,
      controller,
      retry: settings.apply.retry,
      signal: ctx.signal,
      label: settings.controller.site,
      onRetry: logRetry
    })

    switch (outcome.stage) {
      case 'validate':
        if (outcome.error) printViolations(outcome.error)
        return outcome.exitCode
      case 'plan':
        printPlanningIssues(outcome.error)
        return outcome.exitCode
      case 'apply':
        ui.verbose(`Live state: ${outcome.live.segments.length} segments, ${outcome.live.rules.length} rules`)
        ui.output(format === 'text' ? planText(outcome.plan) : formatPlan(outcome.plan, format))
        return outcome.exitCode
    }
  })
}
