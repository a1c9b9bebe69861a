/**
 * Human-readable rendering of outcomes and errors (stderr)
 */

import { ApplyAbortedError, DesiredStateInvalidError, PlanningError, isNetstateError } from '../../lib/errors.js'
import type { ApplyReport, OperationResult, ReconciliationPlan } from '../../domain/types.js'
import { renderPlanText } from '../../domain/plan.js'
import { c, colorPlanLine, symbols } from './colors.js'
import * as ui from '../ui.js'

export function printViolations(error: DesiredStateInvalidError): void {
  ui.error(error.message)
  for (const v of error.violations) {
    ui.log(`  ${symbols.bullet} ${c.highlight(v.field)} ${v.message} ${c.muted(`[${v.rule}]`)}`)
  }
}

export function printPlanningIssues(error: PlanningError): void {
  ui.error(`Planning failed with ${error.issues.length} issue${error.issues.length === 1 ? '' : 's'}`)
  for (const issue of error.issues) {
    ui.log(`  ${symbols.bullet} ${c.muted(`[${issue.code}]`)} ${issue.message}`)
  }
}

/**
 * Plan text for stdout, colored only when stdout is a terminal
 */
export function planText(plan: ReconciliationPlan): string {
  const text = renderPlanText(plan)
  return ui.isTTY ? text.split('\n').map(colorPlanLine).join('\n') : text
}

/**
 * Progress line for one finished operation
 */
export function printOperationResult(result: OperationResult): void {
  const note = result.note ? c.muted(` (${result.note})`) : ''
  const retries = result.attempts > 1 ? c.muted(` [${result.attempts} attempts]`) : ''

  switch (result.outcome) {
    case 'succeeded':
      ui.log(`${symbols.success} ${result.action}${note}${retries}`)
      break
    case 'failed':
      ui.log(`${symbols.error} ${result.action}${retries}`)
      if (result.error) {
        ui.log(`    ${c.error(`${result.error.code}: ${result.error.message}`)}`)
      }
      break
    case 'skipped':
      ui.log(`${symbols.warning} ${c.warning('skipped')} ${result.action} ${c.muted(`(blocked by ${(result.blockedBy ?? []).join(', ')})`)}`)
      break
    case 'not-attempted':
      ui.verbose(`not attempted (${result.reason ?? 'halted'}): ${result.action}`)
      break
  }
}

export function reportSummary(report: ApplyReport): string {
  if (report.dryRun) {
    return report.actions.length === 0
      ? 'Dry run: nothing to do'
      : `Dry run: ${report.actions.length} operation${report.actions.length === 1 ? '' : 's'} would run`
  }

  const parts = [
    `${report.succeeded.length} succeeded`,
    `${report.failed.length} failed`,
    `${report.skipped.length} skipped`,
    `${report.notAttempted.length} not attempted`
  ]
  return `Apply ${report.status}: ${parts.join(', ')}`
}

/**
 * Closing diagnostics for a live apply
 */
export function printApplyFooter(report: ApplyReport): void {
  if (report.snapshot) {
    ui.log(`${c.label('Snapshot:')} ${report.snapshot.id} ${c.muted(report.snapshot.location)}`)
  }

  switch (report.status) {
    case 'noop':
    case 'success':
      ui.success(reportSummary(report))
      break
    case 'partial':
      ui.warn(reportSummary(report))
      ui.log(c.muted('Applied operations stay committed; rerun apply to converge the rest'))
      break
    case 'failed':
      ui.error(reportSummary(report))
      if (report.haltedBy) {
        ui.error(`Halted by ${report.haltedBy.id}: ${report.haltedBy.code}: ${report.haltedBy.message}`)
      }
      break
    case 'aborted':
      ui.error(new ApplyAbortedError(report.succeeded.length, report.notAttempted.length).message)
      break
  }
}

/**
 * Report an error that escaped a command
 */
export function reportError(error: unknown): void {
  if (error instanceof DesiredStateInvalidError) {
    printViolations(error)
  } else if (error instanceof PlanningError) {
    printPlanningIssues(error)
  } else if (isNetstateError(error)) {
    ui.error(error.message)
  } else {
    ui.error(error instanceof Error ? error.message : String(error))
  }

  if (isNetstateError(error)) {
    if (error.suggestion) {
      ui.log(`  ${c.muted('Suggestion:')} ${error.suggestion}`)
    }
    if (error.context) {
      ui.verbose(`Context: ${JSON.stringify(error.context)}`)
    }
  }
  if (error instanceof Error && error.stack) {
    ui.verbose(error.stack)
  }
}

/**
 * onRetry hook shared by commands that talk to the controller
 */
export function logRetry(call: string, attempt: number, error: unknown, delayMs: number): void {
  const reason = error instanceof Error ? error.message : String(error)
  ui.verbose(`retry ${call} (attempt ${attempt} failed: ${reason}); waiting ${delayMs}ms`)
}
