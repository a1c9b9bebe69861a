/**
 * Planner
 *
 * Turns diff operations into a ReconciliationPlan: protection filter,
 * dependency and reference checks, then a deterministic topological sort.
 * Planning fails closed; every issue found is reported in one
 * PlanningError and nothing is executed.
 *
 * Plans live for one invocation and are never written to disk.
 */

import { PlanningError } from '../lib/errors.js'
import { applyProtection } from './protection.js'
import {
  emptyPlanSummary,
  formatSelector,
  segmentKey,
  segmentOperationId,
  type DesiredState,
  type LiveState,
  type Operation,
  type PlanSummary,
  type PlanningIssue,
  type ReconciliationPlan,
  type RuleOperation,
  type SegmentOperation
} from './types.js'

export interface PlanState {
  desired: DesiredState
  live: LiveState
}

export interface PlanOptions {
  now?: Date
  /** Prefix of the plan id, usually the site name */
  label?: string
}

export type PlanFormat = 'text' | 'markdown' | 'json'

/**
 * Tie-break between operations ready at the same time
 */
const PHASES: Record<string, number> = {
  'segment:create': 0,
  'segment:update': 1,
  'rule:create': 2,
  'rule:update': 3,
  'rule:delete': 4,
  'segment:delete': 5
}

function phaseOf(op: Operation): number {
  return PHASES[`${op.resource}:${op.kind}`] ?? 6
}

function compareReady(a: Operation, b: Operation): number {
  const phase = phaseOf(a) - phaseOf(b)
  if (phase !== 0) return phase
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}

// ============================================================================
// Planning
// ============================================================================

/**
 * Order operations into an executable plan
 *
 * @throws PlanningError with every UNRESOLVED_DEPENDENCY,
 *   UNRESOLVED_REFERENCE and CYCLE_DETECTED issue found
 */
export function plan(
  operations: readonly Operation[],
  state: PlanState,
  options: PlanOptions = {}
): ReconciliationPlan {
  const { kept, excluded } = applyProtection(operations)
  const issues: PlanningIssue[] = [
    ...checkDependencies(kept, excluded),
    ...checkReferences(kept, state)
  ]

  const { ordered, levels, cycles } = topologicalSort(kept)
  issues.push(...cycles)

  if (issues.length > 0) {
    throw new PlanningError(issues)
  }

  const now = options.now ?? new Date()
  return {
    id: generatePlanId(now, options.label),
    generatedAt: now.toISOString(),
    operations: ordered,
    levels,
    excluded,
    summary: summarize(ordered, excluded.length)
  }
}

function checkDependencies(kept: readonly Operation[], excluded: readonly Operation[]): PlanningIssue[] {
  const ids = new Set(kept.map(op => op.id))
  const protectedIds = new Set(excluded.map(op => op.id))
  const issues: PlanningIssue[] = []

  for (const op of kept) {
    for (const dependency of op.dependsOn) {
      if (ids.has(dependency)) continue
      issues.push({
        code: 'UNRESOLVED_DEPENDENCY',
        operations: [op.id],
        missing: dependency,
        message: protectedIds.has(dependency)
          ? `${op.id} depends on ${dependency}, which targets the protected management network`
          : `${op.id} depends on ${dependency}, which is not part of the plan`
      })
    }
  }

  return issues
}

/**
 * Every segment a rule will reference must exist after the plan runs
 */
function checkReferences(kept: readonly Operation[], state: PlanState): PlanningIssue[] {
  const known = new Set<number>([
    ...state.desired.segments.map(s => s.vlan),
    ...state.live.segments.map(s => s.vlan)
  ])
  const deleted = new Set(kept.filter(op => op.resource === 'segment' && op.kind === 'delete').map(op => op.id))
  const issues: PlanningIssue[] = []

  for (const op of kept) {
    if (op.resource !== 'rule' || op.kind === 'delete') continue
    for (const vlan of op.references) {
      if (!known.has(vlan)) {
        issues.push({
          code: 'UNRESOLVED_REFERENCE',
          operations: [op.id],
          missing: segmentKey(vlan),
          message: `${op.id} references ${segmentKey(vlan)}, which exists in neither desired nor live state`
        })
      } else if (deleted.has(segmentOperationId(vlan, 'delete'))) {
        issues.push({
          code: 'UNRESOLVED_REFERENCE',
          operations: [op.id, segmentOperationId(vlan, 'delete')],
          missing: segmentKey(vlan),
          message: `${op.id} references ${segmentKey(vlan)}, which the same plan deletes`
        })
      }
    }
  }

  return issues
}

interface SortResult {
  ordered: Operation[]
  levels: string[][]
  cycles: PlanningIssue[]
}

/**
 * Kahn's algorithm; ties broken by phase, then id.
 * Edges to unknown ids are ignored here (reported as unresolved).
 */
function topologicalSort(operations: readonly Operation[]): SortResult {
  const byId = new Map(operations.map(op => [op.id, op]))
  const inDegree = new Map<string, number>()
  const dependents = new Map<string, string[]>()

  for (const op of operations) {
    inDegree.set(op.id, 0)
    dependents.set(op.id, [])
  }
  for (const op of operations) {
    for (const dependency of new Set(op.dependsOn)) {
      if (!byId.has(dependency)) continue
      inDegree.set(op.id, (inDegree.get(op.id) ?? 0) + 1)
      dependents.get(dependency)?.push(op.id)
    }
  }

  const ready = operations.filter(op => inDegree.get(op.id) === 0)
  const ordered: Operation[] = []
  const level = new Map<string, number>()

  while (ready.length > 0) {
    ready.sort(compareReady)
    const next = ready.shift()
    if (!next) break
    ordered.push(next)

    const depth = Math.max(-1, ...next.dependsOn.map(id => level.get(id) ?? -1)) + 1
    level.set(next.id, depth)

    for (const dependentId of dependents.get(next.id) ?? []) {
      const remaining = (inDegree.get(dependentId) ?? 0) - 1
      inDegree.set(dependentId, remaining)
      const dependent = byId.get(dependentId)
      if (remaining === 0 && dependent) ready.push(dependent)
    }
  }

  const levels: string[][] = []
  for (const op of ordered) {
    const depth = level.get(op.id) ?? 0
    while (levels.length <= depth) levels.push([])
    levels[depth].push(op.id)
  }

  const unsorted = operations.filter(op => !level.has(op.id))
  return { ordered, levels, cycles: findCycles(unsorted, byId) }
}

/**
 * Extract distinct cycles among operations Kahn's algorithm could not place
 */
function findCycles(unsorted: readonly Operation[], byId: ReadonlyMap<string, Operation>): PlanningIssue[] {
  const pending = new Set(unsorted.map(op => op.id))
  const reported = new Set<string>()
  const issues: PlanningIssue[] = []

  for (const start of [...pending].sort()) {
    if (reported.has(start)) continue

    // Follow unresolved edges until a node repeats
    const path: string[] = []
    const seen = new Map<string, number>()
    let current: string | undefined = start
    while (current !== undefined && !seen.has(current)) {
      seen.set(current, path.length)
      path.push(current)
      const op = byId.get(current)
      current = op?.dependsOn.filter(id => pending.has(id)).sort()[0]
    }
    if (current === undefined) continue

    const cycle = path.slice(seen.get(current) ?? 0)
    if (cycle.some(id => reported.has(id))) continue
    cycle.forEach(id => reported.add(id))

    issues.push({
      code: 'CYCLE_DETECTED',
      operations: cycle,
      message: `Dependency cycle: ${[...cycle, cycle[0]].join(' -> ')}`
    })
  }

  return issues
}

function summarize(operations: readonly Operation[], excluded: number): PlanSummary {
  const summary = emptyPlanSummary()
  for (const op of operations) {
    if (op.kind === 'create') summary.creates++
    else if (op.kind === 'update') summary.updates++
    else summary.deletes++
  }
  summary.excluded = excluded
  return summary
}

/**
 * Plan id: label-timestamp
 */
export function generatePlanId(date: Date, label: string = 'plan'): string {
  const ts = date.toISOString().replace(/[:.]/g, '-')
  return `${sanitize(label) || 'plan'}-${ts}`
}

function sanitize(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, '-')
    .replace(/^-+|-+$/g, '')
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * One-line intended action. Dry-run and live runs log exactly these lines.
 */
export function describeOperation(op: Operation): string {
  return op.resource === 'segment' ? describeSegmentOperation(op) : describeRuleOperation(op)
}

function changedFields(op: Operation): string {
  return op.changes.map(change => change.field).join(', ')
}

function describeSegmentOperation(op: SegmentOperation): string {
  const segment = op.desired ?? op.live
  const name = segment ? ` "${segment.name}"` : ''
  switch (op.kind) {
    case 'create':
      return `create segment ${op.key}${name} ${op.desired?.subnet ?? ''}`.trimEnd()
    case 'update':
      return `update segment ${op.key}${name}: ${changedFields(op)}`
    case 'delete':
      return `delete segment ${op.key}${name}`
  }
}

function describeRuleOperation(op: RuleOperation): string {
  const rule = op.desired ?? op.live
  const name = rule ? ` "${rule.name}"` : ''
  switch (op.kind) {
    case 'create': {
      const detail = op.desired
        ? ` ${op.desired.action} ${op.desired.protocol} ${formatSelector(op.desired.source)} -> ${formatSelector(op.desired.destination)}`
        : ''
      return `create rule ${op.key}${name}${detail}`
    }
    case 'update':
      return `update rule ${op.key}${name}: ${changedFields(op)}`
    case 'delete':
      return `delete rule ${op.key}${name}`
  }
}

const KIND_ICONS = { create: '+', update: '~', delete: '-' } as const

export function planHeadline(plan: ReconciliationPlan): string {
  const { creates, updates, deletes } = plan.summary
  if (plan.operations.length === 0) {
    return 'No changes. Live state matches desired state.'
  }
  return `Plan: ${creates} to create, ${updates} to update, ${deletes} to delete`
}

export function renderPlanText(plan: ReconciliationPlan): string {
  const lines = [planHeadline(plan)]
  for (const op of plan.operations) {
    lines.push(`  ${KIND_ICONS[op.kind]} ${describeOperation(op)}`)
  }
  for (const op of plan.excluded) {
    lines.push(`  ! skipped (protected): ${describeOperation(op)}`)
  }
  return lines.join('\n')
}

/**
 * Build markdown representation of a plan.
 */
export function buildPlanMarkdown(plan: ReconciliationPlan): string {
  const lines: string[] = []

  lines.push('# Network Plan')
  lines.push('')
  lines.push(`- **ID:** ${plan.id}`)
  lines.push(`- **Generated:** ${plan.generatedAt}`)
  lines.push('')

  lines.push('## Summary')
  lines.push('')
  lines.push(`| Metric | Count |`)
  lines.push(`|--------|-------|`)
  lines.push(`| To create | ${plan.summary.creates} |`)
  lines.push(`| To update | ${plan.summary.updates} |`)
  lines.push(`| To delete | ${plan.summary.deletes} |`)
  if (plan.summary.excluded > 0) {
    lines.push(`| Protected (excluded) | ${plan.summary.excluded} |`)
  }
  lines.push('')

  if (plan.operations.length > 0) {
    lines.push('## Operations')
    lines.push('')
    plan.operations.forEach((op, index) => {
      const after = op.dependsOn.length > 0 ? ` (after ${op.dependsOn.join(', ')})` : ''
      lines.push(`${index + 1}. \`${KIND_ICONS[op.kind]}\` ${describeOperation(op)}${after}`)
    })
    lines.push('')
  }

  if (plan.excluded.length > 0) {
    lines.push('## Protected')
    lines.push('')
    for (const op of plan.excluded) {
      lines.push(`- ${describeOperation(op)}`)
    }
    lines.push('')
  }

  return lines.join('\n')
}

export function formatPlan(plan: ReconciliationPlan, format: PlanFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(plan, null, 2)
    case 'markdown':
      return buildPlanMarkdown(plan)
    case 'text':
      return renderPlanText(plan)
  }
}
