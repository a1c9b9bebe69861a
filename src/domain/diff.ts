/**
 * Diff Engine
 *
 * Compares desired and live state and produces the minimal set of
 * create/update/delete operations, annotated with dependency edges.
 *
 * Matching:
 *   - segments by VLAN tag
 *   - rules by chain + priority; a desired-only and a live-only rule with
 *     the same name in the same chain are one reorder (update), never a
 *     delete + create
 *
 * Edges:
 *   - rule create/update → create of every segment it references that
 *     is created in the same plan
 *   - segment delete → every rule delete/update whose live version
 *     referenced that segment
 *   - segment create/update → delete of every live-only segment whose
 *     subnet overlaps or whose name matches the desired segment
 */

import { cidrsOverlap, parseCidr } from '../lib/cidr.js'
import { diffFields } from './model.js'
import { applyProtection } from './protection.js'
import {
  ruleKey,
  ruleKeyOf,
  ruleOperationId,
  ruleReferences,
  segmentKey,
  segmentOperationId,
  type DesiredState,
  type FirewallRule,
  type LiveState,
  type NetworkSegment,
  type Operation,
  type OperationKind,
  type RuleOperation,
  type SegmentOperation
} from './types.js'

export interface DiffOptions {
  /**
   * Keep operations on protected segments in the output so the planner can
   * report them as excluded. Default: false.
   */
  includeProtected?: boolean
}

/**
 * Compute operations moving live state to desired state, sorted by id
 *
 * @example
 * ```ts
 * const operations = diff(desired, await fetchLiveState(controller))
 * ```
 */
export function diff(desired: DesiredState, live: LiveState, options: DiffOptions = {}): Operation[] {
  const segmentOps = diffSegments(desired.segments, live.segments)
  const ruleOps = diffRules(desired.rules, live.rules)

  linkDependencies(segmentOps, ruleOps)

  const operations: Operation[] = [...segmentOps, ...ruleOps].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
  return options.includeProtected ? operations : applyProtection(operations).kept
}

// ============================================================================
// Segments
// ============================================================================

function diffSegments(desired: readonly NetworkSegment[], live: readonly NetworkSegment[]): SegmentOperation[] {
  const operations: SegmentOperation[] = []

  const liveMap = new Map<number, NetworkSegment>()
  for (const segment of live) {
    liveMap.set(segment.vlan, segment)
  }

  const matched = new Set<number>()

  for (const target of desired) {
    const current = liveMap.get(target.vlan)

    if (!current) {
      operations.push(segmentOperation('create', target, null))
    } else {
      matched.add(target.vlan)
      const op = segmentOperation('update', target, current)
      if (op.changes.length > 0) {
        operations.push(op)
      }
    }
  }

  for (const current of live) {
    if (!matched.has(current.vlan)) {
      operations.push(segmentOperation('delete', null, current))
    }
  }

  return operations
}

function segmentOperation(
  kind: OperationKind,
  desired: NetworkSegment | null,
  live: NetworkSegment | null
): SegmentOperation {
  const subject = desired ?? live
  if (!subject) {
    throw new Error('segment operation needs a desired or live segment')
  }
  const vlan = subject.vlan
  return {
    id: segmentOperationId(vlan, kind),
    kind,
    resource: 'segment',
    key: segmentKey(vlan),
    desired,
    live,
    changes: diffFields(live ?? {}, desired ?? {}),
    references: [],
    dependsOn: []
  }
}

// ============================================================================
// Firewall rules
// ============================================================================

function diffRules(desired: readonly FirewallRule[], live: readonly FirewallRule[]): RuleOperation[] {
  const operations: RuleOperation[] = []

  const liveMap = new Map<string, FirewallRule>()
  for (const rule of live) {
    liveMap.set(ruleKey(rule), rule)
  }
  const desiredKeys = new Set(desired.map(rule => ruleKey(rule)))

  const desiredOnly: FirewallRule[] = []

  for (const target of desired) {
    const key = ruleKey(target)
    const current = liveMap.get(key)

    if (!current) {
      desiredOnly.push(target)
    } else {
      const op = ruleOperation('update', target, current)
      if (op.changes.length > 0) {
        operations.push(op)
      }
    }
  }

  const liveOnly = live.filter(rule => !desiredKeys.has(ruleKey(rule)))

  // Same name in the same chain on both sides: the rule moved
  const moved = new Set<FirewallRule>()
  for (const target of desiredOnly) {
    const previous = liveOnly.find(rule =>
      !moved.has(rule) && rule.chain === target.chain && rule.name === target.name
    )
    if (previous) {
      moved.add(previous)
      operations.push(ruleOperation('update', target, previous))
    } else {
      operations.push(ruleOperation('create', target, null))
    }
  }

  for (const current of liveOnly) {
    if (!moved.has(current)) {
      operations.push(ruleOperation('delete', null, current))
    }
  }

  return operations
}

function ruleOperation(kind: OperationKind, desired: FirewallRule | null, live: FirewallRule | null): RuleOperation {
  const subject = desired ?? live
  if (!subject) {
    throw new Error('rule operation needs a desired or live rule')
  }
  return {
    id: ruleOperationId(ruleKeyOf(subject), kind),
    kind,
    resource: 'rule',
    key: live && desired && live.priority !== desired.priority
      ? `${ruleKey(live)} -> ${ruleKey(desired)}`
      : ruleKey(subject),
    desired,
    live,
    changes: diffFields(live ?? {}, desired ?? {}),
    references: desired ? ruleReferences(desired) : [],
    dependsOn: []
  }
}

// ============================================================================
// Dependency edges
// ============================================================================

function linkDependencies(segmentOps: SegmentOperation[], ruleOps: RuleOperation[]): void {
  const created = new Set<number>()
  for (const op of segmentOps) {
    if (op.kind === 'create' && op.desired) created.add(op.desired.vlan)
  }

  for (const op of ruleOps) {
    if (op.kind === 'delete' || !op.desired) continue
    op.dependsOn = op.references
      .filter(vlan => created.has(vlan))
      .map(vlan => segmentOperationId(vlan, 'create'))
  }

  for (const op of segmentOps) {
    if (op.kind !== 'delete' || !op.live) continue
    const vlan = op.live.vlan
    op.dependsOn = ruleOps
      .filter(rule => rule.kind !== 'create' && rule.live && ruleReferences(rule.live).includes(vlan))
      .map(rule => rule.id)
      .sort()
  }

  // The controller rejects a second segment with the same subnet or name
  const deletes = segmentOps.filter(op => op.kind === 'delete')
  for (const op of segmentOps) {
    if (op.kind === 'delete' || !op.desired) continue
    if (op.kind === 'update' && !op.changes.some(change => change.field === 'subnet' || change.field === 'name')) continue
    const desired = op.desired
    const subnet = parseCidr(desired.subnet)
    op.dependsOn = deletes
      .filter(del => {
        if (!del.live) return false
        if (del.live.name.trim() === desired.name.trim()) return true
        const liveSubnet = parseCidr(del.live.subnet)
        return subnet !== null && liveSubnet !== null && cidrsOverlap(subnet, liveSubnet)
      })
      .map(del => del.id)
      .sort()
  }
}
