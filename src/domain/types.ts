/**
 * netstate Domain Types
 *
 * Config Model shared by desired and live state, plus the operation,
 * plan and report shapes of the reconciliation pipeline.
 */

// ============================================================================
// Config Model
// ============================================================================

/** VLAN tag of the externally managed management network */
export const MANAGEMENT_VLAN = 1

export const MIN_VLAN = 1
export const MAX_VLAN = 4094

export interface DhcpScope {
  enabled: boolean
  start?: string
  stop?: string
  leaseSeconds?: number
  dnsServers?: readonly string[]
}

export interface NetworkSegment {
  /** VLAN tag, the segment's identity */
  vlan: number
  name: string
  /** Network address in CIDR notation, host bits zero */
  subnet: string
  gateway: string
  dhcp: DhcpScope
  domainName?: string
  igmpSnooping: boolean
  enabled: boolean
}

export const FIREWALL_CHAINS = [
  'LAN-IN',
  'LAN-OUT',
  'LAN-LOCAL',
  'WAN-IN',
  'WAN-OUT',
  'WAN-LOCAL',
  'GUEST-IN',
  'GUEST-OUT',
  'GUEST-LOCAL'
] as const

export type FirewallChain = typeof FIREWALL_CHAINS[number]

export const FIREWALL_PROTOCOLS = ['all', 'tcp', 'udp', 'tcp_udp', 'icmp'] as const

export type FirewallProtocol = typeof FIREWALL_PROTOCOLS[number]

export const FIREWALL_ACTIONS = ['allow', 'deny'] as const

export type FirewallAction = typeof FIREWALL_ACTIONS[number]

export type Selector =
  | { kind: 'any' }
  | { kind: 'segment'; vlan: number }
  | { kind: 'address'; cidr: string }

export interface PortRange {
  from: number
  to: number
}

export interface FirewallRule {
  chain: FirewallChain
  /** Position within the chain; chain + priority is the rule's identity */
  priority: number
  name: string
  source: Selector
  destination: Selector
  protocol: FirewallProtocol
  ports?: PortRange
  action: FirewallAction
  enabled: boolean
  logging: boolean
}

export interface RuleKey {
  chain: FirewallChain
  priority: number
}

export interface DesiredState {
  readonly segments: readonly NetworkSegment[]
  readonly rules: readonly FirewallRule[]
}

export interface LiveState {
  readonly segments: readonly NetworkSegment[]
  readonly rules: readonly FirewallRule[]
  readonly fetchedAt: string
}

export interface HardwareProfile {
  id: string
  label: string
  /** Ceiling on manageable segments (management network excluded) */
  maxSegments: number
}

// ============================================================================
// Validation
// ============================================================================

/** Check classes, in the order the validator runs them */
export const VIOLATION_CLASSES = ['structural', 'uniqueness', 'referential', 'hardware'] as const

export type ViolationClass = typeof VIOLATION_CLASSES[number]

export interface Violation {
  class: ViolationClass
  /** Path of the offending field, e.g. segments[2].subnet */
  field: string
  value: unknown
  /** Machine-readable rule identifier */
  rule: string
  message: string
}

export type ValidationResult =
  | { ok: true; state: DesiredState }
  | { ok: false; stage: ViolationClass; violations: Violation[] }

// ============================================================================
// Operations & Plan
// ============================================================================

export type OperationKind = 'create' | 'update' | 'delete'

export type ResourceType = 'segment' | 'rule'

export interface FieldChange {
  field: string
  from: unknown
  to: unknown
}

interface OperationBase {
  /** Derived from target identity, e.g. segment:30:create */
  id: string
  kind: OperationKind
  /** Human-readable identity, e.g. vlan 30 or LAN-IN/2000 */
  key: string
  changes: readonly FieldChange[]
  /** VLAN tags referenced by the desired side of the operation */
  references: readonly number[]
  dependsOn: readonly string[]
}

export interface SegmentOperation extends OperationBase {
  resource: 'segment'
  desired: NetworkSegment | null
  live: NetworkSegment | null
}

export interface RuleOperation extends OperationBase {
  resource: 'rule'
  desired: FirewallRule | null
  live: FirewallRule | null
}

export type Operation = SegmentOperation | RuleOperation

export interface PlanSummary {
  creates: number
  updates: number
  deletes: number
  excluded: number
}

export interface ReconciliationPlan {
  id: string
  generatedAt: string
  /** Topologically ordered */
  operations: readonly Operation[]
  /** Operations grouped by dependency depth; each level only depends on earlier ones */
  levels: readonly (readonly string[])[]
  /** Operations dropped by the protection filter */
  excluded: readonly Operation[]
  summary: PlanSummary
}

export type PlanningIssueCode = 'CYCLE_DETECTED' | 'UNRESOLVED_DEPENDENCY' | 'UNRESOLVED_REFERENCE'

export interface PlanningIssue {
  code: PlanningIssueCode
  /** Operation ids involved (the cycle, or the dependent operation) */
  operations: string[]
  /** Missing operation id or segment identity */
  missing?: string
  message: string
}

// ============================================================================
// Apply
// ============================================================================

export type OperationOutcome = 'succeeded' | 'failed' | 'skipped' | 'not-attempted'

export interface OperationResult {
  id: string
  action: string
  outcome: OperationOutcome
  attempts: number
  durationMs: number
  /** Convergence note, e.g. "already absent" */
  note?: string
  error?: { code: string; message: string }
  /** For skipped operations: failed operations upstream */
  blockedBy?: string[]
  /** For not-attempted operations */
  reason?: 'halted' | 'aborted'
}

export type ApplyStatus = 'noop' | 'success' | 'partial' | 'failed' | 'aborted'

export interface SnapshotHandle {
  id: string
  driver: string
  location: string
  checksum: string
  createdAt: string
}

export interface ApplyReport {
  planId: string
  dryRun: boolean
  status: ApplyStatus
  /** Rendered intended actions, in plan order; identical in dry and live runs */
  actions: string[]
  results: OperationResult[]
  succeeded: string[]
  failed: string[]
  skipped: string[]
  notAttempted: string[]
  snapshot?: SnapshotHandle
  /** Set when a fatal error halted the run */
  haltedBy?: { id: string; code: string; message: string }
  startedAt: string
  finishedAt: string
}

// ============================================================================
// Identity helpers
// ============================================================================

export function segmentKey(vlan: number): string {
  return `vlan ${vlan}`
}

export function ruleKey(rule: RuleKey): string {
  return `${rule.chain}/${rule.priority}`
}

export function ruleKeyOf(rule: FirewallRule): RuleKey {
  return { chain: rule.chain, priority: rule.priority }
}

export function operationId(resource: ResourceType, identity: string, kind: OperationKind): string {
  return `${resource}:${identity}:${kind}`
}

export function segmentOperationId(vlan: number, kind: OperationKind): string {
  return operationId('segment', String(vlan), kind)
}

export function ruleOperationId(key: RuleKey, kind: OperationKind): string {
  return operationId('rule', `${key.chain}:${key.priority}`, kind)
}

export function isFirewallChain(value: unknown): value is FirewallChain {
  return FIREWALL_CHAINS.some(chain => chain === value)
}

export function isFirewallProtocol(value: unknown): value is FirewallProtocol {
  return FIREWALL_PROTOCOLS.some(protocol => protocol === value)
}

export function isFirewallAction(value: unknown): value is FirewallAction {
  return FIREWALL_ACTIONS.some(action => action === value)
}

/** VLAN tags a rule references through its selectors */
export function ruleReferences(rule: FirewallRule): number[] {
  const tags: number[] = []
  for (const selector of [rule.source, rule.destination]) {
    if (selector.kind === 'segment' && !tags.includes(selector.vlan)) {
      tags.push(selector.vlan)
    }
  }
  return tags.sort((a, b) => a - b)
}

export function formatSelector(selector: Selector): string {
  switch (selector.kind) {
    case 'any':
      return 'any'
    case 'segment':
      return `vlan ${selector.vlan}`
    case 'address':
      return selector.cidr
  }
}

export function emptyPlanSummary(): PlanSummary {
  return { creates: 0, updates: 0, deletes: 0, excluded: 0 }
}
