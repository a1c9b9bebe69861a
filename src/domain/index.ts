/**
 * netstate Domain Layer
 *
 * The reconciliation engine:
 * - types/model: Config Model for desired and live state
 * - validator: fail-fast desired-state checks
 * - live: state fetcher
 * - diff/protection/plan: operations, management exclusion, ordering
 * - apply: execution with retry, convergence and partial-failure tracking
 * - reconcile: run modes
 */

// Types
export type {
  DhcpScope,
  NetworkSegment,
  FirewallChain,
  FirewallProtocol,
  FirewallAction,
  Selector,
  PortRange,
  FirewallRule,
  RuleKey,
  DesiredState,
  LiveState,
  HardwareProfile,
  ViolationClass,
  Violation,
  ValidationResult,
  OperationKind,
  ResourceType,
  FieldChange,
  SegmentOperation,
  RuleOperation,
  Operation,
  PlanSummary,
  ReconciliationPlan,
  PlanningIssueCode,
  PlanningIssue,
  OperationOutcome,
  OperationResult,
  ApplyStatus,
  SnapshotHandle,
  ApplyReport
} from './types.js'

export {
  MANAGEMENT_VLAN,
  MIN_VLAN,
  MAX_VLAN,
  FIREWALL_CHAINS,
  FIREWALL_PROTOCOLS,
  FIREWALL_ACTIONS,
  VIOLATION_CLASSES,
  segmentKey,
  ruleKey,
  ruleKeyOf,
  segmentOperationId,
  ruleOperationId,
  ruleReferences,
  formatSelector
} from './types.js'

// Model
export {
  normalizeSegment,
  normalizeRule,
  createDesiredState,
  createLiveState,
  diffFields,
  structurallyEqual
} from './model.js'

// Validation
export { validate, MIN_PRIORITY, MAX_PRIORITY, MAX_DNS_SERVERS } from './validator.js'

// Live state
export { fetchLiveState } from './live.js'

// Diff & protection
export { diff } from './diff.js'
export type { DiffOptions } from './diff.js'
export { applyProtection, isProtectedOperation, isProtectedVlan } from './protection.js'

// Plan
export {
  plan,
  describeOperation,
  renderPlanText,
  buildPlanMarkdown,
  formatPlan,
  planHeadline
} from './plan.js'
export type { PlanState, PlanOptions, PlanFormat } from './plan.js'

// Apply
export { apply } from './apply.js'
export type { ApplyOptions, SnapshotProvider } from './apply.js'

// Pipeline
export { reconcile, exitCodeForStatus } from './reconcile.js'
export type { RunMode, RunOutcome, ReconcileOptions } from './reconcile.js'
