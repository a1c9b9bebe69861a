/**
 * Config Model helpers
 *
 * Canonical form, immutability and structural comparison for segments and
 * rules. Desired and live state go through the same normalizers, so two
 * objects describing the same configuration compare equal field by field.
 */

import type {
  DesiredState,
  DhcpScope,
  FieldChange,
  FirewallRule,
  LiveState,
  NetworkSegment,
  Selector
} from './types.js'

/** Lease time the controller applies when none is configured */
export const DEFAULT_LEASE_SECONDS = 86400

const PORT_PROTOCOLS = new Set(['tcp', 'udp', 'tcp_udp'])

// ============================================================================
// Normalization
// ============================================================================

export function normalizeDhcp(dhcp: DhcpScope): DhcpScope {
  if (!dhcp.enabled) {
    return { enabled: false }
  }

  const scope: DhcpScope = {
    enabled: true,
    start: dhcp.start?.trim(),
    stop: dhcp.stop?.trim(),
    leaseSeconds: dhcp.leaseSeconds ?? DEFAULT_LEASE_SECONDS
  }
  const dns = (dhcp.dnsServers ?? []).map(s => s.trim()).filter(s => s.length > 0)
  if (dns.length > 0) {
    scope.dnsServers = dns
  }
  return scope
}

export function normalizeSegment(segment: NetworkSegment): NetworkSegment {
  const normalized: NetworkSegment = {
    vlan: segment.vlan,
    name: segment.name.trim(),
    subnet: segment.subnet.trim(),
    gateway: segment.gateway.trim(),
    dhcp: normalizeDhcp(segment.dhcp),
    igmpSnooping: segment.igmpSnooping,
    enabled: segment.enabled
  }
  const domainName = segment.domainName?.trim()
  if (domainName) {
    normalized.domainName = domainName
  }
  return normalized
}

function normalizeSelector(selector: Selector): Selector {
  if (selector.kind === 'address') {
    return { kind: 'address', cidr: selector.cidr.trim() }
  }
  return selector
}

export function normalizeRule(rule: FirewallRule): FirewallRule {
  const normalized: FirewallRule = {
    chain: rule.chain,
    priority: rule.priority,
    name: rule.name.trim(),
    source: normalizeSelector(rule.source),
    destination: normalizeSelector(rule.destination),
    protocol: rule.protocol,
    action: rule.action,
    enabled: rule.enabled,
    logging: rule.logging
  }
  if (rule.ports && PORT_PROTOCOLS.has(rule.protocol)) {
    normalized.ports = { from: rule.ports.from, to: rule.ports.to }
  }
  return normalized
}

export function compareSegments(a: NetworkSegment, b: NetworkSegment): number {
  return a.vlan - b.vlan
}

export function compareRules(a: FirewallRule, b: FirewallRule): number {
  if (a.chain !== b.chain) return a.chain < b.chain ? -1 : 1
  return a.priority - b.priority
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Build an immutable desired state. Segments and rules are normalized,
 * sorted by identity and deep-frozen.
 */
export function createDesiredState(
  segments: readonly NetworkSegment[],
  rules: readonly FirewallRule[]
): DesiredState {
  return deepFreeze({
    segments: segments.map(normalizeSegment).sort(compareSegments),
    rules: rules.map(normalizeRule).sort(compareRules)
  })
}

export function createLiveState(
  segments: readonly NetworkSegment[],
  rules: readonly FirewallRule[],
  fetchedAt: Date = new Date()
): LiveState {
  return deepFreeze({
    segments: segments.map(normalizeSegment).sort(compareSegments),
    rules: rules.map(normalizeRule).sort(compareRules),
    fetchedAt: fetchedAt.toISOString()
  })
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
    Object.freeze(value)
  }
  return value
}

// ============================================================================
// Structural comparison
// ============================================================================

/**
 * Field-by-field differences between two values. Nested objects produce
 * dotted paths (dhcp.start); arrays compare as a whole.
 */
export function diffFields(from: unknown, to: unknown, prefix = ''): FieldChange[] {
  if (isPlainObject(from) && isPlainObject(to)) {
    const changes: FieldChange[] = []
    const keys = new Set([...Object.keys(from), ...Object.keys(to)])
    for (const key of [...keys].sort()) {
      const path = prefix ? `${prefix}.${key}` : key
      changes.push(...diffFields(from[key], to[key], path))
    }
    return changes
  }

  if (structurallyEqual(from, to)) return []
  return [{ field: prefix || '(value)', from, to }]
}

export function structurallyEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true

  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => structurallyEqual(item, b[i]))
  }

  if (isPlainObject(a) && isPlainObject(b)) {
    const keys = new Set([...Object.keys(a), ...Object.keys(b)])
    for (const key of keys) {
      if (!structurallyEqual(a[key], b[key])) return false
    }
    return true
  }

  return false
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}
