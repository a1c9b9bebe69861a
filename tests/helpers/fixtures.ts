/**
 * Builders for segments, rules and desired-state documents used across tests
 */

import type { FirewallRule, NetworkSegment } from '../../src/domain/types.js'

/** A normalized segment on 10.0.<vlan>.0/24 */
export function segment(vlan: number, overrides: Partial<NetworkSegment> = {}): NetworkSegment {
  return {
    vlan,
    name: `vlan${vlan}`,
    subnet: `10.0.${vlan}.0/24`,
    gateway: `10.0.${vlan}.1`,
    dhcp: { enabled: true, start: `10.0.${vlan}.100`, stop: `10.0.${vlan}.200`, leaseSeconds: 86400 },
    igmpSnooping: false,
    enabled: true,
    ...overrides
  }
}

/** A normalized rule dropping everything from one VLAN to another */
export function rule(priority: number, overrides: Partial<FirewallRule> = {}): FirewallRule {
  return {
    chain: 'LAN-IN',
    priority,
    name: `rule-${priority}`,
    source: { kind: 'any' },
    destination: { kind: 'any' },
    protocol: 'all',
    action: 'deny',
    enabled: true,
    logging: false,
    ...overrides
  }
}

/** Segment entry as written in network.yaml */
export function segmentEntry(vlan: number, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    vlan,
    name: `vlan${vlan}`,
    subnet: `10.0.${vlan}.0/24`,
    gateway: `10.0.${vlan}.1`,
    dhcp: { start: `10.0.${vlan}.100`, stop: `10.0.${vlan}.200` },
    ...overrides
  }
}

/** Firewall entry as written in network.yaml */
export function ruleEntry(priority: number, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    chain: 'LAN-IN',
    priority,
    name: `rule-${priority}`,
    action: 'deny',
    ...overrides
  }
}

export function document(
  segments: Record<string, unknown>[],
  firewall: Record<string, unknown>[] = []
): Record<string, unknown> {
  return { segments, firewall }
}
