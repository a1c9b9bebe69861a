/**
 * UniFi Network record mapping
 *
 * Converts `rest/networkconf` and `rest/firewallrule` records to the
 * Config Model and back. Controller ids never leave this module and the
 * HTTP client; segments are identified by VLAN tag.
 */

import { joinInterfaceCidr, splitInterfaceCidr } from '../lib/cidr.js'
import { MANAGEMENT_VLAN, isFirewallChain, isFirewallProtocol } from '../domain/types.js'
import type {
  DhcpScope,
  FirewallAction,
  FirewallChain,
  FirewallRule,
  NetworkSegment,
  PortRange,
  Selector
} from '../domain/types.js'

export type UnifiRecord = Record<string, unknown>

/** Network purposes that describe a routed LAN segment */
const LAN_PURPOSES = new Set(['corporate', 'guest'])

const DNS_FIELDS = ['dhcpd_dns_1', 'dhcpd_dns_2', 'dhcpd_dns_3', 'dhcpd_dns_4'] as const

// ============================================================================
// Field access
// ============================================================================

function str(record: UnifiRecord, key: string): string | undefined {
  const value = record[key]
  return typeof value === 'string' && value.length > 0 ? value : undefined
}

function bool(record: UnifiRecord, key: string, fallback: boolean): boolean {
  const value = record[key]
  return typeof value === 'boolean' ? value : fallback
}

function int(record: UnifiRecord, key: string): number | undefined {
  const value = record[key]
  if (typeof value === 'number' && Number.isInteger(value)) return value
  if (typeof value === 'string' && /^\d+$/.test(value)) return Number(value)
  return undefined
}

export function recordId(record: UnifiRecord): string | undefined {
  return str(record, '_id')
}

// ============================================================================
// Chains & actions
// ============================================================================

/** LAN_IN -> LAN-IN */
export function chainFromRuleset(ruleset: string): FirewallChain | undefined {
  const chain = ruleset.replace(/_/g, '-')
  return isFirewallChain(chain) ? chain : undefined
}

/** LAN-IN -> LAN_IN */
export function rulesetFromChain(chain: FirewallChain): string {
  return chain.replace(/-/g, '_')
}

export function actionFromUnifi(action: string): FirewallAction {
  return action === 'accept' ? 'allow' : 'deny'
}

export function actionToUnifi(action: FirewallAction): 'accept' | 'drop' {
  return action === 'allow' ? 'accept' : 'drop'
}

// ============================================================================
// Networks
// ============================================================================

/**
 * VLAN tag of a network record. Untagged LANs map to the management tag.
 */
export function vlanOfNetwork(record: UnifiRecord): number | undefined {
  const purpose = str(record, 'purpose')
  if (!purpose || !LAN_PURPOSES.has(purpose)) return undefined
  if (!bool(record, 'vlan_enabled', false)) return MANAGEMENT_VLAN
  return int(record, 'vlan')
}

export function segmentFromNetwork(record: UnifiRecord): NetworkSegment | undefined {
  const vlan = vlanOfNetwork(record)
  const ipSubnet = str(record, 'ip_subnet')
  const iface = ipSubnet ? splitInterfaceCidr(ipSubnet) : null
  if (vlan === undefined || !iface) return undefined

  const dhcp: DhcpScope = { enabled: bool(record, 'dhcpd_enabled', false) }
  if (dhcp.enabled) {
    dhcp.start = str(record, 'dhcpd_start')
    dhcp.stop = str(record, 'dhcpd_stop')
    dhcp.leaseSeconds = int(record, 'dhcpd_leasetime')
    if (bool(record, 'dhcpd_dns_enabled', false)) {
      dhcp.dnsServers = DNS_FIELDS.map(field => str(record, field)).filter((s): s is string => s !== undefined)
    }
  }

  return {
    vlan,
    name: str(record, 'name') ?? `vlan${vlan}`,
    subnet: iface.subnet,
    gateway: iface.gateway,
    dhcp,
    domainName: str(record, 'domain_name'),
    igmpSnooping: bool(record, 'igmp_snooping', false),
    enabled: bool(record, 'enabled', true)
  }
}

export function networkFromSegment(segment: NetworkSegment): UnifiRecord {
  const dns = segment.dhcp.dnsServers ?? []
  const record: UnifiRecord = {
    name: segment.name,
    purpose: 'corporate',
    networkgroup: 'LAN',
    vlan_enabled: true,
    vlan: segment.vlan,
    ip_subnet: joinInterfaceCidr(segment.subnet, segment.gateway),
    dhcpd_enabled: segment.dhcp.enabled,
    domain_name: segment.domainName ?? '',
    igmp_snooping: segment.igmpSnooping,
    enabled: segment.enabled
  }

  if (segment.dhcp.enabled) {
    record.dhcpd_start = segment.dhcp.start ?? ''
    record.dhcpd_stop = segment.dhcp.stop ?? ''
    if (segment.dhcp.leaseSeconds !== undefined) {
      record.dhcpd_leasetime = segment.dhcp.leaseSeconds
    }
    record.dhcpd_dns_enabled = dns.length > 0
    DNS_FIELDS.forEach((field, index) => {
      record[field] = dns[index] ?? ''
    })
  }

  return record
}

// ============================================================================
// Firewall rules
// ============================================================================

export function formatPorts(ports: PortRange | undefined): string {
  if (!ports) return ''
  return ports.from === ports.to ? String(ports.from) : `${ports.from}-${ports.to}`
}

export function parsePorts(value: string | undefined): PortRange | undefined {
  const match = value ? /^(\d+)(?:-(\d+))?$/.exec(value.trim()) : null
  if (!match) return undefined
  const from = Number(match[1])
  return { from, to: Number(match[2] ?? match[1]) }
}

/**
 * @param vlanById - network `_id` to VLAN tag
 */
export function ruleFromRecord(record: UnifiRecord, vlanById: ReadonlyMap<string, number>): FirewallRule | undefined {
  const ruleset = str(record, 'ruleset')
  const chain = ruleset ? chainFromRuleset(ruleset) : undefined
  const priority = int(record, 'rule_index')
  if (!chain || priority === undefined) return undefined

  const protocol = str(record, 'protocol') ?? 'all'
  const rule: FirewallRule = {
    chain,
    priority,
    name: str(record, 'name') ?? `rule-${priority}`,
    source: selectorFromRecord(record, 'src', vlanById),
    destination: selectorFromRecord(record, 'dst', vlanById),
    protocol: isFirewallProtocol(protocol) ? protocol : 'all',
    action: actionFromUnifi(str(record, 'action') ?? 'drop'),
    enabled: bool(record, 'enabled', true),
    logging: bool(record, 'logging', false)
  }

  const ports = parsePorts(str(record, 'dst_port'))
  if (ports) rule.ports = ports
  return rule
}

function selectorFromRecord(record: UnifiRecord, side: 'src' | 'dst', vlanById: ReadonlyMap<string, number>): Selector {
  const networkId = str(record, `${side}_networkconf_id`)
  const vlan = networkId ? vlanById.get(networkId) : undefined
  if (vlan !== undefined) return { kind: 'segment', vlan }

  const address = str(record, `${side}_address`)
  if (address) return { kind: 'address', cidr: address }

  return { kind: 'any' }
}

/**
 * @param networkIdOf - VLAN tag to network `_id`
 */
export function recordFromRule(rule: FirewallRule, networkIdOf: (vlan: number) => string): UnifiRecord {
  return {
    ruleset: rulesetFromChain(rule.chain),
    rule_index: rule.priority,
    name: rule.name,
    enabled: rule.enabled,
    action: actionToUnifi(rule.action),
    protocol: rule.protocol,
    protocol_match_excepted: false,
    logging: rule.logging,
    ...selectorToRecord(rule.source, 'src', networkIdOf),
    ...selectorToRecord(rule.destination, 'dst', networkIdOf),
    src_firewallgroup_ids: [],
    dst_firewallgroup_ids: [],
    dst_port: formatPorts(rule.ports),
    state_established: false,
    state_invalid: false,
    state_new: false,
    state_related: false
  }
}

function selectorToRecord(selector: Selector, side: 'src' | 'dst', networkIdOf: (vlan: number) => string): UnifiRecord {
  switch (selector.kind) {
    case 'segment':
      return {
        [`${side}_networkconf_id`]: networkIdOf(selector.vlan),
        [`${side}_networkconf_type`]: 'NETv4',
        [`${side}_address`]: ''
      }
    case 'address':
      return { [`${side}_networkconf_id`]: '', [`${side}_address`]: selector.cidr }
    case 'any':
      return { [`${side}_networkconf_id`]: '', [`${side}_address`]: '' }
  }
}
