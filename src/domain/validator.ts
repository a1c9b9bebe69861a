/**
 * Desired-state Validator
 *
 * Pure, fail-fast checks over a parsed desired-state document. Check
 * classes run in order (structural, uniqueness, referential, hardware);
 * the first class with violations ends validation, and every violation of
 * that class is reported.
 */

import {
  broadcastAddress,
  cidrsOverlap,
  containsAddress,
  formatIpv4,
  isCidr,
  isIpv4,
  isUsableHost,
  parseCidr,
  parseIpv4,
  type Ipv4Network
} from '../lib/cidr.js'
import { createDesiredState } from './model.js'
import {
  FIREWALL_ACTIONS,
  FIREWALL_CHAINS,
  FIREWALL_PROTOCOLS,
  MANAGEMENT_VLAN,
  MAX_VLAN,
  isFirewallAction,
  isFirewallChain,
  isFirewallProtocol,
  type DhcpScope,
  type FirewallRule,
  type HardwareProfile,
  type NetworkSegment,
  type PortRange,
  type Selector,
  type ValidationResult,
  type Violation,
  type ViolationClass
} from './types.js'

export const MIN_PRIORITY = 1
export const MAX_PRIORITY = 99999
export const MAX_DNS_SERVERS = 4

const PORT_PROTOCOLS = new Set(['tcp', 'udp', 'tcp_udp'])

/**
 * Validate a parsed desired-state document against a hardware profile
 *
 * @example
 * ```ts
 * const result = validate(YAML.parse(source), resolveHardwareProfile('usg3p'))
 * if (!result.ok) console.error(result.violations)
 * ```
 */
export function validate(document: unknown, profile: HardwareProfile): ValidationResult {
  const structural = new Collector('structural')
  const parsed = parseDocument(document, structural)
  if (!parsed || structural.violations.length > 0) {
    return structural.fail()
  }

  const uniqueness = new Collector('uniqueness')
  checkUniqueness(parsed, uniqueness)
  if (uniqueness.violations.length > 0) {
    return uniqueness.fail()
  }

  const referential = new Collector('referential')
  checkReferences(parsed, referential)
  if (referential.violations.length > 0) {
    return referential.fail()
  }

  const hardware = new Collector('hardware')
  checkHardware(parsed, profile, hardware)
  if (hardware.violations.length > 0) {
    return hardware.fail()
  }

  return { ok: true, state: createDesiredState(parsed.segments, parsed.rules) }
}

// ============================================================================
// Violation collection
// ============================================================================

class Collector {
  readonly violations: Violation[] = []

  constructor(private readonly checkClass: ViolationClass) {}

  add(field: string, value: unknown, rule: string, message: string): void {
    this.violations.push({ class: this.checkClass, field, value, rule, message })
  }

  fail(): ValidationResult {
    return { ok: false, stage: this.checkClass, violations: this.violations }
  }
}

interface ParsedDocument {
  segments: NetworkSegment[]
  rules: FirewallRule[]
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0
}

// ============================================================================
// Structural
// ============================================================================

function parseDocument(document: unknown, out: Collector): ParsedDocument | null {
  if (!isRecord(document)) {
    out.add('(document)', document, 'document.type', 'Desired state must be a mapping with segments and firewall lists')
    return null
  }

  const rawSegments = document.segments ?? []
  const rawRules = document.firewall ?? []

  if (!Array.isArray(rawSegments)) {
    out.add('segments', rawSegments, 'segments.type', 'segments must be a list')
  }
  if (!Array.isArray(rawRules)) {
    out.add('firewall', rawRules, 'firewall.type', 'firewall must be a list')
  }
  if (!Array.isArray(rawSegments) || !Array.isArray(rawRules)) {
    return null
  }

  const segments: NetworkSegment[] = []
  rawSegments.forEach((raw, index) => {
    const segment = parseSegment(raw, `segments[${index}]`, out)
    if (segment) segments.push(segment)
  })

  const rules: FirewallRule[] = []
  rawRules.forEach((raw, index) => {
    const rule = parseRule(raw, `firewall[${index}]`, out)
    if (rule) rules.push(rule)
  })

  return { segments, rules }
}

function parseSegment(raw: unknown, path: string, out: Collector): NetworkSegment | null {
  if (!isRecord(raw)) {
    out.add(path, raw, 'segment.type', 'Segment must be a mapping')
    return null
  }
  const before = out.violations.length

  const vlan = raw.vlan
  if (typeof vlan !== 'number' || !Number.isInteger(vlan)) {
    out.add(`${path}.vlan`, vlan, 'vlan.type', 'VLAN tag must be an integer')
  } else if (vlan === MANAGEMENT_VLAN) {
    out.add(`${path}.vlan`, vlan, 'vlan.management', 'VLAN 1 is the management network and cannot be declared')
  } else if (vlan < MANAGEMENT_VLAN + 1 || vlan > MAX_VLAN) {
    out.add(`${path}.vlan`, vlan, 'vlan.range', `VLAN tag must be between ${MANAGEMENT_VLAN + 1} and ${MAX_VLAN}`)
  }

  if (!isNonEmptyString(raw.name)) {
    out.add(`${path}.name`, raw.name, 'name.required', 'Segment name must be a non-empty string')
  }

  let network: Ipv4Network | null = null
  if (typeof raw.subnet !== 'string' || !isCidr(raw.subnet)) {
    out.add(`${path}.subnet`, raw.subnet, 'subnet.cidr', 'Subnet must be an IPv4 CIDR block, e.g. 10.0.10.0/24')
  } else {
    network = parseCidr(raw.subnet, { strict: true })
    if (!network) {
      out.add(`${path}.subnet`, raw.subnet, 'subnet.network-address', 'Subnet must be a network address (host bits zero)')
    }
  }

  const gateway = typeof raw.gateway === 'string' ? parseIpv4(raw.gateway) : null
  if (gateway === null) {
    out.add(`${path}.gateway`, raw.gateway, 'gateway.ipv4', 'Gateway must be an IPv4 address')
  } else if (network && !containsAddress(network, gateway)) {
    out.add(`${path}.gateway`, raw.gateway, 'gateway.in-subnet', `Gateway ${raw.gateway} is outside ${raw.subnet}`)
  } else if (network && !isUsableHost(network, gateway)) {
    out.add(`${path}.gateway`, raw.gateway, 'gateway.usable', 'Gateway cannot be the network or broadcast address')
  }

  const dhcp = parseDhcp(raw.dhcp, `${path}.dhcp`, network, gateway, out)

  if (raw.domainName !== undefined && typeof raw.domainName !== 'string') {
    out.add(`${path}.domainName`, raw.domainName, 'domainName.type', 'domainName must be a string')
  }
  checkOptionalBoolean(raw, 'igmpSnooping', path, out)
  checkOptionalBoolean(raw, 'enabled', path, out)

  if (out.violations.length > before || !dhcp) {
    return null
  }

  return {
    vlan: Number(vlan),
    name: String(raw.name),
    subnet: String(raw.subnet),
    gateway: String(raw.gateway),
    dhcp,
    domainName: typeof raw.domainName === 'string' ? raw.domainName : undefined,
    igmpSnooping: raw.igmpSnooping === true,
    enabled: raw.enabled !== false
  }
}

function parseDhcp(
  raw: unknown,
  path: string,
  network: Ipv4Network | null,
  gateway: number | null,
  out: Collector
): DhcpScope | null {
  if (raw === undefined) {
    return { enabled: false }
  }
  if (!isRecord(raw)) {
    out.add(path, raw, 'dhcp.type', 'dhcp must be a mapping')
    return null
  }
  const before = out.violations.length

  if (raw.enabled !== undefined && typeof raw.enabled !== 'boolean') {
    out.add(`${path}.enabled`, raw.enabled, 'dhcp.enabled.type', 'dhcp.enabled must be a boolean')
    return null
  }
  const enabled = raw.enabled !== false
  if (!enabled) {
    return { enabled: false }
  }

  const start = parseRangeBound(raw.start, `${path}.start`, out)
  const stop = parseRangeBound(raw.stop, `${path}.stop`, out)

  if (start !== null && stop !== null) {
    if (network && (!containsAddress(network, start) || !containsAddress(network, stop))) {
      out.add(`${path}`, `${raw.start}-${raw.stop}`, 'dhcp.range.in-subnet', 'DHCP range must lie inside the subnet')
    } else if (start > stop) {
      out.add(`${path}.start`, raw.start, 'dhcp.range.order', `DHCP range start ${raw.start} is after stop ${raw.stop}`)
    } else if (network && (start === network.network || stop === broadcastAddress(network)) && network.prefix < 31) {
      out.add(`${path}`, `${raw.start}-${raw.stop}`, 'dhcp.range.reserved', 'DHCP range cannot include the network or broadcast address')
    } else if (gateway !== null && gateway >= start && gateway <= stop) {
      out.add(`${path}`, `${raw.start}-${raw.stop}`, 'dhcp.range.gateway', `DHCP range contains the gateway ${formatIpv4(gateway)}`)
    }
  }

  const lease = raw.leaseSeconds
  if (lease !== undefined && (typeof lease !== 'number' || !Number.isInteger(lease) || lease <= 0)) {
    out.add(`${path}.leaseSeconds`, lease, 'dhcp.lease', 'leaseSeconds must be a positive integer')
  }

  const dns = raw.dnsServers
  if (dns !== undefined) {
    if (!Array.isArray(dns)) {
      out.add(`${path}.dnsServers`, dns, 'dhcp.dns.type', 'dnsServers must be a list of IPv4 addresses')
    } else {
      if (dns.length > MAX_DNS_SERVERS) {
        out.add(`${path}.dnsServers`, dns, 'dhcp.dns.count', `At most ${MAX_DNS_SERVERS} DNS servers are supported`)
      }
      dns.forEach((server, index) => {
        if (typeof server !== 'string' || !isIpv4(server)) {
          out.add(`${path}.dnsServers[${index}]`, server, 'dhcp.dns.ipv4', 'DNS server must be an IPv4 address')
        }
      })
    }
  }

  if (out.violations.length > before) {
    return null
  }

  return {
    enabled: true,
    start: String(raw.start),
    stop: String(raw.stop),
    leaseSeconds: typeof lease === 'number' ? lease : undefined,
    dnsServers: Array.isArray(dns) ? dns.map(String) : undefined
  }
}

function parseRangeBound(value: unknown, path: string, out: Collector): number | null {
  if (value === undefined) {
    out.add(path, value, 'dhcp.range.required', 'DHCP start and stop are required when DHCP is enabled')
    return null
  }
  const address = typeof value === 'string' ? parseIpv4(value) : null
  if (address === null) {
    out.add(path, value, 'dhcp.range.ipv4', 'DHCP range bound must be an IPv4 address')
  }
  return address
}

function checkOptionalBoolean(raw: Record<string, unknown>, key: string, path: string, out: Collector): void {
  if (raw[key] !== undefined && typeof raw[key] !== 'boolean') {
    out.add(`${path}.${key}`, raw[key], `${key}.type`, `${key} must be a boolean`)
  }
}

function parseRule(raw: unknown, path: string, out: Collector): FirewallRule | null {
  if (!isRecord(raw)) {
    out.add(path, raw, 'rule.type', 'Firewall rule must be a mapping')
    return null
  }
  const before = out.violations.length

  const { chain, priority, action } = raw
  if (!isFirewallChain(chain)) {
    out.add(`${path}.chain`, chain, 'chain.enum', `chain must be one of ${FIREWALL_CHAINS.join(', ')}`)
  }
  if (typeof priority !== 'number' || !Number.isInteger(priority) || priority < MIN_PRIORITY || priority > MAX_PRIORITY) {
    out.add(`${path}.priority`, priority, 'priority.range', `priority must be an integer between ${MIN_PRIORITY} and ${MAX_PRIORITY}`)
  }
  if (!isNonEmptyString(raw.name)) {
    out.add(`${path}.name`, raw.name, 'name.required', 'Rule name must be a non-empty string')
  }

  const source = parseSelector(raw.source, `${path}.source`, out)
  const destination = parseSelector(raw.destination, `${path}.destination`, out)

  const protocol = raw.protocol ?? 'all'
  if (!isFirewallProtocol(protocol)) {
    out.add(`${path}.protocol`, protocol, 'protocol.enum', `protocol must be one of ${FIREWALL_PROTOCOLS.join(', ')}`)
  }

  let ports: PortRange | undefined
  if (raw.ports !== undefined) {
    const parsedPorts = parsePorts(raw.ports)
    if (!parsedPorts) {
      out.add(`${path}.ports`, raw.ports, 'ports.range', 'ports must be a port or range between 1 and 65535 with from <= to')
    } else if (typeof protocol === 'string' && !PORT_PROTOCOLS.has(protocol)) {
      out.add(`${path}.ports`, raw.ports, 'ports.protocol', 'ports require protocol tcp, udp or tcp_udp')
    } else {
      ports = parsedPorts
    }
  }

  if (!isFirewallAction(action)) {
    out.add(`${path}.action`, action, 'action.enum', `action must be one of ${FIREWALL_ACTIONS.join(', ')}`)
  }
  checkOptionalBoolean(raw, 'enabled', path, out)
  checkOptionalBoolean(raw, 'logging', path, out)

  if (
    out.violations.length > before ||
    !isFirewallChain(chain) ||
    !isFirewallProtocol(protocol) ||
    !isFirewallAction(action) ||
    !source ||
    !destination
  ) {
    return null
  }

  const rule: FirewallRule = {
    chain,
    priority: Number(priority),
    name: String(raw.name),
    source,
    destination,
    protocol,
    action,
    enabled: raw.enabled !== false,
    logging: raw.logging === true
  }
  if (ports) rule.ports = ports
  return rule
}

/**
 * Selectors: `any`, `{ segment: <vlan> }` or `{ address: <cidr or ip> }`.
 * An omitted selector means any.
 */
function parseSelector(raw: unknown, path: string, out: Collector): Selector | null {
  if (raw === undefined || raw === 'any') {
    return { kind: 'any' }
  }
  if (!isRecord(raw)) {
    out.add(path, raw, 'selector.shape', 'Selector must be "any", { segment: <vlan> } or { address: <cidr> }')
    return null
  }

  const keys = Object.keys(raw)
  if (keys.length !== 1) {
    out.add(path, raw, 'selector.shape', 'Selector must have exactly one of segment or address')
    return null
  }

  if ('segment' in raw) {
    const vlan = raw.segment
    if (typeof vlan !== 'number' || !Number.isInteger(vlan) || vlan < MANAGEMENT_VLAN || vlan > MAX_VLAN) {
      out.add(`${path}.segment`, vlan, 'selector.segment', `Segment selector must be a VLAN tag between ${MANAGEMENT_VLAN} and ${MAX_VLAN}`)
      return null
    }
    return { kind: 'segment', vlan }
  }

  if ('address' in raw) {
    const address = raw.address
    if (typeof address !== 'string' || !(isIpv4(address) || isCidr(address))) {
      out.add(`${path}.address`, address, 'selector.address', 'Address selector must be an IPv4 address or CIDR block')
      return null
    }
    return { kind: 'address', cidr: address.trim() }
  }

  out.add(path, raw, 'selector.shape', 'Selector must have exactly one of segment or address')
  return null
}

function parsePorts(raw: unknown): PortRange | null {
  let from: unknown
  let to: unknown

  if (typeof raw === 'number') {
    from = raw
    to = raw
  } else if (typeof raw === 'string') {
    const match = /^\s*(\d+)\s*(?:-\s*(\d+)\s*)?$/.exec(raw)
    if (!match) return null
    from = Number(match[1])
    to = Number(match[2] ?? match[1])
  } else if (isRecord(raw)) {
    from = raw.from
    to = raw.to ?? raw.from
  } else {
    return null
  }

  if (!isPort(from) || !isPort(to) || from > to) return null
  return { from, to }
}

function isPort(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 65535
}

// ============================================================================
// Uniqueness
// ============================================================================

function checkUniqueness(doc: ParsedDocument, out: Collector): void {
  const tags = new Map<number, number>()
  const names = new Map<string, number>()

  doc.segments.forEach((segment, index) => {
    const path = `segments[${index}]`

    const firstTag = tags.get(segment.vlan)
    if (firstTag !== undefined) {
      out.add(`${path}.vlan`, segment.vlan, 'vlan.unique', `VLAN ${segment.vlan} is already declared by segments[${firstTag}]`)
    } else {
      tags.set(segment.vlan, index)
    }

    const name = segment.name.trim()
    const firstName = names.get(name)
    if (firstName !== undefined) {
      out.add(`${path}.name`, segment.name, 'name.unique', `Segment name "${name}" is already used by segments[${firstName}]`)
    } else {
      names.set(name, index)
    }
  })

  const networks = doc.segments.map(segment => parseCidr(segment.subnet))
  for (let j = 0; j < networks.length; j++) {
    for (let i = 0; i < j; i++) {
      const a = networks[i]
      const b = networks[j]
      if (a && b && cidrsOverlap(a, b)) {
        out.add(
          `segments[${j}].subnet`,
          doc.segments[j].subnet,
          'subnet.overlap',
          `Subnet ${doc.segments[j].subnet} (VLAN ${doc.segments[j].vlan}) overlaps ${doc.segments[i].subnet} (VLAN ${doc.segments[i].vlan})`
        )
      }
    }
  }

  const identities = new Map<string, number>()
  const ruleNames = new Map<string, number>()

  doc.rules.forEach((rule, index) => {
    const path = `firewall[${index}]`

    const identity = `${rule.chain}/${rule.priority}`
    const firstIdentity = identities.get(identity)
    if (firstIdentity !== undefined) {
      out.add(`${path}.priority`, rule.priority, 'priority.unique', `Priority ${rule.priority} in ${rule.chain} is already used by firewall[${firstIdentity}]`)
    } else {
      identities.set(identity, index)
    }

    const nameKey = `${rule.chain}/${rule.name.trim()}`
    const firstName = ruleNames.get(nameKey)
    if (firstName !== undefined) {
      out.add(`${path}.name`, rule.name, 'name.unique', `Rule name "${rule.name.trim()}" in ${rule.chain} is already used by firewall[${firstName}]`)
    } else {
      ruleNames.set(nameKey, index)
    }
  })
}

// ============================================================================
// Referential
// ============================================================================

function checkReferences(doc: ParsedDocument, out: Collector): void {
  const declared = new Set(doc.segments.map(segment => segment.vlan))

  doc.rules.forEach((rule, index) => {
    for (const side of ['source', 'destination'] as const) {
      const selector = rule[side]
      if (selector.kind !== 'segment') continue
      // The management network is never declared; its existence is checked against live state
      if (selector.vlan === MANAGEMENT_VLAN || declared.has(selector.vlan)) continue
      out.add(
        `firewall[${index}].${side}.segment`,
        selector.vlan,
        'selector.segment.unresolved',
        `Rule "${rule.name}" references VLAN ${selector.vlan}, which is not declared`
      )
    }
  })
}

// ============================================================================
// Hardware
// ============================================================================

function checkHardware(doc: ParsedDocument, profile: HardwareProfile, out: Collector): void {
  const count = doc.segments.length
  if (count > profile.maxSegments) {
    out.add(
      'segments',
      count,
      'hardware.max-segments',
      `${count} segments declared, but ${profile.label} (${profile.id}) supports at most ${profile.maxSegments}`
    )
  }
}
