import { describe, it, expect } from 'vitest'
import {
  chainFromRuleset,
  networkFromSegment,
  parsePorts,
  recordFromRule,
  ruleFromRecord,
  rulesetFromChain,
  segmentFromNetwork,
  vlanOfNetwork
} from '../../src/controller/unifi-records.js'
import { rule, segment } from '../helpers/fixtures.js'

describe('chains', () => {
  it('converts between rulesets and chains', () => {
    expect(chainFromRuleset('GUEST_LOCAL')).toBe('GUEST-LOCAL')
    expect(chainFromRuleset('LAN_FORWARD')).toBeUndefined()
    expect(rulesetFromChain('WAN-OUT')).toBe('WAN_OUT')
  })
})

describe('networks', () => {
  it('maps untagged LANs to the management tag and ignores WANs', () => {
    expect(vlanOfNetwork({ purpose: 'corporate', vlan_enabled: false })).toBe(1)
    expect(vlanOfNetwork({ purpose: 'guest', vlan_enabled: true, vlan: '40' })).toBe(40)
    expect(vlanOfNetwork({ purpose: 'wan' })).toBeUndefined()
  })

  it('reads back what it writes', () => {
    const original = segment(30, {
      domainName: 'iot.lan',
      igmpSnooping: true,
      dhcp: { enabled: true, start: '10.0.30.100', stop: '10.0.30.200', leaseSeconds: 3600, dnsServers: ['1.1.1.1', '9.9.9.9'] }
    })

    expect(segmentFromNetwork(networkFromSegment(original))).toEqual(original)
  })

  it('omits DHCP fields when DHCP is off', () => {
    const record = networkFromSegment(segment(30, { dhcp: { enabled: false } }))

    expect(record.dhcpd_enabled).toBe(false)
    expect(record).not.toHaveProperty('dhcpd_start')
  })

  it('skips records without a usable subnet', () => {
    expect(segmentFromNetwork({ purpose: 'corporate', vlan_enabled: true, vlan: 30, ip_subnet: 'bogus' })).toBeUndefined()
  })
})

describe('firewall rules', () => {
  it('parses single ports and ranges', () => {
    expect(parsePorts('8080')).toEqual({ from: 8080, to: 8080 })
    expect(parsePorts('1000-2000')).toEqual({ from: 1000, to: 2000 })
    expect(parsePorts('')).toBeUndefined()
    expect(parsePorts('80,443')).toBeUndefined()
  })

  it('reads back what it writes', () => {
    const original = rule(2000, {
      source: { kind: 'segment', vlan: 30 },
      destination: { kind: 'address', cidr: '10.9.0.0/16' },
      protocol: 'tcp_udp',
      ports: { from: 5000, to: 5100 },
      action: 'allow',
      logging: true
    })
    const record = recordFromRule(original, vlan => `net${vlan}`)

    expect(ruleFromRecord(record, new Map([['net30', 30]]))).toEqual(original)
  })

  it('falls back to any for an unknown network id', () => {
    const record = recordFromRule(rule(10, { source: { kind: 'segment', vlan: 30 } }), () => 'gone')

    expect(ruleFromRecord(record, new Map())?.source).toEqual({ kind: 'any' })
  })
})
