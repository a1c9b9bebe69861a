import { describe, it, expect } from 'vitest'
import { fetchLiveState } from '../../src/domain/live.js'
import { DEFAULT_MANAGEMENT_SEGMENT, InMemoryController } from '../../src/controller/memory.js'
import { rule, segment } from '../helpers/fixtures.js'

describe('fetchLiveState', () => {
  it('normalizes, sorts and freezes what the controller returns', async () => {
    const controller = new InMemoryController({
      segments: [segment(30), segment(10, { name: '  users  ', dhcp: { enabled: true, start: '10.0.10.100', stop: '10.0.10.200' } })],
      rules: [rule(20, { chain: 'WAN-IN' }), rule(5, { protocol: 'icmp', ports: { from: 80, to: 80 } })]
    })

    const live = await fetchLiveState(controller, { now: () => new Date('2026-06-01T00:00:00.000Z') })

    expect(live.fetchedAt).toBe('2026-06-01T00:00:00.000Z')
    expect(live.segments.map(s => s.vlan)).toEqual([1, 10, 30])
    expect(live.segments[0]).toEqual(DEFAULT_MANAGEMENT_SEGMENT)
    expect(live.segments[1]).toEqual(segment(10, { name: 'users' }))
    expect(live.rules.map(r => `${r.chain}/${r.priority}`)).toEqual(['LAN-IN/5', 'WAN-IN/20'])
    expect(live.rules[0]).not.toHaveProperty('ports')
    expect(Object.isFrozen(live.segments[1].dhcp)).toBe(true)
  })
})
