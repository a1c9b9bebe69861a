/**
 * In-memory controller
 *
 * Behaves like a controller for a single site: enforces identity
 * conflicts, reports missing targets, and keeps a call log. Used by
 * `memory://` URLs for rehearsals and by the test suite, which can queue
 * failures per method with `injectFault`.
 */

import { ConflictError, NotFoundError, RejectedError } from '../lib/errors.js'
import { MANAGEMENT_VLAN, ruleKey, segmentKey } from '../domain/types.js'
import type { FirewallRule, NetworkSegment, RuleKey } from '../domain/types.js'
import type { ControllerApi, ControllerDescription, ControllerMethod } from './api.js'

export interface ControllerCall {
  method: ControllerMethod
  /** Segment or rule identity, when the call has one */
  target?: string
}

export interface InMemoryControllerOptions {
  site?: string
  segments?: readonly NetworkSegment[]
  rules?: readonly FirewallRule[]
  /** Seed the untagged management network (VLAN 1). Default: true */
  withManagement?: boolean
}

export const DEFAULT_MANAGEMENT_SEGMENT: NetworkSegment = {
  vlan: MANAGEMENT_VLAN,
  name: 'Default',
  subnet: '192.168.1.0/24',
  gateway: '192.168.1.1',
  dhcp: { enabled: true, start: '192.168.1.6', stop: '192.168.1.254', leaseSeconds: 86400 },
  igmpSnooping: false,
  enabled: true
}

export class InMemoryController implements ControllerApi {
  readonly calls: ControllerCall[] = []

  private readonly site: string
  private readonly segments = new Map<number, NetworkSegment>()
  private readonly rules = new Map<string, FirewallRule>()
  private readonly faults = new Map<ControllerMethod, Error[]>()

  constructor(options: InMemoryControllerOptions = {}) {
    this.site = options.site ?? 'default'
    if (options.withManagement !== false) {
      this.segments.set(MANAGEMENT_VLAN, structuredClone(DEFAULT_MANAGEMENT_SEGMENT))
    }
    for (const segment of options.segments ?? []) {
      this.segments.set(segment.vlan, structuredClone(segment))
    }
    for (const rule of options.rules ?? []) {
      this.rules.set(ruleKey(rule), structuredClone(rule))
    }
  }

  /**
   * Queue errors for a method; each call consumes one before touching state
   */
  injectFault(method: ControllerMethod, ...errors: Error[]): void {
    const queue = this.faults.get(method) ?? []
    queue.push(...errors)
    this.faults.set(method, queue)
  }

  /** Current state, for assertions */
  get state(): { segments: NetworkSegment[]; rules: FirewallRule[] } {
    return {
      segments: [...this.segments.values()].sort((a, b) => a.vlan - b.vlan).map(s => structuredClone(s)),
      rules: [...this.rules.values()].map(r => structuredClone(r))
    }
  }

  /** Calls that change state */
  get mutations(): ControllerCall[] {
    return this.calls.filter(call => !['fetchSegments', 'fetchFirewallRules', 'exportBackup'].includes(call.method))
  }

  async fetchSegments(): Promise<NetworkSegment[]> {
    this.record('fetchSegments')
    return [...this.segments.values()].map(s => structuredClone(s))
  }

  async fetchFirewallRules(): Promise<FirewallRule[]> {
    this.record('fetchFirewallRules')
    return [...this.rules.values()].map(r => structuredClone(r))
  }

  async createSegment(segment: NetworkSegment): Promise<void> {
    const target = segmentKey(segment.vlan)
    this.record('createSegment', target)
    if (this.segments.has(segment.vlan)) {
      throw new ConflictError(`segment ${target}`)
    }
    this.segments.set(segment.vlan, structuredClone(segment))
  }

  async updateSegment(segment: NetworkSegment): Promise<void> {
    const target = segmentKey(segment.vlan)
    this.record('updateSegment', target)
    if (!this.segments.has(segment.vlan)) {
      throw new NotFoundError(`segment ${target}`)
    }
    this.segments.set(segment.vlan, structuredClone(segment))
  }

  async deleteSegment(vlan: number): Promise<void> {
    const target = segmentKey(vlan)
    this.record('deleteSegment', target)
    if (vlan === MANAGEMENT_VLAN) {
      throw new RejectedError(`segment ${target}`, 'the management network cannot be removed')
    }
    if (!this.segments.delete(vlan)) {
      throw new NotFoundError(`segment ${target}`)
    }
  }

  async createRule(rule: FirewallRule): Promise<void> {
    const key = ruleKey(rule)
    this.record('createRule', key)
    if (this.rules.has(key)) {
      throw new ConflictError(`rule ${key}`)
    }
    this.rules.set(key, structuredClone(rule))
  }

  async updateRule(rule: FirewallRule, previousKey?: RuleKey): Promise<void> {
    const key = ruleKey(rule)
    const from = previousKey ? ruleKey(previousKey) : key
    this.record('updateRule', from === key ? key : `${from} -> ${key}`)
    if (!this.rules.has(from)) {
      throw new NotFoundError(`rule ${from}`)
    }
    if (from !== key && this.rules.has(key)) {
      throw new ConflictError(`rule ${key}`, 'target priority is taken')
    }
    this.rules.delete(from)
    this.rules.set(key, structuredClone(rule))
  }

  async deleteRule(key: RuleKey): Promise<void> {
    const target = ruleKey(key)
    this.record('deleteRule', target)
    if (!this.rules.delete(target)) {
      throw new NotFoundError(`rule ${target}`)
    }
  }

  async exportBackup(): Promise<Uint8Array> {
    this.record('exportBackup')
    return Buffer.from(JSON.stringify({ site: this.site, ...this.state }), 'utf-8')
  }

  describe(): ControllerDescription {
    return { kind: 'memory', url: `memory://${this.site}`, site: this.site }
  }

  async close(): Promise<void> {
    // No session to release
  }

  private record(method: ControllerMethod, target?: string): void {
    this.calls.push(target === undefined ? { method } : { method, target })
    const fault = this.faults.get(method)?.shift()
    if (fault) {
      throw fault
    }
  }
}
