/**
 * Retry decorator for any ControllerApi
 *
 * Every remote call is retried on transient errors with exponential
 * backoff; a call that keeps failing rejects with RetryExhaustedError.
 */

import { withRetry, type RetryPolicy } from '../lib/retry.js'
import { ruleKey, segmentKey } from '../domain/types.js'
import type { FirewallRule, NetworkSegment, RuleKey } from '../domain/types.js'
import type { ControllerApi, ControllerDescription } from './api.js'

export interface RetryingControllerOptions extends Partial<RetryPolicy> {
  /** `call` names the method and its target, e.g. "createSegment vlan 30" */
  onRetry?: (call: string, attempt: number, error: unknown, delayMs: number) => void
  sleep?: (ms: number) => Promise<void>
}

export class RetryingController implements ControllerApi {
  constructor(
    private readonly inner: ControllerApi,
    private readonly options: RetryingControllerOptions = {}
  ) {}

  fetchSegments(): Promise<NetworkSegment[]> {
    return this.call('fetchSegments', () => this.inner.fetchSegments())
  }

  fetchFirewallRules(): Promise<FirewallRule[]> {
    return this.call('fetchFirewallRules', () => this.inner.fetchFirewallRules())
  }

  createSegment(segment: NetworkSegment): Promise<void> {
    return this.call(`createSegment ${segmentKey(segment.vlan)}`, () => this.inner.createSegment(segment))
  }

  updateSegment(segment: NetworkSegment): Promise<void> {
    return this.call(`updateSegment ${segmentKey(segment.vlan)}`, () => this.inner.updateSegment(segment))
  }

  deleteSegment(vlan: number): Promise<void> {
    return this.call(`deleteSegment ${segmentKey(vlan)}`, () => this.inner.deleteSegment(vlan))
  }

  createRule(rule: FirewallRule): Promise<void> {
    return this.call(`createRule ${ruleKey(rule)}`, () => this.inner.createRule(rule))
  }

  updateRule(rule: FirewallRule, previousKey?: RuleKey): Promise<void> {
    return this.call(`updateRule ${ruleKey(rule)}`, () => this.inner.updateRule(rule, previousKey))
  }

  deleteRule(key: RuleKey): Promise<void> {
    return this.call(`deleteRule ${ruleKey(key)}`, () => this.inner.deleteRule(key))
  }

  exportBackup(): Promise<Uint8Array> {
    return this.call('exportBackup', () => this.inner.exportBackup())
  }

  describe(): ControllerDescription {
    return this.inner.describe()
  }

  close(): Promise<void> {
    return this.inner.close()
  }

  private call<T>(name: string, fn: () => Promise<T>): Promise<T> {
    const { onRetry, ...policy } = this.options
    return withRetry(fn, {
      ...policy,
      operation: name,
      onRetry: onRetry ? (attempt, error, delayMs) => onRetry(name, attempt, error, delayMs) : undefined
    })
  }
}
