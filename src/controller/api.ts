/**
 * Controller API
 *
 * One method per remote call. Implementations resolve, or reject with a
 * typed ControllerError (see lib/errors.ts) so callers can tell transient
 * failures from fatal ones without inspecting transport details.
 */

import type { FirewallRule, NetworkSegment, RuleKey } from '../domain/types.js'

export interface ControllerDescription {
  kind: 'http' | 'memory'
  url: string
  site: string
  unifiOs?: boolean
}

export interface ControllerApi {
  fetchSegments(): Promise<NetworkSegment[]>
  fetchFirewallRules(): Promise<FirewallRule[]>

  /** Rejects with ConflictError when the VLAN already exists */
  createSegment(segment: NetworkSegment): Promise<void>
  /** Rejects with NotFoundError when the VLAN does not exist */
  updateSegment(segment: NetworkSegment): Promise<void>
  deleteSegment(vlan: number): Promise<void>

  /** Rejects with ConflictError when chain + priority is taken */
  createRule(rule: FirewallRule): Promise<void>
  /**
   * Replace the rule found at `previousKey` (or at the rule's own key).
   * A different previousKey moves the rule to its new priority.
   */
  updateRule(rule: FirewallRule, previousKey?: RuleKey): Promise<void>
  deleteRule(key: RuleKey): Promise<void>

  /** Controller-native backup archive */
  exportBackup(): Promise<Uint8Array>

  describe(): ControllerDescription

  /** Release the session, if any */
  close(): Promise<void>
}

export type ControllerMethod = Exclude<keyof ControllerApi, 'describe' | 'close'>
