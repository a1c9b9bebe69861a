/**
 * State Fetcher
 *
 * Pulls segments and firewall rules from the controller and normalizes
 * them into the Config Model. The management segment stays in live state
 * so rules referencing it resolve; the protection filter keeps it out of
 * every operation set.
 */

import type { ControllerApi } from '../controller/api.js'
import { createLiveState } from './model.js'
import type { LiveState } from './types.js'

export async function fetchLiveState(
  controller: ControllerApi,
  options: { now?: () => Date } = {}
): Promise<LiveState> {
  const [segments, rules] = await Promise.all([
    controller.fetchSegments(),
    controller.fetchFirewallRules()
  ])
  return createLiveState(segments, rules, options.now ? options.now() : new Date())
}
