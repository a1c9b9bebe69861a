/**
 * Protection filter
 *
 * The management network (VLAN 1) is externally managed. Every
 * operation-producing path runs its output through this stage, so no
 * create, update or delete of that segment reaches the applier, whatever
 * live or desired state contains.
 */

import { MANAGEMENT_VLAN, type Operation } from './types.js'

export interface ProtectionResult {
  kept: Operation[]
  excluded: Operation[]
}

export function isProtectedVlan(vlan: number): boolean {
  return vlan === MANAGEMENT_VLAN
}

export function isProtectedOperation(operation: Operation): boolean {
  if (operation.resource !== 'segment') return false
  const vlan = operation.desired?.vlan ?? operation.live?.vlan
  return vlan !== undefined && isProtectedVlan(vlan)
}

export function applyProtection(operations: readonly Operation[]): ProtectionResult {
  const kept: Operation[] = []
  const excluded: Operation[] = []
  for (const operation of operations) {
    if (isProtectedOperation(operation)) {
      excluded.push(operation)
    } else {
      kept.push(operation)
    }
  }
  return { kept, excluded }
}
