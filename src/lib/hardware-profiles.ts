/**
 * Gateway hardware profiles
 *
 * Ceilings count segments netstate may manage; the management network
 * (VLAN 1) is not included. A USG-3P handles four VLANs in total, so
 * three are manageable.
 */

import type { HardwareProfile } from '../domain/types.js'
import { UnknownHardwareProfileError } from './errors.js'

export const BUILTIN_HARDWARE_PROFILES: Readonly<Record<string, HardwareProfile>> = {
  usg3p: { id: 'usg3p', label: 'UniFi Security Gateway 3P', maxSegments: 3 },
  'usg-pro-4': { id: 'usg-pro-4', label: 'UniFi Security Gateway Pro 4', maxSegments: 31 },
  'uxg-pro': { id: 'uxg-pro', label: 'UniFi Next-Gen Gateway Pro', maxSegments: 31 },
  'udm-pro': { id: 'udm-pro', label: 'UniFi Dream Machine Pro', maxSegments: 31 },
  'udm-se': { id: 'udm-se', label: 'UniFi Dream Machine SE', maxSegments: 31 }
}

/** Profile entries as written under hardware_profiles in config.yaml */
export interface HardwareProfileConfig {
  label?: string
  max_segments: number
}

export type HardwareProfileRegistry = Readonly<Record<string, HardwareProfile>>

/**
 * Merge built-in profiles with the ones declared in config.
 * Declared profiles override built-ins with the same id.
 */
export function buildProfileRegistry(
  declared: Record<string, HardwareProfileConfig> = {}
): HardwareProfileRegistry {
  const registry: Record<string, HardwareProfile> = { ...BUILTIN_HARDWARE_PROFILES }

  for (const [rawId, entry] of Object.entries(declared)) {
    const id = rawId.toLowerCase()
    registry[id] = {
      id,
      label: entry.label ?? (Object.hasOwn(registry, id) ? registry[id].label : id),
      maxSegments: entry.max_segments
    }
  }

  return registry
}

/**
 * Resolve a profile id (case-insensitive)
 */
export function resolveHardwareProfile(
  id: string,
  registry: HardwareProfileRegistry = BUILTIN_HARDWARE_PROFILES
): HardwareProfile {
  const key = id.trim().toLowerCase()
  // Own keys only: "constructor" and friends are not profiles
  if (!Object.hasOwn(registry, key)) {
    throw new UnknownHardwareProfileError(id, Object.keys(registry).sort())
  }
  return registry[key]
}
