/**
 * netstate Configuration Types
 *
 * Shape of .netstate/config.yaml and the settings resolved from it.
 * Domain types (segments, rules, plans) live in domain/types.ts.
 */

import type { HardwareProfile } from './domain/types.js'
import type { HardwareProfileConfig } from './lib/hardware-profiles.js'
import type { RetryPolicy } from './lib/retry.js'

// ============================================================================
// config.yaml
// ============================================================================

export interface ControllerConfig {
  /** https://unifi.local:8443, or memory://<site> for a throwaway controller */
  url?: string
  username?: string
  password?: string
  site?: string
  /** UniFi OS console (UDM, UXG, Cloud Key Gen2+) */
  unifi_os?: boolean
  timeout_ms?: number
  /** false accepts the self-signed certificate controllers ship with */
  verify_ssl?: boolean
}

export interface RetryConfig {
  max_attempts?: number
  base_delay_ms?: number
  max_delay_ms?: number
}

export interface ApplyConfig {
  concurrency?: number
  /** Take a snapshot before live applies. Default: true */
  snapshot?: boolean
  retry?: RetryConfig
}

export const SNAPSHOT_DRIVERS = ['live-state', 'controller'] as const

export type SnapshotDriverName = typeof SNAPSHOT_DRIVERS[number]

export interface SnapshotsConfig {
  driver?: SnapshotDriverName
  /** Relative to the .netstate directory. Default: snapshots */
  dir?: string
}

export interface NetstateConfig {
  version: string
  /** Path of a parent config, relative to this file */
  extends?: string
  site?: string
  hardware_profile?: string
  /** Desired-state document, relative to the project root */
  desired_state?: string
  controller?: ControllerConfig
  apply?: ApplyConfig
  snapshots?: SnapshotsConfig
  hardware_profiles?: Record<string, HardwareProfileConfig>
}

// ============================================================================
// Resolved settings
// ============================================================================

export interface ControllerSettings {
  url: string
  username: string
  password: string
  site: string
  unifiOs: boolean
  timeoutMs: number
  verifySsl: boolean
}

export interface Settings {
  /** Directory containing .netstate/, or the working directory */
  rootDir: string
  /** The .netstate directory, when one was found */
  configDir: string | null
  desiredStatePath: string
  hardwareProfile: HardwareProfile
  controller: ControllerSettings
  apply: {
    concurrency: number
    snapshot: boolean
    retry: RetryPolicy
  }
  snapshots: {
    driver: SnapshotDriverName
    dir: string
  }
}

/** Values given on the command line; they win over config and environment */
export interface SettingsOverrides {
  file?: string
  profile?: string
  controller?: string
  site?: string
  concurrency?: number
  snapshot?: boolean
}
