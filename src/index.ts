/**
 * netstate - Declarative network state for UniFi-style gateways
 *
 * Main library exports for programmatic usage
 */

// Domain
export * from './domain/index.js'

// Controller
export type { ControllerApi, ControllerDescription, ControllerMethod } from './controller/api.js'
export { HttpControllerClient, parseRetryAfter } from './controller/http-client.js'
export type { HttpControllerOptions, FetchLike, HttpResponse } from './controller/http-client.js'
export { InMemoryController } from './controller/memory.js'
export type { InMemoryControllerOptions } from './controller/memory.js'
export { RetryingController } from './controller/retrying.js'
export type { RetryingControllerOptions } from './controller/retrying.js'

// Config
export type {
  NetstateConfig,
  ControllerConfig,
  ApplyConfig,
  RetryConfig,
  SnapshotsConfig,
  SnapshotDriverName,
  Settings,
  SettingsOverrides
} from './types.js'
export {
  loadConfig,
  findConfigDir,
  resolveSettings,
  readDesiredStateDocument
} from './lib/config-loader.js'
export {
  BUILTIN_HARDWARE_PROFILES,
  buildProfileRegistry,
  resolveHardwareProfile
} from './lib/hardware-profiles.js'

// Snapshots
export {
  createSnapshotDriver,
  snapshotProvider,
  listSnapshots,
  findSnapshot,
  verifySnapshot
} from './lib/snapshot.js'
export type { SnapshotDriver, SnapshotInfo, SnapshotManifest } from './lib/snapshot.js'

// Utilities
export { withRetry, withTimeout, computeBackoff, DEFAULT_RETRY_POLICY } from './lib/retry.js'
export type { RetryPolicy, RetryOptions } from './lib/retry.js'

// Errors
export * from './lib/errors.js'
