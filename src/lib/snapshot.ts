/**
 * netstate - Snapshot Module
 *
 * Pre-apply backups with SHA256 verification and manifest metadata.
 * Supports two drivers:
 * - live-state (default): fetched live state as gzip JSON in
 *   .netstate/snapshots/<id>/state.json.gz + manifest.json
 * - controller: the controller's own backup archive in
 *   .netstate/snapshots/<id>/controller-backup.unf + manifest.json
 */

import fs from 'node:fs'
import path from 'node:path'
import { gzipSync } from 'node:zlib'
import { createHash } from 'node:crypto'
import type { ControllerApi } from '../controller/api.js'
import type { SnapshotProvider } from '../domain/apply.js'
import { fetchLiveState } from '../domain/live.js'
import type { SnapshotHandle } from '../domain/types.js'
import type { SnapshotDriverName } from '../types.js'
import { SnapshotError } from './errors.js'

// ============================================================================
// Types
// ============================================================================

export interface SnapshotManifest {
  id: string
  driver: SnapshotDriverName
  site: string
  controller: string
  timestamp: string
  checksum: string
  compression: 'gzip' | 'none'
  dataFile: string
  /** Counts of the captured live state (live-state driver only) */
  segments: number | null
  rules: number | null
  name: string | null
}

export interface SnapshotInfo extends SnapshotManifest {
  dirPath: string
}

export interface SnapshotCreateOptions {
  name?: string
  now?: Date
}

export interface SnapshotVerification {
  valid: boolean
  expected: string
  actual: string
}

/**
 * Driver interface for snapshot storage backends.
 */
export interface SnapshotDriver {
  readonly name: SnapshotDriverName
  create(options?: SnapshotCreateOptions): Promise<SnapshotInfo>
  list(): Promise<SnapshotInfo[]>
  find(idOrPartial: string): Promise<SnapshotInfo | null>
  verify(id: string): Promise<SnapshotVerification | null>
}

const STATE_FILE = 'state.json.gz'
const BACKUP_FILE = 'controller-backup.unf'
const MANIFEST_FILE = 'manifest.json'

// ============================================================================
// Drivers
// ============================================================================

abstract class FilesystemSnapshotDriver implements SnapshotDriver {
  abstract readonly name: SnapshotDriverName

  constructor(
    protected readonly snapshotsDir: string,
    protected readonly controller: ControllerApi
  ) {}

  protected abstract capture(): Promise<{ data: Buffer; compression: 'gzip' | 'none'; dataFile: string; segments: number | null; rules: number | null }>

  async create(options: SnapshotCreateOptions = {}): Promise<SnapshotInfo> {
    const captured = await this.capture()
    const { site, url } = this.controller.describe()
    return writeSnapshot(this.snapshotsDir, {
      driver: this.name,
      site,
      controller: url,
      ...captured
    }, options)
  }

  async list(): Promise<SnapshotInfo[]> {
    return listSnapshots(this.snapshotsDir)
  }

  async find(idOrPartial: string): Promise<SnapshotInfo | null> {
    return findSnapshot(this.snapshotsDir, idOrPartial)
  }

  async verify(id: string): Promise<SnapshotVerification | null> {
    return verifySnapshot(this.snapshotsDir, id)
  }
}

/**
 * Captures segments and firewall rules as fetched from the controller
 */
export class LiveStateSnapshotDriver extends FilesystemSnapshotDriver {
  readonly name = 'live-state' as const

  protected async capture() {
    const state = await fetchLiveState(this.controller)
    const json = Buffer.from(JSON.stringify(state, null, 2) + '\n', 'utf-8')
    return {
      data: gzipSync(json),
      compression: 'gzip' as const,
      dataFile: STATE_FILE,
      segments: state.segments.length,
      rules: state.rules.length
    }
  }
}

/**
 * Stores the controller's native backup archive as-is
 */
export class ControllerBackupSnapshotDriver extends FilesystemSnapshotDriver {
  readonly name = 'controller' as const

  protected async capture() {
    const archive = await this.controller.exportBackup()
    return {
      data: Buffer.from(archive),
      compression: 'none' as const,
      dataFile: BACKUP_FILE,
      segments: null,
      rules: null
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a snapshot driver based on config.
 */
export function createSnapshotDriver(
  driver: SnapshotDriverName,
  snapshotsDir: string,
  controller: ControllerApi
): SnapshotDriver {
  if (driver === 'controller') {
    return new ControllerBackupSnapshotDriver(snapshotsDir, controller)
  }
  return new LiveStateSnapshotDriver(snapshotsDir, controller)
}

/**
 * Adapt a driver to the applier's backup collaborator contract
 */
export function snapshotProvider(driver: SnapshotDriver, options: SnapshotCreateOptions = {}): SnapshotProvider {
  return {
    async snapshot(): Promise<SnapshotHandle> {
      try {
        return toHandle(await driver.create(options))
      } catch (error) {
        throw new SnapshotError(error instanceof Error ? error.message : String(error), error)
      }
    }
  }
}

export function toHandle(info: SnapshotInfo): SnapshotHandle {
  return {
    id: info.id,
    driver: info.driver,
    location: path.join(info.dirPath, info.dataFile),
    checksum: info.checksum,
    createdAt: info.timestamp
  }
}

// ============================================================================
// Core Operations (filesystem)
// ============================================================================

function checksumOf(data: Buffer): string {
  return 'sha256:' + createHash('sha256').update(data).digest('hex')
}

/**
 * Write data + manifest under <snapshotsDir>/<id>/
 */
export function writeSnapshot(
  snapshotsDir: string,
  captured: Omit<SnapshotManifest, 'id' | 'timestamp' | 'checksum' | 'name'> & { data: Buffer },
  options: SnapshotCreateOptions = {}
): SnapshotInfo {
  const now = options.now ?? new Date()
  const timestamp = now.toISOString().replace(/[:.]/g, '-')
  const suffix = options.name ? `_${sanitize(options.name)}` : ''
  const id = `${sanitize(captured.site) || 'site'}_${timestamp}${suffix}`
  const snapshotDir = path.join(snapshotsDir, id)

  fs.mkdirSync(snapshotDir, { recursive: true })

  const { data, ...meta } = captured
  fs.writeFileSync(path.join(snapshotDir, captured.dataFile), data)

  const manifest: SnapshotManifest = {
    id,
    ...meta,
    timestamp: now.toISOString(),
    checksum: checksumOf(data),
    name: options.name ?? null
  }
  fs.writeFileSync(
    path.join(snapshotDir, MANIFEST_FILE),
    JSON.stringify(manifest, null, 2) + '\n',
    'utf-8'
  )

  return { ...manifest, dirPath: snapshotDir }
}

function readManifest(manifestPath: string): SnapshotManifest | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(fs.readFileSync(manifestPath, 'utf-8'))
  } catch {
    return null
  }
  return isManifest(parsed) ? parsed : null
}

function isManifest(value: unknown): value is SnapshotManifest {
  if (value === null || typeof value !== 'object') return false
  return (
    'id' in value && typeof value.id === 'string' &&
    'driver' in value && (value.driver === 'live-state' || value.driver === 'controller') &&
    'timestamp' in value && typeof value.timestamp === 'string' &&
    'checksum' in value && typeof value.checksum === 'string' &&
    'dataFile' in value && typeof value.dataFile === 'string'
  )
}

/**
 * List snapshots newest first; directories without a readable manifest are ignored
 */
export function listSnapshots(snapshotsDir: string): SnapshotInfo[] {
  if (!fs.existsSync(snapshotsDir)) {
    return []
  }

  const snapshots: SnapshotInfo[] = []
  for (const entry of fs.readdirSync(snapshotsDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue
    const dirPath = path.join(snapshotsDir, entry.name)
    const manifest = readManifest(path.join(dirPath, MANIFEST_FILE))
    if (manifest) {
      snapshots.push({ ...manifest, dirPath })
    }
  }

  return snapshots.sort((a, b) => (a.timestamp < b.timestamp ? 1 : a.timestamp > b.timestamp ? -1 : 0))
}

/**
 * Find a snapshot by exact or unambiguous partial ID match.
 */
export function findSnapshot(snapshotsDir: string, idOrPartial: string): SnapshotInfo | null {
  const all = listSnapshots(snapshotsDir)
  const exact = all.find(s => s.id === idOrPartial)
  if (exact) return exact
  const partial = all.filter(s => s.id.includes(idOrPartial))
  if (partial.length === 1) return partial[0]
  return null
}

/**
 * Verify a snapshot's integrity by recomputing SHA256 and comparing with manifest.
 */
export function verifySnapshot(snapshotsDir: string, idOrPartial: string): SnapshotVerification | null {
  const info = findSnapshot(snapshotsDir, idOrPartial)
  if (!info) return null

  const dataPath = path.join(info.dirPath, info.dataFile)
  if (!fs.existsSync(dataPath)) {
    return { valid: false, expected: info.checksum, actual: 'missing' }
  }

  const actual = checksumOf(fs.readFileSync(dataPath))
  return { valid: info.checksum === actual, expected: info.checksum, actual }
}

function sanitize(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9.-]+/g, '-')
    .replace(/^-+|-+$/g, '')
}
