/**
 * netstate Config Loader
 *
 * Loads and merges configuration from .netstate/config.yaml files with
 * support for inheritance via "extends", a gitignored config.local.yaml
 * for credentials, and environment variable expansion.
 */

import fs from 'node:fs'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import type {
  ControllerSettings,
  NetstateConfig,
  Settings,
  SettingsOverrides,
  SnapshotDriverName
} from '../types.js'
import { SNAPSHOT_DRIVERS } from '../types.js'
import type { HardwareProfileConfig } from './hardware-profiles.js'
import { buildProfileRegistry, resolveHardwareProfile } from './hardware-profiles.js'
import { DEFAULT_RETRY_POLICY } from './retry.js'
import { DEFAULT_TIMEOUT_MS } from '../controller/http-client.js'
import {
  CircularExtendsError,
  ConfigNotFoundError,
  DesiredStateInvalidError,
  DesiredStateNotFoundError,
  ExtendsDepthError,
  InvalidConfigError
} from './errors.js'

export const CONFIG_DIR = '.netstate'
const CONFIG_FILE = 'config.yaml'
const CONFIG_LOCAL_FILE = 'config.local.yaml'
const MAX_SEARCH_DEPTH = 5
const MAX_EXTENDS_DEPTH = 10

export const DEFAULT_DESIRED_STATE = 'network.yaml'
export const DEFAULT_HARDWARE_PROFILE = 'udm-pro'

type Env = Record<string, string | undefined>
type RawConfig = Record<string, unknown>

function isRecord(value: unknown): value is RawConfig {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

// ============================================================================
// Environment expansion
// ============================================================================

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
export function expandEnvVars(str: string, env: Env = process.env): string {
  // Handle ${VAR:-default} syntax
  str = str.replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, varName: string, defaultValue: string) => {
    return env[varName] || defaultValue
  })

  // Handle ${VAR} syntax
  str = str.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    return env[varName] || ''
  })

  // Handle $VAR syntax (word boundary)
  str = str.replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => {
    return env[varName] || ''
  })

  return str
}

/**
 * Recursively expand env vars in parsed YAML
 */
export function expandEnvVarsInObject(value: unknown, env: Env = process.env): unknown {
  if (typeof value === 'string') {
    return expandEnvVars(value, env)
  }
  if (Array.isArray(value)) {
    return value.map(item => expandEnvVarsInObject(item, env))
  }
  if (isRecord(value)) {
    const result: RawConfig = {}
    for (const [key, item] of Object.entries(value)) {
      result[key] = expandEnvVarsInObject(item, env)
    }
    return result
  }
  return value
}

// ============================================================================
// Discovery & merging
// ============================================================================

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: NetstateConfig = {
  version: '1',
  desired_state: DEFAULT_DESIRED_STATE,
  apply: {
    concurrency: 1,
    snapshot: true
  },
  snapshots: {
    driver: 'live-state',
    dir: 'snapshots'
  }
}

/**
 * Find the .netstate directory by searching up from the current directory
 */
export function findConfigDir(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir)
  let depth = 0

  while (depth < MAX_SEARCH_DEPTH) {
    const configDir = path.join(currentDir, CONFIG_DIR)
    const configFile = path.join(configDir, CONFIG_FILE)

    if (fs.existsSync(configFile)) {
      return configDir
    }

    const parentDir = path.dirname(currentDir)
    if (parentDir === currentDir) {
      // Reached root
      break
    }

    currentDir = parentDir
    depth++
  }

  return null
}

/**
 * Load a single config file (env vars expanded)
 */
function loadConfigFile(configPath: string, env: Env, required: boolean = true): RawConfig {
  if (!fs.existsSync(configPath)) {
    if (required) {
      throw new ConfigNotFoundError(configPath)
    }
    return {}
  }

  let parsed: unknown
  try {
    parsed = parseYaml(fs.readFileSync(configPath, 'utf-8'))
  } catch (error) {
    throw new InvalidConfigError(error instanceof Error ? error.message : String(error), configPath, error)
  }

  if (parsed === null || parsed === undefined) return {}
  if (!isRecord(parsed)) {
    throw new InvalidConfigError('top level must be a mapping', configPath)
  }

  const expanded = expandEnvVarsInObject(parsed, env)
  return isRecord(expanded) ? expanded : {}
}

/**
 * Deep merge two config objects; arrays and scalars from source win
 */
export function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  const result: RawConfig = { ...target }

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key]

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue)
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue
    }
  }

  return result
}

/**
 * Load config with inheritance support. The result is not yet merged with
 * defaults.
 */
function loadConfigWithExtends(
  configPath: string,
  env: Env,
  visited: Set<string> = new Set(),
  depth: number = 0
): RawConfig {
  if (depth > MAX_EXTENDS_DEPTH) {
    throw new ExtendsDepthError(MAX_EXTENDS_DEPTH)
  }

  const absolutePath = path.resolve(configPath)

  if (visited.has(absolutePath)) {
    throw new CircularExtendsError(absolutePath)
  }

  visited.add(absolutePath)

  const { extends: parent, ...config } = loadConfigFile(absolutePath, env)

  if (parent === undefined) {
    return config
  }
  if (typeof parent !== 'string') {
    throw new InvalidConfigError('"extends" must be a path', absolutePath)
  }

  const extendsPath = path.resolve(path.dirname(absolutePath), parent)
  const parentConfig = loadConfigWithExtends(extendsPath, env, visited, depth + 1)

  // Merge: parent <- current
  return deepMerge(parentConfig, config)
}

export interface LoadedConfig {
  config: NetstateConfig
  /** The .netstate directory, or null when running on defaults */
  configDir: string | null
}

/**
 * Load configuration from the nearest .netstate/config.yaml
 * Also merges config.local.yaml if it exists (for credentials/overrides)
 */
export function loadConfig(startDir?: string, env: Env = process.env): LoadedConfig {
  const configDir = findConfigDir(startDir)

  if (!configDir) {
    return { config: structuredClone(DEFAULT_CONFIG), configDir: null }
  }

  const configPath = path.join(configDir, CONFIG_FILE)
  let raw = loadConfigWithExtends(configPath, env)

  const localConfig = loadConfigFile(path.join(configDir, CONFIG_LOCAL_FILE), env, false)
  if (Object.keys(localConfig).length > 0) {
    raw = deepMerge(raw, localConfig)
  }

  return { config: parseConfig(deepMerge(toRaw(DEFAULT_CONFIG), raw), configPath), configDir }
}

function toRaw(config: NetstateConfig): RawConfig {
  const raw: unknown = JSON.parse(JSON.stringify(config))
  return isRecord(raw) ? raw : {}
}

// ============================================================================
// Typed parsing
// ============================================================================

/**
 * Check a merged raw config against the NetstateConfig shape
 */
export function parseConfig(raw: RawConfig, configPath?: string): NetstateConfig {
  const fail = (message: string): never => {
    throw new InvalidConfigError(message, configPath)
  }

  const optionalString = (value: unknown, field: string): string | undefined => {
    if (value === undefined || value === null || value === '') return undefined
    if (typeof value === 'number') return String(value)
    if (typeof value !== 'string') return fail(`${field} must be a string`)
    return value
  }
  const optionalNumber = (value: unknown, field: string, min: number): number | undefined => {
    if (value === undefined || value === null) return undefined
    if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
      return fail(`${field} must be an integer >= ${min}`)
    }
    return value
  }
  const optionalBoolean = (value: unknown, field: string): boolean | undefined => {
    if (value === undefined || value === null) return undefined
    if (typeof value !== 'boolean') return fail(`${field} must be true or false`)
    return value
  }
  const section = (value: unknown, field: string): RawConfig => {
    if (value === undefined || value === null) return {}
    if (!isRecord(value)) return fail(`${field} must be a mapping`)
    return value
  }

  const controller = section(raw.controller, 'controller')
  const apply = section(raw.apply, 'apply')
  const retry = section(apply.retry, 'apply.retry')
  const snapshots = section(raw.snapshots, 'snapshots')
  const profiles = section(raw.hardware_profiles, 'hardware_profiles')

  const driver = optionalString(snapshots.driver, 'snapshots.driver')
  if (driver !== undefined && !isSnapshotDriver(driver)) {
    fail(`snapshots.driver must be one of ${SNAPSHOT_DRIVERS.join(', ')}`)
  }

  const hardwareProfiles: Record<string, HardwareProfileConfig> = {}
  for (const [id, entry] of Object.entries(profiles)) {
    const profile = section(entry, `hardware_profiles.${id}`)
    const maxSegments = optionalNumber(profile.max_segments, `hardware_profiles.${id}.max_segments`, 0)
    if (maxSegments === undefined) {
      fail(`hardware_profiles.${id}.max_segments is required`)
    } else {
      hardwareProfiles[id] = { label: optionalString(profile.label, `hardware_profiles.${id}.label`), max_segments: maxSegments }
    }
  }

  return {
    version: optionalString(raw.version, 'version') ?? '1',
    site: optionalString(raw.site, 'site'),
    hardware_profile: optionalString(raw.hardware_profile, 'hardware_profile'),
    desired_state: optionalString(raw.desired_state, 'desired_state'),
    controller: {
      url: optionalString(controller.url, 'controller.url'),
      username: optionalString(controller.username, 'controller.username'),
      password: optionalString(controller.password, 'controller.password'),
      site: optionalString(controller.site, 'controller.site'),
      unifi_os: optionalBoolean(controller.unifi_os, 'controller.unifi_os'),
      timeout_ms: optionalNumber(controller.timeout_ms, 'controller.timeout_ms', 1),
      verify_ssl: optionalBoolean(controller.verify_ssl, 'controller.verify_ssl')
    },
    apply: {
      concurrency: optionalNumber(apply.concurrency, 'apply.concurrency', 1),
      snapshot: optionalBoolean(apply.snapshot, 'apply.snapshot'),
      retry: {
        max_attempts: optionalNumber(retry.max_attempts, 'apply.retry.max_attempts', 1),
        base_delay_ms: optionalNumber(retry.base_delay_ms, 'apply.retry.base_delay_ms', 0),
        max_delay_ms: optionalNumber(retry.max_delay_ms, 'apply.retry.max_delay_ms', 0)
      }
    },
    snapshots: {
      driver: driver !== undefined && isSnapshotDriver(driver) ? driver : undefined,
      dir: optionalString(snapshots.dir, 'snapshots.dir')
    },
    hardware_profiles: hardwareProfiles
  }
}

/**
 * UNIFI_VERIFY_SSL: verification stays on unless the value is not "true"
 */
function parseVerifySsl(value: string | undefined): boolean {
  if (value === undefined || value.trim() === '') return true
  return value.trim().toLowerCase() === 'true'
}

function isSnapshotDriver(value: string): value is SnapshotDriverName {
  return SNAPSHOT_DRIVERS.some(driver => driver === value)
}

// ============================================================================
// Settings resolution
// ============================================================================

/**
 * Resolve runtime settings. Precedence: command line, config, environment
 * (UNIFI_CONTROLLER_URL, UNIFI_USERNAME, UNIFI_PASSWORD, UNIFI_SITE,
 * UNIFI_VERIFY_SSL, HARDWARE_PROFILE), defaults.
 */
export function resolveSettings(
  loaded: LoadedConfig,
  overrides: SettingsOverrides = {},
  options: { cwd?: string; env?: Env } = {}
): Settings {
  const { config, configDir } = loaded
  const env = options.env ?? process.env
  const rootDir = configDir ? path.dirname(configDir) : path.resolve(options.cwd ?? process.cwd())

  const registry = buildProfileRegistry(config.hardware_profiles)
  const profileId = overrides.profile ?? config.hardware_profile ?? env.HARDWARE_PROFILE ?? DEFAULT_HARDWARE_PROFILE

  const site = overrides.site ?? config.controller?.site ?? config.site ?? env.UNIFI_SITE ?? 'default'
  const controller: ControllerSettings = {
    url: overrides.controller ?? config.controller?.url ?? env.UNIFI_CONTROLLER_URL ?? '',
    username: config.controller?.username ?? env.UNIFI_USERNAME ?? '',
    password: config.controller?.password ?? env.UNIFI_PASSWORD ?? '',
    site,
    unifiOs: config.controller?.unifi_os ?? false,
    timeoutMs: config.controller?.timeout_ms ?? DEFAULT_TIMEOUT_MS,
    verifySsl: config.controller?.verify_ssl ?? parseVerifySsl(env.UNIFI_VERIFY_SSL)
  }

  const retry = config.apply?.retry
  const desiredState = overrides.file ?? config.desired_state ?? DEFAULT_DESIRED_STATE
  const baseDir = overrides.file ? path.resolve(options.cwd ?? process.cwd()) : rootDir

  return {
    rootDir,
    configDir,
    desiredStatePath: path.resolve(baseDir, desiredState),
    hardwareProfile: resolveHardwareProfile(profileId, registry),
    controller,
    apply: {
      concurrency: overrides.concurrency ?? config.apply?.concurrency ?? 1,
      snapshot: overrides.snapshot ?? config.apply?.snapshot ?? true,
      retry: {
        maxAttempts: retry?.max_attempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
        baseDelayMs: retry?.base_delay_ms ?? DEFAULT_RETRY_POLICY.baseDelayMs,
        maxDelayMs: retry?.max_delay_ms ?? DEFAULT_RETRY_POLICY.maxDelayMs,
        backoffMultiplier: DEFAULT_RETRY_POLICY.backoffMultiplier
      }
    },
    snapshots: {
      driver: config.snapshots?.driver ?? 'live-state',
      dir: path.resolve(configDir ?? path.join(rootDir, CONFIG_DIR), config.snapshots?.dir ?? 'snapshots')
    }
  }
}

// ============================================================================
// Desired-state document
// ============================================================================

/**
 * Read and parse the desired-state document (YAML or JSON).
 * Syntax errors are reported as structural violations.
 */
export function readDesiredStateDocument(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new DesiredStateNotFoundError(filePath)
  }

  const content = fs.readFileSync(filePath, 'utf-8')
  try {
    return parseYaml(content)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new DesiredStateInvalidError('structural', [{
      class: 'structural',
      field: '(document)',
      value: path.basename(filePath),
      rule: 'document.syntax',
      message: `Cannot parse ${path.basename(filePath)}: ${message}`
    }])
  }
}
