/**
 * Command context: working directory, .env, config and settings
 */

import fs from 'node:fs'
import path from 'node:path'
import dotenv from 'dotenv'
import { loadConfig, resolveSettings, type LoadedConfig } from '../../lib/config-loader.js'
import type { Settings, SettingsOverrides } from '../../types.js'
import * as ui from '../ui.js'

/** Options accepted by every command */
export interface GlobalOptions {
  cwd?: string
  verbose?: boolean
  quiet?: boolean
  controller?: string
  site?: string
}

export interface CliContext {
  cwd: string
  loaded: LoadedConfig
  settings: Settings
  /** Aborted on SIGINT */
  signal: AbortSignal
}

/**
 * Load .env from the working directory without overriding the
 * environment already set
 */
export function loadDotenv(cwd: string): number {
  const filePath = path.join(cwd, '.env')
  if (!fs.existsSync(filePath)) return 0

  const result = dotenv.config({ path: filePath, override: false, quiet: true })
  if (result.error) {
    ui.warn(`Could not read ${filePath}: ${result.error.message}`)
    return 0
  }
  return result.parsed ? Object.keys(result.parsed).length : 0
}

export function buildContext(
  globals: GlobalOptions,
  overrides: SettingsOverrides,
  signal: AbortSignal
): CliContext {
  const cwd = path.resolve(globals.cwd ?? process.cwd())

  const loadedVars = loadDotenv(cwd)
  if (loadedVars > 0) {
    ui.verbose(`Loaded ${loadedVars} variable${loadedVars === 1 ? '' : 's'} from .env`)
  }

  const loaded = loadConfig(cwd)
  ui.verbose(loaded.configDir ? `Config: ${loaded.configDir}` : 'No .netstate directory found, using defaults')

  const settings = resolveSettings(loaded, {
    ...overrides,
    controller: globals.controller,
    site: globals.site
  }, { cwd })

  return { cwd, loaded, settings, signal }
}
