/**
 * Shared helper for creating the controller client from resolved settings
 *
 * Supported URLs:
 *   https://host[:port]   UniFi Network controller (HttpControllerClient)
 *   memory://<site>       throwaway in-memory controller for rehearsals
 */

import type { ControllerApi } from '../../controller/api.js'
import { HttpControllerClient } from '../../controller/http-client.js'
import { InMemoryController } from '../../controller/memory.js'
import { ControllerNotConfiguredError } from '../../lib/errors.js'
import type { ControllerSettings } from '../../types.js'
import * as ui from '../ui.js'

const MEMORY_SCHEME = 'memory://'

/**
 * Create a controller client
 *
 * Credentials are required for HTTP controllers only.
 */
export function createController(settings: ControllerSettings): ControllerApi {
  const { url } = settings

  if (!url) {
    throw new ControllerNotConfiguredError(
      'no controller URL',
      'Set controller.url in .netstate/config.yaml or UNIFI_CONTROLLER_URL, or pass --controller'
    )
  }

  if (url.startsWith(MEMORY_SCHEME)) {
    const site = url.slice(MEMORY_SCHEME.length) || settings.site
    ui.verbose(`Using in-memory controller (site ${site})`)
    return new InMemoryController({ site })
  }

  if (!/^https?:\/\//.test(url)) {
    throw new ControllerNotConfiguredError(`unsupported URL "${url}"`, 'Use https://host:port or memory://<site>')
  }

  if (!settings.username || !settings.password) {
    throw new ControllerNotConfiguredError(
      'credentials are missing',
      'Set UNIFI_USERNAME and UNIFI_PASSWORD (a .env file works), or controller.username and controller.password in config.local.yaml'
    )
  }

  ui.verbose(`Using controller ${url} (site ${settings.site}${settings.unifiOs ? ', UniFi OS' : ''})`)
  if (!settings.verifySsl) {
    ui.verbose('TLS certificate verification is off')
  }
  return new HttpControllerClient({
    url,
    username: settings.username,
    password: settings.password,
    site: settings.site,
    unifiOs: settings.unifiOs,
    timeoutMs: settings.timeoutMs,
    verifySsl: settings.verifySsl
  })
}

/**
 * Execute a function with a controller, closing the session afterwards
 */
export async function withController<T>(
  settings: ControllerSettings,
  fn: (controller: ControllerApi) => Promise<T>
): Promise<T> {
  const controller = createController(settings)
  try {
    return await fn(controller)
  } finally {
    await controller.close().catch((err: unknown) => {
      ui.verbose(`Logout failed: ${err instanceof Error ? err.message : String(err)}`)
    })
  }
}
