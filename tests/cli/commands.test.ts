import { describe, it, expect, vi } from 'vitest'
import { summarizeDrift } from '../../src/cli/commands/status.js'
import { createController, withController } from '../../src/cli/lib/create-client.js'
import { HttpControllerClient } from '../../src/controller/http-client.js'
import { InMemoryController } from '../../src/controller/memory.js'
import { diff } from '../../src/domain/diff.js'
import { createDesiredState, createLiveState } from '../../src/domain/model.js'
import { ControllerNotConfiguredError } from '../../src/lib/errors.js'
import type { ControllerSettings } from '../../src/types.js'
import { rule, segment } from '../helpers/fixtures.js'

const SETTINGS: ControllerSettings = {
  url: 'https://controller.test:8443',
  username: 'admin',
  password: 'test-secret',
  site: 'default',
  unifiOs: false,
  timeoutMs: 30000,
  verifySsl: true
}

describe('summarizeDrift', () => {
  it('counts operations by kind', () => {
    const desired = createDesiredState([segment(10, { name: 'users' }), segment(20)], [])
    const live = createLiveState([segment(10), segment(40)], [rule(5)])

    expect(summarizeDrift(diff(desired, live))).toEqual({ inSync: false, creates: 1, updates: 1, deletes: 2 })
  })

  it('reports in sync for no operations', () => {
    expect(summarizeDrift([])).toEqual({ inSync: true, creates: 0, updates: 0, deletes: 0 })
  })
})

// ============================================================================
// Controller selection
// ============================================================================

describe('createController', () => {
  it('builds an HTTP client for http(s) URLs', () => {
    const controller = createController(SETTINGS)

    expect(controller).toBeInstanceOf(HttpControllerClient)
    expect(controller.describe()).toEqual({ kind: 'http', url: SETTINGS.url, site: 'default', unifiOs: false })
  })

  it('builds an in-memory controller for memory URLs', () => {
    const controller = createController({ ...SETTINGS, url: 'memory://lab', username: '', password: '' })

    expect(controller).toBeInstanceOf(InMemoryController)
    expect(controller.describe().site).toBe('lab')
  })

  it('falls back to the configured site for a bare memory URL', () => {
    expect(createController({ ...SETTINGS, url: 'memory://', site: 'home' }).describe().site).toBe('home')
  })

  it('explains what is missing', () => {
    expect(() => createController({ ...SETTINGS, url: '' })).toThrow('Controller not configured: no controller URL')
    expect(() => createController({ ...SETTINGS, url: 'ftp://controller' }))
      .toThrow('Controller not configured: unsupported URL "ftp://controller"')
    expect(() => createController({ ...SETTINGS, password: '' })).toThrow(ControllerNotConfiguredError)
  })
})

describe('withController', () => {
  it('closes the controller after the callback', async () => {
    const close = vi.spyOn(InMemoryController.prototype, 'close')

    const site = await withController({ ...SETTINGS, url: 'memory://lab' }, async controller => controller.describe().site)

    expect(site).toBe('lab')
    expect(close).toHaveBeenCalledTimes(1)
    close.mockRestore()
  })

  it('closes the controller when the callback throws', async () => {
    const close = vi.spyOn(InMemoryController.prototype, 'close')

    await expect(withController({ ...SETTINGS, url: 'memory://lab' }, async () => {
      throw new Error('boom')
    })).rejects.toThrow('boom')

    expect(close).toHaveBeenCalledTimes(1)
    close.mockRestore()
  })
})
