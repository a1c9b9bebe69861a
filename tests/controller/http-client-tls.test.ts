import { describe, it, expect, vi, afterEach } from 'vitest'
import { Agent } from 'undici'
import { HttpControllerClient } from '../../src/controller/http-client.js'
import type { FetchLike } from '../../src/controller/http-client.js'
import { BASE_URL, FakeUnifi, ok } from '../helpers/fake-unifi.js'

const undiciFetch = vi.hoisted(() => vi.fn())

vi.mock('undici', async importOriginal => {
  const actual = await importOriginal<typeof import('undici')>()
  return { ...actual, fetch: undiciFetch }
})

function client(verifySsl?: boolean) {
  return new HttpControllerClient({
    url: BASE_URL,
    username: 'admin',
    password: 'test-secret',
    verifySsl
  })
}

function fakeController(): FakeUnifi {
  return new FakeUnifi().on('GET', '/api/s/default/rest/networkconf', ok([]))
}

afterEach(() => {
  undiciFetch.mockReset()
  vi.unstubAllGlobals()
})

describe('HttpControllerClient certificate verification', () => {
  it('uses the global fetch by default', async () => {
    const fake = fakeController()
    const globalFetch = vi.fn<Parameters<FetchLike>, ReturnType<FetchLike>>(fake.fetch)
    vi.stubGlobal('fetch', globalFetch)

    await client().fetchSegments()

    expect(fake.calls).toEqual(['GET /api/s/default/rest/networkconf'])
    expect(undiciFetch).not.toHaveBeenCalled()
    expect(globalFetch.mock.calls[0][1]).not.toHaveProperty('dispatcher')
  })

  it('sends every request through a dispatcher that accepts self-signed certificates', async () => {
    const fake = fakeController()
    undiciFetch.mockImplementation(fake.fetch)

    await client(false).fetchSegments()

    expect(fake.calls).toEqual(['GET /api/s/default/rest/networkconf'])
    expect(undiciFetch).toHaveBeenCalledTimes(2)
    const dispatchers = undiciFetch.mock.calls.map(call => call[1])
    expect(dispatchers).toEqual([
      expect.objectContaining({ method: 'POST', dispatcher: expect.any(Agent) }),
      expect.objectContaining({ method: 'GET', dispatcher: expect.any(Agent) })
    ])
  })
})
