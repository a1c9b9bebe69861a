import { describe, it, expect, vi } from 'vitest'
import { InMemoryController } from '../../src/controller/memory.js'
import { RetryingController } from '../../src/controller/retrying.js'
import {
  AuthenticationError,
  NetworkError,
  RateLimitedError,
  RetryExhaustedError
} from '../../src/lib/errors.js'
import { segment } from '../helpers/fixtures.js'

function setup(options: ConstructorParameters<typeof RetryingController>[1] = {}) {
  const inner = new InMemoryController({ withManagement: false })
  const delays: number[] = []
  const client = new RetryingController(inner, {
    baseDelayMs: 100,
    sleep: async ms => {
      delays.push(ms)
    },
    ...options
  })
  return { inner, client, delays }
}

describe('RetryingController', () => {
  it('retries transient failures with backoff', async () => {
    const onRetry = vi.fn()
    const { inner, client, delays } = setup({ onRetry })
    const reset = () => new NetworkError('createSegment', new Error('ECONNRESET'))
    inner.injectFault('createSegment', reset(), reset())

    await client.createSegment(segment(30))

    expect(delays).toEqual([100, 200])
    expect(onRetry.mock.calls.map(call => [call[0], call[1]])).toEqual([
      ['createSegment vlan 30', 1],
      ['createSegment vlan 30', 2]
    ])
    expect(inner.state.segments.map(s => s.vlan)).toEqual([30])
  })

  it('waits as long as the controller asks on 429', async () => {
    const { inner, client, delays } = setup()
    inner.injectFault('fetchSegments', new RateLimitedError('GET rest/networkconf', 1500))

    await client.fetchSegments()

    expect(delays).toEqual([1500])
  })

  it('does not retry fatal errors', async () => {
    const { inner, client, delays } = setup()
    inner.injectFault('fetchFirewallRules', new AuthenticationError())

    await expect(client.fetchFirewallRules()).rejects.toBeInstanceOf(AuthenticationError)
    expect(delays).toEqual([])
  })

  it('gives up after maxAttempts', async () => {
    const { inner, client } = setup({ maxAttempts: 2 })
    const refused = () => new NetworkError('deleteSegment', new Error('ECONNREFUSED'))
    inner.injectFault('deleteSegment', refused(), refused())

    const error: unknown = await client.deleteSegment(40).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(RetryExhaustedError)
    expect(error).toMatchObject({ attempts: 2, code: 'RETRY_EXHAUSTED' })
    expect(inner.calls).toHaveLength(2)
  })

  it('passes describe and close through', async () => {
    const { client } = setup()
    expect(client.describe().kind).toBe('memory')
    await expect(client.close()).resolves.toBeUndefined()
  })
})
