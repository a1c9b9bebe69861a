/**
 * HTTP controller client (UniFi Network API)
 *
 * Cookie-based session with lazy login and a single re-login when the
 * session expires. Every response is mapped to the ControllerError
 * taxonomy:
 *
 *   401/403          AuthenticationError       fatal
 *   429              RateLimitedError          transient (Retry-After)
 *   502/503/504      ServiceUnavailableError   transient
 *   fetch failure    NetworkError              transient
 *   timeout          TimeoutError              transient
 *   404              NotFoundError
 *   409              ConflictError
 *   400              RejectedError (ConflictError for "already exists")
 *   anything else    UnexpectedResponseError   fatal
 */

import { Agent, fetch as undiciFetch } from 'undici'
import {
  AuthenticationError,
  ConflictError,
  ControllerError,
  NetworkError,
  NotFoundError,
  RateLimitedError,
  RejectedError,
  ServiceUnavailableError,
  UnexpectedResponseError
} from '../lib/errors.js'
import { withTimeout } from '../lib/retry.js'
import { ruleKey, segmentKey } from '../domain/types.js'
import type { FirewallRule, NetworkSegment, RuleKey } from '../domain/types.js'
import type { ControllerApi, ControllerDescription } from './api.js'
import {
  chainFromRuleset,
  networkFromSegment,
  recordFromRule,
  recordId,
  ruleFromRecord,
  segmentFromNetwork,
  vlanOfNetwork,
  type UnifiRecord
} from './unifi-records.js'

// ============================================================================
// Transport types
// ============================================================================

/** The subset of a fetch Response the client reads */
export interface HttpResponse {
  status: number
  headers: {
    get(name: string): string | null
    getSetCookie?(): string[]
  }
  text(): Promise<string>
  arrayBuffer(): Promise<ArrayBuffer>
}

export interface HttpRequestInit {
  method: string
  headers: Record<string, string>
  body?: string
  signal: AbortSignal
}

export type FetchLike = (url: string, init: HttpRequestInit) => Promise<HttpResponse>

export interface HttpControllerOptions {
  url: string
  username: string
  password: string
  site?: string
  /** UniFi OS consoles: /api/auth/login, /proxy/network prefix, CSRF token */
  unifiOs?: boolean
  timeoutMs?: number
  /** false skips certificate verification (self-signed controllers) */
  verifySsl?: boolean
  fetch?: FetchLike
}

export const DEFAULT_TIMEOUT_MS = 30000

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined
  const trimmed = value.trim()
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000
  }
  const date = Date.parse(trimmed)
  if (Number.isNaN(date)) return undefined
  return Math.max(0, date - now)
}

/**
 * Global fetch, or undici's with a dispatcher that accepts any certificate
 */
export function createFetch(verifySsl: boolean): FetchLike {
  if (verifySsl) {
    return (url, init) => fetch(url, init)
  }
  const dispatcher = new Agent({ connect: { rejectUnauthorized: false } })
  return (url, init) => undiciFetch(url, { ...init, dispatcher })
}

interface RequestOptions {
  /** Human-readable target for NotFound/Conflict/Rejected messages */
  target: string
  body?: unknown
}

// ============================================================================
// Client
// ============================================================================

export class HttpControllerClient implements ControllerApi {
  private readonly baseUrl: string
  private readonly site: string
  private readonly unifiOs: boolean
  private readonly timeoutMs: number
  private readonly fetchImpl: FetchLike

  private cookies = new Map<string, string>()
  private csrfToken?: string
  private loginPromise?: Promise<void>

  /** Remote ids resolved by identity; refreshed on every fetch */
  private networkIds = new Map<number, string>()
  private ruleIds = new Map<string, string>()

  constructor(private readonly options: HttpControllerOptions) {
    this.baseUrl = options.url.replace(/\/+$/, '')
    this.site = options.site ?? 'default'
    this.unifiOs = options.unifiOs ?? false
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.fetchImpl = options.fetch ?? createFetch(options.verifySsl ?? true)
  }

  describe(): ControllerDescription {
    return { kind: 'http', url: this.baseUrl, site: this.site, unifiOs: this.unifiOs }
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  async fetchSegments(): Promise<NetworkSegment[]> {
    const records = await this.loadNetworks()
    return records
      .map(segmentFromNetwork)
      .filter((segment): segment is NetworkSegment => segment !== undefined)
  }

  async fetchFirewallRules(): Promise<FirewallRule[]> {
    // Selectors reference networks by id, so the network map must be current
    const networks = await this.loadNetworks()
    const vlanById = new Map<string, number>()
    for (const record of networks) {
      const id = recordId(record)
      const vlan = vlanOfNetwork(record)
      if (id && vlan !== undefined) vlanById.set(id, vlan)
    }

    const records = await this.loadRules()
    return records
      .map(record => ruleFromRecord(record, vlanById))
      .filter((rule): rule is FirewallRule => rule !== undefined)
  }

  // ==========================================================================
  // Segments
  // ==========================================================================

  async createSegment(segment: NetworkSegment): Promise<void> {
    const target = `segment ${segmentKey(segment.vlan)}`
    const data = await this.request('POST', '/rest/networkconf', { target, body: networkFromSegment(segment) })
    const id = data.length > 0 ? recordId(data[0]) : undefined
    if (id) this.networkIds.set(segment.vlan, id)
  }

  async updateSegment(segment: NetworkSegment): Promise<void> {
    const target = `segment ${segmentKey(segment.vlan)}`
    const id = await this.resolveNetworkId(segment.vlan, target)
    await this.request('PUT', `/rest/networkconf/${id}`, { target, body: networkFromSegment(segment) })
  }

  async deleteSegment(vlan: number): Promise<void> {
    const target = `segment ${segmentKey(vlan)}`
    const id = await this.resolveNetworkId(vlan, target)
    await this.request('DELETE', `/rest/networkconf/${id}`, { target })
    this.networkIds.delete(vlan)
  }

  // ==========================================================================
  // Firewall rules
  // ==========================================================================

  async createRule(rule: FirewallRule): Promise<void> {
    const target = `rule ${ruleKey(rule)}`
    const body = await this.ruleRecord(rule, target)
    const data = await this.request('POST', '/rest/firewallrule', { target, body })
    const id = data.length > 0 ? recordId(data[0]) : undefined
    if (id) this.ruleIds.set(ruleKey(rule), id)
  }

  async updateRule(rule: FirewallRule, previousKey?: RuleKey): Promise<void> {
    const from = ruleKey(previousKey ?? rule)
    const target = `rule ${from}`
    const id = await this.resolveRuleId(from, target)
    const body = await this.ruleRecord(rule, target)
    await this.request('PUT', `/rest/firewallrule/${id}`, { target, body })
    this.ruleIds.delete(from)
    this.ruleIds.set(ruleKey(rule), id)
  }

  async deleteRule(key: RuleKey): Promise<void> {
    const identity = ruleKey(key)
    const target = `rule ${identity}`
    const id = await this.resolveRuleId(identity, target)
    await this.request('DELETE', `/rest/firewallrule/${id}`, { target })
    this.ruleIds.delete(identity)
  }

  // ==========================================================================
  // Backup
  // ==========================================================================

  async exportBackup(): Promise<Uint8Array> {
    const data = await this.request('POST', '/cmd/backup', { target: 'backup', body: { cmd: 'backup', days: 0 } })
    const url = data.length > 0 ? data[0].url : undefined
    if (typeof url !== 'string' || url.length === 0) {
      throw new UnexpectedResponseError('backup export', 200, 'backup response did not include a download url')
    }
    const path = this.unifiOs ? `/proxy/network${url}` : url
    const response = await this.send('GET', path, { target: 'backup download' })
    return new Uint8Array(await response.arrayBuffer())
  }

  async close(): Promise<void> {
    if (this.cookies.size === 0) return
    const path = this.unifiOs ? '/api/auth/logout' : '/api/logout'
    await this.send('POST', path, { target: 'logout', body: {} })
    this.cookies.clear()
    this.csrfToken = undefined
    this.loginPromise = undefined
  }

  // ==========================================================================
  // Identity resolution
  // ==========================================================================

  private async loadNetworks(): Promise<UnifiRecord[]> {
    const records = await this.request('GET', '/rest/networkconf', { target: 'networks' })
    this.networkIds.clear()
    for (const record of records) {
      const id = recordId(record)
      const vlan = vlanOfNetwork(record)
      if (id && vlan !== undefined && !this.networkIds.has(vlan)) {
        this.networkIds.set(vlan, id)
      }
    }
    return records
  }

  private async loadRules(): Promise<UnifiRecord[]> {
    const records = await this.request('GET', '/rest/firewallrule', { target: 'firewall rules' })
    this.ruleIds.clear()
    for (const record of records) {
      const id = recordId(record)
      const chain = typeof record.ruleset === 'string' ? chainFromRuleset(record.ruleset) : undefined
      const priority = typeof record.rule_index === 'number' ? record.rule_index : Number(record.rule_index)
      if (id && chain && Number.isInteger(priority)) {
        this.ruleIds.set(ruleKey({ chain, priority }), id)
      }
    }
    return records
  }

  private async resolveNetworkId(vlan: number, target: string): Promise<string> {
    let id = this.networkIds.get(vlan)
    if (!id) {
      await this.loadNetworks()
      id = this.networkIds.get(vlan)
    }
    if (!id) throw new NotFoundError(target)
    return id
  }

  private async resolveRuleId(identity: string, target: string): Promise<string> {
    let id = this.ruleIds.get(identity)
    if (!id) {
      await this.loadRules()
      id = this.ruleIds.get(identity)
    }
    if (!id) throw new NotFoundError(target)
    return id
  }

  private async ruleRecord(rule: FirewallRule, target: string): Promise<UnifiRecord> {
    const ids = new Map<number, string>()
    for (const selector of [rule.source, rule.destination]) {
      if (selector.kind !== 'segment' || ids.has(selector.vlan)) continue
      let id = this.networkIds.get(selector.vlan)
      if (!id) {
        await this.loadNetworks()
        id = this.networkIds.get(selector.vlan)
      }
      if (!id) {
        throw new RejectedError(target, `VLAN ${selector.vlan} does not exist on the controller`)
      }
      ids.set(selector.vlan, id)
    }
    return recordFromRule(rule, vlan => ids.get(vlan) ?? '')
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  /**
   * Site-scoped API call returning the `data` array of the envelope
   */
  private async request(method: string, path: string, options: RequestOptions): Promise<UnifiRecord[]> {
    const response = await this.send(method, this.sitePath(path), options)
    const text = await response.text()
    if (text.length === 0) return []

    let envelope: unknown
    try {
      envelope = JSON.parse(text)
    } catch {
      throw new UnexpectedResponseError(`${method} ${path}`, response.status, text)
    }

    if (!isRecord(envelope)) {
      throw new UnexpectedResponseError(`${method} ${path}`, response.status, text)
    }
    const meta = isRecord(envelope.meta) ? envelope.meta : {}
    if (meta.rc === 'error') {
      throw errorFromMessage(options.target, typeof meta.msg === 'string' ? meta.msg : 'unknown error')
    }
    return Array.isArray(envelope.data) ? envelope.data.filter(isRecord) : []
  }

  private sitePath(path: string): string {
    const prefix = this.unifiOs ? '/proxy/network' : ''
    return `${prefix}/api/s/${encodeURIComponent(this.site)}${path}`
  }

  /**
   * Authenticated request with one re-login on 401
   */
  private async send(method: string, path: string, options: RequestOptions): Promise<HttpResponse> {
    await this.ensureSession()

    let response = await this.perform(method, path, options.body)
    if (response.status === 401) {
      this.cookies.clear()
      this.loginPromise = undefined
      await this.ensureSession()
      response = await this.perform(method, path, options.body)
    }

    await this.check(response, method, path, options.target)
    return response
  }

  private ensureSession(): Promise<void> {
    if (!this.loginPromise) {
      this.loginPromise = this.login().catch(error => {
        this.loginPromise = undefined
        throw error
      })
    }
    return this.loginPromise
  }

  private async login(): Promise<void> {
    const path = this.unifiOs ? '/api/auth/login' : '/api/login'
    const response = await this.perform('POST', path, {
      username: this.options.username,
      password: this.options.password,
      remember: false
    })

    if (response.status === 400 || response.status === 401 || response.status === 403) {
      throw new AuthenticationError('invalid username or password')
    }
    await this.check(response, 'POST', path, 'login')
  }

  private async perform(method: string, path: string, body?: unknown): Promise<HttpResponse> {
    const headers: Record<string, string> = { accept: 'application/json' }
    if (body !== undefined) headers['content-type'] = 'application/json'
    if (this.cookies.size > 0) {
      headers.cookie = [...this.cookies].map(([name, value]) => `${name}=${value}`).join('; ')
    }
    if (this.csrfToken) headers['x-csrf-token'] = this.csrfToken

    const operation = `${method} ${path}`
    let response: HttpResponse
    try {
      response = await withTimeout(
        signal => this.fetchImpl(`${this.baseUrl}${path}`, {
          method,
          headers,
          body: body === undefined ? undefined : JSON.stringify(body),
          signal
        }),
        this.timeoutMs,
        operation
      )
    } catch (error) {
      if (error instanceof ControllerError) throw error
      throw new NetworkError(operation, error)
    }

    this.captureSession(response)
    return response
  }

  private captureSession(response: HttpResponse): void {
    const setCookies = response.headers.getSetCookie?.() ?? []
    for (const header of setCookies) {
      const [pair] = header.split(';')
      const eq = pair.indexOf('=')
      if (eq > 0) {
        this.cookies.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim())
      }
    }
    const csrf = response.headers.get('x-updated-csrf-token') ?? response.headers.get('x-csrf-token')
    if (csrf) this.csrfToken = csrf
  }

  private async check(response: HttpResponse, method: string, path: string, target: string): Promise<void> {
    const { status } = response
    if (status >= 200 && status < 300) return

    const operation = `${method} ${path}`
    switch (status) {
      case 401:
        throw new AuthenticationError('session rejected after re-login')
      case 403:
        throw new AuthenticationError('insufficient privileges')
      case 429:
        throw new RateLimitedError(operation, parseRetryAfter(response.headers.get('retry-after')))
      case 502:
      case 503:
      case 504:
        throw new ServiceUnavailableError(operation, status)
      case 404:
        throw new NotFoundError(target)
      case 409:
        throw new ConflictError(target)
      case 400:
        throw errorFromMessage(target, envelopeMessage(await response.text()))
      default:
        throw new UnexpectedResponseError(operation, status, await response.text())
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

function isRecord(value: unknown): value is UnifiRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

function envelopeMessage(text: string): string {
  try {
    const parsed: unknown = JSON.parse(text)
    if (isRecord(parsed) && isRecord(parsed.meta) && typeof parsed.meta.msg === 'string') {
      return parsed.meta.msg
    }
  } catch {
    return text || 'bad request'
  }
  return text || 'bad request'
}

/**
 * api.err.* messages: duplicates become conflicts, the rest rejections
 */
function errorFromMessage(target: string, message: string): ControllerError {
  if (/exist|duplicate|alreadyused|used/i.test(message)) {
    return new ConflictError(target, message)
  }
  return new RejectedError(target, message)
}
