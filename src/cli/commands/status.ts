/**
 * netstate `status` Command
 *
 * Controller reachability, live inventory and drift against the desired
 * state. Read-only.
 *
 * Usage:
 *   netstate status
 *   netstate status --json
 */

import fs from 'node:fs'
import { RetryingController } from '../../controller/retrying.js'
import { diff } from '../../domain/diff.js'
import { fetchLiveState } from '../../domain/live.js'
import type { LiveState, Operation } from '../../domain/types.js'
import { validate } from '../../domain/validator.js'
import { readDesiredStateDocument } from '../../lib/config-loader.js'
import { EXIT_CODES, isControllerError, type ExitCode } from '../../lib/errors.js'
import type { CliContext } from '../lib/context.js'
import { withController } from '../lib/create-client.js'
import { c } from '../lib/colors.js'
import { logRetry } from '../lib/report.js'
import * as ui from '../ui.js'

export interface StatusCommandOptions {
  json?: boolean
}

export interface DriftSummary {
  inSync: boolean
  creates: number
  updates: number
  deletes: number
}

type Drift =
  | { state: 'computed'; summary: DriftSummary }
  | { state: 'missing' | 'invalid'; reason: string }

export function summarizeDrift(operations: readonly Operation[]): DriftSummary {
  const count = (kind: Operation['kind']) => operations.filter(op => op.kind === kind).length
  return {
    inSync: operations.length === 0,
    creates: count('create'),
    updates: count('update'),
    deletes: count('delete')
  }
}

function computeDrift(ctx: CliContext, live: LiveState): Drift {
  const { desiredStatePath, hardwareProfile } = ctx.settings
  if (!fs.existsSync(desiredStatePath)) {
    return { state: 'missing', reason: `${desiredStatePath} not found` }
  }

  const validation = validate(readDesiredStateDocument(desiredStatePath), hardwareProfile)
  if (!validation.ok) {
    return {
      state: 'invalid',
      reason: `${validation.violations.length} ${validation.stage} violation${validation.violations.length === 1 ? '' : 's'}`
    }
  }
  return { state: 'computed', summary: summarizeDrift(diff(validation.state, live)) }
}

function describeDrift(drift: Drift): string {
  if (drift.state !== 'computed') {
    return c.warning(`unknown (${drift.reason})`)
  }
  const { summary } = drift
  if (summary.inSync) return c.success('in sync')
  return c.modified(`${summary.creates} to create, ${summary.updates} to update, ${summary.deletes} to delete`)
}

export async function runStatus(ctx: CliContext, options: StatusCommandOptions): Promise<ExitCode> {
  const { settings } = ctx

  return withController(settings.controller, async (controller) => {
    const description = controller.describe()
    const reader = new RetryingController(controller, { ...settings.apply.retry, onRetry: logRetry })

    const started = Date.now()
    let live: LiveState
    try {
      live = await fetchLiveState(reader)
    } catch (err) {
      if (!isControllerError(err)) throw err
      if (options.json) {
        ui.outputJson({ controller: description, reachable: false, error: err.toJSON() })
      } else {
        ui.output(ui.formatKeyValue([
          ['Controller', description.url],
          ['Site', description.site],
          ['Reachable', c.error(`no (${err.message})`)]
        ]))
      }
      return EXIT_CODES.fatal
    }
    const latencyMs = Date.now() - started

    const drift = computeDrift(ctx, live)

    if (options.json) {
      ui.outputJson({
        controller: description,
        reachable: true,
        latencyMs,
        live: { segments: live.segments.length, rules: live.rules.length, fetchedAt: live.fetchedAt },
        profile: { id: settings.hardwareProfile.id, maxSegments: settings.hardwareProfile.maxSegments },
        desiredState: settings.desiredStatePath,
        drift
      })
      return EXIT_CODES.success
    }

    ui.output(ui.formatKeyValue([
      ['Controller', `${description.url}${description.unifiOs ? c.muted(' (UniFi OS)') : ''}`],
      ['Site', c.site(description.site)],
      ['Reachable', c.success(`yes (${latencyMs}ms)`)],
      ['Segments', String(live.segments.length)],
      ['Rules', String(live.rules.length)],
      ['Profile', `${settings.hardwareProfile.label} ${c.muted(`(max ${settings.hardwareProfile.maxSegments} segments)`)}`],
      ['Desired state', settings.desiredStatePath],
      ['Drift', describeDrift(drift)]
    ]))
    return EXIT_CODES.success
  })
}
