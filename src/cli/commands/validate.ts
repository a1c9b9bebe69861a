/**
 * netstate `validate` Command
 *
 * Checks the desired-state document offline. No controller call is made.
 *
 * Usage:
 *   netstate validate                     Validate network.yaml
 *   netstate validate -f lab.yaml         Another document
 *   netstate validate --profile usg3p     Check against another gateway
 *   netstate validate --json              Machine-readable result
 */

import { reconcile } from '../../domain/reconcile.js'
import { readDesiredStateDocument } from '../../lib/config-loader.js'
import { EXIT_CODES, type ExitCode } from '../../lib/errors.js'
import type { CliContext } from '../lib/context.js'
import { printViolations } from '../lib/report.js'
import { c } from '../lib/colors.js'
import * as ui from '../ui.js'

export interface ValidateCommandOptions {
  json?: boolean
}

export async function runValidate(ctx: CliContext, options: ValidateCommandOptions): Promise<ExitCode> {
  const { desiredStatePath, hardwareProfile } = ctx.settings
  ui.verbose(`Validating ${desiredStatePath} against ${hardwareProfile.id}`)

  const document = readDesiredStateDocument(desiredStatePath)
  const outcome = await reconcile({ mode: 'validate', document, profile: hardwareProfile })

  if (outcome.stage !== 'validate') {
    return outcome.exitCode
  }

  if (outcome.error) {
    if (options.json) {
      ui.outputJson({
        valid: false,
        file: desiredStatePath,
        profile: hardwareProfile.id,
        stage: outcome.error.stage,
        violations: outcome.error.violations
      })
    } else {
      printViolations(outcome.error)
    }
    return outcome.exitCode
  }

  const segments = outcome.desired?.segments.length ?? 0
  const rules = outcome.desired?.rules.length ?? 0

  if (options.json) {
    ui.outputJson({
      valid: true,
      file: desiredStatePath,
      profile: hardwareProfile.id,
      segments,
      rules,
      maxSegments: hardwareProfile.maxSegments
    })
  } else {
    ui.success(
      `${desiredStatePath} is valid: ${segments} segment${segments === 1 ? '' : 's'}, ${rules} rule${rules === 1 ? '' : 's'} ` +
      c.muted(`(${hardwareProfile.label}: ${segments}/${hardwareProfile.maxSegments} segments)`)
    )
  }
  return EXIT_CODES.success
}
