/**
 * netstate backup verify <id>
 *
 * Recompute a snapshot's SHA-256 and compare it with its manifest.
 * Accepts a unique partial id.
 */

import { EXIT_CODES, type ExitCode } from '../../../lib/errors.js'
import { verifySnapshot } from '../../../lib/snapshot.js'
import type { CliContext } from '../../lib/context.js'
import { c } from '../../lib/colors.js'
import * as ui from '../../ui.js'

export interface BackupVerifyOptions {
  json?: boolean
}

export async function runBackupVerify(ctx: CliContext, id: string, options: BackupVerifyOptions): Promise<ExitCode> {
  const result = verifySnapshot(ctx.settings.snapshots.dir, id)

  if (!result) {
    ui.error(`No snapshot matches "${id}"`)
    ui.log(`List snapshots: ${c.command('netstate backup list')}`)
    return EXIT_CODES.usage
  }

  if (options.json) {
    ui.outputJson({ id, ...result })
  } else if (result.valid) {
    ui.output('valid')
    ui.success(`Checksum matches ${c.muted(result.expected)}`)
  } else {
    ui.output('invalid')
    ui.error('Checksum mismatch')
    ui.log(`  ${c.label('expected:')} ${result.expected}`)
    ui.log(`  ${c.label('actual:')}   ${result.actual}`)
  }
  return result.valid ? EXIT_CODES.success : EXIT_CODES.fatal
}
