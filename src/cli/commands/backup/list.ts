/**
 * netstate backup list
 *
 * List local snapshots, newest first. No controller call.
 */

import { EXIT_CODES, type ExitCode } from '../../../lib/errors.js'
import { listSnapshots } from '../../../lib/snapshot.js'
import type { CliContext } from '../../lib/context.js'
import { c } from '../../lib/colors.js'
import * as ui from '../../ui.js'

export interface BackupListOptions {
  json?: boolean
}

export async function runBackupList(ctx: CliContext, options: BackupListOptions): Promise<ExitCode> {
  const snapshots = listSnapshots(ctx.settings.snapshots.dir)

  if (options.json) {
    ui.outputJson(snapshots)
    return EXIT_CODES.success
  }

  if (snapshots.length === 0) {
    ui.log('No snapshots found.')
    ui.log(`Create one: ${c.command('netstate backup create')}`)
    return EXIT_CODES.success
  }

  ui.output(ui.formatSimpleTable(
    ['ID', 'DRIVER', 'SITE', 'SEGMENTS', 'RULES', 'CREATED'],
    snapshots.map(snap => [
      c.highlight(snap.id),
      snap.driver,
      snap.site,
      snap.segments === null ? '-' : String(snap.segments),
      snap.rules === null ? '-' : String(snap.rules),
      snap.timestamp
    ])
  ))
  return EXIT_CODES.success
}
