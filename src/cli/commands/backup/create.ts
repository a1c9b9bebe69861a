/**
 * netstate backup create
 *
 * Take a snapshot now, with the configured driver.
 */

import { RetryingController } from '../../../controller/retrying.js'
import { EXIT_CODES, type ExitCode } from '../../../lib/errors.js'
import { createSnapshotDriver } from '../../../lib/snapshot.js'
import type { CliContext } from '../../lib/context.js'
import { withController } from '../../lib/create-client.js'
import { c } from '../../lib/colors.js'
import { logRetry } from '../../lib/report.js'
import * as ui from '../../ui.js'

export interface BackupCreateOptions {
  name?: string
  json?: boolean
}

export async function runBackupCreate(ctx: CliContext, options: BackupCreateOptions): Promise<ExitCode> {
  const { settings } = ctx

  return withController(settings.controller, async (controller) => {
    const driver = createSnapshotDriver(
      settings.snapshots.driver,
      settings.snapshots.dir,
      new RetryingController(controller, { ...settings.apply.retry, onRetry: logRetry })
    )
    ui.verbose(`Snapshot driver: ${driver.name}, directory: ${settings.snapshots.dir}`)

    const info = await driver.create({ name: options.name })

    if (options.json) {
      ui.outputJson(info)
    } else {
      ui.output(info.id)
      ui.success(`Snapshot created ${c.muted(info.dirPath)}`)
      ui.log(`  ${c.label('checksum:')} ${c.muted(info.checksum)}`)
    }
    return EXIT_CODES.success
  })
}
