#!/usr/bin/env node
/**
 * netstate CLI
 *
 * Declarative VLAN, subnet, DHCP and firewall reconciliation
 *
 * Exit codes:
 *   0 success or nothing to do
 *   1 usage or configuration error
 *   2 desired state failed validation
 *   3 planning failed
 *   4 apply finished with failed or skipped operations
 *   5 fatal: authentication, snapshot, abort, unreachable controller
 */

import { EXIT_CODES } from '../lib/errors.js'
import { reportError } from './lib/report.js'
import { createProgram } from './program.js'
import * as ui from './ui.js'

const abort = new AbortController()

process.once('SIGINT', () => {
  ui.warn('Interrupted: stopping after in-flight operations (Ctrl+C again to force)')
  abort.abort()
})

createProgram(abort.signal).parseAsync(process.argv).catch((err: unknown) => {
  reportError(err)
  process.exitCode = EXIT_CODES.usage
})
