/**
 * netstate program: global options and the command table
 */

import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { Command, InvalidArgumentError, Option } from 'commander'
import { exitCodeFor, type ExitCode } from '../lib/errors.js'
import type { SettingsOverrides } from '../types.js'
import { runApply, type ApplyCommandOptions } from './commands/apply.js'
import { runBackupCreate, type BackupCreateOptions } from './commands/backup/create.js'
import { runBackupList, type BackupListOptions } from './commands/backup/list.js'
import { runBackupVerify, type BackupVerifyOptions } from './commands/backup/verify.js'
import { PLAN_FORMATS, runPlan, type PlanCommandOptions } from './commands/plan.js'
import { runStatus, type StatusCommandOptions } from './commands/status.js'
import { runValidate, type ValidateCommandOptions } from './commands/validate.js'
import { buildContext, type CliContext, type GlobalOptions } from './lib/context.js'
import { reportError } from './lib/report.js'
import * as ui from './ui.js'

const VERSION = process.env.NETSTATE_VERSION || getPackageVersion() || '0.0.0'

function getPackageVersion(): string | undefined {
  let dir = path.dirname(fileURLToPath(import.meta.url))
  for (let i = 0; i < 5; i++) {
    const pkgPath = path.join(dir, 'package.json')
    if (fs.existsSync(pkgPath)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
      return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
        ? pkg.version
        : undefined
    }
    dir = path.dirname(dir)
  }
  return undefined
}

// ============================================================================
// Shared
// ============================================================================

interface DesiredStateFlags {
  file?: string
  profile?: string
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('must be a positive integer')
  }
  return parsed
}

/**
 * Build the context, run the command, map its outcome to the exit code
 */
async function execute(
  command: Command,
  overrides: SettingsOverrides,
  signal: AbortSignal,
  run: (ctx: CliContext) => Promise<ExitCode>
): Promise<void> {
  try {
    const ctx = buildContext(command.optsWithGlobals<GlobalOptions>(), overrides, signal)
    process.exitCode = await run(ctx)
  } catch (err) {
    reportError(err)
    process.exitCode = exitCodeFor(err)
  }
}

function desiredStateOverrides(flags: DesiredStateFlags): SettingsOverrides {
  return { file: flags.file, profile: flags.profile }
}

// ============================================================================
// Program
// ============================================================================

/**
 * Build the netstate program. Commands set process.exitCode; `signal`
 * stops an apply between operations.
 */
export function createProgram(signal: AbortSignal): Command {
  const program = new Command()

  program
    .name('netstate')
    .description('Declarative VLAN, subnet, DHCP and firewall reconciliation for UniFi-style controllers')
    .version(VERSION)
    .option('--cwd <dir>', 'Working directory (where .netstate/ is searched from)')
    .option('-v, --verbose', 'Enable verbose output', false)
    .option('-q, --quiet', 'Suppress non-essential output (errors still shown)', false)
    .option('--controller <url>', 'Controller URL override (https://host:port or memory://<site>)')
    .option('--site <name>', 'Controller site override')
    .hook('preAction', (_program, actionCommand) => {
      const globals = actionCommand.optsWithGlobals<GlobalOptions>()
      ui.configureUi({ verbose: globals.verbose, quiet: globals.quiet })
    })

  program
    .command('validate')
    .description('Validate the desired-state document offline')
    .option('-f, --file <path>', 'Desired-state document (default: network.yaml)')
    .option('--profile <id>', 'Hardware profile to check segment counts against')
    .option('--json', 'Output JSON', false)
    .action(async (_options: unknown, command: Command) => {
      const opts = command.opts<ValidateCommandOptions & DesiredStateFlags>()
      await execute(command, desiredStateOverrides(opts), signal, ctx => runValidate(ctx, opts))
    })

  program
    .command('plan')
    .description('Show the operations apply would run (dry run)')
    .option('-f, --file <path>', 'Desired-state document (default: network.yaml)')
    .option('--profile <id>', 'Hardware profile')
    .addOption(new Option('--format <format>', 'Plan format').choices(PLAN_FORMATS).default('text'))
    .option('--json', 'Shorthand for --format json', false)
    .action(async (_options: unknown, command: Command) => {
      const opts = command.opts<PlanCommandOptions & DesiredStateFlags>()
      await execute(command, desiredStateOverrides(opts), signal, ctx => runPlan(ctx, opts))
    })

  program
    .command('apply')
    .description('Converge the controller to the desired state')
    .option('-f, --file <path>', 'Desired-state document (default: network.yaml)')
    .option('--profile <id>', 'Hardware profile')
    .option('--dry-run', 'Print intended actions without mutating anything', false)
    .option('--concurrency <n>', 'Independent operations in flight at once', parsePositiveInt)
    .option('--no-snapshot', 'Skip the pre-apply snapshot')
    .option('--json', 'Output the apply report as JSON', false)
    .action(async (_options: unknown, command: Command) => {
      const opts = command.opts<ApplyCommandOptions & DesiredStateFlags & { concurrency?: number; snapshot: boolean }>()
      await execute(command, {
        ...desiredStateOverrides(opts),
        concurrency: opts.concurrency,
        // --no-snapshot defines a default of true; only an explicit flag overrides config
        snapshot: command.getOptionValueSource('snapshot') === 'cli' ? opts.snapshot : undefined
      }, signal, ctx => runApply(ctx, opts))
    })

  program
    .command('status')
    .description('Controller reachability, live inventory and drift')
    .option('-f, --file <path>', 'Desired-state document (default: network.yaml)')
    .option('--json', 'Output JSON', false)
    .action(async (_options: unknown, command: Command) => {
      const opts = command.opts<StatusCommandOptions & DesiredStateFlags>()
      await execute(command, desiredStateOverrides(opts), signal, ctx => runStatus(ctx, opts))
    })

  const backup = program
    .command('backup')
    .description('Manage pre-apply snapshots')

  backup
    .command('create')
    .description('Take a snapshot with the configured driver')
    .option('--name <name>', 'Label appended to the snapshot id')
    .option('--json', 'Output JSON', false)
    .action(async (_options: unknown, command: Command) => {
      const opts = command.opts<BackupCreateOptions>()
      await execute(command, {}, signal, ctx => runBackupCreate(ctx, opts))
    })

  backup
    .command('list')
    .alias('ls')
    .description('List local snapshots, newest first')
    .option('--json', 'Output JSON', false)
    .action(async (_options: unknown, command: Command) => {
      const opts = command.opts<BackupListOptions>()
      await execute(command, {}, signal, ctx => runBackupList(ctx, opts))
    })

  backup
    .command('verify')
    .description('Check a snapshot against its manifest checksum')
    .argument('<id>', 'Snapshot id or unique part of it')
    .option('--json', 'Output JSON', false)
    .action(async (id: string, _options: unknown, command: Command) => {
      const opts = command.opts<BackupVerifyOptions>()
      await execute(command, {}, signal, ctx => runBackupVerify(ctx, id, opts))
    })

  return program
}
