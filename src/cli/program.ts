import { Command } from 'commander'
import { spawnDatabaseWorker, type WorkerLauncher } from '../client/index.js'
import { registerInitCommand } from './commands/init.js'
import { registerOpenCommand } from './commands/open.js'
import { registerExecCommand } from './commands/exec.js'
import { registerQueryCommand } from './commands/query.js'

export const PROGRAM_DESCRIPTION =
  'Host-side tooling for the Larder database worker. Commands run through the worker client; ' +
  'the CLI and its LARDER_ environment overrides are not part of the worker protocol.'

/**
 * Build the `larder` program. Every command that talks to the database starts
 * its worker through `launch`.
 */
export function createProgram(launch: WorkerLauncher = spawnDatabaseWorker): Command {
  const program = new Command()

  program.name('larder').description(PROGRAM_DESCRIPTION).version('0.1.0')

  registerInitCommand(program)
  registerOpenCommand(program, launch)
  registerExecCommand(program, launch)
  registerQueryCommand(program, launch)

  return program
}
