import type { Command } from 'commander'
import { spawnDatabaseWorker, type WorkerLauncher } from '../../client/index.js'
import { output } from '../output.js'
import { withDatabaseWorker, type ConnectionOptions } from '../session.js'

/**
 * Register the `exec` command: every argument is one statement, and all of
 * them run as a single atomic batch.
 */
export function registerExecCommand(program: Command, launch: WorkerLauncher = spawnDatabaseWorker): void {
  program
    .command('exec')
    .description('Run SQL statements as one transaction')
    .argument('<statements...>', 'SQL statements, executed in order')
    .option('-c, --config <path>', 'configuration file path')
    .option('-d, --database <file>', 'database file name inside the storage directory')
    .option('--debug', 'print worker traces')
    .action(async (statements: string[], options: ConnectionOptions) => {
      await withDatabaseWorker(options, launch, async (client) => {
        await client.exec(statements)
        output.success(`Executed ${statements.length} statement(s)`)
      })
    })
}
