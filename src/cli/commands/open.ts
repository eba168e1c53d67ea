import type { Command } from 'commander'
import { spawnDatabaseWorker, type WorkerLauncher } from '../../client/index.js'
import { output } from '../output.js'
import { withDatabaseWorker, type ConnectionOptions } from '../session.js'

/**
 * Register the `open` command: send InitDbFile so the database file exists
 * and the foreign key pragma is applied.
 */
export function registerOpenCommand(program: Command, launch: WorkerLauncher = spawnDatabaseWorker): void {
  program
    .command('open')
    .description('Open (or create) the database file')
    .option('-c, --config <path>', 'configuration file path')
    .option('-d, --database <file>', 'database file name inside the storage directory')
    .option('--debug', 'print worker traces')
    .action(async (options: ConnectionOptions) => {
      await withDatabaseWorker(options, launch, async (client, config) => {
        await client.initialize()
        output.success(`Database ready: ${options.database || config.storage.defaultDatabaseFile}`)
      })
    })
}
