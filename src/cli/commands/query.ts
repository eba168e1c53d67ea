import { Type } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import type { Command } from 'commander'
import { spawnDatabaseWorker, type WorkerLauncher } from '../../client/index.js'
import type { SqlValue } from '../../protocol/index.js'
import { output } from '../output.js'
import { withDatabaseWorker, type ConnectionOptions } from '../session.js'

const CliBindSchema = Type.Array(Type.Union([Type.Null(), Type.Number(), Type.String(), Type.Boolean()]))

function formatValue(value: SqlValue): string {
  if (value === null) return 'NULL'
  if (value instanceof Uint8Array) return `<blob ${value.byteLength} bytes>`
  return String(value)
}

function parseBind(text: string | undefined): Array<null | number | string | boolean> {
  if (text === undefined) return []
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    throw new Error('--bind must be valid JSON')
  }
  if (!Value.Check(CliBindSchema, parsed)) {
    throw new Error('--bind must be a JSON array of null, number, string or boolean values')
  }
  return parsed
}

/**
 * Register the `query` command: run one read and print the rows as a table.
 */
export function registerQueryCommand(program: Command, launch: WorkerLauncher = spawnDatabaseWorker): void {
  program
    .command('query')
    .description('Run one read statement and print its rows')
    .argument('<sql>', 'SQL statement returning rows')
    .option('-b, --bind <json>', 'JSON array of values bound to ? placeholders')
    .option('-c, --config <path>', 'configuration file path')
    .option('-d, --database <file>', 'database file name inside the storage directory')
    .option('--debug', 'print worker traces')
    .action(async (sql: string, options: ConnectionOptions & { bind?: string }) => {
      await withDatabaseWorker(options, launch, async (client) => {
        const rows = await client.query(sql, parseBind(options.bind))
        if (rows.length === 0) {
          output.info('No rows')
          return
        }
        output.table(
          rows.map((row) => Object.fromEntries(Object.entries(row).map(([column, value]) => [column, formatValue(value)]))),
        )
        output.info(`${rows.length} row(s)`)
      })
    })
}
