import yargs from 'yargs'
import {
  DueModeSchema,
  JotlineError,
  classifyDueNotes,
  createNote,
  createNoteFromText,
  editNote,
  errorMessage,
  exportNotesToJsonFile,
  importJsonExportFile,
  importLegacyTextFile,
  summarizeDueAlerts,
  todayISO,
} from '@jotline/core'
import type { ImportSummary, NoteRecord, Result, Session } from '@jotline/core'
import { defaultJsonExportPath, defaultLegacyTextPath, loadConfig } from './config.js'
import type { JotlineCliConfig } from './config.js'
import { CliContext } from './context.js'
import { renderDueAlerts, renderNotesTable } from './render.js'

export const EXIT_OK = 0
export const EXIT_UNKNOWN_ERROR = 1
export const EXIT_USAGE = 2
export const EXIT_CONFIG = 3
export const EXIT_AUTH = 4
export const EXIT_FAILED = 5

const DUPLICATE_MESSAGE = 'Note already exists with same content, tags, and due date. Skipping save.'

export interface CliOutput {
  write(line: string): void
  error(line: string): void
}

export interface RunCliOptions {
  argv: string[]
  cwd?: string
  env?: NodeJS.ProcessEnv
  output?: CliOutput
  /** Reference date for due-date views; defaults to today (UTC). */
  today?: () => string
}

const processOutput: CliOutput = {
  write: (line) => process.stdout.write(`${line}\n`),
  error: (line) => process.stderr.write(`${line}\n`),
}

class ExitError extends Error {
  constructor(
    readonly exitCode: number,
    message: string,
  ) {
    super(message)
    this.name = 'ExitError'
  }
}

function expectOk<T>(result: Result<T, JotlineError>): T {
  if (!result.ok) throw result.error
  return result.value
}

function parseNoteId(value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ExitError(EXIT_USAGE, 'Invalid ID entered')
  }
  return value
}

/** Run one command. Resolves to the process exit code. */
export async function runCli(options: RunCliOptions): Promise<number> {
  const env = options.env ?? process.env
  const out = options.output ?? processOutput
  const today = options.today ?? todayISO

  let config: JotlineCliConfig
  try {
    config = loadConfig(options.cwd ?? process.cwd(), env)
  } catch (e) {
    out.error(`Configuration error: ${errorMessage(e)}`)
    return EXIT_CONFIG
  }
  const ctx = new CliContext(config)

  const printNotes = (records: NoteRecord[], json: boolean, emptyMessage: string) => {
    if (json) {
      out.write(JSON.stringify(records, null, 2))
    } else if (records.length === 0) {
      out.write(emptyMessage)
    } else {
      for (const line of renderNotesTable(records)) out.write(line)
    }
  }

  const printImport = (summary: ImportSummary, file: string) => {
    out.write(`Imported ${summary.imported} notes from ${file} into DB.`)
    if (summary.skipped > 0) out.write(`Skipped ${summary.skipped} duplicate notes.`)
  }

  const credentialsFrom = (argv: { user?: string; password?: string }) => {
    const user = argv.user ?? env['JOTLINE_USER']
    const password = argv.password ?? env['JOTLINE_PASSWORD']
    if (!user) throw new ExitError(EXIT_USAGE, 'Missing --user (or JOTLINE_USER)')
    if (!password) throw new ExitError(EXIT_USAGE, 'Missing --password (or JOTLINE_PASSWORD)')
    return { user, password }
  }

  const login = async (argv: { user?: string; password?: string }): Promise<Session> => {
    const { user, password } = credentialsFrom(argv)
    return expectOk(await ctx.credentials().login(user, password))
  }

  try {
    const parser = yargs(options.argv)
      .scriptName('jotline')
      .usage('Usage: $0 <command> [options]')
      .option('user', {
        alias: 'u',
        type: 'string',
        describe: 'Username (defaults to JOTLINE_USER)',
      })
      .option('password', {
        alias: 'p',
        type: 'string',
        describe: 'Password (defaults to JOTLINE_PASSWORD)',
      })
      .option('json', {
        type: 'boolean',
        default: false,
        describe: 'Print notes as JSON',
      })
      .exitProcess(false)
      .fail((msg: string, err: Error | undefined) => {
        throw err ?? new ExitError(EXIT_USAGE, msg || 'Invalid command usage. Run with --help for usage.')
      })
      .command(
        'register',
        'Create an account.',
        (y) => y,
        async (argv) => {
          const { user, password } = credentialsFrom(argv)
          const session = expectOk(await ctx.credentials().register(user, password))
          out.write(`User '${session.user}' registered successfully!`)
        },
      )
      .command(
        'alerts',
        'Show overdue and due-today counts.',
        (y) => y,
        async (argv) => {
          const session = await login(argv)
          const records = expectOk(ctx.notes().listByUser(session.user))
          out.write(renderDueAlerts(summarizeDueAlerts(records, today())))
        },
      )
      .command(
        'add <text..>',
        'Write a note.',
        (y) =>
          y
            .positional('text', { type: 'string', array: true, demandOption: true })
            .option('tags', { alias: 't', type: 'string', describe: 'Comma-separated tags, e.g. todo,idea' })
            .option('due', { alias: 'd', type: 'string', describe: 'Due date (YYYY-MM-DD)' }),
        async (argv) => {
          const session = await login(argv)
          const outcome = expectOk(
            createNote(ctx.notes(), session, {
              text: argv.text.join(' '),
              tags: argv.tags ?? '',
              dueDate: argv.due ?? '',
            }),
          )
          for (const warning of outcome.warnings) out.error(warning)
          out.write(outcome.saved ? 'Note added successfully.' : DUPLICATE_MESSAGE)
        },
      )
      .command(
        'quick <text..>',
        'Write a note from free text with inline #tags and [due:YYYY-MM-DD].',
        (y) => y.positional('text', { type: 'string', array: true, demandOption: true }),
        async (argv) => {
          const session = await login(argv)
          const outcome = expectOk(createNoteFromText(ctx.notes(), session, argv.text.join(' ')))
          out.write(outcome.saved ? 'Note added successfully.' : DUPLICATE_MESSAGE)
        },
      )
      .command(
        'list',
        'View saved notes.',
        (y) => y,
        async (argv) => {
          const session = await login(argv)
          printNotes(expectOk(ctx.notes().listByUser(session.user)), argv.json, 'No notes found.')
        },
      )
      .command(
        'edit <id>',
        'Edit a note. Omitted fields keep their current value.',
        (y) =>
          y
            .positional('id', { type: 'number', demandOption: true })
            .option('text', { type: 'string', describe: 'New note text' })
            .option('tags', { alias: 't', type: 'string', describe: 'New comma-separated tags' })
            .option('due', { alias: 'd', type: 'string', describe: 'New due date (YYYY-MM-DD)' }),
        async (argv) => {
          const session = await login(argv)
          const id = parseNoteId(argv.id)
          expectOk(
            editNote(ctx.notes(), session, id, {
              text: argv.text ?? '',
              tags: argv.tags ?? '',
              dueDate: argv.due ?? '',
            }),
          )
          out.write('Note updated successfully')
        },
      )
      .command(
        'delete <id>',
        'Delete a note.',
        (y) => y.positional('id', { type: 'number', demandOption: true }),
        async (argv) => {
          const session = await login(argv)
          const id = parseNoteId(argv.id)
          if (!expectOk(ctx.notes().delete(session.user, id))) {
            throw JotlineError.notFound('Note', id)
          }
          out.write(`Deleted note ID ${id}`)
        },
      )
      .command(
        'search <keyword>',
        'Search notes by keyword.',
        (y) => y.positional('keyword', { type: 'string', demandOption: true }),
        async (argv) => {
          const session = await login(argv)
          const keyword = argv.keyword.trim()
          printNotes(
            expectOk(ctx.notes().searchByKeyword(session.user, keyword)),
            argv.json,
            `No notes found containing: ${keyword}`,
          )
        },
      )
      .command(
        'tag <tag>',
        'Filter notes by tag (without #).',
        (y) => y.positional('tag', { type: 'string', demandOption: true }),
        async (argv) => {
          const session = await login(argv)
          const tag = argv.tag.trim()
          printNotes(expectOk(ctx.notes().filterByTag(session.user, tag)), argv.json, `No notes found with tag: ${tag}`)
        },
      )
      .command(
        'due <mode>',
        'View notes due today, overdue, or due this week.',
        (y) => y.positional('mode', { choices: DueModeSchema.options, demandOption: true }),
        async (argv) => {
          const session = await login(argv)
          const mode = DueModeSchema.parse(argv.mode)
          const records = expectOk(ctx.notes().listByUser(session.user))
          printNotes(classifyDueNotes(records, today(), mode), argv.json, `No notes found for: ${mode.toUpperCase()}`)
        },
      )
      .command(
        'import-text',
        'Import legacy notes from a .txt file, one note per line.',
        (y) => y.option('file', { alias: 'f', type: 'string', describe: 'Defaults to notes_<user>.txt' }),
        async (argv) => {
          const session = await login(argv)
          const file = argv.file ?? defaultLegacyTextPath(ctx.config, session.user)
          printImport(expectOk(await importLegacyTextFile(ctx.notes(), session, file)), file)
        },
      )
      .command(
        'import-json',
        'Import notes from a JSON export.',
        (y) => y.option('file', { alias: 'f', type: 'string', describe: 'Defaults to <user>_notes_export.json' }),
        async (argv) => {
          const session = await login(argv)
          const file = argv.file ?? defaultJsonExportPath(ctx.config, session.user)
          printImport(expectOk(await importJsonExportFile(ctx.notes(), session, file)), file)
        },
      )
      .command(
        'export',
        'Export all notes to a JSON file.',
        (y) => y.option('file', { alias: 'f', type: 'string', describe: 'Defaults to <user>_notes_export.json' }),
        async (argv) => {
          const session = await login(argv)
          const file = argv.file ?? defaultJsonExportPath(ctx.config, session.user)
          const count = expectOk(await exportNotesToJsonFile(ctx.notes(), session, file))
          out.write(`Exported ${count} notes to ${file}`)
        },
      )
      .demandCommand(1, 'You must specify a command')
      .strict()
      .help()

    await parser.parseAsync()
    return EXIT_OK
  } catch (error: unknown) {
    return reportError(error, out)
  } finally {
    ctx.close()
  }
}

function exitCodeFor(error: JotlineError): number {
  switch (error.code) {
    case 'AUTH_ERROR':
      return EXIT_AUTH
    case 'VALIDATION_ERROR':
      return EXIT_USAGE
    default:
      return EXIT_FAILED
  }
}

function reportError(error: unknown, out: CliOutput): number {
  if (error instanceof ExitError) {
    out.error(error.message)
    return error.exitCode
  }
  if (error instanceof JotlineError) {
    out.error(error.message)
    return exitCodeFor(error)
  }
  out.error(`Unexpected error: ${errorMessage(error)}`)
  return EXIT_UNKNOWN_ERROR
}
