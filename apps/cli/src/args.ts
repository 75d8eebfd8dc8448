import { parseArgs } from 'node:util'
import { DEFAULT_EMAIL_KEY, UsageError, type VariableMapping } from '@bulkmail/core'

export const DEFAULT_CONFIG_FILE = 'config.json'

export const USAGE = `Usage: bulkmail <csv_file> [options]

Send templated emails through Mailgun to every row of a CSV file.

Options:
  -c, --config <path>              Configuration file (default: ${DEFAULT_CONFIG_FILE})
      --email-column <name>        Name of email column in CSV (default: ${DEFAULT_EMAIL_KEY})
      --template-vars <var:col>... Template variable mappings (format: var_name:csv_column)
      --create-config              Create default configuration file
      --force                      Overwrite an existing file with --create-config
      --dry-run                    Show what would be sent without actually sending
  -h, --help                       Show this help`

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'create-config'; configFile: string; force: boolean }
  | {
      kind: 'send'
      csvFile: string
      configFile: string
      emailColumn: string
      variables: VariableMapping
      dryRun: boolean
    }

const MULTI_VALUE_FLAG = '--template-vars'

// `--template-vars a:x b:y` takes every following bare token, like `--template-vars a:x --template-vars b:y`.
function expandMultiValue(argv: readonly string[]): string[] {
  const out: string[] = []
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg !== MULTI_VALUE_FLAG) {
      out.push(arg)
      continue
    }
    while (i + 1 < argv.length && !argv[i + 1].startsWith('-')) {
      out.push(`${MULTI_VALUE_FLAG}=${argv[++i]}`)
    }
  }
  return out
}

export function parseVariableMappings(mappings: readonly string[]): VariableMapping {
  const result: Record<string, string> = {}
  for (const mapping of mappings) {
    const sep = mapping.indexOf(':')
    const name = sep > 0 ? mapping.slice(0, sep).trim() : ''
    const column = sep > 0 ? mapping.slice(sep + 1) : ''
    if (!name || !column) {
      throw new UsageError(`Invalid template variable mapping: ${mapping}. Use format: var_name:csv_column`)
    }
    result[name] = column
  }
  return result
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  let parsed: ReturnType<typeof parseOptions>
  try {
    parsed = parseOptions(expandMultiValue(argv))
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err))
  }
  const { values, positionals } = parsed

  if (values.help) return { kind: 'help' }

  const configFile = values.config ?? DEFAULT_CONFIG_FILE
  if (values['create-config']) return { kind: 'create-config', configFile, force: values.force ?? false }

  if (positionals.length === 0) throw new UsageError('the following arguments are required: csv_file')
  if (positionals.length > 1) throw new UsageError(`unrecognized arguments: ${positionals.slice(1).join(' ')}`)

  return {
    kind: 'send',
    csvFile: positionals[0],
    configFile,
    emailColumn: values['email-column'] ?? DEFAULT_EMAIL_KEY,
    variables: parseVariableMappings(values['template-vars'] ?? []),
    dryRun: values['dry-run'] ?? false,
  }
}

function parseOptions(args: string[]) {
  return parseArgs({
    args,
    allowPositionals: true,
    strict: true,
    options: {
      config: { type: 'string', short: 'c' },
      'email-column': { type: 'string' },
      'template-vars': { type: 'string', multiple: true },
      'create-config': { type: 'boolean' },
      force: { type: 'boolean' },
      'dry-run': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  })
}
