import fs from 'node:fs/promises'
import { parse } from 'csv-parse/sync'
import { InputError, type RecipientRecord } from '@bulkmail/core'

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value)
}

function toRecipient(row: Record<string, unknown>): RecipientRecord {
  const out: Record<string, string> = {}
  for (const [key, value] of Object.entries(row)) {
    if (value !== undefined && value !== null) out[key] = String(value)
  }
  return out
}

/**
 * Reads the whole CSV before anything is sent, so a missing or malformed file
 * aborts the run up front. The header row names the columns.
 */
export async function loadRecipients(file: string): Promise<RecipientRecord[]> {
  let content: string
  try {
    content = await fs.readFile(file, 'utf8')
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined
    if (code === 'ENOENT') throw new InputError(`CSV file not found: ${file}`)
    throw new InputError(`Error reading CSV file: ${err instanceof Error ? err.message : String(err)}`)
  }

  let rows: unknown
  try {
    rows = parse(content, {
      columns: true,
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    })
  } catch (err) {
    throw new InputError(`Error reading CSV file: ${err instanceof Error ? err.message : String(err)}`)
  }

  if (!Array.isArray(rows)) throw new InputError(`Error reading CSV file: ${file} did not parse into rows`)
  return rows.filter(isRecord).map(toRecipient)
}
