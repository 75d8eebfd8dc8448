import fs from 'node:fs/promises'
import { ConfigError, defaultConfigDocument, parseSendConfig, type SendConfig } from '@bulkmail/core'

// Credentials may come from the environment (or .env) instead of the config file.
export const ENV_OVERRIDES = {
  MAILGUN_DOMAIN: 'domain',
  MAILGUN_API_KEY: 'api_key',
  MAILGUN_SENDER_EMAIL: 'sender_email',
} as const

export type Env = Readonly<Record<string, string | undefined>>

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value)
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export function applyEnvOverrides(doc: unknown, env: Env): unknown {
  if (!isRecord(doc)) return doc
  const out: Record<string, unknown> = { ...doc }
  for (const [name, key] of Object.entries(ENV_OVERRIDES)) {
    const value = env[name]
    if (value !== undefined && value.trim() !== '') out[key] = value
  }
  return out
}

export async function loadConfig(file: string, env: Env = process.env): Promise<SendConfig> {
  let raw: string
  try {
    raw = await fs.readFile(file, 'utf8')
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${file}`)
    }
    throw new ConfigError(`Cannot read configuration file ${file}: ${messageOf(err)}`)
  }

  let doc: unknown
  try {
    doc = JSON.parse(raw)
  } catch (err) {
    throw new ConfigError(`Invalid JSON in configuration file: ${messageOf(err)}`)
  }
  return parseSendConfig(applyEnvOverrides(doc, env))
}

export async function scaffoldConfig(file: string, options: { force?: boolean } = {}): Promise<void> {
  const body = JSON.stringify(defaultConfigDocument(), null, 2) + '\n'
  try {
    await fs.writeFile(file, body, { encoding: 'utf8', flag: options.force ? 'w' : 'wx' })
  } catch (err) {
    if (isErrnoException(err) && err.code === 'EEXIST') {
      throw new ConfigError(`Configuration file already exists: ${file} (use --force to overwrite)`)
    }
    throw new ConfigError(`Cannot write configuration file ${file}: ${messageOf(err)}`)
  }
}
