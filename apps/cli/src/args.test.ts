import { describe, it, expect } from 'vitest'
import { UsageError } from '@bulkmail/core'
import { parseCliArgs, parseVariableMappings } from './args'

describe('parseCliArgs', () => {
  it('applies defaults for a plain send', () => {
    expect(parseCliArgs(['recipients.csv'])).toEqual({
      kind: 'send',
      csvFile: 'recipients.csv',
      configFile: 'config.json',
      emailColumn: 'email',
      variables: {},
      dryRun: false,
    })
  })

  it('reads every option', () => {
    expect(
      parseCliArgs(['-c', 'prod.json', '--email-column', 'Email Address', '--dry-run', '--template-vars', 'name:Full Name', 'title:paper_title', '--', 'list.csv'])
    ).toEqual({
      kind: 'send',
      csvFile: 'list.csv',
      configFile: 'prod.json',
      emailColumn: 'Email Address',
      variables: { name: 'Full Name', title: 'paper_title' },
      dryRun: true,
    })
  })

  it('accepts repeated and inline template-vars', () => {
    const command = parseCliArgs(['list.csv', '--template-vars=name:full_name', '--template-vars', 'code:id'])
    expect(command.kind === 'send' && command.variables).toEqual({ name: 'full_name', code: 'id' })
  })

  it('does not require a csv file for --create-config', () => {
    expect(parseCliArgs(['--create-config', '--config', 'new.json'])).toEqual({ kind: 'create-config', configFile: 'new.json', force: false })
  })

  it('recognizes help', () => {
    expect(parseCliArgs(['-h'])).toEqual({ kind: 'help' })
  })

  it('rejects a missing csv file', () => {
    expect(() => parseCliArgs([])).toThrow('the following arguments are required: csv_file')
  })

  it('rejects unknown options as usage errors', () => {
    expect(() => parseCliArgs(['list.csv', '--bogus'])).toThrow(UsageError)
  })

  it('rejects extra positionals', () => {
    expect(() => parseCliArgs(['a.csv', 'b.csv'])).toThrow('unrecognized arguments: b.csv')
  })
})

describe('parseVariableMappings', () => {
  it('splits on the first colon', () => {
    expect(parseVariableMappings(['link:url:https'])).toEqual({ link: 'url:https' })
  })

  it('rejects mappings without a colon or with an empty side', () => {
    for (const bad of ['name', ':column', 'name:']) {
      expect(() => parseVariableMappings([bad])).toThrow(`Invalid template variable mapping: ${bad}. Use format: var_name:csv_column`)
    }
  })
})
