import type { RecipientRecord, TemplateVariables, VariableMapping } from '../index'

export const UNIQUE_CODE_MIN = 10000
export const UNIQUE_CODE_MAX = 99999

/**
 * Uniformly random code in [10000, 99999]. Codes are not checked against
 * each other, so two recipients in one run may share a code.
 */
export function generateUniqueCode(random: () => number = Math.random): string {
  const span = UNIQUE_CODE_MAX - UNIQUE_CODE_MIN + 1
  const offset = Math.min(span - 1, Math.floor(random() * span))
  return String(UNIQUE_CODE_MIN + offset)
}

export type BuildVariablesOptions = {
  registrationLink?: string
  random?: () => number
}

export function buildTemplateVariables(
  record: RecipientRecord,
  mapping: VariableMapping,
  options: BuildVariablesOptions = {}
): TemplateVariables {
  const vars: TemplateVariables = {}
  for (const [name, column] of Object.entries(mapping)) {
    // unmapped columns are skipped here and surface as a TemplateError at render
    if (Object.prototype.hasOwnProperty.call(record, column)) vars[name] = record[column]
  }
  if (options.registrationLink) vars.registration_link = options.registrationLink
  if (!('unique_code' in vars)) vars.unique_code = generateUniqueCode(options.random)
  return vars
}
