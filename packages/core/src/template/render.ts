import type { TemplateRenderer, TemplateVariables } from '../index'
import { TemplateError } from '../errors'

// `{{` and `}}` are escaped braces; `{name}` is a placeholder. Anything else passes through.
const TOKEN = /\{\{|\}\}|\{([A-Za-z_][A-Za-z0-9_]*)\}/g

export function renderTemplate(template: string, variables: TemplateVariables): string {
  return template.replace(TOKEN, (match: string, name: string | undefined) => {
    if (match === '{{') return '{'
    if (match === '}}') return '}'
    if (name === undefined) return match
    if (!Object.prototype.hasOwnProperty.call(variables, name)) {
      throw new TemplateError(`Missing template variable: ${name}`, name)
    }
    return variables[name]
  })
}

export const placeholderRenderer: TemplateRenderer = {
  render: renderTemplate,
}
