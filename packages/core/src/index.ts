export type RecipientRecord = Readonly<Record<string, string>>

// template variable name -> source column name
export type VariableMapping = Readonly<Record<string, string>>

export type TemplateVariables = Record<string, string>

export type OutgoingMessage = {
  from: string
  to: string
  subject: string
  html: string
}

export type DeliveryResult =
  | { ok: true; providerId?: string }
  | { ok: false; reason: 'network'; error: string }
  | { ok: false; reason: 'http'; status: number; body: string }

export type FailureReason = 'network' | 'http' | 'template' | 'record' | 'cancelled'

export type SendOutcome =
  | { ok: true; attempts: number }
  | { ok: false; reason: FailureReason; attempts: number; detail: string }

export interface Mailer {
  deliver(message: OutgoingMessage): Promise<DeliveryResult>
}

export interface TemplateRenderer {
  render(template: string, variables: TemplateVariables): string
}

export * from './config/schema'
export * from './errors'
export * from './logging/logger'
export * from './template/render'
export * from './template/variables'
export * from './pipeline/summary'
export * from './pipeline/dispatch'
