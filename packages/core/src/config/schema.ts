import { z } from 'zod'
import { ConfigError } from '../errors'

export const DEFAULT_API_HOST = 'api.mailgun.net'

// Longest wait a Node timer honours, in whole seconds.
export const MAX_DELAY_SECONDS = 2147483

const required = (field: string) => z.string({ required_error: `${field} is required` }).trim().min(1, `${field} must not be empty`)

export const SendConfigDocument = z.object({
  domain: required('domain'),
  api_key: required('api_key'),
  sender_email: required('sender_email'),
  subject: required('subject'),
  template: z.string({ required_error: 'template is required' }).min(1, 'template must not be empty'),
  registration_link: z.string().default(''),
  delay_between_emails: z.number().nonnegative().max(MAX_DELAY_SECONDS).default(1.0),
  max_retries: z.number().int().min(1).default(3),
  retry_delay: z.number().nonnegative().max(MAX_DELAY_SECONDS).default(20.0),
  api_host: z.string().trim().min(1).default(DEFAULT_API_HOST),
})

export type SendConfigDocumentInput = z.input<typeof SendConfigDocument>

export type SendConfig = Readonly<{
  domain: string
  apiKey: string
  senderEmail: string
  subject: string
  template: string
  registrationLink: string
  /** Seconds. */
  delayBetweenEmails: number
  maxRetries: number
  /** Seconds. */
  retryDelay: number
  apiHost: string
}>

export function parseSendConfig(input: unknown): SendConfig {
  const parsed = SendConfigDocument.safeParse(input)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    throw new ConfigError(`Invalid configuration format: ${issues.join('; ')}`, issues)
  }
  const doc = parsed.data
  return Object.freeze({
    domain: doc.domain,
    apiKey: doc.api_key,
    senderEmail: doc.sender_email,
    subject: doc.subject,
    template: doc.template,
    registrationLink: doc.registration_link,
    delayBetweenEmails: doc.delay_between_emails,
    maxRetries: doc.max_retries,
    retryDelay: doc.retry_delay,
    apiHost: doc.api_host,
  })
}

// Written by `--create-config`; every value is a placeholder to replace.
export function defaultConfigDocument(): z.output<typeof SendConfigDocument> {
  return {
    domain: 'your-mailgun-domain.com',
    api_key: 'your-mailgun-api-key',
    sender_email: 'your-email@example.com',
    subject: 'Your Email Subject',
    template: [
      '<html><body>',
      '<p>Hello,<br><br>',
      'This is a template email. You can use variables like {name}, {title}, etc.<br><br>',
      'Your code: {unique_code}<br><br>',
      'Best regards,<br>',
      'Your Team</p>',
      '</body></html>',
    ].join('\n'),
    registration_link: '',
    delay_between_emails: 1.0,
    max_retries: 3,
    retry_delay: 20.0,
    api_host: DEFAULT_API_HOST,
  }
}
