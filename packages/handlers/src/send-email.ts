import { Result, paramsReader, type ActionHandler, type ActionParams } from '@tidewater/core';
import { idempotencyKeyFor, type EmailProvider } from './providers';

interface SendEmailParams {
  to?: string;
  from?: string;
  replyTo?: string;
  subject: string;
  text?: string;
  html?: string;
  tags?: string[];
}

export interface SendEmailOptions {
  /** Used when the step gives no `from` */
  from?: string;
  /** Recipient property when the step gives no `to` (default: 'email') */
  emailProperty?: string;
}

const paramsSchema = {
  type: 'object',
  required: ['subject'],
  properties: {
    to: { type: 'string', format: 'email' },
    from: { type: 'string', minLength: 1 },
    replyTo: { type: 'string', format: 'email' },
    subject: { type: 'string', minLength: 1 },
    text: { type: 'string' },
    html: { type: 'string' },
    tags: { type: 'array', items: { type: 'string' } },
  },
  anyOf: [{ required: ['text'] }, { required: ['html'] }],
  additionalProperties: false,
};

const readParams = paramsReader<SendEmailParams>(paramsSchema);

/**
 * Send an email through an EmailProvider.
 *
 * The recipient defaults to the contact's `email` property. Provider
 * errors are retried; a contact without an address fails the instance.
 */
export function createSendEmailAction(provider: EmailProvider, options: SendEmailOptions = {}): ActionHandler {
  const emailProperty = options.emailProperty ?? 'email';

  return {
    type: 'send_email',

    metadata: {
      type: 'send_email',
      name: 'Send Email',
      description: 'Send an email to the contact',
      category: 'messaging',
      retryable: true,
      paramsSchema,
      outputSchema: {
        type: 'object',
        properties: { messageId: { type: 'string' }, to: { type: 'string' } },
      },
    },

    async execute({ params, contact, instance }: ActionParams) {
      const { to: explicit, from, subject, ...content } = readParams(params);

      const fallback = contact.properties[emailProperty];
      const to = explicit ?? (typeof fallback === 'string' && fallback.trim() ? fallback : undefined);
      if (!to) {
        return Result.fatal('NO_RECIPIENT', `Contact ${contact.contactId} has no ${emailProperty}`);
      }

      const receipt = await provider.send({
        ...content,
        to,
        from: from ?? options.from,
        subject,
        idempotencyKey: idempotencyKeyFor(instance),
      });
      return Result.success({ messageId: receipt.messageId, to });
    },
  };
}
