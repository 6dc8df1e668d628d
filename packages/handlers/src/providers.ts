/**
 * Delivery providers behind send_email and send_sms.
 */

import { formatPointer, type FlowInstance } from '@tidewater/core';

export interface EmailMessage {
  to: string;
  from?: string;
  replyTo?: string;
  subject: string;
  text?: string;
  html?: string;
  /** Provider tags, e.g. campaign names */
  tags?: string[];
  /** Stable per attempt chain; providers that support it dedupe on this */
  idempotencyKey?: string;
}

export interface SmsMessage {
  to: string;
  from?: string;
  body: string;
  idempotencyKey?: string;
}

export interface SendReceipt {
  messageId: string;
}

export interface EmailProvider {
  send(message: EmailMessage): Promise<SendReceipt>;
}

export interface SmsProvider {
  send(message: SmsMessage): Promise<SendReceipt>;
}

/**
 * Same key for every attempt of one step of one instance. Continuations
 * have no instance and get none.
 */
export function idempotencyKeyFor(instance: Readonly<FlowInstance> | undefined): string | undefined {
  return instance ? `${instance.id}:${formatPointer(instance.pointer)}` : undefined;
}

/**
 * Keeps sent messages in memory. For tests and local runs.
 */
export class MemoryEmailProvider implements EmailProvider {
  readonly sent: EmailMessage[] = [];

  async send(message: EmailMessage): Promise<SendReceipt> {
    this.sent.push(message);
    return { messageId: `email-${this.sent.length}` };
  }
}

export class MemorySmsProvider implements SmsProvider {
  readonly sent: SmsMessage[] = [];

  async send(message: SmsMessage): Promise<SendReceipt> {
    this.sent.push(message);
    return { messageId: `sms-${this.sent.length}` };
  }
}
