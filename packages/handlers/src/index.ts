// Actions
export { createWebhookAction, webhookAction } from './webhook';
export type { WebhookActionOptions, WebhookOutput } from './webhook';
export { createSendEmailAction } from './send-email';
export type { SendEmailOptions } from './send-email';
export { createSendSmsAction } from './send-sms';
export type { SendSmsOptions } from './send-sms';

// Providers
export { MemoryEmailProvider, MemorySmsProvider, idempotencyKeyFor } from './providers';
export type { EmailProvider, SmsProvider, EmailMessage, SmsMessage, SendReceipt } from './providers';

// Test utilities
export { createMockParams, createTestInstance, testAction, assertSuccess, assertFailure } from './test-helpers';
export type { RecordedWrites, MockParamsOptions } from './test-helpers';
