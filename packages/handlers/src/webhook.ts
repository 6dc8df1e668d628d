import {
  Result,
  RetryableActionError,
  createLogger,
  paramsReader,
  type ActionHandler,
  type ActionParams,
  type Logger,
} from '@tidewater/core';

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

interface WebhookParams {
  url: string;
  method?: HttpMethod;
  headers?: Record<string, string>;
  body?: unknown;
  /** Per-call timeout in ms */
  timeout?: number;
}

export interface WebhookOutput {
  status: number;
  /** Parsed JSON when the response says so, text otherwise */
  body: unknown;
  duration: number;
}

export interface WebhookActionOptions {
  /** Defaults to the global fetch */
  fetch?: typeof fetch;
  /** Default per-call timeout (default: 10000) */
  timeoutMs?: number;
  /** Sent with every request; step headers win */
  headers?: Record<string, string>;
  /** Refuse URLs whose host is not listed */
  allowedHosts?: readonly string[];
  logger?: Logger;
}

const paramsSchema = {
  type: 'object',
  required: ['url'],
  properties: {
    url: { type: 'string', format: 'uri' },
    method: { type: 'string', enum: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'] },
    headers: { type: 'object', additionalProperties: { type: 'string' } },
    body: {},
    timeout: { type: 'integer', minimum: 1 },
  },
  additionalProperties: false,
};

const readParams = paramsReader<WebhookParams>(paramsSchema);

/** Statuses worth another attempt */
function isTransient(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) return null;
  const contentType = response.headers.get('content-type') ?? '';
  if (!contentType.includes('json')) return text;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Call an HTTP endpoint.
 *
 * 2xx succeeds with the response as output. 408, 429 and 5xx responses and
 * network errors are retried under the step's retry policy; other statuses
 * fail the instance.
 *
 * ```typescript
 * {
 *   type: 'action',
 *   handler: 'webhook',
 *   params: {
 *     url: 'https://crm.example.com/hooks/lead',
 *     method: 'POST',
 *     body: { email: '${contact.email}', plan: '${contact.plan}' },
 *   },
 *   outputKey: 'crm',
 * }
 * ```
 */
export function createWebhookAction(options: WebhookActionOptions = {}): ActionHandler {
  const doFetch = options.fetch ?? fetch;
  const logger = options.logger ?? createLogger('Webhook');
  const allowed = options.allowedHosts ? new Set(options.allowedHosts) : undefined;

  return {
    type: 'webhook',

    metadata: {
      type: 'webhook',
      name: 'Webhook',
      description: 'Call an HTTP endpoint',
      category: 'external',
      retryable: true,
      paramsSchema,
      outputSchema: {
        type: 'object',
        properties: {
          status: { type: 'number' },
          body: {},
          duration: { type: 'number' },
        },
      },
    },

    async execute({ params, contact, signal }: ActionParams) {
      const { url, method = 'POST', headers, body, timeout } = readParams(params);

      const host = new URL(url).host;
      if (allowed && !allowed.has(host)) {
        return Result.fatal('HOST_NOT_ALLOWED', `Webhook host "${host}" is not allowed`);
      }

      const controller = new AbortController();
      const timeoutHandle = setTimeout(() => controller.abort(), timeout ?? options.timeoutMs ?? 10_000);
      const forwardAbort = () => controller.abort();
      signal?.addEventListener('abort', forwardAbort);
      const hasBody = body !== undefined && method !== 'GET';
      const startedAt = Date.now();

      let response: Response;
      let output: WebhookOutput;
      try {
        response = await doFetch(url, {
          method,
          headers: {
            ...(hasBody && typeof body !== 'string' ? { 'content-type': 'application/json' } : {}),
            ...options.headers,
            ...headers,
          },
          body: hasBody ? (typeof body === 'string' ? body : JSON.stringify(body)) : undefined,
          signal: controller.signal,
        });
        output = {
          status: response.status,
          body: await readBody(response),
          duration: Date.now() - startedAt,
        };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new RetryableActionError(`${method} ${url} failed: ${message}`, 'WEBHOOK_NETWORK');
      } finally {
        clearTimeout(timeoutHandle);
        signal?.removeEventListener('abort', forwardAbort);
      }

      logger.info(`${method} ${url} -> ${response.status} for ${contact.contactId}`);

      if (response.ok) return Result.success(output);
      const message = `${method} ${url} returned ${response.status}`;
      return isTransient(response.status)
        ? Result.retryable('WEBHOOK_STATUS', message, output)
        : Result.fatal('WEBHOOK_STATUS', message, output);
    },
  };
}

export const webhookAction: ActionHandler = createWebhookAction();
