/**
 * Express route handlers for Tidewater.
 */

import type { Router, Request, Response } from 'express';
import type { Engine, FlowDefinition } from '@tidewater/core';
import { Routes } from './routes';
import { ServiceTokens } from './tokens';
import { asyncHandler, bodyValidator, requireTidewaterContext, RequestValidationError } from './middleware';

/** Upper bound on `?wait=` for cause completion */
export const MAX_COMPLETION_WAIT_MS = 30_000;

function engineOf(req: Request): Engine {
  requireTidewaterContext(req);
  return req.tidewater.container.resolve(ServiceTokens.Engine);
}

// Structural check only; defineFlow runs the full flow validation
const readFlow = bodyValidator<FlowDefinition>({
  type: 'object',
  required: ['id', 'version', 'trigger', 'steps'],
  properties: {
    id: { type: 'string', minLength: 1 },
    version: { type: 'string', minLength: 1 },
    trigger: { type: 'object', required: ['type'], properties: { type: { type: 'string' } } },
    steps: { type: 'array', items: { type: 'object' } },
  },
});

const readEvent = bodyValidator<{ type: string; payload?: Record<string, unknown> }>({
  type: 'object',
  required: ['type'],
  properties: {
    type: { type: 'string', minLength: 1 },
    payload: { type: 'object' },
  },
});

const readPropertyWrite = bodyValidator<{ value: unknown }>({
  type: 'object',
  required: ['value'],
});

function parseWait(raw: unknown): number {
  if (raw === undefined) return 0;
  const wait = typeof raw === 'string' ? Number(raw) : NaN;
  if (!Number.isInteger(wait) || wait < 0) {
    throw new RequestValidationError('wait must be a non-negative integer (ms)');
  }
  return Math.min(wait, MAX_COMPLETION_WAIT_MS);
}

/**
 * Register flow routes (define, list, undefine).
 */
export function registerFlowRoutes(router: Router): void {
  router.post(
    Routes.DefineFlow,
    asyncHandler(async (req: Request, res: Response) => {
      const flow = readFlow(req.body);
      const firings = await engineOf(req).defineFlow(flow);
      res.status(201).json({
        flowId: flow.id,
        version: flow.version,
        fired: firings.filter(f => f.created).length,
      });
    })
  );

  router.get(
    Routes.ListFlows,
    asyncHandler(async (req: Request, res: Response) => {
      const { flows } = engineOf(req);
      res.json({
        flows: flows.list().map(flow => ({
          id: flow.id,
          version: flow.version,
          name: flow.name ?? flow.id,
          trigger: flow.trigger.type,
          steps: flow.steps.length,
          versions: flows.versions(flow.id),
        })),
      });
    })
  );

  router.delete(
    Routes.UndefineFlow,
    asyncHandler(async (req: Request, res: Response) => {
      await engineOf(req).undefineFlow(req.params.flowId);
      res.status(204).end();
    })
  );
}

/**
 * Register contact input routes (events, property writes).
 */
export function registerContactRoutes(router: Router): void {
  router.post(
    Routes.TrackEvent,
    asyncHandler(async (req: Request, res: Response) => {
      const { type, payload } = readEvent(req.body);
      const event = await engineOf(req).track(req.params.contactId, type, payload);
      res.status(202).json({ eventId: event.id, timestamp: event.timestamp });
    })
  );

  router.put(
    Routes.SetProperty,
    asyncHandler(async (req: Request, res: Response) => {
      const { value } = readPropertyWrite(req.body);
      const change = await engineOf(req).setProperty(req.params.contactId, req.params.key, value);
      res.json(change ? { changed: true, changeId: change.id } : { changed: false });
    })
  );
}

/**
 * Register instance status and cause completion routes.
 */
export function registerInstanceRoutes(router: Router): void {
  router.get(
    Routes.GetInstance,
    asyncHandler(async (req: Request, res: Response) => {
      const report = await engineOf(req).queryInstanceStatus(req.params.instanceId);
      res.json(report);
    })
  );

  router.get(
    Routes.CauseCompletion,
    asyncHandler(async (req: Request, res: Response) => {
      const timeoutMs = parseWait(req.query.wait);
      const resolved = await engineOf(req).awaitCompletion(req.params.causeId, { timeoutMs });
      res.json({ causeId: req.params.causeId, resolved });
    })
  );
}

/**
 * Register health check routes.
 */
export function registerHealthRoutes(router: Router): void {
  router.get(Routes.Health, (req: Request, res: Response) => {
    const health = engineOf(req).health();
    res.json({ status: health.schedulerHalted ? 'degraded' : 'healthy', ...health, timestamp: Date.now() });
  });

  router.get(Routes.Ready, (req: Request, res: Response) => {
    const { schedulerHalted } = engineOf(req).health();
    res.status(schedulerHalted ? 503 : 200).json({
      ready: !schedulerHalted,
      checks: { scheduler: schedulerHalted ? 'halted' : 'ok' },
    });
  });
}
