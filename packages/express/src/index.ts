/**
 * @tidewater/express - REST surface for the Tidewater engine.
 *
 * @example
 * ```typescript
 * import express from 'express';
 * import { Pool } from 'pg';
 * import { Engine } from '@tidewater/core';
 * import { createPgStores } from '@tidewater/postgres';
 * import { TidewaterExpress } from '@tidewater/express';
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * const stores = await createPgStores(pool, { propertySchema });
 * const engine = new Engine({
 *   properties: stores.properties,
 *   eventLog: stores.events,
 *   instances: stores.instances,
 *   completions: stores.completions,
 *   ledger: stores.ledger,
 *   flowStore: stores.flows,
 * });
 *
 * const app = express();
 * const tidewater = await TidewaterExpress.builder().app(app).engine(engine).build();
 * await tidewater.start();
 *
 * // POST   /api/flows
 * // GET    /api/flows
 * // DELETE /api/flows/:flowId
 * // POST   /api/contacts/:contactId/events
 * // PUT    /api/contacts/:contactId/properties/:key
 * // GET    /api/instances/:instanceId
 * // GET    /api/causes/:causeId/completion?wait=ms
 * // GET    /health
 * // GET    /ready
 * app.listen(3000);
 * ```
 */

export { TidewaterExpress, TidewaterExpressBuilder } from './tidewater-express';
export type { TidewaterExpressConfig } from './tidewater-express';

export { ServiceContainer, type ServiceFactory } from './container';
export { ServiceTokens, type ServiceToken, type ServiceMap } from './tokens';

export { Routes, buildRoute, DefaultRouteConfig } from './routes';
export type { RouteName, RoutePath, RouteConfig } from './routes';

export {
  createContextMiddleware,
  createErrorHandler,
  asyncHandler,
  bodyValidator,
  requireTidewaterContext,
  validateServices,
  RequestValidationError,
} from './middleware';
export type { TidewaterContext, ContextMiddlewareOptions, ErrorResponse } from './middleware';

export {
  registerFlowRoutes,
  registerContactRoutes,
  registerInstanceRoutes,
  registerHealthRoutes,
  MAX_COMPLETION_WAIT_MS,
} from './handlers';
