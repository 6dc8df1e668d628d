/**
 * Route definitions for the Tidewater REST surface.
 */

export const Routes = {
  // ── Flow Routes ─────────────────────────────────────────────────────
  /**
   * POST /api/flows
   * Define a flow. `now` triggers fire during the request.
   */
  DefineFlow: '/api/flows',

  /**
   * GET /api/flows
   * List defined flows (latest version of each).
   */
  ListFlows: '/api/flows',

  /**
   * DELETE /api/flows/:flowId
   * Undefine a flow. Running instances finish on their version.
   */
  UndefineFlow: '/api/flows/:flowId',

  // ── Contact Routes ──────────────────────────────────────────────────
  /**
   * POST /api/contacts/:contactId/events
   * Append an event to the contact's log.
   */
  TrackEvent: '/api/contacts/:contactId/events',

  /**
   * PUT /api/contacts/:contactId/properties/:key
   * Write one property through the schema.
   */
  SetProperty: '/api/contacts/:contactId/properties/:key',

  // ── Instance Routes ─────────────────────────────────────────────────
  /**
   * GET /api/instances/:instanceId
   */
  GetInstance: '/api/instances/:instanceId',

  /**
   * GET /api/causes/:causeId/completion?wait=ms
   * Whether everything a cause spawned has finished.
   */
  CauseCompletion: '/api/causes/:causeId/completion',

  // ── Health Routes ───────────────────────────────────────────────────
  Health: '/health',

  /**
   * GET /ready
   * 503 while the delay scheduler is halted.
   */
  Ready: '/ready',
} as const;

export type RouteName = keyof typeof Routes;
export type RoutePath = (typeof Routes)[RouteName];

/**
 * Helper to build a route with parameters.
 *
 * @example
 * ```typescript
 * buildRoute(Routes.GetInstance, { instanceId: '123' });
 * // => '/api/instances/123'
 * ```
 */
export function buildRoute(route: RoutePath, params: Record<string, string> = {}): string {
  let result: string = route;
  for (const [key, value] of Object.entries(params)) {
    result = result.replace(`:${key}`, encodeURIComponent(value));
  }
  return result;
}

/**
 * Route configuration for enabling/disabling route groups.
 */
export interface RouteConfig {
  flows?: boolean;
  contacts?: boolean;
  /** Instance status and cause completion */
  instances?: boolean;
  health?: boolean;
}

export const DefaultRouteConfig: Required<RouteConfig> = {
  flows: true,
  contacts: true,
  instances: true,
  health: true,
};
