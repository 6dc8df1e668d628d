/**
 * TidewaterExpress - mounts the engine's REST surface on an Express app.
 */

import express, { type Application, type RequestHandler } from 'express';
import { createLogger, type ActionHandler, type Engine, type FlowDefinition, type Logger } from '@tidewater/core';
import { ServiceContainer } from './container';
import { ServiceTokens } from './tokens';
import { createContextMiddleware, createErrorHandler, type ContextMiddlewareOptions } from './middleware';
import { registerFlowRoutes, registerContactRoutes, registerInstanceRoutes, registerHealthRoutes } from './handlers';
import { type RouteConfig, DefaultRouteConfig } from './routes';

export interface TidewaterExpressConfig {
  app: Application;

  engine: Engine;

  routes?: RouteConfig;

  context?: ContextMiddlewareOptions;

  /** Route prefix (default: '') */
  prefix?: string;

  /** Applied before Tidewater routes */
  middleware?: RequestHandler[];

  /** Default: console, tagged [Express] */
  logger?: Logger;

  hooks?: {
    onContainerReady?: (container: ServiceContainer) => void;
    onRoutesRegistered?: (app: Application) => void;
  };
}

/**
 * Builder for TidewaterExpress configuration.
 */
export class TidewaterExpressBuilder {
  private config: Partial<TidewaterExpressConfig> = {};
  private readonly actions: ActionHandler[] = [];
  private readonly flows: FlowDefinition[] = [];

  app(app: Application): this {
    this.config.app = app;
    return this;
  }

  engine(engine: Engine): this {
    this.config.engine = engine;
    return this;
  }

  routes(config: RouteConfig): this {
    this.config.routes = config;
    return this;
  }

  prefix(prefix: string): this {
    this.config.prefix = prefix;
    return this;
  }

  use(...middleware: RequestHandler[]): this {
    this.config.middleware = [...(this.config.middleware ?? []), ...middleware];
    return this;
  }

  context(options: ContextMiddlewareOptions): this {
    this.config.context = options;
    return this;
  }

  logger(logger: Logger): this {
    this.config.logger = logger;
    return this;
  }

  /** Register an action handler on the engine at build time */
  action(handler: ActionHandler): this {
    this.actions.push(handler);
    return this;
  }

  /** Define a flow at build time */
  flow(flow: FlowDefinition): this {
    this.flows.push(flow);
    return this;
  }

  hooks(hooks: TidewaterExpressConfig['hooks']): this {
    this.config.hooks = { ...this.config.hooks, ...hooks };
    return this;
  }

  async build(): Promise<TidewaterExpress> {
    const { app, engine } = this.config;
    if (!app) {
      throw new Error('Express app is required. Call .app(expressApp) first.');
    }
    if (!engine) {
      throw new Error('Engine is required. Call .engine(engine) first.');
    }

    const instance = new TidewaterExpress({ ...this.config, app, engine });
    for (const handler of this.actions) instance.registerAction(handler);
    for (const flow of this.flows) await instance.defineFlow(flow);
    return instance;
  }
}

/**
 * @example
 * ```typescript
 * const app = express();
 * const { engine } = createMemoryEngine({ schema });
 *
 * const tidewater = await TidewaterExpress.builder()
 *   .app(app)
 *   .engine(engine)
 *   .action(webhookAction())
 *   .flow(welcomeFlow)
 *   .build();
 *
 * await tidewater.start();
 * app.listen(3000);
 * ```
 */
export class TidewaterExpress {
  private readonly container = new ServiceContainer();
  private readonly config: TidewaterExpressConfig;

  constructor(config: TidewaterExpressConfig) {
    this.config = { ...config, routes: { ...DefaultRouteConfig, ...config.routes } };
    this.setupContainer();
    this.setupRoutes();
  }

  static builder(): TidewaterExpressBuilder {
    return new TidewaterExpressBuilder();
  }

  getContainer(): ServiceContainer {
    return this.container;
  }

  get engine(): Engine {
    return this.container.resolve(ServiceTokens.Engine);
  }

  registerAction(handler: ActionHandler): void {
    this.engine.actions.register(handler);
  }

  async defineFlow(flow: FlowDefinition): Promise<void> {
    await this.engine.defineFlow(flow);
  }

  /** Recover persisted state, then start the scheduler and bus */
  async start(): Promise<void> {
    await this.engine.recover();
    await this.engine.start();
  }

  async close(): Promise<void> {
    await this.engine.close();
  }

  private setupContainer(): void {
    this.container.registerInstance(ServiceTokens.Engine, this.config.engine);
    this.container.registerInstance(ServiceTokens.ExpressApp, this.config.app);
    this.container.registerInstance(ServiceTokens.Logger, this.config.logger ?? createLogger('Express'));

    this.config.hooks?.onContainerReady?.(this.container);
  }

  private setupRoutes(): void {
    const { app, routes, prefix = '', middleware = [], context } = this.config;
    const router = express.Router();

    router.use(express.json());
    router.use(createContextMiddleware(this.container, context));
    for (const mw of middleware) {
      router.use(mw);
    }

    if (routes?.flows) registerFlowRoutes(router);
    if (routes?.contacts) registerContactRoutes(router);
    if (routes?.instances) registerInstanceRoutes(router);
    if (routes?.health) registerHealthRoutes(router);

    router.use(createErrorHandler(this.container.resolve(ServiceTokens.Logger)));

    app.use(prefix, router);
    this.config.hooks?.onRoutesRegistered?.(app);
  }
}
