/**
 * Simple dependency injection container.
 */

import type { ServiceMap, ServiceToken } from './tokens';

/**
 * Factory function for lazy service creation.
 */
export type ServiceFactory<T> = (container: ServiceContainer) => T;

type ServiceEntry<T> = {
  instance?: T;
  factory?: ServiceFactory<T>;
  singleton: boolean;
};

/**
 * @example
 * ```typescript
 * const container = new ServiceContainer();
 *
 * container.registerInstance(ServiceTokens.Logger, console);
 * container.registerFactory(ServiceTokens.Engine, c =>
 *   createMemoryEngine({ schema, logger: c.resolve(ServiceTokens.Logger) }).engine
 * );
 *
 * const engine = container.resolve(ServiceTokens.Engine);
 * ```
 */
export class ServiceContainer {
  private services: { [K in ServiceToken]?: ServiceEntry<ServiceMap[K]> } = {};

  /**
   * Register a service instance (eager registration).
   */
  registerInstance<K extends ServiceToken>(token: K, instance: ServiceMap[K]): this {
    const services: { [P in K]?: ServiceEntry<ServiceMap[P]> } = this.services;
    services[token] = { instance, singleton: true };
    return this;
  }

  /**
   * Register a service factory (lazy registration).
   *
   * @param singleton - Whether to cache the instance (default: true)
   */
  registerFactory<K extends ServiceToken>(
    token: K,
    factory: ServiceFactory<ServiceMap[K]>,
    singleton = true
  ): this {
    const services: { [P in K]?: ServiceEntry<ServiceMap[P]> } = this.services;
    services[token] = { factory, singleton };
    return this;
  }

  /**
   * Resolve a service by token.
   *
   * @throws Error if service not registered
   */
  resolve<K extends ServiceToken>(token: K): ServiceMap[K] {
    const entry = this.services[token];
    if (!entry) {
      throw new Error(`Service not registered: ${token}. Did you forget to register it?`);
    }

    if (entry.instance !== undefined) {
      return entry.instance;
    }

    if (!entry.factory) {
      throw new Error(`Service ${token} has no instance or factory`);
    }

    const instance = entry.factory(this);
    if (entry.singleton) {
      entry.instance = instance;
    }
    return instance;
  }

  has(token: ServiceToken): boolean {
    return this.services[token] !== undefined;
  }

  /**
   * Try to resolve a service, returning undefined if not registered.
   */
  tryResolve<K extends ServiceToken>(token: K): ServiceMap[K] | undefined {
    return this.has(token) ? this.resolve(token) : undefined;
  }

  clear(): void {
    this.services = {};
  }
}
