import type { DependencyResolver, ServiceToken } from "./types.js";

/**
 * Map-backed DependencyResolver for hosts without a container.
 *
 * Values are returned as given; factories run on every resolve, so each
 * dispatch gets a fresh instance. There are no scopes or lifetimes.
 */
export class StaticResolver implements DependencyResolver {
  private readonly providers = new Map<symbol, () => unknown>();

  provide<T>(token: ServiceToken<T>, value: T): this {
    this.providers.set(token.key, () => value);
    return this;
  }

  provideFactory<T>(token: ServiceToken<T>, factory: () => T): this {
    this.providers.set(token.key, factory);
    return this;
  }

  has(token: ServiceToken<unknown>): boolean {
    return this.providers.has(token.key);
  }

  resolve(token: ServiceToken<unknown>): unknown {
    return this.providers.get(token.key)?.();
  }
}

export function createStaticResolver(): StaticResolver {
  return new StaticResolver();
}
