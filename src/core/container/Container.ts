import {
  IContainer,
  ServiceDescriptor,
  ServiceFactory,
  ServiceResolver,
  ServiceToken
} from './IContainer';
import { AppError, describeError } from '../../utils/errors';
import { log } from '../../utils/logger';

/**
 * 工厂函数抛出的错误会被包装成 ServiceResolutionError, 依赖链上每一层包一次
 */
export class ServiceResolutionError extends AppError {
  constructor(
    public readonly service: string,
    public readonly path: string[],
    cause: unknown
  ) {
    super(`could not build ${[...path, service].join(' -> ')}: ${describeError(cause)}`, { cause });
    this.name = 'ServiceResolutionError';
  }
}

/**
 * 去掉容器自己的包装, 返回工厂函数抛出的原始错误
 */
export function unwrapResolutionError(error: unknown): unknown {
  let current = error;
  while (current instanceof ServiceResolutionError) {
    current = current.cause;
  }
  return current;
}

export class Container implements IContainer {
  private services = new Map<ServiceToken<unknown>, ServiceDescriptor<unknown>>();
  private instances = new Map<ServiceToken<unknown>, Promise<unknown>>();

  registerFactory<T>(token: ServiceToken<T>, factory: ServiceFactory<T>): IContainer {
    if (this.services.has(token)) {
      throw new AppError(`Service already registered: ${token.name}`, { isOperational: false });
    }

    this.services.set(token, { token, factory });
    log.debug('Factory registered', { service: token.name });

    return this;
  }

  registerInstance<T>(token: ServiceToken<T>, instance: T): IContainer {
    if (this.services.has(token)) {
      throw new AppError(`Service already registered: ${token.name}`, { isOperational: false });
    }

    this.services.set(token, { token, instance });
    this.instances.set(token, Promise.resolve(instance));
    log.debug('Instance registered', { service: token.name });

    return this;
  }

  resolve<T>(token: ServiceToken<T>): Promise<T> {
    return this.internalResolve(token, []);
  }

  isRegistered<T>(token: ServiceToken<T>): boolean {
    return this.services.has(token);
  }

  getRegisteredServices(): string[] {
    return Array.from(this.services.keys()).map(token => token.name);
  }

  // Private methods

  private internalResolve<T>(token: ServiceToken<T>, path: ServiceToken<unknown>[]): Promise<T> {
    // 检查循环依赖
    if (path.includes(token)) {
      const cycle = [...path, token].map(t => t.name).join(' -> ');
      return Promise.reject(new AppError(`Circular dependency detected: ${cycle}`, { isOperational: false }));
    }

    let instance = this.instances.get(token);

    if (!instance) {
      const descriptor = this.services.get(token);
      const names = path.map(t => t.name);
      if (!descriptor?.factory) {
        return Promise.reject(
          new ServiceResolutionError(token.name, names, new Error(`Service not registered: ${token.name}`))
        );
      }

      const factory = descriptor.factory;
      const scoped: ServiceResolver = {
        resolve: <D>(dependency: ServiceToken<D>) => this.internalResolve(dependency, [...path, token])
      };

      instance = (async (): Promise<unknown> => {
        try {
          const value = await factory(scoped);
          log.debug('Service resolved', { service: token.name });
          return value;
        } catch (error) {
          throw new ServiceResolutionError(token.name, names, error);
        }
      })();

      this.instances.set(token, instance);
    }

    // 以 token 为键存入的值一定是 T
    return instance as Promise<T>;
  }
}
