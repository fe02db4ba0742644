/**
 * 服务标识. 类型参数只在编译期使用, 用来保证 resolve 返回正确的类型.
 */
export class ServiceToken<T> {
  declare readonly serviceType?: T;

  constructor(public readonly name: string) {}

  toString(): string {
    return `ServiceToken(${this.name})`;
  }
}

export interface ServiceResolver {
  /**
   * 解析服务, 每个服务在一个容器内只构造一次
   */
  resolve<T>(token: ServiceToken<T>): Promise<T>;
}

export type ServiceFactory<T> = (resolver: ServiceResolver) => T | Promise<T>;

export interface ServiceDescriptor<T> {
  token: ServiceToken<T>;
  factory?: ServiceFactory<T>;
  instance?: T;
}

export interface IContainer extends ServiceResolver {
  /**
   * 注册工厂函数
   */
  registerFactory<T>(token: ServiceToken<T>, factory: ServiceFactory<T>): IContainer;

  /**
   * 注册单例实例
   */
  registerInstance<T>(token: ServiceToken<T>, instance: T): IContainer;

  /**
   * 检查服务是否已注册
   */
  isRegistered<T>(token: ServiceToken<T>): boolean;

  /**
   * 获取所有已注册的服务名
   */
  getRegisteredServices(): string[];
}
