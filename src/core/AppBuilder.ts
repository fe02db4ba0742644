import { Lifecycle } from './Application';
import { Container, unwrapResolutionError } from './container/Container';
import { IContainer, ServiceResolver } from './container/IContainer';
import { ConfigProvider } from './config/ConfigProvider';
import { BadConfigError, findCause } from '../utils/errors';

export interface BuildContext<T> {
  config: ConfigProvider<T>;
  lifecycle: Lifecycle;
}

/**
 * 构建结果:
 * - built: 应用已组装, 启动/停止逻辑已挂到 lifecycle 上
 * - rejected: 配置语义错误, 加载器会尝试回滚
 * - failed: 其他错误, 直接失败
 */
export type BuildOutcome =
  | { kind: 'built' }
  | { kind: 'rejected'; error: BadConfigError }
  | { kind: 'failed'; error: unknown };

export interface AppBuilder<T> {
  build(context: BuildContext<T>): Promise<BuildOutcome>;
}

/**
 * 对构建时抛出的错误分类. BadConfigError 可能被包了任意多层.
 */
export function classifyBuildError(error: unknown): BuildOutcome {
  const badConfig = findCause(error, BadConfigError);
  if (badConfig) {
    return { kind: 'rejected', error: badConfig };
  }
  return { kind: 'failed', error: unwrapResolutionError(error) };
}

export interface AppModule<T> {
  name: string;
  /**
   * 注册 provider
   */
  provide(container: IContainer, context: BuildContext<T>): void;
  /**
   * 解析根服务并挂载 lifecycle hook
   */
  invoke(resolver: ServiceResolver, context: BuildContext<T>): Promise<void>;
}

/**
 * 每次 build 都用一个新的容器, 回滚重试时不会复用上一次构建出的服务
 */
export class ContainerAppBuilder<T> implements AppBuilder<T> {
  constructor(private readonly modules: AppModule<T>[]) {}

  async build(context: BuildContext<T>): Promise<BuildOutcome> {
    const container = new Container();

    try {
      for (const appModule of this.modules) {
        appModule.provide(container, context);
      }
      for (const appModule of this.modules) {
        await appModule.invoke(container, context);
      }
    } catch (error) {
      return classifyBuildError(error);
    }

    return { kind: 'built' };
  }
}
